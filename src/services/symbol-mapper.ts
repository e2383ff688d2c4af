import type { SymbolMapper } from "./interfaces";

/**
 * In-memory bidirectional symbol table.
 *
 * Exchange perpetual symbols look like "ETH-PERP"; canonical pairs like
 * "ETH-USDC". Lookups that are not in the table return undefined.
 */
export class StaticSymbolMapper implements SymbolMapper {
  private readonly toPair = new Map<string, string>();
  private readonly toSymbol = new Map<string, string>();

  constructor(entries: Iterable<[exchangeSymbol: string, tradingPair: string]> = []) {
    for (const [symbol, pair] of entries) {
      this.add(symbol, pair);
    }
  }

  /**
   * Build a mapper for perpetuals quoted in a single collateral asset,
   * e.g. ["ETH-USDC"] → { "ETH-PERP" ↔ "ETH-USDC" }
   */
  static forPerpetuals(tradingPairs: string[]): StaticSymbolMapper {
    const mapper = new StaticSymbolMapper();
    for (const pair of tradingPairs) {
      const [base] = pair.split("-");
      if (base) mapper.add(`${base}-PERP`, pair);
    }
    return mapper;
  }

  add(exchangeSymbol: string, tradingPair: string): void {
    this.toPair.set(exchangeSymbol, tradingPair);
    this.toSymbol.set(tradingPair, exchangeSymbol);
  }

  toCanonicalPair(exchangeSymbol: string): string | undefined {
    return this.toPair.get(exchangeSymbol);
  }

  toExchangeSymbol(tradingPair: string): string | undefined {
    return this.toSymbol.get(tradingPair);
  }
}
