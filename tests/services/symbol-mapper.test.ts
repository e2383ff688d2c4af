import assert from "node:assert";
import { describe, it } from "node:test";

import { StaticSymbolMapper } from "../../src/services/symbol-mapper";

describe("StaticSymbolMapper", () => {
  it("should map perpetual symbols to pairs and back", () => {
    const mapper = StaticSymbolMapper.forPerpetuals(["ETH-USDC", "BTC-USDC"]);

    assert.strictEqual(mapper.toCanonicalPair("ETH-PERP"), "ETH-USDC");
    assert.strictEqual(mapper.toExchangeSymbol("BTC-USDC"), "BTC-PERP");
  });

  it("should not guess unknown symbols", () => {
    const mapper = StaticSymbolMapper.forPerpetuals(["ETH-USDC"]);

    assert.strictEqual(mapper.toCanonicalPair("SOL-PERP"), undefined);
    assert.strictEqual(mapper.toCanonicalPair("eth-perp"), undefined);
    assert.strictEqual(mapper.toExchangeSymbol("ETH-USD"), undefined);
  });

  it("should accept explicit entries", () => {
    const mapper = new StaticSymbolMapper([["WETH-PERP", "ETH-USDC"]]);
    mapper.add("WBTC-PERP", "BTC-USDC");

    assert.strictEqual(mapper.toCanonicalPair("WETH-PERP"), "ETH-USDC");
    assert.strictEqual(mapper.toExchangeSymbol("BTC-USDC"), "WBTC-PERP");
  });
});
