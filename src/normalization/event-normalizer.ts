/**
 * Event Normalizer
 *
 * Converts raw push and poll payloads into canonical update records. Never
 * throws: malformed items and exchange error envelopes come back as
 * NormalizationFailure records next to the updates that did decode.
 *
 * Snapshot kinds are all-or-nothing. A snapshot with a malformed entry is
 * rejected as a whole, because replacing local state with a partial view
 * would delete entries that are still live. Entries whose symbol does not
 * resolve are excluded from the snapshot (the mapper fails closed).
 */

import { EXCHANGE_ORDER_STATE } from "../constants/exchange.constants";
import { NormalizationError, asError } from "../errors/app.errors";
import type { Balance, Instrument, Position } from "../models/position";
import { NO_FUNDING_PAYMENT } from "../models/position";
import type {
  CanonicalUpdate,
  FillUpdate,
  FundingUpdate,
  NormalizationFailure,
  NormalizationResult,
  OrderStatusUpdate,
  RawMessageKind,
  RawPayload,
} from "../models/updates";
import type { SymbolMapper } from "../services/interfaces";
import type { Logger } from "../utils/logger.util";
import {
  extractExchangeError,
  extractItems,
  isRecord,
  optionalBoolean,
  optionalNumber,
  optionalString,
  requireNumber,
  requireString,
  type RawRecord,
} from "./fields";

/** Payload field holding the item list, per kind */
const LIST_FIELD: Record<RawMessageKind, string> = {
  "order-status": "orders",
  trade: "trades",
  "position-snapshot": "positions",
  "balance-snapshot": "collaterals",
  "funding-event": "events",
  "instrument-snapshot": "instruments",
};

/** Raised for an item whose symbol is not in the symbol table */
class UnresolvedSymbolError extends NormalizationError {
  constructor(public readonly symbol: string) {
    super(`unresolved symbol "${symbol}"`);
  }
}

export class EventNormalizer {
  constructor(
    private readonly symbols: SymbolMapper,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  normalize(raw: RawPayload): NormalizationResult {
    const failures: NormalizationFailure[] = [];
    const fail = (reason: string, isExchangeError = false): void => {
      failures.push({ kind: raw.kind, source: raw.source, reason, isExchangeError });
    };

    const exchangeError = extractExchangeError(raw.data);
    if (exchangeError !== undefined) {
      fail(exchangeError, true);
      return { updates: [], failures };
    }

    const receivedAt = raw.receivedAt ?? this.now();
    const items = extractItems(raw.data, LIST_FIELD[raw.kind]);
    const updates: CanonicalUpdate[] = [];

    switch (raw.kind) {
      case "order-status":
        for (const item of items) {
          const update = this.decodeItem(raw, item, fail, (record) =>
            this.toOrderStatus(raw, record, receivedAt),
          );
          if (update) updates.push(update);
        }
        break;

      case "trade":
        for (const item of items) {
          const update = this.decodeItem(raw, item, fail, (record) =>
            this.toFill(raw, record, receivedAt),
          );
          if (update) updates.push(update);
        }
        break;

      case "position-snapshot": {
        const positions = this.decodeSnapshot(raw, items, fail, (record) =>
          this.toPosition(record),
        );
        if (positions) {
          updates.push({
            type: "position-snapshot",
            source: raw.source,
            positions: positions.filter((p): p is Position => p !== null),
          });
        }
        break;
      }

      case "balance-snapshot": {
        const balances = this.decodeSnapshot(raw, items, fail, (record) =>
          this.toBalance(record),
        );
        if (balances) {
          updates.push({ type: "balance-snapshot", source: raw.source, balances });
        }
        break;
      }

      case "instrument-snapshot": {
        const instruments = this.decodeSnapshot(raw, items, fail, (record) =>
          this.toInstrument(record),
        );
        if (instruments) {
          updates.push({
            type: "instrument-snapshot",
            source: raw.source,
            instruments,
          });
        }
        break;
      }

      case "funding-event": {
        const update = this.toFunding(raw, items, fail);
        if (update) updates.push(update);
        break;
      }
    }

    return { updates, failures };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Item decoding
  // ═══════════════════════════════════════════════════════════════════════════

  private decodeItem<T>(
    raw: RawPayload,
    item: unknown,
    fail: (reason: string) => void,
    decode: (record: RawRecord) => T,
  ): T | undefined {
    if (!isRecord(item)) {
      fail("item is not an object");
      return undefined;
    }
    try {
      return decode(item);
    } catch (err) {
      if (err instanceof UnresolvedSymbolError) {
        this.logger.warn(
          `[Normalizer] Dropping ${raw.kind} from ${raw.source}: ${err.message}`,
        );
      }
      fail(asError(err).message);
      return undefined;
    }
  }

  /**
   * Decode every entry of a snapshot. Returns undefined when any entry is
   * malformed; entries with unresolved symbols are skipped.
   */
  private decodeSnapshot<T>(
    raw: RawPayload,
    items: unknown[],
    fail: (reason: string) => void,
    decode: (record: RawRecord) => T,
  ): T[] | undefined {
    const decoded: T[] = [];
    let malformed = false;

    for (const item of items) {
      if (!isRecord(item)) {
        fail("snapshot entry is not an object");
        malformed = true;
        continue;
      }
      try {
        decoded.push(decode(item));
      } catch (err) {
        if (err instanceof UnresolvedSymbolError) {
          this.logger.debug(
            `[Normalizer] Skipping ${raw.kind} entry: ${err.message}`,
          );
          continue;
        }
        fail(asError(err).message);
        malformed = true;
      }
    }

    if (malformed) {
      this.logger.warn(
        `[Normalizer] Rejecting ${raw.kind} from ${raw.source}: malformed entries, keeping previous state`,
      );
      return undefined;
    }
    return decoded;
  }

  private resolvePair(record: RawRecord): string {
    const symbol = requireString(record, "instrument_name");
    const pair = this.symbols.toCanonicalPair(symbol);
    if (pair === undefined) {
      throw new UnresolvedSymbolError(symbol);
    }
    return pair;
  }

  private toOrderStatus(
    raw: RawPayload,
    record: RawRecord,
    receivedAt: number,
  ): OrderStatusUpdate {
    const status = requireString(record, "order_status");
    const state = EXCHANGE_ORDER_STATE[status.toLowerCase()];
    if (state === undefined) {
      throw new NormalizationError(`unknown order status "${status}"`);
    }

    const clientOrderId = optionalString(record, "label");
    const exchangeOrderId = optionalString(record, "order_id");
    if (clientOrderId === undefined && exchangeOrderId === undefined) {
      throw new NormalizationError("order message carries neither label nor order_id");
    }

    return {
      type: "order-status",
      source: raw.source,
      clientOrderId,
      exchangeOrderId,
      tradingPair: this.resolvePair(record),
      state,
      timestamp: optionalNumber(record, "last_update_timestamp", receivedAt),
    };
  }

  private toFill(
    raw: RawPayload,
    record: RawRecord,
    receivedAt: number,
  ): FillUpdate {
    const tradeId = requireString(record, "trade_id");
    const exchangeOrderId = requireString(record, "order_id");
    const tradingPair = this.resolvePair(record);
    const fillPrice = requireNumber(record, "trade_price");
    const fillBaseAmount = requireNumber(record, "trade_amount");

    if (fillBaseAmount <= 0) {
      throw new NormalizationError(`non-positive trade_amount ${fillBaseAmount}`);
    }
    if (fillPrice < 0) {
      throw new NormalizationError(`negative trade_price ${fillPrice}`);
    }

    return {
      type: "fill",
      source: raw.source,
      tradeId,
      exchangeOrderId,
      clientOrderId: optionalString(record, "label"),
      tradingPair,
      fillPrice,
      fillBaseAmount,
      fillQuoteAmount: optionalNumber(
        record,
        "quote_amount",
        fillPrice * fillBaseAmount,
      ),
      fee: {
        amount: optionalNumber(record, "trade_fee", 0),
        asset: optionalString(record, "fee_asset") ?? quoteAsset(tradingPair),
      },
      fillTimestamp: optionalNumber(record, "timestamp", receivedAt),
    };
  }

  /** Zero-amount entries decode to null and are left out of the snapshot */
  private toPosition(record: RawRecord): Position | null {
    const tradingPair = this.resolvePair(record);
    const amount = requireNumber(record, "amount");
    if (amount === 0) return null;

    return {
      tradingPair,
      side: amount > 0 ? "LONG" : "SHORT",
      amount,
      entryPrice: optionalNumber(
        record,
        "average_price",
        optionalNumber(record, "index_price", 0),
      ),
      markPrice: optionalNumber(record, "mark_price", 0),
      unrealizedPnl: optionalNumber(record, "unrealized_pnl", 0),
      leverage: optionalNumber(record, "leverage", 1),
    };
  }

  private toBalance(record: RawRecord): Balance {
    const total = requireNumber(record, "amount");
    return {
      asset: requireString(record, "asset_name"),
      total,
      available: optionalNumber(record, "available", total),
    };
  }

  private toInstrument(record: RawRecord): Instrument {
    return {
      tradingPair: this.resolvePair(record),
      minOrderSize: requireNumber(record, "minimum_amount"),
      tickSize: requireNumber(record, "tick_size"),
      stepSize: requireNumber(record, "amount_step"),
      isActive: optionalBoolean(record, "is_active", true),
    };
  }

  /**
   * Most recent settlement only. An empty list or a zero payment decodes to
   * the no-payment sentinel.
   */
  private toFunding(
    raw: RawPayload,
    items: unknown[],
    fail: (reason: string) => void,
  ): FundingUpdate | undefined {
    const events: RawRecord[] = [];
    for (const item of items) {
      if (isRecord(item)) events.push(item);
      else fail("funding event is not an object");
    }

    let latest: RawRecord | undefined;
    let latestTs = -Infinity;
    for (const event of events) {
      const ts = optionalNumber(event, "timestamp", 0);
      if (ts > latestTs) {
        latest = event;
        latestTs = ts;
      }
    }

    try {
      const tradingPair =
        raw.tradingPair ?? (latest ? this.resolvePair(latest) : undefined);
      if (tradingPair === undefined) {
        throw new NormalizationError("funding payload without trading pair");
      }

      const payment = latest ? requireNumber(latest, "funding") : 0;
      if (!latest || payment === 0) {
        return { type: "funding", source: raw.source, tradingPair, ...NO_FUNDING_PAYMENT };
      }

      return {
        type: "funding",
        source: raw.source,
        tradingPair,
        timestamp: latestTs,
        fundingRate: optionalNumber(
          latest,
          "funding_rate",
          optionalNumber(latest, "pnl", 0),
        ),
        payment,
      };
    } catch (err) {
      fail(asError(err).message);
      return undefined;
    }
  }
}

function quoteAsset(tradingPair: string): string {
  const parts = tradingPair.split("-");
  return parts.length >= 2 && parts[1] ? parts[1] : "unknown";
}
