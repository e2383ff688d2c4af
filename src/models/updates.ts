/**
 * Canonical Updates - Source-agnostic records produced by the event normalizer
 *
 * Both the push stream and the poll loop are decoded into this closed union
 * once, so the merge layer routes on `type` and never on channel strings.
 */

import type { OrderState, TradeFee } from "./order";
import type { Balance, Instrument, Position } from "./position";

/** Channel a payload arrived through */
export type UpdateSource = "stream" | "poll";

/** Kinds of raw payload the normalizer understands */
export type RawMessageKind =
  | "order-status"
  | "trade"
  | "position-snapshot"
  | "balance-snapshot"
  | "funding-event"
  | "instrument-snapshot";

/**
 * Raw payload tagged with its source channel and message kind
 */
export interface RawPayload {
  source: UpdateSource;
  kind: RawMessageKind;
  data: unknown;

  /** Local receipt time (ms), used when the payload carries no timestamp */
  receivedAt?: number;

  /** Trading pair the request was made for (funding history is per pair) */
  tradingPair?: string;
}

export interface OrderStatusUpdate {
  type: "order-status";
  source: UpdateSource;
  clientOrderId?: string;
  exchangeOrderId?: string;
  tradingPair: string;
  state: OrderState;
  timestamp: number;
}

export interface FillUpdate {
  type: "fill";
  source: UpdateSource;
  tradeId: string;
  exchangeOrderId: string;
  clientOrderId?: string;
  tradingPair: string;
  fillPrice: number;
  fillBaseAmount: number;
  fillQuoteAmount: number;
  fee: TradeFee;
  fillTimestamp: number;
}

export interface PositionSnapshot {
  type: "position-snapshot";
  source: UpdateSource;
  positions: Position[];
}

export interface BalanceSnapshot {
  type: "balance-snapshot";
  source: UpdateSource;
  balances: Balance[];
}

export interface FundingUpdate {
  type: "funding";
  source: UpdateSource;
  tradingPair: string;
  timestamp: number;
  fundingRate: number;
  payment: number;
}

export interface InstrumentSnapshot {
  type: "instrument-snapshot";
  source: UpdateSource;
  instruments: Instrument[];
}

export type CanonicalUpdate =
  | OrderStatusUpdate
  | FillUpdate
  | PositionSnapshot
  | BalanceSnapshot
  | FundingUpdate
  | InstrumentSnapshot;

/**
 * A payload item that could not be normalized
 */
export interface NormalizationFailure {
  kind: RawMessageKind;
  source: UpdateSource;
  reason: string;

  /** True when the exchange returned an error envelope */
  isExchangeError: boolean;
}

export interface NormalizationResult {
  updates: CanonicalUpdate[];
  failures: NormalizationFailure[];
}
