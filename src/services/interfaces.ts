/**
 * Service Interfaces
 *
 * Contracts for the collaborators the reconciler consumes. Transport,
 * symbol resolution and the push stream live outside the reconciliation
 * core; only their boundaries are defined here.
 *
 * Key services:
 * - ExchangeTransport: order placement and REST snapshots
 * - SymbolMapper: exchange symbol ↔ canonical trading pair
 * - PushEventStream: raw account events tagged by channel
 */

import type { TransportError } from "../errors/app.errors";
import type { OrderSide, OrderType } from "../models/order";

// ═══════════════════════════════════════════════════════════════════════════
// Exchange Transport
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Result of a transport call: a payload or a classified error envelope
 */
export type TransportResult<T> =
  | { success: true; data: T }
  | { success: false; error: TransportError };

/**
 * Order submission parameters
 */
export interface SubmitOrderParams {
  clientOrderId: string;
  tradingPair: string;
  side: OrderSide;
  orderType: OrderType;
  amount: number;
  price?: number;
}

/**
 * Exchange acknowledgment of a new order
 */
export interface SubmitOrderAck {
  exchangeOrderId: string;

  /** Exchange acceptance time (ms) */
  acceptedTimestamp: number;
}

/**
 * Identifies an order on the exchange
 */
export interface OrderRef {
  clientOrderId: string;
  exchangeOrderId: string;
  tradingPair: string;
}

/**
 * Interface for the HTTP transport. Fetch methods return raw payloads in
 * exchange format; the event normalizer decodes them.
 */
export interface ExchangeTransport {
  submitOrder(params: SubmitOrderParams): Promise<TransportResult<SubmitOrderAck>>;

  /** Resolves to true when the exchange confirms the cancellation */
  cancelOrder(ref: OrderRef): Promise<TransportResult<boolean>>;

  fetchOrderStatus(ref: OrderRef): Promise<TransportResult<unknown>>;

  /** Recent fills for the account */
  fetchTradeHistory(): Promise<TransportResult<unknown>>;

  fetchBalances(): Promise<TransportResult<unknown>>;

  fetchPositions(): Promise<TransportResult<unknown>>;

  /** Funding settlements for a trading pair since `sinceMs` */
  fetchFundingHistory(
    tradingPair: string,
    sinceMs: number,
  ): Promise<TransportResult<unknown>>;

  /** Instrument metadata (tick size, step size, minimum amount) */
  fetchInstruments(): Promise<TransportResult<unknown>>;
}

// ═══════════════════════════════════════════════════════════════════════════
// Symbol Mapping
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Bidirectional symbol lookup. Fails closed: returns undefined instead of
 * guessing.
 */
export interface SymbolMapper {
  toCanonicalPair(exchangeSymbol: string): string | undefined;
  toExchangeSymbol(tradingPair: string): string | undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// Push Stream
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Raw account event tagged by channel name
 */
export interface StreamMessage {
  channel: string;
  data: unknown;
}

/**
 * Source of raw account events. Each subscription yields messages until the
 * signal aborts or the underlying connection ends; a thrown error is treated
 * as transient by the stream listener.
 */
export interface PushEventStream {
  subscribe(signal: AbortSignal): AsyncIterable<StreamMessage>;
}
