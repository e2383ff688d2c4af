/**
 * Order Model - Locally tracked derivative orders and the fills applied to them
 *
 * An order is created locally in PENDING_CREATE and only moves forward:
 * PENDING_CREATE → OPEN → [PARTIALLY_FILLED] → FILLED | CANCELED | FAILED
 */

/**
 * Order side - whether buying or selling
 */
export type OrderSide = "BUY" | "SELL";

/**
 * Order type accepted by the exchange
 */
export type OrderType = "LIMIT" | "LIMIT_MAKER" | "MARKET";

/**
 * Lifecycle state of a tracked order
 */
export type OrderState =
  | "PENDING_CREATE" // Submitted locally, no exchange acknowledgment yet
  | "OPEN" // Resting on the book
  | "PARTIALLY_FILLED" // Some fills applied, remainder resting
  | "FILLED"
  | "CANCELED"
  | "FAILED";

const STATE_RANK: Record<OrderState, number> = {
  PENDING_CREATE: 0,
  OPEN: 1,
  PARTIALLY_FILLED: 2,
  FILLED: 3,
  CANCELED: 3,
  FAILED: 3,
};

export function isTerminalState(state: OrderState): boolean {
  return STATE_RANK[state] === 3;
}

/**
 * Whether moving from `current` to `next` goes forward in the lifecycle.
 * Terminal states never change once reached.
 */
export function isForwardTransition(
  current: OrderState,
  next: OrderState,
): boolean {
  if (isTerminalState(current)) return false;
  return STATE_RANK[next] > STATE_RANK[current];
}

/**
 * Fee charged on a fill
 */
export interface TradeFee {
  amount: number;
  asset: string;
}

/**
 * A tracked order owned by the order registry
 */
export interface TrackedOrder {
  clientOrderId: string;
  exchangeOrderId?: string;
  tradingPair: string;
  side: OrderSide;
  orderType: OrderType;
  price: number;
  amount: number;
  state: OrderState;

  /** Local creation time (ms) */
  createdAt: number;

  /** Exchange timestamp (ms) of the last applied observation, 0 before the first */
  lastUpdateTimestamp: number;

  filledAmount: number;
  filledQuoteAmount: number;
  averageFillPrice: number;

  /** Fees paid per asset */
  fees: Record<string, number>;

  /** Trade ids already applied to this order */
  tradeIds: Set<string>;
}

/**
 * Parameters for placing an order
 */
export interface OrderRequest {
  tradingPair: string;
  side: OrderSide;
  orderType: OrderType;
  amount: number;
  /** Required for LIMIT and LIMIT_MAKER */
  price?: number;
}

/**
 * Copy an order so callers never hold a reference into the registry
 */
export function cloneOrder(order: TrackedOrder): TrackedOrder {
  return {
    ...order,
    fees: { ...order.fees },
    tradeIds: new Set(order.tradeIds),
  };
}
