import type { OrderState } from "../models/order";

/**
 * Exchange order status → local lifecycle state.
 * The exchange has no partial status; partial fills are reported as "open".
 */
export const EXCHANGE_ORDER_STATE: Readonly<Record<string, OrderState>> = {
  open: "OPEN",
  untriggered: "OPEN",
  filled: "FILLED",
  cancelled: "CANCELED",
  expired: "CANCELED",
  rejected: "FAILED",
};

/**
 * Per-subaccount push channels. Full channel name is `${subaccountId}.${suffix}`.
 */
export const USER_CHANNELS = {
  ORDERS: "orders",
  TRADES: "trades",
} as const;

/**
 * Error messages the exchange uses for an order it no longer knows
 */
export const ORDER_NOT_FOUND_MESSAGES = [
  "does not exist",
  "not found",
  "unknown order",
] as const;

/** Funding settles hourly */
export const FUNDING_PERIOD_MS = 60 * 60 * 1000;

/**
 * Start of the window queried for funding history: one full period before
 * the current one, so the latest settlement is always included.
 */
export function lastFundingWindowStart(nowMs: number): number {
  return (Math.floor(nowMs / FUNDING_PERIOD_MS) - 1) * FUNDING_PERIOD_MS;
}

/**
 * REST endpoints (POST, JSON body)
 */
export const REST_PATHS = {
  SUBMIT_ORDER: "/private/order",
  CANCEL_ORDER: "/private/cancel",
  GET_ORDER: "/private/get_order",
  TRADE_HISTORY: "/private/get_trade_history",
  COLLATERALS: "/private/get_collaterals",
  POSITIONS: "/private/get_positions",
  FUNDING_HISTORY: "/private/get_funding_history",
  INSTRUMENTS: "/public/get_instruments",
} as const;

export function isOrderNotFoundMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return ORDER_NOT_FOUND_MESSAGES.some((fragment) => lower.includes(fragment));
}
