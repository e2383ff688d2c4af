/**
 * Position Model - Account-level state owned by the position & balance ledger
 */

/**
 * Position side. One-way mode: at most one side per trading pair.
 */
export type PositionSide = "LONG" | "SHORT";

export interface Position {
  tradingPair: string;
  side: PositionSide;

  /** Signed amount, negative for SHORT */
  amount: number;

  entryPrice: number;
  markPrice: number;
  unrealizedPnl: number;
  leverage: number;
}

export interface Balance {
  asset: string;
  total: number;
  available: number;
}

/**
 * Most recent funding settlement for a trading pair
 */
export interface FundingPayment {
  tradingPair: string;
  timestamp: number;
  fundingRate: number;
  payment: number;
}

/**
 * Sentinel values reported when there was no payment.
 * Distinct from a real zero transfer so it is never reported twice.
 */
export const NO_FUNDING_PAYMENT = {
  timestamp: 0,
  fundingRate: -1,
  payment: -1,
} as const;

export function isNoFundingPayment(payment: FundingPayment): boolean {
  return (
    payment.timestamp === NO_FUNDING_PAYMENT.timestamp &&
    payment.fundingRate === NO_FUNDING_PAYMENT.fundingRate &&
    payment.payment === NO_FUNDING_PAYMENT.payment
  );
}

/**
 * Trading rule metadata for an instrument. Stored, not enforced.
 */
export interface Instrument {
  tradingPair: string;
  minOrderSize: number;
  tickSize: number;
  stepSize: number;
  isActive: boolean;
}

export function positionKey(tradingPair: string, side: PositionSide): string {
  return `${tradingPair}:${side}`;
}
