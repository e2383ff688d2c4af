/**
 * Models Index - Re-exports all domain model types
 *
 * - Order: tracked orders, lifecycle states, fees
 * - Position: positions, balances, funding, instruments
 * - Updates: canonical update records and raw payload tags
 */

export type {
  OrderSide,
  OrderType,
  OrderState,
  TradeFee,
  TrackedOrder,
  OrderRequest,
} from "./order";
export { isTerminalState, isForwardTransition, cloneOrder } from "./order";

export type {
  PositionSide,
  Position,
  Balance,
  FundingPayment,
  Instrument,
} from "./position";
export { NO_FUNDING_PAYMENT, isNoFundingPayment, positionKey } from "./position";

export type {
  UpdateSource,
  RawMessageKind,
  RawPayload,
  OrderStatusUpdate,
  FillUpdate,
  PositionSnapshot,
  BalanceSnapshot,
  FundingUpdate,
  InstrumentSnapshot,
  CanonicalUpdate,
  NormalizationFailure,
  NormalizationResult,
} from "./updates";
