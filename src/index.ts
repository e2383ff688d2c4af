/**
 * Perpetual state reconciler
 *
 * Keeps orders, fills, balances, positions and funding payments consistent
 * with an exchange that reports them through a push stream and REST polling.
 */

export { PerpetualConnector } from "./core/connector";
export type { ConnectorDeps, ConnectorMetrics } from "./core/connector";
export { OrderRegistry } from "./core/order-registry";
export type {
  NewOrder,
  FillOutcome,
  StatusUpdateOutcome,
  OrderRegistryOptions,
  OrderRegistryMetrics,
} from "./core/order-registry";
export { PositionLedger } from "./core/position-ledger";
export type { PositionLedgerMetrics, SnapshotDiff } from "./core/position-ledger";
export { ReconciliationEngine } from "./core/reconciliation-engine";
export type {
  ReconciliationReport,
  ReconciliationMetrics,
} from "./core/reconciliation-engine";
export { OrderExecutor } from "./core/order-executor";
export type { PlaceOrderParams } from "./core/order-executor";
export { PollScheduler } from "./core/poll-scheduler";
export type { CycleName, CycleSummary } from "./core/poll-scheduler";
export { StreamListener, accountChannels } from "./core/stream-listener";
export type { StreamListenerState } from "./core/stream-listener";
export { createClientOrderId } from "./core/client-order-id";

export { EventNormalizer } from "./normalization/event-normalizer";

export { ExchangeHttpClient, classifyTransportError } from "./services/exchange-http-client";
export { WsEventStream } from "./services/ws-event-stream";
export { StaticSymbolMapper } from "./services/symbol-mapper";
export type {
  ExchangeTransport,
  PushEventStream,
  StreamMessage,
  SymbolMapper,
  TransportResult,
  SubmitOrderParams,
  SubmitOrderAck,
  OrderRef,
} from "./services/interfaces";

export { loadConfig, DEFAULT_RECONCILER_CONFIG } from "./config";
export type { ReconcilerConfig } from "./config";

export * from "./errors/app.errors";
export * from "./models";
export { ConsoleLogger, createNullLogger } from "./utils/logger.util";
export type { Logger, LogLevel } from "./utils/logger.util";
