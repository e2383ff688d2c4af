/**
 * PerpetualConnector - Strategy-facing facade over the reconciliation core
 *
 * Wires the registry, ledger, normalizer, engine, executor, poll scheduler
 * and stream listener from a ReconcilerConfig and the transport
 * collaborators. Strategies read state through copies and never touch the
 * components directly.
 */

import type { ReconcilerConfig } from "../config/schema";
import type { OrderSide, OrderState, TrackedOrder } from "../models/order";
import type {
  Balance,
  FundingPayment,
  Instrument,
  Position,
} from "../models/position";
import type { FillUpdate, RawPayload } from "../models/updates";
import { EventNormalizer } from "../normalization/event-normalizer";
import { ExchangeHttpClient } from "../services/exchange-http-client";
import type {
  ExchangeTransport,
  PushEventStream,
  SymbolMapper,
} from "../services/interfaces";
import { StaticSymbolMapper } from "../services/symbol-mapper";
import { WsEventStream } from "../services/ws-event-stream";
import { ConsoleLogger, type Logger } from "../utils/logger.util";
import { OrderExecutor, type PlaceOrderParams } from "./order-executor";
import { OrderRegistry, type OrderRegistryMetrics } from "./order-registry";
import { PollScheduler, type PollSchedulerMetrics } from "./poll-scheduler";
import { PositionLedger, type PositionLedgerMetrics } from "./position-ledger";
import {
  ReconciliationEngine,
  type ReconciliationMetrics,
  type ReconciliationReport,
} from "./reconciliation-engine";
import {
  StreamListener,
  accountChannels,
  type StreamListenerMetrics,
} from "./stream-listener";

export type ConnectorDeps = {
  config: ReconcilerConfig;
  transport: ExchangeTransport;
  symbols: SymbolMapper;
  /** Without a push stream the connector runs on polling alone */
  stream?: PushEventStream;
  logger?: Logger;
  now?: () => number;
  generateClientOrderId?: (side: OrderSide, tradingPair: string) => string;
  onOrderStateChange?: (order: TrackedOrder, previous: OrderState) => void;
  onOrderFill?: (order: TrackedOrder, fill: FillUpdate) => void;
  onFundingPayment?: (payment: FundingPayment) => void;
};

export interface ConnectorMetrics {
  registry: OrderRegistryMetrics;
  ledger: PositionLedgerMetrics;
  reconciliation: ReconciliationMetrics;
  scheduler: PollSchedulerMetrics;
  stream?: StreamListenerMetrics;
}

export class PerpetualConnector {
  private readonly logger: Logger;
  private readonly registry: OrderRegistry;
  private readonly ledger: PositionLedger;
  private readonly engine: ReconciliationEngine;
  private readonly executor: OrderExecutor;
  private readonly scheduler: PollScheduler;
  private readonly listener?: StreamListener;
  private started = false;

  constructor(deps: ConnectorDeps) {
    const { config } = deps;
    const now = deps.now ?? Date.now;
    this.logger = deps.logger ?? new ConsoleLogger(config.logLevel);

    this.registry = new OrderRegistry(this.logger, {
      fillEpsilon: config.orders.fillEpsilon,
      completedOrderHistorySize: config.orders.completedOrderHistorySize,
      onStateChange: deps.onOrderStateChange,
      onFill: deps.onOrderFill,
    });
    this.ledger = new PositionLedger(this.logger, {
      fillHistorySize: config.orders.fillHistorySize,
      onFundingPayment: deps.onFundingPayment,
    });
    this.engine = new ReconciliationEngine(
      new EventNormalizer(deps.symbols, this.logger, now),
      this.registry,
      this.ledger,
      this.logger,
      now,
    );
    this.executor = new OrderExecutor(
      deps.transport,
      deps.symbols,
      this.registry,
      this.engine,
      this.logger,
      {
        brokerId: config.orders.brokerId,
        maxOrderIdLength: config.orders.maxOrderIdLength,
        now,
        generateClientOrderId: deps.generateClientOrderId,
      },
    );
    this.scheduler = new PollScheduler({
      transport: deps.transport,
      registry: this.registry,
      engine: this.engine,
      logger: this.logger,
      polling: config.polling,
      tradingPairs: config.exchange.tradingPairs,
      now,
    });
    if (deps.stream) {
      this.listener = new StreamListener(deps.stream, this.engine, this.logger, {
        subaccountId: config.exchange.subaccountId,
        retryBaseMs: config.stream.retryBaseMs,
        retryMaxMs: config.stream.retryMaxMs,
        now,
      });
    }
  }

  /**
   * Build a connector on the bundled axios and ws transports.
   */
  static fromConfig(
    config: ReconcilerConfig,
    options: {
      logger?: Logger;
      authHeaders?: () => Record<string, string>;
      handshake?: () => unknown[];
    } = {},
  ): PerpetualConnector {
    const logger = options.logger ?? new ConsoleLogger(config.logLevel);
    const symbols = StaticSymbolMapper.forPerpetuals(config.exchange.tradingPairs);
    const transport = new ExchangeHttpClient({
      baseURL: config.exchange.restUrl,
      timeoutMs: config.exchange.requestTimeoutMs,
      subaccountId: config.exchange.subaccountId,
      symbols,
      logger,
      authHeaders: options.authHeaders,
    });
    const stream = new WsEventStream({
      url: config.exchange.wsUrl,
      channels: [...accountChannels(config.exchange.subaccountId).keys()],
      logger,
      handshake: options.handshake,
    });
    return new PerpetualConnector({ config, transport, symbols, stream, logger });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Lifecycle
  // ═══════════════════════════════════════════════════════════════════════════

  start(): void {
    if (this.started) return;
    this.started = true;
    this.logger.info(
      `[Connector] Starting (${this.listener ? "stream + polling" : "polling only"})`,
    );
    this.listener?.start();
    this.scheduler.start();
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    await Promise.all([this.scheduler.stop(), this.listener?.stop()]);
    this.logger.info("[Connector] Stopped");
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Orders
  // ═══════════════════════════════════════════════════════════════════════════

  placeOrder(params: PlaceOrderParams): Promise<TrackedOrder> {
    return this.executor.placeOrder(params);
  }

  cancelOrder(clientOrderId: string): Promise<boolean> {
    return this.executor.cancelOrder(clientOrderId);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Inbound events
  // ═══════════════════════════════════════════════════════════════════════════

  onStreamEvent(raw: Omit<RawPayload, "source">): ReconciliationReport {
    return this.engine.onStreamEvent(raw);
  }

  onPollSnapshot(raw: Omit<RawPayload, "source">): ReconciliationReport {
    return this.engine.onPollSnapshot(raw);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // State (copies)
  // ═══════════════════════════════════════════════════════════════════════════

  getActiveOrders(): TrackedOrder[] {
    return this.registry.getActiveOrders();
  }

  /** Active or recently completed order */
  getOrder(clientOrderId: string): TrackedOrder | undefined {
    return this.registry.get(clientOrderId);
  }

  getPositions(): Position[] {
    return this.ledger.getPositions();
  }

  getBalances(): Balance[] {
    return this.ledger.getBalances();
  }

  getLastFundingPayment(tradingPair: string): FundingPayment | undefined {
    return this.ledger.getLastFundingPayment(tradingPair);
  }

  getInstruments(): Instrument[] {
    return this.ledger.getInstruments();
  }

  getMetrics(): ConnectorMetrics {
    return {
      registry: this.registry.getMetrics(),
      ledger: this.ledger.getMetrics(),
      reconciliation: this.engine.getMetrics(),
      scheduler: this.scheduler.getMetrics(),
      stream: this.listener?.getMetrics(),
    };
  }
}
