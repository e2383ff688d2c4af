/**
 * In-process stand-ins for the exchange collaborators, plus builders for
 * raw payloads and canonical updates used across the test suite.
 */

import { OrderRegistry, type OrderRegistryOptions } from "../../src/core/order-registry";
import { PositionLedger, type PositionLedgerOptions } from "../../src/core/position-ledger";
import { ReconciliationEngine } from "../../src/core/reconciliation-engine";
import { TransportError, type TransportErrorKind } from "../../src/errors/app.errors";
import type { FillUpdate } from "../../src/models/updates";
import { EventNormalizer } from "../../src/normalization/event-normalizer";
import type {
  ExchangeTransport,
  OrderRef,
  PushEventStream,
  StreamMessage,
  SubmitOrderAck,
  SubmitOrderParams,
  TransportResult,
} from "../../src/services/interfaces";
import { StaticSymbolMapper } from "../../src/services/symbol-mapper";
import type { LogLevel, Logger } from "../../src/utils/logger.util";

export const TEST_PAIRS = ["ETH-USDC", "BTC-USDC"];
export const FIXED_NOW = 1_700_000_000_000;

export function createSymbols(): StaticSymbolMapper {
  return StaticSymbolMapper.forPerpetuals(TEST_PAIRS);
}

// ============================================================================
// Logger
// ============================================================================

export interface LogEntry {
  level: LogLevel;
  msg: string;
  err?: Error;
}

export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  info = (msg: string): void => {
    this.entries.push({ level: "info", msg });
  };
  warn = (msg: string): void => {
    this.entries.push({ level: "warn", msg });
  };
  error = (msg: string, err?: Error): void => {
    this.entries.push({ level: "error", msg, err });
  };
  debug = (msg: string): void => {
    this.entries.push({ level: "debug", msg });
  };

  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.msg);
  }
}

// ============================================================================
// Transport
// ============================================================================

export function ok<T>(data: T): TransportResult<T> {
  return { success: true, data };
}

export function fail(kind: TransportErrorKind, message: string = kind): TransportResult<never> {
  return { success: false, error: new TransportError(message, kind) };
}

export interface TransportCall {
  method: keyof ExchangeTransport;
  args: unknown[];
}

/**
 * Scriptable transport. Each handler can be replaced per test; every call is
 * recorded in `calls`.
 */
export class FakeTransport implements ExchangeTransport {
  readonly calls: TransportCall[] = [];

  onSubmit: (params: SubmitOrderParams) => TransportResult<SubmitOrderAck> = () =>
    ok({ exchangeOrderId: "ex-1", acceptedTimestamp: 1_000 });
  onCancel: (ref: OrderRef) => TransportResult<boolean> = () => ok(true);
  onOrderStatus: (ref: OrderRef) => TransportResult<unknown> = () =>
    ok({ result: { orders: [] } });
  onTradeHistory: () => TransportResult<unknown> = () => ok({ result: { trades: [] } });
  onBalances: () => TransportResult<unknown> = () => ok({ result: { collaterals: [] } });
  onPositions: () => TransportResult<unknown> = () => ok({ result: { positions: [] } });
  onFunding: (tradingPair: string, sinceMs: number) => TransportResult<unknown> = () =>
    ok({ result: { events: [] } });
  onInstruments: () => TransportResult<unknown> = () => ok({ result: { instruments: [] } });

  async submitOrder(params: SubmitOrderParams): Promise<TransportResult<SubmitOrderAck>> {
    this.calls.push({ method: "submitOrder", args: [params] });
    return this.onSubmit(params);
  }

  async cancelOrder(ref: OrderRef): Promise<TransportResult<boolean>> {
    this.calls.push({ method: "cancelOrder", args: [ref] });
    return this.onCancel(ref);
  }

  async fetchOrderStatus(ref: OrderRef): Promise<TransportResult<unknown>> {
    this.calls.push({ method: "fetchOrderStatus", args: [ref] });
    return this.onOrderStatus(ref);
  }

  async fetchTradeHistory(): Promise<TransportResult<unknown>> {
    this.calls.push({ method: "fetchTradeHistory", args: [] });
    return this.onTradeHistory();
  }

  async fetchBalances(): Promise<TransportResult<unknown>> {
    this.calls.push({ method: "fetchBalances", args: [] });
    return this.onBalances();
  }

  async fetchPositions(): Promise<TransportResult<unknown>> {
    this.calls.push({ method: "fetchPositions", args: [] });
    return this.onPositions();
  }

  async fetchFundingHistory(
    tradingPair: string,
    sinceMs: number,
  ): Promise<TransportResult<unknown>> {
    this.calls.push({ method: "fetchFundingHistory", args: [tradingPair, sinceMs] });
    return this.onFunding(tradingPair, sinceMs);
  }

  async fetchInstruments(): Promise<TransportResult<unknown>> {
    this.calls.push({ method: "fetchInstruments", args: [] });
    return this.onInstruments();
  }

  callsTo(method: keyof ExchangeTransport): TransportCall[] {
    return this.calls.filter((call) => call.method === method);
  }
}

// ============================================================================
// Push stream
// ============================================================================

/**
 * Push stream driven by the test: each subscription replays the next script
 * entry, then either ends, throws, or waits for the abort signal.
 */
export type SubscriptionScript = {
  messages: StreamMessage[];
  then: "end" | "throw" | "hold";
};

export class ScriptedPushStream implements PushEventStream {
  subscriptions = 0;

  constructor(private readonly scripts: SubscriptionScript[]) {}

  async *subscribe(signal: AbortSignal): AsyncGenerator<StreamMessage> {
    const script = this.scripts[this.subscriptions] ?? { messages: [], then: "hold" };
    this.subscriptions++;

    for (const message of script.messages) {
      yield message;
    }
    if (script.then === "throw") {
      throw new Error("connection reset");
    }
    if (script.then === "hold") {
      await new Promise<void>((resolve) => {
        if (signal.aborted) resolve();
        else signal.addEventListener("abort", () => resolve(), { once: true });
      });
    }
  }
}

// ============================================================================
// Reconciler wiring
// ============================================================================

export function createReconciler(
  options: {
    logger?: Logger;
    now?: () => number;
    registry?: OrderRegistryOptions;
    ledger?: PositionLedgerOptions;
  } = {},
): {
  logger: Logger;
  registry: OrderRegistry;
  ledger: PositionLedger;
  normalizer: EventNormalizer;
  engine: ReconciliationEngine;
} {
  const logger = options.logger ?? new RecordingLogger();
  const now = options.now ?? (() => FIXED_NOW);
  const registry = new OrderRegistry(logger, options.registry);
  const ledger = new PositionLedger(logger, options.ledger);
  const normalizer = new EventNormalizer(createSymbols(), logger, now);
  const engine = new ReconciliationEngine(normalizer, registry, ledger, logger, now);
  return { logger, registry, ledger, normalizer, engine };
}

/** Register an order and bind it to an exchange id in OPEN */
export function openOrder(
  registry: OrderRegistry,
  clientOrderId: string,
  exchangeOrderId: string,
  overrides: { tradingPair?: string; amount?: number; price?: number; timestamp?: number } = {},
): void {
  const tradingPair = overrides.tradingPair ?? "ETH-USDC";
  registry.register({
    clientOrderId,
    tradingPair,
    side: "BUY",
    orderType: "LIMIT",
    price: overrides.price ?? 2000,
    amount: overrides.amount ?? 1,
    createdAt: FIXED_NOW,
  });
  registry.applyStatusUpdate({
    type: "order-status",
    source: "poll",
    clientOrderId,
    exchangeOrderId,
    tradingPair,
    state: "OPEN",
    timestamp: overrides.timestamp ?? 1_000,
  });
}

// ============================================================================
// Payload builders
// ============================================================================

export function fillUpdate(overrides: Partial<FillUpdate> = {}): FillUpdate {
  return {
    type: "fill",
    source: "stream",
    tradeId: "t-1",
    exchangeOrderId: "ex-1",
    tradingPair: "ETH-USDC",
    fillPrice: 2000,
    fillBaseAmount: 0.5,
    fillQuoteAmount: 1000,
    fee: { amount: 0.25, asset: "USDC" },
    fillTimestamp: 2_000,
    ...overrides,
  };
}

export function rawTrade(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    trade_id: "t-1",
    order_id: "ex-1",
    instrument_name: "ETH-PERP",
    trade_price: "2000",
    trade_amount: "0.5",
    trade_fee: "0.25",
    timestamp: 2_000,
    ...overrides,
  };
}

export function rawOrder(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    label: "c-1",
    order_id: "ex-1",
    instrument_name: "ETH-PERP",
    order_status: "open",
    last_update_timestamp: 1_500,
    ...overrides,
  };
}
