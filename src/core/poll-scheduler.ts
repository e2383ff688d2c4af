/**
 * PollScheduler - REST polling on three cadences
 *
 * - short: order status (per acknowledged order), trade history, balances, positions
 * - long: instrument metadata
 * - funding: last settlement per configured trading pair
 *
 * Fetches within a cycle are isolated with Promise.allSettled; a failed fetch
 * leaves the previous state untouched and is retried on the next cycle.
 * A cycle that is still running when its timer fires again is skipped.
 */

import { lastFundingWindowStart } from "../constants/exchange.constants";
import { asError, type TransportError } from "../errors/app.errors";
import type { PollingConfig } from "../config/schema";
import type { TrackedOrder } from "../models/order";
import type { RawMessageKind } from "../models/updates";
import type { ExchangeTransport, TransportResult } from "../services/interfaces";
import type { Logger } from "../utils/logger.util";
import { parallelBatch } from "../utils/parallel-utils";
import type { OrderRegistry } from "./order-registry";
import type { ReconciliationEngine } from "./reconciliation-engine";

export type CycleName = "short" | "long" | "funding";

export type PollSchedulerDeps = {
  transport: ExchangeTransport;
  registry: OrderRegistry;
  engine: ReconciliationEngine;
  logger: Logger;
  polling: PollingConfig;
  tradingPairs: string[];
  now?: () => number;
};

export interface CycleSummary {
  cycle: CycleName;
  /** True when the previous run of this cycle was still in flight */
  skipped: boolean;
  tasks: number;
  failedTasks: number;
  durationMs: number;
}

export interface PollSchedulerMetrics {
  running: boolean;
  cyclesRun: Record<CycleName, number>;
  cyclesSkipped: Record<CycleName, number>;
  failedFetches: number;
  implicitCancellations: number;
}

export class PollScheduler {
  private readonly deps: PollSchedulerDeps;
  private readonly now: () => number;
  private controller?: AbortController;
  private timers: NodeJS.Timeout[] = [];
  private readonly inFlight = new Map<CycleName, Promise<CycleSummary>>();

  private readonly cyclesRun: Record<CycleName, number> = { short: 0, long: 0, funding: 0 };
  private readonly cyclesSkipped: Record<CycleName, number> = { short: 0, long: 0, funding: 0 };
  private failedFetches = 0;
  private implicitCancellations = 0;

  constructor(deps: PollSchedulerDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Run every cycle once, then on its interval until stop().
   */
  start(): void {
    if (this.controller) return;
    this.controller = new AbortController();

    const { polling, logger } = this.deps;
    logger.info(
      `[PollScheduler] Starting (short ${polling.shortPollIntervalMs}ms, long ${polling.longPollIntervalMs}ms, funding ${polling.fundingPollIntervalMs}ms)`,
    );

    const schedule = (cycle: CycleName, intervalMs: number): void => {
      const tick = (): void => {
        void this.runCycle(cycle).catch((err: unknown) =>
          logger.error(`[PollScheduler] ${cycle} cycle crashed`, asError(err)),
        );
      };
      tick();
      this.timers.push(setInterval(tick, intervalMs));
    };

    schedule("short", polling.shortPollIntervalMs);
    schedule("long", polling.longPollIntervalMs);
    schedule("funding", polling.fundingPollIntervalMs);
  }

  /**
   * Stop the timers, abort in-flight work and wait for running cycles to settle.
   */
  async stop(): Promise<void> {
    if (!this.controller) return;
    this.controller.abort();
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
    await Promise.allSettled(this.inFlight.values());
    this.controller = undefined;
    this.deps.logger.info("[PollScheduler] Stopped");
  }

  isRunning(): boolean {
    return this.controller !== undefined;
  }

  runShortCycle(): Promise<CycleSummary> {
    return this.runCycle("short");
  }

  runLongCycle(): Promise<CycleSummary> {
    return this.runCycle("long");
  }

  runFundingCycle(): Promise<CycleSummary> {
    return this.runCycle("funding");
  }

  getMetrics(): PollSchedulerMetrics {
    return {
      running: this.isRunning(),
      cyclesRun: { ...this.cyclesRun },
      cyclesSkipped: { ...this.cyclesSkipped },
      failedFetches: this.failedFetches,
      implicitCancellations: this.implicitCancellations,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Cycles
  // ═══════════════════════════════════════════════════════════════════════════

  private runCycle(cycle: CycleName): Promise<CycleSummary> {
    if (this.inFlight.has(cycle)) {
      this.cyclesSkipped[cycle]++;
      this.deps.logger.debug(`[PollScheduler] ${cycle} cycle still running, skipping`);
      return Promise.resolve({ cycle, skipped: true, tasks: 0, failedTasks: 0, durationMs: 0 });
    }

    const run = this.executeCycle(cycle).finally(() => {
      this.inFlight.delete(cycle);
    });
    this.inFlight.set(cycle, run);
    return run;
  }

  private async executeCycle(cycle: CycleName): Promise<CycleSummary> {
    const startTime = this.now();
    const tasks = this.tasksFor(cycle);
    const results = await Promise.allSettled(tasks.map((task) => task()));

    let failedTasks = 0;
    for (const result of results) {
      if (result.status === "rejected") {
        failedTasks++;
        this.deps.logger.error(`[PollScheduler] ${cycle} task failed`, asError(result.reason));
      } else if (!result.value) {
        failedTasks++;
      }
    }

    this.cyclesRun[cycle]++;
    const durationMs = this.now() - startTime;
    this.deps.logger.debug(
      `[PollScheduler] ${cycle} cycle: ${tasks.length - failedTasks}/${tasks.length} tasks ok in ${durationMs}ms`,
    );
    return { cycle, skipped: false, tasks: tasks.length, failedTasks, durationMs };
  }

  /** Each task resolves to false when its fetch failed */
  private tasksFor(cycle: CycleName): Array<() => Promise<boolean>> {
    const { transport, registry, tradingPairs } = this.deps;

    switch (cycle) {
      case "short": {
        const fillable = registry.getFillableOrders();
        const tasks: Array<() => Promise<boolean>> = [];
        if (fillable.length > 0) {
          tasks.push(() => this.pollOrderStatuses(fillable));
          tasks.push(() =>
            this.fetchAndApply("trade history", "trade", () => transport.fetchTradeHistory()),
          );
        }
        tasks.push(() =>
          this.fetchAndApply("balances", "balance-snapshot", () => transport.fetchBalances()),
        );
        tasks.push(() =>
          this.fetchAndApply("positions", "position-snapshot", () => transport.fetchPositions()),
        );
        return tasks;
      }

      case "long":
        return [
          () =>
            this.fetchAndApply("instruments", "instrument-snapshot", () =>
              transport.fetchInstruments(),
            ),
        ];

      case "funding": {
        const since = lastFundingWindowStart(this.now());
        return tradingPairs.map(
          (pair) => () =>
            this.fetchAndApply(
              `funding ${pair}`,
              "funding-event",
              () => transport.fetchFundingHistory(pair, since),
              pair,
            ),
        );
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Fetch helpers
  // ═══════════════════════════════════════════════════════════════════════════

  private async pollOrderStatuses(orders: TrackedOrder[]): Promise<boolean> {
    const { settled, errorCount } = await parallelBatch(
      orders,
      (order) => this.pollOrderStatus(order),
      {
        concurrency: this.deps.polling.statusPollConcurrency,
        logger: this.deps.logger,
        label: "StatusPoll",
        signal: this.controller?.signal,
      },
    );
    return errorCount === 0 && settled.every((item) => item.success && item.result);
  }

  private async pollOrderStatus(order: TrackedOrder): Promise<boolean> {
    if (order.exchangeOrderId === undefined) return true;

    const result = await this.deps.transport.fetchOrderStatus({
      clientOrderId: order.clientOrderId,
      exchangeOrderId: order.exchangeOrderId,
      tradingPair: order.tradingPair,
    });

    if (!result.success && result.error.kind === "not-found") {
      if (this.deps.engine.applyCancellation(order.clientOrderId, "not-found")) {
        this.implicitCancellations++;
      }
      return true;
    }
    return this.apply(`status ${order.clientOrderId}`, "order-status", result);
  }

  private async fetchAndApply(
    what: string,
    kind: RawMessageKind,
    fetch: () => Promise<TransportResult<unknown>>,
    tradingPair?: string,
  ): Promise<boolean> {
    if (this.controller?.signal.aborted) return true;
    return this.apply(what, kind, await fetch(), tradingPair);
  }

  private apply(
    what: string,
    kind: RawMessageKind,
    result: TransportResult<unknown>,
    tradingPair?: string,
  ): boolean {
    if (!result.success) {
      this.handleTransportError(what, result.error);
      return false;
    }
    this.deps.engine.onPollSnapshot({
      kind,
      data: result.data,
      receivedAt: this.now(),
      tradingPair,
    });
    return true;
  }

  private handleTransportError(what: string, error: TransportError): void {
    this.failedFetches++;
    const { logger } = this.deps;
    switch (error.kind) {
      case "transient-network":
        logger.warn(`[PollScheduler] Fetching ${what} failed (${error.message}), retrying next cycle`);
        return;
      case "not-found":
        logger.warn(`[PollScheduler] Fetching ${what}: not found (${error.message})`);
        return;
      default:
        logger.error(`[PollScheduler] Fetching ${what} failed: ${error.message}`, error);
    }
  }
}
