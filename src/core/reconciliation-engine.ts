/**
 * ReconciliationEngine - Merges normalized updates from both channels
 *
 * The push stream and the poll loop feed the same entry points. Each payload
 * is normalized once, then every canonical update is routed by `type` to the
 * order registry or the ledger inside its own try/catch, so a bad update
 * never aborts the rest of its batch.
 *
 * Fill attribution order:
 *   1. exchange order id index over active orders
 *   2. linear scan over active orders (repairs the index)
 *   3. completed-order history (late fills)
 *   4. the client order id label, when the exchange echoes it
 * A fill with no owner is logged and counted as unattributable.
 */

import { asError } from "../errors/app.errors";
import type {
  CanonicalUpdate,
  FillUpdate,
  NormalizationFailure,
  OrderStatusUpdate,
  RawPayload,
} from "../models/updates";
import type { EventNormalizer } from "../normalization/event-normalizer";
import type { Logger } from "../utils/logger.util";
import type { OrderRegistry } from "./order-registry";
import type { PositionLedger } from "./position-ledger";

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome counts for one batch of updates
 */
export interface ReconciliationReport {
  applied: number;
  duplicates: number;
  /** Older than, or after, what the registry already holds */
  stale: number;
  unattributed: number;
  /** Overfills, trading pair mismatches and snapshots pushed by the stream */
  anomalies: number;
  /** Normalization failures plus updates that threw while applying */
  failures: number;
}

export interface ReconciliationMetrics extends ReconciliationReport {
  payloadsProcessed: number;
  exchangeErrors: number;
}

type UpdateOutcome = Exclude<keyof ReconciliationReport, "failures">;

function emptyReport(): ReconciliationReport {
  return {
    applied: 0,
    duplicates: 0,
    stale: 0,
    unattributed: 0,
    anomalies: 0,
    failures: 0,
  };
}

// ============================================================================
// ReconciliationEngine Implementation
// ============================================================================

export class ReconciliationEngine {
  private readonly totals = emptyReport();
  private payloadsProcessed = 0;
  private exchangeErrors = 0;

  constructor(
    private readonly normalizer: EventNormalizer,
    private readonly registry: OrderRegistry,
    private readonly ledger: PositionLedger,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  onStreamEvent(raw: Omit<RawPayload, "source">): ReconciliationReport {
    return this.process({ ...raw, source: "stream" });
  }

  onPollSnapshot(raw: Omit<RawPayload, "source">): ReconciliationReport {
    return this.process({ ...raw, source: "poll" });
  }

  /**
   * Apply already-normalized updates. Each update succeeds or fails alone.
   */
  applyUpdates(updates: CanonicalUpdate[]): ReconciliationReport {
    const report = emptyReport();

    for (const update of updates) {
      try {
        report[this.applyOne(update)]++;
      } catch (err) {
        report.failures++;
        this.logger.error(
          `[Reconciler] Failed to apply ${update.type} update from ${update.source}`,
          asError(err),
        );
      }
    }

    this.accumulate(report);
    return report;
  }

  /**
   * Record a cancellation learned from a REST response: a confirmed cancel,
   * or an order the exchange no longer knows. Applied at local time, never
   * earlier than the last observation.
   */
  applyCancellation(
    clientOrderId: string,
    reason: "confirmed" | "not-found",
  ): boolean {
    const order = this.registry.get(clientOrderId);
    if (!order || !this.registry.isActive(clientOrderId)) return false;

    if (reason === "not-found") {
      this.logger.info(
        `[Reconciler] ${clientOrderId} not found on exchange, treating as cancelled`,
      );
    }
    const outcome = this.registry.applyStatusUpdate({
      type: "order-status",
      source: "poll",
      clientOrderId,
      exchangeOrderId: order.exchangeOrderId,
      tradingPair: order.tradingPair,
      state: "CANCELED",
      timestamp: Math.max(this.now(), order.lastUpdateTimestamp),
    });
    return outcome === "applied";
  }

  getMetrics(): ReconciliationMetrics {
    return {
      ...this.totals,
      payloadsProcessed: this.payloadsProcessed,
      exchangeErrors: this.exchangeErrors,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private
  // ═══════════════════════════════════════════════════════════════════════════

  private process(raw: RawPayload): ReconciliationReport {
    this.payloadsProcessed++;
    const { updates, failures } = this.normalizer.normalize(raw);
    for (const failure of failures) {
      this.logFailure(failure);
    }

    const report = this.applyUpdates(updates);
    report.failures += failures.length;
    this.totals.failures += failures.length;
    return report;
  }

  private logFailure(failure: NormalizationFailure): void {
    if (failure.isExchangeError) {
      this.exchangeErrors++;
      this.logger.warn(
        `[Reconciler] Exchange error in ${failure.kind} ${failure.source} payload: ${failure.reason}`,
      );
      return;
    }
    this.logger.warn(
      `[Reconciler] Skipped malformed ${failure.kind} from ${failure.source}: ${failure.reason}`,
    );
  }

  private applyOne(update: CanonicalUpdate): UpdateOutcome {
    switch (update.type) {
      case "order-status":
        return this.applyStatus(update);
      case "fill":
        return this.applyFill(update);
      case "position-snapshot":
        if (update.source === "stream") return this.rejectStreamSnapshot(update.type);
        this.ledger.applyPositionSnapshot(update.positions, this.now());
        return "applied";
      case "balance-snapshot":
        if (update.source === "stream") return this.rejectStreamSnapshot(update.type);
        this.ledger.applyBalanceSnapshot(update.balances, this.now());
        return "applied";
      case "instrument-snapshot":
        this.ledger.applyInstrumentSnapshot(update.instruments);
        return "applied";
      case "funding":
        return this.ledger.applyFundingUpdate(update) ? "applied" : "stale";
    }
  }

  /** Snapshots replace the whole ledger, so only the authoritative poll may send them */
  private rejectStreamSnapshot(type: "position-snapshot" | "balance-snapshot"): UpdateOutcome {
    this.logger.warn(`[Reconciler] Ignoring ${type} from stream, snapshots come from polling`);
    return "anomalies";
  }

  private applyStatus(update: OrderStatusUpdate): UpdateOutcome {
    const clientOrderId = this.resolveStatusOwner(update);
    if (clientOrderId === undefined) {
      this.logger.debug(
        `[Reconciler] Status ${update.state} for untracked order ${update.clientOrderId ?? update.exchangeOrderId ?? "?"}`,
      );
      return "unattributed";
    }

    const outcome = this.registry.applyStatusUpdate({ ...update, clientOrderId });
    switch (outcome) {
      case "applied":
      case "refreshed":
        return "applied";
      case "stale":
      case "completed":
        return "stale";
      case "unknown-order":
        return "unattributed";
    }
  }

  private resolveStatusOwner(update: OrderStatusUpdate): string | undefined {
    if (
      update.clientOrderId !== undefined &&
      this.registry.get(update.clientOrderId) !== undefined
    ) {
      return update.clientOrderId;
    }
    if (update.exchangeOrderId === undefined) return undefined;
    return (
      this.registry.lookupActiveByExchangeId(update.exchangeOrderId) ??
      this.registry.scanActiveByExchangeId(update.exchangeOrderId)[0] ??
      this.registry.lookupCompletedByExchangeId(update.exchangeOrderId)
    );
  }

  private applyFill(fill: FillUpdate): UpdateOutcome {
    if (this.ledger.hasFill(fill.tradeId)) {
      this.logger.debug(
        `[Reconciler] Trade ${fill.tradeId} from ${fill.source} already applied`,
      );
      return "duplicates";
    }

    const owner = this.resolveFillOwner(fill);
    if (owner === undefined) {
      const message = `[Reconciler] Unattributable fill ${fill.tradeId} (order ${fill.exchangeOrderId}, ${fill.tradingPair}) from ${fill.source}, dropping`;
      // Trade history returns every account fill, so old-session trades reappear each cycle
      if (fill.source === "poll") {
        this.logger.debug(message);
      } else {
        this.logger.warn(message);
      }
      return "unattributed";
    }

    const ownerPair = this.registry.tradingPairOf(owner);
    if (ownerPair !== fill.tradingPair) {
      this.logger.warn(
        `[Reconciler] Pair mismatch on trade ${fill.tradeId}: fill is ${fill.tradingPair}, ${owner} is ${ownerPair ?? "?"}, dropping`,
      );
      return "anomalies";
    }

    const outcome = this.registry.applyFill(owner, fill);
    switch (outcome) {
      case "applied":
        this.ledger.recordFill({
          tradeId: fill.tradeId,
          clientOrderId: owner,
          exchangeOrderId: fill.exchangeOrderId,
          tradingPair: fill.tradingPair,
          fillPrice: fill.fillPrice,
          fillBaseAmount: fill.fillBaseAmount,
          fillQuoteAmount: fill.fillQuoteAmount,
          fee: fill.fee,
          fillTimestamp: fill.fillTimestamp,
        });
        return "applied";
      case "duplicate":
        return "duplicates";
      case "overfill":
        return "anomalies";
      case "unknown-order":
        return "unattributed";
    }
  }

  private resolveFillOwner(fill: FillUpdate): string | undefined {
    const indexed = this.registry.lookupActiveByExchangeId(fill.exchangeOrderId);
    if (indexed !== undefined) return indexed;

    const scanned = this.registry.scanActiveByExchangeId(fill.exchangeOrderId);
    if (scanned.length > 1) {
      this.logger.warn(
        `[Reconciler] Exchange id ${fill.exchangeOrderId} matches ${scanned.length} active orders (${scanned.join(", ")}), using the first`,
      );
    }
    const [first] = scanned;
    if (first !== undefined) return first;

    const completed = this.registry.lookupCompletedByExchangeId(fill.exchangeOrderId);
    if (completed !== undefined) return completed;

    if (
      fill.clientOrderId !== undefined &&
      this.registry.get(fill.clientOrderId) !== undefined
    ) {
      return fill.clientOrderId;
    }
    return undefined;
  }

  private accumulate(report: ReconciliationReport): void {
    this.totals.applied += report.applied;
    this.totals.duplicates += report.duplicates;
    this.totals.stale += report.stale;
    this.totals.unattributed += report.unattributed;
    this.totals.anomalies += report.anomalies;
    this.totals.failures += report.failures;
  }
}
