/**
 * PositionLedger - Positions, balances, funding payments and fill bookkeeping
 *
 * Position, balance and instrument snapshots are authoritative and replace
 * local state wholesale: entries absent from the latest snapshot are removed,
 * never merged incrementally. A failed fetch never reaches this class, so the
 * last good snapshot stays in place.
 */

import {
  FillHistoryStore,
  type FillRecord,
} from "../infra/persistence/fill-history-store";
import {
  isNoFundingPayment,
  positionKey,
  type Balance,
  type FundingPayment,
  type Instrument,
  type Position,
} from "../models/position";
import type { FundingUpdate } from "../models/updates";
import type { Logger } from "../utils/logger.util";

export interface PositionLedgerOptions {
  fillHistorySize?: number;
  onFundingPayment?: (payment: FundingPayment) => void;
}

export interface SnapshotDiff {
  upserted: number;
  removed: string[];
}

export interface PositionLedgerMetrics {
  positions: number;
  balances: number;
  instruments: number;
  fillsRecorded: number;
  /** Fills pushed out of the trade-id dedup window */
  fillsEvicted: number;
  fundingPaymentsRecorded: number;
  positionSnapshotAt: number;
  balanceSnapshotAt: number;
}

export class PositionLedger {
  private positions = new Map<string, Position>();
  private balances = new Map<string, Balance>();
  private instruments = new Map<string, Instrument>();
  private readonly funding = new Map<string, FundingPayment>();
  private readonly fills: FillHistoryStore;

  /** Cumulative fees per asset, unaffected by fill-history eviction */
  private readonly feeTotals = new Map<string, number>();

  private readonly onFundingPayment?: (payment: FundingPayment) => void;

  private positionSnapshotAt = 0;
  private balanceSnapshotAt = 0;
  private fundingPaymentsRecorded = 0;

  constructor(
    private readonly logger: Logger,
    options: PositionLedgerOptions = {},
  ) {
    this.fills = new FillHistoryStore({
      maxEntries: options.fillHistorySize ?? 10_000,
    });
    this.onFundingPayment = options.onFundingPayment;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Snapshots
  // ═══════════════════════════════════════════════════════════════════════════

  applyPositionSnapshot(positions: Position[], now: number = Date.now()): SnapshotDiff {
    const next = new Map<string, Position>();
    for (const position of positions) {
      if (position.amount === 0) continue;
      next.set(positionKey(position.tradingPair, position.side), { ...position });
    }

    const removed = [...this.positions.keys()].filter((key) => !next.has(key));
    this.positions = next;
    this.positionSnapshotAt = now;

    if (removed.length > 0) {
      this.logger.info(`[Ledger] Positions closed: ${removed.join(", ")}`);
    }
    return { upserted: next.size, removed };
  }

  applyBalanceSnapshot(balances: Balance[], now: number = Date.now()): SnapshotDiff {
    const next = new Map<string, Balance>();
    for (const balance of balances) {
      next.set(balance.asset, { ...balance });
    }

    const removed = [...this.balances.keys()].filter((asset) => !next.has(asset));
    this.balances = next;
    this.balanceSnapshotAt = now;

    if (removed.length > 0) {
      this.logger.debug(`[Ledger] Balances removed: ${removed.join(", ")}`);
    }
    return { upserted: next.size, removed };
  }

  applyInstrumentSnapshot(instruments: Instrument[]): SnapshotDiff {
    const next = new Map<string, Instrument>();
    for (const instrument of instruments) {
      next.set(instrument.tradingPair, { ...instrument });
    }
    const removed = [...this.instruments.keys()].filter((pair) => !next.has(pair));
    this.instruments = next;
    return { upserted: next.size, removed };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Funding
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Record the latest funding settlement for a pair.
   * Returns true only for a real payment not seen before.
   */
  applyFundingUpdate(update: FundingUpdate): boolean {
    const payment: FundingPayment = {
      tradingPair: update.tradingPair,
      timestamp: update.timestamp,
      fundingRate: update.fundingRate,
      payment: update.payment,
    };

    if (isNoFundingPayment(payment)) {
      if (!this.funding.has(update.tradingPair)) {
        this.funding.set(update.tradingPair, payment);
      }
      return false;
    }

    const previous = this.funding.get(update.tradingPair);
    if (previous && previous.timestamp >= payment.timestamp) {
      return false;
    }

    this.funding.set(update.tradingPair, payment);
    this.fundingPaymentsRecorded++;
    this.logger.info(
      `[Ledger] Funding ${update.tradingPair}: payment ${payment.payment} (rate ${payment.fundingRate}) at ${payment.timestamp}`,
    );
    this.onFundingPayment?.({ ...payment });
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Fill bookkeeping
  // ═══════════════════════════════════════════════════════════════════════════

  hasFill(tradeId: string): boolean {
    return this.fills.has(tradeId);
  }

  /**
   * Append an applied fill. Returns false when the trade id is already recorded.
   */
  recordFill(fill: FillRecord): boolean {
    if (!this.fills.append({ ...fill, fee: { ...fill.fee } })) return false;
    this.feeTotals.set(
      fill.fee.asset,
      (this.feeTotals.get(fill.fee.asset) ?? 0) + fill.fee.amount,
    );
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Read views (copies)
  // ═══════════════════════════════════════════════════════════════════════════

  getPositions(): Position[] {
    return Array.from(this.positions.values(), (p) => ({ ...p }));
  }

  getPosition(tradingPair: string): Position | undefined {
    const position =
      this.positions.get(positionKey(tradingPair, "LONG")) ??
      this.positions.get(positionKey(tradingPair, "SHORT"));
    return position ? { ...position } : undefined;
  }

  getBalances(): Balance[] {
    return Array.from(this.balances.values(), (b) => ({ ...b }));
  }

  getBalance(asset: string): Balance | undefined {
    const balance = this.balances.get(asset);
    return balance ? { ...balance } : undefined;
  }

  getInstruments(): Instrument[] {
    return Array.from(this.instruments.values(), (i) => ({ ...i }));
  }

  /** Latest settlement, or the no-payment sentinel when none has been seen */
  getLastFundingPayment(tradingPair: string): FundingPayment | undefined {
    const payment = this.funding.get(tradingPair);
    return payment ? { ...payment } : undefined;
  }

  getFills(clientOrderId?: string): FillRecord[] {
    return this.fills.list(clientOrderId).map((f) => ({ ...f, fee: { ...f.fee } }));
  }

  getFeeTotals(): Record<string, number> {
    return Object.fromEntries(this.feeTotals);
  }

  getMetrics(): PositionLedgerMetrics {
    return {
      positions: this.positions.size,
      balances: this.balances.size,
      instruments: this.instruments.size,
      fillsRecorded: this.fills.size(),
      fillsEvicted: this.fills.getMetrics().evictions,
      fundingPaymentsRecorded: this.fundingPaymentsRecorded,
      positionSnapshotAt: this.positionSnapshotAt,
      balanceSnapshotAt: this.balanceSnapshotAt,
    };
  }
}
