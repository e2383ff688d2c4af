/**
 * OrderRegistry - Authoritative map of client order id → order state
 *
 * Single owner of TrackedOrder objects. Every mutation is a synchronous
 * method, so the event loop serializes writes and concurrent callers can
 * never interleave inside one merge. Read views return copies.
 *
 * Terminal orders leave the active map and move to a bounded completed
 * history, where late fills are still deduplicated and accumulated.
 */

import { DuplicateOrderError } from "../errors/app.errors";
import { CompletedOrderStore } from "../infra/persistence/completed-order-store";
import {
  cloneOrder,
  isForwardTransition,
  isTerminalState,
  type OrderSide,
  type OrderState,
  type OrderType,
  type TrackedOrder,
} from "../models/order";
import type { FillUpdate, OrderStatusUpdate } from "../models/updates";
import type { Logger } from "../utils/logger.util";

// ============================================================================
// Types
// ============================================================================

export interface NewOrder {
  clientOrderId: string;
  tradingPair: string;
  side: OrderSide;
  orderType: OrderType;
  price: number;
  amount: number;
  createdAt: number;
}

export type StatusUpdateOutcome =
  | "applied" // state moved forward
  | "refreshed" // timestamp/exchange id recorded, state kept
  | "stale" // older than the last applied observation
  | "completed" // order already terminal
  | "unknown-order";

export type FillOutcome =
  | "applied"
  | "duplicate"
  | "overfill"
  | "unknown-order";

export interface OrderRegistryOptions {
  /** Tolerance when comparing filled and requested amount */
  fillEpsilon?: number;

  completedOrderHistorySize?: number;

  onStateChange?: (order: TrackedOrder, previous: OrderState) => void;
  onFill?: (order: TrackedOrder, fill: FillUpdate) => void;
}

export interface OrderRegistryMetrics {
  activeOrders: number;
  completedOrders: number;
  /** Completed orders dropped from the bounded history */
  completedOrdersEvicted: number;
  statusUpdatesApplied: number;
  staleStatusUpdates: number;
  fillsApplied: number;
  duplicateFills: number;
  overfills: number;
}

// ============================================================================
// OrderRegistry Implementation
// ============================================================================

export class OrderRegistry {
  private readonly active = new Map<string, TrackedOrder>();
  private readonly activeByExchangeId = new Map<string, string>();
  private readonly completed: CompletedOrderStore;
  private readonly fillEpsilon: number;
  private readonly onStateChange?: OrderRegistryOptions["onStateChange"];
  private readonly onFill?: OrderRegistryOptions["onFill"];

  // Metrics
  private statusUpdatesApplied = 0;
  private staleStatusUpdates = 0;
  private fillsApplied = 0;
  private duplicateFills = 0;
  private overfills = 0;

  constructor(
    private readonly logger: Logger,
    options: OrderRegistryOptions = {},
  ) {
    this.fillEpsilon = options.fillEpsilon ?? 1e-9;
    this.completed = new CompletedOrderStore({
      maxEntries: options.completedOrderHistorySize ?? 1000,
    });
    this.onStateChange = options.onStateChange;
    this.onFill = options.onFill;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Mutations
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Track a new order in PENDING_CREATE.
   * @throws DuplicateOrderError when the client order id is already known
   */
  register(order: NewOrder): TrackedOrder {
    if (this.active.has(order.clientOrderId) || this.completed.has(order.clientOrderId)) {
      throw new DuplicateOrderError(order.clientOrderId);
    }

    const tracked: TrackedOrder = {
      ...order,
      state: "PENDING_CREATE",
      lastUpdateTimestamp: 0,
      filledAmount: 0,
      filledQuoteAmount: 0,
      averageFillPrice: 0,
      fees: {},
      tradeIds: new Set(),
    };
    this.active.set(order.clientOrderId, tracked);

    this.logger.debug(
      `[OrderRegistry] Registered ${order.side} ${order.amount} ${order.tradingPair} as ${order.clientOrderId}`,
    );
    return cloneOrder(tracked);
  }

  /**
   * Record the exchange id of an order. Once set it never changes; a
   * conflicting value is logged and ignored.
   */
  setExchangeOrderId(clientOrderId: string, exchangeOrderId: string): boolean {
    const order = this.active.get(clientOrderId) ?? this.completed.get(clientOrderId);
    if (!order) return false;

    if (order.exchangeOrderId !== undefined) {
      if (order.exchangeOrderId !== exchangeOrderId) {
        this.logger.warn(
          `[OrderRegistry] Ignoring exchange id ${exchangeOrderId} for ${clientOrderId}: already bound to ${order.exchangeOrderId}`,
        );
      }
      return false;
    }

    order.exchangeOrderId = exchangeOrderId;
    if (this.active.has(clientOrderId)) {
      this.activeByExchangeId.set(exchangeOrderId, clientOrderId);
    } else {
      this.completed.add(order);
    }
    return true;
  }

  /**
   * Apply a status observation. Last-update-wins by exchange timestamp, not
   * by arrival order: an update older than the last applied one is ignored.
   */
  applyStatusUpdate(
    update: OrderStatusUpdate & { clientOrderId: string },
  ): StatusUpdateOutcome {
    const order = this.active.get(update.clientOrderId);

    if (!order) {
      if (this.completed.has(update.clientOrderId)) {
        this.logger.debug(
          `[OrderRegistry] ${update.clientOrderId} already completed, ignoring ${update.state} from ${update.source}`,
        );
        return "completed";
      }
      this.logger.debug(
        `[OrderRegistry] Ignoring ${update.state} for untracked order ${update.clientOrderId}`,
      );
      return "unknown-order";
    }

    if (update.timestamp < order.lastUpdateTimestamp) {
      this.staleStatusUpdates++;
      this.logger.debug(
        `[OrderRegistry] Stale ${update.source} update for ${order.clientOrderId} (${update.timestamp} < ${order.lastUpdateTimestamp})`,
      );
      return "stale";
    }

    if (update.exchangeOrderId !== undefined) {
      this.setExchangeOrderId(order.clientOrderId, update.exchangeOrderId);
    }
    order.lastUpdateTimestamp = update.timestamp;

    if (!isForwardTransition(order.state, update.state)) {
      return "refreshed";
    }

    this.statusUpdatesApplied++;
    this.transition(order, update.state);
    return "applied";
  }

  /**
   * Apply a fill to its owning order. At most once per trade id.
   */
  applyFill(clientOrderId: string, fill: FillUpdate): FillOutcome {
    const order = this.active.get(clientOrderId) ?? this.completed.get(clientOrderId);
    if (!order) return "unknown-order";

    if (order.tradeIds.has(fill.tradeId)) {
      this.duplicateFills++;
      this.logger.debug(
        `[OrderRegistry] Duplicate fill ${fill.tradeId} for ${clientOrderId} from ${fill.source}`,
      );
      return "duplicate";
    }

    const filled = order.filledAmount + fill.fillBaseAmount;
    if (filled > order.amount + this.fillEpsilon) {
      this.overfills++;
      this.logger.warn(
        `[OrderRegistry] Overfill anomaly: trade ${fill.tradeId} would fill ${filled} of ${order.amount} on ${clientOrderId}, dropping`,
      );
      return "overfill";
    }

    order.tradeIds.add(fill.tradeId);
    order.averageFillPrice =
      (order.averageFillPrice * order.filledAmount +
        fill.fillPrice * fill.fillBaseAmount) /
      filled;
    order.filledAmount = filled;
    order.filledQuoteAmount += fill.fillQuoteAmount;
    order.fees[fill.fee.asset] = (order.fees[fill.fee.asset] ?? 0) + fill.fee.amount;
    if (order.exchangeOrderId === undefined) {
      this.setExchangeOrderId(clientOrderId, fill.exchangeOrderId);
    }
    this.fillsApplied++;

    this.logger.info(
      `[OrderRegistry] Fill ${fill.tradeId}: ${fill.fillBaseAmount} ${order.tradingPair} @ ${fill.fillPrice} ` +
        `(${order.filledAmount}/${order.amount} filled, ${clientOrderId})`,
    );

    if (!isTerminalState(order.state)) {
      if (order.filledAmount >= order.amount - this.fillEpsilon) {
        this.transition(order, "FILLED");
      } else if (order.state !== "PARTIALLY_FILLED") {
        this.transition(order, "PARTIALLY_FILLED");
      }
    }

    const onFill = this.onFill;
    if (onFill) this.notify("onFill", () => onFill(cloneOrder(order), fill));
    return "applied";
  }

  /**
   * Mark a rejected submission FAILED. Only orders the exchange never
   * acknowledged qualify: once an exchange id is bound or the order is OPEN,
   * its fate is decided by exchange reports.
   */
  markFailed(clientOrderId: string, reason: string): boolean {
    const order = this.active.get(clientOrderId);
    if (!order) return false;
    if (order.state !== "PENDING_CREATE" || order.exchangeOrderId !== undefined) {
      this.logger.warn(
        `[OrderRegistry] Not failing ${clientOrderId} (${order.state}, exchange id ${order.exchangeOrderId ?? "none"}): ${reason}`,
      );
      return false;
    }
    this.logger.warn(`[OrderRegistry] ${clientOrderId} failed: ${reason}`);
    this.transition(order, "FAILED");
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Lookups (engine internal, no copies)
  // ═══════════════════════════════════════════════════════════════════════════

  /** Client id of the active order bound to an exchange id, via the index */
  lookupActiveByExchangeId(exchangeOrderId: string): string | undefined {
    return this.activeByExchangeId.get(exchangeOrderId);
  }

  /**
   * Linear scan over active orders. Repairs the index when the scan finds an
   * order the index missed.
   */
  scanActiveByExchangeId(exchangeOrderId: string): string[] {
    const matches: string[] = [];
    for (const order of this.active.values()) {
      if (order.exchangeOrderId === exchangeOrderId) {
        matches.push(order.clientOrderId);
      }
    }
    const [first] = matches;
    if (first !== undefined && !this.activeByExchangeId.has(exchangeOrderId)) {
      this.activeByExchangeId.set(exchangeOrderId, first);
    }
    return matches;
  }

  lookupCompletedByExchangeId(exchangeOrderId: string): string | undefined {
    return this.completed.getByExchangeOrderId(exchangeOrderId)?.clientOrderId;
  }

  tradingPairOf(clientOrderId: string): string | undefined {
    return (this.active.get(clientOrderId) ?? this.completed.get(clientOrderId))
      ?.tradingPair;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Read views (copies)
  // ═══════════════════════════════════════════════════════════════════════════

  get(clientOrderId: string): TrackedOrder | undefined {
    const order = this.active.get(clientOrderId) ?? this.completed.get(clientOrderId);
    return order ? cloneOrder(order) : undefined;
  }

  isActive(clientOrderId: string): boolean {
    return this.active.has(clientOrderId);
  }

  getActiveOrders(): TrackedOrder[] {
    return Array.from(this.active.values(), cloneOrder);
  }

  /** Active orders keyed by exchange order id (acknowledged orders only) */
  getActiveOrdersByExchangeId(): Map<string, TrackedOrder> {
    const view = new Map<string, TrackedOrder>();
    for (const order of this.active.values()) {
      if (order.exchangeOrderId !== undefined) {
        view.set(order.exchangeOrderId, cloneOrder(order));
      }
    }
    return view;
  }

  /** Orders eligible for status and trade-history polling */
  getFillableOrders(): TrackedOrder[] {
    return this.getActiveOrders().filter(
      (order) => order.exchangeOrderId !== undefined,
    );
  }

  getCompletedOrders(): TrackedOrder[] {
    return this.completed.keys().flatMap((id) => {
      const order = this.completed.get(id);
      return order ? [cloneOrder(order)] : [];
    });
  }

  getMetrics(): OrderRegistryMetrics {
    return {
      activeOrders: this.active.size,
      completedOrders: this.completed.size(),
      completedOrdersEvicted: this.completed.getMetrics().evictions,
      statusUpdatesApplied: this.statusUpdatesApplied,
      staleStatusUpdates: this.staleStatusUpdates,
      fillsApplied: this.fillsApplied,
      duplicateFills: this.duplicateFills,
      overfills: this.overfills,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private
  // ═══════════════════════════════════════════════════════════════════════════

  private transition(order: TrackedOrder, next: OrderState): void {
    const previous = order.state;
    order.state = next;

    if (isTerminalState(next)) {
      this.active.delete(order.clientOrderId);
      if (order.exchangeOrderId !== undefined) {
        this.activeByExchangeId.delete(order.exchangeOrderId);
      }
      this.completed.add(order);
    }

    this.logger.info(
      `[OrderRegistry] ${order.clientOrderId} ${previous} → ${next}`,
    );
    const onStateChange = this.onStateChange;
    if (onStateChange) {
      this.notify("onStateChange", () => onStateChange(cloneOrder(order), previous));
    }
  }

  /** Listener errors are logged; they never interrupt a merge */
  private notify(name: string, callback: () => void): void {
    try {
      callback();
    } catch (err) {
      this.logger.error(
        `[OrderRegistry] ${name} listener threw`,
        err instanceof Error ? err : new Error(String(err)),
      );
    }
  }
}
