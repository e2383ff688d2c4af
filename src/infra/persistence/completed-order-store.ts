/**
 * CompletedOrderStore - Bounded history of orders that reached a terminal state
 *
 * Keeps recently completed orders reachable by client id and by exchange id,
 * so late fills and late status updates can still be matched and deduplicated.
 */

import type { TrackedOrder } from "../../models/order";
import { BaseStore } from "./base-store";
import type { StoreOptions } from "./types";

export class CompletedOrderStore extends BaseStore<string, TrackedOrder> {
  private readonly byExchangeId = new Map<string, string>();

  constructor(options: StoreOptions = {}) {
    super(options);
  }

  add(order: TrackedOrder): void {
    this.set(order.clientOrderId, order);
    if (order.exchangeOrderId) {
      this.byExchangeId.set(order.exchangeOrderId, order.clientOrderId);
    }
  }

  getByExchangeOrderId(exchangeOrderId: string): TrackedOrder | null {
    const clientOrderId = this.byExchangeId.get(exchangeOrderId);
    return clientOrderId === undefined ? null : this.get(clientOrderId);
  }

  override delete(key: string): boolean {
    this.dropIndex(key);
    return super.delete(key);
  }

  override clear(): void {
    this.byExchangeId.clear();
    super.clear();
  }

  protected override onEvict(key: string): void {
    this.dropIndex(key);
  }

  private dropIndex(clientOrderId: string): void {
    const exchangeOrderId = this.store.get(clientOrderId)?.exchangeOrderId;
    if (exchangeOrderId !== undefined) {
      this.byExchangeId.delete(exchangeOrderId);
    }
  }
}
