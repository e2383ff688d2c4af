/**
 * FillHistoryStore - Append-only record of applied fills, keyed by trade id
 *
 * Bounded: once full, the oldest fills fall out of the deduplication window.
 * Per-order deduplication in the order registry still covers them.
 */

import type { TradeFee } from "../../models/order";
import { BaseStore } from "./base-store";
import type { StoreOptions } from "./types";

export interface FillRecord {
  tradeId: string;
  clientOrderId: string;
  exchangeOrderId: string;
  tradingPair: string;
  fillPrice: number;
  fillBaseAmount: number;
  fillQuoteAmount: number;
  fee: TradeFee;
  fillTimestamp: number;
}

export class FillHistoryStore extends BaseStore<string, FillRecord> {
  constructor(options: StoreOptions = {}) {
    super(options);
  }

  /**
   * Append a fill. Returns false when the trade id is already recorded.
   */
  append(fill: FillRecord): boolean {
    if (this.has(fill.tradeId)) return false;
    this.set(fill.tradeId, fill);
    return true;
  }

  /**
   * Fills in insertion order, optionally for a single order
   */
  list(clientOrderId?: string): FillRecord[] {
    const fills = Array.from(this.store.values());
    return clientOrderId === undefined
      ? fills
      : fills.filter((fill) => fill.clientOrderId === clientOrderId);
  }
}
