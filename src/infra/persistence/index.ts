/**
 * Persistence Module Index
 *
 * Bounded in-memory stores used by the order registry and the ledger:
 * - CompletedOrderStore: terminal orders, indexed by client and exchange id
 * - FillHistoryStore: applied fills keyed by trade id
 */

export type { StoreMetricsBase, StoreOptions, Store } from "./types";

export { BaseStore } from "./base-store";
export { CompletedOrderStore } from "./completed-order-store";
export { FillHistoryStore, type FillRecord } from "./fill-history-store";
