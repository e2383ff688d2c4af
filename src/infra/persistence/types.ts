/**
 * Persistence Types - Common interfaces for the bounded in-memory stores
 */

// ============================================================================
// Metrics Types
// ============================================================================

/** Common metrics that all stores report */
export interface StoreMetricsBase {
  entryCount: number;

  /** Entries dropped because the store was full */
  evictions: number;

  maxEntries: number;
  lastUpdateAt: number;
}

// ============================================================================
// Store Types
// ============================================================================

export interface StoreOptions {
  /** Maximum number of entries before the least recently used is evicted */
  maxEntries?: number;
}

/** Base interface for all stores */
export interface Store<K, V> {
  get(key: K): V | null;
  has(key: K): boolean;
  set(key: K, value: V): void;
  delete(key: K): boolean;
  clear(): void;
  keys(): K[];
  size(): number;
  getMetrics(): StoreMetricsBase;
}
