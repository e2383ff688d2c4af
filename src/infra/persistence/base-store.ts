/**
 * BaseStore - Abstract base class for bounded in-memory stores
 *
 * Map insertion order doubles as LRU order: a touched key is re-inserted at
 * the end, and eviction removes the first key.
 */

import type { Store, StoreMetricsBase, StoreOptions } from "./types";

export abstract class BaseStore<K extends string | number, V>
  implements Store<K, V>
{
  protected readonly store = new Map<K, V>();

  protected readonly maxEntries: number;

  // Metrics
  protected evictions = 0;
  protected lastUpdateAt = 0;

  constructor(options: StoreOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 1000);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Store Interface Implementation
  // ═══════════════════════════════════════════════════════════════════════════

  get(key: K): V | null {
    const value = this.store.get(key);

    if (value === undefined) return null;

    this.touchKey(key, value);
    return value;
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  set(key: K, value: V): void {
    if (this.store.has(key)) {
      this.store.delete(key);
    }

    while (this.store.size >= this.maxEntries) {
      const lruKey = this.store.keys().next();
      if (lruKey.done) break;
      this.onEvict(lruKey.value);
      this.store.delete(lruKey.value);
      this.evictions++;
    }

    this.store.set(key, value);
    this.lastUpdateAt = Date.now();
  }

  delete(key: K): boolean {
    return this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  keys(): K[] {
    return Array.from(this.store.keys());
  }

  size(): number {
    return this.store.size;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Metrics
  // ═══════════════════════════════════════════════════════════════════════════

  getMetrics(): StoreMetricsBase {
    return {
      entryCount: this.size(),
      evictions: this.evictions,
      maxEntries: this.maxEntries,
      lastUpdateAt: this.lastUpdateAt,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Protected Helpers
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Move a key to the most-recently-used end
   */
  protected touchKey(key: K, value: V): void {
    this.store.delete(key);
    this.store.set(key, value);
  }

  /**
   * Hook called before an entry is evicted due to capacity limits.
   * Subclasses override this to clean up secondary indices.
   */
  protected onEvict(_key: K): void {
    // Default implementation does nothing.
  }
}
