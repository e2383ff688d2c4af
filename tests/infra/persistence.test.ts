/**
 * Persistence Module Tests
 *
 * Tests for:
 * - BaseStore: LRU eviction and metrics
 * - CompletedOrderStore: exchange id index kept in step with evictions
 * - FillHistoryStore: trade id deduplication and ordered listing
 */

import assert from "node:assert";
import { describe, it, beforeEach } from "node:test";

import {
  BaseStore,
  CompletedOrderStore,
  FillHistoryStore,
  type FillRecord,
} from "../../src/infra/persistence";
import type { TrackedOrder } from "../../src/models/order";

// ============================================================================
// Test Helpers
// ============================================================================

/** Concrete implementation of BaseStore for testing */
class TestStore extends BaseStore<string, string> {
  constructor(maxEntries = 100) {
    super({ maxEntries });
  }
}

function completedOrder(clientOrderId: string, exchangeOrderId?: string): TrackedOrder {
  return {
    clientOrderId,
    exchangeOrderId,
    tradingPair: "ETH-USDC",
    side: "BUY",
    orderType: "LIMIT",
    price: 2000,
    amount: 1,
    state: "FILLED",
    createdAt: 0,
    lastUpdateTimestamp: 1_000,
    filledAmount: 1,
    filledQuoteAmount: 2000,
    averageFillPrice: 2000,
    fees: {},
    tradeIds: new Set(["t-1"]),
  };
}

function fill(tradeId: string, clientOrderId: string): FillRecord {
  return {
    tradeId,
    clientOrderId,
    exchangeOrderId: `ex-${clientOrderId}`,
    tradingPair: "ETH-USDC",
    fillPrice: 2000,
    fillBaseAmount: 0.1,
    fillQuoteAmount: 200,
    fee: { amount: 0.05, asset: "USDC" },
    fillTimestamp: 1_000,
  };
}

// ============================================================================
// BaseStore Tests
// ============================================================================

describe("BaseStore", () => {
  let store: TestStore;

  beforeEach(() => {
    store = new TestStore(3);
  });

  it("should return null for missing keys", () => {
    assert.strictEqual(store.get("missing"), null);
    store.set("a", "1");
    assert.strictEqual(store.get("a"), "1");
    assert.strictEqual(store.getMetrics().entryCount, 1);
  });

  it("should evict the least recently used entry", () => {
    store.set("a", "1");
    store.set("b", "2");
    store.set("c", "3");
    store.get("a");
    store.set("d", "4");

    assert.deepStrictEqual(store.keys(), ["c", "a", "d"]);
    assert.strictEqual(store.getMetrics().evictions, 1);
  });
});

// ============================================================================
// CompletedOrderStore Tests
// ============================================================================

describe("CompletedOrderStore", () => {
  it("should find orders by exchange id", () => {
    const store = new CompletedOrderStore();
    store.add(completedOrder("c-1", "ex-1"));

    assert.strictEqual(store.getByExchangeOrderId("ex-1")?.clientOrderId, "c-1");
    assert.strictEqual(store.getByExchangeOrderId("ex-2"), null);
  });

  it("should drop the exchange id index entry on eviction", () => {
    const store = new CompletedOrderStore({ maxEntries: 1 });
    store.add(completedOrder("c-1", "ex-1"));
    store.add(completedOrder("c-2", "ex-2"));

    assert.strictEqual(store.has("c-1"), false);
    assert.strictEqual(store.getByExchangeOrderId("ex-1"), null);
    assert.strictEqual(store.getByExchangeOrderId("ex-2")?.clientOrderId, "c-2");
  });

  it("should drop the index entry on delete", () => {
    const store = new CompletedOrderStore();
    store.add(completedOrder("c-1", "ex-1"));
    assert.strictEqual(store.delete("c-1"), true);
    assert.strictEqual(store.getByExchangeOrderId("ex-1"), null);
  });
});

// ============================================================================
// FillHistoryStore Tests
// ============================================================================

describe("FillHistoryStore", () => {
  it("should append each trade id once", () => {
    const store = new FillHistoryStore();
    assert.strictEqual(store.append(fill("t-1", "c-1")), true);
    assert.strictEqual(store.append(fill("t-1", "c-1")), false);
    assert.strictEqual(store.size(), 1);
  });

  it("should list fills in insertion order, optionally per order", () => {
    const store = new FillHistoryStore();
    store.append(fill("t-1", "c-1"));
    store.append(fill("t-2", "c-2"));
    store.append(fill("t-3", "c-1"));

    assert.deepStrictEqual(store.list().map((f) => f.tradeId), ["t-1", "t-2", "t-3"]);
    assert.deepStrictEqual(store.list("c-1").map((f) => f.tradeId), ["t-1", "t-3"]);
  });
});
