import assert from "node:assert";
import { describe, it, beforeEach } from "node:test";

import type { OrderRegistry } from "../../src/core/order-registry";
import type { PositionLedger } from "../../src/core/position-ledger";
import type { ReconciliationEngine } from "../../src/core/reconciliation-engine";
import {
  StreamListener,
  type StreamListenerState,
} from "../../src/core/stream-listener";
import {
  RecordingLogger,
  ScriptedPushStream,
  createReconciler,
  openOrder,
  rawOrder,
  rawTrade,
  type SubscriptionScript,
} from "../helpers/fakes";

async function waitFor(condition: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
}

describe("StreamListener", () => {
  let logger: RecordingLogger;
  let registry: OrderRegistry;
  let ledger: PositionLedger;
  let engine: ReconciliationEngine;
  let states: StreamListenerState[];

  beforeEach(() => {
    logger = new RecordingLogger();
    ({ registry, ledger, engine } = createReconciler({ logger }));
    states = [];
  });

  function createListener(scripts: SubscriptionScript[]): StreamListener {
    return new StreamListener(new ScriptedPushStream(scripts), engine, logger, {
      subaccountId: "7",
      retryBaseMs: 5,
      retryMaxMs: 20,
      now: () => 7_000,
      random: () => 0,
      onStateChange: (state) => states.push(state),
    });
  }

  it("should subscribe to the account channels", () => {
    assert.deepStrictEqual(createListener([]).getChannels(), ["7.orders", "7.trades"]);
  });

  describe("handleMessage", () => {
    it("should route a message to the engine by channel", () => {
      openOrder(registry, "c-1", "ex-1");
      const listener = createListener([]);

      assert.strictEqual(listener.handleMessage({ channel: "7.trades", data: [rawTrade()] }), true);
      assert.strictEqual(registry.get("c-1")?.filledAmount, 0.5);
    });

    it("should stamp updates without an exchange time with the receipt time", () => {
      openOrder(registry, "c-1", "ex-1");
      const listener = createListener([]);

      listener.handleMessage({
        channel: "7.orders",
        data: [rawOrder({ order_status: "cancelled", last_update_timestamp: undefined })],
      });

      assert.strictEqual(registry.get("c-1")?.state, "CANCELED");
      assert.strictEqual(registry.get("c-1")?.lastUpdateTimestamp, 7_000);
    });

    it("should leave polled balances alone when a balance push arrives", () => {
      engine.onPollSnapshot({
        kind: "balance-snapshot",
        data: [
          { asset_name: "USDC", amount: "1000" },
          { asset_name: "ETH", amount: "2" },
        ],
      });
      const listener = createListener([]);

      const routed = listener.handleMessage({
        channel: "7.balances",
        data: [{ asset_name: "USDC", amount: "990" }],
      });

      assert.strictEqual(routed, false);
      assert.deepStrictEqual(ledger.getBalances(), [
        { asset: "USDC", total: 1000, available: 1000 },
        { asset: "ETH", total: 2, available: 2 },
      ]);
    });

    it("should drop messages from channels it did not subscribe to", () => {
      const listener = createListener([]);

      assert.strictEqual(listener.handleMessage({ channel: "7.mmp", data: {} }), false);
      assert.deepStrictEqual(logger.messages("error"), [
        '[StreamListener] Unexpected message on channel "7.mmp"',
      ]);
      assert.strictEqual(listener.getMetrics().messagesDropped, 1);
    });
  });

  describe("run loop", () => {
    it("should pause after a failure and resume on a new subscription", async () => {
      openOrder(registry, "c-1", "ex-1");
      const listener = createListener([
        {
          messages: [{ channel: "7.trades", data: [rawTrade()] }],
          then: "throw",
        },
        {
          messages: [{ channel: "7.orders", data: [rawOrder({ order_status: "cancelled", last_update_timestamp: 2_000 })] }],
          then: "hold",
        },
      ]);

      listener.start();
      await waitFor(() => listener.getMetrics().messagesReceived === 2);
      await listener.stop();

      assert.deepStrictEqual(states, ["LISTENING", "PAUSED", "LISTENING", "STOPPED"]);
      assert.strictEqual(registry.get("c-1")?.filledAmount, 0.5);
      assert.strictEqual(registry.get("c-1")?.state, "CANCELED");
      assert.deepStrictEqual(logger.messages("error"), ["[StreamListener] Stream failed"]);
      assert.ok(logger.messages("info").includes("[StreamListener] Re-subscribing in 5ms"));
      assert.deepStrictEqual(listener.getMetrics(), {
        state: "STOPPED",
        messagesReceived: 2,
        messagesDropped: 0,
        subscriptions: 2,
        streamFailures: 1,
      });
    });

    it("should back off further on each silent end of the stream", async () => {
      const listener = createListener([
        { messages: [], then: "end" },
        { messages: [], then: "end" },
        { messages: [], then: "hold" },
      ]);

      listener.start();
      await waitFor(() => listener.getMetrics().subscriptions === 3);
      await listener.stop();

      assert.deepStrictEqual(logger.messages("warn"), [
        "[StreamListener] Stream ended, re-subscribing",
        "[StreamListener] Stream ended, re-subscribing",
      ]);
      assert.deepStrictEqual(logger.messages("info"), [
        "[StreamListener] Re-subscribing in 5ms",
        "[StreamListener] Re-subscribing in 10ms",
        "[StreamListener] Stopped",
      ]);
      assert.strictEqual(listener.getMetrics().streamFailures, 0);
    });

    it("should report STOPPED when stopped before starting", async () => {
      const listener = createListener([]);
      await listener.stop();
      assert.strictEqual(listener.getState(), "STOPPED");
    });
  });
});
