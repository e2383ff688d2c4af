import { test } from "node:test";
import assert from "node:assert/strict";

import { loadConfig } from "../../src/config/env";
import { DEFAULT_RECONCILER_CONFIG } from "../../src/config/schema";
import { ConfigurationError } from "../../src/errors/app.errors";

test("loadConfig falls back to defaults when nothing is set", () => {
  assert.deepEqual(loadConfig({}), DEFAULT_RECONCILER_CONFIG);
});

test("loadConfig reads trading pairs as a list or JSON array", () => {
  assert.deepEqual(
    loadConfig({ RECONCILER_TRADING_PAIRS: "ETH-USDC, BTC-USDC" }).exchange.tradingPairs,
    ["ETH-USDC", "BTC-USDC"],
  );
  assert.deepEqual(
    loadConfig({ RECONCILER_TRADING_PAIRS: '["SOL-USDC"]' }).exchange.tradingPairs,
    ["SOL-USDC"],
  );
});

test("loadConfig accepts lowercase variable names", () => {
  const config = loadConfig({ short_poll_interval_ms: "2500", reconciler_subaccount_id: "42" });
  assert.equal(config.polling.shortPollIntervalMs, 2500);
  assert.equal(config.exchange.subaccountId, "42");
});

test("loadConfig rejects non-numeric and non-integer intervals", () => {
  assert.throws(() => loadConfig({ SHORT_POLL_INTERVAL_MS: "abc" }), {
    name: "ConfigurationError",
    message: 'SHORT_POLL_INTERVAL_MS must be a non-negative number (got "abc")',
  });
  assert.throws(() => loadConfig({ LONG_POLL_INTERVAL_MS: "0" }), {
    message: "LONG_POLL_INTERVAL_MS must be a positive integer",
  });
  assert.throws(() => loadConfig({ STATUS_POLL_CONCURRENCY: "1.5" }), ConfigurationError);
});

test("loadConfig allows a zero fill epsilon", () => {
  assert.equal(loadConfig({ FILL_EPSILON: "0" }).orders.fillEpsilon, 0);
});

test("loadConfig rejects a retry ceiling below the base", () => {
  assert.throws(() => loadConfig({ STREAM_RETRY_BASE_MS: "5000", STREAM_RETRY_MAX_MS: "1000" }), {
    message: "STREAM_RETRY_MAX_MS must be greater than or equal to STREAM_RETRY_BASE_MS",
  });
});

test("loadConfig picks the log level, with DEBUG=1 taking precedence", () => {
  assert.equal(loadConfig({ LOG_LEVEL: "WARN" }).logLevel, "warn");
  assert.equal(loadConfig({ LOG_LEVEL: "error", DEBUG: "1" }).logLevel, "debug");
  assert.equal(loadConfig({ LOG_LEVEL: "verbose" }).logLevel, "info");
});
