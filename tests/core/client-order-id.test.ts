import assert from "node:assert";
import { describe, it } from "node:test";

import { buildOrderIdSeed, createClientOrderId } from "../../src/core/client-order-id";
import { FIXED_NOW } from "../helpers/fakes";

describe("client order ids", () => {
  const options = {
    brokerId: "TEST",
    maxOrderIdLength: 32,
    now: () => FIXED_NOW,
    nonce: () => "abcd1234",
  };

  it("should build a seed from side, broker, pair, time and nonce", () => {
    assert.strictEqual(
      buildOrderIdSeed("BUY", "ETH-USDC", { ...options, maxOrderIdLength: 64 }),
      "BTEST-ETHUSDC-1700000000000abcd1234",
    );
  });

  it("should truncate the seed to the label limit", () => {
    assert.strictEqual(
      buildOrderIdSeed("BUY", "ETH-USDC", options),
      "BTEST-ETHUSDC-1700000000000abcd1",
    );
  });

  it("should hash the seed into a 0x-prefixed id", () => {
    assert.strictEqual(
      createClientOrderId("BUY", "ETH-USDC", options),
      "0x13f07910bb916882707958da600b02e9",
    );
    assert.strictEqual(
      createClientOrderId("SELL", "btc-usdc", { ...options, nonce: () => "ff" }),
      "0x8e40b9dc33d08a59e359f69c1cb33d3e",
    );
  });

  it("should produce distinct ids within the same millisecond", () => {
    const withRandomNonce = { brokerId: "TEST", maxOrderIdLength: 64, now: () => FIXED_NOW };
    const first = createClientOrderId("BUY", "ETH-USDC", withRandomNonce);
    const second = createClientOrderId("BUY", "ETH-USDC", withRandomNonce);
    assert.match(first, /^0x[0-9a-f]{32}$/);
    assert.notStrictEqual(first, second);
  });
});
