/**
 * Tests for the error taxonomy
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import {
  AppError,
  ExchangeRejectionError,
  NotFoundOnExchangeError,
  TransientNetworkError,
  TransportError,
  toCallerError,
} from "../../src/errors/app.errors";

describe("App Errors", () => {
  it("should keep the wrapped error as cause", () => {
    const root = new Error("socket hang up");
    const error = new TransportError("timeout", "transient-network", undefined, root);

    assert.strictEqual(error.cause, root);
    assert.strictEqual(error.code, "TRANSPORT_TRANSIENT_NETWORK");
    assert.strictEqual(error.name, "TransportError");
  });

  describe("toCallerError", () => {
    it("should map each transport kind to its typed error", () => {
      const notFound = toCallerError(new TransportError("gone", "not-found"), "c-1");
      const rejected = toCallerError(new TransportError("no margin", "rejected"), "c-1");
      const transient = toCallerError(new TransportError("timeout", "transient-network"));
      const unknown = toCallerError(new TransportError("odd", "unknown"));

      assert.ok(notFound instanceof NotFoundOnExchangeError);
      assert.strictEqual(notFound.clientOrderId, "c-1");
      assert.ok(rejected instanceof ExchangeRejectionError);
      assert.ok(transient instanceof TransientNetworkError);
      assert.ok(unknown instanceof AppError);
      assert.strictEqual(unknown.code, "UNKNOWN_TRANSPORT_ERROR");
    });

    it("should chain the transport error", () => {
      const source = new TransportError("no margin", "rejected", 400);
      assert.strictEqual(toCallerError(source).cause, source);
    });
  });
});
