/**
 * WsEventStream Tests
 *
 * Runs against a WebSocketServer on a random local port.
 */

import assert from "node:assert";
import { once } from "node:events";
import { describe, it, beforeEach, afterEach } from "node:test";
import { WebSocketServer, type WebSocket } from "ws";

import { isRecord } from "../../src/normalization/fields";
import type { StreamMessage } from "../../src/services/interfaces";
import { WsEventStream } from "../../src/services/ws-event-stream";
import { RecordingLogger } from "../helpers/fakes";

describe("WsEventStream", () => {
  let server: WebSocketServer;
  let url: string;
  let received: unknown[];
  let onSubscribe: (socket: WebSocket) => void;

  beforeEach(async () => {
    received = [];
    onSubscribe = () => undefined;
    server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
    await once(server, "listening");
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error(`unexpected address ${String(address)}`);
    url = `ws://127.0.0.1:${address.port}`;

    server.on("connection", (socket) => {
      socket.on("message", (raw) => {
        const message: unknown = JSON.parse(raw.toString());
        received.push(message);
        if (isRecord(message) && message.method === "subscribe") {
          socket.send(JSON.stringify({ id: message.id, result: { status: "ok" } }));
          onSubscribe(socket);
        }
      });
    });
  });

  afterEach(async () => {
    for (const client of server.clients) client.terminate();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  function createStream(): WsEventStream {
    return new WsEventStream({
      url,
      channels: ["7.orders", "7.trades"],
      logger: new RecordingLogger(),
      handshake: () => [{ method: "public/login", params: { token: "test-token" } }],
    });
  }

  it("should log in, subscribe and yield channel messages", async () => {
    onSubscribe = (socket) => {
      socket.send("not json");
      socket.send(
        JSON.stringify({ method: "subscription", params: { channel: "7.trades", data: [{ trade_id: "t-1" }] } }),
      );
    };
    const stream = createStream();
    const controller = new AbortController();
    const messages: StreamMessage[] = [];

    for await (const message of stream.subscribe(controller.signal)) {
      messages.push(message);
      controller.abort();
    }

    assert.deepStrictEqual(messages, [{ channel: "7.trades", data: [{ trade_id: "t-1" }] }]);
    assert.deepStrictEqual(received[0], { method: "public/login", params: { token: "test-token" } });
    const subscribe = received[1];
    assert.ok(isRecord(subscribe));
    assert.strictEqual(subscribe.method, "subscribe");
    assert.deepStrictEqual(subscribe.params, { channels: ["7.orders", "7.trades"] });
    assert.deepStrictEqual(stream.getMetrics(), {
      messagesReceived: 1,
      messagesDropped: 0,
      connections: 1,
    });
  });

  it("should fail when the server closes abnormally", async () => {
    onSubscribe = (socket) => socket.close(4001, "kicked");
    const stream = createStream();

    await assert.rejects(
      async () => {
        for await (const message of stream.subscribe(new AbortController().signal)) {
          assert.fail(`unexpected message on ${message.channel}`);
        }
      },
      { message: "WebSocket closed with code 4001: kicked" },
    );
  });

  it("should end quietly on a normal close", async () => {
    onSubscribe = (socket) => socket.close(1000, "bye");
    const messages: StreamMessage[] = [];

    for await (const message of createStream().subscribe(new AbortController().signal)) {
      messages.push(message);
    }

    assert.deepStrictEqual(messages, []);
  });

  it("should not connect when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const stream = createStream();

    for await (const message of stream.subscribe(controller.signal)) {
      assert.fail(`unexpected message on ${message.channel}`);
    }
    assert.strictEqual(stream.getMetrics().connections, 0);
  });
});
