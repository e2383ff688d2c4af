/**
 * WsEventStream - WebSocket push stream for account channels
 *
 * Each subscribe() call opens one connection, subscribes to the configured
 * channels and yields `{ channel, data }` messages until the signal aborts
 * or the socket closes. Reconnection is the caller's job (StreamListener).
 *
 * Incoming messages are buffered in a bounded queue; when the consumer falls
 * behind, the oldest message is dropped and the poll loop closes the gap.
 */

import WebSocket from "ws";
import { isRecord } from "../normalization/fields";
import type { Logger } from "../utils/logger.util";
import type { PushEventStream, StreamMessage } from "./interfaces";

export interface WsEventStreamOptions {
  url: string;
  channels: string[];
  logger: Logger;
  pingIntervalMs?: number;
  maxQueueSize?: number;
  /** Messages sent after open and before subscribing (e.g. login) */
  handshake?: () => unknown[];
}

const DEFAULT_PING_INTERVAL_MS = 15_000;
const DEFAULT_MAX_QUEUE_SIZE = 1_000;

function rawToString(raw: WebSocket.RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  return Buffer.from(raw).toString("utf8");
}

export class WsEventStream implements PushEventStream {
  private readonly pingIntervalMs: number;
  private readonly maxQueueSize: number;

  // Metrics
  private messagesReceived = 0;
  private messagesDropped = 0;
  private connections = 0;

  constructor(private readonly options: WsEventStreamOptions) {
    this.pingIntervalMs = options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS;
    this.maxQueueSize = options.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE;
  }

  async *subscribe(signal: AbortSignal): AsyncGenerator<StreamMessage> {
    if (signal.aborted) return;

    const { logger } = this.options;
    const ws = new WebSocket(this.options.url);
    this.connections++;

    const queue: StreamMessage[] = [];
    let closed = false;
    let failure: Error | undefined;
    let wake: (() => void) | undefined;
    let pingTimer: NodeJS.Timeout | undefined;

    const notify = (): void => {
      const resolve = wake;
      wake = undefined;
      resolve?.();
    };

    ws.on("open", () => {
      logger.info(`[WsEventStream] Connected to ${this.options.url}`);
      for (const message of this.options.handshake?.() ?? []) {
        ws.send(JSON.stringify(message));
      }
      ws.send(
        JSON.stringify({
          method: "subscribe",
          params: { channels: this.options.channels },
          id: String(Date.now()),
        }),
      );
      pingTimer = setInterval(() => {
        if (ws.readyState === WebSocket.OPEN) ws.ping();
      }, this.pingIntervalMs);
    });

    ws.on("message", (raw) => {
      const message = this.parse(rawToString(raw));
      if (!message) return;
      this.messagesReceived++;
      if (queue.length >= this.maxQueueSize) {
        queue.shift();
        this.messagesDropped++;
        logger.warn(`[WsEventStream] Queue full (${this.maxQueueSize}), dropped oldest message`);
      }
      queue.push(message);
      notify();
    });

    ws.on("error", (err) => {
      failure = err;
      closed = true;
      notify();
    });

    ws.on("close", (code, reason) => {
      if (!failure && code !== 1000 && !signal.aborted) {
        failure = new Error(`WebSocket closed with code ${code}${reason.length > 0 ? `: ${reason.toString()}` : ""}`);
      }
      closed = true;
      notify();
    });

    const onAbort = (): void => notify();
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      while (!signal.aborted) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (closed) break;
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
      if (failure && !signal.aborted) throw failure;
    } finally {
      if (pingTimer) clearInterval(pingTimer);
      signal.removeEventListener("abort", onAbort);
      ws.removeAllListeners();
      // Errors raised while tearing down are irrelevant to the consumer
      ws.on("error", (err) => logger.debug(`[WsEventStream] Error during close: ${err.message}`));
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else if (ws.readyState === WebSocket.OPEN) {
        ws.close(1000, "Client disconnect");
      }
    }
  }

  getMetrics(): { messagesReceived: number; messagesDropped: number; connections: number } {
    return {
      messagesReceived: this.messagesReceived,
      messagesDropped: this.messagesDropped,
      connections: this.connections,
    };
  }

  /**
   * `{ method: "subscription", params: { channel, data } }` → StreamMessage.
   * Subscribe acks are skipped; error replies are logged.
   */
  private parse(text: string): StreamMessage | undefined {
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      this.options.logger.warn(`[WsEventStream] Ignoring non-JSON message: ${text.slice(0, 200)}`);
      return undefined;
    }
    if (!isRecord(payload)) return undefined;

    const { params } = payload;
    if (isRecord(params) && typeof params.channel === "string") {
      return { channel: params.channel, data: params.data };
    }
    if (payload.error !== undefined) {
      this.options.logger.warn(`[WsEventStream] Server error: ${JSON.stringify(payload.error)}`);
    }
    return undefined;
  }
}
