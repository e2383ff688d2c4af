/**
 * StreamListener - Consumes the push event stream until stopped
 *
 * Messages are routed by channel to a raw message kind and handed to the
 * reconciliation engine. A failing subscription pauses with exponential
 * backoff, then re-subscribes; gaps are closed by the poll scheduler.
 *
 * States: IDLE → LISTENING ⇄ PAUSED → STOPPED
 */

import { USER_CHANNELS } from "../constants/exchange.constants";
import { asError } from "../errors/app.errors";
import type { RawMessageKind } from "../models/updates";
import type { PushEventStream, StreamMessage } from "../services/interfaces";
import { calculateBackoff, sleep, type BackoffConfig } from "../utils/backoff";
import type { Logger } from "../utils/logger.util";
import type { ReconciliationEngine } from "./reconciliation-engine";

export type StreamListenerState = "IDLE" | "LISTENING" | "PAUSED" | "STOPPED";

export interface StreamListenerOptions {
  subaccountId: string;
  retryBaseMs: number;
  retryMaxMs: number;
  /** Clock for message receipt times */
  now?: () => number;
  /** Jitter source for the retry pause */
  random?: () => number;
  onStateChange?: (state: StreamListenerState) => void;
}

export interface StreamListenerMetrics {
  state: StreamListenerState;
  messagesReceived: number;
  messagesDropped: number;
  subscriptions: number;
  streamFailures: number;
}

/**
 * Account channels and the message kind each one carries. Balances and
 * positions are not subscribed: push messages carry partial sets, and only
 * the poll snapshots may replace the ledger.
 */
export function accountChannels(subaccountId: string): Map<string, RawMessageKind> {
  return new Map<string, RawMessageKind>([
    [`${subaccountId}.${USER_CHANNELS.ORDERS}`, "order-status"],
    [`${subaccountId}.${USER_CHANNELS.TRADES}`, "trade"],
  ]);
}

export class StreamListener {
  private state: StreamListenerState = "IDLE";
  private controller?: AbortController;
  private loop?: Promise<void>;
  private readonly channelKinds: Map<string, RawMessageKind>;
  private readonly backoff: BackoffConfig;
  private readonly now: () => number;

  private messagesReceived = 0;
  private messagesDropped = 0;
  private subscriptions = 0;
  private streamFailures = 0;

  constructor(
    private readonly stream: PushEventStream,
    private readonly engine: ReconciliationEngine,
    private readonly logger: Logger,
    private readonly options: StreamListenerOptions,
  ) {
    this.channelKinds = accountChannels(options.subaccountId);
    this.now = options.now ?? Date.now;
    this.backoff = {
      baseDelayMs: options.retryBaseMs,
      maxDelayMs: options.retryMaxMs,
      jitterFactor: 0.3,
    };
  }

  /** Channel names to subscribe to */
  getChannels(): string[] {
    return [...this.channelKinds.keys()];
  }

  getState(): StreamListenerState {
    return this.state;
  }

  start(): void {
    if (this.controller) return;
    this.controller = new AbortController();
    this.loop = this.run(this.controller.signal).catch((err: unknown) => {
      this.logger.error("[StreamListener] Listener loop crashed", asError(err));
      this.state = "STOPPED";
    });
  }

  /** Abort the subscription and wait for the loop to exit */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      this.setState("STOPPED");
      return;
    }
    controller.abort();
    await this.loop;
    this.controller = undefined;
    this.loop = undefined;
  }

  /**
   * Route one message. Returns false when it was dropped.
   */
  handleMessage(message: StreamMessage): boolean {
    this.messagesReceived++;
    const kind = this.channelKinds.get(message.channel);
    if (kind === undefined) {
      this.messagesDropped++;
      this.logger.error(`[StreamListener] Unexpected message on channel "${message.channel}"`);
      return false;
    }

    try {
      this.engine.onStreamEvent({ kind, data: message.data, receivedAt: this.now() });
      return true;
    } catch (err) {
      this.messagesDropped++;
      this.logger.error(
        `[StreamListener] Failed to process ${message.channel} message`,
        asError(err),
      );
      return false;
    }
  }

  getMetrics(): StreamListenerMetrics {
    return {
      state: this.state,
      messagesReceived: this.messagesReceived,
      messagesDropped: this.messagesDropped,
      subscriptions: this.subscriptions,
      streamFailures: this.streamFailures,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private
  // ═══════════════════════════════════════════════════════════════════════════

  private async run(signal: AbortSignal): Promise<void> {
    let attempt = 0;

    while (!signal.aborted) {
      this.setState("LISTENING");
      this.subscriptions++;
      try {
        for await (const message of this.stream.subscribe(signal)) {
          if (signal.aborted) break;
          attempt = 0;
          this.handleMessage(message);
        }
        if (signal.aborted) break;
        this.logger.warn("[StreamListener] Stream ended, re-subscribing");
      } catch (err) {
        if (signal.aborted) break;
        this.streamFailures++;
        this.logger.error("[StreamListener] Stream failed", asError(err));
      }

      const delay = calculateBackoff(attempt, this.backoff, this.options.random);
      attempt++;
      this.logger.info(`[StreamListener] Re-subscribing in ${delay}ms`);
      this.setState("PAUSED");
      await sleep(delay, signal);
    }

    this.setState("STOPPED");
    this.logger.info("[StreamListener] Stopped");
  }

  private setState(next: StreamListenerState): void {
    if (this.state === next) return;
    this.state = next;
    this.options.onStateChange?.(next);
  }
}
