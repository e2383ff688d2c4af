/**
 * Configuration Schema
 *
 * Type definitions and defaults for the reconciler configuration.
 */

import type { LogLevel } from "../utils/logger.util";

/**
 * Cadences of the poll scheduler (milliseconds)
 */
export interface PollingConfig {
  /** Order status, trade history, balances, positions */
  shortPollIntervalMs: number;

  /** Instrument metadata */
  longPollIntervalMs: number;

  /** Last funding settlement per trading pair */
  fundingPollIntervalMs: number;

  /** Maximum concurrent order-status requests per short cycle */
  statusPollConcurrency: number;
}

/**
 * Stream listener retry behaviour
 */
export interface StreamConfig {
  /** First pause after a transient stream failure */
  retryBaseMs: number;

  /** Upper bound for the pause */
  retryMaxMs: number;
}

/**
 * Order identity and bookkeeping limits
 */
export interface OrderConfig {
  /** Prefix of every generated client order id */
  brokerId: string;

  /** Maximum length of the pre-hash client order id */
  maxOrderIdLength: number;

  /** Tolerance when comparing filled amount with requested amount */
  fillEpsilon: number;

  /** Completed orders kept for late fills and lookups */
  completedOrderHistorySize: number;

  /** Trade ids kept for cross-order deduplication and fee bookkeeping */
  fillHistorySize: number;
}

/**
 * Endpoints used by the bundled transport helpers
 */
export interface ExchangeConfig {
  /** Sub-account whose channels and snapshots are reconciled */
  subaccountId: string;

  /** Canonical trading pairs (e.g. "ETH-USDC") */
  tradingPairs: string[];

  restUrl: string;
  wsUrl: string;
  requestTimeoutMs: number;
}

/**
 * Complete reconciler configuration
 */
export interface ReconcilerConfig {
  exchange: ExchangeConfig;
  polling: PollingConfig;
  stream: StreamConfig;
  orders: OrderConfig;
  logLevel: LogLevel;
}

export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = {
  exchange: {
    subaccountId: "0",
    tradingPairs: [],
    restUrl: "https://api.lyra.finance",
    wsUrl: "wss://api.lyra.finance/ws",
    requestTimeoutMs: 10_000,
  },
  polling: {
    shortPollIntervalMs: 5_000,
    longPollIntervalMs: 60_000,
    fundingPollIntervalMs: 120_000,
    statusPollConcurrency: 6,
  },
  stream: {
    retryBaseMs: 1_000,
    retryMaxMs: 30_000,
  },
  orders: {
    brokerId: "RECON",
    maxOrderIdLength: 32,
    fillEpsilon: 1e-9,
    completedOrderHistorySize: 1_000,
    fillHistorySize: 10_000,
  },
  logLevel: "info",
};
