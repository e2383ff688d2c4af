import { ConfigurationError } from "../errors/app.errors";
import { parseLogLevel } from "../utils/logger.util";
import { DEFAULT_RECONCILER_CONFIG, type ReconcilerConfig } from "./schema";

type EnvSource = Record<string, string | undefined>;

/**
 * Build the reconciler configuration from environment variables.
 *
 * Unset variables fall back to DEFAULT_RECONCILER_CONFIG. Set but invalid
 * numeric values throw a ConfigurationError instead of being ignored.
 */
export function loadConfig(source: EnvSource = process.env): ReconcilerConfig {
  const read = (key: string): string | undefined => {
    const value = source[key] ?? source[key.toLowerCase()];
    return value === undefined || value.trim() === "" ? undefined : value.trim();
  };

  const num = (key: string, fallback: number): number => {
    const raw = read(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed < 0) {
      throw new ConfigurationError(
        `${key} must be a non-negative number (got "${raw}")`,
      );
    }
    return parsed;
  };

  const positiveInt = (key: string, fallback: number): number => {
    const value = num(key, fallback);
    if (!Number.isInteger(value) || value === 0) {
      throw new ConfigurationError(`${key} must be a positive integer`);
    }
    return value;
  };

  const parseList = (val: string | undefined): string[] => {
    if (!val) return [];
    try {
      const maybeJson: unknown = JSON.parse(val);
      if (Array.isArray(maybeJson)) return maybeJson.map(String);
    } catch {
      // not JSON, parse as comma separated
    }
    return val
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
  };

  const defaults = DEFAULT_RECONCILER_CONFIG;
  const pairs = parseList(read("RECONCILER_TRADING_PAIRS"));

  const config: ReconcilerConfig = {
    exchange: {
      subaccountId:
        read("RECONCILER_SUBACCOUNT_ID") ?? defaults.exchange.subaccountId,
      tradingPairs: pairs.length > 0 ? pairs : [...defaults.exchange.tradingPairs],
      restUrl: read("EXCHANGE_REST_URL") ?? defaults.exchange.restUrl,
      wsUrl: read("EXCHANGE_WS_URL") ?? defaults.exchange.wsUrl,
      requestTimeoutMs: positiveInt(
        "REQUEST_TIMEOUT_MS",
        defaults.exchange.requestTimeoutMs,
      ),
    },
    polling: {
      shortPollIntervalMs: positiveInt(
        "SHORT_POLL_INTERVAL_MS",
        defaults.polling.shortPollIntervalMs,
      ),
      longPollIntervalMs: positiveInt(
        "LONG_POLL_INTERVAL_MS",
        defaults.polling.longPollIntervalMs,
      ),
      fundingPollIntervalMs: positiveInt(
        "FUNDING_POLL_INTERVAL_MS",
        defaults.polling.fundingPollIntervalMs,
      ),
      statusPollConcurrency: positiveInt(
        "STATUS_POLL_CONCURRENCY",
        defaults.polling.statusPollConcurrency,
      ),
    },
    stream: {
      retryBaseMs: positiveInt("STREAM_RETRY_BASE_MS", defaults.stream.retryBaseMs),
      retryMaxMs: positiveInt("STREAM_RETRY_MAX_MS", defaults.stream.retryMaxMs),
    },
    orders: {
      brokerId: read("RECONCILER_BROKER_ID") ?? defaults.orders.brokerId,
      maxOrderIdLength: positiveInt(
        "RECONCILER_MAX_ORDER_ID_LENGTH",
        defaults.orders.maxOrderIdLength,
      ),
      fillEpsilon: num("FILL_EPSILON", defaults.orders.fillEpsilon),
      completedOrderHistorySize: positiveInt(
        "COMPLETED_ORDER_HISTORY_SIZE",
        defaults.orders.completedOrderHistorySize,
      ),
      fillHistorySize: positiveInt(
        "FILL_HISTORY_SIZE",
        defaults.orders.fillHistorySize,
      ),
    },
    logLevel: parseLogLevel(read("LOG_LEVEL"), read("DEBUG")),
  };

  if (config.stream.retryMaxMs < config.stream.retryBaseMs) {
    throw new ConfigurationError(
      "STREAM_RETRY_MAX_MS must be greater than or equal to STREAM_RETRY_BASE_MS",
    );
  }

  return config;
}
