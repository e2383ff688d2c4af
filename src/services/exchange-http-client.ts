/**
 * ExchangeHttpClient - axios transport for the exchange REST API
 *
 * Every call resolves to a TransportResult; nothing here throws. Error
 * envelopes in a 2xx body and axios failures are both classified into a
 * TransportError kind the scheduler and executor act on.
 *
 * Request signing is supplied by the caller through `authHeaders`.
 */

import axios, {
  type AxiosAdapter,
  type AxiosInstance,
} from "axios";
import {
  REST_PATHS,
  isOrderNotFoundMessage,
} from "../constants/exchange.constants";
import { TransportError, asError } from "../errors/app.errors";
import {
  extractExchangeError,
  isRecord,
  optionalNumber,
  optionalString,
  requireString,
} from "../normalization/fields";
import type { Logger } from "../utils/logger.util";
import type {
  ExchangeTransport,
  OrderRef,
  SubmitOrderAck,
  SubmitOrderParams,
  SymbolMapper,
  TransportResult,
} from "./interfaces";

// ============================================================================
// Error classification
// ============================================================================

const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ENOTFOUND",
  "EPIPE",
  "ERR_NETWORK",
]);

const TRANSIENT_MESSAGE_PATTERN = /ECONN|ETIMEDOUT|EAI_AGAIN|socket hang up|timeout/i;

/**
 * Kind of a business error message returned by the exchange
 */
export function classifyErrorMessage(message: string): "not-found" | "rejected" {
  return isOrderNotFoundMessage(message) ? "not-found" : "rejected";
}

/**
 * Map anything thrown by an HTTP call to a TransportError.
 *
 * - no response, network error codes, 408, 429, 5xx → transient-network
 * - 404, or a "does not exist" / "not found" message → not-found
 * - other 4xx → rejected
 * - anything else → unknown
 */
export function classifyTransportError(err: unknown): TransportError {
  if (err instanceof TransportError) return err;

  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const envelope =
      err.response !== undefined ? extractExchangeError(err.response.data) : undefined;
    const message = envelope ?? err.message;

    if (status === undefined) {
      const transient =
        (err.code !== undefined && TRANSIENT_ERROR_CODES.has(err.code)) ||
        TRANSIENT_MESSAGE_PATTERN.test(err.message);
      return new TransportError(message, transient ? "transient-network" : "unknown", undefined, err);
    }
    if (status === 408 || status === 429 || status >= 500) {
      return new TransportError(message, "transient-network", status, err);
    }
    if (status === 404 || isOrderNotFoundMessage(message)) {
      return new TransportError(message, "not-found", status, err);
    }
    if (status >= 400) {
      return new TransportError(message, "rejected", status, err);
    }
    return new TransportError(message, "unknown", status, err);
  }

  const error = asError(err);
  const kind = TRANSIENT_MESSAGE_PATTERN.test(error.message) ? "transient-network" : "unknown";
  return new TransportError(error.message, kind, undefined, error);
}

// ============================================================================
// Client
// ============================================================================

export interface ExchangeHttpClientOptions {
  baseURL: string;
  timeoutMs: number;
  subaccountId: string;
  symbols: SymbolMapper;
  logger: Logger;
  /** Signing headers added to every request */
  authHeaders?: () => Record<string, string>;
  /** Replaces the network adapter (tests) */
  adapter?: AxiosAdapter;
}

type Body = Record<string, unknown>;

export class ExchangeHttpClient implements ExchangeTransport {
  private readonly http: AxiosInstance;
  private readonly subaccountId: number | string;

  constructor(private readonly options: ExchangeHttpClientOptions) {
    this.http = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      headers: { "Content-Type": "application/json" },
      adapter: options.adapter,
    });

    const { authHeaders } = options;
    if (authHeaders) {
      this.http.interceptors.request.use((config) => {
        for (const [name, value] of Object.entries(authHeaders())) {
          config.headers.set(name, value);
        }
        return config;
      });
    }

    const numericId = Number(options.subaccountId);
    this.subaccountId = Number.isInteger(numericId) ? numericId : options.subaccountId;
  }

  async submitOrder(params: SubmitOrderParams): Promise<TransportResult<SubmitOrderAck>> {
    const instrument = this.instrumentFor(params.tradingPair);
    if (!instrument.success) return instrument;

    const body: Body = {
      subaccount_id: this.subaccountId,
      instrument_name: instrument.data,
      direction: params.side === "BUY" ? "buy" : "sell",
      order_type: params.orderType === "MARKET" ? "market" : "limit",
      time_in_force: params.orderType === "LIMIT_MAKER" ? "post_only" : "gtc",
      amount: String(params.amount),
      label: params.clientOrderId,
    };
    if (params.price !== undefined) body.limit_price = String(params.price);

    const result = await this.post(REST_PATHS.SUBMIT_ORDER, body);
    if (!result.success) return result;

    const order = extractOrder(result.data);
    if (!order) {
      return failure(new TransportError("Order acknowledgment without order_id", "unknown"));
    }
    try {
      return {
        success: true,
        data: {
          exchangeOrderId: requireString(order, "order_id"),
          acceptedTimestamp: optionalNumber(
            order,
            "creation_timestamp",
            optionalNumber(order, "last_update_timestamp", Date.now()),
          ),
        },
      };
    } catch (err) {
      return failure(new TransportError(asError(err).message, "unknown", undefined, asError(err)));
    }
  }

  async cancelOrder(ref: OrderRef): Promise<TransportResult<boolean>> {
    const instrument = this.instrumentFor(ref.tradingPair);
    if (!instrument.success) return instrument;

    const result = await this.post(REST_PATHS.CANCEL_ORDER, {
      subaccount_id: this.subaccountId,
      instrument_name: instrument.data,
      order_id: ref.exchangeOrderId,
    });
    if (!result.success) return result;

    // A cancel that raced a fill comes back with the order's final status instead
    const order = extractOrder(result.data);
    const status = order ? optionalString(order, "order_status") : undefined;
    if (status !== "cancelled") {
      this.options.logger.debug(
        `[ExchangeHttp] Cancel of ${ref.exchangeOrderId} answered with status ${status ?? "none"}`,
      );
    }
    return { success: true, data: status === "cancelled" };
  }

  fetchOrderStatus(ref: OrderRef): Promise<TransportResult<unknown>> {
    return this.post(REST_PATHS.GET_ORDER, {
      subaccount_id: this.subaccountId,
      order_id: ref.exchangeOrderId,
    });
  }

  fetchTradeHistory(): Promise<TransportResult<unknown>> {
    return this.post(REST_PATHS.TRADE_HISTORY, { subaccount_id: this.subaccountId });
  }

  fetchBalances(): Promise<TransportResult<unknown>> {
    return this.post(REST_PATHS.COLLATERALS, { subaccount_id: this.subaccountId });
  }

  fetchPositions(): Promise<TransportResult<unknown>> {
    return this.post(REST_PATHS.POSITIONS, { subaccount_id: this.subaccountId });
  }

  fetchFundingHistory(
    tradingPair: string,
    sinceMs: number,
  ): Promise<TransportResult<unknown>> {
    const instrument = this.instrumentFor(tradingPair);
    if (!instrument.success) return Promise.resolve(instrument);

    return this.post(REST_PATHS.FUNDING_HISTORY, {
      subaccount_id: this.subaccountId,
      instrument_name: instrument.data,
      start_timestamp: sinceMs,
    });
  }

  fetchInstruments(): Promise<TransportResult<unknown>> {
    return this.post(REST_PATHS.INSTRUMENTS, {
      instrument_type: "perp",
      expired: false,
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private
  // ═══════════════════════════════════════════════════════════════════════════

  private async post(path: string, body: Body): Promise<TransportResult<unknown>> {
    try {
      const response = await this.http.post<unknown>(path, body);
      const envelope = extractExchangeError(response.data);
      if (envelope !== undefined) {
        const error = new TransportError(envelope, classifyErrorMessage(envelope), response.status);
        this.options.logger.debug(`[ExchangeHttp] ${path}: ${error.kind} (${envelope})`);
        return failure(error);
      }
      return { success: true, data: response.data };
    } catch (err) {
      const error = classifyTransportError(err);
      this.options.logger.debug(`[ExchangeHttp] ${path}: ${error.kind} (${error.message})`);
      return failure(error);
    }
  }

  private instrumentFor(tradingPair: string): TransportResult<string> {
    const symbol = this.options.symbols.toExchangeSymbol(tradingPair);
    if (symbol === undefined) {
      return failure(new TransportError(`No exchange symbol for ${tradingPair}`, "rejected"));
    }
    return { success: true, data: symbol };
  }
}

function failure(error: TransportError): { success: false; error: TransportError } {
  return { success: false, error };
}

/** `{ result: { order: {...} } }`, `{ result: {...} }` or the bare order */
function extractOrder(payload: unknown): Record<string, unknown> | undefined {
  const body = isRecord(payload) && "result" in payload ? payload.result : payload;
  if (!isRecord(body)) return undefined;
  return isRecord(body.order) ? body.order : body;
}
