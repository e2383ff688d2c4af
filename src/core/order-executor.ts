/**
 * OrderExecutor - Order submission and cancellation flow
 *
 * Placement registers the order before the network call, so push events that
 * race ahead of the acknowledgment still find their owner through the client
 * order id label. Transport failures are never retried synchronously: the
 * poll scheduler converges state on its next cycle.
 */

import {
  AppError,
  ExchangeRejectionError,
  TransientNetworkError,
  ValidationError,
  toCallerError,
} from "../errors/app.errors";
import type { OrderRequest, OrderSide, TrackedOrder } from "../models/order";
import type { ExchangeTransport, SymbolMapper } from "../services/interfaces";
import type { Logger } from "../utils/logger.util";
import { createClientOrderId } from "./client-order-id";
import type { OrderRegistry } from "./order-registry";
import type { ReconciliationEngine } from "./reconciliation-engine";

export type PlaceOrderParams = OrderRequest;

export interface OrderExecutorOptions {
  brokerId: string;
  maxOrderIdLength: number;
  now?: () => number;
  /** Overrides id generation (tests) */
  generateClientOrderId?: (side: OrderSide, tradingPair: string) => string;
}

export class OrderExecutor {
  private readonly now: () => number;
  private readonly generateId: (side: OrderSide, tradingPair: string) => string;

  constructor(
    private readonly transport: ExchangeTransport,
    private readonly symbols: SymbolMapper,
    private readonly registry: OrderRegistry,
    private readonly engine: ReconciliationEngine,
    private readonly logger: Logger,
    options: OrderExecutorOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.generateId =
      options.generateClientOrderId ??
      ((side, tradingPair) =>
        createClientOrderId(side, tradingPair, {
          brokerId: options.brokerId,
          maxOrderIdLength: options.maxOrderIdLength,
          now: this.now,
        }));
  }

  /**
   * Submit a new order and return its tracked state after the acknowledgment.
   * @throws ValidationError for bad parameters (nothing is registered)
   * @throws ExchangeRejectionError after marking it FAILED
   * @throws TransientNetworkError with the order left tracked
   */
  async placeOrder(params: PlaceOrderParams): Promise<TrackedOrder> {
    this.validate(params);

    const clientOrderId = this.generateId(params.side, params.tradingPair);
    this.registry.register({
      clientOrderId,
      tradingPair: params.tradingPair,
      side: params.side,
      orderType: params.orderType,
      price: params.price ?? 0,
      amount: params.amount,
      createdAt: this.now(),
    });

    this.logger.info(
      `[OrderExecutor] Placing ${params.orderType} ${params.side} ${params.amount} ${params.tradingPair}` +
        `${params.price !== undefined ? ` @ ${params.price}` : ""} (${clientOrderId})`,
    );

    const result = await this.transport.submitOrder({ ...params, clientOrderId });

    if (!result.success) {
      if (result.error.kind === "rejected" || result.error.kind === "not-found") {
        this.registry.markFailed(clientOrderId, result.error.message);
      } else {
        // The exchange may still have accepted it; stream and polls settle the state
        this.logger.warn(
          `[OrderExecutor] Outcome of ${clientOrderId} unknown (${result.error.kind}), keeping it tracked`,
        );
      }
      const error =
        result.error.kind === "transient-network"
          ? new TransientNetworkError(
              `Submission of ${clientOrderId} failed: ${result.error.message}`,
              "submitOrder",
              result.error,
            )
          : result.error.kind === "unknown"
            ? toCallerError(result.error, clientOrderId)
            : new ExchangeRejectionError(
                `Order ${clientOrderId} rejected: ${result.error.message}`,
                clientOrderId,
                result.error,
              );
      this.logger.error(`[OrderExecutor] ${error.message}`, error);
      throw error;
    }

    const { exchangeOrderId, acceptedTimestamp } = result.data;
    this.registry.setExchangeOrderId(clientOrderId, exchangeOrderId);
    this.registry.applyStatusUpdate({
      type: "order-status",
      source: "poll",
      clientOrderId,
      exchangeOrderId,
      tradingPair: params.tradingPair,
      state: "OPEN",
      timestamp: acceptedTimestamp,
    });

    const tracked = this.registry.get(clientOrderId);
    if (!tracked) {
      throw new AppError(`Order ${clientOrderId} vanished after acknowledgment`);
    }
    return tracked;
  }

  /**
   * Request cancellation. Resolves true once the order is known cancelled
   * (confirmed, or unknown to the exchange), false when there is nothing to
   * cancel.
   */
  async cancelOrder(clientOrderId: string): Promise<boolean> {
    const order = this.registry.get(clientOrderId);
    if (!order || !this.registry.isActive(clientOrderId)) {
      this.logger.warn(`[OrderExecutor] Cancel ignored: ${clientOrderId} is not active`);
      return false;
    }
    if (order.exchangeOrderId === undefined) {
      this.logger.warn(
        `[OrderExecutor] Cancel ignored: ${clientOrderId} not yet acknowledged by the exchange`,
      );
      return false;
    }

    const result = await this.transport.cancelOrder({
      clientOrderId,
      exchangeOrderId: order.exchangeOrderId,
      tradingPair: order.tradingPair,
    });

    if (result.success) {
      if (!result.data) {
        this.logger.warn(`[OrderExecutor] Exchange did not confirm cancel of ${clientOrderId}`);
        return false;
      }
      this.engine.applyCancellation(clientOrderId, "confirmed");
      return true;
    }

    if (result.error.kind === "not-found") {
      this.engine.applyCancellation(clientOrderId, "not-found");
      return true;
    }

    // A rejected cancel leaves the order as it is
    const error = toCallerError(result.error, clientOrderId);
    this.logger.error(`[OrderExecutor] Cancel of ${clientOrderId} failed: ${error.message}`, error);
    throw error;
  }

  private validate(params: PlaceOrderParams): void {
    if (this.symbols.toExchangeSymbol(params.tradingPair) === undefined) {
      throw new ValidationError(`Unknown trading pair ${params.tradingPair}`);
    }
    if (!Number.isFinite(params.amount) || params.amount <= 0) {
      throw new ValidationError(`Order amount must be positive, got ${params.amount}`);
    }
    if (params.orderType === "MARKET") return;
    if (
      params.price === undefined ||
      !Number.isFinite(params.price) ||
      params.price <= 0
    ) {
      throw new ValidationError(
        `${params.orderType} order requires a positive price, got ${String(params.price)}`,
      );
    }
  }
}
