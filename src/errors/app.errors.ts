/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when an environment variable holds an invalid value
 */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Validation error - bad order parameters or local id, reported to the caller.
 * The order is never registered.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly clientOrderId?: string,
    code: string = "VALIDATION_ERROR",
  ) {
    super(message, code);
  }
}

/**
 * Duplicate order error - a client order id is already tracked
 */
export class DuplicateOrderError extends ValidationError {
  constructor(clientOrderId: string) {
    super(
      `Order ${clientOrderId} is already registered`,
      clientOrderId,
      "DUPLICATE_ORDER",
    );
  }
}

/**
 * The exchange does not know the order any more.
 * Cancel and status flows treat this as an implicit cancellation.
 */
export class NotFoundOnExchangeError extends AppError {
  constructor(
    message: string,
    public readonly clientOrderId?: string,
    cause?: Error,
  ) {
    super(message, "NOT_FOUND_ON_EXCHANGE", cause);
  }
}

/**
 * Network error - timeouts, resets, 5xx. Retried by the poll scheduler on its
 * next cycle, never synchronously.
 */
export class TransientNetworkError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    cause?: Error,
  ) {
    super(message, "TRANSIENT_NETWORK_ERROR", cause);
  }
}

/**
 * The exchange refused an order or cancel with a business reason
 */
export class ExchangeRejectionError extends AppError {
  constructor(
    message: string,
    public readonly clientOrderId?: string,
    cause?: Error,
  ) {
    super(message, "EXCHANGE_REJECTION", cause);
  }
}

/**
 * A raw payload could not be turned into a canonical update
 */
export class NormalizationError extends AppError {
  constructor(
    message: string,
    public readonly kind?: string,
    cause?: Error,
  ) {
    super(message, "NORMALIZATION_ERROR", cause);
  }
}

/** Classification of a failed transport call */
export type TransportErrorKind =
  | "not-found"
  | "rejected"
  | "transient-network"
  | "unknown";

/**
 * Error envelope returned by the transport collaborator
 */
export class TransportError extends AppError {
  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, `TRANSPORT_${kind.toUpperCase().replace(/-/g, "_")}`, cause);
  }
}

/**
 * Convert a transport error into the typed error surfaced to callers
 */
export function toCallerError(
  error: TransportError,
  clientOrderId?: string,
): AppError {
  switch (error.kind) {
    case "not-found":
      return new NotFoundOnExchangeError(error.message, clientOrderId, error);
    case "rejected":
      return new ExchangeRejectionError(error.message, clientOrderId, error);
    case "transient-network":
      return new TransientNetworkError(error.message, undefined, error);
    default:
      return new AppError(error.message, "UNKNOWN_TRANSPORT_ERROR", error);
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
