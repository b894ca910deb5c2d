/**
 * @fileoverview Error taxonomy for market data retrieval and synchronization.
 *
 * Every error extends {@link MarketDataError} and carries a machine-readable
 * code, a structured data payload and the ISO timestamp it was raised at.
 *
 * @module @marketsync/contracts/errors
 */

/**
 * Base error class for all market data errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 */
export class MarketDataError extends Error {
  readonly code: string;
  readonly data?: Record<string, unknown>;
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MarketDataError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Symbol not found, inactive, or malformed. Surfaced to the caller and never
 * retried.
 *
 * @example
 * ```typescript
 * throw new SymbolValidationError('Symbol "999999" not found', { symbol: '999999' });
 * ```
 */
export class SymbolValidationError extends MarketDataError {
  constructor(message: string, data: { symbol: string; [key: string]: unknown }) {
    super('SYMBOL_VALIDATION', message, data);
    this.name = 'SymbolValidationError';
  }
}

/**
 * Upstream unreachable, or the transport's retry budget is spent.
 */
export class DataRetrievalError extends MarketDataError {
  readonly statusCode?: number;

  constructor(
    message: string,
    data: { provider: string; statusCode?: number; [key: string]: unknown },
    options?: { cause?: unknown }
  ) {
    super('DATA_RETRIEVAL', message, data, options);
    this.name = 'DataRetrievalError';
    this.statusCode = data.statusCode;
  }
}

/**
 * Upstream payload could not be mapped to the standard shape.
 */
export class DataStandardizationError extends MarketDataError {
  constructor(message: string, data: { provider: string; [key: string]: unknown }) {
    super('DATA_STANDARDIZATION', message, data);
    this.name = 'DataStandardizationError';
  }
}

/**
 * Upstream throttling that backoff could not absorb. A synchronization batch
 * stops calling the provider when it sees this.
 */
export class RateLimitExceededError extends MarketDataError {
  /** Seconds the provider asked us to wait, when it said */
  readonly retryAfter?: number;

  constructor(message: string, data: { provider: string; retryAfter?: number; [key: string]: unknown }) {
    super('RATE_LIMIT_EXCEEDED', message, data);
    this.name = 'RateLimitExceededError';
    this.retryAfter = data.retryAfter;
  }
}

/**
 * The adapter does not offer the requested capability (intraday interval,
 * realtime quote). A declared limitation, not a failure.
 */
export class NotSupportedError extends MarketDataError {
  readonly capability: string;

  constructor(message: string, data: { provider: string; capability: string; [key: string]: unknown }) {
    super('NOT_SUPPORTED', message, data);
    this.name = 'NotSupportedError';
    this.capability = data.capability;
  }
}

export function isMarketDataError(error: unknown): error is MarketDataError {
  return error instanceof MarketDataError;
}

export function isSymbolValidationError(error: unknown): error is SymbolValidationError {
  return error instanceof SymbolValidationError;
}

export function isDataRetrievalError(error: unknown): error is DataRetrievalError {
  return error instanceof DataRetrievalError;
}

export function isDataStandardizationError(error: unknown): error is DataStandardizationError {
  return error instanceof DataStandardizationError;
}

export function isRateLimitExceededError(error: unknown): error is RateLimitExceededError {
  return error instanceof RateLimitExceededError;
}

export function isNotSupportedError(error: unknown): error is NotSupportedError {
  return error instanceof NotSupportedError;
}

/**
 * Log-safe representation of any thrown value.
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof MarketDataError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}
