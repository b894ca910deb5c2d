/**
 * @fileoverview Main entry point for @marketsync/transport.
 *
 * @module @marketsync/transport
 */

export { ResilientTransport } from './resilient-transport.js';
export type { TransportOptions, RequestOptions, QueryParams } from './resilient-transport.js';

export {
  RETRYABLE_STATUS_CODES,
  RETRYABLE_ERROR_CODES,
  DEFAULT_BACKOFF,
  isRetryableStatus,
  isRetryableErrorCode,
  computeBackoffDelay,
  parseRetryAfter,
} from './retry.js';
export type { BackoffPolicy } from './retry.js';
