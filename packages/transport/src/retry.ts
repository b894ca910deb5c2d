/**
 * @fileoverview Retry classification and backoff schedule.
 */

/**
 * HTTP statuses treated as transient.
 */
export const RETRYABLE_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504];

/**
 * Connection-level error codes (Node and axios) treated as transient.
 */
export const RETRYABLE_ERROR_CODES: readonly string[] = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_NETWORK',
];

export interface BackoffPolicy {
  /** Attempts after the first one */
  maxRetries: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  /** ±percentage applied to each delay */
  jitterPercent: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  maxRetries: 3,
  initialDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 30_000,
  jitterPercent: 25,
};

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status);
}

export function isRetryableErrorCode(code: string | undefined): boolean {
  return code !== undefined && RETRYABLE_ERROR_CODES.includes(code);
}

/**
 * Delay before retry number `attempt` (0-based).
 *
 * @param random - Source of randomness in [0, 1); injectable for tests
 *
 * @example
 * ```typescript
 * // 500ms, 1000ms, 2000ms … (before jitter), capped at maxDelayMs
 * computeBackoffDelay(2, DEFAULT_BACKOFF); // ≈ 2000
 * ```
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy, random: () => number = Math.random): number {
  const base = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt);
  const jitter = base * (policy.jitterPercent / 100);
  const delay = base + (random() * 2 - 1) * jitter;
  return Math.max(0, Math.min(Math.round(delay), policy.maxDelayMs));
}

/**
 * Parses a `Retry-After` header value (delta-seconds or HTTP date) to
 * seconds. Returns undefined when absent or unparseable.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds;
  }

  const at = Date.parse(String(value));
  if (Number.isNaN(at)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((at - now) / 1000));
}
