/**
 * @fileoverview HTTP transport shared by all REST adapters.
 *
 * Every request is bounded by a timeout and a fixed retry budget with
 * exponential backoff. Exhausting the budget surfaces as a typed error
 * instead of blocking.
 *
 * @module @marketsync/transport
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { DataRetrievalError, RateLimitExceededError } from '@marketsync/contracts';
import { createNullLogger, type Logger } from '@marketsync/logger';
import {
  DEFAULT_BACKOFF,
  computeBackoffDelay,
  isRetryableErrorCode,
  isRetryableStatus,
  parseRetryAfter,
  type BackoffPolicy,
} from './retry.js';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface TransportOptions extends Partial<BackoffPolicy> {
  /** Provider identifier carried in errors and logs */
  provider: string;

  baseUrl?: string;

  /** Per-request timeout. Defaults to 10 000 ms. */
  timeoutMs?: number;

  /** Pre-configured axios instance (tests inject one with a fake adapter) */
  httpClient?: AxiosInstance;

  logger?: Logger;

  /** Replaceable wait, so tests do not sleep */
  sleep?: (ms: number) => Promise<void>;

  random?: () => number;
}

export interface RequestOptions {
  /**
   * Aborting prevents the next retry. A request already in flight runs to
   * completion or timeout.
   */
  signal?: AbortSignal;
}

type AttemptOutcome<T> =
  | { ok: true; data: T }
  | { ok: false; retryable: boolean; status?: number; code?: string; retryAfter?: number; message: string; cause?: unknown };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * GET-only HTTP client with retry/backoff.
 *
 * Retries connection failures (reset, refused, timeout, DNS) and HTTP
 * 429/500/502/503/504. A `Retry-After` header replaces the computed delay,
 * capped at `maxDelayMs`. Other non-2xx responses fail immediately.
 *
 * @example
 * ```typescript
 * const transport = new ResilientTransport({
 *   provider: 'binance',
 *   baseUrl: 'https://api.binance.com',
 *   timeoutMs: 10_000,
 *   maxRetries: 3,
 *   logger
 * });
 *
 * const info = await transport.get<ExchangeInfo>('/api/v3/exchangeInfo');
 * ```
 */
export class ResilientTransport {
  readonly provider: string;

  private readonly http: AxiosInstance;
  private readonly policy: BackoffPolicy;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: TransportOptions) {
    this.provider = options.provider;
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 10_000,
      });
    this.policy = {
      maxRetries: options.maxRetries ?? DEFAULT_BACKOFF.maxRetries,
      initialDelayMs: options.initialDelayMs ?? DEFAULT_BACKOFF.initialDelayMs,
      backoffMultiplier: options.backoffMultiplier ?? DEFAULT_BACKOFF.backoffMultiplier,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
      jitterPercent: options.jitterPercent ?? DEFAULT_BACKOFF.jitterPercent,
    };
    this.logger = (options.logger ?? createNullLogger()).child({ component: 'transport', provider: options.provider });
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * GET `path` and return the parsed body.
   *
   * @throws RateLimitExceededError when the budget ends on a 429
   * @throws DataRetrievalError for every other failure
   */
  async get<T>(path: string, params?: QueryParams, options: RequestOptions = {}): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      const outcome = await this.attempt<T>(path, params);
      if (outcome.ok) {
        return outcome.data;
      }

      const exhausted = attempt >= this.policy.maxRetries;
      if (!outcome.retryable || exhausted || options.signal?.aborted) {
        throw this.toError(path, outcome, attempt + 1, options.signal?.aborted === true);
      }

      const computed = computeBackoffDelay(attempt, this.policy, this.random);
      const delayMs =
        outcome.retryAfter !== undefined ? Math.min(outcome.retryAfter * 1000, this.policy.maxDelayMs) : computed;

      this.logger.warn('Retrying request after transient failure', {
        path,
        attempt: attempt + 1,
        maxRetries: this.policy.maxRetries,
        delayMs,
        status: outcome.status,
        error_code: outcome.code,
      });

      await this.sleep(delayMs);

      if (options.signal?.aborted) {
        throw this.toError(path, outcome, attempt + 1, true);
      }
    }
  }

  private async attempt<T>(path: string, params: QueryParams | undefined): Promise<AttemptOutcome<T>> {
    let response: AxiosResponse<T>;
    try {
      // Statuses are classified here rather than by axios
      response = await this.http.get<T>(path, { params, validateStatus: () => true });
    } catch (error) {
      const code = axios.isAxiosError(error) ? error.code : undefined;
      return {
        ok: false,
        retryable: isRetryableErrorCode(code),
        code,
        message: error instanceof Error ? error.message : String(error),
        cause: error,
      };
    }

    if (response.status >= 200 && response.status < 300) {
      return { ok: true, data: response.data };
    }

    const headers: Record<string, unknown> = response.headers ?? {};
    return {
      ok: false,
      retryable: isRetryableStatus(response.status),
      status: response.status,
      retryAfter: parseRetryAfter(headers['retry-after']),
      message: `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
    };
  }

  private toError(
    path: string,
    outcome: Extract<AttemptOutcome<unknown>, { ok: false }>,
    attempts: number,
    cancelled: boolean
  ): Error {
    const context = { provider: this.provider, path, attempts, cancelled };

    if (outcome.status === 429) {
      return new RateLimitExceededError(`${this.provider} rate limit exceeded after ${attempts} attempt(s)`, {
        ...context,
        retryAfter: outcome.retryAfter,
      });
    }

    return new DataRetrievalError(
      `${this.provider} request to ${path} failed after ${attempts} attempt(s): ${outcome.message}`,
      { ...context, statusCode: outcome.status, error_code: outcome.code },
      { cause: outcome.cause }
    );
  }
}
