/**
 * @fileoverview The provider contract every asset-class adapter satisfies.
 *
 * @module @marketsync/contracts/data-source
 */

import type {
  AssetClass,
  AssetMetadata,
  BarField,
  BarRow,
  HistoricalBar,
  IntradayBar,
  Interval,
  Quote,
  SymbolListing,
} from './market.js';

/**
 * Declared capabilities of an adapter. Callers check these instead of probing
 * for failures; calling an undeclared capability throws `NotSupportedError`.
 *
 * @example
 * ```typescript
 * const caps: DataSourceCapabilities = {
 *   intraday: ['5m', '15m', '30m', '1h'],
 *   realtimeQuote: false,
 *   session: true
 * };
 * ```
 */
export interface DataSourceCapabilities {
  /** Intraday intervals the upstream serves; empty when it has none */
  intraday: Interval[];

  realtimeQuote: boolean;

  /** Upstream requires explicit login/logout around a batch */
  session: boolean;
}

/**
 * An acquired upstream session. Released exactly once by whoever opened it.
 */
export interface ProviderSession {
  close(): Promise<void>;
}

/**
 * Uniform data-source contract.
 *
 * Adapters perform network I/O only; persistence belongs to the
 * synchronization engine that wraps them. Errors:
 * - `DataRetrievalError` when upstream is unreachable after retries
 * - `DataStandardizationError` when the payload cannot be mapped
 * - `RateLimitExceededError` when throttled beyond backoff
 * - `NotSupportedError` for undeclared capabilities
 * - `SymbolValidationError` from {@link DataSource.getAssetMetadata}
 */
export interface DataSource {
  /** Provider identifier used in logs and error payloads */
  readonly id: string;

  readonly assetClass: AssetClass;

  readonly capabilities: DataSourceCapabilities;

  /** Bulk directory query. Providers expose no deltas, so this is always the full list. */
  listSymbols(): Promise<SymbolListing[]>;

  /**
   * Standardized daily bars for `code` in the closed range `[startDate, endDate]`,
   * ascending by date.
   */
  fetchDailyBars(code: string, startDate: string, endDate: string): Promise<HistoricalBar[]>;

  /**
   * Same as {@link DataSource.fetchDailyBars} but restricted to `fields`
   * (all fields when omitted).
   */
  getDailyBars(
    symbol: string,
    startDate: string,
    endDate: string,
    fields?: readonly BarField[]
  ): Promise<BarRow[]>;

  getIntradayBars(symbol: string, interval: Interval, startDate: string, endDate: string): Promise<IntradayBar[]>;

  getRealtimeQuote(symbol: string): Promise<Quote>;

  validateSymbol(symbol: string): Promise<boolean>;

  getAssetMetadata(symbol: string): Promise<AssetMetadata>;

  /** Present only when `capabilities.session` is true */
  openSession?(): Promise<ProviderSession>;
}
