/**
 * @fileoverview Main entry point for @marketsync/contracts.
 *
 * @module @marketsync/contracts
 */

// Market data types
export type {
  AssetClass,
  AssetType,
  Interval,
  Frequency,
  SymbolListing,
  SymbolRecord,
  BarExtras,
  HistoricalBar,
  BarField,
  BarRow,
  IntradayBar,
  Quote,
  AssetMetadata,
} from './market.js';

export { ASSET_CLASSES, ASSET_TYPES, INTERVALS, BAR_FIELDS, isAssetType } from './market.js';

// Provider contract
export type { DataSource, DataSourceCapabilities, ProviderSession } from './data-source.js';

// Error classes and guards
export {
  MarketDataError,
  SymbolValidationError,
  DataRetrievalError,
  DataStandardizationError,
  RateLimitExceededError,
  NotSupportedError,
  isMarketDataError,
  isSymbolValidationError,
  isDataRetrievalError,
  isDataStandardizationError,
  isRateLimitExceededError,
  isNotSupportedError,
  serializeError,
} from './errors.js';

// Helpers
export { supportsInterval, assertIntervalSupported, assertQuoteSupported } from './capabilities.js';
export { formatDate, isIsoDate, normalizeDate, addDays, maxDate } from './dates.js';
export { projectBar, projectBars } from './projection.js';
