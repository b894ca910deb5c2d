/**
 * @fileoverview Market data types shared by every asset class.
 *
 * Pure data structures describing the symbol directory, standardized daily
 * bars, intraday bars and quotes. No I/O lives here.
 *
 * @module @marketsync/contracts/market
 */

/**
 * Category of tradable instrument. Each asset class is served by exactly one
 * provider adapter and owns exactly one local store.
 */
export type AssetClass = 'equity' | 'bond' | 'crypto' | 'fx';

export const ASSET_CLASSES: readonly AssetClass[] = ['equity', 'bond', 'crypto', 'fx'];

/**
 * Instrument kind recorded in the symbol directory.
 */
export type AssetType =
  | 'equity'
  | 'index'
  | 'other'
  | 'convertible-bond'
  | 'fund'
  | 'crypto'
  | 'fx';

export const ASSET_TYPES: readonly AssetType[] = [
  'equity',
  'index',
  'other',
  'convertible-bond',
  'fund',
  'crypto',
  'fx',
];

export function isAssetType(value: unknown): value is AssetType {
  return ASSET_TYPES.some((type) => type === value);
}

/**
 * Intraday bar interval.
 */
export type Interval = '1m' | '5m' | '15m' | '30m' | '1h' | '4h';

export const INTERVALS: readonly Interval[] = ['1m', '5m', '15m', '30m', '1h', '4h'];

/**
 * Query frequency accepted by the router.
 */
export type Frequency = 'daily' | 'intraday';

/**
 * One instrument as returned by a provider's bulk directory query.
 *
 * @example
 * ```typescript
 * const listing: SymbolListing = {
 *   code: '000001',
 *   displayName: 'Ping An Bank',
 *   fullCode: '000001.SZ',
 *   exchange: 'SZ',
 *   assetType: 'equity',
 *   listingDate: '1991-04-03',
 *   isActive: true
 * };
 * ```
 */
export interface SymbolListing {
  /** Bare exchange code, unique within an asset class */
  code: string;

  displayName: string;

  /** Code + exchange composite, e.g. `000001.SZ` or `BTCUSDT.BINANCE` */
  fullCode: string;

  exchange: string;

  assetType: AssetType;

  /** `YYYY-MM-DD`, or null when the provider does not publish it */
  listingDate: string | null;

  isActive: boolean;
}

/**
 * A directory row as held by the local store.
 *
 * @invariant code is unique within an asset class
 * @invariant records are never deleted; stale ones are flagged inactive
 */
export interface SymbolRecord extends SymbolListing {
  /** ISO 8601 timestamp of the last directory pull that observed this record */
  lastUpdated: string;
}

/**
 * Scalar auxiliary fields a provider may attach to a bar.
 */
export type BarExtras = Record<string, string | number | null>;

/**
 * Standardized daily bar.
 *
 * @invariant (code, date) is unique in a local store
 */
export interface HistoricalBar {
  code: string;
  name: string;
  assetType: AssetType;

  /** Trading date, `YYYY-MM-DD` */
  date: string;

  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;

  /** Traded value in quote currency */
  turnover: number | null;

  /** Percent change against the previous close */
  pctChange: number | null;

  extras?: BarExtras;
}

/**
 * Fields a caller may request from {@link HistoricalBar}. `code` and `date`
 * are always returned.
 */
export type BarField = Exclude<keyof HistoricalBar, 'code' | 'date'>;

export const BAR_FIELDS: readonly BarField[] = [
  'name',
  'assetType',
  'open',
  'high',
  'low',
  'close',
  'volume',
  'turnover',
  'pctChange',
  'extras',
];

/**
 * A daily bar projected to a subset of fields.
 */
export type BarRow = Pick<HistoricalBar, 'code' | 'date'> & Partial<Omit<HistoricalBar, 'code' | 'date'>>;

/**
 * Intraday OHLCV bar. Intraday data is served straight from the adapter and
 * never persisted.
 */
export interface IntradayBar {
  code: string;

  /** ISO 8601 timestamp of the bar as reported upstream (UTC) */
  timestamp: string;

  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Latest quote snapshot.
 */
export interface Quote {
  code: string;
  price: number;
  open: number | null;
  high: number | null;
  low: number | null;
  previousClose: number | null;
  volume: number | null;

  /** ISO 8601 timestamp of the quote */
  timestamp: string;
}

export interface AssetMetadata {
  fullCode: string;
  name: string;
  assetType: AssetType;
  listingDate: string | null;
}
