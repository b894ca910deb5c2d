/**
 * Request and result types for the unified router.
 */

import type { AssetClass, AssetType, BarField, BarRow, Frequency, IntradayBar, Interval } from '@marketsync/contracts';
import type { DataSource } from '@marketsync/contracts';
import type { LocalStore } from '@marketsync/local-store';
import type { SymbolResolver } from '@marketsync/symbol-resolver';
import type { SyncEngine } from '@marketsync/sync-engine';

/**
 * A data query.
 *
 * @example
 * ```typescript
 * const request: DataRequest = {
 *   symbol: '000001.SZ',
 *   startDate: '2024-01-01',
 *   endDate: '2024-01-05',
 *   fields: ['close'],
 * };
 * ```
 */
export interface DataRequest {
  symbol: string;
  startDate: string;
  endDate: string;

  /** @default 'daily' */
  frequency?: Frequency;

  /** Required for intraday requests */
  interval?: Interval;

  /** Daily fields to return; every field when omitted */
  fields?: readonly BarField[];
}

export type MarketData = BarRow[] | IntradayBar[];

export interface RouteTarget {
  assetClass: AssetClass;

  /** Instrument type when the table declares one */
  kind: AssetType | null;
}

/**
 * Everything the router holds for one asset class.
 */
export interface AssetClassRoute {
  store: LocalStore;
  source: DataSource;
  engine: SyncEngine;
  resolver: SymbolResolver;
}
