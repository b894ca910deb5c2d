/**
 * Unified entry point for market data queries.
 *
 * Holds one engine/resolver pair per asset class and serves requests from
 * the local stores, keeping them fresh on demand and memoizing results.
 *
 * Read flow:
 * 1. Route the symbol to its asset class
 * 2. Return a cached result if present
 * 3. Bring the symbol up to date, then resolve it to an active record of
 *    the kind the routing table declares
 * 4. Daily: read the store and project the fields. Intraday: ask the adapter
 * 5. Cache a copy and return
 */

import {
  MarketDataError,
  SymbolValidationError,
  assertIntervalSupported,
  assertQuoteSupported,
  normalizeDate,
  projectBars,
} from '@marketsync/contracts';
import type { AssetClass, BarRow, IntradayBar, Quote, SymbolRecord } from '@marketsync/contracts';
import { createNullLogger, type Logger } from '@marketsync/logger';
import type { ValidityResult } from '@marketsync/symbol-resolver';
import type { SyncReport } from '@marketsync/sync-engine';
import { cacheKey } from './cache-key.js';
import { QueryCache, type CacheStats } from './query-cache.js';
import type { RoutingTable } from './routing-table.js';
import type { AssetClassRoute, DataRequest, MarketData, RouteTarget } from './types.js';

export interface UnifiedRouterOptions {
  table: RoutingTable;
  routes: Partial<Record<AssetClass, AssetClassRoute>>;
  cache?: QueryCache<MarketData>;
  logger?: Logger;
}

function invalidRequest(message: string, request: DataRequest, cause?: unknown): MarketDataError {
  return new MarketDataError('INVALID_REQUEST', message, { symbol: request.symbol }, { cause });
}

function isIntradayData(data: MarketData): data is IntradayBar[] {
  const [first] = data;
  return first !== undefined && 'timestamp' in first;
}

/**
 * Row-level copy, so cached results and results handed out never share rows.
 */
function copyData(data: MarketData): MarketData {
  if (isIntradayData(data)) {
    return data.map((bar): IntradayBar => ({ ...bar }));
  }
  return data.map((row): BarRow => ({ ...row }));
}

/**
 * Example:
 * ```typescript
 * const router = new UnifiedRouter({ table, routes: { equity: equityRoute } });
 *
 * const rows = await router.getData({
 *   symbol: '000001.SZ',
 *   startDate: '2024-01-01',
 *   endDate: '2024-01-05',
 *   fields: ['close'],
 * });
 * ```
 */
export class UnifiedRouter {
  private table: RoutingTable;
  private routes: Partial<Record<AssetClass, AssetClassRoute>>;
  private cache: QueryCache<MarketData>;
  private logger: Logger;

  constructor(options: UnifiedRouterOptions) {
    this.table = options.table;
    this.routes = options.routes;
    this.cache = options.cache ?? new QueryCache<MarketData>();
    this.logger = (options.logger ?? createNullLogger()).child({ component: 'router' });
  }

  /**
   * @throws SymbolValidationError when the symbol has no route, is unknown or inactive, or is
   * not of the instrument kind the routing table declares
   * @throws MarketDataError (`INVALID_REQUEST`) for bad dates or an intraday request without an interval
   * @throws NotSupportedError when the adapter does not serve the interval
   */
  async getData(request: DataRequest): Promise<MarketData> {
    const { route, target } = this.routeFor(request.symbol);
    const frequency = request.frequency ?? 'daily';

    let key: string;
    try {
      key = cacheKey(request);
    } catch (error) {
      throw invalidRequest(error instanceof Error ? error.message : String(error), request, error);
    }

    if (frequency === 'intraday') {
      if (!request.interval) {
        throw invalidRequest('Intraday requests need an interval', request);
      }
      assertIntervalSupported(route.source, request.interval);
    }

    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug('Cache hit', { symbol: request.symbol });
      return copyData(cached);
    }

    await route.engine.ensureSymbolFresh(request.symbol);
    const record = await route.resolver.resolveActive(request.symbol);
    this.assertKind(request.symbol, target, record);

    const startDate = normalizeDate(request.startDate);
    const endDate = normalizeDate(request.endDate);
    let result: MarketData;
    if (frequency === 'intraday' && request.interval) {
      result = await route.source.getIntradayBars(record.code, request.interval, startDate, endDate);
    } else {
      result = projectBars(await route.store.queryBars(record.code, startDate, endDate), request.fields);
    }

    this.cache.set(key, copyData(result));
    this.logger.debug('Query served', { symbol: record.code, frequency, rows: result.length });
    return result;
  }

  /**
   * Latest quote from the adapter. Never cached.
   */
  async getRealtimeQuote(symbol: string): Promise<Quote> {
    const { route, target } = this.routeFor(symbol);
    assertQuoteSupported(route.source);

    const record = await route.resolver.resolve(symbol);
    if (record) {
      this.assertKind(symbol, target, record);
    }
    return route.source.getRealtimeQuote(record?.code ?? symbol.trim());
  }

  /**
   * Validity of a symbol against its asset class's directory.
   */
  async validateSymbol(symbol: string): Promise<ValidityResult> {
    return this.routeFor(symbol).route.resolver.isValid(symbol);
  }

  /**
   * Synchronize every asset class concurrently.
   */
  async syncAll(): Promise<SyncReport[]> {
    const routes = Object.values(this.routes).filter((route): route is AssetClassRoute => route !== undefined);
    const reports = await Promise.all(routes.map((route) => route.engine.sync()));

    this.logger.info('Sync of all asset classes finished', {
      assetClasses: reports.map((report) => report.assetClass),
      failed: reports.reduce((total, report) => total + report.failed.length, 0),
    });
    return reports;
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  clearCache(): void {
    this.cache.clear();
  }

  private routeFor(symbol: string): { route: AssetClassRoute; target: RouteTarget } {
    const target = this.table.route(symbol);
    if (!target) {
      throw new SymbolValidationError(`No route for symbol "${symbol}"`, { symbol });
    }

    const route = this.routes[target.assetClass];
    if (!route) {
      throw new SymbolValidationError(`Asset class ${target.assetClass} is not enabled for "${symbol}"`, {
        symbol,
        assetClass: target.assetClass,
      });
    }
    return { route, target };
  }

  private assertKind(symbol: string, target: RouteTarget, record: SymbolRecord): void {
    if (target.kind !== null && record.assetType !== target.kind) {
      throw new SymbolValidationError(
        `"${symbol}" is routed as ${target.kind} but resolves to ${record.code} (${record.assetType})`,
        { symbol, kind: target.kind, assetType: record.assetType }
      );
    }
  }
}
