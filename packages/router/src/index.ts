/**
 * @marketsync/router
 *
 * Routing table, bounded query cache and the unified data entry point
 */

export { UnifiedRouter, type UnifiedRouterOptions } from './router.js';
export { QueryCache, type QueryCacheOptions, type CacheStats } from './query-cache.js';
export { cacheKey } from './cache-key.js';
export {
  RoutingTable,
  RoutingTableSchema,
  loadRoutingTable,
  parseRoutingTable,
  type RoutingTableData,
} from './routing-table.js';
export type { AssetClassRoute, DataRequest, MarketData, RouteTarget } from './types.js';
