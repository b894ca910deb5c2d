/**
 * @marketsync/app
 *
 * Configuration loading and the composition root of the market data service
 */

export {
  loadConfig,
  loadEnvironment,
  getConfigSummary,
  enabledAssetClasses,
  configSchema,
  envMapping,
  type Config,
  type Environment,
} from './config/index.js';
export {
  createMarketDataService,
  createAppLogger,
  DEFAULT_ROUTING_TABLE_PATH,
  type MarketDataService,
  type MarketDataServiceDependencies,
} from './service.js';
