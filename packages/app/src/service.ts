/**
 * Composition root.
 *
 * Wires one store, adapter, resolver and sync engine per enabled asset
 * class behind a single UnifiedRouter.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { AxiosInstance } from 'axios';
import type { AssetClass, DataSource } from '@marketsync/contracts';
import { connect, type DbConnection } from '@marketsync/db-simple';
import { LocalStore } from '@marketsync/local-store';
import { createLogger, type Logger } from '@marketsync/logger';
import { CryptoDataSource } from '@marketsync/provider-crypto';
import { BondDataSource, EquityDataSource, type EquityUpstream } from '@marketsync/provider-equity';
import { FxDataSource } from '@marketsync/provider-fx';
import { QueryCache, UnifiedRouter, loadRoutingTable, type AssetClassRoute, type MarketData } from '@marketsync/router';
import { SymbolResolver } from '@marketsync/symbol-resolver';
import { SyncEngine, type Clock } from '@marketsync/sync-engine';
import { ResilientTransport } from '@marketsync/transport';
import { enabledAssetClasses, type Config } from './config/index.js';

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_ROUTING_TABLE_PATH = fileURLToPath(new URL('../config/routing.json', import.meta.url));

export interface MarketDataServiceDependencies {
  /** Required when equity is enabled */
  equityUpstream?: EquityUpstream;

  /** Defaults to `equityUpstream` */
  bondUpstream?: EquityUpstream;

  /** Defaults to a logger built from `config.logging` */
  logger?: Logger;

  /** Pre-configured axios instances for the REST adapters */
  httpClients?: Partial<Record<'crypto' | 'fx', AxiosInstance>>;

  clock?: Clock;
}

export interface MarketDataService {
  router: UnifiedRouter;
  engines: Partial<Record<AssetClass, SyncEngine>>;

  /** Close every database connection */
  close(): Promise<void>;
}

/**
 * Logger described by the `logging` section.
 */
export function createAppLogger(config: Config): Logger {
  const { level, format, output, filePath } = config.logging;
  return createLogger({
    level,
    json: format === 'json',
    console: output !== 'file',
    filePath: output === 'console' ? undefined : filePath,
  });
}

/**
 * Example:
 * ```typescript
 * loadEnvironment();
 * const config = loadConfig(process.env);
 * const service = await createMarketDataService(config);
 *
 * await service.router.syncAll();
 * const rows = await service.router.getData({ symbol: 'BTCUSDT', startDate: '2024-01-01', endDate: '2024-01-31' });
 *
 * await service.close();
 * ```
 *
 * @throws Error when an enabled asset class cannot be built; connections
 * opened before the failure are closed
 */
export async function createMarketDataService(
  config: Config,
  deps: MarketDataServiceDependencies = {}
): Promise<MarketDataService> {
  const logger = deps.logger ?? createAppLogger(config);
  const connections: DbConnection[] = [];
  const routes: Partial<Record<AssetClass, AssetClassRoute>> = {};
  const engines: Partial<Record<AssetClass, SyncEngine>> = {};

  const close = async (): Promise<void> => {
    await Promise.all(connections.splice(0).map((db) => db.close()));
  };

  try {
    for (const assetClass of enabledAssetClasses(config)) {
      const section = config.assetClasses[assetClass];
      const source = buildSource(assetClass, config, deps, logger);

      ensureDatabaseDirectory(section.databaseUrl);
      const db = await connect(section.databaseUrl, { logger });
      connections.push(db);

      const store = new LocalStore(db, { assetClass, logger });
      await store.init();

      const resolver = new SymbolResolver(store, { logger });
      const engine = new SyncEngine(store, source, {
        logger,
        resolver,
        clock: deps.clock,
        timezone: section.timezone ?? config.sync.timezone,
        epoch: config.sync.epoch,
        inactivityDays: config.sync.inactivityDays,
        directoryMaxAgeMs: config.sync.directoryMaxAgeHours * HOUR_MS,
      });

      routes[assetClass] = { store, source, engine, resolver };
      engines[assetClass] = engine;
    }

    const table = await loadRoutingTable(config.routing.tablePath ?? DEFAULT_ROUTING_TABLE_PATH);
    const cache = new QueryCache<MarketData>({ maxEntries: config.cache.maxEntries, ttlMs: config.cache.ttlMs });
    const router = new UnifiedRouter({ table, routes, cache, logger });

    logger.info('Market data service ready', { assetClasses: Object.keys(routes), routes: table.size });
    return { router, engines, close };
  } catch (error) {
    await close();
    throw error;
  }
}

function buildSource(
  assetClass: AssetClass,
  config: Config,
  deps: MarketDataServiceDependencies,
  logger: Logger
): DataSource {
  const { timeoutMs, maxRetries, initialDelayMs } = config.transport;

  switch (assetClass) {
    case 'equity': {
      if (!deps.equityUpstream) {
        throw new Error('Asset class equity is enabled but no equity upstream was supplied');
      }
      return new EquityDataSource({
        upstream: deps.equityUpstream,
        logger,
        timezone: config.assetClasses.equity.timezone,
      });
    }

    case 'bond': {
      const upstream = deps.bondUpstream ?? deps.equityUpstream;
      if (!upstream) {
        throw new Error('Asset class bond is enabled but no bond upstream was supplied');
      }
      return new BondDataSource({ upstream, logger, timezone: config.assetClasses.bond.timezone });
    }

    case 'crypto': {
      const section = config.assetClasses.crypto;
      const transport = new ResilientTransport({
        provider: 'binance',
        baseUrl: section.baseUrl,
        httpClient: deps.httpClients?.crypto,
        timeoutMs,
        maxRetries,
        initialDelayMs,
        logger,
      });
      return new CryptoDataSource({ transport, logger, quoteAssets: section.quoteAssets });
    }

    case 'fx': {
      const section = config.assetClasses.fx;
      const transport = new ResilientTransport({
        provider: 'frankfurter',
        baseUrl: section.baseUrl,
        httpClient: deps.httpClients?.fx,
        timeoutMs,
        maxRetries,
        initialDelayMs,
        logger,
      });
      return new FxDataSource({ transport, logger, pairs: section.pairs });
    }
  }
}

/**
 * better-sqlite3 creates the file but not its directory.
 */
function ensureDatabaseDirectory(databaseUrl: string): void {
  if (!databaseUrl.startsWith('sqlite:')) return;

  const path = databaseUrl.slice('sqlite:'.length);
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
}
