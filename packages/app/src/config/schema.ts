/**
 * Configuration schema using Zod
 */

import moment from 'moment-timezone';
import { z } from 'zod';
import { isIsoDate } from '@marketsync/contracts';

const timezone = z.string().refine((name) => moment.tz.zone(name) !== null, { message: 'Unknown timezone' });

const isoDate = z.coerce.string().refine(isIsoDate, { message: 'Expected a YYYY-MM-DD date' });

const list = z.array(z.string().min(1));

/**
 * Fields shared by every asset class. `timezone` overrides `sync.timezone`
 * when deciding which market day "today" is.
 */
const assetClassFields = {
  enabled: z.boolean(),
  databaseUrl: z.string().min(1),
  baseUrl: z.string().url().optional(),
  timezone: timezone.optional(),
};

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
      name: z.string().default('marketsync'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      output: z.enum(['console', 'file', 'both']).default('console'),
      filePath: z.string().optional(),
    })
    .refine((logging) => logging.output === 'console' || logging.filePath !== undefined, {
      message: 'A log file path is required when writing to a file',
      path: ['filePath'],
    })
    .default({}),

  cache: z
    .object({
      maxEntries: z.number().int().positive().default(1000),
      ttlMs: z.number().int().positive().optional(),
    })
    .default({}),

  sync: z
    .object({
      epoch: isoDate.default('1990-12-19'),
      timezone: timezone.default('UTC'),
      inactivityDays: z.number().int().positive().default(30),
      directoryMaxAgeHours: z.number().positive().default(24),
    })
    .default({}),

  transport: z
    .object({
      timeoutMs: z.number().int().positive().default(10_000),
      maxRetries: z.number().int().min(0).default(3),
      initialDelayMs: z.number().int().min(0).default(500),
    })
    .default({}),

  assetClasses: z
    .object({
      equity: z
        .object({
          ...assetClassFields,
          enabled: assetClassFields.enabled.default(false),
          databaseUrl: assetClassFields.databaseUrl.default('sqlite:data/equity.db'),
          timezone: timezone.default('Asia/Shanghai'),
        })
        .default({}),
      bond: z
        .object({
          ...assetClassFields,
          enabled: assetClassFields.enabled.default(false),
          databaseUrl: assetClassFields.databaseUrl.default('sqlite:data/bond.db'),
          timezone: timezone.default('Asia/Shanghai'),
        })
        .default({}),
      crypto: z
        .object({
          ...assetClassFields,
          enabled: assetClassFields.enabled.default(true),
          databaseUrl: assetClassFields.databaseUrl.default('sqlite:data/crypto.db'),
          baseUrl: z.string().url().default('https://api.binance.com'),
          quoteAssets: list.default(['USDT']),
        })
        .default({}),
      fx: z
        .object({
          ...assetClassFields,
          enabled: assetClassFields.enabled.default(true),
          databaseUrl: assetClassFields.databaseUrl.default('sqlite:data/fx.db'),
          baseUrl: z.string().url().default('https://api.frankfurter.app'),
          pairs: list.min(1).default(['USDCNY', 'EURUSD', 'USDJPY', 'GBPUSD']),
        })
        .default({}),
    })
    .default({}),

  routing: z
    .object({
      /** JSON routing table. The table shipped in `config/routing.json` when omitted. */
      tablePath: z.string().optional(),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_OUTPUT: 'logging.output',
  LOG_FILE: 'logging.filePath',
  CACHE_MAX_ENTRIES: 'cache.maxEntries',
  CACHE_TTL_MS: 'cache.ttlMs',
  SYNC_EPOCH: 'sync.epoch',
  SYNC_TIMEZONE: 'sync.timezone',
  SYNC_INACTIVITY_DAYS: 'sync.inactivityDays',
  SYNC_DIRECTORY_MAX_AGE_HOURS: 'sync.directoryMaxAgeHours',
  TRANSPORT_TIMEOUT_MS: 'transport.timeoutMs',
  TRANSPORT_MAX_RETRIES: 'transport.maxRetries',
  TRANSPORT_INITIAL_DELAY_MS: 'transport.initialDelayMs',
  EQUITY_ENABLED: 'assetClasses.equity.enabled',
  EQUITY_DATABASE_URL: 'assetClasses.equity.databaseUrl',
  EQUITY_TIMEZONE: 'assetClasses.equity.timezone',
  BOND_ENABLED: 'assetClasses.bond.enabled',
  BOND_DATABASE_URL: 'assetClasses.bond.databaseUrl',
  BOND_TIMEZONE: 'assetClasses.bond.timezone',
  CRYPTO_ENABLED: 'assetClasses.crypto.enabled',
  CRYPTO_DATABASE_URL: 'assetClasses.crypto.databaseUrl',
  CRYPTO_BASE_URL: 'assetClasses.crypto.baseUrl',
  CRYPTO_QUOTE_ASSETS: 'assetClasses.crypto.quoteAssets',
  FX_ENABLED: 'assetClasses.fx.enabled',
  FX_DATABASE_URL: 'assetClasses.fx.databaseUrl',
  FX_BASE_URL: 'assetClasses.fx.baseUrl',
  FX_PAIRS: 'assetClasses.fx.pairs',
  ROUTING_TABLE_PATH: 'routing.tablePath',
};

/**
 * Variables holding comma-separated lists
 */
export const listEnvKeys: ReadonlySet<string> = new Set(['CRYPTO_QUOTE_ASSETS', 'FX_PAIRS']);
