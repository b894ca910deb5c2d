/**
 * Configuration loading and management
 */

import dotenv from 'dotenv';
import { ASSET_CLASSES, type AssetClass } from '@marketsync/contracts';
import type { Logger } from '@marketsync/logger';
import { configSchema, envMapping, listEnvKeys, type Config } from './schema.js';

type RawConfig = { [key: string]: unknown };

export type Environment = Record<string, string | undefined>;

/**
 * Load configuration from environment variables and defaults.
 *
 * @throws Error listing every invalid setting
 */
export function loadConfig(env: Environment = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined) {
      setNestedProperty(rawConfig, configPath, listEnvKeys.has(envKey) ? parseList(value) : parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Read a `.env` file into `process.env`. Variables already set win. A
 * missing default `.env` is not an error; a missing explicit `path` is.
 *
 * @returns The variables the file defined
 */
export function loadEnvironment(path?: string): Record<string, string> {
  const result = dotenv.config(path ? { path } : undefined);

  if (result.error) {
    if (!path && isMissingFile(result.error)) {
      return {};
    }
    throw result.error;
  }

  return result.parsed ?? {};
}

function isMissingFile(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRawConfig(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): boolean | number | string {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function enabledAssetClasses(config: Config): AssetClass[] {
  return ASSET_CLASSES.filter((assetClass) => config.assetClasses[assetClass].enabled);
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    assetClasses: enabledAssetClasses(config),
    cache: {
      maxEntries: config.cache.maxEntries,
      ttlMs: config.cache.ttlMs ?? null,
    },
    sync: {
      timezone: config.sync.timezone,
      directoryMaxAgeHours: config.sync.directoryMaxAgeHours,
    },
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      output: config.logging.output,
    },
  };
}

export { configSchema, envMapping, listEnvKeys } from './schema.js';
export type { Config } from './schema.js';
