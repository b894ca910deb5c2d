/**
 * Tests for configuration loading
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import { getConfigSummary, loadConfig, loadEnvironment } from '../src/config/index.js';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.logging).toEqual({ level: 'info', format: 'pretty', output: 'console' });
    expect(config.cache).toEqual({ maxEntries: 1000 });
    expect(config.sync).toEqual({
      epoch: '1990-12-19',
      timezone: 'UTC',
      inactivityDays: 30,
      directoryMaxAgeHours: 24,
    });
    expect(config.assetClasses.equity).toEqual({
      enabled: false,
      databaseUrl: 'sqlite:data/equity.db',
      timezone: 'Asia/Shanghai',
    });
    expect(config.assetClasses.fx.pairs).toEqual(['USDCNY', 'EURUSD', 'USDJPY', 'GBPUSD']);
    expect(config.assetClasses.crypto.baseUrl).toBe('https://api.binance.com');
    expect(config.routing.tablePath).toBeUndefined();
  });

  it('should coerce environment values', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      CACHE_MAX_ENTRIES: '50',
      CACHE_TTL_MS: '60000',
      SYNC_EPOCH: '2000-01-04',
      EQUITY_ENABLED: 'true',
      EQUITY_DATABASE_URL: 'postgresql://localhost/equity',
      CRYPTO_ENABLED: 'false',
      FX_PAIRS: 'USDCNY, eurusd,',
      ROUTING_TABLE_PATH: '/etc/marketsync/routing.json',
    });

    expect(config.logging.level).toBe('debug');
    expect(config.cache).toEqual({ maxEntries: 50, ttlMs: 60000 });
    expect(config.sync.epoch).toBe('2000-01-04');
    expect(config.assetClasses.equity.enabled).toBe(true);
    expect(config.assetClasses.equity.databaseUrl).toBe('postgresql://localhost/equity');
    expect(config.assetClasses.crypto.enabled).toBe(false);
    expect(config.assetClasses.fx.pairs).toEqual(['USDCNY', 'eurusd']);
    expect(config.routing.tablePath).toBe('/etc/marketsync/routing.json');
  });

  it('should ignore variables it does not map', () => {
    expect(loadConfig({ PATH: '/usr/bin', UNRELATED: 'true' })).toEqual(loadConfig({}));
  });

  it('should report every invalid setting at once', () => {
    let message = '';
    try {
      loadConfig({ CACHE_MAX_ENTRIES: '0', SYNC_TIMEZONE: 'Mars/Olympus', SYNC_EPOCH: '20000104' });
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    const lines = message.split('\n');
    expect(lines[0]).toBe('Configuration validation failed:');
    expect(lines).toContain('sync.timezone: Unknown timezone');
    expect(lines).toContain('sync.epoch: Expected a YYYY-MM-DD date');
    expect(lines.some((line) => line.startsWith('cache.maxEntries: '))).toBe(true);
    expect(lines).toHaveLength(4);
  });

  it('should require a file path for file logging', () => {
    expect(() => loadConfig({ LOG_OUTPUT: 'file' })).toThrow(
      'Configuration validation failed:\nlogging.filePath: A log file path is required when writing to a file'
    );
    expect(loadConfig({ LOG_OUTPUT: 'both', LOG_FILE: 'logs/marketsync.log' }).logging.filePath).toBe(
      'logs/marketsync.log'
    );
  });

  it('should reject an empty pair list', () => {
    expect(() => loadConfig({ FX_PAIRS: ' , ' })).toThrow('assetClasses.fx.pairs: ');
  });
});

describe('getConfigSummary', () => {
  it('should list the enabled asset classes', () => {
    const summary = getConfigSummary(loadConfig({ BOND_ENABLED: 'true', CRYPTO_ENABLED: 'false' }));

    expect(summary).toEqual({
      environment: 'development',
      assetClasses: ['bond', 'fx'],
      cache: { maxEntries: 1000, ttlMs: null },
      sync: { timezone: 'UTC', directoryMaxAgeHours: 24 },
      logging: { level: 'info', format: 'pretty', output: 'console' },
    });
  });
});

describe('loadEnvironment', () => {
  const dir = mkdtempSync(join(tmpdir(), 'marketsync-config-'));

  afterEach(() => {
    delete process.env['MARKETSYNC_TEST_SETTING'];
  });

  it('should load variables from a file', () => {
    const path = join(dir, 'test.env');
    writeFileSync(path, 'MARKETSYNC_TEST_SETTING=test-secret\n');

    expect(loadEnvironment(path)).toEqual({ MARKETSYNC_TEST_SETTING: 'test-secret' });
    expect(process.env['MARKETSYNC_TEST_SETTING']).toBe('test-secret');

    rmSync(path);
  });

  it('should fail when an explicit file is missing', () => {
    expect(() => loadEnvironment(join(dir, 'missing.env'))).toThrow();
  });
});
