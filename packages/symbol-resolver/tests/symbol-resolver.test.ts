/**
 * Tests for @marketsync/symbol-resolver
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { connect, type DbConnection } from '@marketsync/db-simple';
import type { SymbolListing } from '@marketsync/contracts';
import { LocalStore } from '@marketsync/local-store';
import { SymbolResolver, parseSymbol, resolveExchange } from '../src/index.js';

const SEEN_AT = '2024-01-08T00:00:00.000Z';

function listing(code: string, displayName: string, overrides: Partial<SymbolListing> = {}): SymbolListing {
  return {
    code,
    displayName,
    fullCode: `${code}.SZ`,
    exchange: 'SZ',
    assetType: 'equity',
    listingDate: '1991-04-03',
    isActive: true,
    ...overrides,
  };
}

describe('resolveExchange', () => {
  it('should map aliases to canonical suffixes', () => {
    expect(resolveExchange('szse')).toBe('SZ');
    expect(resolveExchange('SSE')).toBe('SH');
    expect(resolveExchange('SHSE')).toBe('SH');
    expect(resolveExchange('BSE')).toBe('BJ');
    expect(resolveExchange(' nyse ')).toBe('NYSE');
  });
});

describe('parseSymbol', () => {
  it('should parse CODE.EXCHANGE', () => {
    expect(parseSymbol('000001.SZ')).toEqual({ kind: 'qualified', code: '000001', exchange: 'SZ', fullCode: '000001.SZ' });
    expect(parseSymbol('btcusdt.binance')).toEqual({
      kind: 'qualified',
      code: 'BTCUSDT',
      exchange: 'BINANCE',
      fullCode: 'BTCUSDT.BINANCE',
    });
  });

  it('should parse EXCHANGE.CODE with aliases', () => {
    expect(parseSymbol('SZSE.000001')).toEqual({ kind: 'qualified', code: '000001', exchange: 'SZ', fullCode: '000001.SZ' });
    expect(parseSymbol('sh.600000')).toEqual({ kind: 'qualified', code: '600000', exchange: 'SH', fullCode: '600000.SH' });
  });

  it('should take an unknown alphabetic suffix as the exchange', () => {
    expect(parseSymbol('AAPL.US')).toEqual({ kind: 'qualified', code: 'AAPL', exchange: 'US', fullCode: 'AAPL.US' });
  });

  it('should classify bare codes and names', () => {
    expect(parseSymbol(' btcusdt ')).toEqual({ kind: 'code', code: 'BTCUSDT' });
    expect(parseSymbol('Ping An')).toEqual({ kind: 'name', fragment: 'Ping An' });
    expect(parseSymbol('600000.123')).toEqual({ kind: 'name', fragment: '600000.123' });
  });

  it('should return null for empty input', () => {
    expect(parseSymbol('')).toBeNull();
    expect(parseSymbol('   ')).toBeNull();
  });
});

describe('SymbolResolver', () => {
  let db: DbConnection;
  let resolver: SymbolResolver;

  beforeAll(async () => {
    db = await connect('sqlite::memory:');
    const store = new LocalStore(db, { assetClass: 'equity' });
    await store.init();
    await store.upsertSymbols(
      [
        listing('000001', 'Ping An Bank'),
        listing('000001.SH', 'SSE Composite', {
          fullCode: '000001.SH',
          exchange: 'SH',
          assetType: 'index',
          listingDate: '1991-07-15',
        }),
        listing('600000', 'SPD Bank', { fullCode: '600000.SH', exchange: 'SH', listingDate: '1999-11-10' }),
        listing('000003', 'Delisted Co', { isActive: false }),
      ],
      SEEN_AT
    );
    resolver = new SymbolResolver(store);
  });

  afterAll(async () => {
    await db.close();
  });

  describe('resolve', () => {
    it('should prefer an exact code', async () => {
      expect((await resolver.resolve('000001'))?.displayName).toBe('Ping An Bank');
      expect((await resolver.resolve('000001.SH'))?.displayName).toBe('SSE Composite');
    });

    it('should match qualified input on the composite code', async () => {
      expect((await resolver.resolve('000001.SZ'))?.code).toBe('000001');
      expect((await resolver.resolve('XSHG.000001'))?.code).toBe('000001.SH');
      expect((await resolver.resolve('sh.600000'))?.code).toBe('600000');
    });

    it('should fall back to a name substring', async () => {
      const record = await resolver.resolve('ping an');

      expect(record).toEqual({
        code: '000001',
        displayName: 'Ping An Bank',
        fullCode: '000001.SZ',
        exchange: 'SZ',
        assetType: 'equity',
        listingDate: '1991-04-03',
        isActive: true,
        lastUpdated: SEEN_AT,
      });
    });

    it('should take the first match by code when a name is ambiguous', async () => {
      expect((await resolver.resolve('bank'))?.code).toBe('000001');
    });

    it('should return null when nothing matches', async () => {
      expect(await resolver.resolve('999999')).toBeNull();
      expect(await resolver.resolve('')).toBeNull();
    });
  });

  describe('isValid', () => {
    it('should describe an active symbol', async () => {
      expect(await resolver.isValid('600000.SH')).toEqual({
        valid: true,
        code: '600000',
        name: 'SPD Bank',
        assetType: 'equity',
        listingDate: '1999-11-10',
      });
    });

    it('should treat unknown and inactive symbols alike', async () => {
      const invalid = { valid: false, code: '', name: '', assetType: null, listingDate: null };

      expect(await resolver.isValid('999999')).toEqual(invalid);
      expect(await resolver.isValid('000003')).toEqual(invalid);
    });
  });

  describe('resolveActive', () => {
    it('should reject unknown and inactive symbols', async () => {
      await expect(resolver.resolveActive('999999')).rejects.toThrow('Unknown symbol "999999"');
      await expect(resolver.resolveActive('000003')).rejects.toThrow('Symbol "000003" is inactive');
    });
  });
});
