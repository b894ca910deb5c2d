import { describe, it, expect } from 'vitest';
import { addDays, isIsoDate, maxDate, normalizeDate } from '../src/dates.js';
import { projectBar, projectBars } from '../src/projection.js';
import type { HistoricalBar } from '../src/market.js';
import { assertIntervalSupported, assertQuoteSupported, supportsInterval } from '../src/capabilities.js';
import { NotSupportedError } from '../src/errors.js';

const bar: HistoricalBar = {
  code: '000001',
  name: 'Ping An Bank',
  assetType: 'equity',
  date: '2024-01-02',
  open: 9.39,
  high: 9.42,
  low: 9.21,
  close: 9.21,
  volume: 115_000_000,
  turnover: 1_070_000_000,
  pctChange: -1.92,
};

describe('dates', () => {
  it('should accept ISO and compact dates', () => {
    expect(normalizeDate('2024-01-05')).toBe('2024-01-05');
    expect(normalizeDate('20240105')).toBe('2024-01-05');
    expect(normalizeDate(' 2024-01-05 ')).toBe('2024-01-05');
    expect(normalizeDate(new Date('2024-01-05T10:00:00.000Z'))).toBe('2024-01-05');
  });

  it('should reject impossible dates', () => {
    expect(() => normalizeDate('2024-02-30')).toThrow(RangeError);
    expect(() => normalizeDate('yesterday')).toThrow(RangeError);
    expect(isIsoDate('2024-13-01')).toBe(false);
    expect(isIsoDate('2024-02-29')).toBe(true);
  });

  it('should add days across month and year boundaries', () => {
    expect(addDays('2023-12-31', 1)).toBe('2024-01-01');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
  });

  it('should pick the later date', () => {
    expect(maxDate('1990-12-19', '1991-04-03')).toBe('1991-04-03');
    expect(maxDate('2024-01-02', '2024-01-01')).toBe('2024-01-02');
  });
});

describe('projection', () => {
  it('should keep code and date plus requested fields', () => {
    expect(projectBar(bar, ['close'])).toEqual({ code: '000001', date: '2024-01-02', close: 9.21 });
  });

  it('should return every field without a field list', () => {
    expect(projectBar(bar)).toEqual(bar);
    expect(projectBar(bar, [])).toEqual(bar);
  });

  it('should skip fields the bar does not carry', () => {
    expect(projectBars([bar], ['close', 'extras'])).toEqual([{ code: '000001', date: '2024-01-02', close: 9.21 }]);
  });
});

describe('capabilities', () => {
  const equity = {
    id: 'equity-upstream',
    capabilities: { intraday: ['5m' as const, '15m' as const], realtimeQuote: false, session: true },
  };
  const fx = { id: 'fx-rates', capabilities: { intraday: [], realtimeQuote: true, session: false } };

  it('should accept declared intervals', () => {
    expect(supportsInterval(equity, '5m')).toBe(true);
    expect(() => assertIntervalSupported(equity, '15m')).not.toThrow();
  });

  it('should reject undeclared intervals with the offered list', () => {
    expect(() => assertIntervalSupported(equity, '1m')).toThrow(
      'equity-upstream does not serve 1m bars (supported: 5m, 15m)'
    );
    expect(() => assertIntervalSupported(fx, '1h')).toThrow('fx-rates does not serve intraday bars');
  });

  it('should signal missing quote support as NotSupportedError', () => {
    expect(() => assertQuoteSupported(equity)).toThrow(NotSupportedError);
    expect(() => assertQuoteSupported(fx)).not.toThrow();
  });
});
