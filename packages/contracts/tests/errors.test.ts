/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  MarketDataError,
  SymbolValidationError,
  DataRetrievalError,
  DataStandardizationError,
  RateLimitExceededError,
  NotSupportedError,
  isMarketDataError,
  isSymbolValidationError,
  isDataRetrievalError,
  isDataStandardizationError,
  isRateLimitExceededError,
  isNotSupportedError,
  serializeError,
} from '../src/errors.js';

describe('MarketDataError', () => {
  it('should create error with code and message', () => {
    const error = new MarketDataError('TEST_CODE', 'Test message');

    expect(error.name).toBe('MarketDataError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.stack).toBeDefined();
  });

  it('should have valid ISO timestamp', () => {
    const error = new MarketDataError('TEST_CODE', 'Test message');

    expect(new Date(error.timestamp).toISOString()).toBe(error.timestamp);
  });

  it('should keep the cause', () => {
    const cause = new Error('socket hang up');
    const error = new MarketDataError('TEST_CODE', 'Wrapped', undefined, { cause });

    expect(error.cause).toBe(cause);
  });

  it('should be JSON stringifiable', () => {
    const error = new MarketDataError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed = JSON.parse(JSON.stringify(error));

    expect(parsed).toEqual({
      name: 'MarketDataError',
      code: 'TEST_CODE',
      message: 'Test message',
      data: { key: 'value' },
      timestamp: error.timestamp,
    });
  });
});

describe('taxonomy', () => {
  it('should tag symbol validation errors', () => {
    const error = new SymbolValidationError('Symbol "999999" not found', { symbol: '999999' });

    expect(error.name).toBe('SymbolValidationError');
    expect(error.code).toBe('SYMBOL_VALIDATION');
    expect(error.data?.['symbol']).toBe('999999');
    expect(error).toBeInstanceOf(MarketDataError);
  });

  it('should expose the HTTP status on retrieval errors', () => {
    const error = new DataRetrievalError('Upstream unavailable', { provider: 'binance', statusCode: 503 });

    expect(error.code).toBe('DATA_RETRIEVAL');
    expect(error.statusCode).toBe(503);
  });

  it('should expose retryAfter on rate limit errors', () => {
    const error = new RateLimitExceededError('Throttled', { provider: 'binance', retryAfter: 60 });

    expect(error.code).toBe('RATE_LIMIT_EXCEEDED');
    expect(error.retryAfter).toBe(60);
  });

  it('should name the missing capability', () => {
    const error = new NotSupportedError('No quotes', { provider: 'exchange-session', capability: 'realtimeQuote' });

    expect(error.code).toBe('NOT_SUPPORTED');
    expect(error.capability).toBe('realtimeQuote');
  });

  it('should narrow with type guards', () => {
    const errors = [
      new SymbolValidationError('a', { symbol: 'x' }),
      new DataRetrievalError('b', { provider: 'p' }),
      new DataStandardizationError('c', { provider: 'p' }),
      new RateLimitExceededError('d', { provider: 'p' }),
      new NotSupportedError('e', { provider: 'p', capability: 'intraday' }),
    ];

    expect(errors.map(isSymbolValidationError)).toEqual([true, false, false, false, false]);
    expect(errors.map(isDataRetrievalError)).toEqual([false, true, false, false, false]);
    expect(errors.map(isDataStandardizationError)).toEqual([false, false, true, false, false]);
    expect(errors.map(isRateLimitExceededError)).toEqual([false, false, false, true, false]);
    expect(errors.map(isNotSupportedError)).toEqual([false, false, false, false, true]);
    expect(errors.every(isMarketDataError)).toBe(true);
    expect(isMarketDataError(new Error('plain'))).toBe(false);
  });
});

describe('serializeError', () => {
  it('should serialize market data errors through toJSON', () => {
    const error = new DataStandardizationError('Bad payload', { provider: 'fx' });

    expect(serializeError(error)).toEqual(error.toJSON());
  });

  it('should serialize plain errors and thrown values', () => {
    expect(serializeError(new TypeError('nope'))).toEqual({ name: 'TypeError', message: 'nope' });
    expect(serializeError('boom')).toEqual({ message: 'boom' });
  });
});
