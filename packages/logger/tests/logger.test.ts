/**
 * @fileoverview Tests for logger creation, redaction and output formats
 */

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import winston from 'winston';
import { createLogger, createChildLogger, createNullLogger } from '../src/createLogger.js';
import { redactValue, isSensitiveFieldName } from '../src/formats.js';
import type { LoggerConfig } from '../src/types.js';

function captureTransport(): { transport: winston.transport; lines: string[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString().trim());
      callback();
    },
  });
  return { transport: new winston.transports.Stream({ stream }), lines };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}

describe('createLogger', () => {
  it('should create a logger for every level', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];

    for (const level of levels) {
      const logger = createLogger({ level, console: false });
      expect(logger.level).toBe(level);
    }
  });

  it('should write JSON entries with standard fields', async () => {
    const { transport, lines } = captureTransport();
    const logger = createLogger({ level: 'info', json: true, console: false, transports: [transport] });

    logger.info('Backfill finished', { assetClass: 'equity', count: 3 });
    await flush();

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? '{}');
    expect(entry.message).toBe('Backfill finished');
    expect(entry.level).toBe('info');
    expect(entry.assetClass).toBe('equity');
    expect(entry.count).toBe(3);
    expect(typeof entry.timestamp).toBe('string');
  });

  it('should filter entries below the configured level', async () => {
    const { transport, lines } = captureTransport();
    const logger = createLogger({ level: 'warn', json: true, console: false, transports: [transport] });

    logger.info('ignored');
    logger.warn('kept');
    await flush();

    expect(lines.map((line) => JSON.parse(line).message)).toEqual(['kept']);
  });

  it('should redact secrets before they reach a transport', async () => {
    const { transport, lines } = captureTransport();
    const logger = createLogger({ level: 'info', json: true, console: false, transports: [transport] });

    logger.info('Upstream login', { user: 'svc', password: 'test-secret', request: { apiKey: 'test-key', path: '/x' } });
    await flush();

    const entry = JSON.parse(lines[0] ?? '{}');
    expect(entry.user).toBe('svc');
    expect(entry.password).toBe('[REDACTED]');
    expect(entry.request).toEqual({ apiKey: '[REDACTED]', path: '/x' });
  });

  it('should carry child context on every entry', async () => {
    const { transport, lines } = captureTransport();
    const logger = createLogger({ level: 'info', json: true, console: false, transports: [transport] });
    const child = createChildLogger(logger, { component: 'sync-engine', assetClass: 'crypto' });

    child.info('Directory refreshed');
    await flush();

    const entry = JSON.parse(lines[0] ?? '{}');
    expect(entry.component).toBe('sync-engine');
    expect(entry.assetClass).toBe('crypto');
  });

  it('should produce a pretty single line outside JSON mode', async () => {
    const { transport, lines } = captureTransport();
    const logger = createLogger({ level: 'info', json: false, console: false, transports: [transport] });

    logger.info('Cache miss', { component: 'router', symbol: '000001.SZ' });
    await flush();

    expect(lines[0]).toContain('Cache miss component=router symbol=000001.SZ');
  });

  it('should write nothing when silent', async () => {
    const { transport, lines } = captureTransport();
    const logger = createLogger({ level: 'info', console: false, silent: true, transports: [transport] });

    logger.error('dropped');
    await flush();

    expect(lines).toEqual([]);
    expect(createNullLogger().silent).toBe(true);
  });
});

describe('redaction helpers', () => {
  it('should recognise sensitive field names', () => {
    expect(isSensitiveFieldName('api_key')).toBe(true);
    expect(isSensitiveFieldName('accessToken')).toBe(true);
    expect(isSensitiveFieldName('Authorization')).toBe(true);
    expect(isSensitiveFieldName('author')).toBe(false);
    expect(isSensitiveFieldName('session')).toBe(false);
  });

  it('should redact nested arrays without mutating the input', () => {
    const input = { items: [{ token: 'abc', id: 1 }] };

    expect(redactValue(input)).toEqual({ items: [{ token: '[REDACTED]', id: 1 }] });
    expect(input.items[0]?.token).toBe('abc');
  });
});
