/**
 * @fileoverview Custom winston formats: secret redaction, standard fields and
 * the pretty one-line output used in development.
 */

import winston from 'winston';

const { format } = winston;

/**
 * Field names whose values never reach a transport. Case-insensitive.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /^auth$/i,
  /private[_-]?key/i,
  /credential/i,
];

const REDACTED = '[REDACTED]';

/** Winston's own bookkeeping fields */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveFieldName(name: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Returns a copy of `value` with sensitive keys replaced, at any depth.
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }
  if (value === null || typeof value !== 'object' || value instanceof Date) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(nested);
  }
  return result;
}

/**
 * Redacts sensitive metadata. Must run before any output format.
 *
 * @example
 * ```typescript
 * logger.info('Upstream login', { user: 'svc', password: 'test-secret' });
 * // → {"level":"info","message":"Upstream login","user":"svc","password":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * ISO timestamp plus stack capture for Error objects.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Human-readable output:
 * `[2024-01-05T09:30:00.000+08:00] info: Backfill finished component=sync-engine assetClass=equity count=3`
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, assetClass, symbol, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (assetClass) context.push(`assetClass=${String(assetClass)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'stack' || key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return info['stack'] ? `${baseMsg}\n${String(info['stack'])}` : baseMsg;
  })
);
