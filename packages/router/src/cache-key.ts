/**
 * Cache keys for data requests.
 */

import { normalizeDate } from '@marketsync/contracts';
import type { DataRequest } from './types.js';

/**
 * Key covering every argument of a request. Equivalent requests map to the
 * same key: symbol case and padding, date format, field order and duplicate
 * fields do not matter.
 *
 * @throws RangeError for an invalid date
 *
 * @example
 * ```typescript
 * cacheKey({ symbol: ' 000001.sz ', startDate: '20240101', endDate: '2024-01-05', fields: ['volume', 'close'] });
 * // → '["000001.SZ","2024-01-01","2024-01-05","daily",null,["close","volume"]]'
 * ```
 */
export function cacheKey(request: DataRequest): string {
  const frequency = request.frequency ?? 'daily';
  const fields = request.fields && request.fields.length > 0 ? [...new Set(request.fields)].sort() : null;

  return JSON.stringify([
    request.symbol.trim().toUpperCase(),
    normalizeDate(request.startDate),
    normalizeDate(request.endDate),
    frequency,
    request.interval ?? null,
    fields,
  ]);
}
