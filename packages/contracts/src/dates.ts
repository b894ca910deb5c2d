/**
 * @fileoverview Calendar-date helpers for `YYYY-MM-DD` strings.
 *
 * All arithmetic is done in UTC so the result never depends on the host
 * timezone. Timezone-aware "today" lives with the sync engine.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

const DAY_MS = 24 * 60 * 60 * 1000;

function toUtcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Formats a Date to `YYYY-MM-DD` using its UTC fields.
 */
export function formatDate(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * True when `value` is a real calendar date in `YYYY-MM-DD` form.
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return false;
  }
  return toUtcDate(Number(match[1]), Number(match[2]), Number(match[3])) !== null;
}

/**
 * Normalizes `YYYY-MM-DD`, `YYYYMMDD` or a Date to `YYYY-MM-DD`.
 *
 * @throws RangeError if the input is not a valid calendar date
 *
 * @example
 * ```typescript
 * normalizeDate('20240105')   // → '2024-01-05'
 * normalizeDate(' 2024-01-05 ') // → '2024-01-05'
 * ```
 */
export function normalizeDate(value: string | Date): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new RangeError('Invalid date');
    }
    return formatDate(value);
  }

  const trimmed = value.trim();
  const match = ISO_DATE.exec(trimmed) ?? COMPACT_DATE.exec(trimmed);
  if (match) {
    const date = toUtcDate(Number(match[1]), Number(match[2]), Number(match[3]));
    if (date) {
      return formatDate(date);
    }
  }
  throw new RangeError(`Invalid date: "${value}". Expected YYYY-MM-DD`);
}

/**
 * Adds (or subtracts) whole days to a `YYYY-MM-DD` date.
 */
export function addDays(date: string, days: number): string {
  const base = new Date(`${normalizeDate(date)}T00:00:00.000Z`);
  return formatDate(new Date(base.getTime() + days * DAY_MS));
}

/**
 * Later of two `YYYY-MM-DD` dates. ISO dates compare lexicographically.
 */
export function maxDate(a: string, b: string): string {
  return a >= b ? a : b;
}
