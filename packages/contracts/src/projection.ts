import type { BarField, BarRow, HistoricalBar } from './market.js';

type BarPayload = Partial<Omit<HistoricalBar, 'code' | 'date'>>;

/**
 * Restricts a bar to the requested fields. `code` and `date` are always kept;
 * an empty or missing field list returns every field.
 */
export function projectBar(bar: HistoricalBar, fields?: readonly BarField[]): BarRow {
  if (!fields || fields.length === 0) {
    return { ...bar };
  }

  const payload: BarPayload = {};
  for (const field of fields) {
    copyField(payload, bar, field);
  }
  return { code: bar.code, date: bar.date, ...payload };
}

export function projectBars(bars: readonly HistoricalBar[], fields?: readonly BarField[]): BarRow[] {
  return bars.map((bar) => projectBar(bar, fields));
}

function copyField<K extends BarField>(target: BarPayload, source: BarPayload, field: K): void {
  if (source[field] !== undefined) {
    target[field] = source[field];
  }
}
