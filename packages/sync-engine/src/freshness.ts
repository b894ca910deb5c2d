/**
 * Freshness rules for the directory and per-symbol history.
 *
 * The directory is stale once its marker is older than the max age. A
 * symbol's history is current once its marker reaches today's date in the
 * market timezone.
 */

import moment from 'moment-timezone'
import { maxDate } from '@marketsync/contracts'

export const DAY_MS = 24 * 60 * 60 * 1000

export const DEFAULT_EPOCH = '1990-12-19'

/**
 * True when the directory has never been pulled or its last pull is at least
 * `maxAgeMs` old.
 */
export function isDirectoryStale(asOf: string | null, now: Date, maxAgeMs: number): boolean {
  if (asOf === null) {
    return true
  }
  return now.getTime() - Date.parse(asOf) >= maxAgeMs
}

/**
 * Calendar date (YYYY-MM-DD) of `now` in the market timezone.
 *
 * @example
 * ```typescript
 * marketToday(new Date('2024-01-04T17:00:00Z'), 'Asia/Shanghai') // '2024-01-05'
 * ```
 */
export function marketToday(now: Date, timezone: string): string {
  return moment.tz(now, timezone).format('YYYY-MM-DD')
}

export function isHistoryCurrent(marker: string | null, today: string): boolean {
  return marker !== null && marker >= today
}

/**
 * First date to request: the last stored bar's date, or the later of the
 * epoch and the listing date for an empty history.
 *
 * The last stored bar may have been written while its session was still
 * open (crypto trades around the clock), so it is fetched again and
 * overwritten by the `(code, date)` upsert.
 */
export function backfillStart(lastBarDate: string | null, listingDate: string | null, epoch: string): string {
  if (lastBarDate !== null) {
    return lastBarDate
  }
  return listingDate === null ? epoch : maxDate(epoch, listingDate)
}

/**
 * ISO timestamp `days` before `now`; records last seen before it go inactive.
 */
export function inactivityCutoff(now: Date, days: number): string {
  return new Date(now.getTime() - days * DAY_MS).toISOString()
}
