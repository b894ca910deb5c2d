/**
 * Persistent store for one asset class.
 *
 * Holds the symbol directory, the daily bar history and the sync markers that
 * make synchronization incremental. Works over any DbConnection (SQLite or
 * PostgreSQL); all writes are idempotent upserts keyed on natural keys.
 */

import { fileURLToPath } from 'node:url'
import { runMigrations, type DbConnection } from '@marketsync/db-simple'
import { createNullLogger, type Logger } from '@marketsync/logger'
import type { AssetClass, HistoricalBar, SymbolListing, SymbolRecord } from '@marketsync/contracts'
import {
  barFromRow,
  barParams,
  symbolFromRow,
  symbolParams,
  type DailyBarRow,
  type SymbolRow,
  type SyncStateRow,
} from './rows.js'

/** Marker scope of the symbol directory; holds an ISO timestamp */
export const DIRECTORY_SCOPE = 'directory'

/** Marker scope of the whole history; holds a `YYYY-MM-DD` date */
export const HISTORY_SCOPE = 'history'

/** Per-symbol history marker scope */
export function historyScope(code: string): string {
  return `${HISTORY_SCOPE}:${code}`
}

export interface LocalStoreOptions {
  assetClass: AssetClass
  logger?: Logger
  /** Defaults to the migrations shipped with this package */
  migrationsDir?: string
}

export interface SyncState {
  /** When the directory was last fully pulled, or null before bootstrap */
  directoryAsOf: string | null
  /** Date the whole history is synced through, or null */
  historyAsOf: string | null
}

export interface ListSymbolsOptions {
  activeOnly?: boolean
}

const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('../migrations', import.meta.url))

const SYMBOL_COLUMNS =
  'code, display_name, full_code, exchange, asset_type, listing_date, is_active, last_updated'

const BAR_COLUMNS =
  'code, date, name, asset_type, open, high, low, close, volume, turnover, pct_change, extras'

const UPSERT_SYMBOL_SQL = `
  INSERT INTO symbols (${SYMBOL_COLUMNS})
  VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  ON CONFLICT (code) DO UPDATE SET
    display_name = excluded.display_name,
    full_code = excluded.full_code,
    exchange = excluded.exchange,
    asset_type = excluded.asset_type,
    listing_date = excluded.listing_date,
    is_active = excluded.is_active,
    last_updated = excluded.last_updated
`

const UPSERT_BAR_SQL = `
  INSERT INTO daily_bars (${BAR_COLUMNS})
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  ON CONFLICT (code, date) DO UPDATE SET
    name = excluded.name,
    asset_type = excluded.asset_type,
    open = excluded.open,
    high = excluded.high,
    low = excluded.low,
    close = excluded.close,
    volume = excluded.volume,
    turnover = excluded.turnover,
    pct_change = excluded.pct_change,
    extras = excluded.extras
`

// Markers only move forward
const ADVANCE_MARKER_SQL = `
  INSERT INTO sync_state (scope, synced_through, updated_at)
  VALUES (?, ?, ?)
  ON CONFLICT (scope) DO UPDATE SET
    synced_through = excluded.synced_through,
    updated_at = excluded.updated_at
  WHERE excluded.synced_through > sync_state.synced_through
`

function escapeLike(fragment: string): string {
  return fragment.replace(/[\\%_]/g, (ch) => `\\${ch}`)
}

/**
 * Local store for one asset class.
 *
 * Example:
 * ```typescript
 * const db = await connect('sqlite:data/equity.db')
 * const store = new LocalStore(db, { assetClass: 'equity', logger })
 * await store.init()
 *
 * await store.upsertSymbols(listings, new Date().toISOString())
 * const bars = await store.queryBars('000001', '2024-01-02', '2024-01-05')
 * ```
 */
export class LocalStore {
  readonly assetClass: AssetClass

  private db: DbConnection
  private logger: Logger
  private migrationsDir: string

  constructor(db: DbConnection, options: LocalStoreOptions) {
    this.db = db
    this.assetClass = options.assetClass
    this.logger = (options.logger ?? createNullLogger()).child({
      component: 'local-store',
      assetClass: options.assetClass,
    })
    this.migrationsDir = options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR
  }

  /**
   * Apply pending schema migrations. Safe to call repeatedly.
   */
  async init(): Promise<void> {
    const result = await runMigrations(this.migrationsDir, this.db, { logger: this.logger })
    this.logger.debug('Local store ready', { applied: result.applied.length, total: result.total })
  }

  // ---------------------------------------------------------------------------
  // Symbol directory
  // ---------------------------------------------------------------------------

  /**
   * Insert or update directory records in one transaction. Every record
   * written gets `last_updated = seenAt`.
   *
   * @returns Number of records written
   */
  async upsertSymbols(listings: readonly SymbolListing[], seenAt: string): Promise<number> {
    if (listings.length === 0) {
      return 0
    }

    await this.db.transaction(async (tx) => {
      for (const listing of listings) {
        await tx.exec(UPSERT_SYMBOL_SQL, symbolParams(listing, seenAt))
      }
    })

    this.logger.debug('Symbols upserted', { count: listings.length })
    return listings.length
  }

  /**
   * Flag active records not observed since `cutoff` as inactive. Nothing is
   * deleted.
   *
   * @returns Codes of the records that were deactivated
   */
  async deactivateStale(cutoff: string): Promise<string[]> {
    const rows = await this.db.query<{ code: string }>(
      'UPDATE symbols SET is_active = 0 WHERE is_active = 1 AND last_updated < ? RETURNING code',
      [cutoff]
    )
    const codes = rows.map((row) => row.code).sort()

    if (codes.length > 0) {
      this.logger.info('Stale symbols deactivated', { count: codes.length, cutoff })
    }
    return codes
  }

  async getSymbol(code: string): Promise<SymbolRecord | null> {
    const rows = await this.db.query<SymbolRow>(`SELECT ${SYMBOL_COLUMNS} FROM symbols WHERE code = ?`, [code])
    const row = rows[0]
    return row ? symbolFromRow(row) : null
  }

  /**
   * Directory records ordered by code.
   */
  async listSymbols(options: ListSymbolsOptions = {}): Promise<SymbolRecord[]> {
    const where = options.activeOnly ? 'WHERE is_active = 1' : ''
    const rows = await this.db.query<SymbolRow>(`SELECT ${SYMBOL_COLUMNS} FROM symbols ${where} ORDER BY code`)
    return rows.map(symbolFromRow)
  }

  /**
   * Match on the composite code, case-insensitively.
   */
  async findByFullCode(fullCode: string): Promise<SymbolRecord | null> {
    const rows = await this.db.query<SymbolRow>(
      `SELECT ${SYMBOL_COLUMNS} FROM symbols WHERE UPPER(full_code) = ? ORDER BY code`,
      [fullCode.toUpperCase()]
    )
    const row = rows[0]
    return row ? symbolFromRow(row) : null
  }

  /**
   * Case-insensitive substring match on the display name, ordered by code.
   */
  async searchByName(fragment: string): Promise<SymbolRecord[]> {
    const pattern = `%${escapeLike(fragment.toLowerCase())}%`
    const rows = await this.db.query<SymbolRow>(
      `SELECT ${SYMBOL_COLUMNS} FROM symbols WHERE LOWER(display_name) LIKE ? ESCAPE '\\' ORDER BY code`,
      [pattern]
    )
    return rows.map(symbolFromRow)
  }

  // ---------------------------------------------------------------------------
  // Daily bars
  // ---------------------------------------------------------------------------

  /**
   * Upsert a symbol's bars and advance its `history:<code>` marker to
   * `syncedThrough`, atomically. An empty batch still advances the marker.
   *
   * @returns Number of bars written
   */
  async upsertBars(code: string, bars: readonly HistoricalBar[], syncedThrough: string): Promise<number> {
    const now = new Date().toISOString()

    await this.db.transaction(async (tx) => {
      for (const bar of bars) {
        await tx.exec(UPSERT_BAR_SQL, barParams(code, bar))
      }
      await tx.exec(ADVANCE_MARKER_SQL, [historyScope(code), syncedThrough, now])
    })

    this.logger.debug('Bars upserted', { symbol: code, count: bars.length, syncedThrough })
    return bars.length
  }

  async getLastBarDate(code: string): Promise<string | null> {
    const rows = await this.db.query<{ last_date: string | null }>(
      'SELECT MAX(date) AS last_date FROM daily_bars WHERE code = ?',
      [code]
    )
    return rows[0]?.last_date ?? null
  }

  /**
   * Bars in the closed range `[startDate, endDate]`, ascending by date.
   */
  async queryBars(code: string, startDate: string, endDate: string): Promise<HistoricalBar[]> {
    const rows = await this.db.query<DailyBarRow>(
      `SELECT ${BAR_COLUMNS} FROM daily_bars WHERE code = ? AND date >= ? AND date <= ? ORDER BY date`,
      [code, startDate, endDate]
    )
    return rows.map(barFromRow)
  }

  async countBars(code: string): Promise<number> {
    const rows = await this.db.query<{ total: number | string }>(
      'SELECT COUNT(*) AS total FROM daily_bars WHERE code = ?',
      [code]
    )
    // COUNT(*) is a bigint on PostgreSQL, which pg returns as a string
    return Number(rows[0]?.total ?? 0)
  }

  // ---------------------------------------------------------------------------
  // Sync markers
  // ---------------------------------------------------------------------------

  async getSyncMarker(scope: string): Promise<string | null> {
    const rows = await this.db.query<SyncStateRow>(
      'SELECT scope, synced_through, updated_at FROM sync_state WHERE scope = ?',
      [scope]
    )
    return rows[0]?.synced_through ?? null
  }

  /**
   * Move `scope` forward to `value`. A value not after the stored one leaves
   * the marker unchanged.
   */
  async advanceSyncMarker(scope: string, value: string): Promise<void> {
    await this.db.exec(ADVANCE_MARKER_SQL, [scope, value, new Date().toISOString()])
  }

  async getSyncState(): Promise<SyncState> {
    const [directoryAsOf, historyAsOf] = await Promise.all([
      this.getSyncMarker(DIRECTORY_SCOPE),
      this.getSyncMarker(HISTORY_SCOPE),
    ])
    return { directoryAsOf, historyAsOf }
  }
}
