/**
 * Synchronization engine for one asset class.
 *
 * Keeps a local store's directory and daily history no more than one
 * freshness window behind the provider, pulling only what is missing.
 *
 * Directory refresh:
 * 1. No marker: bootstrap pull. On failure write the seed list and report
 *    degraded; the marker stays absent so the next run bootstraps again
 * 2. Marker older than the max age: full re-pull, upsert, deactivate records
 *    not seen for the inactivity window, advance the marker
 * 3. Otherwise nothing
 *
 * History backfill, per active symbol:
 * 1. Skip when `history:<code>` has reached today
 * 2. Request from the day after the last stored bar (or from the later of
 *    the epoch and the listing date) through today
 * 3. Upsert the bars and advance the symbol marker in one transaction
 *
 * One symbol's failure is recorded and the batch moves on, except a rate
 * limit, which stops the batch. Runs for the same engine never overlap.
 */

import {
  SymbolValidationError,
  isRateLimitExceededError,
  serializeError,
} from '@marketsync/contracts'
import type { AssetClass, DataSource, ProviderSession, SymbolListing, SymbolRecord } from '@marketsync/contracts'
import { DIRECTORY_SCOPE, HISTORY_SCOPE, historyScope } from '@marketsync/local-store'
import type { LocalStore } from '@marketsync/local-store'
import { createNullLogger, type Logger } from '@marketsync/logger'
import { SymbolResolver } from '@marketsync/symbol-resolver'
import {
  DAY_MS,
  DEFAULT_EPOCH,
  backfillStart,
  inactivityCutoff,
  isDirectoryStale,
  isHistoryCurrent,
  marketToday,
} from './freshness.js'
import { DEFAULT_SEEDS } from './seeds.js'
import { withSession } from './session.js'
import type { BackfillResult, Clock, DirectoryResult, SyncEngineOptions, SyncReport } from './types.js'

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

function emptyBackfill(): BackfillResult {
  return { succeeded: [], failed: [], skipped: [], barsWritten: 0, aborted: false }
}

function noop(): void {}

/**
 * Example:
 * ```typescript
 * const engine = new SyncEngine(store, new EquityDataSource({ upstream }), {
 *   logger,
 *   timezone: 'Asia/Shanghai',
 * })
 *
 * const report = await engine.sync()
 * if (report.failed.length > 0) {
 *   logger.warn('Some symbols failed', { failed: report.failed.map((f) => f.code) })
 * }
 * ```
 */
export class SyncEngine {
  readonly assetClass: AssetClass

  private store: LocalStore
  private source: DataSource
  private resolver: SymbolResolver
  private logger: Logger
  private clock: Clock
  private timezone: string
  private epoch: string
  private directoryMaxAgeMs: number
  private inactivityDays: number
  private seedSymbols: readonly SymbolListing[]

  private tail: Promise<void> = Promise.resolve()
  private inFlightSync: Promise<SyncReport> | null = null
  private inFlightSymbols = new Map<string, Promise<void>>()

  constructor(store: LocalStore, source: DataSource, options: SyncEngineOptions = {}) {
    if (store.assetClass !== source.assetClass) {
      throw new Error(`A ${store.assetClass} store cannot sync from ${source.id} (${source.assetClass})`)
    }

    this.assetClass = store.assetClass
    this.store = store
    this.source = source
    this.logger = (options.logger ?? createNullLogger()).child({
      component: 'sync-engine',
      assetClass: store.assetClass,
      provider: source.id,
    })
    this.resolver = options.resolver ?? new SymbolResolver(store, { logger: options.logger })
    this.clock = options.clock ?? (() => new Date())
    this.timezone = options.timezone ?? 'UTC'
    this.epoch = options.epoch ?? DEFAULT_EPOCH
    this.directoryMaxAgeMs = options.directoryMaxAgeMs ?? DAY_MS
    this.inactivityDays = options.inactivityDays ?? 30
    this.seedSymbols = options.seedSymbols ?? DEFAULT_SEEDS[store.assetClass]
  }

  /**
   * Refresh the directory if it is missing or stale.
   */
  refreshDirectory(): Promise<DirectoryResult> {
    return this.exclusive(() => this.pullDirectory())
  }

  /**
   * Backfill history for `codes`, or for every active symbol when omitted.
   * The global history marker only moves on a full run where every symbol
   * succeeded.
   */
  backfillHistory(codes?: readonly string[]): Promise<BackfillResult> {
    return this.exclusive(() => withSession(this.source, () => this.backfill(codes)))
  }

  /**
   * Directory refresh followed by a full backfill, inside one provider
   * session. Concurrent callers share the run in flight.
   */
  sync(): Promise<SyncReport> {
    if (this.inFlightSync) {
      this.logger.debug('Joining sync in flight')
      return this.inFlightSync
    }

    const run = this.exclusive(() => this.runSync()).finally(() => {
      this.inFlightSync = null
    })
    this.inFlightSync = run
    return run
  }

  /**
   * Bring the directory and one symbol's history up to date before a read.
   * Unknown and inactive symbols are left to the caller to reject. A failed
   * backfill rejects with the provider's error.
   */
  ensureSymbolFresh(symbol: string): Promise<void> {
    const key = symbol.trim().toUpperCase()
    const pending = this.inFlightSymbols.get(key)
    if (pending) {
      return pending
    }

    const run = this.exclusive(() => this.freshenSymbol(symbol)).finally(() => {
      this.inFlightSymbols.delete(key)
    })
    this.inFlightSymbols.set(key, run)
    return run
  }

  /**
   * Serializes every run of this engine. The queue moves on after a failed
   * task; its caller still receives the rejection.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task)
    this.tail = run.then(noop, noop)
    return run
  }

  private async runSync(): Promise<SyncReport> {
    const startedAt = this.clock().toISOString()
    this.logger.info('Sync started')

    let session: ProviderSession | null = null
    if (this.source.openSession) {
      try {
        session = await this.source.openSession()
      } catch (error) {
        const failure = toError(error)
        this.logger.error('Provider session unavailable', { error: serializeError(failure) })
        const directory = await this.directoryUnavailable(failure)
        return this.report(startedAt, directory, { ...emptyBackfill(), aborted: true })
      }
    }

    try {
      const directory = await this.pullDirectory()
      const history = await this.backfill()
      return this.report(startedAt, directory, history)
    } finally {
      if (session) {
        await session.close()
      }
    }
  }

  private report(startedAt: string, directory: DirectoryResult, history: BackfillResult): SyncReport {
    const report: SyncReport = {
      assetClass: this.assetClass,
      provider: this.source.id,
      startedAt,
      finishedAt: this.clock().toISOString(),
      directory,
      ...history,
      degraded: directory.outcome === 'degraded',
    }

    this.logger.info('Sync finished', {
      directory: directory.outcome,
      succeeded: report.succeeded.length,
      failed: report.failed.length,
      skipped: report.skipped.length,
      barsWritten: report.barsWritten,
      degraded: report.degraded,
      aborted: report.aborted,
    })
    return report
  }

  // ---------------------------------------------------------------------------
  // Directory
  // ---------------------------------------------------------------------------

  private async pullDirectory(): Promise<DirectoryResult> {
    const now = this.clock()
    const asOf = await this.store.getSyncMarker(DIRECTORY_SCOPE)
    if (!isDirectoryStale(asOf, now, this.directoryMaxAgeMs)) {
      return { outcome: 'fresh', count: 0, deactivated: [] }
    }

    let listings: SymbolListing[]
    try {
      listings = await this.source.listSymbols()
    } catch (error) {
      return this.directoryUnavailable(toError(error))
    }
    if (asOf === null && listings.length === 0) {
      return this.directoryUnavailable(new Error(`${this.source.id} returned an empty directory`))
    }

    const seenAt = now.toISOString()
    const count = await this.store.upsertSymbols(listings, seenAt)
    const deactivated = await this.store.deactivateStale(inactivityCutoff(now, this.inactivityDays))
    await this.store.advanceSyncMarker(DIRECTORY_SCOPE, seenAt)

    const outcome = asOf === null ? 'bootstrapped' : 'refreshed'
    this.logger.info('Directory synced', { outcome, count, deactivated: deactivated.length })
    return { outcome, count, deactivated }
  }

  /**
   * A failed pull keeps an existing directory. Without one, the seed list is
   * written so reads still work.
   */
  private async directoryUnavailable(error: Error): Promise<DirectoryResult> {
    if ((await this.store.getSyncMarker(DIRECTORY_SCOPE)) !== null) {
      this.logger.warn('Directory refresh failed, keeping existing directory', { error: serializeError(error) })
      return { outcome: 'failed', count: 0, deactivated: [], error }
    }

    const count = await this.store.upsertSymbols(this.seedSymbols, this.clock().toISOString())
    this.logger.error('Directory bootstrap failed, running on seed list', {
      error: serializeError(error),
      seeded: count,
    })
    return { outcome: 'degraded', count, deactivated: [], error }
  }

  // ---------------------------------------------------------------------------
  // History
  // ---------------------------------------------------------------------------

  private async backfill(codes?: readonly string[]): Promise<BackfillResult> {
    const today = marketToday(this.clock(), this.timezone)
    const result = emptyBackfill()
    const targets = codes ? await this.lookupTargets(codes, result) : await this.store.listSymbols({ activeOnly: true })

    for (const record of targets) {
      if (result.aborted) {
        result.skipped.push(record.code)
        continue
      }

      try {
        result.barsWritten += await this.backfillSymbol(record, today)
        result.succeeded.push(record.code)
      } catch (error) {
        const failure = toError(error)
        result.failed.push({ code: record.code, error: failure })

        if (isRateLimitExceededError(failure)) {
          result.aborted = true
          this.logger.error('Rate limited, aborting backfill', { symbol: record.code, error: serializeError(failure) })
        } else {
          this.logger.warn('Symbol backfill failed', { symbol: record.code, error: serializeError(failure) })
        }
      }
    }

    if (!codes && result.failed.length === 0 && result.skipped.length === 0) {
      await this.store.advanceSyncMarker(HISTORY_SCOPE, today)
    }

    this.logger.info('Backfill finished', {
      through: today,
      succeeded: result.succeeded.length,
      failed: result.failed.length,
      skipped: result.skipped.length,
      barsWritten: result.barsWritten,
    })
    return result
  }

  /**
   * Explicitly requested codes must exist and be active; the rest are
   * recorded as failures.
   */
  private async lookupTargets(codes: readonly string[], result: BackfillResult): Promise<SymbolRecord[]> {
    const targets: SymbolRecord[] = []
    for (const code of codes) {
      const record = await this.store.getSymbol(code)
      if (!record) {
        result.failed.push({ code, error: new SymbolValidationError(`Unknown symbol "${code}"`, { symbol: code }) })
      } else if (!record.isActive) {
        result.failed.push({ code, error: new SymbolValidationError(`Symbol "${code}" is inactive`, { symbol: code }) })
      } else {
        targets.push(record)
      }
    }
    return targets
  }

  /**
   * @returns Bars written
   */
  private async backfillSymbol(record: SymbolRecord, today: string): Promise<number> {
    if (isHistoryCurrent(await this.store.getSyncMarker(historyScope(record.code)), today)) {
      return 0
    }

    const start = backfillStart(await this.store.getLastBarDate(record.code), record.listingDate, this.epoch)
    const bars = start > today ? [] : await this.source.fetchDailyBars(record.code, start, today)
    const written = await this.store.upsertBars(record.code, bars, today)

    this.logger.debug('Symbol backfilled', { symbol: record.code, start, end: today, count: written })
    return written
  }

  private async freshenSymbol(symbol: string): Promise<void> {
    await this.pullDirectory()

    const record = await this.resolver.resolve(symbol)
    if (!record || !record.isActive) {
      return
    }

    const today = marketToday(this.clock(), this.timezone)
    if (isHistoryCurrent(await this.store.getSyncMarker(historyScope(record.code)), today)) {
      return
    }

    const result = await withSession(this.source, () => this.backfill([record.code]))
    const [failure] = result.failed
    if (failure) {
      throw failure.error
    }
  }
}
