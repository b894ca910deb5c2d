/**
 * Tests for @marketsync/sync-engine
 *
 * The engine runs against in-memory SQLite and the fixture equity upstream.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { DataRetrievalError, RateLimitExceededError, type HistoricalBar, type SymbolListing } from '@marketsync/contracts'
import { connect, type DbConnection } from '@marketsync/db-simple'
import { DIRECTORY_SCOPE, HISTORY_SCOPE, LocalStore, historyScope } from '@marketsync/local-store'
import { EquityDataSource, FixtureEquityUpstream, type FixtureInstrument } from '@marketsync/provider-equity'
import { SyncEngine, type SyncEngineOptions } from '../src/index.js'

const INSTRUMENTS: FixtureInstrument[] = [
  { code: 'sz.000001', name: 'Ping An Bank', ipoDate: '1991-04-03', type: '1' },
  { code: 'sz.000002', name: 'China Vanke', ipoDate: '1991-01-29', type: '1' },
  { code: 'sh.600000', name: 'SPD Bank', ipoDate: '1999-11-10', type: '1' },
]

const PING_AN_DAILY = [
  { date: '2024-01-02', open: '9.39', high: '9.42', low: '9.21', close: '9.21', volume: '115000000' },
  { date: '2024-01-03', open: '9.19', high: '9.22', low: '9.15', close: '9.20', volume: '84000000' },
  { date: '2024-01-04', open: '9.19', high: '9.19', low: '9.08', close: '9.11', volume: '81000000' },
  { date: '2024-01-05', open: '9.10', high: '9.42', low: '9.08', close: '9.27', volume: '150000000' },
]

const VANKE_DAILY = [{ date: '2024-01-02', open: '9.95', high: '10.02', low: '9.80', close: '9.86', volume: '60000000' }]

const SPD_DAILY = [
  { date: '2024-01-02', open: '6.61', high: '6.63', low: '6.55', close: '6.56', volume: '30000000' },
  { date: '2024-01-03', open: '6.56', high: '6.60', low: '6.52', close: '6.58', volume: '28000000' },
]

/** 16:00 in Shanghai on 2024-01-05 */
const JAN_5 = new Date('2024-01-05T08:00:00.000Z')

const PING_AN_SEED: SymbolListing = {
  code: '000001',
  displayName: 'Ping An Bank',
  fullCode: '000001.SZ',
  exchange: 'SZ',
  assetType: 'equity',
  listingDate: '1991-04-03',
  isActive: true,
}

describe('SyncEngine', () => {
  let db: DbConnection
  let store: LocalStore
  let upstream: FixtureEquityUpstream
  let now: Date

  function buildEngine(options: SyncEngineOptions = {}): SyncEngine {
    return new SyncEngine(store, new EquityDataSource({ upstream }), {
      clock: () => now,
      timezone: 'Asia/Shanghai',
      ...options,
    })
  }

  function historyCalls(): unknown[][] {
    return upstream.callsTo('queryHistoryKData').map((call) => call.args)
  }

  beforeEach(async () => {
    db = await connect('sqlite::memory:')
    store = new LocalStore(db, { assetClass: 'equity' })
    await store.init()

    upstream = new FixtureEquityUpstream(INSTRUMENTS)
    upstream.addDailyBars('sz.000001', PING_AN_DAILY)
    upstream.addDailyBars('sz.000002', VANKE_DAILY)
    upstream.addDailyBars('sh.600000', SPD_DAILY)
    now = JAN_5
  })

  afterEach(async () => {
    await db.close()
  })

  describe('sync', () => {
    it('should bootstrap an empty store and backfill from the listing date', async () => {
      const engine = buildEngine()

      const report = await engine.sync()

      expect(report).toMatchObject({
        assetClass: 'equity',
        provider: 'equity-upstream',
        startedAt: '2024-01-05T08:00:00.000Z',
        directory: { outcome: 'bootstrapped', count: 3, deactivated: [] },
        succeeded: ['000001', '000002', '600000'],
        failed: [],
        skipped: [],
        barsWritten: 7,
        degraded: false,
        aborted: false,
      })

      const pingAn = historyCalls().find((args) => args[0] === 'sz.000001')
      expect(pingAn?.[2]).toBe('1991-04-03')
      expect(pingAn?.[3]).toBe('2024-01-05')

      const bars = await store.queryBars('000001', '2024-01-01', '2024-01-05')
      expect(bars.map((b) => [b.date, b.close])).toEqual([
        ['2024-01-02', 9.21],
        ['2024-01-03', 9.2],
        ['2024-01-04', 9.11],
        ['2024-01-05', 9.27],
      ])

      expect(await store.getSyncState()).toEqual({
        directoryAsOf: '2024-01-05T08:00:00.000Z',
        historyAsOf: '2024-01-05',
      })
    })

    it('should hold one upstream session for the whole run', async () => {
      await buildEngine().sync()

      expect(upstream.logins).toBe(1)
      expect(upstream.logouts).toBe(1)
      expect(upstream.isLoggedIn).toBe(false)
    })

    it('should be idempotent within a day', async () => {
      const engine = buildEngine()
      await engine.sync()

      const second = await engine.sync()

      expect(second.directory.outcome).toBe('fresh')
      expect(second.succeeded).toEqual(['000001', '000002', '600000'])
      expect(second.barsWritten).toBe(0)
      expect(historyCalls()).toHaveLength(3)
      expect(await store.countBars('000001')).toBe(4)
    })

    it('should request only the days from the last stored bar on', async () => {
      const engine = buildEngine()
      now = new Date('2024-01-04T08:00:00.000Z')
      await engine.sync()
      expect(await store.countBars('000001')).toBe(3)

      now = JAN_5
      const report = await engine.sync()

      expect(report.directory.outcome).toBe('refreshed')
      // 000001: Jan 4 and Jan 5; 000002: Jan 2; 600000: Jan 3
      expect(report.barsWritten).toBe(4)

      const pingAn = historyCalls().filter((args) => args[0] === 'sz.000001')
      expect(pingAn).toHaveLength(2)
      expect(pingAn[1]?.[2]).toBe('2024-01-04')
      expect(pingAn[1]?.[3]).toBe('2024-01-05')
      expect(await store.countBars('000001')).toBe(4)
    })

    it('should overwrite a last bar the upstream revised since the previous run', async () => {
      const engine = buildEngine()
      now = new Date('2024-01-04T08:00:00.000Z')
      await engine.sync()

      upstream.addDailyBars('sz.000001', [
        { date: '2024-01-04', open: '9.19', high: '9.19', low: '9.08', close: '9.13', volume: '95000000' },
      ])
      now = JAN_5
      await engine.sync()

      const bars = await store.queryBars('000001', '2024-01-03', '2024-01-05')
      expect(bars.map((b) => [b.date, b.close, b.volume])).toEqual([
        ['2024-01-03', 9.2, 84_000_000],
        ['2024-01-04', 9.13, 95_000_000],
        ['2024-01-05', 9.27, 150_000_000],
      ])
    })

    it('should commit the other symbols when one fails', async () => {
      upstream.failWith('queryHistoryKData:sz.000002', new Error('socket closed'))

      const report = await buildEngine().sync()

      expect(report.succeeded).toEqual(['000001', '600000'])
      expect(report.failed).toHaveLength(1)
      expect(report.failed[0]?.code).toBe('000002')
      expect(report.failed[0]?.error).toBeInstanceOf(DataRetrievalError)
      expect(report.failed[0]?.error.message).toBe('equity-upstream queryHistoryKData failed: socket closed')
      expect(report.aborted).toBe(false)

      expect(await store.countBars('000001')).toBe(4)
      expect(await store.countBars('600000')).toBe(2)
      expect(await store.getSyncMarker(historyScope('000002'))).toBeNull()
      expect(await store.getSyncMarker(HISTORY_SCOPE)).toBeNull()
      expect(upstream.isLoggedIn).toBe(false)
    })

    it('should stop the batch on a rate limit', async () => {
      upstream.failWith(
        'queryHistoryKData:sz.000002',
        new RateLimitExceededError('equity-upstream rate limit exceeded', { provider: 'equity-upstream' })
      )

      const report = await buildEngine().sync()

      expect(report.succeeded).toEqual(['000001'])
      expect(report.failed.map((f) => f.code)).toEqual(['000002'])
      expect(report.failed[0]?.error).toBeInstanceOf(RateLimitExceededError)
      expect(report.skipped).toEqual(['600000'])
      expect(report.aborted).toBe(true)
      expect(historyCalls().map((args) => args[0])).toEqual(['sz.000001', 'sz.000002'])
      expect(upstream.logouts).toBe(upstream.logins)
    })

    it('should share one run between concurrent callers', async () => {
      const engine = buildEngine()

      const [first, second] = await Promise.all([engine.sync(), engine.sync()])

      expect(first).toBe(second)
      expect(upstream.logins).toBe(1)

      const third = await engine.sync()
      expect(third).not.toBe(first)
    })

    it('should fall back to the seed list when the session cannot open', async () => {
      upstream.failWith('login', new Error('bad credentials'))

      const report = await buildEngine({ seedSymbols: [PING_AN_SEED] }).sync()

      expect(report.directory.outcome).toBe('degraded')
      expect(report.directory.count).toBe(1)
      expect(report.directory.error?.message).toBe('equity-upstream login failed: bad credentials')
      expect(report.degraded).toBe(true)
      expect(report.aborted).toBe(true)
      expect(report.succeeded).toEqual([])
      expect((await store.listSymbols()).map((s) => s.code)).toEqual(['000001'])
      expect(await store.getSyncMarker(DIRECTORY_SCOPE)).toBeNull()
    })
  })

  describe('refreshDirectory', () => {
    it('should seed the directory when the bootstrap pull fails', async () => {
      const engine = buildEngine({ seedSymbols: [PING_AN_SEED] })
      upstream.failWith('queryStockBasic', new Error('upstream down'))

      const degraded = await engine.refreshDirectory()

      expect(degraded.outcome).toBe('degraded')
      expect(degraded.count).toBe(1)
      expect(await store.getSyncMarker(DIRECTORY_SCOPE)).toBeNull()

      upstream.failWith('queryStockBasic', null)
      const recovered = await engine.refreshDirectory()

      expect(recovered).toEqual({ outcome: 'bootstrapped', count: 3, deactivated: [] })
      expect(await store.getSyncMarker(DIRECTORY_SCOPE)).toBe('2024-01-05T08:00:00.000Z')
    })

    it('should not pull a fresh directory', async () => {
      const engine = buildEngine()
      await engine.refreshDirectory()

      expect(await engine.refreshDirectory()).toEqual({ outcome: 'fresh', count: 0, deactivated: [] })
      expect(upstream.callsTo('queryStockBasic')).toHaveLength(1)
    })

    it('should keep the existing directory when a re-pull fails', async () => {
      const engine = buildEngine()
      await engine.refreshDirectory()

      now = new Date('2024-01-06T08:00:00.000Z')
      upstream.failWith('queryStockBasic', new Error('upstream down'))
      const result = await engine.refreshDirectory()

      expect(result.outcome).toBe('failed')
      expect(await store.getSyncMarker(DIRECTORY_SCOPE)).toBe('2024-01-05T08:00:00.000Z')
      expect(await store.listSymbols({ activeOnly: true })).toHaveLength(3)
    })

    it('should deactivate symbols missing for longer than the inactivity window', async () => {
      const engine = buildEngine()
      await engine.refreshDirectory()

      const spdBar: HistoricalBar = {
        code: '600000',
        name: 'SPD Bank',
        assetType: 'equity',
        date: '2024-01-02',
        open: 6.61,
        high: 6.63,
        low: 6.55,
        close: 6.56,
        volume: 30_000_000,
        turnover: null,
        pctChange: null,
      }
      await store.upsertBars('600000', [spdBar], '2024-01-02')

      upstream.setInstruments(INSTRUMENTS.filter((i) => i.code !== 'sh.600000'))
      now = new Date('2024-01-07T08:00:00.000Z')
      expect((await engine.refreshDirectory()).deactivated).toEqual([])

      now = new Date('2024-02-14T08:00:00.000Z')
      const result = await engine.refreshDirectory()

      expect(result).toEqual({ outcome: 'refreshed', count: 2, deactivated: ['600000'] })
      expect((await store.getSymbol('600000'))?.isActive).toBe(false)
      expect(await store.queryBars('600000', '2024-01-01', '2024-01-31')).toHaveLength(1)
    })
  })

  describe('backfillHistory', () => {
    it('should record unknown codes as failures', async () => {
      const engine = buildEngine()
      await engine.refreshDirectory()

      const result = await engine.backfillHistory(['000001', '999999'])

      expect(result.succeeded).toEqual(['000001'])
      expect(result.failed.map((f) => [f.code, f.error.message])).toEqual([['999999', 'Unknown symbol "999999"']])
      expect(await store.getSyncMarker(HISTORY_SCOPE)).toBeNull()
    })
  })

  describe('ensureSymbolFresh', () => {
    it('should bootstrap and backfill only the requested symbol', async () => {
      const engine = buildEngine()

      await engine.ensureSymbolFresh('000001.SZ')

      expect(await store.countBars('000001')).toBe(4)
      expect(await store.countBars('600000')).toBe(0)
      expect(await store.getSyncMarker(historyScope('000001'))).toBe('2024-01-05')

      await engine.ensureSymbolFresh('Ping An')
      expect(historyCalls()).toHaveLength(1)
    })

    it('should share a refresh between concurrent callers', async () => {
      const engine = buildEngine()

      await Promise.all([engine.ensureSymbolFresh('000001'), engine.ensureSymbolFresh(' 000001 ')])

      expect(historyCalls()).toHaveLength(1)
    })

    it('should leave unknown symbols to the caller', async () => {
      await expect(buildEngine().ensureSymbolFresh('999999')).resolves.toBeUndefined()
      expect(historyCalls()).toHaveLength(0)
    })

    it('should reject with the provider error', async () => {
      upstream.failWith('queryHistoryKData', new Error('socket closed'))

      await expect(buildEngine().ensureSymbolFresh('000001')).rejects.toThrow(
        'equity-upstream queryHistoryKData failed: socket closed'
      )
      expect(upstream.isLoggedIn).toBe(false)
    })
  })

  it('should refuse a source of another asset class', () => {
    const bondStore = new LocalStore(db, { assetClass: 'bond' })

    expect(() => new SyncEngine(bondStore, new EquityDataSource({ upstream }))).toThrow(
      'A bond store cannot sync from equity-upstream (equity)'
    )
  })
})
