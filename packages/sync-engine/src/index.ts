/**
 * @marketsync/sync-engine
 *
 * Directory refresh and incremental history backfill for one asset class
 */

export { SyncEngine } from './sync-engine.js'
export { withSession } from './session.js'
export { DEFAULT_SEEDS } from './seeds.js'
export {
  DAY_MS,
  DEFAULT_EPOCH,
  backfillStart,
  inactivityCutoff,
  isDirectoryStale,
  isHistoryCurrent,
  marketToday,
} from './freshness.js'
export type {
  BackfillResult,
  Clock,
  DirectoryOutcome,
  DirectoryResult,
  SymbolFailure,
  SyncEngineOptions,
  SyncReport,
} from './types.js'
