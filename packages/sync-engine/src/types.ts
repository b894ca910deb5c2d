/**
 * Type definitions for the synchronization engine.
 */

import type { AssetClass, SymbolListing } from '@marketsync/contracts'
import type { Logger } from '@marketsync/logger'
import type { SymbolResolver } from '@marketsync/symbol-resolver'

/**
 * Source of "now". Injected so tests can pin the trading day.
 */
export type Clock = () => Date

export interface SyncEngineOptions {
  logger?: Logger

  clock?: Clock

  /**
   * IANA timezone of the market; "today" is the calendar date there.
   * @default 'UTC'
   */
  timezone?: string

  /**
   * First date requested for a symbol with no stored bars and no listing date.
   * @default '1990-12-19'
   */
  epoch?: string

  /**
   * Age after which the directory is pulled again.
   * @default 86400000 (one day)
   */
  directoryMaxAgeMs?: number

  /**
   * Records not seen in a pull for this many days become inactive.
   * @default 30
   */
  inactivityDays?: number

  /**
   * Directory used when the bootstrap pull fails. Defaults to the built-in
   * list for the store's asset class.
   */
  seedSymbols?: readonly SymbolListing[]

  /** Resolver over the same store; one is created when omitted */
  resolver?: SymbolResolver
}

/**
 * What a directory refresh did.
 *
 * - `fresh`: marker younger than the max age, nothing pulled
 * - `bootstrapped`: first pull into an empty store
 * - `refreshed`: re-pull of a stale directory
 * - `degraded`: bootstrap failed, seed list written instead
 * - `failed`: re-pull failed, existing directory kept
 */
export type DirectoryOutcome = 'fresh' | 'bootstrapped' | 'refreshed' | 'degraded' | 'failed'

export interface DirectoryResult {
  outcome: DirectoryOutcome

  /** Records written */
  count: number

  /** Codes flagged inactive by this refresh */
  deactivated: string[]

  error?: Error
}

export interface SymbolFailure {
  code: string
  error: Error
}

export interface BackfillResult {
  succeeded: string[]
  failed: SymbolFailure[]

  /** Not attempted because the batch was aborted */
  skipped: string[]

  barsWritten: number

  /** A rate limit stopped the batch early */
  aborted: boolean
}

/**
 * Outcome of one synchronization run for an asset class.
 */
export interface SyncReport extends BackfillResult {
  assetClass: AssetClass
  provider: string
  startedAt: string
  finishedAt: string
  directory: DirectoryResult

  /** Running on the seed list because the bootstrap pull failed */
  degraded: boolean
}
