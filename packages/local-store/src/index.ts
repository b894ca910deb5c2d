/**
 * @fileoverview Public API exports for @marketsync/local-store
 */

export { LocalStore, DIRECTORY_SCOPE, HISTORY_SCOPE, historyScope } from './local-store.js'
export type { LocalStoreOptions, SyncState, ListSymbolsOptions } from './local-store.js'
export { parseExtras } from './rows.js'
