/**
 * @marketsync/db-simple
 *
 * Minimal database connection and migration runner for SQLite and PostgreSQL
 */

export {
  connect,
  parseConnectionString,
  toPostgresPlaceholders,
  isRetryableDbError,
  type DbConnection,
  type DbLogger,
  type ConnectOptions,
  type RetryOptions,
} from './connect.js'
export { runMigrations, readMigrationFiles, type MigrateOptions, type MigrationResult } from './migrate.js'
