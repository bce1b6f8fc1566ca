/**
 * Migration system exports
 * Library entry point: everything a caller needs to run migrations with a
 * connection it opened itself
 */

// Discovery and fingerprints
export {
  NO_TX_SENTINEL,
  SENTINEL_LINE_LIMIT,
  compareNames,
  detectMode,
  discoverMigrations,
  parseMigrationUnit,
  type DiscoverOptions,
} from './source.js';
export { fingerprint, hashPrefix } from './fingerprint.js';
export { splitStatements } from './statements.js';

// Ledger
export { ApplyLedger, DEFAULT_LEDGER_TABLE, type LedgerOptions } from './ledger.js';

// Runner
export { runMigrations, emptyResult, type RunContext, type RunOptions } from './runner.js';
export {
  createConsoleReporter,
  formatMigrationEvent,
  silentReporter,
  type MigrationEvent,
  type Reporter,
  type ReportLine,
} from './reporter.js';
export {
  classifyMigrations,
  getMigrationStatus,
  type MigrationState,
  type MigrationStatusRow,
  type MigrationStatusSummary,
} from './status.js';

// Errors and shared types
export { BootstrapError, DiscoveryError, ExecutionError, LockContentionError } from './errors.js';
export type {
  DriftWarning,
  LedgerEntry,
  MigrationUnit,
  RunResult,
  RunStatus,
  TransactionMode,
} from './types.js';

// Locks and connections
export { DEFAULT_LOCK_ID, withLock, type LockCoordinator, type WithLockOptions } from '../locking/coordinator.js';
export { createAdvisoryLock } from '../locking/advisory-lock.js';
export { createLeaseLock, type LeaseLock, type LeaseLockOptions } from '../locking/lease-lock.js';
export type { MigrationConnection, Dialect, Row, SqlParam } from '../database/connection.js';
export { PostgresConnection, type PgSession } from '../database/postgres-connection.js';
export { SqliteConnection } from '../database/sqlite-connection.js';
export { openConnection } from '../database/open.js';
