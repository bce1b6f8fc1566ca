/**
 * Shared types for migration discovery, tracking and runs
 */

export type TransactionMode = 'transactional' | 'non-transactional';

export interface MigrationUnit {
  /** File name; identity and sort key */
  readonly name: string;
  readonly path: string;
  readonly content: string;
  /** SHA-256 hex of the raw file bytes */
  readonly contentHash: string;
  readonly mode: TransactionMode;
}

export interface LedgerEntry {
  name: string;
  /** null only for rows written before the hash column existed */
  contentHash: string | null;
  appliedAt: string;
}

export interface DriftWarning {
  name: string;
  storedHash: string;
  currentHash: string;
}

export type RunStatus = 'success' | 'failed';

export interface RunResult {
  applied: string[];
  skipped: string[];
  drifted: DriftWarning[];
  /** Ledger rows with no stored hash, skipped without verification */
  unverified: string[];
  failed: string | null;
  status: RunStatus;
  durationMs: number;
}
