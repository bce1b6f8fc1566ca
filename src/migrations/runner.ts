/**
 * Migration runner
 * Applies pending migrations in name order under the migration lock
 *
 * Per unit: Pending -> Skipped | Applying -> Applied | Failed.
 * Drift marks a skipped unit; it never re-applies one.
 */

import type { MigrationConnection } from '../database/connection.js';
import { DEFAULT_LOCK_ID, withLock, type LockCoordinator, type WithLockOptions } from '../locking/coordinator.js';
import { ExecutionError } from './errors.js';
import type { ApplyLedger } from './ledger.js';
import { silentReporter, type Reporter } from './reporter.js';
import { discoverMigrations } from './source.js';
import type { MigrationUnit, RunResult } from './types.js';

export interface RunContext {
  connection: MigrationConnection;
  ledger: ApplyLedger;
  lock: LockCoordinator;
}

export interface RunOptions {
  directory: string;
  extension?: string;
  lockId?: number;
  reporter?: Reporter;
  onReleaseError?: WithLockOptions['onReleaseError'];
}

export function emptyResult(): RunResult {
  return {
    applied: [],
    skipped: [],
    drifted: [],
    unverified: [],
    failed: null,
    status: 'success',
    durationMs: 0,
  };
}

/**
 * Run every pending migration in the directory
 *
 * Throws DiscoveryError, LockContentionError, BootstrapError or
 * ExecutionError. An ExecutionError carries the partial result; units
 * applied before the failure stay applied.
 */
export async function runMigrations(context: RunContext, options: RunOptions): Promise<RunResult> {
  const startedAt = Date.now();
  const report = options.reporter ?? silentReporter;
  const result = emptyResult();

  const units = discoverMigrations(options.directory, { extension: options.extension });

  const finish = (): RunResult => {
    result.durationMs = Date.now() - startedAt;
    report({ type: 'finished', result });
    return result;
  };

  if (units.length === 0) {
    report({ type: 'empty', directory: options.directory });
    return finish();
  }

  report({ type: 'discovered', directory: options.directory, count: units.length });

  await withLock(
    context.lock,
    options.lockId ?? DEFAULT_LOCK_ID,
    async () => {
      await context.ledger.ensureSchema();

      for (const unit of units) {
        try {
          await processUnit(context, unit, result, report);
        } catch (error) {
          result.failed = unit.name;
          result.status = 'failed';
          report({ type: 'failed', name: unit.name, error });
          finish();
          throw new ExecutionError(unit.name, result, error);
        }
      }
    },
    { onReleaseError: options.onReleaseError }
  );

  return finish();
}

async function processUnit(
  { connection, ledger }: RunContext,
  unit: MigrationUnit,
  result: RunResult,
  report: Reporter
): Promise<void> {
  const entry = await ledger.lookup(unit.name);

  if (entry) {
    if (entry.contentHash === null) {
      result.unverified.push(unit.name);
      report({ type: 'unverified', name: unit.name });
    } else if (entry.contentHash !== unit.contentHash) {
      const warning = { name: unit.name, storedHash: entry.contentHash, currentHash: unit.contentHash };
      result.drifted.push(warning);
      report({ type: 'drift', warning });
    }
    result.skipped.push(unit.name);
    report({ type: 'skipped', name: unit.name });
    return;
  }

  report({ type: 'applying', unit });
  const startedAt = Date.now();

  await connection.execute(unit.content, unit.mode === 'transactional');
  await ledger.record(unit.name, unit.contentHash);

  result.applied.push(unit.name);
  report({ type: 'applied', name: unit.name, durationMs: Date.now() - startedAt });
}
