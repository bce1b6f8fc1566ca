/**
 * strata migrate - Apply pending migrations
 */

import type { GlobalFlags } from '../cli/flags.js';
import { CliError, ExitCode, errorMessage, interruptedError } from '../cli/errors.js';
import { createOutput, type Output } from '../cli/output.js';
import { generateHelp } from '../cli/help.js';
import { ExecutionError } from '../migrations/errors.js';
import { createConsoleReporter } from '../migrations/reporter.js';
import { runMigrations } from '../migrations/runner.js';
import type { MigrationConnection } from '../database/connection.js';
import type { LockCoordinator } from '../locking/coordinator.js';
import {
  DATABASE_OPTIONS,
  createLock,
  loadCommandConfig,
  openDatabaseContext,
  parseDatabaseOptions,
  type DatabaseContext,
} from './context.js';

const HELP = generateHelp({
  command: 'migrate',
  description: 'Apply pending migrations',
  details: `Applies every migration file that is not yet in the ledger, in byte-wise
file name order, while holding the migration lock. Already-applied files are
skipped; applied files whose content changed are reported as drift and skipped.
A file with "-- strata:no_tx" in its first 5 lines runs outside a transaction.`,
  usage: ['strata migrate [options]', 'strata up [options]'],
  options: DATABASE_OPTIONS,
  examples: [
    { command: 'strata migrate', description: 'Apply using .strata/config.yaml' },
    { command: 'strata migrate --database ./data/app.db', description: 'Apply to a SQLite file' },
    { command: 'STRATA_DATABASE_URL=postgres://... strata up', description: 'Apply to PostgreSQL' },
    { command: 'strata migrate --json', description: 'Machine-readable result' },
  ],
  related: [
    { command: 'strata status', description: 'Show what would be applied' },
  ],
});

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
const SHUTDOWN_TIMEOUT_MS = 5_000;

export interface InterruptOptions {
  out: Output;
  lock: LockCoordinator;
  lockId: number;
  connection: MigrationConnection;
  /** Upper bound for each cleanup step */
  timeoutMs?: number;
  exit?: (code: number) => void;
}

/**
 * Resolve true when task settles within ms, false when it is still pending
 */
async function settleWithin(task: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
    timer.unref();
  });
  try {
    return await Promise.race([task.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Exit on SIGINT/SIGTERM after a bounded cleanup; a second signal exits at once
 *
 * The running statement holds the session, so anything queued behind it may
 * never run. Advisory locks are not released explicitly: the server drops
 * them with the session.
 * @returns detach function
 */
export function installInterruptHandlers(options: InterruptOptions): () => void {
  const { out, lock, lockId, connection } = options;
  const timeoutMs = options.timeoutMs ?? SHUTDOWN_TIMEOUT_MS;
  const exit = options.exit ?? ((code: number): void => process.exit(code));
  let isShuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    const error = interruptedError(signal);
    out.error(error.code, error.message, error.details);

    if (lock.strategy === 'lease') {
      try {
        if (!(await settleWithin(lock.release(lockId), timeoutMs))) {
          out.fail(`Gave up releasing migration lock ${lockId} after ${timeoutMs}ms; it expires with its lease`);
        }
      } catch (releaseError) {
        out.fail(`Failed to release migration lock: ${errorMessage(releaseError)}`);
      }
    }

    await settleWithin(connection.close(), timeoutMs);
    exit(error.exitCode);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    if (isShuttingDown) {
      exit(ExitCode.GENERAL_ERROR);
      return;
    }
    isShuttingDown = true;
    shutdown(signal).catch((shutdownError: unknown) => {
      out.fail(`Shutdown failed: ${errorMessage(shutdownError)}`);
      exit(ExitCode.GENERAL_ERROR);
    });
  };

  for (const signal of SIGNALS) process.on(signal, onSignal);
  return () => {
    for (const signal of SIGNALS) process.off(signal, onSignal);
  };
}

export async function migrateCommand(args: string[], flags: GlobalFlags): Promise<ExitCode> {
  const options = parseDatabaseOptions(args);
  if (flags.help || options.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const out = createOutput({ command: 'migrate', flags });
  let context: DatabaseContext;
  try {
    context = await openDatabaseContext(loadCommandConfig(flags, options));
  } catch (error) {
    return reportFailure(out, error);
  }
  const { config, connection, ledger } = context;
  const lock = createLock(config, connection);

  out.verbose(`Target: ${connection.target}`);
  out.verbose(`Lock: ${lock.strategy} ${config.lock.id}`);

  const detachSignals = installInterruptHandlers({ out, lock, lockId: config.lock.id, connection });

  try {
    const result = await runMigrations(
      { connection, ledger, lock },
      {
        directory: config.migrations.directory,
        extension: config.migrations.extension,
        lockId: config.lock.id,
        reporter: createConsoleReporter(out),
        onReleaseError: (error, lockId) => {
          out.warning(`Failed to release migration lock ${lockId}: ${errorMessage(error)}`);
        },
      }
    );
    out.success(result);
    return ExitCode.SUCCESS;
  } catch (error) {
    return reportFailure(out, error);
  } finally {
    detachSignals();
    await connection.close();
  }
}

function reportFailure(out: Output, error: unknown): ExitCode {
  if (error instanceof ExecutionError) {
    out.error(error.code, error.message, error.details, error.result);
    return error.exitCode;
  }
  if (error instanceof CliError) {
    out.error(error.code, error.message, error.details);
    return error.exitCode;
  }
  throw error;
}
