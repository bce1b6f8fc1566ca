/**
 * Migration run errors
 *
 * Every fatal kind is a CliError so the entry point can map it straight to
 * an exit code. Drift is a warning value, never thrown.
 */

import { CliError, ErrorCode, errorMessage } from '../cli/errors.js';
import type { RunResult } from './types.js';

export class DiscoveryError extends CliError {
  constructor(
    public readonly directory: string,
    message: string,
    cause?: unknown
  ) {
    super(ErrorCode.DISCOVERY_FAILED, message, { directory }, { cause });
    this.name = 'DiscoveryError';
  }
}

export class BootstrapError extends CliError {
  constructor(
    public readonly table: string,
    cause: unknown
  ) {
    super(
      ErrorCode.BOOTSTRAP_FAILED,
      `Could not create or upgrade ledger table ${table}: ${errorMessage(cause)}`,
      { table },
      { cause }
    );
    this.name = 'BootstrapError';
  }
}

export class LockContentionError extends CliError {
  constructor(public readonly lockId: number) {
    super(
      ErrorCode.MIGRATION_LOCKED,
      `Another migration run holds lock ${lockId}`,
      { lockId }
    );
    this.name = 'LockContentionError';
  }
}

export class ExecutionError extends CliError {
  constructor(
    public readonly unit: string,
    public readonly result: RunResult,
    cause: unknown
  ) {
    super(
      ErrorCode.MIGRATION_FAILED,
      `Migration ${unit} failed: ${errorMessage(cause)}`,
      { unit, applied: result.applied, skipped: result.skipped },
      { cause }
    );
    this.name = 'ExecutionError';
  }
}
