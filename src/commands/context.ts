/**
 * Shared setup for commands that talk to the database:
 * option parsing, config resolution, connection and lock selection
 */

import { parseArgs } from 'node:util';
import { toParseArgsOptions, type GlobalFlags, type ParseArgsOptions } from '../cli/flags.js';
import { errorMessage, invalidArgumentsError } from '../cli/errors.js';
import type { OptionDef } from '../cli/help.js';
import { loadConfig, resolveConfig, type ResolvedConfig, type StrataConfig } from '../config/loader.js';
import { isDatabaseDriver, type DatabaseDriver } from '../config/schema.js';
import type { MigrationConnection } from '../database/connection.js';
import { openConnection } from '../database/open.js';
import { createAdvisoryLock } from '../locking/advisory-lock.js';
import type { LockCoordinator } from '../locking/coordinator.js';
import { createLeaseLock } from '../locking/lease-lock.js';
import { ApplyLedger } from '../migrations/ledger.js';

export interface DatabaseCommandOptions {
  help: boolean;
  dir?: string;
  database?: string;
  driver?: string;
}

const POSTGRES_URL = /^postgres(ql)?:\/\//;

/**
 * Options shared by the commands that open the database
 */
export const DATABASE_OPTIONS: readonly OptionDef[] = [
  { short: 'd', long: 'dir', description: 'Migration directory', values: '<path>', default: 'db/migrations' },
  { long: 'database', description: 'postgres:// URL or SQLite file path', values: '<url|path>' },
  { long: 'driver', description: 'Database driver', values: 'postgres | sqlite', default: 'postgres' },
];

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse --dir, --database and --driver
 */
export function parseDatabaseOptions(args: string[]): DatabaseCommandOptions {
  try {
    const options: ParseArgsOptions = {
      help: { type: 'boolean', short: 'h' },
      ...toParseArgsOptions(DATABASE_OPTIONS),
    };
    const { values } = parseArgs({
      args,
      options,
      allowPositionals: false,
    });
    return {
      help: values.help === true,
      dir: stringOption(values.dir),
      database: stringOption(values.database),
      driver: stringOption(values.driver),
    };
  } catch (error) {
    throw invalidArgumentsError(errorMessage(error));
  }
}

/**
 * Turn command-line options into config overrides
 *
 * --database takes a postgres:// URL or a SQLite file path; without
 * --driver the form of the value picks the driver.
 */
export function toConfigOverrides(options: DatabaseCommandOptions): StrataConfig {
  const overrides: StrataConfig = {};

  let driver: DatabaseDriver | undefined;
  if (options.driver !== undefined) {
    if (!isDatabaseDriver(options.driver)) {
      throw invalidArgumentsError(`Unknown driver "${options.driver}". Valid options: postgres, sqlite`);
    }
    driver = options.driver;
  }

  if (options.database !== undefined) {
    const isUrl = POSTGRES_URL.test(options.database);
    const effective = driver ?? (isUrl ? 'postgres' : 'sqlite');
    overrides.database = effective === 'postgres'
      ? { driver: effective, url: options.database }
      : { driver: effective, path: options.database };
  } else if (driver) {
    overrides.database = { driver };
  }

  if (options.dir !== undefined) {
    overrides.migrations = { directory: options.dir };
  }

  return overrides;
}

export function loadCommandConfig(flags: GlobalFlags, options: DatabaseCommandOptions): ResolvedConfig {
  const projectPath = process.cwd();
  const config = loadConfig({
    projectPath,
    configPath: flags.configPath,
    overrides: toConfigOverrides(options),
  });
  return resolveConfig(config, projectPath);
}

export interface DatabaseContext {
  config: ResolvedConfig;
  connection: MigrationConnection;
  ledger: ApplyLedger;
}

export async function openDatabaseContext(config: ResolvedConfig): Promise<DatabaseContext> {
  const connection = await openConnection(config.database);
  try {
    const ledger = new ApplyLedger(connection, {
      table: config.migrations.table,
      schema: config.migrations.schema,
    });
    return { config, connection, ledger };
  } catch (error) {
    await connection.close();
    throw error;
  }
}

/**
 * Build the configured lock strategy on the run's connection
 */
export function createLock(config: ResolvedConfig, connection: MigrationConnection): LockCoordinator {
  if (config.lock.strategy === 'advisory') {
    return createAdvisoryLock(connection);
  }
  return createLeaseLock(connection, {
    table: config.migrations.table,
    schema: config.migrations.schema,
    ttlMs: config.lock.ttlMs,
    heartbeatMs: config.lock.heartbeatMs,
  });
}
