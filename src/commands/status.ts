import type { GlobalFlags } from '../cli/flags.js';
/**
 * strata status - Compare migration files with the ledger
 */

import { colors, markers } from '../cli/colors.js';
import { CliError, ExitCode } from '../cli/errors.js';
import { createOutput } from '../cli/output.js';
import { generateHelp } from '../cli/help.js';
import { hashPrefix } from '../migrations/fingerprint.js';
import { discoverMigrations } from '../migrations/source.js';
import { getMigrationStatus, type MigrationState, type MigrationStatusRow } from '../migrations/status.js';
import { DATABASE_OPTIONS, loadCommandConfig, openDatabaseContext, parseDatabaseOptions } from './context.js';

const HELP = generateHelp({
  command: 'status',
  description: 'Show applied, pending and drifted migrations',
  details: `Reads the migration directory and the ledger without changing either.
States: applied, pending, drift (content changed after applying), unverified
(recorded before content hashes were kept) and orphaned (recorded, file gone).`,
  options: DATABASE_OPTIONS,
  examples: [
    { command: 'strata status', description: 'Show migration state' },
    { command: 'strata status --json', description: 'Machine-readable state' },
  ],
  related: [
    { command: 'strata migrate', description: 'Apply pending migrations' },
  ],
});

const STATE_MARKERS: Record<MigrationState, (text: string) => string> = {
  applied: markers.success,
  pending: markers.pending,
  drift: markers.warning,
  unverified: markers.warning,
  orphaned: markers.error,
};

function formatRow(row: MigrationStatusRow): string[] {
  let note = '';
  if (row.state === 'drift' && row.storedHash && row.currentHash) {
    note = `${hashPrefix(row.storedHash)} -> ${hashPrefix(row.currentHash)}`;
  }
  return [STATE_MARKERS[row.state](row.state), row.name, row.appliedAt ?? '-', colors.dim(note)];
}

export async function statusCommand(args: string[], flags: GlobalFlags): Promise<ExitCode> {
  const options = parseDatabaseOptions(args);
  if (flags.help || options.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const out = createOutput({ command: 'status', flags });

  try {
    const config = loadCommandConfig(flags, options);
    const units = discoverMigrations(config.migrations.directory, { extension: config.migrations.extension });
    const { connection, ledger } = await openDatabaseContext(config);

    try {
      const summary = await getMigrationStatus(units, ledger);

      if (out.isJson()) {
        out.success(summary);
        return ExitCode.SUCCESS;
      }

      if (!summary.ledgerExists) {
        out.log(colors.gray(`Ledger table ${ledger.qualifiedName} does not exist yet`));
      }
      if (summary.rows.length === 0) {
        out.log('No migrations found.');
        return ExitCode.SUCCESS;
      }

      out.table(['STATE', 'NAME', 'APPLIED AT', ''], summary.rows.map(formatRow));
      out.log('');

      const { counts } = summary;
      out.log(
        `${counts.applied} applied, ${counts.pending} pending, ${counts.drift} drifted, ` +
          `${counts.unverified} unverified, ${counts.orphaned} orphaned`
      );
      return ExitCode.SUCCESS;
    } finally {
      await connection.close();
    }
  } catch (error) {
    if (error instanceof CliError) {
      out.error(error.code, error.message, error.details);
      return error.exitCode;
    }
    throw error;
  }
}
