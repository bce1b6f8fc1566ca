#!/usr/bin/env node
/**
 * strata - SQL schema migration runner
 * Entry point for the CLI
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { parseGlobalFlags, applyGlobalFlags } from './cli/flags.js';
import { CliError, ErrorCode, ExitCode, getExitCode } from './cli/errors.js';
import { outputJsonError } from './cli/output.js';
import { didYouMean, generateOverview, helpHint } from './cli/help.js';
import { isTruthy } from './cli/env.js';
import { migrateCommand } from './commands/migrate.js';
import { statusCommand } from './commands/status.js';
import { configCommand } from './commands/config.js';

const COMMANDS = ['migrate', 'up', 'status', 'config'];

// Read version from package.json - search up from dist folder
function getVersion(): string {
  // When running from dist/src/, package.json is two levels up
  const paths = [
    join(__dirname, '..', '..', 'package.json'),
    join(__dirname, '..', 'package.json'),
    join(process.cwd(), 'package.json'),
  ];
  for (const p of paths) {
    if (!existsSync(p)) continue;
    try {
      const pkg: unknown = JSON.parse(readFileSync(p, 'utf-8'));
      if (
        typeof pkg === 'object' && pkg !== null &&
        'name' in pkg && pkg.name === 'strata-migrate' &&
        'version' in pkg && typeof pkg.version === 'string'
      ) {
        return pkg.version;
      }
    } catch {
      // unreadable package.json; try the next candidate
      continue;
    }
  }
  return '0.0.0';
}
const VERSION = getVersion();

const HELP = generateOverview({
  description: 'Apply versioned SQL migrations exactly once',
  commands: [
    { name: 'migrate', description: 'Apply pending migrations (alias: up)' },
    { name: 'status', description: 'Show applied, pending and drifted migrations' },
    { name: 'config', description: 'Inspect and validate configuration' },
  ],
  examples: [
    'strata migrate --database ./data/app.db',
    'STRATA_DATABASE_URL=postgres://app@localhost/app strata up',
    'strata status --json',
    'strata config validate',
  ],
});

async function main(): Promise<void> {
  try {
    const args = process.argv.slice(2);

    // Parse global flags first
    const { flags, remaining } = parseGlobalFlags(args);

    // Apply global flags (e.g., set NO_COLOR)
    applyGlobalFlags(flags);

    // Handle --version at top level
    if (flags.version && remaining.length === 0) {
      if (flags.json) {
        console.log(JSON.stringify({ version: VERSION }, null, 2));
      } else {
        console.log(`strata v${VERSION}`);
      }
      process.exit(ExitCode.SUCCESS);
    }

    // No command provided, or top-level --help
    if (remaining.length === 0) {
      console.log(HELP);
      process.exit(ExitCode.SUCCESS);
    }

    const command = remaining[0];
    const commandArgs = remaining.slice(1);

    let exitCode: ExitCode;
    switch (command) {
      case 'migrate':
      case 'up':
        exitCode = await migrateCommand(commandArgs, flags);
        break;
      case 'status':
        exitCode = await statusCommand(commandArgs, flags);
        break;
      case 'config':
        exitCode = await configCommand(commandArgs, flags);
        break;
      default: {
        const suggestion = didYouMean(command, COMMANDS);
        if (flags.json) {
          outputJsonError(
            command,
            null,
            ErrorCode.INVALID_ARGUMENTS,
            `Unknown command: ${command}`,
            { command }
          );
        } else {
          console.error(`Error: Unknown command: ${command}`);
          if (suggestion) console.error(suggestion);
          console.error(helpHint());
        }
        exitCode = getExitCode(ErrorCode.INVALID_ARGUMENTS);
      }
    }
    process.exit(exitCode);
  } catch (error) {
    // Flags may be the thing that failed to parse; fall back to env vars
    let errorFlags = { json: false, verbose: false };
    try {
      const { flags } = parseGlobalFlags(process.argv.slice(2));
      errorFlags = { json: flags.json, verbose: flags.verbose };
    } catch {
      errorFlags.json = isTruthy(process.env.STRATA_JSON);
      errorFlags.verbose = isTruthy(process.env.STRATA_VERBOSE);
    }

    // Handle CliError with proper exit codes
    if (error instanceof CliError) {
      if (errorFlags.json) {
        outputJsonError('strata', null, error.code, error.message, error.details);
      } else {
        console.error(`Error: ${error.message}`);
        if (errorFlags.verbose && error.details) {
          console.error('Details:', JSON.stringify(error.details, null, 2));
        }
      }
      process.exit(error.exitCode);
    }

    // Handle generic errors
    if (error instanceof Error) {
      if (errorFlags.json) {
        outputJsonError('strata', null, ErrorCode.INTERNAL_ERROR, error.message);
      } else {
        console.error(`Error: ${error.message}`);
        if (errorFlags.verbose) {
          console.error(error.stack);
        }
      }
    } else {
      if (errorFlags.json) {
        outputJsonError('strata', null, ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred');
      } else {
        console.error('An unexpected error occurred');
      }
    }
    process.exit(getExitCode(ErrorCode.GENERAL_ERROR));
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(ExitCode.GENERAL_ERROR);
});
