/**
 * Tests for help text generation
 */

import { describe, it, expect } from '@jest/globals';
import { generateHelp, generateOverview, helpHint, didYouMean } from '../src/cli/help.js';
import { DATABASE_OPTIONS } from '../src/commands/context.js';

describe('generateHelp', () => {
  it('should render the sections of a template', () => {
    const help = generateHelp({
      command: 'status',
      description: 'Show migration state',
      options: [{ short: 'd', long: 'dir', description: 'Migration directory', default: 'db/migrations' }],
      examples: [{ command: 'strata status --json', description: 'Machine-readable state' }],
      showEnvVars: false,
      showExitCodes: false,
    });

    const lines = help.split('\n');
    expect(lines[0]).toBe('strata status - Show migration state');
    expect(lines).toContain('  strata status [options]');
    expect(lines).toContain(`  ${'-d, --dir'.padEnd(24)}Migration directory`);
    expect(lines).toContain(`${' '.repeat(26)}Default: db/migrations`);
    expect(lines).toContain(`  ${'strata status --json'.padEnd(50)} # Machine-readable state`);
    expect(help).toContain('GLOBAL OPTIONS:');
    expect(help).not.toContain('EXIT CODES:');
  });

  it('should include exit codes and environment variables by default', () => {
    const help = generateHelp({ command: 'migrate', description: 'Apply pending migrations' });
    expect(help).toContain('  6  Another migration run holds the lock');
    expect(help).toContain('STRATA_DATABASE_URL');
  });

  it('should render global options and their variables from the flag table', () => {
    const lines = generateHelp({ command: 'migrate', description: 'Apply pending migrations' }).split('\n');

    expect(lines).toContain(`  ${'    --config'.padEnd(24)}Custom config file path`);
    expect(lines).toContain(`${' '.repeat(26)}Values: <path>`);
    expect(lines).toContain(`  ${'STRATA_JSON'.padEnd(23)}Output as JSON (--json)`);
    expect(lines).toContain(`  ${'STRATA_CONFIG'.padEnd(23)}Custom config file path (--config)`);
  });

  it('should list the options the database commands parse', () => {
    const lines = generateHelp({
      command: 'status',
      description: 'Show migration state',
      options: DATABASE_OPTIONS,
      showGlobalOptions: false,
    }).split('\n');

    const start = lines.indexOf('OPTIONS:');
    expect(lines.slice(start, start + 10)).toEqual([
      'OPTIONS:',
      `  ${'-d, --dir'.padEnd(24)}Migration directory`,
      `${' '.repeat(26)}Values: <path>`,
      `${' '.repeat(26)}Default: db/migrations`,
      `  ${'    --database'.padEnd(24)}postgres:// URL or SQLite file path`,
      `${' '.repeat(26)}Values: <url|path>`,
      `  ${'    --driver'.padEnd(24)}Database driver`,
      `${' '.repeat(26)}Values: postgres | sqlite`,
      `${' '.repeat(26)}Default: postgres`,
      '',
    ]);
    expect(lines).not.toContain('GLOBAL OPTIONS:');
  });
});

describe('generateOverview', () => {
  it('should list commands, global options and examples', () => {
    const lines = generateOverview({
      description: 'Apply versioned SQL migrations exactly once',
      commands: [{ name: 'migrate', description: 'Apply pending migrations (alias: up)' }],
      examples: ['strata status --json'],
    }).split('\n');

    expect(lines.slice(0, 7)).toEqual([
      'strata - Apply versioned SQL migrations exactly once',
      '',
      'USAGE:',
      '  strata <command> [options]',
      '',
      'COMMANDS:',
      `  ${'migrate'.padEnd(18)}Apply pending migrations (alias: up)`,
    ]);
    expect(lines).toContain(`  ${'-q, --quiet'.padEnd(24)}Only warnings and errors`);
    expect(lines.slice(-3)).toEqual(['EXAMPLES:', '  strata status --json', '']);
  });
});

describe('helpHint', () => {
  it('should point at the right help', () => {
    expect(helpHint()).toBe("Run 'strata --help' for usage information.");
    expect(helpHint('status')).toBe("Run 'strata status --help' for usage information.");
  });
});

describe('didYouMean', () => {
  const commands = ['migrate', 'up', 'status', 'config'];

  it('should suggest near misses', () => {
    expect(didYouMean('migrat', commands)).toBe("Did you mean 'migrate'?");
    expect(didYouMean('STATUS', commands)).toBe("Did you mean 'status'?");
  });

  it('should stay quiet for distant input', () => {
    expect(didYouMean('deploy', commands)).toBeNull();
  });
});
