/**
 * Help text for the strata CLI
 *
 * Option sections render the same tables the parsers read, so help and
 * parsing cannot drift apart.
 */

import { GLOBAL_OPTIONS } from './flags.js';

/**
 * One command-line option, for parsing and for help
 */
export interface OptionDef {
  short?: string;
  long: string;
  description: string;
  /** Placeholder for the option's value; options without one are switches */
  values?: string;
  default?: string;
}

export interface NamedEntry {
  name: string;
  description: string;
}

export interface CommandExample {
  command: string;
  description: string;
}

export interface HelpSection {
  title: string;
  content: string;
}

export interface HelpTemplate {
  /** Command name, e.g. 'migrate' */
  command: string;
  description: string;
  details?: string;
  usage?: string[];
  subcommands?: NamedEntry[];
  options?: readonly OptionDef[];
  examples?: CommandExample[];
  related?: CommandExample[];
  sections?: HelpSection[];
  showGlobalOptions?: boolean;
  showExitCodes?: boolean;
  showEnvVars?: boolean;
}

const OPTION_COLUMN = 24;
const ENV_COLUMN = 23;

/** Variables read by the config loader rather than the flag parser */
const CONFIG_ENV_VARS: NamedEntry[] = [
  { name: 'STRATA_DATABASE_URL', description: 'PostgreSQL connection string (database.url)' },
  { name: 'STRATA_DATABASE_PATH', description: 'SQLite database file (database.path)' },
  { name: 'STRATA_LOCK_ID', description: 'Migration lock id (lock.id)' },
  { name: 'STRATA_HOME', description: 'Directory holding the global .strata/config.yaml' },
  { name: 'NO_COLOR', description: 'Standard no-color variable' },
];

const EXIT_CODES: [number, string][] = [
  [0, 'Success (including nothing to apply)'],
  [1, 'General error or interrupted'],
  [2, 'Invalid arguments'],
  [3, 'Configuration error'],
  [4, 'Migration directory missing or unreadable'],
  [5, 'Could not connect to the database'],
  [6, 'Another migration run holds the lock'],
  [7, 'A migration failed'],
  [8, 'Tracking table could not be created or upgraded'],
];

function formatOption(opt: OptionDef): string[] {
  const names = opt.short ? `-${opt.short}, --${opt.long}` : `    --${opt.long}`;
  const indent = ' '.repeat(OPTION_COLUMN + 2);
  const lines = [`  ${names.padEnd(OPTION_COLUMN)}${opt.description}`];
  if (opt.values) lines.push(`${indent}Values: ${opt.values}`);
  if (opt.default) lines.push(`${indent}Default: ${opt.default}`);
  return lines;
}

function section(title: string, body: string[]): string[] {
  return body.length > 0 ? [`${title}:`, ...body, ''] : [];
}

function indented(text: string): string[] {
  return text.trim().split('\n').map((line) => (line ? `  ${line}` : ''));
}

function optionLines(options: readonly OptionDef[]): string[] {
  return options.flatMap(formatOption);
}

function envVarLines(): string[] {
  const fromFlags = GLOBAL_OPTIONS.flatMap((def) =>
    def.env ? [`  ${def.env.padEnd(ENV_COLUMN)}${def.description} (--${def.long})`] : []
  );
  const fromConfig = CONFIG_ENV_VARS.map((entry) => `  ${entry.name.padEnd(ENV_COLUMN)}${entry.description}`);
  return [...fromFlags, ...fromConfig];
}

function exitCodeLines(): string[] {
  return EXIT_CODES.map(([code, meaning]) => `  ${code}  ${meaning}`);
}

/**
 * Help for one command
 */
export function generateHelp(template: HelpTemplate): string {
  const usage = template.usage && template.usage.length > 0
    ? template.usage
    : [`strata ${template.command} [options]`];

  const lines = [
    `strata ${template.command} - ${template.description}`,
    '',
    ...section('USAGE', usage.map((line) => `  ${line}`)),
    ...section('DESCRIPTION', template.details ? indented(template.details) : []),
    ...section(
      'SUBCOMMANDS',
      (template.subcommands ?? []).map((sub) => `  ${sub.name.padEnd(20)}${sub.description}`)
    ),
    ...section('OPTIONS', optionLines(template.options ?? [])),
    ...section('GLOBAL OPTIONS', template.showGlobalOptions === false ? [] : optionLines(GLOBAL_OPTIONS)),
    ...section(
      'EXAMPLES',
      (template.examples ?? []).map((ex) => `  ${ex.command.padEnd(50)} # ${ex.description}`)
    ),
    ...section(
      'RELATED COMMANDS',
      (template.related ?? []).map((rel) => `  ${rel.command.padEnd(30)}${rel.description}`)
    ),
  ];

  for (const custom of template.sections ?? []) {
    lines.push(...section(custom.title, indented(custom.content)));
  }
  if (template.showEnvVars !== false) {
    lines.push(...section('ENVIRONMENT VARIABLES', envVarLines()));
  }
  if (template.showExitCodes !== false) {
    lines.push(...section('EXIT CODES', exitCodeLines()));
  }

  return lines.join('\n');
}

export interface OverviewTemplate {
  description: string;
  commands: NamedEntry[];
  examples: string[];
}

/**
 * Top-level help listing the commands
 */
export function generateOverview(template: OverviewTemplate): string {
  return [
    `strata - ${template.description}`,
    '',
    ...section('USAGE', ['  strata <command> [options]']),
    ...section('COMMANDS', template.commands.map((cmd) => `  ${cmd.name.padEnd(18)}${cmd.description}`)),
    ...section('GLOBAL OPTIONS', optionLines(GLOBAL_OPTIONS)),
    ...section('ENVIRONMENT VARIABLES', envVarLines()),
    ...section('EXAMPLES', template.examples.map((example) => `  ${example}`)),
  ].join('\n');
}

export function helpHint(command?: string): string {
  const target = command ? `strata ${command}` : 'strata';
  return `Run '${target} --help' for usage information.`;
}

/**
 * Suggest the closest known name, if it is close enough
 */
export function didYouMean(provided: string, candidates: string[]): string | null {
  const input = provided.toLowerCase();
  let best: { name: string; distance: number } | null = null;

  for (const name of candidates) {
    const distance = editDistance(input, name.toLowerCase());
    if (!best || distance < best.distance) {
      best = { name, distance };
    }
  }

  return best && best.distance <= provided.length / 2 ? `Did you mean '${best.name}'?` : null;
}

/**
 * Levenshtein distance over two rolling rows
 */
function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current[j] = Math.min(substitution, previous[j] + 1, current[j - 1] + 1);
    }
    previous = current;
  }

  return previous[b.length];
}
