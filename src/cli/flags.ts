/**
 * Global flags for the strata CLI
 *
 * GLOBAL_OPTIONS drives parsing, environment defaults and the GLOBAL OPTIONS
 * help section. Global flags may appear anywhere on the command line; every
 * other argument passes through to the command in its original order.
 */

import { parseArgs } from 'node:util';
import { ENV_VARS, isTruthy } from './env.js';
import { invalidArgumentsError } from './errors.js';
import type { OptionDef } from './help.js';

/**
 * Parsed global options available to all commands
 */
export interface GlobalFlags {
  /** Output as JSON (-j, --json) */
  json: boolean;
  /** Minimal output (-q, --quiet) */
  quiet: boolean;
  /** Detailed output (-v, --verbose) */
  verbose: boolean;
  /** Show help (-h, --help) */
  help: boolean;
  /** Show version (--version) */
  version: boolean;
  /** Disable colors (--no-color) */
  noColor: boolean;
  /** Custom config path (--config) */
  configPath?: string;
}

export interface ParsedArgs {
  flags: GlobalFlags;
  /** Command name, its arguments and its options */
  remaining: string[];
}

type BooleanFlag = Exclude<keyof GlobalFlags, 'configPath'>;

export interface GlobalOptionDef extends OptionDef {
  flag: BooleanFlag | 'configPath';
  /** Environment variable supplying a default */
  env?: string;
}

export const GLOBAL_OPTIONS: readonly GlobalOptionDef[] = [
  { flag: 'help', short: 'h', long: 'help', description: 'Show help' },
  { flag: 'version', long: 'version', description: 'Show version' },
  { flag: 'json', short: 'j', long: 'json', description: 'Output as JSON', env: ENV_VARS.STRATA_JSON },
  { flag: 'quiet', short: 'q', long: 'quiet', description: 'Only warnings and errors', env: ENV_VARS.STRATA_QUIET },
  { flag: 'verbose', short: 'v', long: 'verbose', description: 'Detailed output', env: ENV_VARS.STRATA_VERBOSE },
  { flag: 'noColor', long: 'no-color', description: 'Disable colored output', env: ENV_VARS.STRATA_NO_COLOR },
  {
    flag: 'configPath',
    long: 'config',
    description: 'Custom config file path',
    values: '<path>',
    env: ENV_VARS.STRATA_CONFIG,
  },
];

export function getDefaultFlags(): GlobalFlags {
  return {
    json: false,
    quiet: false,
    verbose: false,
    help: false,
    version: false,
    noColor: false,
    configPath: undefined,
  };
}

/** Option table in the shape node:util parseArgs takes */
export type ParseArgsOptions = Record<string, { type: 'string' | 'boolean'; short?: string }>;

/**
 * Options with `values` take a string; the rest are switches
 */
export function toParseArgsOptions(defs: readonly OptionDef[]): ParseArgsOptions {
  const options: ParseArgsOptions = {};
  for (const def of defs) {
    options[def.long] = {
      type: def.values ? 'string' : 'boolean',
      ...(def.short ? { short: def.short } : {}),
    };
  }
  return options;
}

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/**
 * Parse a duration such as 30s, 5m, 1h or a plain number of milliseconds
 */
export function parseDuration(value: string): number {
  const match = /^(\d+)(ms|s|m|h)?$/.exec(value);
  if (!match) {
    throw new Error(`Invalid duration format: ${value}. Use format: 30s, 5m, 1h, or milliseconds`);
  }
  return parseInt(match[1], 10) * DURATION_UNITS[match[2] ?? 'ms'];
}

/**
 * Defaults from STRATA_* variables; NO_COLOR counts with any value
 */
export function loadEnvFlags(env: NodeJS.ProcessEnv = process.env): Partial<GlobalFlags> {
  const flags: Partial<GlobalFlags> = {};

  for (const def of GLOBAL_OPTIONS) {
    if (!def.env) continue;
    const value = env[def.env];
    if (def.flag === 'configPath') {
      if (value) flags.configPath = value;
    } else if (isTruthy(value)) {
      flags[def.flag] = true;
    }
  }
  if (env[ENV_VARS.NO_COLOR] !== undefined) {
    flags.noColor = true;
  }

  return flags;
}

export function parseGlobalFlags(args: string[]): ParsedArgs {
  const flags: GlobalFlags = { ...getDefaultFlags(), ...loadEnvFlags() };
  const byName = new Map(GLOBAL_OPTIONS.map((def) => [def.long, def]));

  // Non-strict: command options come back as tokens we hand on untouched
  const { tokens = [] } = parseArgs({
    args,
    options: toParseArgsOptions(GLOBAL_OPTIONS),
    strict: false,
    allowPositionals: true,
    tokens: true,
  });

  const remaining: string[] = [];
  for (const token of tokens) {
    if (token.kind === 'positional') {
      remaining.push(token.value);
      continue;
    }
    if (token.kind === 'option-terminator') {
      remaining.push('--');
      continue;
    }

    const def = byName.get(token.name);
    if (!def) {
      remaining.push(token.inlineValue ? `${token.rawName}=${token.value ?? ''}` : token.rawName);
    } else if (def.flag === 'configPath') {
      if (token.value === undefined) {
        throw invalidArgumentsError('--config requires a path argument');
      }
      flags.configPath = token.value;
    } else {
      flags[def.flag] = true;
    }
  }

  if (flags.quiet && flags.verbose) {
    throw invalidArgumentsError('Cannot use --quiet and --verbose together');
  }

  return { flags, remaining };
}

/**
 * Make --no-color visible to the color helpers
 */
export function applyGlobalFlags(flags: GlobalFlags): void {
  if (flags.noColor) {
    process.env.NO_COLOR = '1';
  }
}
