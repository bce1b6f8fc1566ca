import type { GlobalFlags } from '../cli/flags.js';
/**
 * strata config - Inspect and validate configuration
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse, stringify } from 'yaml';
import { CliError, ErrorCode, ExitCode, errorMessage } from '../cli/errors.js';
import { markers } from '../cli/colors.js';
import { createOutput, type Output } from '../cli/output.js';
import { didYouMean, generateHelp, helpHint } from '../cli/help.js';
import {
  getGlobalConfigPath,
  getProjectConfigPath,
  loadConfig,
  readEnvOverrides,
  type StrataConfig,
} from '../config/loader.js';
import { formatValidationResult, validateConfig, type ValidationResult } from '../config/validator.js';
import { redactUrl } from '../database/connection.js';

const SUBCOMMANDS = ['show', 'validate', 'path'];

const HELP = generateHelp({
  command: 'config',
  description: 'Inspect and validate configuration',
  details: `Configuration is merged from defaults, the global file (~/.strata/config.yaml),
the project file (.strata/config.yaml or --config), STRATA_* environment
variables and command-line options, in that order.`,
  usage: ['strata config [subcommand]'],
  subcommands: [
    { name: 'show', description: 'Print the merged configuration (default)' },
    { name: 'validate', description: 'Check config files and STRATA_* variables' },
    { name: 'path', description: 'Show configuration file paths' },
  ],
  examples: [
    { command: 'strata config', description: 'Show merged config' },
    { command: 'strata config validate', description: 'Validate config files' },
    { command: 'strata config show --json', description: 'Merged config as JSON' },
  ],
});

export async function configCommand(args: string[], flags: GlobalFlags): Promise<ExitCode> {
  if (flags.help || args[0] === '-h' || args[0] === '--help') {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const subcommand = args[0] ?? 'show';
  const out = createOutput({ command: 'config', subcommand, flags });

  try {
    switch (subcommand) {
      case 'show':
        return runShow(out, flags);
      case 'validate':
        return runValidate(out, flags);
      case 'path':
        return runPath(out, flags);
      default: {
        const suggestion = didYouMean(subcommand, SUBCOMMANDS);
        out.error(
          ErrorCode.INVALID_ARGUMENTS,
          `Unknown subcommand: ${subcommand}${suggestion ? `. ${suggestion}` : ''}`,
          { subcommand }
        );
        out.fail(helpHint('config'));
        return ExitCode.INVALID_ARGUMENTS;
      }
    }
  } catch (error) {
    if (error instanceof CliError) {
      out.error(error.code, error.message, error.details);
      return error.exitCode;
    }
    throw error;
  }
}

function projectConfigPath(flags: GlobalFlags): string {
  return flags.configPath ? resolve(flags.configPath) : getProjectConfigPath();
}

/**
 * Copy of the config safe to print
 */
export function redactConfig(config: StrataConfig): StrataConfig {
  if (!config.database?.url) {
    return config;
  }
  return { ...config, database: { ...config.database, url: redactUrl(config.database.url) } };
}

function runShow(out: Output, flags: GlobalFlags): ExitCode {
  const config = redactConfig(loadConfig({ configPath: flags.configPath }));

  if (out.isJson()) {
    out.success(config);
  } else {
    console.log(stringify(config).trimEnd());
  }
  return ExitCode.SUCCESS;
}

interface FileValidation {
  source: string;
  result: ValidationResult;
}

function validateFile(path: string): ValidationResult {
  let parsed: unknown;
  try {
    parsed = parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    return { valid: false, errors: [{ path: '(file)', message: `YAML parse error: ${errorMessage(error)}` }] };
  }
  return validateConfig(parsed ?? {});
}

function runValidate(out: Output, flags: GlobalFlags): ExitCode {
  const checks: FileValidation[] = [];

  for (const path of [getGlobalConfigPath(), projectConfigPath(flags)]) {
    if (existsSync(path)) {
      checks.push({ source: path, result: validateFile(path) });
    } else if (flags.configPath && path === projectConfigPath(flags)) {
      checks.push({ source: path, result: { valid: false, errors: [{ path: '(file)', message: 'File not found' }] } });
    }
  }
  checks.push({ source: 'STRATA_* environment', result: validateConfig(readEnvOverrides()) });

  const valid = checks.every((check) => check.result.valid);

  if (out.isJson()) {
    if (valid) {
      out.success({ valid, checks });
    } else {
      out.error(ErrorCode.CONFIG_ERROR, 'Configuration is invalid', undefined, { valid, checks });
    }
  } else {
    for (const check of checks) {
      out.log(check.result.valid ? markers.success(check.source) : markers.error(check.source));
      if (!check.result.valid) {
        out.fail(formatValidationResult(check.result));
      }
    }
  }

  return valid ? ExitCode.SUCCESS : ExitCode.CONFIG_ERROR;
}

function runPath(out: Output, flags: GlobalFlags): ExitCode {
  const paths = {
    global: getGlobalConfigPath(),
    project: projectConfigPath(flags),
  };

  if (out.isJson()) {
    out.success({
      global: { path: paths.global, exists: existsSync(paths.global) },
      project: { path: paths.project, exists: existsSync(paths.project) },
    });
    return ExitCode.SUCCESS;
  }

  for (const [scope, path] of Object.entries(paths)) {
    const mark = existsSync(path) ? markers.success() : markers.pending();
    out.log(`${mark} ${scope.padEnd(8)} ${path}`);
  }
  return ExitCode.SUCCESS;
}
