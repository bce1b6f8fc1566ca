/**
 * Configuration loader
 * Loads and merges global and project config files, environment
 * overrides and command-line overrides
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse } from 'yaml';
import { configError, errorMessage } from '../cli/errors.js';
import { isFlagEnvVar } from '../cli/env.js';
import { parseDuration } from '../cli/flags.js';
import { SQLITE_MEMORY } from '../database/connection.js';
import type { DatabaseDriver, LockStrategy } from './schema.js';
import { validateConfig, validateConfigShape } from './validator.js';

const STRATA_DIR = '.strata';
const CONFIG_FILE = 'config.yaml';
const ENV_PREFIX = 'STRATA_';

export interface StrataConfig {
  database?: {
    driver?: DatabaseDriver;
    url?: string;
    path?: string;
    connectTimeout?: string;
  };
  migrations?: {
    directory?: string;
    extension?: string;
    table?: string;
    schema?: string;
  };
  lock?: {
    id?: number;
    strategy?: LockStrategy;
    ttl?: string;
    heartbeat?: string;
  };
}

/**
 * Configuration with defaults applied, paths resolved and durations parsed
 */
export interface ResolvedConfig {
  database:
    | { driver: 'postgres'; url: string; connectTimeoutMs: number }
    | { driver: 'sqlite'; path: string };
  migrations: {
    directory: string;
    extension: string;
    table: string;
    schema?: string;
  };
  lock: {
    id: number;
    strategy: LockStrategy;
    ttlMs: number;
    heartbeatMs: number;
  };
}

export interface LoadConfigOptions {
  /** Base directory for the project config and relative paths (default: cwd) */
  projectPath?: string;
  /** Explicit config file; replaces the project config file */
  configPath?: string;
  /** Highest-priority overrides, usually from command-line options */
  overrides?: StrataConfig;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: StrataConfig = {
  database: {
    driver: 'postgres',
    connectTimeout: '10s',
  },
  migrations: {
    directory: 'db/migrations',
    extension: '.sql',
    table: 'schema_migrations',
  },
  lock: {
    id: 123456789,
    ttl: '10m',
    heartbeat: '30s',
  },
};

/**
 * Get global config path (~/.strata/config.yaml)
 * STRATA_HOME replaces the home directory; Jest's VM context does not pass
 * process.env.HOME changes through to os.homedir().
 */
export function getGlobalConfigPath(): string {
  const home = process.env.STRATA_HOME || homedir();
  return join(home, STRATA_DIR, CONFIG_FILE);
}

/**
 * Get project config path (.strata/config.yaml)
 */
export function getProjectConfigPath(projectPath?: string): string {
  const basePath = projectPath ?? process.cwd();
  return join(basePath, STRATA_DIR, CONFIG_FILE);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Load config from a file
 * Returns empty object if file doesn't exist
 */
export function loadConfigFile(filePath: string): StrataConfig {
  if (!existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw configError(`Failed to parse config at ${filePath}: ${errorMessage(error)}`, {
      path: filePath,
    });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!validateConfigShape(parsed)) {
    throw configError(`Invalid config at ${filePath}`, {
      path: filePath,
      errors: validateConfig(parsed).errors,
    });
  }

  return parsed;
}

/**
 * Deep merge two config objects
 * Second object values override first
 */
export function mergeConfigs(base: StrataConfig, override: StrataConfig): StrataConfig {
  return mergeRecords(base, override);
}

function mergeRecords<T extends object>(base: T, override: T): T {
  const source: object = base;
  const result: Record<string, unknown> = { ...source };

  for (const [key, overrideValue] of Object.entries(override)) {
    const baseValue: unknown = result[key];

    // Empty strings, null, or undefined do not override; false and 0 do
    if (overrideValue === undefined || overrideValue === null || overrideValue === '') {
      continue;
    }

    if (isPlainObject(baseValue) && isPlainObject(overrideValue)) {
      result[key] = mergeRecords(baseValue, overrideValue);
    } else {
      result[key] = overrideValue;
    }
  }

  return result as T;
}

/**
 * Convert STRATA_* environment variables to a config object
 * STRATA_DATABASE_URL -> database.url, STRATA_LOCK_ID -> lock.id
 *
 * Flag variables (STRATA_JSON, STRATA_QUIET, ...) are not config keys.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || isFlagEnvVar(key)) continue;
    if (value === undefined || value === '') continue;

    const [section, ...rest] = key.substring(ENV_PREFIX.length).toLowerCase().split('_');
    if (!section || rest.length === 0) continue;

    // Second segment onward is the camelCase leaf: CONNECT_TIMEOUT -> connectTimeout
    const leaf = rest
      .map((part, index) => (index === 0 ? part : part.charAt(0).toUpperCase() + part.slice(1)))
      .join('');

    const existing = result[section];
    const current: Record<string, unknown> = isPlainObject(existing) ? existing : {};
    current[leaf] = /^-?\d+$/.test(value) ? Number(value) : value;
    result[section] = current;
  }

  return result;
}

/**
 * Load merged configuration
 * Priority: defaults < global < project < environment < overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): StrataConfig {
  let config: StrataConfig = mergeConfigs({}, DEFAULT_CONFIG);

  config = mergeConfigs(config, loadConfigFile(getGlobalConfigPath()));

  const projectFile = options.configPath
    ? resolve(options.projectPath ?? process.cwd(), options.configPath)
    : getProjectConfigPath(options.projectPath);
  if (options.configPath && !existsSync(projectFile)) {
    throw configError(`Config file not found: ${projectFile}`, { path: projectFile });
  }
  config = mergeConfigs(config, loadConfigFile(projectFile));

  const env = readEnvOverrides();
  if (!validateConfigShape(env)) {
    throw configError('Invalid STRATA_* environment configuration', {
      errors: validateConfig(env).errors,
    });
  }
  config = mergeConfigs(config, env);

  if (options.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

function durationOf(value: string | undefined, fallback: string, key: string): number {
  try {
    return parseDuration(value ?? fallback);
  } catch (error) {
    throw configError(`${key}: ${errorMessage(error)}`, { key });
  }
}

/**
 * Apply defaults, resolve relative paths against the project directory and
 * check that the chosen driver has what it needs
 */
export function resolveConfig(config: StrataConfig, projectPath: string = process.cwd()): ResolvedConfig {
  const merged = mergeConfigs(DEFAULT_CONFIG, config);
  const driver = merged.database?.driver ?? 'postgres';

  let database: ResolvedConfig['database'];
  if (driver === 'postgres') {
    const url = merged.database?.url;
    if (!url) {
      throw configError('database.url is required for the postgres driver (or set STRATA_DATABASE_URL)');
    }
    database = {
      driver,
      url,
      connectTimeoutMs: durationOf(merged.database?.connectTimeout, '10s', 'database.connectTimeout'),
    };
  } else {
    const path = merged.database?.path;
    if (!path) {
      throw configError('database.path is required for the sqlite driver (or set STRATA_DATABASE_PATH)');
    }
    database = { driver, path: path === SQLITE_MEMORY ? path : resolve(projectPath, path) };
  }

  const strategy = merged.lock?.strategy ?? (driver === 'postgres' ? 'advisory' : 'lease');
  if (strategy === 'advisory' && driver !== 'postgres') {
    throw configError('lock.strategy "advisory" requires the postgres driver; use "lease"');
  }

  if (merged.migrations?.schema && driver !== 'postgres') {
    throw configError('migrations.schema is only supported by the postgres driver');
  }

  const ttlMs = durationOf(merged.lock?.ttl, '10m', 'lock.ttl');
  const heartbeatMs = durationOf(merged.lock?.heartbeat, '30s', 'lock.heartbeat');
  if (heartbeatMs <= 0 || heartbeatMs >= ttlMs) {
    throw configError('lock.heartbeat must be greater than zero and shorter than lock.ttl');
  }

  return {
    database,
    migrations: {
      directory: resolve(projectPath, merged.migrations?.directory ?? 'db/migrations'),
      extension: merged.migrations?.extension ?? '.sql',
      table: merged.migrations?.table ?? 'schema_migrations',
      schema: merged.migrations?.schema,
    },
    lock: {
      id: merged.lock?.id ?? 123456789,
      strategy,
      ttlMs,
      heartbeatMs,
    },
  };
}
