/**
 * Environment variable support for the strata CLI
 *
 * Provides centralized access to the environment variables that map to
 * CLI flags. Configuration keys (STRATA_DATABASE_URL and friends) are
 * handled by the config loader.
 *
 * Environment variables override defaults but are themselves overridden by
 * explicit CLI flags.
 */

/**
 * Environment variables that map to CLI flags
 */
export const ENV_VARS = {
  /** Custom config path (maps to --config) */
  STRATA_CONFIG: 'STRATA_CONFIG',

  /** Output as JSON (maps to --json) */
  STRATA_JSON: 'STRATA_JSON',

  /** Minimal output (maps to --quiet) */
  STRATA_QUIET: 'STRATA_QUIET',

  /** Detailed output (maps to --verbose) */
  STRATA_VERBOSE: 'STRATA_VERBOSE',

  /** Disable colors (maps to --no-color) */
  STRATA_NO_COLOR: 'STRATA_NO_COLOR',

  /** Standard NO_COLOR env var (also maps to --no-color) */
  NO_COLOR: 'NO_COLOR',
} as const;

/**
 * Check if a value is truthy for boolean environment variables
 *
 * Accepts: '1', 'true' (case-insensitive), 'yes', 'on'
 */
export function isTruthy(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.toLowerCase().trim();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

/**
 * Check if colors should be disabled based on env vars
 */
export function shouldDisableColors(): boolean {
  return process.env[ENV_VARS.NO_COLOR] !== undefined || isTruthy(process.env[ENV_VARS.STRATA_NO_COLOR]);
}

/**
 * Names of flag variables, which the config loader must not treat as
 * configuration keys
 */
export function isFlagEnvVar(name: string): boolean {
  return Object.values<string>(ENV_VARS).includes(name);
}
