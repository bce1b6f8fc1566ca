/**
 * Error codes and exit codes for the strata CLI
 *
 * Provides consistent, semantic error codes that map to appropriate
 * exit codes for shell scripting and deployment pipelines.
 *
 * Error codes are used in JSON output for machine-parseable errors.
 * Exit codes follow standard Unix conventions.
 */

/**
 * Standard error codes used throughout the CLI
 *
 * These codes appear in the JSON error.code field and are mapped
 * to appropriate exit codes for process termination.
 */
export enum ErrorCode {
  /** Operation completed successfully */
  SUCCESS = 'SUCCESS',

  /** Unspecified error (generic fallback) */
  GENERAL_ERROR = 'GENERAL_ERROR',

  /** Invalid command arguments or flags */
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',

  /** Configuration file error or invalid config */
  CONFIG_ERROR = 'CONFIG_ERROR',

  /** Could not connect to the target store */
  CONNECTION_FAILED = 'CONNECTION_FAILED',

  /** Migration directory missing or unreadable */
  DISCOVERY_FAILED = 'DISCOVERY_FAILED',

  /** Another migration run holds the migration lock */
  MIGRATION_LOCKED = 'MIGRATION_LOCKED',

  /** A migration's statements failed */
  MIGRATION_FAILED = 'MIGRATION_FAILED',

  /** Tracking relation could not be created or upgraded */
  BOOTSTRAP_FAILED = 'BOOTSTRAP_FAILED',

  /** Run interrupted by a signal */
  INTERRUPTED = 'INTERRUPTED',

  /** Internal error */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Unix exit codes for process termination
 *
 * - 0: Success
 * - 1: General error
 * - 2-125: Specific errors
 * - 126-255: Reserved by shell
 */
export enum ExitCode {
  /** Success - operation completed without errors */
  SUCCESS = 0,

  /** General error - unspecified failure */
  GENERAL_ERROR = 1,

  /** Invalid arguments - bad command line input */
  INVALID_ARGUMENTS = 2,

  /** Configuration error - config file or settings problem */
  CONFIG_ERROR = 3,

  /** Not found - migration directory doesn't exist */
  NOT_FOUND = 4,

  /** Connection failed - store unreachable */
  CONNECTION_FAILED = 5,

  /** Resource locked - another migration run is active */
  RESOURCE_LOCKED = 6,

  /** Migration failed - a unit's statements failed */
  MIGRATION_FAILED = 7,

  /** Bootstrap failed - tracking relation unusable */
  BOOTSTRAP_FAILED = 8,
}

/**
 * Map error codes to exit codes
 */
export const ERROR_CODE_TO_EXIT_CODE: Record<ErrorCode, ExitCode> = {
  [ErrorCode.SUCCESS]: ExitCode.SUCCESS,
  [ErrorCode.GENERAL_ERROR]: ExitCode.GENERAL_ERROR,
  [ErrorCode.INVALID_ARGUMENTS]: ExitCode.INVALID_ARGUMENTS,
  [ErrorCode.CONFIG_ERROR]: ExitCode.CONFIG_ERROR,
  [ErrorCode.CONNECTION_FAILED]: ExitCode.CONNECTION_FAILED,

  // Specific error codes map to generic exit codes
  [ErrorCode.DISCOVERY_FAILED]: ExitCode.NOT_FOUND,
  [ErrorCode.MIGRATION_LOCKED]: ExitCode.RESOURCE_LOCKED,
  [ErrorCode.MIGRATION_FAILED]: ExitCode.MIGRATION_FAILED,
  [ErrorCode.BOOTSTRAP_FAILED]: ExitCode.BOOTSTRAP_FAILED,
  [ErrorCode.INTERRUPTED]: ExitCode.GENERAL_ERROR,
  [ErrorCode.INTERNAL_ERROR]: ExitCode.GENERAL_ERROR,
};

/**
 * Get the exit code for a given error code
 */
export function getExitCode(errorCode: ErrorCode): ExitCode {
  return ERROR_CODE_TO_EXIT_CODE[errorCode] ?? ExitCode.GENERAL_ERROR;
}

/**
 * CLI Error class that includes error code and exit code
 *
 * Use this for errors that should result in process termination
 * with a specific exit code.
 */
export class CliError extends Error {
  public readonly code: ErrorCode;
  public readonly exitCode: ExitCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CliError';
    this.code = code;
    this.exitCode = getExitCode(code);
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert error to JSON-serializable object
   */
  toJSON(): { code: string; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create a CliError for invalid arguments
 */
export function invalidArgumentsError(message: string): CliError {
  return new CliError(ErrorCode.INVALID_ARGUMENTS, message);
}

/**
 * Create a CliError for config error
 */
export function configError(message: string, details?: Record<string, unknown>): CliError {
  return new CliError(ErrorCode.CONFIG_ERROR, message, details);
}

/**
 * Create a CliError for a store that could not be reached
 */
export function connectionFailedError(target: string, cause: unknown): CliError {
  return new CliError(
    ErrorCode.CONNECTION_FAILED,
    `Could not connect to ${target}: ${errorMessage(cause)}`,
    { target },
    { cause }
  );
}

/**
 * Create a CliError for a run stopped by a signal
 */
export function interruptedError(signal: string): CliError {
  return new CliError(ErrorCode.INTERRUPTED, `Migration interrupted by ${signal}`, { signal });
}
