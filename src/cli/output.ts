/**
 * JSON output envelope and console output helper
 *
 * All commands use this envelope when --json is set, and the Output
 * helper for human-readable lines otherwise.
 */

import { stripVTControlCharacters } from 'node:util';
import type { GlobalFlags } from './flags.js';
import { formatError, formatWarning } from './colors.js';

/**
 * Error details in JSON output
 */
export interface ErrorDetails {
  /** Machine-readable error code */
  code: string;
  /** Human-readable error message */
  message: string;
  /** Additional context about the error */
  details?: Record<string, unknown>;
}

/**
 * Standard JSON response envelope
 */
export interface JsonEnvelope<T = unknown> {
  success: boolean;
  command: string;
  subcommand: string | null;
  /** Response data (null on error) */
  data: T | null;
  /** Error information (null on success) */
  error: ErrorDetails | null;
}

export interface OutputContext {
  command: string;
  subcommand?: string;
  flags: GlobalFlags;
}

/**
 * Create a success envelope
 */
export function successEnvelope<T>(
  command: string,
  subcommand: string | null,
  data: T
): JsonEnvelope<T> {
  return {
    success: true,
    command,
    subcommand,
    data,
    error: null,
  };
}

/**
 * Create an error envelope
 *
 * `data` carries partial results, such as the units applied before a
 * migration failed.
 */
export function errorEnvelope<T = null>(
  command: string,
  subcommand: string | null,
  code: string,
  message: string,
  details?: Record<string, unknown>,
  data: T | null = null
): JsonEnvelope<T> {
  return {
    success: false,
    command,
    subcommand,
    data,
    error: {
      code,
      message,
      details,
    },
  };
}

/**
 * Printed width of text, ignoring ANSI color codes
 */
export function visibleWidth(text: string): number {
  return stripVTControlCharacters(text).length;
}

/**
 * Output helper class for consistent command output
 */
export class Output {
  private readonly command: string;
  private readonly subcommand: string | null;
  private readonly flags: GlobalFlags;

  constructor(ctx: OutputContext) {
    this.command = ctx.command;
    this.subcommand = ctx.subcommand ?? null;
    this.flags = ctx.flags;
  }

  /**
   * Output a success response (JSON mode only; callers format text)
   */
  success<T>(data: T): void {
    if (this.flags.json) {
      const envelope = successEnvelope(this.command, this.subcommand, data);
      console.log(JSON.stringify(envelope, null, 2));
    }
  }

  /**
   * Output an error response
   */
  error<T = null>(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    data: T | null = null
  ): void {
    if (this.flags.json) {
      const envelope = errorEnvelope(this.command, this.subcommand, code, message, details, data);
      console.log(JSON.stringify(envelope, null, 2));
    } else {
      console.error(formatError(message));
      if (this.flags.verbose && details) {
        console.error('Details:', JSON.stringify(details, null, 2));
      }
    }
  }

  /**
   * Output a message (respects quiet mode)
   */
  log(message: string): void {
    if (!this.flags.quiet && !this.flags.json) {
      console.log(message);
    }
  }

  /**
   * Output verbose information (only in verbose mode)
   */
  verbose(message: string): void {
    if (this.flags.verbose && !this.flags.json) {
      console.log(message);
    }
  }

  /**
   * Output a warning line. Warnings survive quiet mode.
   */
  warn(message: string): void {
    if (!this.flags.json) {
      console.warn(message);
    }
  }

  /**
   * Output a warning with the standard "Warning:" prefix
   */
  warning(message: string): void {
    this.warn(formatWarning(message));
  }

  /**
   * Output an error line. Errors survive quiet mode.
   */
  fail(message: string): void {
    if (!this.flags.json) {
      console.error(message);
    }
  }

  isJson(): boolean {
    return this.flags.json;
  }

  /**
   * Print a formatted table
   */
  table(headers: string[], rows: string[][], options?: { separator?: string }): void {
    if (this.flags.json || this.flags.quiet) {
      return;
    }

    const sep = options?.separator ?? '  ';
    const pad = (cell: string, width: number): string => cell + ' '.repeat(Math.max(0, width - visibleWidth(cell)));

    const widths = headers.map((h, i) => {
      const maxRowWidth = Math.max(0, ...rows.map(r => visibleWidth(r[i] ?? '')));
      return Math.max(visibleWidth(h), maxRowWidth);
    });

    const headerLine = headers.map((h, i) => pad(h, widths[i])).join(sep);
    console.log(headerLine);
    console.log('─'.repeat(visibleWidth(headerLine)));

    for (const row of rows) {
      const line = row.map((cell, i) => pad(cell ?? '', widths[i])).join(sep);
      console.log(line.trimEnd());
    }
  }
}

/**
 * Create an output helper with context
 */
export function createOutput(ctx: OutputContext): Output {
  return new Output(ctx);
}

/**
 * Quick JSON error output for simple cases
 */
export function outputJsonError(
  command: string,
  subcommand: string | null,
  code: string,
  message: string,
  details?: Record<string, unknown>
): void {
  const envelope = errorEnvelope(command, subcommand, code, message, details);
  console.log(JSON.stringify(envelope, null, 2));
}
