/**
 * Colored output support for the strata CLI
 *
 * Respects NO_COLOR environment variable and --no-color flag
 * following the no-color.org standard.
 */

import { shouldDisableColors } from './env.js';

/**
 * ANSI color codes
 */
const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

/**
 * Colors are disabled when NO_COLOR / STRATA_NO_COLOR is set
 * or stdout is not a TTY
 */
function colorsDisabled(): boolean {
  return shouldDisableColors() || !process.stdout.isTTY;
}

/**
 * Apply color to text if colors are enabled
 */
function colorize(text: string, color: string): string {
  if (colorsDisabled()) {
    return text;
  }
  return `${color}${text}${COLORS.reset}`;
}

/**
 * Color helpers for common use cases
 */
export const colors = {
  /** Red text (for errors) */
  red(text: string): string {
    return colorize(text, COLORS.red);
  },

  /** Green text (for success) */
  green(text: string): string {
    return colorize(text, COLORS.green);
  },

  /** Yellow text (for warnings) */
  yellow(text: string): string {
    return colorize(text, COLORS.yellow);
  },

  blue(text: string): string {
    return colorize(text, COLORS.blue);
  },

  cyan(text: string): string {
    return colorize(text, COLORS.cyan);
  },

  gray(text: string): string {
    return colorize(text, COLORS.gray);
  },

  bold(text: string): string {
    return colorize(text, COLORS.bold);
  },

  dim(text: string): string {
    return colorize(text, COLORS.dim);
  },
};

/**
 * Bracketed log-level tags used by migration progress output
 */
export const tags = {
  info(text: string): string {
    return `${colors.green('[INFO]')} ${text}`;
  },

  warn(text: string): string {
    return `${colors.yellow('[WARN]')} ${text}`;
  },

  error(text: string): string {
    return `${colors.red('[ERROR]')} ${text}`;
  },

  skip(text: string): string {
    return `${colors.blue('[SKIP]')} ${text}`;
  },
};

/**
 * Status markers with colors
 */
export const markers = {
  /** Success marker (✓) */
  success(text?: string): string {
    const marker = colors.green('✓');
    return text ? `${marker} ${text}` : marker;
  },

  /** Error marker (✗) */
  error(text?: string): string {
    const marker = colors.red('✗');
    return text ? `${marker} ${text}` : marker;
  },

  /** Warning marker (⚠) */
  warning(text?: string): string {
    const marker = colors.yellow('⚠');
    return text ? `${marker} ${text}` : marker;
  },

  /** Pending marker (○) */
  pending(text?: string): string {
    const marker = colors.gray('○');
    return text ? `${marker} ${text}` : marker;
  },
};

/**
 * Format error message with red color
 */
export function formatError(message: string): string {
  return colors.red(`Error: ${message}`);
}

/**
 * Format warning message with yellow color
 */
export function formatWarning(message: string): string {
  return colors.yellow(`Warning: ${message}`);
}
