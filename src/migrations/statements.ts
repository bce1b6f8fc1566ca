/**
 * SQL script splitting for non-transactional execution
 *
 * PostgreSQL runs a multi-statement simple query inside one implicit
 * transaction, which statements such as CREATE INDEX CONCURRENTLY refuse.
 * Non-transactional scripts are therefore sent one statement at a time.
 *
 * The scanner understands quoted strings, E'' escape strings, quoted
 * identifiers, dollar-quoted bodies ($$ ... $$, $fn$ ... $fn$), line
 * comments and nested block comments, so semicolons inside any of them
 * do not end a statement.
 */

const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

/**
 * Split a script into statements, dropping empty and comment-only pieces
 */
export function splitStatements(script: string): string[] {
  const statements: string[] = [];
  let start = 0;
  let hasCode = false;
  let i = 0;

  const flush = (end: number): void => {
    if (hasCode) {
      statements.push(script.slice(start, end).trim());
    }
    start = end + 1;
    hasCode = false;
  };

  while (i < script.length) {
    const ch = script[i];
    const next = script[i + 1];

    // -- line comment
    if (ch === '-' && next === '-') {
      const newline = script.indexOf('\n', i + 2);
      i = newline === -1 ? script.length : newline + 1;
      continue;
    }

    // /* block comment */, nestable
    if (ch === '/' && next === '*') {
      i = skipBlockComment(script, i);
      continue;
    }

    if (ch === ';') {
      flush(i);
      i++;
      continue;
    }

    if (!/\s/.test(ch)) {
      hasCode = true;
    }

    if (ch === "'") {
      const escapes = i > 0 && /[eE]/.test(script[i - 1]) && !isIdentifierChar(script[i - 2]);
      i = skipQuoted(script, i, "'", escapes);
      continue;
    }

    if (ch === '"') {
      i = skipQuoted(script, i, '"', false);
      continue;
    }

    if (ch === '$' && !isIdentifierChar(script[i - 1])) {
      const match = DOLLAR_TAG.exec(script.slice(i));
      if (match) {
        const delimiter = match[0];
        const close = script.indexOf(delimiter, i + delimiter.length);
        i = close === -1 ? script.length : close + delimiter.length;
        continue;
      }
    }

    i++;
  }

  flush(script.length);
  return statements;
}

function isIdentifierChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_$]/.test(ch);
}

/**
 * Returns the index just past the closing quote. A doubled quote is an
 * escaped quote; with `backslashEscapes` a backslash escapes the next char.
 */
function skipQuoted(script: string, open: number, quote: string, backslashEscapes: boolean): number {
  let i = open + 1;
  while (i < script.length) {
    const ch = script[i];
    if (backslashEscapes && ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote) {
      if (script[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return script.length;
}

function skipBlockComment(script: string, open: number): number {
  let depth = 0;
  let i = open;
  while (i < script.length) {
    if (script[i] === '/' && script[i + 1] === '*') {
      depth++;
      i += 2;
    } else if (script[i] === '*' && script[i + 1] === '/') {
      depth--;
      i += 2;
      if (depth === 0) {
        return i;
      }
    } else {
      i++;
    }
  }
  return script.length;
}
