/**
 * Connection contract consumed by the migration runner
 *
 * The runner owns no connection-establishment logic: it only executes
 * scripts and runs queries through this interface. Adapters live beside
 * it (postgres-connection.ts, sqlite-connection.ts); open.ts picks one
 * from configuration.
 */

export type Dialect = 'postgres' | 'sqlite';

export type SqlParam = string | number | boolean | null;

export type Row = Record<string, unknown>;

/** SQLite path for a private in-memory database */
export const SQLITE_MEMORY = ':memory:';

export interface MigrationConnection {
  readonly dialect: Dialect;
  /** Human-readable target, safe to print (no credentials) */
  readonly target: string;
  /**
   * Run a whole script. Transactional scripts commit or roll back as one
   * unit; non-transactional scripts run statement by statement with no
   * enclosing transaction.
   */
  execute(script: string, transactional: boolean): Promise<void>;
  query(statement: string, params?: readonly SqlParam[]): Promise<Row[]>;
  close(): Promise<void>;
}

/**
 * Positional placeholder for the n-th (1-based) parameter
 */
export function placeholder(dialect: Dialect, index: number): string {
  return dialect === 'postgres' ? `$${index}` : '?';
}

/**
 * Strip the password from a connection URL for display
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return '<invalid url>';
  }
}

/**
 * Quoted, optionally schema-qualified table name. Callers validate the
 * identifiers first.
 */
export function qualifyTable(table: string, schema?: string): string {
  return schema ? `"${schema}"."${table}"` : `"${table}"`;
}
