/**
 * Apply ledger
 * The tracking table recording which migrations ran and with what content
 */

import { configError } from '../cli/errors.js';
import { placeholder, qualifyTable, type MigrationConnection, type Row } from '../database/connection.js';
import { BootstrapError } from './errors.js';
import { compareNames } from './source.js';
import type { LedgerEntry } from './types.js';

export const DEFAULT_LEDGER_TABLE = 'schema_migrations';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface LedgerOptions {
  table?: string;
  /** PostgreSQL schema; unset means the session's current schema */
  schema?: string;
}

export function assertIdentifier(value: string, key: string): string {
  if (!IDENTIFIER.test(value)) {
    throw configError(`${key} must be a plain SQL identifier: ${JSON.stringify(value)}`, { [key]: value });
  }
  return value;
}

function toText(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

function toEntry(row: Row): LedgerEntry {
  const hash = row.content_hash;
  return {
    name: String(row.name),
    contentHash: typeof hash === 'string' ? hash : null,
    appliedAt: toText(row.applied_at),
  };
}

export class ApplyLedger {
  readonly table: string;
  readonly schema?: string;

  constructor(
    private readonly connection: MigrationConnection,
    options: LedgerOptions = {}
  ) {
    this.table = assertIdentifier(options.table ?? DEFAULT_LEDGER_TABLE, 'migrations.table');
    if (options.schema !== undefined) {
      if (connection.dialect !== 'postgres') {
        throw configError('migrations.schema is only supported by the postgres driver');
      }
      this.schema = assertIdentifier(options.schema, 'migrations.schema');
    }
  }

  /** Quoted, schema-qualified table name */
  get qualifiedName(): string {
    return qualifyTable(this.table, this.schema);
  }

  private p(index: number): string {
    return placeholder(this.connection.dialect, index);
  }

  /**
   * Create the table if absent and add content_hash to tables that predate it
   * Safe on every run; failures become BootstrapError
   */
  async ensureSchema(): Promise<void> {
    const timestampType = this.connection.dialect === 'postgres' ? 'TIMESTAMPTZ' : 'TIMESTAMP';

    try {
      await this.connection.query(
        `CREATE TABLE IF NOT EXISTS ${this.qualifiedName} (
          name TEXT PRIMARY KEY,
          content_hash TEXT,
          applied_at ${timestampType} NOT NULL DEFAULT CURRENT_TIMESTAMP
        )`
      );

      if (!(await this.hasColumn('content_hash'))) {
        await this.connection.query(`ALTER TABLE ${this.qualifiedName} ADD COLUMN content_hash TEXT`);
      }
    } catch (error) {
      throw new BootstrapError(this.qualifiedName, error);
    }
  }

  /**
   * Whether the ledger table exists; status uses this to stay read-only
   */
  async exists(): Promise<boolean> {
    if (this.connection.dialect === 'sqlite') {
      const rows = await this.connection.query(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
        [this.table]
      );
      return rows.length > 0;
    }

    const rows = await this.connection.query(
      `SELECT 1 FROM information_schema.tables
       WHERE table_schema = COALESCE($1::text, current_schema()::text) AND table_name = $2`,
      [this.schema ?? null, this.table]
    );
    return rows.length > 0;
  }

  async hasColumn(column: string): Promise<boolean> {
    if (this.connection.dialect === 'sqlite') {
      const rows = await this.connection.query('SELECT name FROM pragma_table_info(?) WHERE name = ?', [
        this.table,
        column,
      ]);
      return rows.length > 0;
    }

    const rows = await this.connection.query(
      `SELECT 1 FROM information_schema.columns
       WHERE table_schema = COALESCE($1::text, current_schema()::text)
         AND table_name = $2 AND column_name = $3`,
      [this.schema ?? null, this.table, column]
    );
    return rows.length > 0;
  }

  async lookup(name: string): Promise<LedgerEntry | null> {
    const rows = await this.connection.query(
      `SELECT name, content_hash, applied_at FROM ${this.qualifiedName} WHERE name = ${this.p(1)}`,
      [name]
    );
    const row = rows[0];
    return row ? toEntry(row) : null;
  }

  /**
   * Insert if absent; an existing row (and its hash) is never changed
   * @returns true when this call inserted the row
   */
  async record(name: string, contentHash: string): Promise<boolean> {
    const rows = await this.connection.query(
      `INSERT INTO ${this.qualifiedName} (name, content_hash)
       VALUES (${this.p(1)}, ${this.p(2)})
       ON CONFLICT (name) DO NOTHING
       RETURNING name`,
      [name, contentHash]
    );
    return rows.length > 0;
  }

  /**
   * All entries in byte-wise name order
   * Read-only: a table without content_hash yields null hashes
   */
  async list(): Promise<LedgerEntry[]> {
    const hashColumn = (await this.hasColumn('content_hash')) ? 'content_hash' : 'NULL AS content_hash';
    const rows = await this.connection.query(
      `SELECT name, ${hashColumn}, applied_at FROM ${this.qualifiedName}`
    );
    return rows.map(toEntry).sort((a, b) => compareNames(a.name, b.name));
  }
}
