/**
 * SQLite adapter for the migration connection contract
 * Uses better-sqlite3 for synchronous operations with WAL mode
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { SQLITE_MEMORY, type MigrationConnection, type Row, type SqlParam } from './connection.js';

export class SqliteConnection implements MigrationConnection {
  readonly dialect = 'sqlite' as const;
  readonly target: string;

  constructor(readonly db: Database.Database) {
    this.target = db.name;
  }

  /**
   * Open (creating if needed) a database file
   */
  static open(dbPath: string): SqliteConnection {
    if (dbPath !== SQLITE_MEMORY) {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    const db = new Database(dbPath);

    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    db.pragma('foreign_keys = ON');

    return new SqliteConnection(db);
  }

  async execute(script: string, transactional: boolean): Promise<void> {
    if (transactional) {
      this.db.transaction(() => {
        this.db.exec(script);
      })();
      return;
    }

    // exec runs each statement in autocommit mode
    this.db.exec(script);
  }

  async query(statement: string, params: readonly SqlParam[] = []): Promise<Row[]> {
    const stmt = this.db.prepare<unknown[], Row>(statement);
    const values = params.map(toSqliteValue);

    if (stmt.reader) {
      return stmt.all(...values);
    }

    stmt.run(...values);
    return [];
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}

/**
 * SQLite has no boolean type
 */
function toSqliteValue(param: SqlParam): string | number | null {
  if (typeof param === 'boolean') {
    return param ? 1 : 0;
  }
  return param;
}
