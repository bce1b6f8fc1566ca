/**
 * PostgreSQL adapter for the migration connection contract
 *
 * Everything runs on one dedicated client session: the advisory lock is
 * session-scoped, so the lock query and every migration statement must
 * share the connection that took it.
 */

import { Client } from 'pg';
import { errorMessage } from '../cli/errors.js';
import { splitStatements } from '../migrations/statements.js';
import { redactUrl, type MigrationConnection, type Row, type SqlParam } from './connection.js';

/**
 * The slice of pg.Client this adapter uses
 */
export interface PgSession {
  query(text: string, values?: SqlParam[]): Promise<{ rows: Row[] }>;
  end(): Promise<void>;
}

export interface PostgresConnectOptions {
  connectTimeoutMs: number;
}

export class PostgresConnection implements MigrationConnection {
  readonly dialect = 'postgres' as const;
  private closed = false;

  constructor(
    private readonly session: PgSession,
    readonly target: string
  ) {}

  static async connect(url: string, options: PostgresConnectOptions): Promise<PostgresConnection> {
    const client = new Client({
      connectionString: url,
      connectionTimeoutMillis: options.connectTimeoutMs,
      application_name: 'strata-migrate',
    });

    // A dropped session surfaces on the next query; log the idle event
    client.on('error', (err) => {
      console.error(`[pg] connection error: ${err.message}`);
    });

    await client.connect();
    return new PostgresConnection(client, redactUrl(url));
  }

  async execute(script: string, transactional: boolean): Promise<void> {
    if (!transactional) {
      // Sent one by one: a multi-statement query string runs in an implicit transaction
      for (const statement of splitStatements(script)) {
        await this.session.query(statement);
      }
      return;
    }

    await this.session.query('BEGIN');
    try {
      await this.session.query(script);
      await this.session.query('COMMIT');
    } catch (error) {
      await this.rollback(error);
      throw error;
    }
  }

  async query(statement: string, params: readonly SqlParam[] = []): Promise<Row[]> {
    const result = await this.session.query(statement, [...params]);
    return result.rows;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.session.end();
  }

  private async rollback(cause: unknown): Promise<void> {
    try {
      await this.session.query('ROLLBACK');
    } catch (rollbackError) {
      console.error(`[pg] ROLLBACK failed after "${errorMessage(cause)}": ${errorMessage(rollbackError)}`);
    }
  }
}
