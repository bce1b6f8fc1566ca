/**
 * Tests for the apply ledger
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { SqliteConnection } from '../src/database/sqlite-connection.js';
import { ApplyLedger, DEFAULT_LEDGER_TABLE, assertIdentifier } from '../src/migrations/ledger.js';
import { BootstrapError } from '../src/migrations/errors.js';
import { FakeConnection } from './helpers/fake-connection.js';

const HASH_A = 'a'.repeat(64);
const HASH_B = 'b'.repeat(64);

describe('ApplyLedger (sqlite)', () => {
  let connection: SqliteConnection;
  let ledger: ApplyLedger;

  beforeEach(() => {
    connection = SqliteConnection.open(':memory:');
    ledger = new ApplyLedger(connection);
  });

  afterEach(async () => {
    await connection.close();
  });

  it('should use the default table name', () => {
    expect(ledger.table).toBe(DEFAULT_LEDGER_TABLE);
    expect(ledger.qualifiedName).toBe('"schema_migrations"');
  });

  it('should report a missing table until the schema is ensured', async () => {
    expect(await ledger.exists()).toBe(false);
    await ledger.ensureSchema();
    expect(await ledger.exists()).toBe(true);
  });

  it('should ensure the schema repeatedly without error', async () => {
    await ledger.ensureSchema();
    await ledger.ensureSchema();
    const columns = await connection.query("SELECT name FROM pragma_table_info('schema_migrations')");
    expect(columns.map((row) => row.name)).toEqual(['name', 'content_hash', 'applied_at']);
  });

  it('should record once and never overwrite', async () => {
    await ledger.ensureSchema();

    expect(await ledger.record('000_init.sql', HASH_A)).toBe(true);
    expect(await ledger.record('000_init.sql', HASH_B)).toBe(false);

    const entry = await ledger.lookup('000_init.sql');
    expect(entry?.name).toBe('000_init.sql');
    expect(entry?.contentHash).toBe(HASH_A);
    expect(entry?.appliedAt).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it('should return null for names never applied', async () => {
    await ledger.ensureSchema();
    expect(await ledger.lookup('999_nope.sql')).toBeNull();
  });

  it('should list entries in byte order', async () => {
    await ledger.ensureSchema();
    await ledger.record('b.sql', HASH_A);
    await ledger.record('B.sql', HASH_A);
    await ledger.record('a.sql', HASH_B);

    expect((await ledger.list()).map((entry) => entry.name)).toEqual(['B.sql', 'a.sql', 'b.sql']);
  });

  it('should upgrade a table created before content hashes were stored', async () => {
    await connection.query(
      'CREATE TABLE schema_migrations (name TEXT PRIMARY KEY, applied_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP)'
    );
    await connection.query("INSERT INTO schema_migrations (name) VALUES ('000_legacy.sql')");

    await ledger.ensureSchema();

    expect((await ledger.lookup('000_legacy.sql'))?.contentHash).toBeNull();
    expect(await ledger.record('001_new.sql', HASH_A)).toBe(true);
    expect((await ledger.lookup('001_new.sql'))?.contentHash).toBe(HASH_A);
  });

  it('should use a custom table', async () => {
    const custom = new ApplyLedger(connection, { table: 'migration_history' });
    await custom.ensureSchema();
    expect(await custom.exists()).toBe(true);
    expect(await ledger.exists()).toBe(false);
  });

  it('should wrap bootstrap failures', async () => {
    await connection.close();
    const failure = ledger.ensureSchema();
    await expect(failure).rejects.toBeInstanceOf(BootstrapError);
    await expect(failure).rejects.toThrow('Could not create or upgrade ledger table "schema_migrations": ');
  });

  it('should reject schemas on sqlite', () => {
    expect(() => new ApplyLedger(connection, { schema: 'ops' })).toThrow(
      'migrations.schema is only supported by the postgres driver'
    );
  });
});

describe('ApplyLedger (postgres statements)', () => {
  it('should qualify the table with the schema and use numbered placeholders', async () => {
    const connection = new FakeConnection('postgres', (statement) =>
      statement.startsWith('SELECT name, content_hash')
        ? [{ name: '000_init.sql', content_hash: HASH_A, applied_at: new Date('2026-03-01T12:00:00.000Z') }]
        : []
    );
    const ledger = new ApplyLedger(connection, { schema: 'ops' });

    const entry = await ledger.lookup('000_init.sql');

    expect(connection.queries[0]).toEqual({
      statement: 'SELECT name, content_hash, applied_at FROM "ops"."schema_migrations" WHERE name = $1',
      params: ['000_init.sql'],
    });
    expect(entry).toEqual({ name: '000_init.sql', contentHash: HASH_A, appliedAt: '2026-03-01T12:00:00.000Z' });
  });

  it('should add content_hash when the column is missing', async () => {
    const connection = new FakeConnection('postgres');
    await new ApplyLedger(connection).ensureSchema();

    const statements = connection.queries.map((query) => query.statement);
    expect(statements[0]).toContain('CREATE TABLE IF NOT EXISTS "schema_migrations"');
    expect(statements[0]).toContain('applied_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP');
    expect(connection.queries[1].params).toEqual([null, 'schema_migrations', 'content_hash']);
    expect(statements[2]).toBe('ALTER TABLE "schema_migrations" ADD COLUMN content_hash TEXT');
  });

  it('should skip the upgrade when the column exists', async () => {
    const connection = new FakeConnection('postgres', (statement) =>
      statement.includes('information_schema.columns') ? [{ '?column?': 1 }] : []
    );
    await new ApplyLedger(connection).ensureSchema();
    expect(connection.queries).toHaveLength(2);
  });
});

describe('assertIdentifier', () => {
  it('should accept plain identifiers', () => {
    expect(assertIdentifier('schema_migrations', 'migrations.table')).toBe('schema_migrations');
  });

  it('should reject anything else', () => {
    expect(() => assertIdentifier('bad-name', 'migrations.table')).toThrow(
      'migrations.table must be a plain SQL identifier: "bad-name"'
    );
    expect(() => new ApplyLedger(new FakeConnection(), { table: 'x"; DROP TABLE y; --' })).toThrow(
      'migrations.table must be a plain SQL identifier'
    );
  });
});
