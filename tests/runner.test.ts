/**
 * End-to-end runner tests against SQLite databases on disk
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SqliteConnection } from '../src/database/sqlite-connection.js';
import { ApplyLedger } from '../src/migrations/ledger.js';
import { runMigrations, type RunContext } from '../src/migrations/runner.js';
import { createLeaseLock } from '../src/locking/lease-lock.js';
import type { LockCoordinator } from '../src/locking/coordinator.js';
import { getLease } from '../src/locking/queries.js';
import { fingerprint } from '../src/migrations/fingerprint.js';
import { ExecutionError, LockContentionError, DiscoveryError } from '../src/migrations/errors.js';
import type { MigrationEvent } from '../src/migrations/reporter.js';

describe('runMigrations', () => {
  let workspace: string;
  let migrationsDir: string;
  let dbPath: string;
  const connections: SqliteConnection[] = [];

  const writeMigration = (name: string, sql: string): void => {
    writeFileSync(join(migrationsDir, name), sql);
  };

  const context = (holder = 'runner-a'): RunContext => {
    const connection = SqliteConnection.open(dbPath);
    connections.push(connection);
    return {
      connection,
      ledger: new ApplyLedger(connection),
      lock: createLeaseLock(connection, { holder, heartbeatMs: 3_600_000 }),
    };
  };

  const tableNames = async (ctx: RunContext): Promise<string[]> => {
    const rows = await ctx.connection.query(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'schema_migrations%' ORDER BY name"
    );
    return rows.map((row) => String(row.name));
  };

  beforeEach(() => {
    workspace = mkdtempSync(join(tmpdir(), 'strata-runner-'));
    migrationsDir = join(workspace, 'migrations');
    mkdirSync(migrationsDir);
    dbPath = join(workspace, 'app.db');
  });

  afterEach(async () => {
    for (const connection of connections.splice(0)) {
      await connection.close();
    }
    rmSync(workspace, { recursive: true, force: true });
  });

  it('should apply pending migrations in name order', async () => {
    writeMigration('002_second.sql', "INSERT INTO steps (label) VALUES ('second');");
    writeMigration('000_steps.sql', 'CREATE TABLE steps (id INTEGER PRIMARY KEY, label TEXT);');
    writeMigration('001_first.sql', "INSERT INTO steps (label) VALUES ('first');");
    const ctx = context();

    const result = await runMigrations(ctx, { directory: migrationsDir });

    expect(result.applied).toEqual(['000_steps.sql', '001_first.sql', '002_second.sql']);
    expect(result.skipped).toEqual([]);
    expect(result.status).toBe('success');
    expect(result.failed).toBeNull();
    const steps = await ctx.connection.query('SELECT label FROM steps ORDER BY id');
    expect(steps).toEqual([{ label: 'first' }, { label: 'second' }]);
  });

  it('should record each applied unit with its hash', async () => {
    const sql = 'CREATE TABLE widgets (id INTEGER PRIMARY KEY);';
    writeMigration('000_widgets.sql', sql);
    const ctx = context();

    await runMigrations(ctx, { directory: migrationsDir });

    expect((await ctx.ledger.lookup('000_widgets.sql'))?.contentHash).toBe(fingerprint(sql));
  });

  it('should apply nothing on a second run', async () => {
    writeMigration('000_widgets.sql', 'CREATE TABLE widgets (id INTEGER PRIMARY KEY);');
    writeMigration('001_gadgets.sql', 'CREATE TABLE gadgets (id INTEGER PRIMARY KEY);');

    await runMigrations(context(), { directory: migrationsDir });
    const second = await runMigrations(context('runner-b'), { directory: migrationsDir });

    expect(second.applied).toEqual([]);
    expect(second.skipped).toEqual(['000_widgets.sql', '001_gadgets.sql']);
    expect(second.drifted).toEqual([]);
    expect(second.status).toBe('success');
  });

  it('should warn about drift without re-applying or rewriting the hash', async () => {
    const original = 'CREATE TABLE widgets (id INTEGER PRIMARY KEY);';
    const edited = 'CREATE TABLE widgets (id INTEGER PRIMARY KEY, name TEXT);';
    writeMigration('000_widgets.sql', original);
    await runMigrations(context(), { directory: migrationsDir });

    writeMigration('000_widgets.sql', edited);
    const ctx = context('runner-b');
    const result = await runMigrations(ctx, { directory: migrationsDir });

    expect(result.applied).toEqual([]);
    expect(result.skipped).toEqual(['000_widgets.sql']);
    expect(result.drifted).toEqual([
      { name: '000_widgets.sql', storedHash: fingerprint(original), currentHash: fingerprint(edited) },
    ]);
    expect(result.status).toBe('success');
    expect((await ctx.ledger.lookup('000_widgets.sql'))?.contentHash).toBe(fingerprint(original));
  });

  it('should stop at a failing unit and resume after it is fixed', async () => {
    writeMigration('000_create_table.sql', 'CREATE TABLE widgets (id INTEGER PRIMARY KEY, name TEXT);');
    writeMigration('001_bad_sql.sql', "INSERT INTO widgetz (name) VALUES ('first');");
    writeMigration('002_after.sql', 'CREATE TABLE later (id INTEGER);');
    const first = context();

    const failure = runMigrations(first, { directory: migrationsDir });
    await expect(failure).rejects.toBeInstanceOf(ExecutionError);
    await expect(failure).rejects.toThrow('Migration 001_bad_sql.sql failed: no such table: widgetz');

    const error = await failure.catch((e: unknown) => e);
    if (!(error instanceof ExecutionError)) throw new Error('expected ExecutionError');
    expect(error.unit).toBe('001_bad_sql.sql');
    expect(error.result.applied).toEqual(['000_create_table.sql']);
    expect(error.result.failed).toBe('001_bad_sql.sql');
    expect(error.result.status).toBe('failed');
    expect(await first.ledger.lookup('001_bad_sql.sql')).toBeNull();
    expect(await first.ledger.lookup('002_after.sql')).toBeNull();
    expect(await tableNames(first)).toEqual(['widgets']);

    writeMigration('001_bad_sql.sql', "INSERT INTO widgets (name) VALUES ('first');");
    const second = context('runner-b');
    const result = await runMigrations(second, { directory: migrationsDir });

    expect(result.skipped).toEqual(['000_create_table.sql']);
    expect(result.applied).toEqual(['001_bad_sql.sql', '002_after.sql']);
    expect(await second.connection.query('SELECT name FROM widgets')).toEqual([{ name: 'first' }]);
  });

  it('should roll back a failed transactional unit', async () => {
    writeMigration('000_partial.sql', 'CREATE TABLE kept (id INTEGER);\nINSERT INTO missing VALUES (1);');
    const ctx = context();

    await expect(runMigrations(ctx, { directory: migrationsDir })).rejects.toBeInstanceOf(ExecutionError);

    expect(await tableNames(ctx)).toEqual([]);
  });

  it('should leave earlier statements of a non-transactional unit in place', async () => {
    writeMigration('000_partial.sql', '-- strata:no_tx\nCREATE TABLE kept (id INTEGER);\nINSERT INTO missing VALUES (1);');
    const ctx = context();

    await expect(runMigrations(ctx, { directory: migrationsDir })).rejects.toBeInstanceOf(ExecutionError);

    expect(await tableNames(ctx)).toEqual(['kept']);
    expect(await ctx.ledger.lookup('000_partial.sql')).toBeNull();
  });

  it('should skip legacy rows without a hash and report them unverified', async () => {
    writeMigration('000_legacy.sql', 'CREATE TABLE legacy (id INTEGER);');
    writeMigration('001_new.sql', 'CREATE TABLE fresh (id INTEGER);');
    const ctx = context();
    await ctx.connection.query(
      'CREATE TABLE schema_migrations (name TEXT PRIMARY KEY, applied_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP)'
    );
    await ctx.connection.query("INSERT INTO schema_migrations (name) VALUES ('000_legacy.sql')");

    const result = await runMigrations(ctx, { directory: migrationsDir });

    expect(result.unverified).toEqual(['000_legacy.sql']);
    expect(result.skipped).toEqual(['000_legacy.sql']);
    expect(result.applied).toEqual(['001_new.sql']);
    expect(result.drifted).toEqual([]);
    expect((await ctx.ledger.lookup('000_legacy.sql'))?.contentHash).toBeNull();
  });

  it('should refuse to run while another runner holds the lock', async () => {
    writeMigration('000_widgets.sql', 'CREATE TABLE widgets (id INTEGER PRIMARY KEY);');
    const holder = context('runner-a');
    const contender = context('runner-b');
    expect(await holder.lock.acquire(7)).toBe(true);

    const attempt = runMigrations(contender, { directory: migrationsDir, lockId: 7 });

    await expect(attempt).rejects.toBeInstanceOf(LockContentionError);
    expect(await contender.ledger.exists()).toBe(false);

    await holder.lock.release(7);
    const result = await runMigrations(contender, { directory: migrationsDir, lockId: 7 });
    expect(result.applied).toEqual(['000_widgets.sql']);
  });

  it('should release the lock after a failure', async () => {
    writeMigration('000_bad.sql', 'NOT SQL;');
    const ctx = context();

    await expect(runMigrations(ctx, { directory: migrationsDir, lockId: 3 })).rejects.toThrow(
      'Migration 000_bad.sql failed: '
    );

    expect(await getLease(ctx.connection, '"schema_migrations_lock"', 3)).toBeNull();
  });

  it('should not take the lock when there is nothing to run', async () => {
    const acquired: number[] = [];
    const lock: LockCoordinator = {
      strategy: 'lease',
      async acquire(lockId) {
        acquired.push(lockId);
        return true;
      },
      async release() {},
    };
    const ctx = { ...context(), lock };
    const events: MigrationEvent[] = [];

    const result = await runMigrations(ctx, { directory: migrationsDir, reporter: (event) => events.push(event) });

    expect(result.status).toBe('success');
    expect(acquired).toEqual([]);
    expect(events.map((event) => event.type)).toEqual(['empty', 'finished']);
    expect(await ctx.ledger.exists()).toBe(false);
  });

  it('should fail discovery for a missing directory', async () => {
    await expect(runMigrations(context(), { directory: join(workspace, 'nope') })).rejects.toBeInstanceOf(
      DiscoveryError
    );
  });

  it('should report events in order', async () => {
    writeMigration('000_widgets.sql', 'CREATE TABLE widgets (id INTEGER PRIMARY KEY);');
    await runMigrations(context(), { directory: migrationsDir });
    writeMigration('000_widgets.sql', 'CREATE TABLE widgets (id INTEGER);');
    writeMigration('001_bad.sql', 'NOT SQL;');
    const events: MigrationEvent[] = [];

    await expect(
      runMigrations(context('runner-b'), { directory: migrationsDir, reporter: (event) => events.push(event) })
    ).rejects.toBeInstanceOf(ExecutionError);

    expect(events.map((event) => event.type)).toEqual([
      'discovered',
      'drift',
      'skipped',
      'applying',
      'failed',
      'finished',
    ]);
  });

  it('should honour a custom extension', async () => {
    writeMigration('000_widgets.up.sql', 'CREATE TABLE widgets (id INTEGER);');
    writeMigration('000_widgets.down.sql', 'DROP TABLE widgets;');
    const ctx = context();

    const result = await runMigrations(ctx, { directory: migrationsDir, extension: '.up.sql' });

    expect(result.applied).toEqual(['000_widgets.up.sql']);
  });
});
