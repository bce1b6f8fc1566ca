/**
 * Database queries for lease locks
 * Each state change is a single conditional statement, so two runners
 * racing for the same row cannot both win
 */

import { placeholder, type MigrationConnection, type Row } from '../database/connection.js';

export interface LeaseRow {
  lock_id: number;
  holder: string;
  acquired_at: string;
  expires_at: string;
  heartbeat_at: string;
}

function toLeaseRow(row: Row): LeaseRow {
  return {
    lock_id: Number(row.lock_id),
    holder: String(row.holder),
    acquired_at: String(row.acquired_at),
    expires_at: String(row.expires_at),
    heartbeat_at: String(row.heartbeat_at),
  };
}

/**
 * Numbered placeholders for a statement: params(conn, 3) -> ['$1','$2','$3'] or ['?','?','?']
 */
function params(connection: MigrationConnection, count: number): string[] {
  return Array.from({ length: count }, (_, i) => placeholder(connection.dialect, i + 1));
}

export async function ensureLeaseTable(connection: MigrationConnection, table: string): Promise<void> {
  await connection.query(
    `CREATE TABLE IF NOT EXISTS ${table} (
      lock_id BIGINT PRIMARY KEY,
      holder TEXT NOT NULL,
      acquired_at TEXT NOT NULL,
      expires_at TEXT NOT NULL,
      heartbeat_at TEXT NOT NULL
    )`
  );
}

export async function getLease(
  connection: MigrationConnection,
  table: string,
  lockId: number
): Promise<LeaseRow | null> {
  const [p1] = params(connection, 1);
  const rows = await connection.query(
    `SELECT lock_id, holder, acquired_at, expires_at, heartbeat_at FROM ${table} WHERE lock_id = ${p1}`,
    [lockId]
  );
  const row = rows[0];
  return row ? toLeaseRow(row) : null;
}

/**
 * Try to insert a new lease
 * Returns true if acquired, false if a lease row already exists
 */
export async function tryInsertLease(
  connection: MigrationConnection,
  table: string,
  lockId: number,
  holder: string,
  now: string,
  expiresAt: string
): Promise<boolean> {
  const [p1, p2, p3, p4, p5] = params(connection, 5);
  const rows = await connection.query(
    `INSERT INTO ${table} (lock_id, holder, acquired_at, expires_at, heartbeat_at)
     VALUES (${p1}, ${p2}, ${p3}, ${p4}, ${p5})
     ON CONFLICT (lock_id) DO NOTHING
     RETURNING lock_id`,
    [lockId, holder, now, expiresAt, now]
  );
  return rows.length > 0;
}

/**
 * Take over an expired lease
 * Only succeeds if the lease is still expired when the update runs
 */
export async function claimExpiredLease(
  connection: MigrationConnection,
  table: string,
  lockId: number,
  holder: string,
  now: string,
  expiresAt: string
): Promise<boolean> {
  const [p1, p2, p3, p4, p5, p6] = params(connection, 6);
  const rows = await connection.query(
    `UPDATE ${table}
     SET holder = ${p1},
         acquired_at = ${p2},
         expires_at = ${p3},
         heartbeat_at = ${p4}
     WHERE lock_id = ${p5}
       AND expires_at < ${p6}
     RETURNING lock_id`,
    [holder, now, expiresAt, now, lockId, now]
  );
  return rows.length > 0;
}

/**
 * Push out the expiry of a lease we hold
 * Returns false if the lease is gone or now belongs to someone else
 */
export async function renewLease(
  connection: MigrationConnection,
  table: string,
  lockId: number,
  holder: string,
  now: string,
  expiresAt: string
): Promise<boolean> {
  const [p1, p2, p3, p4] = params(connection, 4);
  const rows = await connection.query(
    `UPDATE ${table}
     SET expires_at = ${p1}, heartbeat_at = ${p2}
     WHERE lock_id = ${p3} AND holder = ${p4}
     RETURNING lock_id`,
    [expiresAt, now, lockId, holder]
  );
  return rows.length > 0;
}

/**
 * Delete a lease (only by its holder)
 */
export async function deleteLease(
  connection: MigrationConnection,
  table: string,
  lockId: number,
  holder: string
): Promise<boolean> {
  const [p1, p2] = params(connection, 2);
  const rows = await connection.query(
    `DELETE FROM ${table} WHERE lock_id = ${p1} AND holder = ${p2} RETURNING lock_id`,
    [lockId, holder]
  );
  return rows.length > 0;
}
