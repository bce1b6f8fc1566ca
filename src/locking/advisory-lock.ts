/**
 * PostgreSQL advisory lock
 *
 * Session-scoped: the server drops the lock when the session ends, so a
 * crashed runner never leaves it behind.
 */

import { configError } from '../cli/errors.js';
import type { MigrationConnection } from '../database/connection.js';
import type { LockCoordinator } from './coordinator.js';

export function createAdvisoryLock(connection: MigrationConnection): LockCoordinator {
  if (connection.dialect !== 'postgres') {
    throw configError(`Advisory locks need the postgres driver (got ${connection.dialect}); use lock.strategy "lease"`);
  }

  const held = new Set<number>();

  return {
    strategy: 'advisory',

    async acquire(lockId) {
      const rows = await connection.query('SELECT pg_try_advisory_lock($1) AS locked', [lockId]);
      const locked = rows[0]?.locked === true;
      if (locked) {
        held.add(lockId);
      }
      return locked;
    },

    async release(lockId) {
      if (!held.delete(lockId)) return;
      await connection.query('SELECT pg_advisory_unlock($1) AS unlocked', [lockId]);
    },
  };
}
