/**
 * Lease lock with TTL and heartbeat
 * Stands in for an advisory lock on stores without one (SQLite)
 *
 * Flow:
 * 1. Try INSERT (fails if a lease exists)
 * 2. If it exists and we hold it, renew it
 * 3. If held by someone else and expired, claim atomically
 * 4. Otherwise report the lock as taken
 *
 * While held, a heartbeat pushes expires_at forward. A crashed holder stops
 * renewing and the lease becomes claimable once it expires.
 */

import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../cli/errors.js';
import { qualifyTable, type MigrationConnection } from '../database/connection.js';
import { assertIdentifier, DEFAULT_LEDGER_TABLE } from '../migrations/ledger.js';
import type { LockCoordinator } from './coordinator.js';
import {
  claimExpiredLease,
  deleteLease,
  ensureLeaseTable,
  getLease,
  renewLease,
  tryInsertLease,
} from './queries.js';

const DEFAULT_TTL_MS = 10 * 60 * 1000;
const HEARTBEAT_INTERVAL_MS = 30 * 1000;

export interface LeaseLockOptions {
  /** Ledger table; the lease lives in <table>_lock */
  table?: string;
  schema?: string;
  ttlMs?: number;
  heartbeatMs?: number;
  /** Defaults to a random UUID */
  holder?: string;
  /** Clock in epoch milliseconds */
  now?: () => number;
  /** Called when a heartbeat fails or finds the lease gone */
  onHeartbeatError?: (error: unknown) => void;
}

export interface LeaseLock extends LockCoordinator {
  readonly holder: string;
  readonly table: string;
  /** Extend the lease now; false if we no longer hold it */
  renew(lockId: number): Promise<boolean>;
}

export interface HeartbeatHandle {
  start: () => void;
  stop: () => void;
}

/**
 * Run beat every intervalMs until stopped; the timer never keeps the
 * process alive on its own
 */
export function createHeartbeatLoop(beat: () => void, intervalMs: number = HEARTBEAT_INTERVAL_MS): HeartbeatHandle {
  let intervalId: NodeJS.Timeout | null = null;

  const start = (): void => {
    if (intervalId) return;
    intervalId = setInterval(beat, intervalMs);
    intervalId.unref();
  };

  const stop = (): void => {
    if (intervalId) {
      clearInterval(intervalId);
      intervalId = null;
    }
  };

  return { start, stop };
}

function reportHeartbeatError(error: unknown): void {
  console.warn(`Migration lock heartbeat failed: ${errorMessage(error)}`);
}

export function createLeaseLock(connection: MigrationConnection, options: LeaseLockOptions = {}): LeaseLock {
  const baseTable = assertIdentifier(options.table ?? DEFAULT_LEDGER_TABLE, 'migrations.table');
  const schema = options.schema === undefined ? undefined : assertIdentifier(options.schema, 'migrations.schema');
  const table = qualifyTable(`${baseTable}_lock`, schema);
  const ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
  const heartbeatMs = options.heartbeatMs ?? HEARTBEAT_INTERVAL_MS;
  const holder = options.holder ?? uuidv4();
  const clock = options.now ?? Date.now;
  const onHeartbeatError = options.onHeartbeatError ?? reportHeartbeatError;

  const heartbeats = new Map<number, HeartbeatHandle>();

  const leaseWindow = (): { now: string; expiresAt: string } => {
    const now = clock();
    return {
      now: new Date(now).toISOString(),
      expiresAt: new Date(now + ttlMs).toISOString(),
    };
  };

  const renew = async (lockId: number): Promise<boolean> => {
    const { now, expiresAt } = leaseWindow();
    return renewLease(connection, table, lockId, holder, now, expiresAt);
  };

  const startHeartbeat = (lockId: number): void => {
    const handle = createHeartbeatLoop(() => {
      renew(lockId).then((renewed) => {
        if (!renewed) {
          onHeartbeatError(new Error(`Lease ${lockId} is no longer held by ${holder}`));
        }
      }, onHeartbeatError);
    }, heartbeatMs);
    heartbeats.set(lockId, handle);
    handle.start();
  };

  const stopHeartbeat = (lockId: number): boolean => {
    const handle = heartbeats.get(lockId);
    if (!handle) return false;
    handle.stop();
    heartbeats.delete(lockId);
    return true;
  };

  return {
    strategy: 'lease',
    holder,
    table,
    renew,

    async acquire(lockId) {
      await ensureLeaseTable(connection, table);

      const { now, expiresAt } = leaseWindow();
      let acquired = await tryInsertLease(connection, table, lockId, holder, now, expiresAt);

      if (!acquired) {
        const existing = await getLease(connection, table, lockId);
        if (existing?.holder === holder) {
          acquired = await renew(lockId);
        } else {
          acquired = await claimExpiredLease(connection, table, lockId, holder, now, expiresAt);
        }
      }

      if (acquired && !heartbeats.has(lockId)) {
        startHeartbeat(lockId);
      }
      return acquired;
    },

    async release(lockId) {
      if (!stopHeartbeat(lockId)) return;
      await deleteLease(connection, table, lockId, holder);
    },
  };
}
