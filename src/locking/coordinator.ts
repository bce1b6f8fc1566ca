/**
 * Migration lock contract and scoped acquisition
 */

import { errorMessage } from '../cli/errors.js';
import type { LockStrategy } from '../config/schema.js';
import { LockContentionError } from '../migrations/errors.js';

export const DEFAULT_LOCK_ID = 123456789;

export interface LockCoordinator {
  readonly strategy: LockStrategy;
  /** Non-blocking; false when another session holds the lock */
  acquire(lockId: number): Promise<boolean>;
  /** Idempotent; releasing a lock we don't hold does nothing */
  release(lockId: number): Promise<void>;
}

export interface WithLockOptions {
  /** Receives release failures; they never replace the outcome of fn */
  onReleaseError?: (error: unknown, lockId: number) => void;
}

function reportReleaseError(error: unknown, lockId: number): void {
  console.warn(`Failed to release migration lock ${lockId}: ${errorMessage(error)}`);
}

/**
 * Run fn while holding the lock, releasing it on every exit path
 * Throws LockContentionError without calling fn when the lock is taken
 */
export async function withLock<T>(
  coordinator: LockCoordinator,
  lockId: number,
  fn: () => Promise<T>,
  options: WithLockOptions = {}
): Promise<T> {
  if (!(await coordinator.acquire(lockId))) {
    throw new LockContentionError(lockId);
  }

  try {
    return await fn();
  } finally {
    try {
      await coordinator.release(lockId);
    } catch (error) {
      (options.onReleaseError ?? reportReleaseError)(error, lockId);
    }
  }
}
