/**
 * Run lock preventing overlapping clipcourier runs.
 *
 * The lock file records the PID of the run holding it. A lock whose holder is
 * no longer alive is stale: it is removed and acquisition is retried once.
 * A lock whose holder is alive is never taken over, however old it is.
 */

import { mkdir, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'winston';
import type {
  LockAcquisition,
  LockEnvironment,
  LockInfo,
  LockState,
  ReclaimedLock,
  StaleLockReason,
} from '../types/lock.js';
import { atomicCreateJson, atomicReadJson, AtomicFsError, errnoCode } from './fs.js';

/** Age after which a lock left by a dead process is reported as expired (2 hours) */
export const DEFAULT_STALE_AFTER_MS = 2 * 60 * 60 * 1000;

/**
 * Error thrown when a lock is already held by another live process.
 */
export class LockHeldError extends Error {
  constructor(
    message: string,
    public readonly lockPath: string,
    public readonly holder: LockInfo | null
  ) {
    super(message);
    this.name = 'LockHeldError';
  }
}

/**
 * Checks if a process with the given PID is currently running.
 *
 * Uses process.kill(pid, 0) which checks for process existence
 * without actually sending a signal.
 */
export function isPidRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // ESRCH = no such process, EPERM = exists but no permission
    return errnoCode(error) === 'EPERM';
  }
}

/**
 * Lock environment backed by the real process table and clock.
 */
export const systemLockEnvironment: LockEnvironment = {
  pid: process.pid,
  now: () => Date.now(),
  isAlive: isPidRunning,
};

export interface LockOptions {
  staleAfterMs?: number;
  env?: LockEnvironment;
  logger?: Logger;
}

/**
 * Checks that a parsed lock file has the LockInfo shape.
 */
function isLockInfo(value: unknown): value is LockInfo {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  if (!('pid' in value) || !('started_at' in value)) {
    return false;
  }
  const { pid, started_at } = value;
  return typeof pid === 'number' && Number.isInteger(pid) && pid > 0 && typeof started_at === 'string';
}

type LockInspection =
  | { state: 'absent' }
  | { state: 'held'; lock: LockInfo; ageMs: number }
  | { state: 'unreadable'; reason: string; ageMs: number };

async function inspectLock(lockPath: string, now: number): Promise<LockInspection> {
  let ageMs: number;
  try {
    const stats = await stat(lockPath);
    ageMs = Math.max(0, now - stats.mtimeMs);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return { state: 'absent' };
    }
    return { state: 'unreadable', reason: error instanceof Error ? error.message : String(error), ageMs: 0 };
  }

  try {
    const raw = await atomicReadJson(lockPath);
    if (!isLockInfo(raw)) {
      return { state: 'unreadable', reason: 'lock file does not contain a valid pid', ageMs };
    }
    return { state: 'held', lock: raw, ageMs };
  } catch (error) {
    if (error instanceof AtomicFsError && error.code === 'ENOENT') {
      // Removed between stat and read
      return { state: 'absent' };
    }
    return { state: 'unreadable', reason: error instanceof Error ? error.message : String(error), ageMs };
  }
}

/**
 * Reports the current lock file state without modifying it.
 */
export async function readLockState(lockPath: string, env: LockEnvironment = systemLockEnvironment): Promise<LockState> {
  const inspection = await inspectLock(lockPath, env.now());
  switch (inspection.state) {
    case 'absent':
      return { state: 'absent' };
    case 'held':
      return {
        state: 'held',
        lock: inspection.lock,
        alive: env.isAlive(inspection.lock.pid),
        age_seconds: Math.floor(inspection.ageMs / 1000),
      };
    case 'unreadable':
      return { state: 'unreadable', reason: inspection.reason, age_seconds: Math.floor(inspection.ageMs / 1000) };
  }
}

/**
 * Acquires the run lock.
 *
 * - No lock file: a new lock is created for `env.pid`.
 * - Lock held by a live process: throws LockHeldError, leaving the file alone.
 * - Lock held by a dead process, or unreadable: the file is removed and
 *   acquisition is retried once.
 *
 * @throws {LockHeldError} If another live process holds the lock
 * @throws {AtomicFsError} If the lock file cannot be created or removed
 */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<LockAcquisition> {
  const env = options.env ?? systemLockEnvironment;
  const staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
  const logger = options.logger;
  let reclaimed: ReclaimedLock | null = null;

  for (let attempt = 0; attempt < 2; attempt++) {
    const inspection = await inspectLock(lockPath, env.now());

    if (inspection.state === 'absent') {
      const lock: LockInfo = { pid: env.pid, started_at: new Date(env.now()).toISOString() };
      await mkdir(dirname(lockPath), { recursive: true });
      try {
        await atomicCreateJson(lockPath, lock);
        return { lock, reclaimed };
      } catch (error) {
        if (error instanceof AtomicFsError && error.code === 'EEXIST') {
          // Another run created the lock first; look at it again
          continue;
        }
        throw error;
      }
    }

    const ageSeconds = Math.floor(inspection.ageMs / 1000);

    if (inspection.state === 'held' && env.isAlive(inspection.lock.pid)) {
      if (inspection.ageMs > staleAfterMs) {
        logger?.warn('Run lock is older than the staleness threshold but its holder is still running', {
          pid: inspection.lock.pid,
          age_seconds: ageSeconds,
        });
      }
      throw new LockHeldError(
        `Another instance is already running (PID: ${inspection.lock.pid}, started_at: ${inspection.lock.started_at})`,
        lockPath,
        inspection.lock
      );
    }

    let reason: StaleLockReason;
    let holderPid: number | null = null;
    if (inspection.state === 'held') {
      holderPid = inspection.lock.pid;
      reason = inspection.ageMs > staleAfterMs ? 'expired' : 'process_not_running';
    } else {
      reason = 'unreadable';
    }

    switch (reason) {
      case 'expired':
        logger?.warn(`Removing stale lock file (age: ${ageSeconds}s, PID: ${holderPid})`);
        break;
      case 'process_not_running':
        logger?.warn(`Lock file exists but process not running (PID: ${holderPid}). Removing lock file.`);
        break;
      case 'unreadable':
        logger?.warn('Removing unreadable lock file', {
          reason: inspection.state === 'unreadable' ? inspection.reason : undefined,
          age_seconds: ageSeconds,
        });
        break;
    }

    await removeLockFile(lockPath);
    reclaimed = { reason, holder_pid: holderPid, age_seconds: ageSeconds };
  }

  const holder = await inspectLock(lockPath, env.now());
  throw new LockHeldError(
    'Could not acquire run lock: another instance took it while a stale lock was being removed',
    lockPath,
    holder.state === 'held' ? holder.lock : null
  );
}

async function removeLockFile(lockPath: string): Promise<void> {
  try {
    await rm(lockPath, { force: true });
  } catch (error) {
    throw new AtomicFsError(
      `Failed to remove lock file ${lockPath}: ${error instanceof Error ? error.message : String(error)}`,
      lockPath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Releases the run lock by deleting the lock file.
 *
 * Removal is unconditional: only the run holding the lock ever calls this.
 * A missing file is not an error.
 */
export async function releaseLock(lockPath: string): Promise<void> {
  await removeLockFile(lockPath);
}

/**
 * Runs `body` while holding the run lock. The lock is released on every exit
 * path of `body`, including thrown errors.
 */
export async function withRunLock<T>(
  lockPath: string,
  options: LockOptions,
  body: (acquisition: LockAcquisition) => Promise<T>
): Promise<T> {
  const acquisition = await acquireLock(lockPath, options);
  try {
    return await body(acquisition);
  } finally {
    await releaseLock(lockPath);
  }
}
