/**
 * Run lock type definitions.
 *
 * These types support the lock acquisition/release system that prevents
 * overlapping clipcourier runs and enables reclaiming locks left behind by
 * crashed runs.
 */

/**
 * Information stored in the lock file.
 */
export interface LockInfo {
  /** Process ID that holds the lock */
  pid: number;
  /** ISO timestamp when lock was acquired */
  started_at: string;
}

/**
 * Why an existing lock file was considered stale and removed.
 *
 * - expired: holder is gone and the file is older than the staleness threshold
 * - process_not_running: holder is gone but the file is recent
 * - unreadable: the file could not be read or parsed
 */
export type StaleLockReason = 'expired' | 'process_not_running' | 'unreadable';

/**
 * Details of a stale lock that was reclaimed during acquisition.
 */
export interface ReclaimedLock {
  reason: StaleLockReason;
  /** PID recorded in the stale lock, null when unreadable */
  holder_pid: number | null;
  /** Age of the lock file in whole seconds */
  age_seconds: number;
}

/**
 * Result of a successful lock acquisition.
 */
export interface LockAcquisition {
  lock: LockInfo;
  reclaimed: ReclaimedLock | null;
}

/**
 * Process and time hooks used by the lock manager.
 *
 * Production code uses the real process table and wall clock; tests inject
 * fakes so staleness policy can be exercised without real processes.
 */
export interface LockEnvironment {
  /** PID written into newly created locks */
  pid: number;
  /** Current time in epoch milliseconds */
  now(): number;
  /** Whether a process with the given PID is alive */
  isAlive(pid: number): boolean;
}

/**
 * Snapshot of the lock file, as reported by `clipcourier status`.
 */
export type LockState =
  | { state: 'absent' }
  | { state: 'held'; lock: LockInfo; alive: boolean; age_seconds: number }
  | { state: 'unreadable'; reason: string; age_seconds: number };
