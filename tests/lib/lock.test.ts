import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, utimes, writeFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  acquireLock,
  releaseLock,
  readLockState,
  withRunLock,
  isPidRunning,
  LockHeldError,
  DEFAULT_STALE_AFTER_MS,
} from '@/lib/lock.js';
import { createCapturingLogger, createLockEnv, messageOf } from '../helpers/mocks.js';

/** Current time truncated to whole seconds, so file mtimes round-trip exactly */
function wholeSecondNow(): number {
  return Math.floor(Date.now() / 1000) * 1000;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('run lock', () => {
  let testDir: string;
  let lockPath: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `clipcourier-lock-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    lockPath = join(testDir, 'run.lock');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  /** Writes a lock file whose mtime is `ageMs` before `now` */
  async function writeLock(content: string, now: number, ageMs: number): Promise<void> {
    await writeFile(lockPath, content, 'utf-8');
    const mtime = new Date(now - ageMs);
    await utimes(lockPath, mtime, mtime);
  }

  it('creates the lock file with pid and start time when none exists', async () => {
    const env = createLockEnv({ pid: 1234, now: Date.parse('2024-05-01T10:00:00.000Z') });

    const acquisition = await acquireLock(lockPath, { env });

    expect(acquisition.lock).toEqual({ pid: 1234, started_at: '2024-05-01T10:00:00.000Z' });
    expect(acquisition.reclaimed).toBeNull();
    expect(JSON.parse(await readFile(lockPath, 'utf-8'))).toEqual(acquisition.lock);
  });

  it('creates missing parent directories', async () => {
    const nested = join(testDir, 'var', 'run', 'clipcourier.lock');
    await acquireLock(nested, { env: createLockEnv() });
    expect(await exists(nested)).toBe(true);
  });

  it('fails with LockHeldError and leaves the lock untouched when the holder is alive', async () => {
    const now = wholeSecondNow();
    const env = createLockEnv({ pid: 1, now, alive: [777] });
    const content = JSON.stringify({ pid: 777, started_at: '2024-05-01T09:00:00.000Z' });
    await writeLock(content, now, 60_000);

    const error = await acquireLock(lockPath, { env }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LockHeldError);
    expect(error instanceof LockHeldError && error.holder).toEqual({ pid: 777, started_at: '2024-05-01T09:00:00.000Z' });
    expect(await readFile(lockPath, 'utf-8')).toBe(content);
  });

  it('never reclaims a lock whose holder is alive, however old it is', async () => {
    const now = wholeSecondNow();
    const env = createLockEnv({ now, alive: [777] });
    await writeLock(JSON.stringify({ pid: 777, started_at: '2024-05-01T00:00:00.000Z' }), now, DEFAULT_STALE_AFTER_MS * 3);
    const { logger, lines } = createCapturingLogger();

    await expect(acquireLock(lockPath, { env, logger })).rejects.toThrow(
      'Another instance is already running (PID: 777, started_at: 2024-05-01T00:00:00.000Z)'
    );
    const logged = (await lines()).map(messageOf);
    expect(logged[0]).toMatch(/^Run lock is older than the staleness threshold but its holder is still running/);
  });

  it('reclaims an expired lock of a dead process', async () => {
    const now = wholeSecondNow();
    const env = createLockEnv({ pid: 2222, now });
    await writeLock(JSON.stringify({ pid: 999, started_at: '2024-05-01T00:00:00.000Z' }), now, 7300_000);
    const { logger, lines } = createCapturingLogger();

    const acquisition = await acquireLock(lockPath, { env, logger });

    expect(acquisition.reclaimed).toEqual({ reason: 'expired', holder_pid: 999, age_seconds: 7300 });
    expect(acquisition.lock.pid).toBe(2222);
    expect((await lines()).map(messageOf)).toEqual(['Removing stale lock file (age: 7300s, PID: 999)']);
  });

  it('reclaims a recent lock of a dead process', async () => {
    const now = wholeSecondNow();
    const env = createLockEnv({ pid: 2222, now });
    await writeLock(JSON.stringify({ pid: 999, started_at: '2024-05-01T00:00:00.000Z' }), now, 30_000);
    const { logger, lines } = createCapturingLogger();

    const acquisition = await acquireLock(lockPath, { env, logger });

    expect(acquisition.reclaimed?.reason).toBe('process_not_running');
    expect((await lines()).map(messageOf)).toEqual([
      'Lock file exists but process not running (PID: 999). Removing lock file.',
    ]);
    expect(JSON.parse(await readFile(lockPath, 'utf-8')).pid).toBe(2222);
  });

  it.each([
    ['truncated JSON', '{'],
    ['garbage', 'not json at all!!!'],
    ['empty object', '{}'],
    ['non-numeric pid', JSON.stringify({ pid: 'abc', started_at: 'x' })],
    ['negative pid', JSON.stringify({ pid: -1, started_at: 'x' })],
  ])('treats a lock file with %s as stale and rewrites it', async (_label, content) => {
    const now = wholeSecondNow();
    const env = createLockEnv({ pid: 3333, now });
    await writeLock(content, now, 1000);

    const acquisition = await acquireLock(lockPath, { env });

    expect(acquisition.reclaimed).toEqual({ reason: 'unreadable', holder_pid: null, age_seconds: 1 });
    expect(JSON.parse(await readFile(lockPath, 'utf-8'))).toEqual(acquisition.lock);
  });

  it('lets exactly one of two concurrent acquirers win', async () => {
    const first = createLockEnv({ pid: 10 });
    const second = createLockEnv({ pid: 20 });
    first.alive.add(20);
    second.alive.add(10);

    const results = await Promise.allSettled([
      acquireLock(lockPath, { env: first }),
      acquireLock(lockPath, { env: second }),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r) => r.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.status === 'rejected' && rejected[0].reason).toBeInstanceOf(LockHeldError);
  });

  it('releaseLock removes the file and tolerates a missing one', async () => {
    await acquireLock(lockPath, { env: createLockEnv() });
    await releaseLock(lockPath);
    expect(await exists(lockPath)).toBe(false);
    await expect(releaseLock(lockPath)).resolves.toBeUndefined();
  });

  it('withRunLock releases the lock when the body throws', async () => {
    await expect(
      withRunLock(lockPath, { env: createLockEnv() }, async () => {
        expect(await exists(lockPath)).toBe(true);
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(await exists(lockPath)).toBe(false);
  });

  describe('readLockState', () => {
    it('reports absent, held and unreadable locks', async () => {
      const now = wholeSecondNow();
      const env = createLockEnv({ now, alive: [55] });
      expect(await readLockState(lockPath, env)).toEqual({ state: 'absent' });

      await writeLock(JSON.stringify({ pid: 55, started_at: '2024-05-01T00:00:00.000Z' }), now, 5000);
      expect(await readLockState(lockPath, env)).toEqual({
        state: 'held',
        lock: { pid: 55, started_at: '2024-05-01T00:00:00.000Z' },
        alive: true,
        age_seconds: 5,
      });

      await writeLock('{', now, 0);
      const state = await readLockState(lockPath, env);
      expect(state.state).toBe('unreadable');
    });
  });

  it('isPidRunning reports the current process as alive', () => {
    expect(isPidRunning(process.pid)).toBe(true);
  });
});
