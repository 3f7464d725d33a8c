/**
 * Fixture test: timeout and signal classification.
 *
 * Verifies that a run cut short by its deadline or by SIGINT:
 * - ends with the conventional exit code (124, 130)
 * - still triggers the index refresh and the end-of-run notification
 * - writes the classification line before the finalization markers
 * - releases the lock
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, access } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { executeRun } from '@/runner/run.js';
import { InterruptedError } from '@/types/run.js';
import { createFakeServices, createLockEnv, createMockConfig, FakeCamera, messageOf } from '../helpers/mocks.js';

const DAY = '2024-05-01';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('F002: run timeout', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `clipcourier-f002-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function slowServices() {
    const camera = new FakeCamera();
    camera.listDelayMs = 60_000;
    return createFakeServices(camera);
  }

  it('classifies a run past its deadline as timed out and still finalizes it', async () => {
    const config = createMockConfig(testDir, {
      run: { timeout_seconds: 0.05 },
      index_refresh: { command: ['true'], scope: 'clips' },
    });
    const services = slowServices();

    const report = await executeRun({
      config,
      range: { start: DAY, end: DAY },
      today: '2024-05-09',
      createServices: () => services,
      lockEnv: createLockEnv(),
    });

    expect(report.exitCode).toBe(124);
    expect(report.outcome).toEqual({ kind: 'timed_out' });
    expect(services.indexRefresher.scopes).toEqual(['clips']);
    expect(services.notifier.messages.at(-1)).toBe(
      `clipcourier run for ${DAY} timed out after 0.05 seconds: 0 delivered, 0 skipped, 0 failed`
    );
    expect(services.disposed).toBe(true);
    expect(await exists(config.run.lockfile)).toBe(false);

    const logged = (await readFile(config.log.file, 'utf-8')).trimEnd().split('\n').map(messageOf);
    expect(logged.slice(-4)).toEqual([
      '=== Run timed out after 0.05 seconds ===',
      '=== Triggering index refresh ===',
      'Index refresh completed',
      '=== Run ended ===',
    ]);
  });

  it('ends with 130 when interrupted by SIGINT', async () => {
    const config = createMockConfig(testDir);
    const services = slowServices();
    const controller = new AbortController();
    setTimeout(() => controller.abort(new InterruptedError('SIGINT')), 20);

    const report = await executeRun({
      config,
      range: { start: DAY, end: DAY },
      today: '2024-05-09',
      createServices: () => services,
      signal: controller.signal,
      lockEnv: createLockEnv(),
    });

    expect(report.exitCode).toBe(130);
    expect(services.notifier.messages.at(-1)).toBe(
      `clipcourier run for ${DAY} failed with exit code 130: 0 delivered, 0 skipped, 0 failed`
    );
    const logged = (await readFile(config.log.file, 'utf-8')).trimEnd().split('\n').map(messageOf);
    expect(logged).toContain('Run interrupted by SIGINT');
    expect(logged).toContain('=== Run exited with code 130 ===');
    expect(await exists(config.run.lockfile)).toBe(false);
  });
});
