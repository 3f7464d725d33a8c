import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runCommand } from '@/commands/run.js';
import type { ClipCourierConfig, Credentials } from '@/types/config.js';
import { createFakeServices, createLockEnv, FakeCamera, listing } from '../helpers/mocks.js';

describe('runCommand', () => {
  let testDir: string;
  let configPath: string;
  const env = { REOLINK_USER: 'admin', REOLINK_PASSWORD: 'test-secret' };
  const now = () => new Date(2024, 4, 1, 12, 0, 0);

  beforeEach(async () => {
    testDir = join(tmpdir(), `clipcourier-run-cmd-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    configPath = join(testDir, 'clipcourier.config.json');
    await writeFile(
      configPath,
      JSON.stringify({
        version: '1',
        camera: { host: '127.0.0.1', https: false, retry_delay_seconds: 0, today_index_delay_seconds: 0 },
        storage: { kind: 'local', root: 'archive' },
        windows: [{ start: '00:00', end: '24:00' }],
      }),
      'utf-8'
    );
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should run today by default with credentials from the environment', async () => {
    const services = createFakeServices(new FakeCamera({ '2024-05-01': [listing('a.mp4', '2024-05-01', '10:00:00')] }));
    let received: Credentials | null = null;
    let receivedConfig: ClipCourierConfig | null = null;

    const exitCode = await runCommand({
      configPath,
      env: { ...env, REOLINK_HOST: 'camera.lan' },
      now,
      lockEnv: createLockEnv(),
      createServices: (credentials) => {
        received = credentials;
        return (config) => {
          receivedConfig = config;
          return services;
        };
      },
    });

    expect(exitCode).toBe(0);
    expect(received).toEqual({ camera: { user: 'admin', password: 'test-secret' }, telegram: null });
    expect(receivedConfig).toMatchObject({ camera: { host: 'camera.lan' } });
    expect(services.camera.listCalls).toEqual([{ channel: 0, date: '2024-05-01' }]);
    expect(services.storage.uploads.map((upload) => upload.key)).toEqual([
      '2024-05-01/2024-05-01 10-00-00_ch0.mp4',
    ]);
  });

  it('should process every day of an explicit range', async () => {
    const services = createFakeServices();

    const exitCode = await runCommand({
      configPath,
      start: '2024-02-28',
      end: '2024-03-01',
      env,
      now,
      lockEnv: createLockEnv(),
      createServices: () => () => services,
    });

    expect(exitCode).toBe(0);
    expect(services.camera.listCalls.map((call) => call.date)).toEqual(['2024-02-28', '2024-02-29', '2024-03-01']);
  });

  it('should end the process after a timed-out run has released the lock', async () => {
    await writeFile(
      configPath,
      JSON.stringify({
        version: '1',
        camera: { host: '127.0.0.1', https: false, retry_delay_seconds: 0, today_index_delay_seconds: 0 },
        storage: { kind: 'local', root: 'archive' },
        windows: [{ start: '00:00', end: '24:00' }],
        run: { timeout_seconds: 0.05 },
      }),
      'utf-8'
    );
    const camera = new FakeCamera();
    camera.listDelayMs = 60_000;
    const services = createFakeServices(camera);
    const exits: Array<{ code: number; lockPresent: boolean }> = [];

    const exitCode = await runCommand({
      configPath,
      env,
      now,
      lockEnv: createLockEnv(),
      createServices: () => () => services,
      exit: (code) => {
        exits.push({ code, lockPresent: existsSync(join(testDir, 'clipcourier.lock')) });
      },
    });

    expect(exitCode).toBe(124);
    expect(exits).toEqual([{ code: 124, lockPresent: false }]);
  });

  it('should end the process with 1 when another run holds the lock', async () => {
    await writeFile(
      join(testDir, 'clipcourier.lock'),
      JSON.stringify({ pid: 777, started_at: '2024-05-01T09:00:00.000Z' }),
      'utf-8'
    );
    const exit = vi.fn();

    await runCommand({
      configPath,
      env,
      now,
      lockEnv: createLockEnv({ alive: [777] }),
      createServices: () => () => createFakeServices(),
      exit,
    });

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should reject a single range bound before any I/O', async () => {
    const createServices = vi.fn(() => () => createFakeServices());

    const exitCode = await runCommand({ configPath, start: '2024-05-01', env, now, createServices });

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      'Error: You must specify BOTH --start and --end to use date range mode.'
    );
    expect(createServices).not.toHaveBeenCalled();
    expect(await readdir(testDir)).toEqual(['clipcourier.config.json']);
  });

  it('should report missing credentials as a configuration error', async () => {
    const exitCode = await runCommand({ configPath, env: {}, now });

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      'Configuration error: Missing required environment variables: REOLINK_USER, REOLINK_PASSWORD'
    );
  });

  it('should exit with 1 when another run holds the lock', async () => {
    await writeFile(
      join(testDir, 'clipcourier.lock'),
      JSON.stringify({ pid: 777, started_at: '2024-05-01T09:00:00.000Z' }),
      'utf-8'
    );
    const createServices = vi.fn(() => () => createFakeServices());

    const exitCode = await runCommand({
      configPath,
      env,
      now,
      lockEnv: createLockEnv({ alive: [777] }),
      createServices,
    });

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      'Another instance is already running (PID: 777, started_at: 2024-05-01T09:00:00.000Z). Exiting.'
    );
    expect(createServices).toHaveBeenCalledTimes(1);
  });
});
