/**
 * `clipcourier status`: reports the run lock, run log and delivery ledger
 * without modifying any of them.
 */

import { stat } from 'node:fs/promises';
import { loadConfig } from '../lib/config.js';
import { errnoCode } from '../lib/fs.js';
import { readLockState, systemLockEnvironment } from '../lib/lock.js';
import { DeliveryLedger } from '../lib/ledger.js';
import { errorMessage } from '../lib/logger.js';
import { CLI_NAME, VERSION } from '../lib/branding.js';
import type { LockEnvironment, LockState } from '../types/lock.js';

export interface StatusReport {
  config_path: string;
  lock: LockState & { path: string };
  log: { path: string; bytes: number | null };
  ledger: { path: string; delivered: number | null; error?: string };
}

async function sizeOf(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return null;
    throw error;
  }
}

/**
 * Collects the status of the configured run.
 */
export async function collectStatus(
  configPath?: string,
  lockEnv: LockEnvironment = systemLockEnvironment
): Promise<StatusReport> {
  const loaded = await loadConfig(configPath);
  const { config } = loaded;

  let ledger: StatusReport['ledger'];
  try {
    const opened = await DeliveryLedger.open(config.pipeline.ledger_file);
    ledger = { path: config.pipeline.ledger_file, delivered: opened.size };
  } catch (error) {
    ledger = { path: config.pipeline.ledger_file, delivered: null, error: errorMessage(error) };
  }

  return {
    config_path: loaded.configPath,
    lock: { path: config.run.lockfile, ...(await readLockState(config.run.lockfile, lockEnv)) },
    log: { path: config.log.file, bytes: await sizeOf(config.log.file) },
    ledger,
  };
}

export function formatLockState(lock: LockState): string {
  switch (lock.state) {
    case 'absent':
      return 'not held';
    case 'held':
      return lock.alive
        ? `held by PID ${lock.lock.pid} since ${lock.lock.started_at} (running, ${lock.age_seconds}s old)`
        : `stale: PID ${lock.lock.pid} is not running (${lock.age_seconds}s old)`;
    case 'unreadable':
      return `unreadable (${lock.reason})`;
  }
}

export async function statusCommand(options: { configPath?: string; json?: boolean }): Promise<void> {
  const report = await collectStatus(options.configPath);

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  console.log(`${CLI_NAME} status (v${VERSION})`);
  console.log(`  config: ${report.config_path}`);
  console.log(`  lock:   ${report.lock.path}: ${formatLockState(report.lock)}`);
  console.log(`  log:    ${report.log.path}${report.log.bytes === null ? ' (missing)' : ` (${report.log.bytes} bytes)`}`);
  console.log(
    `  ledger: ${report.ledger.path}: ` +
      (report.ledger.delivered === null ? `unreadable (${report.ledger.error})` : `${report.ledger.delivered} clips delivered`)
  );
}
