/**
 * Run log lifecycle: prepares the log file before a run starts writing to it.
 *
 * Two modes are supported:
 * - clear: the log is truncated before every run
 * - rotate: the log keeps growing across runs until it exceeds `maxBytes`,
 *   at which point it is moved to `<log>.old` and a fresh log is started
 */

import { mkdir, rename, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { LogMode } from '../types/config.js';
import { errnoCode } from './fs.js';
import { formatTimestamp } from './logger.js';

/** Size above which the run log is rotated (10 MiB) */
export const DEFAULT_MAX_LOG_BYTES = 10 * 1024 * 1024;

export interface LogPreparationOptions {
  mode: LogMode;
  maxBytes?: number;
  now?: () => Date;
}

export interface LogPreparation {
  mode: LogMode;
  /** Size of the log before it was prepared (0 when missing) */
  previousBytes: number;
  /** Path the previous log was moved to, when it was rotated */
  rotatedTo: string | null;
}

/**
 * Suffix given to a rotated log.
 */
export function rotatedLogPath(logPath: string): string {
  return `${logPath}.old`;
}

async function currentSize(logPath: string): Promise<number> {
  try {
    return (await stat(logPath)).size;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return 0;
    }
    throw error;
  }
}

/**
 * Clears or rotates the run log according to `options.mode`.
 *
 * After rotation the fresh log starts with a single notice line naming the
 * size of the rotated log.
 */
export async function prepareRunLog(logPath: string, options: LogPreparationOptions): Promise<LogPreparation> {
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_LOG_BYTES;
  const now = options.now ?? (() => new Date());

  await mkdir(dirname(logPath), { recursive: true });
  const previousBytes = await currentSize(logPath);

  if (options.mode === 'clear') {
    await writeFile(logPath, '', 'utf-8');
    return { mode: 'clear', previousBytes, rotatedTo: null };
  }

  if (previousBytes <= maxBytes) {
    return { mode: 'rotate', previousBytes, rotatedTo: null };
  }

  const rotatedTo = rotatedLogPath(logPath);
  await rename(logPath, rotatedTo);
  await writeFile(
    logPath,
    `${formatTimestamp(now())}: Rotated large log file (${previousBytes} bytes)\n`,
    'utf-8'
  );
  return { mode: 'rotate', previousBytes, rotatedTo };
}
