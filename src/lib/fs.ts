/**
 * Atomic file system utilities for crash-safe JSON operations.
 *
 * Writes go through a temporary file that is fsynced before it is moved into
 * place, so readers never observe a partially written document.
 */

import { open, rename, unlink, readFile, link, stat } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';

/**
 * Error thrown when atomic file operations fail.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AtomicFsError';
  }

  /** errno code of the underlying failure, if any (e.g. ENOENT, EEXIST) */
  get code(): string | undefined {
    return errnoCode(this.cause);
  }
}

/**
 * Returns the errno code carried by a Node.js system error.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Writes `content` to `tmpPath` and fsyncs it. The temporary file is removed
 * if anything fails.
 */
async function writeSyncedTmp(tmpPath: string, content: string): Promise<void> {
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;
  try {
    fileHandle = await open(tmpPath, 'w');
    await fileHandle.writeFile(content, 'utf-8');
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    await unlink(tmpPath).catch(() => undefined);
    throw error;
  }
}

function serialize<T>(data: T): string {
  return JSON.stringify(data, null, 2) + '\n';
}

/**
 * Atomically writes JSON data to a file using the write-tmp-fsync-rename pattern.
 *
 * @throws {AtomicFsError} If the write operation fails
 *
 * @example
 * ```typescript
 * await atomicWriteJson('/var/lib/clipcourier/ledger.json', { version: 1, delivered: {} });
 * ```
 */
export async function atomicWriteJson<T>(filePath: string, data: T): Promise<void> {
  const tmpPath = `${filePath}.tmp`;

  try {
    await writeSyncedTmp(tmpPath, serialize(data));
    // Atomic rename (POSIX guarantees atomicity)
    await rename(tmpPath, filePath);
  } catch (error) {
    await unlink(tmpPath).catch(() => undefined);
    throw new AtomicFsError(
      `Failed to atomically write JSON to ${filePath}: ${describeError(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Atomically creates a JSON file that must not exist yet.
 *
 * The document is written and fsynced under a process-unique temporary name
 * and then hard-linked into place. `link` fails with EEXIST when the target
 * exists, so of two concurrent creators exactly one succeeds, and the winner's
 * file is complete from the moment it becomes visible.
 *
 * @throws {AtomicFsError} With code EEXIST if the file already exists
 */
export async function atomicCreateJson<T>(filePath: string, data: T): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;

  try {
    await writeSyncedTmp(tmpPath, serialize(data));
    await link(tmpPath, filePath);
  } catch (error) {
    throw new AtomicFsError(
      `Failed to create ${filePath}: ${describeError(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  } finally {
    await unlink(tmpPath).catch(() => undefined);
  }
}

/**
 * Reads and parses a JSON file.
 *
 * @throws {AtomicFsError} If the file cannot be read or parsed
 */
export async function atomicReadJson(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new AtomicFsError(
      `Failed to read JSON from ${filePath}: ${describeError(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Whether a regular file exists at `filePath`.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return stats.isFile();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}
