/**
 * Local archive delivery target: a directory tree, typically the data
 * directory of a self-hosted file server.
 */

import { copyFile, mkdir, rename, rm, stat } from 'node:fs/promises';
import { dirname, join, resolve, sep } from 'node:path';
import { errnoCode } from './fs.js';
import { throwIfAborted } from './retry.js';
import { StorageError } from './s3_storage.js';
import type { ObjectStorage } from '../types/services.js';
import type { LocalStorageConfig } from '../types/config.js';

export class LocalArchiveStorage implements ObjectStorage {
  constructor(private readonly config: Pick<LocalStorageConfig, 'root'>) {}

  get description(): string {
    return this.config.root;
  }

  /**
   * Absolute path of `key` inside the archive root.
   *
   * @throws {StorageError} If the key escapes the root
   */
  pathFor(key: string): string {
    const root = resolve(this.config.root);
    const target = resolve(join(root, key));
    if (target !== root && !target.startsWith(root + sep)) {
      throw new StorageError(`Key escapes the archive root: ${key}`, key);
    }
    return target;
  }

  async upload(localPath: string, key: string, signal: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    const target = this.pathFor(key);
    const tmpPath = `${target}.tmp.${process.pid}`;
    try {
      await mkdir(dirname(target), { recursive: true });
      await copyFile(localPath, tmpPath);
      await rename(tmpPath, target);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw new StorageError(
        `Copy of ${localPath} to ${target} failed: ${error instanceof Error ? error.message : String(error)}`,
        key,
        error instanceof Error ? error : undefined
      );
    }
  }

  async exists(key: string, signal: AbortSignal): Promise<boolean> {
    throwIfAborted(signal);
    try {
      return (await stat(this.pathFor(key))).isFile();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }
}
