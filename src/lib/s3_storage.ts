/**
 * S3 delivery target.
 *
 * Clips are uploaded with a single PutObject streamed from disk; delivery is
 * confirmed with HeadObject before the local copy is removed.
 */

import { S3Client, PutObjectCommand, HeadObjectCommand } from '@aws-sdk/client-s3';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { throwIfAborted } from './retry.js';
import type { ObjectStorage } from '../types/services.js';
import type { S3StorageConfig } from '../types/config.js';

/**
 * Error thrown when an upload or existence check fails.
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly key: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

function httpStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('$metadata' in error)) return undefined;
  const metadata: unknown = error.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) return undefined;
  const status: unknown = metadata.httpStatusCode;
  return typeof status === 'number' ? status : undefined;
}

/**
 * Whether an SDK error means the object does not exist.
 */
export function isNotFoundError(error: unknown): boolean {
  const name = errorName(error);
  return name === 'NotFound' || name === 'NoSuchKey' || httpStatus(error) === 404;
}

export class S3ObjectStorage implements ObjectStorage {
  private readonly client: S3Client;

  constructor(private readonly config: S3StorageConfig) {
    this.client = new S3Client({
      ...(config.region && { region: config.region }),
      ...(config.endpoint && { endpoint: config.endpoint }),
      ...(config.force_path_style !== undefined && { forcePathStyle: config.force_path_style }),
    });
  }

  get description(): string {
    return `s3://${this.config.bucket}`;
  }

  async upload(localPath: string, key: string, signal: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    try {
      const { size } = await stat(localPath);
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.config.bucket,
          Key: key,
          Body: createReadStream(localPath),
          ContentLength: size,
          ContentType: 'video/mp4',
        }),
        { abortSignal: signal }
      );
    } catch (error) {
      throwIfAborted(signal);
      throw new StorageError(
        `Upload of ${localPath} to ${this.description}/${key} failed: ${error instanceof Error ? error.message : String(error)}`,
        key,
        error instanceof Error ? error : undefined
      );
    }
    throwIfAborted(signal);
  }

  async exists(key: string, signal: AbortSignal): Promise<boolean> {
    throwIfAborted(signal);
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.config.bucket, Key: key }), { abortSignal: signal });
      return true;
    } catch (error) {
      throwIfAborted(signal);
      if (isNotFoundError(error)) {
        return false;
      }
      throw new StorageError(
        `Existence check of ${this.description}/${key} failed: ${error instanceof Error ? error.message : String(error)}`,
        key,
        error instanceof Error ? error : undefined
      );
    }
  }
}
