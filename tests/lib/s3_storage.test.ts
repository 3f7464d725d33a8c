import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { S3ObjectStorage, StorageError, isNotFoundError } from '@/lib/s3_storage.js';
import { InterruptedError } from '@/types/run.js';

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

// Mock AWS SDK
vi.mock('@aws-sdk/client-s3', () => ({
  S3Client: vi.fn().mockImplementation(function () {
    return { send: mockSend };
  }),
  PutObjectCommand: vi.fn().mockImplementation(function (params: Record<string, unknown>) {
    return { ...params, _command: 'PutObject' };
  }),
  HeadObjectCommand: vi.fn().mockImplementation(function (params: Record<string, unknown>) {
    return { ...params, _command: 'HeadObject' };
  }),
}));

function sdkError(name: string, httpStatusCode: number): Error {
  return Object.assign(new Error(name), { name, $metadata: { httpStatusCode } });
}

describe('S3ObjectStorage', () => {
  let testDir: string;
  const signal = new AbortController().signal;
  const storage = new S3ObjectStorage({ kind: 's3', bucket: 'test-bucket', region: 'eu-central-1', key_prefix: '' });

  beforeEach(async () => {
    testDir = join(tmpdir(), `clipcourier-s3-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    mockSend.mockReset();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('describes itself by bucket', () => {
    expect(storage.description).toBe('s3://test-bucket');
  });

  it('uploads the file with its length and a video content type', async () => {
    const localPath = join(testDir, 'clip.mp4');
    await writeFile(localPath, 'twelve bytes', 'utf-8');
    mockSend.mockResolvedValueOnce({ ETag: '"abc"' });

    await storage.upload(localPath, '2024-05-01/clip.mp4', signal);

    expect(mockSend).toHaveBeenCalledTimes(1);
    expect(mockSend.mock.calls[0]?.[0]).toMatchObject({
      _command: 'PutObject',
      Bucket: 'test-bucket',
      Key: '2024-05-01/clip.mp4',
      ContentLength: 12,
      ContentType: 'video/mp4',
    });
  });

  it('wraps upload failures in a StorageError', async () => {
    const localPath = join(testDir, 'clip.mp4');
    await writeFile(localPath, 'x', 'utf-8');
    mockSend.mockRejectedValueOnce(sdkError('AccessDenied', 403));

    const error = await storage.upload(localPath, 'k.mp4', signal).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error instanceof StorageError && error.message).toBe(
      `Upload of ${localPath} to s3://test-bucket/k.mp4 failed: AccessDenied`
    );
  });

  it('fails without sending when the local file is missing', async () => {
    await expect(storage.upload(join(testDir, 'gone.mp4'), 'k.mp4', signal)).rejects.toBeInstanceOf(StorageError);
    expect(mockSend).not.toHaveBeenCalled();
  });

  it('checks existence with HeadObject', async () => {
    mockSend.mockResolvedValueOnce({ ContentLength: 12 });
    mockSend.mockRejectedValueOnce(sdkError('NotFound', 404));

    expect(await storage.exists('present.mp4', signal)).toBe(true);
    expect(await storage.exists('absent.mp4', signal)).toBe(false);
    expect(mockSend.mock.calls[0]?.[0]).toMatchObject({ _command: 'HeadObject', Key: 'present.mp4' });
  });

  it('surfaces other existence check failures', async () => {
    mockSend.mockRejectedValueOnce(sdkError('Forbidden', 403));

    await expect(storage.exists('k.mp4', signal)).rejects.toThrow(
      'Existence check of s3://test-bucket/k.mp4 failed: Forbidden'
    );
  });

  it('does nothing once the run is aborted', async () => {
    const controller = new AbortController();
    controller.abort(new InterruptedError('timeout'));

    await expect(storage.exists('k.mp4', controller.signal)).rejects.toBeInstanceOf(InterruptedError);
    expect(mockSend).not.toHaveBeenCalled();
  });
});

describe('isNotFoundError', () => {
  it('recognizes not-found errors by name or status', () => {
    expect(isNotFoundError(sdkError('NoSuchKey', 404))).toBe(true);
    expect(isNotFoundError(sdkError('UnknownError', 404))).toBe(true);
    expect(isNotFoundError(sdkError('AccessDenied', 403))).toBe(false);
    expect(isNotFoundError('NotFound')).toBe(false);
  });
});
