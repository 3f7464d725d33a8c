/**
 * Clip pipeline controller.
 *
 * For every day of the run: list the camera's recordings, keep those inside
 * the configured time windows and move each one through
 * download → upload → verify → delete. Failures are contained per clip and
 * per day; only an interrupt (timeout or signal) escapes.
 */

import { mkdir, rename, rm, rmdir } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { fileExists, errnoCode } from '../lib/fs.js';
import { iterateDays, formatCalendarDate } from '../lib/dates.js';
import { filterByWindows } from '../lib/windows.js';
import type { TimeWindow } from '../lib/windows.js';
import { ledgerKey } from '../lib/ledger.js';
import type { DeliveryLedger } from '../lib/ledger.js';
import { sleep, throwIfAborted, withRetries, abortReason } from '../lib/retry.js';
import { notifySafely } from '../lib/telegram.js';
import { errorMessage } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { isInterruptedError } from '../types/run.js';
import type { DateRange, RunSummary } from '../types/run.js';
import type { ClipListing, ClipRecord, ClipResult, LocalDateTime } from '../types/clip.js';
import type { CameraConfig, ClipCourierConfig } from '../types/config.js';
import type { CameraService, Notifier, ObjectStorage } from '../types/services.js';

/**
 * Error recorded when a clip could not be downloaded after all attempts.
 */
export class ClipDownloadError extends Error {
  constructor(
    message: string,
    public readonly remoteId: string,
    public readonly attempts: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ClipDownloadError';
  }
}

/**
 * Error recorded when a clip could not be uploaded or its upload not confirmed.
 */
export class ClipUploadError extends Error {
  constructor(
    message: string,
    public readonly destinationKey: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ClipUploadError';
  }
}

export interface PipelineServices {
  camera: CameraService;
  storage: ObjectStorage;
  notifier: Notifier;
  ledger: DeliveryLedger;
}

export interface PipelineContext {
  config: Pick<ClipCourierConfig, 'camera' | 'filter' | 'pipeline' | 'storage'>;
  windows: readonly TimeWindow[];
  range: DateRange;
  /** Local calendar date the run started on */
  today: string;
  services: PipelineServices;
  logger: Logger;
  signal: AbortSignal;
  /** Counters updated as clips are processed */
  summary: RunSummary;
}

const pad = (n: number): string => n.toString().padStart(2, '0');

/**
 * Local file name of a clip: "YYYY-MM-DD HH-mm-ss_ch<channel>.mp4".
 */
export function clipFileName(capturedAt: LocalDateTime, channel: number): string {
  const date = formatCalendarDate(capturedAt.year, capturedAt.month, capturedAt.day);
  const time = `${pad(capturedAt.hour)}-${pad(capturedAt.minute)}-${pad(capturedAt.second)}`;
  return `${date} ${time}_ch${channel}.mp4`;
}

/**
 * Joins key segments with "/", ignoring empty segments and stray slashes.
 */
export function joinKey(...segments: string[]): string {
  return segments
    .map((segment) => segment.replace(/^\/+|\/+$/g, ''))
    .filter((segment) => segment.length > 0)
    .join('/');
}

/**
 * Maps a listing entry to its local path and destination key.
 */
export function buildClipRecord(
  listing: ClipListing,
  channel: number,
  downloadDir: string,
  keyPrefix: string
): ClipRecord {
  const date = formatCalendarDate(listing.capturedAt.year, listing.capturedAt.month, listing.capturedAt.day);
  const fileName = clipFileName(listing.capturedAt, channel);
  return {
    ...listing,
    channel,
    date,
    localPath: join(downloadDir, date, fileName),
    destinationKey: joinKey(keyPrefix, date, fileName),
  };
}

/**
 * Rethrows `error` if it stems from the run being interrupted.
 */
function rethrowIfInterrupted(error: unknown, signal: AbortSignal): void {
  if (isInterruptedError(error)) throw error;
  if (signal.aborted) throw abortReason(signal);
}

function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * Removes `dir` if it is empty and lies below `root`.
 */
async function removeEmptyDir(dir: string, root: string): Promise<void> {
  if (resolve(dir) === resolve(root)) return;
  try {
    await rmdir(dir);
  } catch (error) {
    const code = errnoCode(error);
    if (code !== 'ENOTEMPTY' && code !== 'EEXIST' && code !== 'ENOENT') {
      throw error;
    }
  }
}

async function downloadWithRetries(
  clip: ClipRecord,
  camera: CameraService,
  cameraConfig: CameraConfig,
  logger: Logger,
  signal: AbortSignal
): Promise<number> {
  const attempts = cameraConfig.download_retries;
  const partPath = `${clip.localPath}.part`;
  await mkdir(dirname(clip.localPath), { recursive: true });

  const bytes = await withRetries(
    async (attempt) => {
      logger.info(`Downloading ${clip.remoteId} as ${clip.localPath} (attempt ${attempt}/${attempts})`);
      try {
        return await camera.downloadClip(clip.remoteId, partPath, signal);
      } catch (error) {
        await rm(partPath, { force: true });
        throw error;
      }
    },
    {
      attempts,
      delayMs: cameraConfig.retry_delay_seconds * 1000,
      signal,
      onRetry: (error, attempt) => {
        logger.warn(
          `Download of ${clip.remoteId} failed: ${errorMessage(error)}. ` +
            `Retrying ${attempt}/${attempts} in ${cameraConfig.retry_delay_seconds}s...`
        );
      },
    }
  );

  await rename(partPath, clip.localPath);
  return bytes;
}

/**
 * Moves one clip through the pipeline.
 *
 * Already delivered clips (and, under the "skip" leftover policy, clips with
 * a local file) are skipped without any network call. The local file is only
 * deleted once the storage target confirms the object.
 *
 * @throws {InterruptedError} If the run is interrupted; every other failure
 * is returned as a `failed` result
 */
export async function processClip(clip: ClipRecord, ctx: PipelineContext): Promise<ClipResult> {
  const { services, logger, signal, config } = ctx;
  throwIfAborted(signal);

  const key = ledgerKey(clip.channel, clip.remoteId);
  if (services.ledger.has(key)) {
    logger.debug(`${clip.remoteId} already delivered as ${clip.destinationKey}, skipping`);
    return { status: 'skipped', clip, reason: 'ledger' };
  }

  const leftover = await fileExists(clip.localPath);
  if (leftover && config.pipeline.leftover_policy === 'skip') {
    logger.info(`File ${clip.localPath} already exists locally, skipping download.`);
    return { status: 'skipped', clip, reason: 'local_file' };
  }

  let downloaded = false;
  if (leftover) {
    logger.info(`Found leftover local file ${clip.localPath}, uploading it without downloading`);
  } else {
    try {
      const bytes = await downloadWithRetries(clip, services.camera, config.camera, logger, signal);
      downloaded = true;
      logger.info(`Downloaded ${clip.remoteId} (${bytes} bytes)`);
    } catch (error) {
      rethrowIfInterrupted(error, signal);
      const failure = new ClipDownloadError(
        `Failed to download ${clip.remoteId} after ${config.camera.download_retries} attempts: ${errorMessage(error)}`,
        clip.remoteId,
        config.camera.download_retries,
        toError(error)
      );
      logger.error(failure.message);
      return { status: 'failed', clip, stage: 'download', error: failure.message };
    }
  }

  try {
    await services.storage.upload(clip.localPath, clip.destinationKey, signal);
    logger.info(`Uploaded ${clip.localPath} to ${services.storage.description}/${clip.destinationKey}`);
  } catch (error) {
    rethrowIfInterrupted(error, signal);
    const failure = new ClipUploadError(
      `Failed to upload ${clip.localPath}: ${errorMessage(error)}`,
      clip.destinationKey,
      toError(error)
    );
    logger.error(failure.message);
    return { status: 'failed', clip, stage: 'upload', error: failure.message };
  }

  let confirmed: boolean;
  try {
    confirmed = await services.storage.exists(clip.destinationKey, signal);
  } catch (error) {
    rethrowIfInterrupted(error, signal);
    const message = `Could not verify upload of ${clip.destinationKey}: ${errorMessage(error)}`;
    logger.error(message);
    return { status: 'failed', clip, stage: 'verify', error: message };
  }
  if (!confirmed) {
    const message = `Upload of ${clip.destinationKey} not found in ${services.storage.description}; keeping ${clip.localPath}`;
    logger.error(message);
    return { status: 'failed', clip, stage: 'verify', error: message };
  }

  try {
    await services.ledger.record(key, {
      destination_key: clip.destinationKey,
      delivered_at: new Date().toISOString(),
      size_bytes: clip.sizeBytes ?? null,
    });
  } catch (error) {
    // The local file stays so a later run uploads it again and retries the record
    const message = `Failed to record delivery of ${clip.remoteId}; keeping ${clip.localPath}: ${errorMessage(error)}`;
    logger.error(message);
    return { status: 'failed', clip, stage: 'ledger', error: message };
  }

  let deleted = false;
  try {
    await rm(clip.localPath);
    deleted = true;
    logger.info(`Deleted local file: ${clip.localPath}`);
    await removeEmptyDir(dirname(clip.localPath), config.pipeline.download_dir);
  } catch (error) {
    logger.warn(`Failed to clean up ${clip.localPath}: ${errorMessage(error)}`);
  }

  return { status: 'delivered', clip, downloaded, deleted };
}

function tally(summary: RunSummary, result: ClipResult): void {
  switch (result.status) {
    case 'delivered':
      summary.uploaded++;
      if (result.downloaded) summary.downloaded++;
      if (result.deleted) summary.deleted++;
      break;
    case 'skipped':
      summary.skipped++;
      break;
    case 'failed':
      summary.failed++;
      break;
  }
}

/**
 * Lists one day, filters it by the time windows and processes the matches.
 *
 * A listing that still fails after all retries is logged and recorded in the
 * summary; the run continues with the next day.
 */
export async function processDay(date: string, ctx: PipelineContext): Promise<ClipResult[]> {
  const { config, services, logger, signal, summary } = ctx;
  const channel = config.camera.channel;
  summary.days++;

  if (date === ctx.today && config.camera.today_index_delay_seconds > 0) {
    logger.info(`Waiting ${config.camera.today_index_delay_seconds}s for the camera to index today's recordings`);
    await sleep(config.camera.today_index_delay_seconds * 1000, signal);
  }

  let listing: ClipListing[];
  try {
    listing = await withRetries(() => services.camera.listClips(channel, date, signal), {
      attempts: config.camera.list_retries,
      delayMs: config.camera.retry_delay_seconds * 1000,
      signal,
      onRetry: (error, attempt) => {
        logger.warn(
          `Listing clips for ${date} failed: ${errorMessage(error)}. ` +
            `Retrying ${attempt}/${config.camera.list_retries} in ${config.camera.retry_delay_seconds}s...`
        );
      },
    });
  } catch (error) {
    rethrowIfInterrupted(error, signal);
    logger.error(
      `Failed to list clips for ${date} after ${config.camera.list_retries} attempts: ${errorMessage(error)}`
    );
    summary.listing_failures.push(date);
    return [];
  }

  const matched = filterByWindows(listing, ctx.windows, config.filter.empty_windows);
  summary.listed += listing.length;
  summary.matched += matched.length;
  logger.info(`Found ${listing.length} clips for ${date} on channel ${channel}, ${matched.length} within time windows`);

  if (matched.length === 0) {
    return [];
  }
  await notifySafely(services.notifier, `Processing ${matched.length} clips from ${date}`, logger);

  const results: ClipResult[] = [];
  for (const listed of matched) {
    const clip = buildClipRecord(listed, channel, config.pipeline.download_dir, config.storage.key_prefix);
    const result = await processClip(clip, ctx);
    tally(summary, result);
    results.push(result);
  }
  return results;
}

/**
 * Processes every day of the range in ascending order.
 *
 * @returns The run summary, also updated in place on `ctx.summary`
 * @throws {InterruptedError} If the run is interrupted
 */
export async function runPipeline(ctx: PipelineContext): Promise<RunSummary> {
  for (const date of iterateDays(ctx.range)) {
    throwIfAborted(ctx.signal);
    await processDay(date, ctx);
  }
  ctx.logger.info(
    `Pipeline finished: ${ctx.summary.uploaded} delivered, ${ctx.summary.skipped} skipped, ${ctx.summary.failed} failed`
  );
  return ctx.summary;
}
