/**
 * Narrow interfaces for the external collaborators the pipeline talks to.
 */

import type { ClipListing } from './clip.js';

/**
 * Camera listing and clip transfer.
 */
export interface CameraService {
  /** Lists motion recordings of one channel for one calendar day, in camera order */
  listClips(channel: number, date: string, signal: AbortSignal): Promise<ClipListing[]>;
  /** Downloads a recording to `destPath`, returning the number of bytes written */
  downloadClip(remoteId: string, destPath: string, signal: AbortSignal): Promise<number>;
}

/**
 * Durable storage the clips are delivered to.
 */
export interface ObjectStorage {
  /** Human-readable target, used in log lines */
  readonly description: string;
  upload(localPath: string, key: string, signal: AbortSignal): Promise<void>;
  exists(key: string, signal: AbortSignal): Promise<boolean>;
}

/**
 * Fire-and-forget operator notifications.
 */
export interface Notifier {
  notify(message: string): Promise<void>;
}

/**
 * Makes newly delivered files visible to whatever indexes the storage.
 */
export interface IndexRefresher {
  refresh(scope: string): Promise<void>;
}
