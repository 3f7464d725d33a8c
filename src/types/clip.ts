/**
 * Clip type definitions shared by the camera client and the pipeline.
 */

/**
 * Wall-clock timestamp as reported by the camera (camera local time).
 */
export interface LocalDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/**
 * One entry of a camera's motion recording listing.
 */
export interface ClipListing {
  /** Camera-side file name, used to download the clip */
  remoteId: string;
  /** When the recording started */
  capturedAt: LocalDateTime;
  /** Size reported by the camera, when available */
  sizeBytes?: number;
}

/**
 * A listed clip with the paths it maps to on this host and in storage.
 */
export interface ClipRecord extends ClipListing {
  channel: number;
  /** Calendar date (YYYY-MM-DD) of the capture */
  date: string;
  /** Where the clip is written while it is in flight */
  localPath: string;
  /** Object key the clip is delivered under */
  destinationKey: string;
}

/**
 * Pipeline stage a clip failed at.
 */
export type ClipStage = 'download' | 'upload' | 'verify' | 'ledger';

/**
 * Why a clip was skipped without any network I/O.
 */
export type ClipSkipReason = 'ledger' | 'local_file';

/**
 * Terminal result of processing one clip.
 */
export type ClipResult =
  | { status: 'delivered'; clip: ClipRecord; downloaded: boolean; deleted: boolean }
  | { status: 'skipped'; clip: ClipRecord; reason: ClipSkipReason }
  | { status: 'failed'; clip: ClipRecord; stage: ClipStage; error: string };
