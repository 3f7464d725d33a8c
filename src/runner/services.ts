/**
 * Builds the external collaborators of a run from the configuration.
 */

import { ReolinkCamera } from '../lib/reolink.js';
import { S3ObjectStorage } from '../lib/s3_storage.js';
import { LocalArchiveStorage } from '../lib/local_storage.js';
import { TelegramNotifier, NullNotifier } from '../lib/telegram.js';
import { CommandIndexRefresher } from '../lib/index_refresh.js';
import { errorMessage } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import type { ClipCourierConfig, Credentials, StorageConfig } from '../types/config.js';
import type { CameraService, IndexRefresher, Notifier, ObjectStorage } from '../types/services.js';

export interface RunServices {
  camera: CameraService;
  storage: ObjectStorage;
  notifier: Notifier;
  /** null when no index refresh is configured */
  indexRefresher: IndexRefresher | null;
  /** Releases sessions held with the external services */
  dispose(): Promise<void>;
}

export type RunServicesFactory = (config: ClipCourierConfig, logger: Logger) => RunServices;

export function createStorage(config: StorageConfig): ObjectStorage {
  switch (config.kind) {
    case 's3':
      return new S3ObjectStorage(config);
    case 'local':
      return new LocalArchiveStorage(config);
  }
}

/**
 * Returns a factory wiring the real camera, storage, notifier and refresher.
 */
export function productionServices(credentials: Credentials): RunServicesFactory {
  return (config, logger) => {
    const camera = new ReolinkCamera({
      host: config.camera.host,
      https: config.camera.https,
      user: credentials.camera.user,
      password: credentials.camera.password,
      stream: config.camera.stream,
      requestTimeoutMs: config.camera.request_timeout_seconds * 1000,
    });

    return {
      camera,
      storage: createStorage(config.storage),
      notifier: credentials.telegram
        ? new TelegramNotifier({ botToken: credentials.telegram.bot_token, chatId: credentials.telegram.chat_id })
        : new NullNotifier(),
      indexRefresher: config.index_refresh ? new CommandIndexRefresher(config.index_refresh) : null,
      dispose: async () => {
        try {
          await camera.logout(new AbortController().signal);
        } catch (error) {
          logger.warn(`Camera logout failed: ${errorMessage(error)}`);
        }
      },
    };
  };
}
