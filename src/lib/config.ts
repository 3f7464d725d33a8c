/**
 * Configuration loading and validation utilities.
 *
 * Provides functions to find, load, validate and default clipcourier config
 * files, and to read the credentials that live in the environment.
 */

import { access } from 'node:fs/promises';
import { join, dirname, resolve, isAbsolute } from 'node:path';
import { atomicReadJson, AtomicFsError } from './fs.js';
import { loadSchema, validateWithSchema, SCHEMA_DIR } from './schema.js';
import { compileWindows, TimeWindowError } from './windows.js';
import { DEFAULT_STALE_AFTER_MS } from './lock.js';
import { DEFAULT_MAX_LOG_BYTES } from './logfile.js';
import { CONFIG_FILE_NAME } from './branding.js';
import type {
  ClipCourierConfig,
  ClipCourierConfigInput,
  Credentials,
  LoadedConfig,
  StorageConfig,
} from '../types/config.js';

/** Default wall-clock budget of a run (1 hour) */
export const DEFAULT_RUN_TIMEOUT_SECONDS = 3600;

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Searches for a configuration file by walking upward from `startDir`.
 * Stops at the filesystem root if not found.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Not here, keep walking up.
    }

    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

function resolveFrom(baseDir: string, p: string): string {
  return isAbsolute(p) ? p : resolve(baseDir, p);
}

/**
 * Fills in defaults and resolves relative paths against `baseDir`.
 */
export function applyDefaults(input: ClipCourierConfigInput, baseDir: string): ClipCourierConfig {
  const camera = input.camera;
  const pipeline = input.pipeline ?? {};
  const run = input.run ?? {};
  const log = input.log ?? {};

  let storage: StorageConfig;
  if (input.storage.kind === 's3') {
    storage = {
      kind: 's3',
      bucket: input.storage.bucket,
      key_prefix: input.storage.key_prefix ?? '',
      ...(input.storage.region !== undefined && { region: input.storage.region }),
      ...(input.storage.endpoint !== undefined && { endpoint: input.storage.endpoint }),
      ...(input.storage.force_path_style !== undefined && { force_path_style: input.storage.force_path_style }),
    };
  } else {
    storage = {
      kind: 'local',
      root: resolveFrom(baseDir, input.storage.root),
      key_prefix: input.storage.key_prefix ?? '',
    };
  }

  return {
    version: input.version,
    camera: {
      host: camera.host,
      https: camera.https ?? true,
      channel: camera.channel ?? 0,
      stream: camera.stream ?? 'main',
      list_retries: camera.list_retries ?? 3,
      download_retries: camera.download_retries ?? 5,
      retry_delay_seconds: camera.retry_delay_seconds ?? 30,
      request_timeout_seconds: camera.request_timeout_seconds ?? 120,
      today_index_delay_seconds: camera.today_index_delay_seconds ?? 10,
    },
    windows: input.windows ?? [],
    filter: {
      empty_windows: input.filter?.empty_windows ?? 'match_none',
    },
    storage,
    pipeline: {
      download_dir: resolveFrom(baseDir, pipeline.download_dir ?? 'clips'),
      ledger_file: resolveFrom(baseDir, pipeline.ledger_file ?? 'clipcourier.ledger.json'),
      leftover_policy: pipeline.leftover_policy ?? 'upload',
    },
    run: {
      lockfile: resolveFrom(baseDir, run.lockfile ?? 'clipcourier.lock'),
      stale_after_seconds: run.stale_after_seconds ?? DEFAULT_STALE_AFTER_MS / 1000,
      timeout_seconds: run.timeout_seconds ?? DEFAULT_RUN_TIMEOUT_SECONDS,
    },
    log: {
      file: resolveFrom(baseDir, log.file ?? 'clipcourier.log'),
      mode: log.mode ?? 'rotate',
      max_bytes: log.max_bytes ?? DEFAULT_MAX_LOG_BYTES,
      level: log.level ?? 'info',
      console: log.console ?? false,
    },
    notify: {
      telegram: input.notify?.telegram ?? false,
    },
    index_refresh: input.index_refresh
      ? {
          command: input.index_refresh.command,
          scope: input.index_refresh.scope ?? '',
          timeout_seconds: input.index_refresh.timeout_seconds ?? 600,
        }
      : null,
  };
}

/**
 * Validates a parsed config document and returns the defaulted config.
 *
 * @throws {ConfigError} Listing every schema violation, or the first invalid
 * time window
 */
export function validateConfig(raw: unknown, schema: object, configPath: string): ClipCourierConfig {
  const result = validateWithSchema<ClipCourierConfigInput>(raw, schema);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid configuration file ${configPath}:\n  ${result.errors.join('\n  ')}`,
      configPath,
      undefined,
      result.errors
    );
  }

  try {
    compileWindows(result.data.windows ?? []);
  } catch (error) {
    if (error instanceof TimeWindowError) {
      throw new ConfigError(`Invalid configuration file ${configPath}: ${error.message}`, configPath, error, [
        error.message,
      ]);
    }
    throw error;
  }

  return applyDefaults(result.data, dirname(configPath));
}

/**
 * Loads and validates a clipcourier configuration file.
 *
 * @param configPath - Optional path to the config file. If not provided,
 *                     searches upward from the current directory.
 * @throws {ConfigError} If the config file cannot be found, read, or is invalid
 *
 * @example
 * ```typescript
 * const { config } = await loadConfig('/etc/clipcourier/clipcourier.config.json');
 * ```
 */
export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  let resolvedPath: string;

  if (configPath) {
    resolvedPath = resolve(configPath);
  } else {
    const found = await findConfigFile();
    if (!found) {
      throw new ConfigError(
        `Configuration file not found. Expected ${CONFIG_FILE_NAME} in current directory or parent directories.`
      );
    }
    resolvedPath = found;
  }

  let raw: unknown;
  try {
    raw = await atomicReadJson(resolvedPath);
  } catch (error) {
    if (error instanceof AtomicFsError) {
      throw new ConfigError(`Failed to read configuration file: ${error.message}`, resolvedPath, error);
    }
    throw error;
  }

  const schema = await loadSchema(join(SCHEMA_DIR, 'config.schema.json'));
  return { config: validateConfig(raw, schema, resolvedPath), configPath: resolvedPath };
}

/**
 * Reads credentials from the environment.
 *
 * The camera login is always required; Telegram credentials only when
 * Telegram notifications are enabled.
 *
 * @throws {ConfigError} Naming every missing variable
 */
export function resolveCredentials(config: ClipCourierConfig, env: NodeJS.ProcessEnv = process.env): Credentials {
  const required = ['REOLINK_USER', 'REOLINK_PASSWORD'];
  if (config.notify.telegram) {
    required.push('TELEGRAM_BOT_TOKEN', 'TELEGRAM_CHAT_ID');
  }

  const missing = required.filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`, undefined, undefined, missing);
  }

  return {
    camera: { user: env['REOLINK_USER'] ?? '', password: env['REOLINK_PASSWORD'] ?? '' },
    telegram: config.notify.telegram
      ? { bot_token: env['TELEGRAM_BOT_TOKEN'] ?? '', chat_id: env['TELEGRAM_CHAT_ID'] ?? '' }
      : null,
  };
}

/**
 * Applies the `REOLINK_HOST` environment override to the camera host.
 */
export function withEnvironmentOverrides(
  config: ClipCourierConfig,
  env: NodeJS.ProcessEnv = process.env
): ClipCourierConfig {
  const host = env['REOLINK_HOST'];
  if (!host) return config;
  return { ...config, camera: { ...config.camera, host } };
}
