/**
 * Configuration type definitions for clipcourier.
 *
 * `ClipCourierConfigInput` is the shape accepted on disk (validated by
 * schemas/config.schema.json); `ClipCourierConfig` is the fully defaulted
 * configuration the rest of the code works with.
 */

/** Time window as written in the config ("HH:MM" or "HH:MM:SS") */
export interface TimeWindowConfig {
  start: string;
  end: string;
}

/** What an empty window list selects */
export type EmptyWindowsPolicy = 'match_none' | 'match_all';

/**
 * What to do with a clip whose local file already exists but which the
 * delivery ledger does not list as delivered.
 */
export type LeftoverPolicy = 'upload' | 'skip';

/** How the run log is prepared before each run */
export type LogMode = 'clear' | 'rotate';

export type StreamType = 'main' | 'sub';

export interface CameraConfig {
  host: string;
  https: boolean;
  channel: number;
  stream: StreamType;
  list_retries: number;
  download_retries: number;
  retry_delay_seconds: number;
  request_timeout_seconds: number;
  today_index_delay_seconds: number;
}

export interface S3StorageConfig {
  kind: 's3';
  bucket: string;
  region?: string;
  endpoint?: string;
  force_path_style?: boolean;
  key_prefix: string;
}

export interface LocalStorageConfig {
  kind: 'local';
  /** Archive root directory */
  root: string;
  key_prefix: string;
}

export type StorageConfig = S3StorageConfig | LocalStorageConfig;

export interface FilterConfig {
  empty_windows: EmptyWindowsPolicy;
}

export interface PipelineConfig {
  download_dir: string;
  ledger_file: string;
  leftover_policy: LeftoverPolicy;
}

export interface RunConfig {
  lockfile: string;
  stale_after_seconds: number;
  timeout_seconds: number;
}

export interface LogConfig {
  file: string;
  mode: LogMode;
  max_bytes: number;
  level: string;
  console: boolean;
}

export interface NotifyConfig {
  telegram: boolean;
}

export interface IndexRefreshConfig {
  /** argv of the refresh command; "{scope}" is replaced by `scope` */
  command: string[];
  scope: string;
  timeout_seconds: number;
}

export interface ClipCourierConfig {
  version: string;
  camera: CameraConfig;
  windows: TimeWindowConfig[];
  filter: FilterConfig;
  storage: StorageConfig;
  pipeline: PipelineConfig;
  run: RunConfig;
  log: LogConfig;
  notify: NotifyConfig;
  index_refresh: IndexRefreshConfig | null;
}

/**
 * Configuration as written on disk: everything except the camera host and the
 * storage target has a default.
 */
export interface ClipCourierConfigInput {
  version: string;
  camera: { host: string } & Partial<Omit<CameraConfig, 'host'>>;
  windows?: TimeWindowConfig[];
  filter?: Partial<FilterConfig>;
  storage:
    | ({ kind: 's3'; bucket: string } & Partial<Omit<S3StorageConfig, 'kind' | 'bucket'>>)
    | ({ kind: 'local'; root: string } & Partial<Omit<LocalStorageConfig, 'kind' | 'root'>>);
  pipeline?: Partial<PipelineConfig>;
  run?: Partial<RunConfig>;
  log?: Partial<LogConfig>;
  notify?: Partial<NotifyConfig>;
  index_refresh?: ({ command: string[] } & Partial<Omit<IndexRefreshConfig, 'command'>>) | null;
}

/**
 * Secrets read from the process environment.
 */
export interface Credentials {
  camera: { user: string; password: string };
  telegram: { bot_token: string; chat_id: string } | null;
}

/**
 * A loaded configuration together with where it came from.
 */
export interface LoadedConfig {
  config: ClipCourierConfig;
  /** Absolute path of the config file */
  configPath: string;
}
