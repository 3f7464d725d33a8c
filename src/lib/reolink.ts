/**
 * Reolink HTTP API client.
 *
 * Every call goes through `/cgi-bin/api.cgi` with a JSON command array. The
 * session token obtained by Login travels in the query string and is dropped
 * whenever a call fails, so the next attempt logs in again.
 */

import { requestJson, downloadToFile, HttpError } from './http.js';
import { throwIfAborted } from './retry.js';
import type { CameraService } from '../types/services.js';
import type { ClipListing, LocalDateTime } from '../types/clip.js';
import type { StreamType } from '../types/config.js';

/**
 * Error thrown when the camera rejects a command or answers unexpectedly.
 */
export class CameraError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly rspCode: number | null = null,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CameraError';
  }
}

export interface ReolinkCameraOptions {
  host: string;
  https: boolean;
  user: string;
  password: string;
  stream: StreamType;
  requestTimeoutMs: number;
}

/** Camera-side timestamp fields */
interface ReolinkTime {
  year: number;
  mon: number;
  day: number;
  hour: number;
  min: number;
  sec: number;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toReolinkTime(date: string, hour: number, min: number, sec: number): ReolinkTime {
  const [year, mon, day] = date.split('-').map(Number);
  return { year: year ?? 0, mon: mon ?? 0, day: day ?? 0, hour, min, sec };
}

function parseReolinkTime(value: unknown): LocalDateTime | null {
  if (!isObject(value)) return null;
  const time: JsonObject = value;
  const field = (key: keyof ReolinkTime): number | null => {
    const n = time[key];
    return typeof n === 'number' && Number.isInteger(n) ? n : null;
  };
  const year = field('year');
  const month = field('mon');
  const day = field('day');
  const hour = field('hour');
  const minute = field('min');
  const second = field('sec');
  if (year === null || month === null || day === null || hour === null || minute === null || second === null) {
    return null;
  }
  return { year, month, day, hour, minute, second };
}

/**
 * Extracts `value` from the response entry of `command`.
 *
 * @throws {CameraError} If the camera reported an error or the shape is unexpected
 */
export function commandValue(response: unknown, command: string): JsonObject {
  const entry = Array.isArray(response) ? response.find((item) => isObject(item) && item['cmd'] === command) : null;
  if (!isObject(entry)) {
    throw new CameraError(`Camera returned no response for ${command}`, command);
  }
  if (entry['code'] !== 0) {
    const error = isObject(entry['error']) ? entry['error'] : {};
    const rspCode = typeof error['rspCode'] === 'number' ? error['rspCode'] : null;
    const detail = typeof error['detail'] === 'string' ? error['detail'] : 'unknown error';
    throw new CameraError(`Camera rejected ${command}: ${detail} (rspCode ${rspCode ?? 'n/a'})`, command, rspCode);
  }
  return isObject(entry['value']) ? entry['value'] : {};
}

/**
 * Maps one `SearchResult.File` entry to a listing, or null if it is malformed.
 */
export function parseSearchFile(file: unknown): ClipListing | null {
  if (!isObject(file) || typeof file['name'] !== 'string') return null;
  const capturedAt = parseReolinkTime(file['StartTime']);
  if (!capturedAt) return null;
  const size = file['size'];
  return {
    remoteId: file['name'],
    capturedAt,
    ...(typeof size === 'number' && { sizeBytes: size }),
    ...(typeof size === 'string' && /^\d+$/.test(size) && { sizeBytes: Number(size) }),
  };
}

/**
 * Camera client implementing listing and download over the Reolink API.
 */
export class ReolinkCamera implements CameraService {
  private token: string | null = null;

  constructor(private readonly options: ReolinkCameraOptions) {}

  private get baseUrl(): string {
    return `${this.options.https ? 'https' : 'http'}://${this.options.host}/cgi-bin/api.cgi`;
  }

  private async call(command: string, param: JsonObject, signal: AbortSignal, token: string | null): Promise<JsonObject> {
    const query = new URLSearchParams({ cmd: command });
    if (token) query.set('token', token);
    try {
      const response = await requestJson(`${this.baseUrl}?${query.toString()}`, {
        method: 'POST',
        body: [{ cmd: command, action: 0, param }],
        timeoutMs: this.options.requestTimeoutMs,
        signal,
        allowSelfSigned: true,
      });
      return commandValue(response, command);
    } catch (error) {
      if (error instanceof HttpError) {
        throw new CameraError(`${command} failed: ${error.message}`, command, null, error);
      }
      throw error;
    }
  }

  private async login(signal: AbortSignal): Promise<string> {
    if (this.token) return this.token;
    const value = await this.call(
      'Login',
      { User: { userName: this.options.user, password: this.options.password } },
      signal,
      null
    );
    const tokenInfo = value['Token'];
    if (!isObject(tokenInfo) || typeof tokenInfo['name'] !== 'string') {
      throw new CameraError('Camera login returned no token', 'Login');
    }
    this.token = tokenInfo['name'];
    return this.token;
  }

  private async authenticated<T>(signal: AbortSignal, operation: (token: string) => Promise<T>): Promise<T> {
    throwIfAborted(signal);
    const token = await this.login(signal);
    try {
      return await operation(token);
    } catch (error) {
      this.token = null;
      throw error;
    }
  }

  async listClips(channel: number, date: string, signal: AbortSignal): Promise<ClipListing[]> {
    return this.authenticated(signal, async (token) => {
      const value = await this.call(
        'Search',
        {
          Search: {
            channel,
            onlyStatus: 0,
            streamType: this.options.stream,
            StartTime: toReolinkTime(date, 0, 0, 0),
            EndTime: toReolinkTime(date, 23, 59, 59),
          },
        },
        signal,
        token
      );
      const result = value['SearchResult'];
      const files = isObject(result) && Array.isArray(result['File']) ? result['File'] : [];
      const clips: ClipListing[] = [];
      for (const file of files) {
        const clip = parseSearchFile(file);
        if (clip) clips.push(clip);
      }
      return clips;
    });
  }

  async downloadClip(remoteId: string, destPath: string, signal: AbortSignal): Promise<number> {
    return this.authenticated(signal, async (token) => {
      const query = new URLSearchParams({ cmd: 'Download', source: remoteId, output: remoteId, token });
      try {
        return await downloadToFile(`${this.baseUrl}?${query.toString()}`, destPath, {
          timeoutMs: this.options.requestTimeoutMs,
          signal,
          allowSelfSigned: true,
        });
      } catch (error) {
        if (error instanceof HttpError) {
          throw new CameraError(`Download of ${remoteId} failed: ${error.message}`, 'Download', null, error);
        }
        throw error;
      }
    });
  }

  /**
   * Ends the camera session, if one is open.
   */
  async logout(signal: AbortSignal): Promise<void> {
    const token = this.token;
    if (!token) return;
    this.token = null;
    await this.call('Logout', {}, signal, token);
  }
}
