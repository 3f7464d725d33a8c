/**
 * Minimal HTTP(S) client used by the camera and Telegram clients.
 *
 * Responses are expected to carry JSON (the camera API answers with a
 * text/html content type, so the body is parsed regardless of it). Downloads
 * are streamed straight to disk.
 */

import http from 'node:http';
import https from 'node:https';
import { createWriteStream } from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { abortReason } from './retry.js';

/**
 * Error thrown for non-2xx responses, unparsable bodies and transport failures.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode: number | null = null,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export interface HttpRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Objects are sent as JSON */
  body?: string | object;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Accept self-signed TLS certificates (cameras ship with one) */
  allowSelfSigned?: boolean;
}

/** Query values are never logged; the camera token travels in the query */
function redact(url: string): string {
  const parsed = new URL(url);
  return `${parsed.origin}${parsed.pathname}${parsed.search ? '?…' : ''}`;
}

function openRequest(
  url: string,
  options: HttpRequestOptions,
  headers: Record<string, string>,
  onResponse: (res: http.IncomingMessage) => void
): http.ClientRequest {
  const common = {
    method: options.method ?? 'GET',
    headers,
    ...(options.signal && { signal: options.signal }),
  };
  if (new URL(url).protocol === 'https:') {
    return https.request(url, { ...common, rejectUnauthorized: !options.allowSelfSigned }, onResponse);
  }
  return http.request(url, common, onResponse);
}

/**
 * Sends a request and hands the successful response to `consume`.
 */
function send<T>(
  url: string,
  options: HttpRequestOptions,
  consume: (res: http.IncomingMessage) => Promise<T>
): Promise<T> {
  let bodyStr: string | undefined;
  const headers: Record<string, string> = { ...options.headers };

  if (options.body !== undefined) {
    bodyStr = typeof options.body === 'object' ? JSON.stringify(options.body) : options.body;
    if (typeof options.body === 'object' && !('content-type' in headers)) {
      headers['content-type'] = 'application/json';
    }
    headers['content-length'] = String(Buffer.byteLength(bodyStr));
  }

  return new Promise<T>((resolve, reject) => {
    const req = openRequest(url, options, headers, (res) => {
      const status = res.statusCode ?? 0;
      if (status < 200 || status >= 300) {
        // Consume response data to free up memory
        res.resume();
        reject(new HttpError(`Request failed with status ${status}: ${redact(url)}`, url, status));
        return;
      }
      consume(res).then(resolve, (error: unknown) => {
        reject(
          error instanceof HttpError
            ? error
            : new HttpError(
                `Failed to read response from ${redact(url)}: ${error instanceof Error ? error.message : String(error)}`,
                url,
                status,
                error instanceof Error ? error : undefined
              )
        );
      });
    });

    req.on('error', (error: Error) => {
      if (options.signal?.aborted) {
        reject(abortReason(options.signal));
        return;
      }
      reject(new HttpError(`Request to ${redact(url)} failed: ${error.message}`, url, null, error));
    });

    if (options.timeoutMs) {
      req.setTimeout(options.timeoutMs, () => {
        req.destroy(new Error(`network request timeout after ${options.timeoutMs}ms`));
      });
    }

    req.end(bodyStr);
  });
}

async function readBody(res: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of res) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Sends a request and parses the response body as JSON.
 *
 * @throws {HttpError} On transport errors, non-2xx status or invalid JSON
 * @throws {InterruptedError} If `options.signal` is aborted
 */
export function requestJson(url: string, options: HttpRequestOptions = {}): Promise<unknown> {
  return send(url, options, async (res) => {
    const body = await readBody(res);
    try {
      return JSON.parse(body) as unknown;
    } catch {
      throw new HttpError(`Response from ${redact(url)} is not JSON: ${body.slice(0, 200)}`, url, res.statusCode ?? null);
    }
  });
}

/**
 * Streams a response body into `destPath`.
 *
 * @returns Number of bytes written
 * @throws {HttpError} On transport errors or non-2xx status
 * @throws {InterruptedError} If `options.signal` is aborted
 */
export function downloadToFile(url: string, destPath: string, options: HttpRequestOptions = {}): Promise<number> {
  return send(url, options, async (res) => {
    const contentType = res.headers['content-type'] ?? '';
    if (/^application\/json|^text\//.test(contentType)) {
      // The camera reports errors as a JSON body with status 200
      const body = await readBody(res);
      throw new HttpError(`Expected a file from ${redact(url)} but got: ${body.slice(0, 200)}`, url, res.statusCode ?? null);
    }
    let bytes = 0;
    res.on('data', (chunk: Buffer) => {
      bytes += chunk.length;
    });
    await pipeline(res, createWriteStream(destPath));
    return bytes;
  });
}
