import winston from 'winston';
import type { Logger } from 'winston';
import { createWriteStream } from 'node:fs';
import type { Writable } from 'node:stream';

export type { Logger } from 'winston';

/** Timestamp layout shared by log lines and the rotation notice */
export const LOG_TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

// Flushing a logger never waits longer than this for its transports
const CLOSE_TIMEOUT_MS = 5000;

const pad = (n: number, width = 2): string => n.toString().padStart(width, '0');

/**
 * Formats a date the same way log lines are stamped (local time).
 */
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

const lineFormat = winston.format.printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}] ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

export interface RunLoggerOptions {
  level: string;
  /** Destination of the run log (usually from `openRunLogSink`) */
  sink?: Writable;
  /** Also echo log lines to the console */
  console?: boolean;
}

/**
 * Creates the logger a run writes its progress to.
 */
export function createRunLogger(options: RunLoggerOptions): Logger {
  const transports = [
    ...(options.sink ? [new winston.transports.Stream({ stream: options.sink, format: lineFormat })] : []),
    ...(options.console
      ? [
          new winston.transports.Console({
            format: winston.format.combine(winston.format.colorize({ all: true }), lineFormat),
          }),
        ]
      : []),
  ];

  return winston.createLogger({
    level: options.level,
    format: winston.format.combine(
      winston.format.timestamp({ format: LOG_TIMESTAMP_FORMAT }),
      winston.format.errors({ stack: true })
    ),
    silent: transports.length === 0,
    transports,
  });
}

/**
 * Logger for the pre-lock phase of the CLI, which only talks to the console.
 */
export function createConsoleLogger(level = 'info'): Logger {
  return createRunLogger({ level, console: true });
}

/**
 * Logger that drops everything.
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({ silent: true });
}

/**
 * Opens the run log for appending.
 */
export function openRunLogSink(logPath: string): Writable {
  return createWriteStream(logPath, { flags: 'a', encoding: 'utf-8' });
}

/**
 * Flushes every transport of `logger` and closes `sink`.
 *
 * Must be awaited before the process exits, otherwise trailing lines (the
 * run footer in particular) can be lost.
 */
export async function closeRunLogger(logger: Logger, sink?: Writable): Promise<void> {
  const drained = Promise.all(
    logger.transports.map(
      (transport) => new Promise<void>((resolve) => transport.once('finish', () => resolve()))
    )
  );

  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, CLOSE_TIMEOUT_MS);
    timer.unref();
  });

  logger.end();
  await Promise.race([drained, timedOut]);
  clearTimeout(timer);

  if (sink && !sink.destroyed) {
    await new Promise<void>((resolve, reject) => {
      sink.once('error', reject);
      sink.once('close', () => resolve());
      sink.end();
    });
  }
}

/**
 * Extracts a loggable message from an unknown error value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
