/**
 * Time window filter.
 *
 * A window is a half-open time-of-day interval `[start, end)` on a single day.
 * A clip qualifies when its capture time-of-day falls inside any configured
 * window; the date part of the capture timestamp is ignored.
 */

import type { EmptyWindowsPolicy, TimeWindowConfig } from '../types/config.js';
import type { LocalDateTime } from '../types/clip.js';

const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;
const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * A window compiled to seconds since midnight.
 */
export interface TimeWindow {
  /** Original "start-end" text, for log lines */
  label: string;
  start: number;
  end: number;
}

/**
 * Error thrown for a malformed or empty time window.
 */
export class TimeWindowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeWindowError';
  }
}

/**
 * Parses "HH:MM" or "HH:MM:SS" into seconds since midnight.
 *
 * "24:00" is accepted and denotes the end of the day.
 *
 * @returns null if the text is not a valid time of day
 */
export function parseTimeOfDay(text: string): number | null {
  const match = TIME_PATTERN.exec(text);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (minutes > 59 || seconds > 59) return null;
  const total = hours * 3600 + minutes * 60 + seconds;
  return total <= SECONDS_PER_DAY ? total : null;
}

/**
 * Compiles configured windows, preserving their order.
 *
 * @throws {TimeWindowError} If a bound is malformed or a window is empty or
 * wraps past midnight
 */
export function compileWindows(windows: readonly TimeWindowConfig[]): TimeWindow[] {
  return windows.map((window, index) => {
    const start = parseTimeOfDay(window.start);
    const end = parseTimeOfDay(window.end);
    if (start === null || start === SECONDS_PER_DAY) {
      throw new TimeWindowError(`windows[${index}].start is not a valid time of day: "${window.start}"`);
    }
    if (end === null) {
      throw new TimeWindowError(`windows[${index}].end is not a valid time of day: "${window.end}"`);
    }
    if (start >= end) {
      throw new TimeWindowError(
        `windows[${index}] must end after it starts on the same day (got ${window.start}-${window.end})`
      );
    }
    return { label: `${window.start}-${window.end}`, start, end };
  });
}

/**
 * Seconds since midnight of a capture timestamp.
 */
export function secondsOfDay(timestamp: LocalDateTime): number {
  return timestamp.hour * 3600 + timestamp.minute * 60 + timestamp.second;
}

export function isWithinWindow(timestamp: LocalDateTime, window: TimeWindow): boolean {
  const seconds = secondsOfDay(timestamp);
  return window.start <= seconds && seconds < window.end;
}

/**
 * Whether a timestamp falls inside any window. With no windows the result is
 * decided by `emptyPolicy`.
 */
export function matchesAnyWindow(
  timestamp: LocalDateTime,
  windows: readonly TimeWindow[],
  emptyPolicy: EmptyWindowsPolicy
): boolean {
  if (windows.length === 0) {
    return emptyPolicy === 'match_all';
  }
  return windows.some((window) => isWithinWindow(timestamp, window));
}

/**
 * Selects the clips that fall inside the configured windows.
 *
 * Clips are returned grouped by window in configuration order, keeping the
 * listing's order inside each window. A clip inside several windows is
 * returned once, under the first of them.
 */
export function filterByWindows<T extends { capturedAt: LocalDateTime }>(
  clips: readonly T[],
  windows: readonly TimeWindow[],
  emptyPolicy: EmptyWindowsPolicy
): T[] {
  if (windows.length === 0) {
    return emptyPolicy === 'match_all' ? [...clips] : [];
  }

  const selected: T[] = [];
  const taken = new Set<T>();
  for (const window of windows) {
    for (const clip of clips) {
      if (!taken.has(clip) && isWithinWindow(clip.capturedAt, window)) {
        taken.add(clip);
        selected.push(clip);
      }
    }
  }
  return selected;
}
