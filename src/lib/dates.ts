/**
 * Calendar date helpers and the date range iterator.
 *
 * Dates are plain `YYYY-MM-DD` strings; they compare correctly as strings and
 * carry no time zone. Day arithmetic is done in UTC so DST changes on the host
 * never skip or repeat a day.
 */

import type { DateRange } from '../types/run.js';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Error thrown when the requested dates cannot form a valid range.
 */
export class InvalidArgumentsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentsError';
  }
}

const pad = (n: number, width = 2): string => n.toString().padStart(width, '0');

/**
 * Whether `value` is a real calendar date in `YYYY-MM-DD` form.
 */
export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Formats the local calendar date of `date`.
 */
export function toCalendarDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Formats numeric year/month/day as a calendar date.
 */
export function formatCalendarDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

function toUtcMs(date: string): number {
  const [year, month, day] = date.split('-').map(Number);
  return Date.UTC(year, month - 1, day);
}

/**
 * Returns the calendar date `days` after `date`.
 */
export function addDays(date: string, days: number): string {
  const next = new Date(toUtcMs(date) + days * MS_PER_DAY);
  return formatCalendarDate(next.getUTCFullYear(), next.getUTCMonth() + 1, next.getUTCDate());
}

/**
 * Builds the range of days a run processes.
 *
 * Either both bounds or neither must be given. Without bounds the range is
 * the single day `today`.
 *
 * @throws {InvalidArgumentsError} If only one bound is given, a bound is not a
 * valid date, or start is after end
 */
export function resolveDateRange(start: string | undefined, end: string | undefined, today: string): DateRange {
  if (start === undefined && end === undefined) {
    return { start: today, end: today };
  }
  if (start === undefined || end === undefined) {
    throw new InvalidArgumentsError('You must specify BOTH --start and --end to use date range mode.');
  }
  for (const [flag, value] of [['--start', start], ['--end', end]] as const) {
    if (!isCalendarDate(value)) {
      throw new InvalidArgumentsError(`${flag} must be a valid date in YYYY-MM-DD format (got "${value}")`);
    }
  }
  if (start > end) {
    throw new InvalidArgumentsError(`--start (${start}) must not be after --end (${end})`);
  }
  return { start, end };
}

/**
 * Ascending, inclusive sequence of the days in `range`.
 *
 * The returned iterable is lazy and can be iterated any number of times.
 */
export function iterateDays(range: DateRange): Iterable<string> {
  return {
    *[Symbol.iterator]() {
      for (let day = range.start; day <= range.end; day = addDays(day, 1)) {
        yield day;
      }
    },
  };
}

/**
 * Number of days in `range`.
 */
export function countDays(range: DateRange): number {
  return Math.round((toUtcMs(range.end) - toUtcMs(range.start)) / MS_PER_DAY) + 1;
}
