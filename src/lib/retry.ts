/**
 * Abort-aware sleeping and retrying.
 *
 * A run is cancelled through a single AbortSignal whose reason is an
 * InterruptedError. Cancellation is never retried.
 */

import { InterruptedError, isInterruptedError } from '../types/run.js';

/**
 * The InterruptedError a signal was aborted with.
 */
export function abortReason(signal: AbortSignal): InterruptedError {
  const reason: unknown = signal.reason;
  return isInterruptedError(reason) ? reason : new InterruptedError('SIGTERM', 'Run aborted');
}

/**
 * Throws the signal's InterruptedError if it has been aborted.
 */
export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw abortReason(signal);
  }
}

/** Longest delay a single Node timer accepts; longer ones fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Calls `callback` after `ms`, chaining timers for delays past
 * MAX_TIMER_DELAY_MS. Returns a function that cancels the pending call.
 */
export function scheduleAfter(ms: number, callback: () => void): () => void {
  let timer: NodeJS.Timeout | undefined;
  const arm = (remaining: number) => {
    timer = setTimeout(() => {
      if (remaining > MAX_TIMER_DELAY_MS) {
        arm(remaining - MAX_TIMER_DELAY_MS);
      } else {
        callback();
      }
    }, Math.min(remaining, MAX_TIMER_DELAY_MS));
  };
  arm(ms);
  return () => clearTimeout(timer);
}

/**
 * Resolves after `ms`, or rejects with the abort reason as soon as `signal`
 * is aborted.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.reject(abortReason(signal));
  }
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      cancel();
      reject(abortReason(signal));
    };
    const cancel = scheduleAfter(ms, () => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    });
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions {
  /** Total attempts, including the first */
  attempts: number;
  delayMs: number;
  signal: AbortSignal;
  /** Called before waiting for the next attempt */
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Runs `operation` until it succeeds or `attempts` runs have failed, waiting
 * `delayMs` between attempts. The last error is rethrown. An abort, either
 * observed on the signal or thrown by `operation`, ends retrying immediately.
 */
export async function withRetries<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await operation(attempt);
    } catch (error) {
      if (isInterruptedError(error) || options.signal.aborted) {
        throw options.signal.aborted ? abortReason(options.signal) : error;
      }
      lastError = error;
      if (attempt < attempts) {
        options.onRetry?.(error, attempt);
        await sleep(options.delayMs, options.signal);
      }
    }
  }

  throw lastError;
}
