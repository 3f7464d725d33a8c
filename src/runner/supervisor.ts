/**
 * Run supervisor: bounds the pipeline with a wall-clock deadline and
 * classifies how it ended.
 *
 * The pipeline receives an AbortSignal that fires on the deadline or when the
 * caller's signal (SIGINT/SIGTERM) aborts. The supervisor does not wait for the
 * pipeline to unwind after an abort; the outcome is decided immediately.
 */

import { abortReason, scheduleAfter, throwIfAborted } from '../lib/retry.js';
import { CommandError } from '../lib/process.js';
import { errorMessage } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  EXIT_TIMEOUT,
  InterruptedError,
  isInterruptedError,
} from '../types/run.js';
import type { RunOutcome } from '../types/run.js';

export interface SupervisorOptions {
  timeoutSeconds: number;
  logger: Logger;
  /** Aborts the run from outside (termination signals) */
  signal?: AbortSignal;
}

export interface SupervisedRun<T> {
  outcome: RunOutcome;
  exitCode: number;
  /** Value the pipeline resolved with, null unless it succeeded */
  value: T | null;
  /** Error that ended the run, null on success */
  error: unknown;
  /** Resolves once the pipeline itself has returned or thrown */
  settled: Promise<void>;
}

/**
 * Maps a terminal exit code to a run outcome.
 */
export function classifyExitCode(exitCode: number): RunOutcome {
  if (exitCode === EXIT_SUCCESS) return { kind: 'success' };
  if (exitCode === EXIT_TIMEOUT) return { kind: 'timed_out' };
  return { kind: 'failed', exitCode };
}

/**
 * Exit code a run ends with when the pipeline throws `error`.
 *
 * Interrupts carry their conventional code, failed external commands
 * propagate theirs, everything else is 1.
 */
export function exitCodeFor(error: unknown): number {
  if (isInterruptedError(error)) return error.exitCode;
  if (error instanceof CommandError && error.exitCode !== EXIT_SUCCESS) return error.exitCode;
  return EXIT_FAILURE;
}

/**
 * The classification line written to the run log.
 */
export function classificationLine(outcome: RunOutcome, timeoutSeconds: number): string {
  switch (outcome.kind) {
    case 'success':
      return '=== Run completed successfully ===';
    case 'timed_out':
      return `=== Run timed out after ${timeoutSeconds} seconds ===`;
    case 'failed':
      return `=== Run exited with code ${outcome.exitCode} ===`;
  }
}

/**
 * Runs `body` under the deadline and logs the classification line.
 *
 * Never throws: every way `body` can end is turned into an outcome.
 */
export async function superviseRun<T>(
  body: (signal: AbortSignal) => Promise<T>,
  options: SupervisorOptions
): Promise<SupervisedRun<T>> {
  const { logger, timeoutSeconds } = options;
  const controller = new AbortController();

  const onExternalAbort = () => {
    if (options.signal) controller.abort(abortReason(options.signal));
  };
  options.signal?.addEventListener('abort', onExternalAbort, { once: true });
  if (options.signal?.aborted) onExternalAbort();

  let rejectAborted: (reason: unknown) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject;
  });
  const onAbort = () => rejectAborted(abortReason(controller.signal));
  controller.signal.addEventListener('abort', onAbort, { once: true });
  if (controller.signal.aborted) onAbort();
  // Rejections after the race is decided have nobody left to observe them
  aborted.catch(() => undefined);

  const cancelDeadline = scheduleAfter(timeoutSeconds * 1000, () => {
    controller.abort(new InterruptedError('timeout', `Run timed out after ${timeoutSeconds} seconds`));
  });

  logger.info(`=== Starting pipeline with ${timeoutSeconds}-second timeout ===`);

  let result: SupervisedRun<T>;
  let settled: Promise<void> = Promise.resolve();
  try {
    throwIfAborted(controller.signal);
    const running = body(controller.signal);
    settled = running.then(
      () => undefined,
      (error: unknown) => {
        if (controller.signal.aborted) {
          logger.debug(`Pipeline unwound after abort: ${errorMessage(error)}`);
        }
      }
    );
    const value = await Promise.race([running, aborted]);
    result = { outcome: { kind: 'success' }, exitCode: EXIT_SUCCESS, value, error: null, settled };
  } catch (error) {
    const exitCode = exitCodeFor(error);
    result = { outcome: classifyExitCode(exitCode), exitCode, value: null, error, settled };
    if (!isInterruptedError(error)) {
      logger.error(`Run failed: ${errorMessage(error)}`);
    } else if (error.kind !== 'timeout') {
      logger.warn(`Run interrupted by ${error.kind}`);
    }
  } finally {
    cancelDeadline();
    options.signal?.removeEventListener('abort', onExternalAbort);
    controller.signal.removeEventListener('abort', onAbort);
  }

  const line = classificationLine(result.outcome, timeoutSeconds);
  if (result.outcome.kind === 'success') {
    logger.info(line);
  } else {
    logger.error(line);
  }
  return result;
}
