/**
 * Run outcome and summary type definitions.
 */

/** Exit code of a successful run */
export const EXIT_SUCCESS = 0;
/** Exit code for invalid arguments, configuration errors and lock contention */
export const EXIT_FAILURE = 1;
/** Standard timeout exit code */
export const EXIT_TIMEOUT = 124;
/** Exit code after SIGINT */
export const EXIT_SIGINT = 130;
/** Exit code after SIGTERM */
export const EXIT_SIGTERM = 143;

/**
 * Terminal classification of a run.
 */
export type RunOutcome =
  | { kind: 'success' }
  | { kind: 'timed_out' }
  | { kind: 'failed'; exitCode: number };

/**
 * Inclusive range of calendar dates (YYYY-MM-DD).
 */
export interface DateRange {
  start: string;
  end: string;
}

/**
 * Counters collected while a run processes its days.
 */
export interface RunSummary {
  days: number;
  listed: number;
  matched: number;
  downloaded: number;
  uploaded: number;
  deleted: number;
  skipped: number;
  failed: number;
  /** Days whose camera listing failed after all retries */
  listing_failures: string[];
}

export function createRunSummary(): RunSummary {
  return {
    days: 0,
    listed: 0,
    matched: 0,
    downloaded: 0,
    uploaded: 0,
    deleted: 0,
    skipped: 0,
    failed: 0,
    listing_failures: [],
  };
}

/**
 * What ended a run early.
 */
export type InterruptCause = 'timeout' | 'SIGINT' | 'SIGTERM';

/**
 * Error used as the abort reason when a run is cancelled, either by the
 * supervisor's deadline or by a termination signal.
 */
export class InterruptedError extends Error {
  constructor(
    public readonly kind: InterruptCause,
    message: string = `Run interrupted (${kind})`
  ) {
    super(message);
    this.name = 'InterruptedError';
  }

  /** Process exit code conventionally associated with the interrupt */
  get exitCode(): number {
    switch (this.kind) {
      case 'timeout':
        return EXIT_TIMEOUT;
      case 'SIGINT':
        return EXIT_SIGINT;
      case 'SIGTERM':
        return EXIT_SIGTERM;
    }
  }
}

/**
 * Type guard for InterruptedError.
 */
export function isInterruptedError(error: unknown): error is InterruptedError {
  return error instanceof InterruptedError;
}
