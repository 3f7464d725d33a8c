/**
 * One clipcourier run, from lock acquisition to lock release.
 *
 * Order of events:
 * 1. acquire the run lock (a live holder ends the run before any other I/O)
 * 2. clear or rotate the run log and open the run logger
 * 3. supervise the pipeline under the run deadline
 * 4. finalize regardless of outcome: index refresh, notification, footer
 * 5. give an aborted pipeline a short grace period to return
 * 6. flush the log and release the lock
 */

import { withRunLock } from '../lib/lock.js';
import type { LockOptions } from '../lib/lock.js';
import { prepareRunLog } from '../lib/logfile.js';
import {
  closeRunLogger,
  createRunLogger,
  createSilentLogger,
  errorMessage,
  openRunLogSink,
} from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { DeliveryLedger } from '../lib/ledger.js';
import { compileWindows } from '../lib/windows.js';
import { countDays } from '../lib/dates.js';
import { notifySafely } from '../lib/telegram.js';
import { PRODUCT_NAME } from '../lib/branding.js';
import { runPipeline } from './pipeline.js';
import { superviseRun } from './supervisor.js';
import type { RunServices, RunServicesFactory } from './services.js';
import { EXIT_FAILURE, createRunSummary } from '../types/run.js';
import type { DateRange, RunOutcome, RunSummary } from '../types/run.js';
import type { ClipCourierConfig } from '../types/config.js';
import type { LockAcquisition, LockEnvironment } from '../types/lock.js';

/** How long a run waits for an aborted pipeline to return before closing its log */
const UNWIND_GRACE_MS = 5000;

export interface RunRequest {
  config: ClipCourierConfig;
  range: DateRange;
  /** Local calendar date the run started on */
  today: string;
  createServices: RunServicesFactory;
  /** Aborts the run (SIGINT/SIGTERM) */
  signal?: AbortSignal;
  /** Receives lock messages, which happen before the run log exists */
  consoleLogger?: Logger;
  lockEnv?: LockEnvironment;
}

export interface RunReport {
  outcome: RunOutcome;
  exitCode: number;
  summary: RunSummary;
}

export function describeRange(range: DateRange): string {
  return range.start === range.end ? range.start : `${range.start} to ${range.end}`;
}

/**
 * Text of the end-of-run notification.
 */
export function formatRunNotification(
  outcome: RunOutcome,
  summary: RunSummary,
  range: DateRange,
  timeoutSeconds: number
): string {
  const counts =
    `${summary.uploaded} delivered, ${summary.skipped} skipped, ${summary.failed} failed` +
    (summary.listing_failures.length > 0 ? `, listing failed for ${summary.listing_failures.join(', ')}` : '');
  switch (outcome.kind) {
    case 'success':
      return `${PRODUCT_NAME} run for ${describeRange(range)} completed successfully: ${counts}`;
    case 'timed_out':
      return `${PRODUCT_NAME} run for ${describeRange(range)} timed out after ${timeoutSeconds} seconds: ${counts}`;
    case 'failed':
      return `${PRODUCT_NAME} run for ${describeRange(range)} failed with exit code ${outcome.exitCode}: ${counts}`;
  }
}

async function awaitUnwind(settled: Promise<void>, logger: Logger): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), UNWIND_GRACE_MS);
    timer.unref();
  });
  const unwound = await Promise.race([settled.then(() => true), expired]);
  clearTimeout(timer);
  if (!unwound) {
    logger.warn(`Pipeline still running ${UNWIND_GRACE_MS / 1000}s after the run ended; closing the run log`);
  }
}

async function finalizeRun(
  config: ClipCourierConfig,
  services: RunServices,
  report: RunReport,
  range: DateRange,
  logger: Logger
): Promise<void> {
  if (services.indexRefresher && config.index_refresh) {
    logger.info('=== Triggering index refresh ===');
    try {
      await services.indexRefresher.refresh(config.index_refresh.scope);
      logger.info('Index refresh completed');
    } catch (error) {
      logger.error(`Index refresh failed: ${errorMessage(error)}`);
    }
  }

  await notifySafely(
    services.notifier,
    formatRunNotification(report.outcome, report.summary, range, config.run.timeout_seconds),
    logger
  );

  try {
    await services.dispose();
  } catch (error) {
    logger.warn(`Failed to release external services: ${errorMessage(error)}`);
  }
}

/**
 * Executes one run.
 *
 * @throws {LockHeldError} If another live run holds the lock; nothing else
 * has been touched in that case
 * @throws {AtomicFsError} If the lock file cannot be created
 */
export async function executeRun(request: RunRequest): Promise<RunReport> {
  const { config } = request;
  const lockOptions: LockOptions = {
    staleAfterMs: config.run.stale_after_seconds * 1000,
    ...(request.lockEnv && { env: request.lockEnv }),
    ...(request.consoleLogger && { logger: request.consoleLogger }),
  };
  return withRunLock(config.run.lockfile, lockOptions, (acquisition) => runLocked(request, acquisition));
}

async function runLocked(request: RunRequest, acquisition: LockAcquisition): Promise<RunReport> {
  const { config, range } = request;

  let logger: Logger = createSilentLogger();
  let sink: ReturnType<typeof openRunLogSink> | undefined;

  try {
    await prepareRunLog(config.log.file, { mode: config.log.mode, maxBytes: config.log.max_bytes });
    sink = openRunLogSink(config.log.file);
    logger = createRunLogger({ level: config.log.level, sink, console: config.log.console });

    logger.info('=== Run started ===');
    logger.info(`Processing ${countDays(range)} day(s): ${describeRange(range)}`, { pid: acquisition.lock.pid });
    if (acquisition.reclaimed) {
      logger.warn('Reclaimed a stale run lock', { ...acquisition.reclaimed });
    }

    const summary = createRunSummary();
    let services: RunServices;
    try {
      services = request.createServices(config, logger);
    } catch (error) {
      logger.error(`Failed to set up external services: ${errorMessage(error)}`);
      logger.error(`=== Run exited with code ${EXIT_FAILURE} ===`);
      logger.info('=== Run ended ===');
      return { outcome: { kind: 'failed', exitCode: EXIT_FAILURE }, exitCode: EXIT_FAILURE, summary };
    }

    await notifySafely(services.notifier, `${PRODUCT_NAME} run started for ${describeRange(range)}`, logger);

    const windows = compileWindows(config.windows);
    const supervised = await superviseRun(
      async (signal) => {
        const ledger = await DeliveryLedger.open(config.pipeline.ledger_file);
        return runPipeline({
          config,
          windows,
          range,
          today: request.today,
          services: { ...services, ledger },
          logger,
          signal,
          summary,
        });
      },
      {
        timeoutSeconds: config.run.timeout_seconds,
        logger,
        ...(request.signal && { signal: request.signal }),
      }
    );

    const report: RunReport = { outcome: supervised.outcome, exitCode: supervised.exitCode, summary };
    await finalizeRun(config, services, report, range, logger);
    await awaitUnwind(supervised.settled, logger);
    logger.info('=== Run ended ===');
    return report;
  } finally {
    await closeRunLogger(logger, sink);
  }
}
