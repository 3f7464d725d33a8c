/**
 * `clipcourier run`: validates arguments and configuration, then executes a
 * run under the run lock.
 *
 * Everything that can be rejected without I/O is rejected before the lock is
 * touched; those errors go to stderr because the run log is not open yet.
 */

import { loadConfig, resolveCredentials, withEnvironmentOverrides, ConfigError } from '../lib/config.js';
import { resolveDateRange, toCalendarDate, InvalidArgumentsError } from '../lib/dates.js';
import { LockHeldError } from '../lib/lock.js';
import { createConsoleLogger } from '../lib/logger.js';
import { executeRun } from '../runner/run.js';
import { productionServices } from '../runner/services.js';
import type { RunServicesFactory } from '../runner/services.js';
import { EXIT_FAILURE, EXIT_SIGINT, InterruptedError } from '../types/run.js';
import type { DateRange } from '../types/run.js';
import type { ClipCourierConfig, Credentials } from '../types/config.js';
import type { LockEnvironment } from '../types/lock.js';

export interface RunCommandOptions {
  configPath?: string;
  start?: string;
  end?: string;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  /** Overrides the real camera/storage/notifier wiring */
  createServices?: (credentials: Credentials) => RunServicesFactory;
  lockEnv?: LockEnvironment;
  /** Install SIGINT/SIGTERM handlers for the duration of the run */
  handleSignals?: boolean;
  /**
   * Ends the process with the exit code once the lock is released, so a
   * pipeline step that ignored the abort cannot outlive the run.
   */
  exit?: (code: number) => void;
}

/**
 * Runs the command and returns the process exit code.
 */
export async function runCommand(options: RunCommandOptions = {}): Promise<number> {
  const exitCode = await runUnderLock(options);
  options.exit?.(exitCode);
  return exitCode;
}

async function runUnderLock(options: RunCommandOptions): Promise<number> {
  const env = options.env ?? process.env;
  const now = options.now ?? (() => new Date());
  const today = toCalendarDate(now());

  let range: DateRange;
  let config: ClipCourierConfig;
  let credentials: Credentials;
  try {
    range = resolveDateRange(options.start, options.end, today);
    config = withEnvironmentOverrides((await loadConfig(options.configPath)).config, env);
    credentials = resolveCredentials(config, env);
  } catch (error) {
    if (error instanceof InvalidArgumentsError) {
      console.error(`Error: ${error.message}`);
      return EXIT_FAILURE;
    }
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  const abortController = new AbortController();
  let signalCount = 0;
  const signalHandler = (signal: 'SIGINT' | 'SIGTERM') => {
    signalCount++;
    if (signalCount === 1) {
      console.error(`\n${signal} received, aborting run...`);
      abortController.abort(new InterruptedError(signal));
    } else {
      console.error('\nForce exit');
      process.exit(EXIT_SIGINT);
    }
  };
  const sigintHandler = () => signalHandler('SIGINT');
  const sigtermHandler = () => signalHandler('SIGTERM');

  if (options.handleSignals) {
    process.on('SIGINT', sigintHandler);
    process.on('SIGTERM', sigtermHandler);
  }

  try {
    const report = await executeRun({
      config,
      range,
      today,
      createServices: (options.createServices ?? productionServices)(credentials),
      signal: abortController.signal,
      consoleLogger: createConsoleLogger(config.log.level),
      ...(options.lockEnv && { lockEnv: options.lockEnv }),
    });
    return report.exitCode;
  } catch (error) {
    if (error instanceof LockHeldError) {
      console.error(`${error.message}. Exiting.`);
      return EXIT_FAILURE;
    }
    throw error;
  } finally {
    if (options.handleSignals) {
      process.off('SIGINT', sigintHandler);
      process.off('SIGTERM', sigtermHandler);
    }
  }
}
