/**
 * External command runner.
 *
 * Spawns a command with a timeout and optional AbortSignal, escalating from
 * SIGTERM to SIGKILL when the child does not exit.
 */

import { spawn, ChildProcess } from 'node:child_process';
import { abortReason } from './retry.js';

/** Grace period between SIGTERM and SIGKILL */
const KILL_GRACE_MS = 1000;

/** Exit code reported for a command that ran out of time */
export const COMMAND_TIMEOUT_EXIT_CODE = 124;

export interface CommandOptions {
  /** Timeout in milliseconds; 0 disables it */
  timeoutMs: number;
  signal?: AbortSignal;
  cwd?: string;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * Error thrown when a command cannot be spawned, exits non-zero or times out.
 */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number,
    public readonly stderr?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

/**
 * Runs `command` with `args` and resolves once it exits with code 0.
 *
 * @throws {CommandError} On spawn failure, non-zero exit (exitCode carries the
 * child's code) or timeout (exitCode 124)
 * @throws {InterruptedError} If `options.signal` is aborted
 */
export function runExternalCommand(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
  // Short-circuit if already aborted
  if (options.signal?.aborted) {
    return Promise.reject(abortReason(options.signal));
  }

  const startTime = Date.now();
  const display = [command, ...args].join(' ');

  return new Promise<CommandResult>((resolve, reject) => {
    let stdout = '';
    let stderr = '';
    let timeoutId: NodeJS.Timeout | null = null;
    let killTimerId: NodeJS.Timeout | null = null;
    let abortHandler: (() => void) | null = null;
    let settled = false;
    let exited = false;

    const child: ChildProcess = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      ...(options.cwd && { cwd: options.cwd }),
    });

    const cleanup = () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
        timeoutId = null;
      }
      if (abortHandler && options.signal) {
        options.signal.removeEventListener('abort', abortHandler);
        abortHandler = null;
      }
    };

    const terminate = () => {
      child.kill('SIGTERM');
      killTimerId = setTimeout(() => {
        if (!exited) child.kill('SIGKILL');
      }, KILL_GRACE_MS);
    };

    const fail = (error: Error) => {
      if (settled) return;
      settled = true;
      cleanup();
      reject(error);
    };

    child.on('exit', () => {
      exited = true;
      if (killTimerId) {
        clearTimeout(killTimerId);
        killTimerId = null;
      }
    });

    if (options.signal) {
      const signal = options.signal;
      abortHandler = () => {
        fail(abortReason(signal));
        terminate();
      };
      signal.addEventListener('abort', abortHandler, { once: true });
    }

    if (options.timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        fail(
          new CommandError(
            `Command timed out after ${options.timeoutMs}ms: ${display}`,
            COMMAND_TIMEOUT_EXIT_CODE,
            stderr
          )
        );
        terminate();
      }, options.timeoutMs);
    }

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null, signalName: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      cleanup();

      const exitCode = code ?? 1;
      if (exitCode !== 0) {
        const how = code === null ? `was killed by ${signalName ?? 'a signal'}` : `exited with code ${code}`;
        reject(new CommandError(`Command ${how}: ${display}\n${stderr.trim()}`.trim(), exitCode, stderr));
        return;
      }
      resolve({ exitCode, stdout, stderr, durationMs: Date.now() - startTime });
    });

    child.on('error', (error: Error) => {
      fail(new CommandError(`Failed to spawn ${command}: ${error.message}`, 1, stderr, error));
    });
  });
}
