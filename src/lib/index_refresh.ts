/**
 * Index refresh hook.
 *
 * After clips are delivered, the storage indexer (for example a file server's
 * `occ files:scan`) is asked to pick them up. The command is configured as an
 * argv array; any "{scope}" in it is replaced with the configured scope.
 */

import { runExternalCommand } from './process.js';
import type { IndexRefreshConfig } from '../types/config.js';
import type { IndexRefresher } from '../types/services.js';

export const SCOPE_PLACEHOLDER = '{scope}';

/**
 * Substitutes the scope into every argument of the command.
 */
export function buildRefreshArgv(command: readonly string[], scope: string): string[] {
  return command.map((arg) => arg.split(SCOPE_PLACEHOLDER).join(scope));
}

export class CommandIndexRefresher implements IndexRefresher {
  constructor(private readonly config: Pick<IndexRefreshConfig, 'command' | 'timeout_seconds'>) {}

  async refresh(scope: string): Promise<void> {
    const [executable, ...args] = buildRefreshArgv(this.config.command, scope);
    if (!executable) {
      throw new Error('Index refresh command is empty');
    }
    await runExternalCommand(executable, args, { timeoutMs: this.config.timeout_seconds * 1000 });
  }
}

