/**
 * @readycheck/ssh - Command Executors
 *
 * Features:
 * - SSH connection pooling (max 5 per host)
 * - Auto-cleanup of idle connections
 * - Timeout and abort support
 * - Local shell executor with the same contract
 */

import type { CommandExecutor, SSHConfig } from '@readycheck/shared';
import { SSHConnectionPool } from './pool.js';
import { SSHExecutor } from './client.js';
import { LocalExecutor } from './local.js';

export { SSHConnectionPool, type PoolOptions } from './pool.js';
export { SSHExecutor } from './client.js';
export { LocalExecutor } from './local.js';
export { shellQuote } from './quote.js';

// ============================================================================
// Factory
// ============================================================================

export interface ExecutorHandle {
  executor: CommandExecutor;
  /** Releases connections; safe to call more than once */
  close(): void;
}

/**
 * SSH executor when an SSH config is given, local shell otherwise.
 */
export function createExecutor(ssh?: SSHConfig): ExecutorHandle {
  if (!ssh) {
    return { executor: new LocalExecutor(), close: () => undefined };
  }

  const { host, ...connection } = ssh;
  const pool = new SSHConnectionPool(connection);
  const executor = new SSHExecutor(pool, host);

  return {
    executor,
    close: () => {
      executor.disconnect();
      pool.destroy();
    },
  };
}
