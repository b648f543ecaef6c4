/**
 * @readycheck/shared - Command Execution Types
 */

// ============================================================================
// SSH Types
// ============================================================================

export interface SSHConfig {
  host: string;
  port: number;
  username: string;
  privateKeyPath?: string;
}

// ============================================================================
// Executor Contract
// ============================================================================

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
  duration: number;
}

export interface ExecOptions {
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * Runs a shell command somewhere: on this machine or on the deployment
 * host. A non-zero exit is reported through `code`, not thrown.
 */
export interface CommandExecutor {
  exec(command: string, options?: ExecOptions): Promise<ExecResult>;
}
