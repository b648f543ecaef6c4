/**
 * @readycheck/shared - Container Runtime Types
 */

import type { ExecOptions, ExecResult } from './exec.js';

export type ContainerStatus =
  | 'created'
  | 'running'
  | 'paused'
  | 'restarting'
  | 'removing'
  | 'exited'
  | 'dead';

export interface ContainerNetwork {
  name: string;
  ipAddress: string | null;
}

/** Typed subset of `docker inspect`: `.State`, `.RestartCount` and attached networks */
export interface ContainerState {
  status: ContainerStatus;
  running: boolean;
  restarting: boolean;
  oomKilled: boolean;
  exitCode: number;
  error: string | null;
  health: string | null;
  startedAt: string | null;
  finishedAt: string | null;
  restartCount: number;
  networks: ContainerNetwork[];
}

export type RuntimeQueryOptions = Pick<ExecOptions, 'signal'>;

/**
 * Read-only queries against the container runtime.
 * Implementations throw `RuntimeQueryError` when the runtime cannot be asked.
 */
export interface ContainerRuntime {
  /** Resolves `null` when no container has that name. */
  inspect(name: string, options?: RuntimeQueryOptions): Promise<ContainerState | null>;
  logs(name: string, tail: number, options?: RuntimeQueryOptions): Promise<string>;
  /** Runs an HTTP GET of `url` from inside the container's network namespace. */
  execHttpProbe(
    name: string,
    url: string,
    timeoutMs: number,
    options?: RuntimeQueryOptions,
  ): Promise<ExecResult>;
}
