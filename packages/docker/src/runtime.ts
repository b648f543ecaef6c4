/**
 * @readycheck/docker - Docker Runtime
 *
 * Read-only container queries executed through a CommandExecutor,
 * locally or on the deployment host over SSH. State comes from
 * `docker inspect` JSON, parsed and validated, never from grepping
 * `docker ps` output.
 */

import type {
  CommandExecutor,
  ContainerRuntime,
  ContainerState,
  ExecResult,
  RuntimeQueryOptions,
} from '@readycheck/shared';
import { RUNTIME_QUERY_TIMEOUT_MS, RuntimeQueryError, errorMessage } from '@readycheck/shared';
import { shellQuote } from '@readycheck/ssh';
import { dockerInspectSchema, toContainerState } from './state.js';

const NOT_FOUND = /no such (container|object)/i;

export interface DockerRuntimeOptions {
  /** Timeout for each docker command */
  queryTimeoutMs?: number;
  /** docker binary, e.g. `podman` or `sudo docker` */
  binary?: string;
}

export class DockerRuntime implements ContainerRuntime {
  private readonly queryTimeoutMs: number;
  private readonly binary: string;

  constructor(
    private readonly executor: CommandExecutor,
    options: DockerRuntimeOptions = {},
  ) {
    this.queryTimeoutMs = options.queryTimeoutMs ?? RUNTIME_QUERY_TIMEOUT_MS;
    this.binary = options.binary ?? 'docker';
  }

  async inspect(name: string, options: RuntimeQueryOptions = {}): Promise<ContainerState | null> {
    const result = await this.run(
      `${this.binary} inspect --type container --format '{{json .}}' ${shellQuote(name)}`,
      options,
    );

    if (result.code !== 0) {
      if (NOT_FOUND.test(result.stderr)) return null;
      throw new RuntimeQueryError(`docker inspect failed: ${firstLine(result.stderr) || `exit ${result.code}`}`, {
        container: name,
        code: result.code,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout.trim());
    } catch (error) {
      throw new RuntimeQueryError(`docker inspect returned invalid JSON: ${errorMessage(error)}`, {
        container: name,
      });
    }

    const parsed = dockerInspectSchema.safeParse(json);
    if (!parsed.success) {
      throw new RuntimeQueryError(`docker inspect returned an unexpected state: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        container: name,
      });
    }

    return toContainerState(parsed.data);
  }

  async logs(name: string, tail: number, options: RuntimeQueryOptions = {}): Promise<string> {
    const lines = Math.max(1, Math.floor(tail));
    const result = await this.run(
      `${this.binary} logs --tail ${lines} ${shellQuote(name)} 2>&1`,
      options,
    );

    if (result.code !== 0) {
      throw new RuntimeQueryError(`docker logs failed: ${firstLine(result.stdout) || `exit ${result.code}`}`, {
        container: name,
        code: result.code,
      });
    }

    return result.stdout;
  }

  async execHttpProbe(
    name: string,
    url: string,
    timeoutMs: number,
    options: RuntimeQueryOptions = {},
  ): Promise<ExecResult> {
    const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    const target = shellQuote(url);
    // Images ship either busybox wget or curl
    const script =
      `wget -q -O - -T ${seconds} ${target} 2>&1 || curl -sS -f -m ${seconds} ${target} 2>&1`;

    return this.run(
      `${this.binary} exec ${shellQuote(name)} sh -c ${shellQuote(script)}`,
      options,
      timeoutMs + this.queryTimeoutMs,
    );
  }

  private async run(command: string, options: RuntimeQueryOptions, timeout = this.queryTimeoutMs): Promise<ExecResult> {
    try {
      return await this.executor.exec(command, { timeout, signal: options.signal });
    } catch (error) {
      throw new RuntimeQueryError(`Runtime query failed: ${errorMessage(error)}`, { command });
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function firstLine(text: string): string {
  return text.trim().split('\n')[0]?.trim() ?? '';
}
