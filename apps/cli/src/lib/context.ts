/**
 * @readycheck/cli - Command context
 *
 * Everything a command touches outside its own logic: output streams,
 * environment, logger and container runtime factories. Tests swap these
 * for in-process fakes.
 */

import ora from 'ora';
import type { ContainerRuntime, ExitCode, SSHConfig, VerificationStatus } from '@readycheck/shared';
import { EXIT_CODES, getVersion } from '@readycheck/shared';
import { createAppLogger, type LoggerLike } from '@readycheck/logger';
import { createExecutor } from '@readycheck/ssh';
import { DockerRuntime } from '@readycheck/docker';
import type { ReadinessProbe, Sleep } from '@readycheck/readiness';
import type { Env, ResolvedSettings } from './config.js';
import { formatDuration } from './formatter.js';

// ============================================================================
// Types
// ============================================================================

export interface RuntimeHandle {
  runtime: ContainerRuntime;
  close(): void;
}

export interface Spinner {
  stop(): void;
}

export interface CommandContext {
  stdout(text: string): void;
  stderr(text: string): void;
  env: Env;
  /** Spinner and pretty logs allowed */
  interactive: boolean;
  createLogger(settings: ResolvedSettings): LoggerLike;
  openRuntime(ssh: SSHConfig | undefined): RuntimeHandle;
  probe?: ReadinessProbe;
  sleep?: Sleep;
}

// ============================================================================
// Default (process) Context
// ============================================================================

export function defaultContext(): CommandContext {
  const interactive = Boolean(process.stderr.isTTY);

  return {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    env: process.env,
    interactive,
    createLogger: (settings) =>
      createAppLogger({
        level: settings.logLevel,
        logDir: settings.logDir,
        pretty: interactive,
        version: getVersion(),
      }),
    openRuntime: (ssh) => {
      const { executor, close } = createExecutor(ssh);
      return { runtime: new DockerRuntime(executor), close };
    },
  };
}

// ============================================================================
// Helpers
// ============================================================================

const STATUS_EXIT_CODES: Record<VerificationStatus, ExitCode> = {
  success: EXIT_CODES.success,
  failure: EXIT_CODES.failure,
  cancelled: EXIT_CODES.cancelled,
};

export function exitCodeFor(status: VerificationStatus): ExitCode {
  return STATUS_EXIT_CODES[status];
}

export function startSpinner(ctx: CommandContext, text: string, json = false): Spinner | null {
  if (!ctx.interactive || json) return null;
  return ora({ text, stream: process.stderr }).start();
}

export interface Cancellation {
  signal: AbortSignal;
  dispose(): void;
}

/** Aborts on SIGINT, and after `deadlineMs` when given */
export function createCancellation(deadlineMs?: number): Cancellation {
  const controller = new AbortController();

  const timer = deadlineMs !== undefined
    ? setTimeout(() => {
        controller.abort(new Error(`deadline of ${formatDuration(deadlineMs)} exceeded`));
      }, deadlineMs)
    : undefined;

  const onSigint = () => controller.abort(new Error('interrupted'));
  process.once('SIGINT', onSigint);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      process.removeListener('SIGINT', onSigint);
    },
  };
}
