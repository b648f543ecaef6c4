/**
 * @readycheck/shared - Error Classes
 * Structured error handling for readycheck
 */

import { EXIT_CODES, type ExitCode } from '../constants/defaults.js';

export class ReadyCheckError extends Error {
  public readonly code: string;
  public readonly exitCode: ExitCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: ExitCode = EXIT_CODES.failure,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ReadyCheckError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReadyCheckError);
    }
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      exitCode: this.exitCode,
      details: this.details,
    };
  }
}

export class ValidationError extends ReadyCheckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', EXIT_CODES.usage, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends ReadyCheckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', EXIT_CODES.usage, details);
    this.name = 'ConfigError';
  }
}

/** The container runtime could not be queried (as opposed to "not running") */
export class RuntimeQueryError extends ReadyCheckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RUNTIME_QUERY_FAILED', EXIT_CODES.failure, details);
    this.name = 'RuntimeQueryError';
  }
}

export class CommandTimeoutError extends ReadyCheckError {
  constructor(timeoutMs: number, details?: Record<string, unknown>) {
    super(`Command timed out after ${timeoutMs}ms`, 'COMMAND_TIMEOUT', EXIT_CODES.failure, {
      timeoutMs,
      ...details,
    });
    this.name = 'CommandTimeoutError';
  }
}

// Errors from fs, undici and child processes may come from another realm,
// where `instanceof Error` is false.

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/** `code` of a system error, e.g. `ENOENT` */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
