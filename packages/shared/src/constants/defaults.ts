/**
 * @readycheck/shared - Defaults
 */

import type { AttemptBudget } from '../types/readiness.js';

/** 5 attempts x 5s, probe gives up after 3s */
export const DEFAULT_BUDGET: Readonly<AttemptBudget> = Object.freeze({
  maxAttempts: 5,
  delayMs: 5000,
  probeTimeoutMs: 3000,
});

export const DEFAULT_HEALTH_PATH = '/health';
export const DEFAULT_HOST = 'localhost';

export const DEFAULT_LOG_TAIL_LINES = 50;
export const MAX_LOG_TAIL_LINES = 500;

/** Response bodies kept in outcomes and diagnostics are cut to this length */
export const MAX_BODY_CHARS = 2048;

export const RUNTIME_QUERY_TIMEOUT_MS = 10_000;

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  cancelled: 2,
  usage: 64,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
