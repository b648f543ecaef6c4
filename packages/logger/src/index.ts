/**
 * @readycheck/logger - Structured Logging
 *
 * Features:
 * - Structured JSON logging with Winston
 * - Log levels: error, warn, info, debug
 * - File rotation (daily, size-limited) when a log directory is given
 * - Console output on stderr, pretty for terminals, JSON otherwise
 * - Sensitive data masking
 */

import type { LoggerLike } from '@readycheck/shared';
import { createLogger, type Logger } from 'winston';
import {
  createConsoleTransport,
  createErrorFileTransport,
  createCombinedFileTransport,
} from './transports.js';

// Re-export sanitizer
export { SENSITIVE_KEYS, maskEntry, maskSensitiveData } from './sanitizer.js';

// ============================================================================
// Logger Contract
// ============================================================================

export type { LoggerLike };
export type { Logger };

// ============================================================================
// Factory
// ============================================================================

export interface AppLoggerOptions {
  level?: string;
  /** Enables rotated combined/error log files in this directory */
  logDir?: string;
  /** Human-readable colored console output instead of JSON lines */
  pretty?: boolean;
  service?: string;
  version?: string;
  /** Drops all output; used by tests */
  silent?: boolean;
}

export function createAppLogger(options: AppLoggerOptions = {}): Logger {
  const {
    level = 'info',
    logDir,
    pretty = false,
    service = 'readycheck',
    version,
    silent = false,
  } = options;

  const logger = createLogger({
    level,
    silent,
    defaultMeta: { service },
    transports: [createConsoleTransport(pretty, service, version)],
  });

  if (logDir) {
    logger.add(createErrorFileTransport(logDir, service, version));
    logger.add(createCombinedFileTransport(logDir, service, version));
  }

  return logger;
}

/** Logger that discards everything */
export const noopLogger: LoggerLike = {
  info: () => undefined,
  error: () => undefined,
  warn: () => undefined,
  debug: () => undefined,
};
