/**
 * @readycheck/logger - Winston Transports
 * Console (stderr) + rotated file transports
 */

import { format, transports } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { maskEntry } from './sanitizer.js';

// ============================================================================
// Custom Formats
// ============================================================================

const RESERVED_KEYS = new Set(['level', 'message', 'timestamp', 'service', 'version']);

/** Masks every meta field; winston's own keys pass through */
export const maskFormat = format((info) => {
  for (const key of Object.keys(info)) {
    if (RESERVED_KEYS.has(key)) continue;
    info[key] = maskEntry(key, info[key]);
  }
  return info;
});

const contextFormat = (service: string, version?: string) =>
  format((info) => {
    info.service = service;
    if (version) info.version = version;
    return info;
  })();

// ============================================================================
// Format Factories
// ============================================================================

export function jsonFormat(service: string, version?: string) {
  return format.combine(
    format.timestamp(),
    contextFormat(service, version),
    maskFormat(),
    format.json(),
  );
}

export const consoleFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  maskFormat(),
  format.colorize(),
  format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  }),
);

// ============================================================================
// Transport Factories
// ============================================================================

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Console transport. Every level goes to stderr so stdout stays reserved
 * for command results.
 */
export function createConsoleTransport(pretty: boolean, service: string, version?: string) {
  return new transports.Console({
    stderrLevels: ALL_LEVELS,
    format: pretty ? consoleFormat : jsonFormat(service, version),
  });
}

/** Error file transport with daily rotation (30-day retention) */
export function createErrorFileTransport(logDir: string, service: string, version?: string) {
  return new DailyRotateFile({
    filename: `${logDir}/error-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    level: 'error',
    maxFiles: '30d',
    maxSize: '20m',
    format: jsonFormat(service, version),
  });
}

/** Combined file transport with daily rotation (14-day retention) */
export function createCombinedFileTransport(logDir: string, service: string, version?: string) {
  return new DailyRotateFile({
    filename: `${logDir}/combined-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    maxFiles: '14d',
    maxSize: '50m',
    format: jsonFormat(service, version),
  });
}
