/**
 * @readycheck/shared - Logger Contract
 *
 * What library code depends on; a winston Logger satisfies it.
 */

export interface LoggerLike {
  info(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}
