/**
 * @readycheck/shared - Constants
 * Re-export all constants
 */

export {
  DEFAULT_BUDGET,
  DEFAULT_HEALTH_PATH,
  DEFAULT_HOST,
  DEFAULT_LOG_TAIL_LINES,
  MAX_LOG_TAIL_LINES,
  MAX_BODY_CHARS,
  RUNTIME_QUERY_TIMEOUT_MS,
  EXIT_CODES,
  type ExitCode,
} from './defaults.js';

export { getVersion } from './version.js';
