/**
 * @readycheck/cli - Option parsers and shared option sets
 */

import { Command, InvalidArgumentError } from 'commander';
import { MAX_LOG_TAIL_LINES } from '@readycheck/shared';

// ============================================================================
// Parsers
// ============================================================================

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

export function parsePort(value: string): number {
  const n = parsePositiveInt(value);
  if (n > 65535) {
    throw new InvalidArgumentError('Must be a port between 1 and 65535.');
  }
  return n;
}

/** Seconds (fractions allowed) to milliseconds */
export function parseSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError('Must be a non-negative number of seconds.');
  }
  return Math.round(n * 1000);
}

export function parseLogLines(value: string): number {
  const n = parsePositiveInt(value);
  if (n > MAX_LOG_TAIL_LINES) {
    throw new InvalidArgumentError(`Must be at most ${MAX_LOG_TAIL_LINES}.`);
  }
  return n;
}

// ============================================================================
// Shared Options
// ============================================================================

/** Budget, deadline, SSH and output options common to verify and fleet */
export function addCommonOptions(cmd: Command): Command {
  return cmd
    .option('-a, --max-attempts <n>', 'Maximum poll attempts (default 5)', parsePositiveInt)
    .option('-d, --delay <seconds>', 'Delay between attempts (default 5)', parseSeconds)
    .option('-t, --timeout <seconds>', 'HTTP probe timeout (default 3)', parseSeconds)
    .option('--log-lines <n>', 'Container log lines kept on failure (default 50)', parseLogLines)
    .option('--deadline <seconds>', 'Overall wall-clock limit; exceeding it cancels', parseSeconds)
    .option('--ssh-host <host>', 'Run docker queries on this host over SSH')
    .option('--ssh-user <user>', 'SSH username (default root)')
    .option('--ssh-port <port>', 'SSH port (default 22)', parsePort)
    .option('--ssh-key <path>', 'SSH private key (default ~/.ssh/id_rsa)')
    .option('-c, --config <path>', 'Config file (default ~/.readycheck/config.json)')
    .option('-j, --json', 'Print the result as JSON on stdout')
    .option('-v, --verbose', 'Debug logging on stderr')
    .option('--log-level <level>', 'error | warn | info | debug');
}
