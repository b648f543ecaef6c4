/**
 * @readycheck/cli - Output Formatters
 *
 * Format verification results for terminal output.
 */

import chalk from 'chalk';
import type { DiagnosticKind, VerificationResult } from '@readycheck/shared';
import { describeOutcome, describeTarget } from '@readycheck/readiness';
import type { FleetReport } from '@readycheck/fleet';

const DIAGNOSTIC_TITLES: Record<DiagnosticKind, string> = {
  process_status: 'process status',
  log_tail: 'log tail',
  network_probe: 'network probe',
};

// ============================================================================
// Single Result
// ============================================================================

/** Success: one line. Failure and cancellation: full report. */
export function formatResult(result: VerificationResult): string {
  const name = result.target.name;
  const attempts = plural(result.attempts.length, 'attempt');
  const took = formatDuration(result.durationMs);

  switch (result.status) {
    case 'success':
      if (result.target.check === 'http' && result.response) {
        return chalk.green(
          `[OK] ${name} ready: GET ${describeTarget(result.target)} -> ${result.response.statusCode} after ${attempts} (${took})`,
        );
      }
      return chalk.green(`[OK] ${name} running after ${attempts} (${took})`);

    case 'cancelled': {
      const lines = [chalk.yellow(`[!!] ${name} verification cancelled after ${attempts} (${took}): ${result.reason}`)];
      for (const outcome of result.attempts) {
        lines.push(chalk.gray(`  ${outcome.attempt}: ${describeOutcome(outcome)}`));
      }
      return lines.join('\n');
    }

    case 'failure': {
      const lines = [
        chalk.red.bold(`[XX] ${name} not ready after ${attempts} (${took})`),
        chalk.gray(`  target: ${describeTarget(result.target)}`),
      ];
      for (const entry of result.diagnostics) {
        lines.push('');
        lines.push(chalk.cyan(`-- ${DIAGNOSTIC_TITLES[entry.kind]} --`));
        lines.push(entry.available ? entry.content : chalk.yellow(entry.content));
      }
      return lines.join('\n');
    }
  }
}

// ============================================================================
// Fleet
// ============================================================================

export function formatFleetSummary(report: FleetReport): string {
  const text = `${report.healthy}/${report.total} services healthy (${formatDuration(report.durationMs)})`;
  switch (report.status) {
    case 'success':
      return chalk.green(`[OK] ${text}`);
    case 'cancelled':
      return chalk.yellow(`[!!] ${text}, verification cancelled`);
    case 'failure':
      return chalk.red.bold(`[XX] ${text}`);
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}
