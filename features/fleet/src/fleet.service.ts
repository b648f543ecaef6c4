/**
 * FleetService - verify services deployed together
 *
 * Every target gets its own ReadinessVerifier run: own attempt counter,
 * own diagnostics. Runs proceed concurrently and share nothing.
 */

import type { AttemptBudget, LoggerLike, ProbeTarget, VerificationResult } from '@readycheck/shared';
import type { ReadinessVerifier } from '@readycheck/readiness';

export type FleetStatus = 'success' | 'failure' | 'cancelled';

export interface FleetReport {
  status: FleetStatus;
  healthy: number;
  total: number;
  results: VerificationResult[];
  durationMs: number;
}

export class FleetService {
  constructor(
    private readonly createVerifier: () => ReadinessVerifier,
    private readonly logger: LoggerLike,
  ) {}

  async verifyAll(
    targets: ProbeTarget[],
    budget: AttemptBudget,
    options: { signal?: AbortSignal } = {},
  ): Promise<FleetReport> {
    const startTime = Date.now();

    this.logger.info('Verifying fleet', {
      services: targets.map((t) => t.name),
      budget,
    });

    const results = await Promise.all(
      targets.map((target) => this.createVerifier().verify(target, budget, options)),
    );

    const report = summarize(results, Date.now() - startTime);
    const log = report.status === 'success' ? this.logger.info : this.logger.warn;
    log.call(this.logger, `Fleet status: ${report.healthy}/${report.total} services healthy`, {
      status: report.status,
    });

    return report;
  }
}

/** Any cancelled run makes the fleet cancelled; otherwise all must succeed */
export function summarize(results: VerificationResult[], durationMs: number): FleetReport {
  const healthy = results.filter((r) => r.status === 'success').length;
  const status: FleetStatus = results.some((r) => r.status === 'cancelled')
    ? 'cancelled'
    : healthy === results.length
      ? 'success'
      : 'failure';

  return { status, healthy, total: results.length, results, durationMs };
}
