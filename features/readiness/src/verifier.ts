/**
 * ReadinessVerifier - bounded readiness polling for one container
 *
 * Flow per attempt:
 * 1. liveness (container running?) -> 2. readiness (GET health path)
 * -> healthy: return Success at once
 * -> otherwise: last attempt? collect diagnostics, return Failure
 *               else wait delayMs and try again
 *
 * Liveness and readiness failures consume the same attempt counter.
 * Targets without a port stop after step 1: running is ready.
 * Nothing thrown by the runtime or the probe escapes; the caller only
 * ever sees the VerificationResult.
 */

import type {
  AttemptBudget,
  AttemptBudgetInput,
  AttemptOutcome,
  ContainerRuntime,
  LoggerLike,
  ProbeTarget,
  VerificationCancelled,
  VerificationResult,
} from '@readycheck/shared';
import { errorMessage, parseAttemptBudget } from '@readycheck/shared';
import { DiagnosticCollector } from './diagnostics.js';
import { describeOutcome, describeTarget } from './describe.js';
import { HttpProbe } from './http-probe.js';
import { LivenessCheck } from './liveness.js';
import { sleep as defaultSleep } from './sleep.js';
import type { ReadinessProbe, Sleep } from './types.js';

export interface ReadinessVerifierDeps {
  runtime: ContainerRuntime;
  logger?: LoggerLike;
  probe?: ReadinessProbe;
  sleep?: Sleep;
  now?: () => number;
  /** Lines of container output kept in the failure bundle */
  logTailLines?: number;
}

export interface VerifyOptions {
  /** External cancellation, e.g. an overall deadline */
  signal?: AbortSignal;
}

const silentLogger: LoggerLike = {
  info: () => undefined,
  error: () => undefined,
  warn: () => undefined,
  debug: () => undefined,
};

export class ReadinessVerifier {
  private readonly runtime: ContainerRuntime;
  private readonly liveness: LivenessCheck;
  private readonly probe: ReadinessProbe;
  private readonly logger: LoggerLike;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly logTailLines?: number;

  constructor(deps: ReadinessVerifierDeps) {
    this.runtime = deps.runtime;
    this.liveness = new LivenessCheck(deps.runtime);
    this.probe = deps.probe ?? new HttpProbe();
    this.logger = deps.logger ?? silentLogger;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.logTailLines = deps.logTailLines;
  }

  async verify(
    target: ProbeTarget,
    budgetInput: AttemptBudgetInput,
    options: VerifyOptions = {},
  ): Promise<VerificationResult> {
    const budget = parseAttemptBudget(budgetInput);
    const { signal } = options;
    const startTime = this.now();
    const attempts: AttemptOutcome[] = [];
    const elapsed = () => this.now() - startTime;

    this.logger.debug('Verifying readiness', {
      container: target.name,
      check: describeTarget(target),
      budget,
    });

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        return this.cancelled(target, attempts, elapsed(), signal);
      }

      const outcome = await this.runAttempt(attempt, target, budget, signal);

      if (outcome.kind === 'healthy' || outcome.kind === 'running') {
        attempts.push(outcome);
        const response = outcome.kind === 'healthy' ? outcome.response : null;
        this.logger.info('Service is ready', {
          container: target.name,
          attempt,
          statusCode: response?.statusCode,
        });
        return {
          status: 'success',
          target,
          attempts,
          durationMs: elapsed(),
          response,
        };
      }

      // An attempt interrupted by cancellation is not evidence
      if (signal?.aborted) {
        return this.cancelled(target, attempts, elapsed(), signal);
      }

      attempts.push(outcome);
      this.logger.debug(`Attempt ${attempt}/${budget.maxAttempts}: ${describeOutcome(outcome)}`, {
        container: target.name,
        outcome: outcome.kind,
      });

      if (attempt >= budget.maxAttempts) {
        const collector = new DiagnosticCollector(this.runtime, {
          logTailLines: this.logTailLines,
          probeTimeoutMs: budget.probeTimeoutMs,
        });
        const diagnostics = await collector.collect({ target, attempts, signal });

        this.logger.warn('Service failed to become ready', {
          container: target.name,
          attempts: attempts.length,
          last: outcome.kind,
        });
        return {
          status: 'failure',
          target,
          attempts,
          durationMs: elapsed(),
          diagnostics,
        };
      }

      await this.sleep(budget.delayMs, signal);
    }
  }

  private async runAttempt(
    attempt: number,
    target: ProbeTarget,
    budget: AttemptBudget,
    signal?: AbortSignal,
  ): Promise<AttemptOutcome> {
    const live = await this.liveness.check(target.name, signal);

    switch (live.kind) {
      case 'runtime_query_failed':
        return { attempt, kind: 'runtime_query_failed', reason: live.reason };
      case 'not_running':
        return { attempt, kind: 'not_running', state: live.state };
      case 'running':
        if (target.check === 'liveness') {
          return { attempt, kind: 'running', state: live.state };
        }
        break;
    }

    try {
      const ready = await this.probe.probe(target, budget.probeTimeoutMs, signal);
      return { attempt, ...ready };
    } catch (error) {
      return { attempt, kind: 'unreachable', reason: errorMessage(error), durationMs: 0 };
    }
  }

  private cancelled(
    target: ProbeTarget,
    attempts: AttemptOutcome[],
    durationMs: number,
    signal: AbortSignal,
  ): VerificationCancelled {
    const reason = cancellationReason(signal);
    this.logger.warn('Verification cancelled', {
      container: target.name,
      attempts: attempts.length,
      reason,
    });
    return { status: 'cancelled', target, attempts, durationMs, reason };
  }
}

function cancellationReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (typeof reason === 'string') return reason;
  if (typeof reason === 'object' && reason !== null && 'message' in reason) return errorMessage(reason);
  return 'cancelled';
}
