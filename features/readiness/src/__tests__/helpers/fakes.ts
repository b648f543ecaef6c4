/**
 * In-process stand-ins for the container runtime, the HTTP probe and time
 */

import type {
  ContainerRuntime,
  ContainerState,
  ExecResult,
  HttpProbeTarget,
  LivenessProbeTarget,
  RuntimeQueryOptions,
} from '@readycheck/shared';
import type { ReadinessProbe, ReadinessResult, Sleep } from '../../types.js';

// ============================================================================
// Data Builders
// ============================================================================

export function runningState(overrides: Partial<ContainerState> = {}): ContainerState {
  return {
    status: 'running',
    running: true,
    restarting: false,
    oomKilled: false,
    exitCode: 0,
    error: null,
    health: null,
    startedAt: '2026-10-19T08:00:00Z',
    finishedAt: null,
    restartCount: 0,
    networks: [{ name: 'app-network', ipAddress: '172.18.0.5' }],
    ...overrides,
  };
}

export function exitedState(exitCode: number, overrides: Partial<ContainerState> = {}): ContainerState {
  return runningState({
    status: 'exited',
    running: false,
    exitCode,
    finishedAt: '2026-10-19T08:00:05Z',
    ...overrides,
  });
}

export function target(overrides: Partial<Omit<HttpProbeTarget, 'check'>> = {}): HttpProbeTarget {
  return {
    check: 'http',
    name: 'app-auth-service',
    host: '127.0.0.1',
    port: 3000,
    path: '/health',
    containerPort: 3000,
    ...overrides,
  };
}

export function livenessTarget(name = 'postgres'): LivenessProbeTarget {
  return { check: 'liveness', name };
}

export const healthy = (statusCode = 200, body = '{"status":"ok"}'): ReadinessResult => ({
  kind: 'healthy',
  response: { statusCode, body, durationMs: 5 },
});

export const unhealthy = (statusCode = 500, body = '{"status":"error"}'): ReadinessResult => ({
  kind: 'unhealthy',
  response: { statusCode, body, durationMs: 5 },
});

export const unreachable = (reason = 'ECONNREFUSED: connect ECONNREFUSED 127.0.0.1:3000'): ReadinessResult => ({
  kind: 'unreachable',
  reason,
  durationMs: 1,
});

// ============================================================================
// Runtime
// ============================================================================

type Step<T> = T | Error;

function pick<T>(steps: Step<T>[], index: number): Step<T> | undefined {
  return steps[Math.min(index, steps.length - 1)];
}

export interface FakeRuntimeScript {
  /** One entry per inspect call; the last one repeats */
  inspect?: Step<ContainerState | null>[];
  logs?: Step<string>;
  exec?: Step<ExecResult>;
}

export class FakeRuntime implements ContainerRuntime {
  inspectCalls = 0;
  logsCalls: number[] = [];
  execCalls: Array<{ name: string; url: string; timeoutMs: number }> = [];

  constructor(private readonly script: FakeRuntimeScript = {}) {}

  async inspect(_name: string, _options?: RuntimeQueryOptions): Promise<ContainerState | null> {
    const step = pick(this.script.inspect ?? [runningState()], this.inspectCalls);
    this.inspectCalls++;
    if (step instanceof Error) throw step;
    return step ?? null;
  }

  async logs(_name: string, tail: number): Promise<string> {
    this.logsCalls.push(tail);
    const step = this.script.logs ?? 'Server listening on port 3000\n';
    if (step instanceof Error) throw step;
    return step;
  }

  async execHttpProbe(name: string, url: string, timeoutMs: number): Promise<ExecResult> {
    this.execCalls.push({ name, url, timeoutMs });
    const step = this.script.exec ?? { stdout: '{"status":"ok"}', stderr: '', code: 0, duration: 12 };
    if (step instanceof Error) throw step;
    return step;
  }
}

// ============================================================================
// Probe
// ============================================================================

export class ScriptedProbe implements ReadinessProbe {
  calls = 0;

  constructor(
    private readonly steps: ReadinessResult[],
    private readonly onProbe?: (call: number) => void,
  ) {}

  async probe(): Promise<ReadinessResult> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)] ?? unreachable();
    this.calls++;
    this.onProbe?.(this.calls);
    return step;
  }
}

// ============================================================================
// Time
// ============================================================================

/** Records delays and advances a fake clock instead of waiting */
export class FakeClock {
  current = 0;
  delays: number[] = [];
  onSleep?: (call: number) => void;

  now = (): number => this.current;

  sleep: Sleep = async (ms) => {
    this.delays.push(ms);
    this.current += ms;
    this.onSleep?.(this.delays.length);
  };
}
