/**
 * @readycheck/readiness - Internal contracts
 */

import type { ContainerState, HttpProbeTarget, ProbeResponse } from '@readycheck/shared';

export type LivenessResult =
  | { kind: 'running'; state: ContainerState }
  | { kind: 'not_running'; state: ContainerState | null }
  | { kind: 'runtime_query_failed'; reason: string };

export type ReadinessResult =
  | { kind: 'healthy'; response: ProbeResponse }
  | { kind: 'unhealthy'; response: ProbeResponse }
  | { kind: 'unreachable'; reason: string; durationMs: number };

/** One readiness probe */
export interface ReadinessProbe {
  probe(target: HttpProbeTarget, timeoutMs: number, signal?: AbortSignal): Promise<ReadinessResult>;
}

/** Resolves after `ms`, or as soon as `signal` aborts */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
