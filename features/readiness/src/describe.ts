/**
 * Human-readable one-liners for targets, states and attempt outcomes.
 */

import type { AttemptOutcome, ContainerNetwork, ContainerState, ProbeTarget } from '@readycheck/shared';
import { probeUrl } from './http-probe.js';

/** URL for HTTP targets, `container <name>` for liveness-only ones */
export function describeTarget(target: ProbeTarget): string {
  return target.check === 'http' ? probeUrl(target) : `container ${target.name} (liveness only)`;
}

/** e.g. `not running: exited (exit code 1, OOM killed)` */
export function describeContainerState(state: ContainerState | null): string {
  if (!state) return 'not running (container not found)';

  const details: string[] = [];
  if (!state.running) details.push(`exit code ${state.exitCode}`);
  if (state.health) details.push(`health ${state.health}`);
  if (state.restarting) details.push('restarting');
  if (state.oomKilled) details.push('OOM killed');
  if (state.error) details.push(state.error);

  const label = state.running ? 'running' : `not running: ${state.status}`;
  return details.length > 0 ? `${label} (${details.join(', ')})` : label;
}

/** e.g. `networks: app-network 172.18.0.5, bridge` */
export function describeNetworks(networks: readonly ContainerNetwork[]): string {
  if (networks.length === 0) return 'networks: none';
  return `networks: ${networks.map((n) => (n.ipAddress ? `${n.name} ${n.ipAddress}` : n.name)).join(', ')}`;
}

export function describeOutcome(outcome: AttemptOutcome): string {
  switch (outcome.kind) {
    case 'not_running':
    case 'running':
      return describeContainerState(outcome.state);
    case 'runtime_query_failed':
      return `runtime query failed: ${outcome.reason}`;
    case 'unreachable':
      return `unreachable: ${outcome.reason}`;
    case 'unhealthy':
      return `unhealthy: HTTP ${outcome.response.statusCode}`;
    case 'healthy':
      return `healthy: HTTP ${outcome.response.statusCode}`;
  }
}
