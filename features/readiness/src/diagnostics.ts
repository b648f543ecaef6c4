/**
 * Diagnostic Collector
 *
 * Runs once, on terminal failure. Always returns exactly one
 * process_status, one log_tail and one network_probe entry, in that
 * order; a step that cannot be gathered is marked `unavailable: <reason>`.
 */

import type {
  AttemptOutcome,
  ContainerRuntime,
  ContainerState,
  DiagnosticEntry,
  DiagnosticKind,
  HttpProbeTarget,
  ProbeTarget,
} from '@readycheck/shared';
import { DEFAULT_LOG_TAIL_LINES, MAX_BODY_CHARS, errorMessage } from '@readycheck/shared';
import { describeContainerState, describeNetworks, describeOutcome } from './describe.js';
import { probeUrl, truncateBody } from './http-probe.js';

export interface DiagnosticCollectorOptions {
  logTailLines?: number;
  /** Timeout of the in-container HTTP check */
  probeTimeoutMs?: number;
}

export interface CollectInput {
  target: ProbeTarget;
  attempts: readonly AttemptOutcome[];
  signal?: AbortSignal;
}

type Inspection = { ok: true; state: ContainerState | null } | { ok: false; reason: string };

export function unavailable(kind: DiagnosticKind, reason: string): DiagnosticEntry {
  return { kind, content: `unavailable: ${reason}`, available: false };
}

/** Last `count` lines of `text` */
export function tailLines(text: string, count: number): string {
  const lines = text.replace(/\n$/, '').split('\n');
  return lines.slice(-count).join('\n');
}

export class DiagnosticCollector {
  private readonly logTailLines: number;
  private readonly probeTimeoutMs: number;

  constructor(
    private readonly runtime: ContainerRuntime,
    options: DiagnosticCollectorOptions = {},
  ) {
    this.logTailLines = options.logTailLines ?? DEFAULT_LOG_TAIL_LINES;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 3000;
  }

  async collect({ target, attempts, signal }: CollectInput): Promise<DiagnosticEntry[]> {
    const inspection = await this.inspect(target, signal);

    const processStatus: DiagnosticEntry = inspection.ok
      ? { kind: 'process_status', content: this.formatProcessStatus(inspection.state, attempts), available: true }
      : unavailable('process_status', inspection.reason);

    const logTail = await this.gather('log_tail', async () => {
      const output = await this.runtime.logs(target.name, this.logTailLines, { signal });
      const tail = tailLines(output, this.logTailLines);
      return tail.trim() ? tail : '(no log output)';
    });

    return [processStatus, logTail, await this.networkProbe(target, inspection, signal)];
  }

  /**
   * In-container GET of the health path plus network membership; tells
   * "service broken" from "network path broken".
   */
  private async networkProbe(
    target: ProbeTarget,
    inspection: Inspection,
    signal?: AbortSignal,
  ): Promise<DiagnosticEntry> {
    if (inspection.ok && !inspection.state?.running) {
      return unavailable('network_probe', 'container is not running');
    }

    const networks = inspection.ok && inspection.state ? describeNetworks(inspection.state.networks) : null;

    if (target.check === 'liveness') {
      if (!networks) return unavailable('network_probe', 'container state unknown');
      return { kind: 'network_probe', content: `no HTTP check configured\n${networks}`, available: true };
    }

    return this.gather('network_probe', async () => {
      const probe = await this.probeFromInside(target, signal);
      return networks ? `${probe}\n${networks}` : probe;
    });
  }

  private async inspect(target: ProbeTarget, signal?: AbortSignal): Promise<Inspection> {
    try {
      return { ok: true, state: await this.runtime.inspect(target.name, { signal }) };
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }

  private formatProcessStatus(state: ContainerState | null, attempts: readonly AttemptOutcome[]): string {
    const lines = [`state: ${describeContainerState(state)}`];

    if (state) lines.push(`restarts: ${state.restartCount}`);
    if (state?.startedAt) lines.push(`started: ${state.startedAt}`);
    if (state?.finishedAt && !state.running) lines.push(`finished: ${state.finishedAt}`);

    lines.push('attempts:');
    for (const outcome of attempts) {
      lines.push(`  ${outcome.attempt}: ${describeOutcome(outcome)}`);
    }

    return lines.join('\n');
  }

  private async probeFromInside(target: HttpProbeTarget, signal?: AbortSignal): Promise<string> {
    const url = probeUrl({ host: 'localhost', port: target.containerPort, path: target.path });
    const result = await this.runtime.execHttpProbe(target.name, url, this.probeTimeoutMs, { signal });
    const output = truncateBody((result.stdout + result.stderr).trim(), MAX_BODY_CHARS);

    return [
      `GET ${url} from inside ${target.name}: exit ${result.code}`,
      output || '(no output)',
    ].join('\n');
  }

  private async gather(kind: DiagnosticKind, fn: () => Promise<string>): Promise<DiagnosticEntry> {
    try {
      return { kind, content: await fn(), available: true };
    } catch (error) {
      return unavailable(kind, errorMessage(error));
    }
  }
}
