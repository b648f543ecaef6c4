/**
 * DiagnosticCollector Tests
 */

import { RuntimeQueryError } from '@readycheck/shared';
import type { AttemptOutcome } from '@readycheck/shared';
import { DiagnosticCollector, tailLines, unavailable } from '../diagnostics.js';
import { FakeRuntime, exitedState, livenessTarget, runningState, target } from './helpers/fakes.js';

const attempts: AttemptOutcome[] = [
  { attempt: 1, kind: 'unhealthy', response: { statusCode: 500, body: 'boom', durationMs: 4 } },
  { attempt: 2, kind: 'unreachable', reason: 'timed out after 500ms', durationMs: 500 },
];

function logLines(count: number): string {
  return Array.from({ length: count }, (_, i) => `line ${i + 1}`).join('\n') + '\n';
}

describe('DiagnosticCollector', () => {
  it('should return the three entries in order', async () => {
    const collector = new DiagnosticCollector(new FakeRuntime());

    const entries = await collector.collect({ target: target(), attempts });

    expect(entries.map((e) => e.kind)).toEqual(['process_status', 'log_tail', 'network_probe']);
    expect(entries.every((e) => e.available)).toBe(true);
  });

  it('should summarize the process state and every attempt', async () => {
    const collector = new DiagnosticCollector(new FakeRuntime({ inspect: [runningState()] }));

    const [processStatus] = await collector.collect({ target: target(), attempts });

    expect(processStatus?.content).toBe(
      [
        'state: running',
        'restarts: 0',
        'started: 2026-10-19T08:00:00Z',
        'attempts:',
        '  1: unhealthy: HTTP 500',
        '  2: unreachable: timed out after 500ms',
      ].join('\n'),
    );
  });

  it('should describe a dead container and skip the network probe', async () => {
    const runtime = new FakeRuntime({ inspect: [exitedState(137, { oomKilled: true })] });
    const collector = new DiagnosticCollector(runtime);

    const [processStatus, , networkProbe] = await collector.collect({ target: target(), attempts: [] });

    expect(processStatus?.content).toBe(
      [
        'state: not running: exited (exit code 137, OOM killed)',
        'restarts: 0',
        'started: 2026-10-19T08:00:00Z',
        'finished: 2026-10-19T08:00:05Z',
        'attempts:',
      ].join('\n'),
    );
    expect(networkProbe).toEqual(unavailable('network_probe', 'container is not running'));
    expect(runtime.execCalls).toEqual([]);
  });

  it('should bound the log tail to the configured number of lines', async () => {
    const runtime = new FakeRuntime({ logs: logLines(120) });
    const collector = new DiagnosticCollector(runtime, { logTailLines: 50 });

    const [, logTail] = await collector.collect({ target: target(), attempts });
    const lines = logTail?.content.split('\n') ?? [];

    expect(runtime.logsCalls).toEqual([50]);
    expect(lines).toHaveLength(50);
    expect(lines[0]).toBe('line 71');
    expect(lines[49]).toBe('line 120');
  });

  it('should mark empty container output', async () => {
    const collector = new DiagnosticCollector(new FakeRuntime({ logs: '\n' }));

    const [, logTail] = await collector.collect({ target: target(), attempts });

    expect(logTail).toEqual({ kind: 'log_tail', content: '(no log output)', available: true });
  });

  it('should probe the container port from inside the container', async () => {
    const runtime = new FakeRuntime({
      exec: { stdout: '{"status":"ok"}\n', stderr: '', code: 0, duration: 8 },
    });
    const collector = new DiagnosticCollector(runtime, { probeTimeoutMs: 2000 });

    const [, , networkProbe] = await collector.collect({
      target: target({ port: 18080, containerPort: 8080 }),
      attempts,
    });

    expect(runtime.execCalls).toEqual([
      { name: 'app-auth-service', url: 'http://localhost:8080/health', timeoutMs: 2000 },
    ]);
    expect(networkProbe?.content).toBe(
      'GET http://localhost:8080/health from inside app-auth-service: exit 0\n{"status":"ok"}\nnetworks: app-network 172.18.0.5',
    );
  });

  it('should report a failed in-container probe with no output', async () => {
    const runtime = new FakeRuntime({ exec: { stdout: '', stderr: '', code: 7, duration: 8 } });
    const collector = new DiagnosticCollector(runtime);

    const [, , networkProbe] = await collector.collect({ target: target(), attempts });

    expect(networkProbe?.content).toBe(
      'GET http://localhost:3000/health from inside app-auth-service: exit 7\n(no output)\nnetworks: app-network 172.18.0.5',
    );
  });

  it('should count restarts of a crash-looping container', async () => {
    const runtime = new FakeRuntime({ inspect: [runningState({ restartCount: 4, restarting: true })] });
    const collector = new DiagnosticCollector(runtime);

    const [processStatus] = await collector.collect({ target: target(), attempts: [] });

    expect(processStatus?.content.split('\n').slice(0, 2)).toEqual([
      'state: running (restarting)',
      'restarts: 4',
    ]);
  });

  it('should show network membership alongside the in-container GET', async () => {
    const runtime = new FakeRuntime({
      inspect: [runningState({ networks: [{ name: 'app-network', ipAddress: '172.18.0.5' }, { name: 'bridge', ipAddress: null }] })],
      exec: { stdout: '', stderr: 'wget: can\'t connect to remote host: Connection refused', code: 1, duration: 3 },
    });
    const collector = new DiagnosticCollector(runtime);

    const [, , networkProbe] = await collector.collect({ target: target(), attempts });

    expect(networkProbe?.content.split('\n')).toEqual([
      'GET http://localhost:3000/health from inside app-auth-service: exit 1',
      "wget: can't connect to remote host: Connection refused",
      'networks: app-network 172.18.0.5, bridge',
    ]);
  });

  it('should report networks without an HTTP request for liveness-only targets', async () => {
    const runtime = new FakeRuntime({ inspect: [runningState({ networks: [] })] });
    const collector = new DiagnosticCollector(runtime);

    const [, , networkProbe] = await collector.collect({ target: livenessTarget(), attempts: [] });

    expect(networkProbe).toEqual({
      kind: 'network_probe',
      content: 'no HTTP check configured\nnetworks: none',
      available: true,
    });
    expect(runtime.execCalls).toEqual([]);
  });

  it('should mark the network entry unavailable for a liveness-only target when inspect fails', async () => {
    const runtime = new FakeRuntime({ inspect: [new RuntimeQueryError('daemon down')] });
    const collector = new DiagnosticCollector(runtime);

    const [, , networkProbe] = await collector.collect({ target: livenessTarget(), attempts: [] });

    expect(networkProbe).toEqual(unavailable('network_probe', 'container state unknown'));
  });

  it('should mark every step unavailable when the runtime is down', async () => {
    const down = new RuntimeQueryError('Runtime query failed: connect ECONNREFUSED 10.0.0.5:22');
    const collector = new DiagnosticCollector(new FakeRuntime({ inspect: [down], logs: down, exec: down }));

    const entries = await collector.collect({ target: target(), attempts });

    expect(entries).toEqual([
      unavailable('process_status', 'Runtime query failed: connect ECONNREFUSED 10.0.0.5:22'),
      unavailable('log_tail', 'Runtime query failed: connect ECONNREFUSED 10.0.0.5:22'),
      unavailable('network_probe', 'Runtime query failed: connect ECONNREFUSED 10.0.0.5:22'),
    ]);
  });
});

describe('tailLines', () => {
  it('should keep the last lines', () => {
    expect(tailLines('a\nb\nc\n', 2)).toBe('b\nc');
  });

  it('should keep short text whole', () => {
    expect(tailLines('only line', 50)).toBe('only line');
  });
});
