/**
 * Readiness: one HTTP GET against the health endpoint.
 *
 * Only 2xx is healthy. Any other status is unhealthy, and no response at
 * all (refused, reset, DNS, timeout) is unreachable. The body is carried
 * along for diagnostics and never inspected.
 */

import type { HttpProbeTarget } from '@readycheck/shared';
import { MAX_BODY_CHARS, errorCode, errorMessage } from '@readycheck/shared';
import type { ReadinessProbe, ReadinessResult } from './types.js';

export function probeUrl(target: Pick<HttpProbeTarget, 'host' | 'port' | 'path'>): string {
  return `http://${target.host}:${target.port}${target.path}`;
}

export function isHealthyStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

export function truncateBody(body: string, max = MAX_BODY_CHARS): string {
  return body.length > max ? `${body.slice(0, max)}...` : body;
}

export class HttpProbe implements ReadinessProbe {
  async probe(target: HttpProbeTarget, timeoutMs: number, signal?: AbortSignal): Promise<ReadinessResult> {
    const startTime = Date.now();
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(probeUrl(target), {
        method: 'GET',
        redirect: 'manual',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      const body = truncateBody(await response.text());
      const probeResponse = {
        statusCode: response.status,
        body,
        durationMs: Date.now() - startTime,
      };

      return isHealthyStatus(response.status)
        ? { kind: 'healthy', response: probeResponse }
        : { kind: 'unhealthy', response: probeResponse };
    } catch (error) {
      return {
        kind: 'unreachable',
        reason: timedOut ? `timed out after ${timeoutMs}ms` : describeFetchError(error),
        durationMs: Date.now() - startTime,
      };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

// fetch wraps socket errors: TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } })
function describeFetchError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError') {
    return 'aborted';
  }

  const cause: unknown = typeof error === 'object' && error !== null && 'cause' in error ? error.cause : undefined;
  if (typeof cause === 'object' && cause !== null) {
    const message = errorMessage(cause);
    const code = errorCode(cause);
    if (code) return message ? `${code}: ${message}` : code;
    return message;
  }

  return errorMessage(error);
}
