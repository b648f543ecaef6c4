/**
 * Liveness: is the container there and running.
 * Says nothing about application health.
 */

import type { ContainerRuntime } from '@readycheck/shared';
import { errorMessage } from '@readycheck/shared';
import type { LivenessResult } from './types.js';

export class LivenessCheck {
  constructor(private readonly runtime: ContainerRuntime) {}

  async check(name: string, signal?: AbortSignal): Promise<LivenessResult> {
    try {
      const state = await this.runtime.inspect(name, { signal });
      if (state?.running) {
        return { kind: 'running', state };
      }
      return { kind: 'not_running', state };
    } catch (error) {
      return { kind: 'runtime_query_failed', reason: errorMessage(error) };
    }
  }
}
