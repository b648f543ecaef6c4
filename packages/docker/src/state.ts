/**
 * @readycheck/docker - `docker inspect` parsing
 */

import { z } from 'zod';
import type { ContainerNetwork, ContainerState } from '@readycheck/shared';

// Docker reports unset timestamps as the zero time
const ZERO_TIME = '0001-01-01T00:00:00Z';

const timestamp = z
  .string()
  .optional()
  .transform((v) => (v && v !== ZERO_TIME ? v : null));

export const dockerStateSchema = z.object({
  Status: z.enum(['created', 'running', 'paused', 'restarting', 'removing', 'exited', 'dead']),
  Running: z.boolean(),
  Restarting: z.boolean().default(false),
  OOMKilled: z.boolean().default(false),
  ExitCode: z.number().int(),
  Error: z.string().optional(),
  StartedAt: timestamp,
  FinishedAt: timestamp,
  Health: z.object({ Status: z.string() }).nullish(),
});

/** The parts of `docker inspect --format '{{json .}}'` we read */
export const dockerInspectSchema = z.object({
  State: dockerStateSchema,
  RestartCount: z.number().int().nonnegative().default(0),
  NetworkSettings: z
    .object({
      Networks: z.record(z.object({ IPAddress: z.string().optional() })).nullish(),
    })
    .nullish(),
});

export type DockerInspect = z.infer<typeof dockerInspectSchema>;

export function toContainerState(raw: DockerInspect): ContainerState {
  const state = raw.State;
  const networks: ContainerNetwork[] = Object.entries(raw.NetworkSettings?.Networks ?? {}).map(
    ([name, network]) => ({ name, ipAddress: network.IPAddress ? network.IPAddress : null }),
  );

  return {
    status: state.Status,
    running: state.Running,
    restarting: state.Restarting,
    oomKilled: state.OOMKilled,
    exitCode: state.ExitCode,
    error: state.Error ? state.Error : null,
    health: state.Health?.Status ?? null,
    startedAt: state.StartedAt,
    finishedAt: state.FinishedAt,
    restartCount: raw.RestartCount,
    networks,
  };
}
