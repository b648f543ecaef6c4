/**
 * @readycheck/shared - Config & Fleet Manifest Zod Schemas
 */

import { z } from 'zod';
import { MAX_LOG_TAIL_LINES } from '../constants/defaults.js';
import { containerNameSchema, healthPathSchema, hostSchema, portSchema } from './target.js';

export const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const sshConfigSchema = z.object({
  host: hostSchema,
  port: portSchema.default(22),
  username: z.string().min(1).default('root'),
  privateKeyPath: z.string().min(1).optional(),
});

/** Partial budget as written in files; merged over defaults later */
export const budgetOverridesSchema = z
  .object({
    maxAttempts: z.number().int().positive(),
    delayMs: z.number().int().nonnegative(),
    probeTimeoutMs: z.number().int().positive(),
  })
  .partial();

export const logTailLinesSchema = z.number().int().positive().max(MAX_LOG_TAIL_LINES);

/** ~/.readycheck/config.json */
export const cliConfigSchema = z.object({
  logLevel: logLevelSchema.optional(),
  logDir: z.string().min(1).optional(),
  ssh: sshConfigSchema.partial().optional(),
  budget: budgetOverridesSchema.optional(),
  logTailLines: logTailLinesSchema.optional(),
});

/** A service without `port` is checked for liveness only */
export const fleetServiceSchema = z.object({
  name: containerNameSchema,
  port: portSchema.optional(),
  host: hostSchema.optional(),
  path: healthPathSchema.optional(),
  containerPort: portSchema.optional(),
});

/** readycheck.json */
export const fleetManifestSchema = z.object({
  host: hostSchema.optional(),
  ssh: sshConfigSchema.optional(),
  budget: budgetOverridesSchema.optional(),
  logTailLines: logTailLinesSchema.optional(),
  services: z.array(fleetServiceSchema).min(1),
});

export type LogLevel = z.infer<typeof logLevelSchema>;
export type BudgetOverrides = z.infer<typeof budgetOverridesSchema>;
export type CLIConfigFile = z.infer<typeof cliConfigSchema>;
export type FleetService = z.infer<typeof fleetServiceSchema>;
export type FleetManifest = z.infer<typeof fleetManifestSchema>;
