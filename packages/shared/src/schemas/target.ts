/**
 * @readycheck/shared - Probe Target & Budget Zod Schemas
 */

import { z } from 'zod';
import { DEFAULT_BUDGET, DEFAULT_HEALTH_PATH, DEFAULT_HOST } from '../constants/defaults.js';
import { ValidationError } from '../errors/index.js';
import type { AttemptBudget, ProbeTarget } from '../types/readiness.js';

// Docker's own container naming rule
export const containerNameSchema = z
  .string()
  .max(128)
  .regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/, 'Invalid container name');

export const hostSchema = z
  .string()
  .min(1)
  .max(253)
  .regex(/^([A-Za-z0-9.-]+|\[[0-9A-Fa-f:.]+\])$/, 'Invalid host');

export const portSchema = z.number().int().min(1).max(65535);

export const healthPathSchema = z
  .string()
  .regex(/^\/[A-Za-z0-9\-._~/%?=&]*$/, 'Invalid health path');

/** Without a port the target is checked for liveness only */
export const probeTargetSchema = z
  .object({
    name: containerNameSchema,
    host: hostSchema.default(DEFAULT_HOST),
    port: portSchema.optional(),
    path: healthPathSchema.default(DEFAULT_HEALTH_PATH),
    containerPort: portSchema.optional(),
  })
  .transform((t): ProbeTarget =>
    t.port === undefined
      ? { check: 'liveness', name: t.name }
      : {
          check: 'http',
          name: t.name,
          host: t.host,
          port: t.port,
          path: t.path,
          containerPort: t.containerPort ?? t.port,
        },
  );

export const attemptBudgetSchema = z
  .object({
    maxAttempts: z.number().int().positive().default(DEFAULT_BUDGET.maxAttempts),
    delayMs: z.number().int().nonnegative().default(DEFAULT_BUDGET.delayMs),
    probeTimeoutMs: z.number().int().positive().default(DEFAULT_BUDGET.probeTimeoutMs),
  })
  .refine((b) => b.maxAttempts === 1 || b.probeTimeoutMs < b.delayMs, {
    message: 'Probe timeout must be shorter than the delay between attempts',
    path: ['probeTimeoutMs'],
  });

export type ProbeTargetInput = z.input<typeof probeTargetSchema>;
export type AttemptBudgetInput = z.input<typeof attemptBudgetSchema>;

// ============================================================================
// Parse helpers (throw ValidationError)
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${what}: ${describeIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export function parseProbeTarget(input: ProbeTargetInput): ProbeTarget {
  return parseWith(probeTargetSchema, input, 'probe target');
}

export function parseAttemptBudget(input: AttemptBudgetInput = {}): AttemptBudget {
  return parseWith(attemptBudgetSchema, input, 'attempt budget');
}

// ============================================================================
// "host:port/path" target spec
// ============================================================================

const TARGET_SPEC = /^(?:http:\/\/)?([^/:[\]]+|\[[^\]]+\]):(\d+)(\/.*)?$/;

export interface TargetSpec {
  host: string;
  port: number;
  path: string;
}

/**
 * Parse `host:port[/path]` (an `http://` prefix is tolerated).
 * The path defaults to `/health`.
 */
export function parseTargetSpec(spec: string): TargetSpec {
  const match = TARGET_SPEC.exec(spec.trim());
  if (!match) {
    throw new ValidationError(`Invalid target "${spec}": expected host:port[/path]`);
  }

  const [, host = '', port = '', path] = match;
  return {
    host: parseWith(hostSchema, host, 'target host'),
    port: parseWith(portSchema, Number(port), 'target port'),
    path: parseWith(healthPathSchema, path ?? DEFAULT_HEALTH_PATH, 'target path'),
  };
}
