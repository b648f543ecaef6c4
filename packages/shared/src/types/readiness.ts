/**
 * @readycheck/shared - Readiness Verification Types
 */

import type { ContainerState } from './runtime.js';

// ============================================================================
// Inputs
// ============================================================================

/** Container with an HTTP health endpoint */
export interface HttpProbeTarget {
  check: 'http';
  /** Container name, used for liveness and diagnostics */
  name: string;
  host: string;
  port: number;
  path: string;
  /** Port the service listens on inside the container */
  containerPort: number;
}

/** Container without an HTTP endpoint (databases, brokers): running is ready */
export interface LivenessProbeTarget {
  check: 'liveness';
  name: string;
}

export type ProbeTarget = HttpProbeTarget | LivenessProbeTarget;

export interface AttemptBudget {
  maxAttempts: number;
  delayMs: number;
  probeTimeoutMs: number;
}

// ============================================================================
// Attempt Outcomes
// ============================================================================

export interface ProbeResponse {
  statusCode: number;
  body: string;
  durationMs: number;
}

export type AttemptOutcome =
  | { attempt: number; kind: 'not_running'; state: ContainerState | null }
  | { attempt: number; kind: 'runtime_query_failed'; reason: string }
  | { attempt: number; kind: 'unreachable'; reason: string; durationMs: number }
  | { attempt: number; kind: 'unhealthy'; response: ProbeResponse }
  | { attempt: number; kind: 'healthy'; response: ProbeResponse }
  | { attempt: number; kind: 'running'; state: ContainerState };

// ============================================================================
// Diagnostics
// ============================================================================

export type DiagnosticKind = 'process_status' | 'log_tail' | 'network_probe';

export interface DiagnosticEntry {
  kind: DiagnosticKind;
  content: string;
  available: boolean;
}

// ============================================================================
// Result
// ============================================================================

interface VerificationResultBase {
  target: ProbeTarget;
  attempts: AttemptOutcome[];
  durationMs: number;
}

export interface VerificationSuccess extends VerificationResultBase {
  status: 'success';
  /** null for liveness-only targets */
  response: ProbeResponse | null;
}

export interface VerificationFailure extends VerificationResultBase {
  status: 'failure';
  diagnostics: DiagnosticEntry[];
}

export interface VerificationCancelled extends VerificationResultBase {
  status: 'cancelled';
  reason: string;
}

export type VerificationResult =
  | VerificationSuccess
  | VerificationFailure
  | VerificationCancelled;

export type VerificationStatus = VerificationResult['status'];
