/**
 * @readycheck/readiness - Readiness verification
 */

export { ReadinessVerifier, type ReadinessVerifierDeps, type VerifyOptions } from './verifier.js';
export { LivenessCheck } from './liveness.js';
export { HttpProbe, probeUrl, isHealthyStatus, truncateBody } from './http-probe.js';
export {
  DiagnosticCollector,
  tailLines,
  unavailable,
  type CollectInput,
  type DiagnosticCollectorOptions,
} from './diagnostics.js';
export { describeContainerState, describeNetworks, describeOutcome, describeTarget } from './describe.js';
export { sleep } from './sleep.js';
export type { LivenessResult, ReadinessProbe, ReadinessResult, Sleep } from './types.js';
