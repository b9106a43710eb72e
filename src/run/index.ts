/**
 * Run orchestration
 *
 * @module run
 */

export {
  deriveRunStatus,
  exitCodeFor,
  runGovernanceAudit,
  type GovernanceApi,
  type GovernanceRunDeps,
  type PairOutcome,
  type RunStatus,
  type RunSummary,
} from './governance-run.js';
export { ModeGate, type GateOutcome, type ModeGateOptions, type Mutator } from './mode-gate.js';
export { ScanResultBuilder } from './scan-result.js';
export { runWithConcurrency } from './worker-pool.js';
