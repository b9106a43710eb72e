/**
 * BI governance audit: programmatic API
 *
 * @module bi-governance-audit
 */

export * from './types.js';
export * from './errors.js';
export * from './client/index.js';
export * from './config/index.js';
export * from './logging/index.js';
export * from './report/index.js';
export * from './run/index.js';
export * from './scanning/index.js';
export {
  DEFAULT_RETRY_POLICY,
  RetryExecutor,
  abortableSleep,
  applyJitter,
  classifyError,
  computeBackoffDelay,
  isRetryable,
  type ErrorClass,
  type RetryExecutorOptions,
  type RetryPolicy,
  type RetryRunOptions,
  type SleepFn,
} from './retry/retry-executor.js';
export {
  AUTH_RETRY_POLICY,
  AuthSession,
  authFailureReason,
  type AuthApi,
  type AuthCredentials,
  type AuthSessionOptions,
  type SiteScope,
} from './session/auth-session.js';
export {
  daysBetween,
  evaluate,
  evaluateAge,
  evaluateSchedule,
  isFlagged,
  isWithinWindow,
  parseTimeOfDay,
} from './policy/policy-evaluator.js';
export { buildProgram } from './cli/governance-cli.js';
export type { RuntimeEnv } from './runtime.js';
