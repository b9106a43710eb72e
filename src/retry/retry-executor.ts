/**
 * Retry Executor
 *
 * Runs a remote operation with exponential backoff and jitter. Every network
 * call of a run (sign-in, enumeration, page fetches, mutations) goes through
 * one executor so retry semantics stay uniform.
 *
 * @module retry/retry-executor
 */

import {
  ExhaustedRetriesError,
  RateLimitError,
  ServerError,
  TransientNetworkError,
  cancellationFrom,
  describeError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';

/** Default max attempts before giving up */
const DEFAULT_MAX_ATTEMPTS = 4;

/** Base delay in ms for exponential backoff */
const BASE_DELAY_MS = 1000;

/** Max delay in ms */
const MAX_DELAY_MS = 30000;

/** Upper bound of the random widening applied to each delay */
const DEFAULT_JITTER_FRACTION = 0.25;

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFraction: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  baseDelayMs: BASE_DELAY_MS,
  maxDelayMs: MAX_DELAY_MS,
  jitterFraction: DEFAULT_JITTER_FRACTION,
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryExecutorOptions {
  policy?: Partial<RetryPolicy>;
  logger?: Logger;
  sleep?: SleepFn;
  /** Returns a value in [0, 1) */
  random?: () => number;
}

export interface RetryRunOptions extends Partial<RetryPolicy> {
  /** Operation name used in logs and in ExhaustedRetriesError */
  label?: string;
  signal?: AbortSignal;
}

export type ErrorClass = 'transient' | 'rate-limit' | 'server' | 'fatal';

export function classifyError(error: unknown): ErrorClass {
  if (error instanceof TransientNetworkError) return 'transient';
  if (error instanceof RateLimitError) return 'rate-limit';
  if (error instanceof ServerError) return 'server';
  return 'fatal';
}

export function isRetryable(error: unknown): boolean {
  return classifyError(error) !== 'fatal';
}

/**
 * Pre-jitter delay for attempt n (n >= 1): min(maxDelay, baseDelay * 2^(n-1))
 */
export function computeBackoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const delay = baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(delay, maxDelayMs);
}

/**
 * Widen a delay by a random fraction in [0, jitterFraction].
 */
export function applyJitter(delayMs: number, jitterFraction: number, random: () => number): number {
  const fraction = Math.max(0, jitterFraction) * random();
  return Math.round(delayMs * (1 + fraction));
}

/**
 * Sleep for specified milliseconds, rejecting early when the signal aborts
 */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancellationFrom(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(cancellationFrom(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class RetryExecutor {
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(options: RetryExecutorOptions = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...definedOnly(options.policy ?? {}) };
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
  }

  getPolicy(): Readonly<RetryPolicy> {
    return { ...this.policy };
  }

  /**
   * Run `operation` until it succeeds, fails with a non-retryable error, or
   * `maxAttempts` tries have failed.
   *
   * @throws ExhaustedRetriesError after the last failed attempt
   * @throws the original error when it is not retryable
   */
  async run<T>(operation: (attempt: number) => Promise<T>, options: RetryRunOptions = {}): Promise<T> {
    const { label = 'operation', signal, ...overrides } = options;
    const policy: RetryPolicy = { ...this.policy, ...definedOnly(overrides) };
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
    }

    let lastError: unknown;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw cancellationFrom(signal);
      }

      try {
        const result = await operation(attempt);
        if (attempt > 1) {
          this.logger.info(`Retry succeeded for ${label} on attempt ${attempt}`, { operation: label, attempt });
        }
        return result;
      } catch (error) {
        lastError = error;

        if (!isRetryable(error)) {
          throw error;
        }
        if (attempt === policy.maxAttempts) {
          break;
        }

        const delay = this.delayFor(attempt, error, policy);
        this.logger.warn(`Retryable error in ${label}: ${describeError(error)}. Retrying in ${delay}ms`, {
          operation: label,
          attempt,
          maxAttempts: policy.maxAttempts,
          errorClass: classifyError(error),
          retryDelayMs: delay,
        });
        await this.sleep(delay, signal);
      }
    }

    this.logger.error(`Final failure for ${label}: ${describeError(lastError)}`, {
      operation: label,
      attempts: policy.maxAttempts,
    });
    throw new ExhaustedRetriesError(label, policy.maxAttempts, lastError);
  }

  private delayFor(attempt: number, error: unknown, policy: RetryPolicy): number {
    const backoff = computeBackoffDelay(attempt, policy.baseDelayMs, policy.maxDelayMs);
    if (error instanceof RateLimitError && error.retryAfterMs !== null) {
      return Math.min(policy.maxDelayMs, Math.max(error.retryAfterMs, backoff));
    }
    return applyJitter(backoff, policy.jitterFraction, this.random);
  }
}

function definedOnly(values: Partial<RetryPolicy>): Partial<RetryPolicy> {
  const result: Partial<RetryPolicy> = {};
  if (values.maxAttempts !== undefined) result.maxAttempts = values.maxAttempts;
  if (values.baseDelayMs !== undefined) result.baseDelayMs = values.baseDelayMs;
  if (values.maxDelayMs !== undefined) result.maxDelayMs = values.maxDelayMs;
  if (values.jitterFraction !== undefined) result.jitterFraction = values.jitterFraction;
  return result;
}
