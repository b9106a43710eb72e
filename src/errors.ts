/**
 * Error taxonomy for governance runs.
 *
 * Every error raised by the audit carries a stable `code`. The retry layer
 * classifies by class: TransientNetworkError, RateLimitError and ServerError
 * are retried, everything else propagates on the first failure.
 *
 * @module errors
 */

export type GovernanceErrorCode =
  | 'CONFIG_INVALID'
  | 'AUTH_FAILED'
  | 'UNAUTHORIZED'
  | 'NETWORK_TRANSIENT'
  | 'RATE_LIMITED'
  | 'SERVER_ERROR'
  | 'CLIENT_ERROR'
  | 'RESPONSE_SHAPE'
  | 'RETRIES_EXHAUSTED'
  | 'PARTIAL_ENUMERATION'
  | 'SCAN_CANCELLED'
  | 'SCAN_IN_PROGRESS';

export class GovernanceError extends Error {
  constructor(
    message: string,
    public readonly code: GovernanceErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GovernanceError';
  }
}

/**
 * Configuration could not be loaded or failed validation.
 * `issues` lists every problem found, not just the first.
 */
export class ConfigError extends GovernanceError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

export type AuthFailureReason = 'bad_credentials' | 'unknown_site' | 'unreachable' | 'no_session';

/** Fatal: the run cannot authenticate. */
export class AuthError extends GovernanceError {
  constructor(
    message: string,
    public readonly reason: AuthFailureReason,
    options?: { cause?: unknown },
  ) {
    super(message, 'AUTH_FAILED', options);
    this.name = 'AuthError';
  }
}

// -- HTTP failures --------------------------------------------------------------

/** Connection reset, DNS failure, socket or request timeout. */
export class TransientNetworkError extends GovernanceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'NETWORK_TRANSIENT', options);
    this.name = 'TransientNetworkError';
  }
}

export class RateLimitError extends GovernanceError {
  constructor(
    message: string,
    /** Server-supplied wait hint (Retry-After) in ms, null when absent */
    public readonly retryAfterMs: number | null,
  ) {
    super(message, 'RATE_LIMITED');
    this.name = 'RateLimitError';
  }
}

export class ServerError extends GovernanceError {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message, 'SERVER_ERROR');
    this.name = 'ServerError';
  }
}

/** 4xx other than 401 and 429. Never retried. */
export class ClientError extends GovernanceError {
  constructor(
    message: string,
    public readonly status: number,
    code: GovernanceErrorCode = 'CLIENT_ERROR',
  ) {
    super(message, code);
    this.name = 'ClientError';
  }
}

/** 401 on a data call: the token was revoked or expired server-side. */
export class UnauthorizedError extends ClientError {
  constructor(message: string) {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

/** A 2xx response whose body did not have the expected shape. */
export class ResponseShapeError extends ClientError {
  constructor(message: string) {
    super(message, 200, 'RESPONSE_SHAPE');
    this.name = 'ResponseShapeError';
  }
}

// -- Retry / scan outcomes ------------------------------------------------------

export class ExhaustedRetriesError extends GovernanceError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    lastError: unknown,
  ) {
    super(
      `${operation} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${describeError(lastError)}`,
      'RETRIES_EXHAUSTED',
      { cause: lastError },
    );
    this.name = 'ExhaustedRetriesError';
  }
}

/**
 * Marker returned (not thrown) by site enumeration when a page could not be
 * fetched. The run continues with the sites obtained so far.
 */
export class PartialEnumerationError extends GovernanceError {
  constructor(
    public readonly sitesObtained: number,
    public readonly failedPage: number,
    cause: unknown,
  ) {
    super(
      `Site enumeration stopped at page ${failedPage} with ${sitesObtained} site(s) obtained: ${describeError(cause)}`,
      'PARTIAL_ENUMERATION',
      { cause },
    );
    this.name = 'PartialEnumerationError';
  }
}

/** The run deadline expired or the caller aborted. */
export class ScanCancelledError extends GovernanceError {
  constructor(message = 'Scan cancelled', options?: { cause?: unknown }) {
    super(message, 'SCAN_CANCELLED', options);
    this.name = 'ScanCancelledError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/** Convert an abort reason into the error the audit raises for it. */
export function cancellationFrom(signal: AbortSignal): ScanCancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof ScanCancelledError) {
    return reason;
  }
  return new ScanCancelledError(
    reason instanceof Error ? reason.message : 'Scan cancelled',
    { cause: reason },
  );
}
