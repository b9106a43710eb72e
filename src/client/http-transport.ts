/**
 * HTTP Transport - fetch wrapper with timeouts and error classification
 *
 * Maps every failure onto the governance error taxonomy so the retry layer
 * can decide what to retry without knowing about HTTP:
 *
 * - 401              -> UnauthorizedError
 * - 429              -> RateLimitError (with Retry-After hint)
 * - 5xx              -> ServerError
 * - other 4xx        -> ClientError
 * - network/timeout  -> TransientNetworkError
 * - caller abort     -> ScanCancelledError
 *
 * @module client/http-transport
 */

import {
  ClientError,
  RateLimitError,
  ServerError,
  TransientNetworkError,
  UnauthorizedError,
  cancellationFrom,
} from '../errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** Serialized as JSON when present */
  body?: unknown;
  /** Overrides the transport default */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HttpTransport {
  /** Resolves with the parsed JSON body, or null for an empty body. */
  request(req: HttpRequest): Promise<unknown>;
}

export interface FetchTransportConfig {
  timeoutMs: number;
  /** Defaults to the global fetch */
  fetchImpl?: typeof fetch;
  /** Used for HTTP-date Retry-After values */
  now?: () => number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (value === null) return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

/**
 * Build the error for a non-2xx response.
 */
export function errorForStatus(
  status: number,
  statusText: string,
  retryAfter: string | null,
  detail: string,
  now: number = Date.now(),
): Error {
  const message = `HTTP ${status} ${statusText}${detail ? `: ${detail}` : ''}`.trim();

  if (status === 401) return new UnauthorizedError(message);
  if (status === 429) return new RateLimitError(message, parseRetryAfter(retryAfter, now));
  if (status >= 500) return new ServerError(message, status);
  return new ClientError(message, status);
}

export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(config: Partial<FetchTransportConfig> = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.now = config.now ?? Date.now;
  }

  async request(req: HttpRequest): Promise<unknown> {
    const timeoutMs = req.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    req.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      if (req.signal?.aborted) {
        throw cancellationFrom(req.signal);
      }

      const headers: Record<string, string> = { Accept: 'application/json', ...req.headers };
      let body: string | undefined;
      if (req.body !== undefined) {
        headers['Content-Type'] = 'application/json';
        body = JSON.stringify(req.body);
      }

      let response: Response;
      let text: string;
      try {
        response = await this.fetchImpl(req.url, {
          method: req.method,
          headers,
          body,
          signal: controller.signal,
        });
        text = await response.text();
      } catch (error) {
        if (req.signal?.aborted) {
          throw cancellationFrom(req.signal);
        }
        if (timedOut) {
          throw new TransientNetworkError(`${req.method} ${req.url} timed out after ${timeoutMs}ms`, {
            cause: error,
          });
        }
        throw new TransientNetworkError(
          `${req.method} ${req.url} failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error },
        );
      }

      if (!response.ok) {
        throw errorForStatus(
          response.status,
          response.statusText,
          response.headers.get('retry-after'),
          summarizeErrorBody(text),
          this.now(),
        );
      }

      if (text.trim() === '') {
        return null;
      }
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ClientError(`Invalid JSON from ${req.method} ${req.url}: ${reason}`, response.status);
      }
    } finally {
      clearTimeout(timer);
      req.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

/**
 * Pull a short detail string out of an error body without echoing large
 * payloads into logs.
 */
function summarizeErrorBody(text: string): string {
  const trimmed = text.trim();
  if (trimmed === '') return '';
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (parsed && typeof parsed === 'object' && 'error' in parsed) {
      const error = parsed.error;
      if (error && typeof error === 'object') {
        const summary = 'summary' in error ? error.summary : undefined;
        const detail = 'detail' in error ? error.detail : undefined;
        return [summary, detail].filter((part): part is string => typeof part === 'string').join(' - ');
      }
    }
  } catch {
    // not JSON, fall through to the raw text
  }
  return trimmed.slice(0, 200);
}
