/**
 * Auth Session - personal-access-token sign-in and shared session renewal
 *
 * Holds one Session per site scope. The first comes from the PAT sign-in
 * (the home scope); every other site gets its own token by switching from
 * the home Session. Readers share a scope's Session freely; renewal is
 * exclusive per scope: the first caller to find the token expired (or
 * rejected by the server) starts one sign-in or switch and every concurrent
 * caller for that scope awaits that same promise.
 *
 * @module session/auth-session
 */

import {
  AuthError,
  ClientError,
  ScanCancelledError,
  UnauthorizedError,
  describeError,
  type AuthFailureReason,
} from '../errors.js';
import type { RestClient, SignInResult } from '../client/rest-client.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { RetryExecutor, RetryPolicy } from '../retry/retry-executor.js';
import type { Session, SiteDescriptor } from '../types.js';

// -- Constants ----------------------------------------------------------------

/** Sign-in gets fewer, faster retries than data calls */
export const AUTH_RETRY_POLICY: Readonly<Partial<RetryPolicy>> = {
  maxAttempts: 3,
  baseDelayMs: 500,
};

const DEFAULT_SESSION_TTL_MS = 240 * 60 * 1000;

/** Treat a token as expired this long before its nominal expiry */
const DEFAULT_EXPIRY_SKEW_MS = 60 * 1000;

// -- Types --------------------------------------------------------------------

export interface AuthCredentials {
  serverUrl: string;
  tokenName: string;
  tokenSecret: string;
  /** Site content URL; "" signs in to the default site */
  siteScope: string;
}

export type AuthApi = Pick<RestClient, 'signIn' | 'signOut' | 'switchSite'>;

/** The part of a site that selects its Session */
export type SiteScope = Pick<SiteDescriptor, 'contentUrl'>;

export interface AuthSessionOptions {
  client: AuthApi;
  retry: RetryExecutor;
  authRetryPolicy?: Partial<RetryPolicy>;
  sessionTtlMs?: number;
  expirySkewMs?: number;
  logger?: Logger;
  now?: () => number;
  /** Run-level cancellation, applied to sign-in, site switches and renewal */
  signal?: AbortSignal;
}

// -- AuthSession class --------------------------------------------------------

export class AuthSession {
  private readonly client: AuthApi;
  private readonly retry: RetryExecutor;
  private readonly authRetryPolicy: Partial<RetryPolicy>;
  private readonly sessionTtlMs: number;
  private readonly expirySkewMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly signal?: AbortSignal;

  private credentials: AuthCredentials | null = null;
  /** Content URL of the site the PAT signs in to */
  private homeScope: string | null = null;
  private readonly sessions = new Map<string, Session>();
  private readonly renewing = new Map<string, Promise<Session>>();
  private renewals = 0;

  constructor(options: AuthSessionOptions) {
    this.client = options.client;
    this.retry = options.retry;
    this.authRetryPolicy = options.authRetryPolicy ?? AUTH_RETRY_POLICY;
    this.sessionTtlMs = options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;
    this.expirySkewMs = options.expirySkewMs ?? DEFAULT_EXPIRY_SKEW_MS;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.signal = options.signal;
  }

  /** Number of re-authentications since the first sign-in, across all scopes */
  get renewalCount(): number {
    return this.renewals;
  }

  /** The home-scope Session, or null before sign-in and after sign-out */
  current(): Session | null {
    return this.homeScope === null ? null : (this.sessions.get(this.homeScope) ?? null);
  }

  isExpired(session: Session): boolean {
    return this.now() >= session.expiresAt.getTime() - this.expirySkewMs;
  }

  /**
   * Authenticate and store the home Session.
   *
   * @throws AuthError on bad credentials, unknown site or unreachable server
   */
  async signIn(credentials: AuthCredentials): Promise<Session> {
    this.credentials = credentials;
    const session = await this.authenticate(credentials);
    this.sessions.clear();
    this.homeScope = session.siteContentUrl;
    this.sessions.set(session.siteContentUrl, session);
    this.logger.info(`Signed in to ${credentials.serverUrl}`, {
      siteId: session.siteId,
      siteContentUrl: session.siteContentUrl,
      expiresAt: session.expiresAt.toISOString(),
    });
    return session;
  }

  /**
   * Return a Session that is not expired, renewing if needed.
   */
  async ensureValid(session: Session | null = this.current()): Promise<Session> {
    if (session && !this.isExpired(session)) {
      return session;
    }
    return this.renew(session);
  }

  /**
   * Session scoped to `site`: the cached one while it is valid, otherwise a
   * fresh one from a site switch (or a sign-in for the home scope).
   */
  async sessionFor(site: SiteScope): Promise<Session> {
    const held = this.sessions.get(site.contentUrl);
    if (held && !this.isExpired(held)) {
      return held;
    }
    return this.renewScope(site.contentUrl, held ?? null);
  }

  /**
   * Replace `stale` with a fresh Session for the same scope. Concurrent
   * callers share one round trip; a caller holding an already-replaced
   * Session gets the current one.
   */
  async renew(stale: Session | null): Promise<Session> {
    return this.renewScope(stale ? this.scopeOf(stale) : (this.homeScope ?? ''), stale);
  }

  /**
   * Run `fn` with a valid Session. If the server rejects the token mid-run,
   * renew once and run `fn` again with the fresh Session.
   *
   * @param hint - Session the caller already holds
   * @param site - Site whose Session to use when there is no hint; the home Session otherwise
   */
  async withSession<T>(
    fn: (session: Session) => Promise<T>,
    hint: Session | null = null,
    site?: SiteScope,
  ): Promise<T> {
    let session: Session;
    if (hint) {
      session = await this.ensureValid(hint);
    } else if (site) {
      session = await this.sessionFor(site);
    } else {
      session = await this.ensureValid();
    }
    try {
      return await fn(session);
    } catch (error) {
      if (!(error instanceof UnauthorizedError)) {
        throw error;
      }
      this.logger.warn('Token rejected by server, renewing session', { siteContentUrl: this.scopeOf(session) });
      const renewed = await this.renew(session);
      return fn(renewed);
    }
  }

  /**
   * Best-effort sign-out of every Session held. Safe to call more than once.
   */
  async signOut(): Promise<void> {
    const held = [...new Set(this.sessions.values())];
    this.sessions.clear();
    if (held.length === 0) return;

    for (const session of held) {
      try {
        await this.retry.run(() => this.client.signOut(session), {
          ...this.authRetryPolicy,
          label: 'auth.signout',
        });
      } catch (error) {
        this.logger.warn(`Sign-out of site "${session.siteContentUrl}" failed: ${describeError(error)}`);
      }
    }
    this.logger.info('Signed out', { sessions: held.length });
  }

  private scopeOf(session: Session): string {
    for (const [scope, held] of this.sessions) {
      if (held === session) return scope;
    }
    return session.siteContentUrl;
  }

  private async renewScope(scope: string, stale: Session | null): Promise<Session> {
    const credentials = this.credentials;
    if (!credentials || this.homeScope === null) {
      throw new AuthError('No session: signIn() has not been called', 'no_session');
    }

    const held = this.sessions.get(scope);
    if (held && held !== stale && !this.isExpired(held)) {
      return held;
    }
    const pending = this.renewing.get(scope);
    if (pending) {
      return pending;
    }

    const renewal = (async () => {
      try {
        let fresh: Session;
        if (scope === this.homeScope) {
          this.logger.info('Re-authenticating', { siteScope: credentials.siteScope });
          fresh = await this.authenticate(credentials);
        } else {
          this.logger.info('Switching site', { siteContentUrl: scope });
          fresh = await this.switchTo(credentials.serverUrl, scope);
        }
        if (held) this.renewals++;
        this.sessions.set(scope, fresh);
        return fresh;
      } finally {
        this.renewing.delete(scope);
      }
    })();
    this.renewing.set(scope, renewal);

    return renewal;
  }

  /**
   * Switch from the home Session to `scope`. Failures surface as the raw
   * error so only the scans of that site fail.
   */
  private async switchTo(serverUrl: string, scope: string): Promise<Session> {
    const issuedAt = this.now();
    const result = await this.withSession((origin) =>
      this.retry.run(() => this.client.switchSite(origin, scope, this.signal), {
        ...this.authRetryPolicy,
        label: `auth.switchsite ${scope}`,
        signal: this.signal,
      }),
    );
    return this.toSession(serverUrl, result, issuedAt);
  }

  private async authenticate(credentials: AuthCredentials): Promise<Session> {
    const issuedAt = this.now();
    try {
      const result = await this.retry.run(
        () =>
          this.client.signIn(
            credentials.serverUrl,
            {
              tokenName: credentials.tokenName,
              tokenSecret: credentials.tokenSecret,
              siteContentUrl: credentials.siteScope,
            },
            this.signal,
          ),
        { ...this.authRetryPolicy, label: 'auth.signin', signal: this.signal },
      );
      return this.toSession(credentials.serverUrl, result, issuedAt);
    } catch (error) {
      if (error instanceof ScanCancelledError) {
        throw error;
      }
      const reason = authFailureReason(error);
      throw new AuthError(`Sign-in to ${credentials.serverUrl} failed (${reason}): ${describeError(error)}`, reason, {
        cause: error,
      });
    }
  }

  private toSession(serverUrl: string, result: SignInResult, issuedAt: number): Session {
    // Whichever is earlier: the server estimate or the configured TTL
    const ttl = result.expiresInMs === null ? this.sessionTtlMs : Math.min(result.expiresInMs, this.sessionTtlMs);

    return Object.freeze({
      serverUrl,
      token: result.token,
      siteId: result.siteId,
      siteContentUrl: result.siteContentUrl,
      userId: result.userId,
      issuedAt: new Date(issuedAt),
      expiresAt: new Date(issuedAt + ttl),
    });
  }
}

/**
 * Map a sign-in failure onto the AuthError reason.
 */
export function authFailureReason(error: unknown): AuthFailureReason {
  if (error instanceof ClientError) {
    if (error.status === 404) return 'unknown_site';
    if (error.status === 400 || error.status === 401 || error.status === 403) return 'bad_credentials';
  }
  // Exhausted retries, network failures and malformed responses
  return 'unreachable';
}
