/**
 * Tests for AuthSession
 *
 * @module session/__tests__/auth-session
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AuthError, ClientError, ServerError, UnauthorizedError } from '../../errors.js';
import { RetryExecutor } from '../../retry/retry-executor.js';
import { FakeBiApi, TEST_SERVER_URL, rawSite } from '../../__tests__/fake-bi-api.js';
import { AuthSession, authFailureReason, type AuthCredentials } from '../auth-session.js';

const CREDENTIALS: AuthCredentials = {
  serverUrl: TEST_SERVER_URL,
  tokenName: 'audit-pat',
  tokenSecret: 'test-secret',
  siteScope: '',
};

const MINUTE = 60 * 1000;

describe('AuthSession', () => {
  let api: FakeBiApi;
  let clock: number;
  let auth: AuthSession;

  beforeEach(() => {
    api = new FakeBiApi([{ site: rawSite('site-1', '') }]);
    clock = Date.parse('2026-03-01T00:00:00Z');
    auth = new AuthSession({
      client: api,
      retry: new RetryExecutor({ sleep: async () => undefined }),
      now: () => clock,
    });
  });

  describe('signIn', () => {
    it('should build a session from the sign-in response', async () => {
      const session = await auth.signIn(CREDENTIALS);

      expect(session.token).toBe('token-1');
      expect(session.siteId).toBe('site-1');
      expect(session.serverUrl).toBe(TEST_SERVER_URL);
      expect(session.expiresAt.getTime() - session.issuedAt.getTime()).toBe(240 * MINUTE);
      expect(Object.isFrozen(session)).toBe(true);
      expect(auth.current()).toBe(session);
    });

    it('should use the server expiry estimate when it is shorter', async () => {
      api.expiresInMs = 10 * MINUTE;

      const session = await auth.signIn(CREDENTIALS);

      expect(session.expiresAt.getTime()).toBe(clock + 10 * MINUTE);
    });

    it('should fail with bad_credentials when the server rejects the token', async () => {
      api.failNext('signIn', new UnauthorizedError('HTTP 401 Unauthorized'));

      const error = await auth.signIn(CREDENTIALS).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof AuthError && error.reason).toBe('bad_credentials');
      expect(api.calls.signIn).toBe(1);
    });

    it('should retry sign-in with the auth policy and then report unreachable', async () => {
      api.failNext('signIn', new ServerError('503', 503), new ServerError('503', 503), new ServerError('503', 503));

      const error = await auth.signIn(CREDENTIALS).catch((e: unknown) => e);

      expect(error instanceof AuthError && error.reason).toBe('unreachable');
      expect(api.calls.signIn).toBe(3);
    });
  });

  describe('ensureValid', () => {
    it('should return the current session while it is fresh', async () => {
      const session = await auth.signIn(CREDENTIALS);
      clock += 100 * MINUTE;

      await expect(auth.ensureValid()).resolves.toBe(session);
      expect(api.calls.signIn).toBe(1);
    });

    it('should renew once for concurrent callers after expiry', async () => {
      await auth.signIn(CREDENTIALS);
      // inside the one-minute skew before expiry
      clock += 239.5 * MINUTE;

      const sessions = await Promise.all([auth.ensureValid(), auth.ensureValid(), auth.ensureValid()]);

      expect(sessions.map((s) => s.token)).toEqual(['token-2', 'token-2', 'token-2']);
      expect(api.calls.signIn).toBe(2);
      expect(auth.renewalCount).toBe(1);
    });

    it('should fail with no_session before signIn', async () => {
      const error = await auth.ensureValid().catch((e: unknown) => e);

      expect(error instanceof AuthError && error.reason).toBe('no_session');
    });
  });

  describe('withSession', () => {
    it('should renew and re-run once when the token is rejected', async () => {
      const first = await auth.signIn(CREDENTIALS);
      api.revoked.add(first.token);

      const site = await auth.withSession((s) => api.querySite(s, 'site-1'));

      expect(site.id).toBe('site-1');
      expect(api.calls.querySite).toBe(2);
      expect(auth.current()?.token).toBe('token-2');
      expect(auth.renewalCount).toBe(1);
    });

    it('should share one renewal between concurrent rejected callers', async () => {
      const first = await auth.signIn(CREDENTIALS);
      api.revoked.add(first.token);

      await Promise.all([
        auth.withSession((s) => api.querySite(s, 'site-1')),
        auth.withSession((s) => api.querySite(s, 'site-1')),
      ]);

      expect(api.calls.signIn).toBe(2);
    });

    it('should pass other errors through untouched', async () => {
      await auth.signIn(CREDENTIALS);
      const failure = new ClientError('HTTP 404 Not Found', 404);
      api.failNext('querySite', failure);

      await expect(auth.withSession((s) => api.querySite(s, 'site-1'))).rejects.toBe(failure);
      expect(auth.renewalCount).toBe(0);
    });
  });

  describe('sessionFor', () => {
    const MARKETING = { contentUrl: 'marketing' };

    beforeEach(() => {
      api = new FakeBiApi([{ site: rawSite('site-1', '') }, { site: rawSite('site-2', 'marketing') }]);
      auth = new AuthSession({
        client: api,
        retry: new RetryExecutor({ sleep: async () => undefined }),
        now: () => clock,
      });
    });

    it('should return the home session for the signed-in site', async () => {
      const home = await auth.signIn(CREDENTIALS);

      await expect(auth.sessionFor({ contentUrl: '' })).resolves.toBe(home);
      expect(api.calls.switchSite).toBe(0);
    });

    it('should switch once per site and reuse the switched session', async () => {
      await auth.signIn(CREDENTIALS);

      const [first, second] = await Promise.all([auth.sessionFor(MARKETING), auth.sessionFor(MARKETING)]);
      const third = await auth.sessionFor(MARKETING);

      expect(first.siteId).toBe('site-2');
      expect(first.token).toBe('token-2');
      expect(second).toBe(first);
      expect(third).toBe(first);
      expect(api.calls.switchSite).toBe(1);
      expect(auth.renewalCount).toBe(0);
      expect(auth.current()?.siteId).toBe('site-1');
    });

    it('should renew only the scope whose token was rejected', async () => {
      const home = await auth.signIn(CREDENTIALS);
      const switched = await auth.sessionFor(MARKETING);
      api.revoked.add(switched.token);

      const site = await auth.withSession((s) => api.querySite(s, 'site-2'), null, MARKETING);

      expect(site.id).toBe('site-2');
      expect(api.calls.switchSite).toBe(2);
      expect(api.calls.signIn).toBe(1);
      expect(auth.current()).toBe(home);
      expect(auth.renewalCount).toBe(1);
    });

    it('should refuse a token issued for another site', async () => {
      await auth.signIn(CREDENTIALS);

      await expect(auth.withSession((s) => api.querySite(s, 'site-2'))).rejects.toMatchObject({ status: 403 });
    });

    it('should surface a failed switch without an auth failure', async () => {
      await auth.signIn(CREDENTIALS);

      const error = await auth.sessionFor({ contentUrl: 'unknown' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ClientError);
      expect(error).not.toBeInstanceOf(AuthError);
    });

    it('should sign out every session held', async () => {
      await auth.signIn(CREDENTIALS);
      await auth.sessionFor(MARKETING);

      await auth.signOut();

      expect(api.calls.signOut).toBe(2);
      expect(auth.current()).toBeNull();
    });
  });

  describe('signOut', () => {
    it('should sign out once and be safe to repeat', async () => {
      await auth.signIn(CREDENTIALS);

      await auth.signOut();
      await auth.signOut();

      expect(api.calls.signOut).toBe(1);
      expect(auth.current()).toBeNull();
    });

    it('should never throw when the server refuses', async () => {
      await auth.signIn(CREDENTIALS);
      api.failNext('signOut', new ClientError('HTTP 400 Bad Request', 400));

      await expect(auth.signOut()).resolves.toBeUndefined();
    });
  });
});

describe('authFailureReason', () => {
  it('should map statuses to reasons', () => {
    expect(authFailureReason(new ClientError('x', 404))).toBe('unknown_site');
    expect(authFailureReason(new ClientError('x', 403))).toBe('bad_credentials');
    expect(authFailureReason(new Error('socket hang up'))).toBe('unreachable');
  });
});
