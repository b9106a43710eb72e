/**
 * Tests for ResourceScanner and the resource capabilities
 *
 * @module scanning/__tests__/resource-scanner
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ExhaustedRetriesError, GovernanceError, ServerError } from '../../errors.js';
import { RetryExecutor } from '../../retry/retry-executor.js';
import { AuthSession } from '../../session/auth-session.js';
import {
  FakeBiApi,
  TEST_SERVER_URL,
  rawContent,
  rawSite,
  rawTask,
  rawUser,
} from '../../__tests__/fake-bi-api.js';
import type { ResourceRecord, Session, SiteDescriptor } from '../../types.js';
import { createCapabilities, pageFromCursor, type CapabilityRegistry } from '../capabilities.js';
import { ResourceScanner } from '../resource-scanner.js';

const SITE: SiteDescriptor = { id: 'site-1', contentUrl: 'finance', name: 'Finance' };

async function collect(scan: AsyncIterable<ResourceRecord>): Promise<ResourceRecord[]> {
  const records: ResourceRecord[] = [];
  for await (const record of scan) {
    records.push(record);
  }
  return records;
}

describe('ResourceScanner', () => {
  let api: FakeBiApi;
  let auth: AuthSession;
  let session: Session;
  let scanner: ResourceScanner;
  let capabilities: CapabilityRegistry;

  beforeEach(async () => {
    api = new FakeBiApi([
      {
        site: { ...rawSite('site-1', 'finance', null), createdAt: '2021-06-01T00:00:00Z' },
        users: ['u1', 'u2', 'u3', 'u4', 'u5'].map((id) => rawUser(id, '2025-01-01T00:00:00Z')),
        workbooks: [rawContent('w1', '2024-02-03T04:05:06Z')],
        tasks: [rawTask('t1', '09:30:00')],
      },
    ]);
    const retry = new RetryExecutor({ sleep: async () => undefined, policy: { maxAttempts: 2 } });
    auth = new AuthSession({ client: api, retry });
    session = await auth.signIn({ serverUrl: TEST_SERVER_URL, tokenName: 'n', tokenSecret: 'test-secret', siteScope: '' });
    scanner = new ResourceScanner({ auth, retry, pageSize: 2 });
    capabilities = createCapabilities(api);
  });

  it('should not fetch anything until iterated', () => {
    scanner.scan(session, SITE, capabilities.users);

    expect(api.calls.queryUsersPage).toBe(0);
  });

  it('should yield every record across pages', async () => {
    const scan = scanner.scan(session, SITE, capabilities.users);

    const records = await collect(scan);

    expect(records.map((r) => r.id)).toEqual(['u1', 'u2', 'u3', 'u4', 'u5']);
    expect(api.calls.queryUsersPage).toBe(3);
    expect(scan.progress()).toEqual({ cursor: null, pagesFetched: 3, recordsDelivered: 5, buffered: 0, done: true });
  });

  it('should build frozen records from the capability', async () => {
    const [user] = await collect(scanner.scan(session, SITE, capabilities.users));

    expect(user.type).toBe('users');
    expect(user.name).toBe('user-u1');
    expect(user.ownerId).toBeNull();
    expect(user.lastActivityAt?.toISOString()).toBe('2025-01-01T00:00:00.000Z');
    expect(user.metadata.siteRole).toBe('Viewer');
    expect(Object.isFrozen(user)).toBe(true);
    expect(Object.isFrozen(user.metadata)).toBe(true);
  });

  it('should resume after a failed page without repeating or skipping records', async () => {
    api.failPage('queryUsersPage', 2, new ServerError('HTTP 503', 503));
    const scan = scanner.scan(session, SITE, capabilities.users);
    const seen: string[] = [];

    const error = await (async () => {
      for await (const record of scan) seen.push(record.id);
    })().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExhaustedRetriesError);
    expect(seen).toEqual(['u1', 'u2']);
    expect(scan.progress()).toMatchObject({ cursor: '2', pagesFetched: 1, recordsDelivered: 2, done: false });

    api.clearPageFailures();
    for await (const record of scan) seen.push(record.id);

    expect(seen).toEqual(['u1', 'u2', 'u3', 'u4', 'u5']);
  });

  it('should keep undelivered buffered records when the consumer stops early', async () => {
    const scan = scanner.scan(session, SITE, capabilities.users);

    for await (const record of scan) {
      if (record.id === 'u1') break;
    }
    const rest = await collect(scan);

    expect(rest.map((r) => r.id)).toEqual(['u2', 'u3', 'u4', 'u5']);
  });

  it('should refuse concurrent iteration of one scan', async () => {
    const scan = scanner.scan(session, SITE, capabilities.users);
    const first = scan[Symbol.asyncIterator]();
    await first.next();

    const second = scan[Symbol.asyncIterator]();
    const error = await second.next().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GovernanceError);
    expect(error instanceof GovernanceError && error.code).toBe('SCAN_IN_PROGRESS');
    await first.return(undefined);
  });

  it('should renew the session between pages when the token is revoked', async () => {
    const scan = scanner.scan(session, SITE, capabilities.users);
    const iterator = scan[Symbol.asyncIterator]();
    await iterator.next();
    api.revoked.add(session.token);

    const rest: string[] = [];
    for (let step = await iterator.next(); !step.done; step = await iterator.next()) {
      rest.push(step.value.id);
    }

    expect(rest).toEqual(['u2', 'u3', 'u4', 'u5']);
    expect(auth.renewalCount).toBe(1);
  });

  it('should scan the site record with createdAt as the activity fallback', async () => {
    const [site] = await collect(scanner.scan(session, SITE, capabilities.sites));

    expect(site.type).toBe('sites');
    expect(site.lastActivityAt?.toISOString()).toBe('2021-06-01T00:00:00.000Z');
    expect(api.calls.querySite).toBe(1);
  });

  it('should describe extract tasks with their schedule', async () => {
    const [task] = await collect(scanner.scan(session, SITE, capabilities.extracts));

    expect(task.name).toBe('workbook wb-t1');
    expect(task.schedule).toEqual({ runTime: '09:30:00', frequency: 'Daily' });
    expect(task.lastActivityAt?.toISOString()).toBe('2026-01-02T09:00:00.000Z');
  });

  it('should return an empty scan for a site without content', async () => {
    const records = await collect(scanner.scan(session, SITE, capabilities.datasources));

    expect(records).toEqual([]);
    expect(api.calls.queryDatasourcesPage).toBe(1);
  });
});

describe('pageFromCursor', () => {
  it('should start at page 1 and reject malformed cursors', () => {
    expect(pageFromCursor(null)).toBe(1);
    expect(pageFromCursor('3')).toBe(3);
    expect(() => pageFromCursor('0')).toThrow(RangeError);
    expect(() => pageFromCursor('abc')).toThrow('Invalid page cursor: abc');
  });
});
