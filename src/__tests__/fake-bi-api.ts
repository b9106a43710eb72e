/**
 * In-process stand-in for the BI server REST API, used by the scanning and
 * run tests. Failures are queued per method and thrown on the next call.
 *
 * Tokens are bound to the site they were issued for: a site-path call made
 * with another site's token is refused with 403, as the server does.
 */

import { ClientError, UnauthorizedError } from '../errors.js';
import type {
  PageParams,
  PagedResult,
  PatCredentials,
  RawContentItem,
  RawExtractTask,
  RawSite,
  RawUser,
  SignInResult,
} from '../client/rest-client.js';
import type { GovernanceApi } from '../run/governance-run.js';
import type { Session } from '../types.js';

export type FakeMethod =
  | 'signIn'
  | 'signOut'
  | 'switchSite'
  | 'querySitesPage'
  | 'querySite'
  | 'queryUsersPage'
  | 'queryWorkbooksPage'
  | 'queryDatasourcesPage'
  | 'queryExtractRefreshTasks';

export interface FakeSite {
  site: RawSite;
  users?: RawUser[];
  workbooks?: RawContentItem[];
  datasources?: RawContentItem[];
  tasks?: RawExtractTask[];
}

export const TEST_SERVER_URL = 'https://bi.example.test';

export function testSession(overrides: Partial<Session> = {}): Session {
  return {
    serverUrl: TEST_SERVER_URL,
    token: 'test-token',
    siteId: 'site-default',
    siteContentUrl: '',
    userId: 'user-admin',
    issuedAt: new Date('2026-01-01T00:00:00Z'),
    expiresAt: new Date('2026-01-01T04:00:00Z'),
    ...overrides,
  };
}

export function rawSite(id: string, contentUrl: string, updatedAt: string | null = null): RawSite {
  return {
    id,
    name: `Site ${id}`,
    contentUrl,
    adminMode: 'ContentAndUsers',
    state: 'Active',
    createdAt: '2020-01-01T00:00:00Z',
    updatedAt,
    userQuota: null,
    storageQuota: null,
  };
}

export function rawUser(id: string, lastLogin: string | null): RawUser {
  return {
    id,
    name: `user-${id}`,
    fullName: null,
    email: null,
    siteRole: 'Viewer',
    lastLogin,
    domainName: 'local',
  };
}

export function rawContent(id: string, updatedAt: string | null): RawContentItem {
  return {
    id,
    name: `content-${id}`,
    contentUrl: id,
    projectName: 'Default',
    ownerId: 'owner-1',
    createdAt: '2020-01-01T00:00:00Z',
    updatedAt,
    sizeBytes: 1024,
  };
}

export function rawTask(id: string, startTime: string | null): RawExtractTask {
  return {
    id,
    priority: 50,
    taskType: 'RefreshExtractTask',
    targetType: 'workbook',
    targetId: `wb-${id}`,
    consecutiveFailedCount: 0,
    frequency: 'Daily',
    nextRunAt: '2026-01-02T09:00:00Z',
    startTime,
  };
}

function page<T>(items: readonly T[], params: PageParams): PagedResult<T> {
  const start = (params.pageNumber - 1) * params.pageSize;
  return {
    items: items.slice(start, start + params.pageSize),
    pageNumber: params.pageNumber,
    pageSize: params.pageSize,
    totalAvailable: items.length,
  };
}

export class FakeBiApi implements GovernanceApi {
  readonly calls: Record<FakeMethod, number> = {
    signIn: 0,
    signOut: 0,
    switchSite: 0,
    querySitesPage: 0,
    querySite: 0,
    queryUsersPage: 0,
    queryWorkbooksPage: 0,
    queryDatasourcesPage: 0,
    queryExtractRefreshTasks: 0,
  };
  /** Tokens the server no longer accepts */
  readonly revoked = new Set<string>();
  /** Server estimate returned from sign-in, ms */
  expiresInMs: number | null = null;

  private readonly failures = new Map<FakeMethod, unknown[]>();
  private readonly pageFailures = new Map<string, unknown>();
  private tokens = 0;
  /** token -> id of the site it was issued for */
  private readonly tokenSites = new Map<string, string>();

  constructor(private readonly sites: FakeSite[]) {}

  /** Queue errors thrown by the next calls of `method`, in order. */
  failNext(method: FakeMethod, ...errors: unknown[]): this {
    this.failures.set(method, [...(this.failures.get(method) ?? []), ...errors]);
    return this;
  }

  /** Fail every request for one page of a paged method. */
  failPage(method: FakeMethod, pageNumber: number, error: unknown): this {
    this.pageFailures.set(`${method}#${pageNumber}`, error);
    return this;
  }

  clearPageFailures(): this {
    this.pageFailures.clear();
    return this;
  }

  async signIn(_serverUrl: string, credentials: PatCredentials): Promise<SignInResult> {
    this.enter('signIn');
    const found = this.sites.find((s) => s.site.contentUrl === credentials.siteContentUrl) ?? this.sites[0];
    return this.issue(found ? found.site : rawSite('site-default', credentials.siteContentUrl));
  }

  async signOut(session: Session): Promise<void> {
    this.enter('signOut', session);
  }

  /** The origin token stays valid after a switch. */
  async switchSite(session: Session, siteContentUrl: string): Promise<SignInResult> {
    this.enter('switchSite', session);
    const found = this.sites.find((s) => s.site.contentUrl === siteContentUrl);
    if (!found) throw new ClientError('HTTP 404 Not Found', 404);
    return this.issue(found.site);
  }

  async querySitesPage(session: Session, params: PageParams): Promise<PagedResult<RawSite>> {
    this.enter('querySitesPage', session, params.pageNumber);
    return page(
      this.sites.map((s) => s.site),
      params,
    );
  }

  async querySite(session: Session, siteId: string): Promise<RawSite> {
    this.enter('querySite', session, undefined, siteId);
    return this.site(siteId).site;
  }

  async queryUsersPage(session: Session, siteId: string, params: PageParams): Promise<PagedResult<RawUser>> {
    this.enter('queryUsersPage', session, params.pageNumber, siteId);
    return page(this.site(siteId).users ?? [], params);
  }

  async queryWorkbooksPage(session: Session, siteId: string, params: PageParams): Promise<PagedResult<RawContentItem>> {
    this.enter('queryWorkbooksPage', session, params.pageNumber, siteId);
    return page(this.site(siteId).workbooks ?? [], params);
  }

  async queryDatasourcesPage(
    session: Session,
    siteId: string,
    params: PageParams,
  ): Promise<PagedResult<RawContentItem>> {
    this.enter('queryDatasourcesPage', session, params.pageNumber, siteId);
    return page(this.site(siteId).datasources ?? [], params);
  }

  async queryExtractRefreshTasks(session: Session, siteId: string): Promise<RawExtractTask[]> {
    this.enter('queryExtractRefreshTasks', session, undefined, siteId);
    return [...(this.site(siteId).tasks ?? [])];
  }

  private issue(site: RawSite): SignInResult {
    this.tokens++;
    const token = `token-${this.tokens}`;
    this.tokenSites.set(token, site.id);
    return {
      token,
      siteId: site.id,
      siteContentUrl: site.contentUrl,
      userId: 'user-admin',
      expiresInMs: this.expiresInMs,
    };
  }

  private enter(method: FakeMethod, session?: Session, pageNumber?: number, siteId?: string): void {
    this.calls[method]++;
    const queued = this.failures.get(method);
    if (queued && queued.length > 0) {
      throw queued.shift();
    }
    const key = `${method}#${pageNumber}`;
    if (pageNumber !== undefined && this.pageFailures.has(key)) {
      throw this.pageFailures.get(key);
    }
    if (session && this.revoked.has(session.token)) {
      throw new UnauthorizedError('HTTP 401 Unauthorized');
    }
    const tokenSite = session ? this.tokenSites.get(session.token) : undefined;
    if (siteId !== undefined && tokenSite !== undefined && tokenSite !== siteId) {
      throw new ClientError('HTTP 403 Forbidden', 403);
    }
  }

  private site(siteId: string): FakeSite {
    const found = this.sites.find((s) => s.site.id === siteId);
    if (!found) throw new Error(`unknown site ${siteId}`);
    return found;
  }
}
