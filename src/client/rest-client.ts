/**
 * REST Client - typed wrappers for the BI server REST API
 *
 * Stateless: every call takes the server URL (sign-in) or the Session. All
 * responses are validated before they leave this module.
 *
 * @module client/rest-client
 */

import type { Session } from '../types.js';
import type { HttpTransport } from './http-transport.js';
import {
  collectionItems,
  expectObject,
  expectString,
  optionalNumber,
  optionalObject,
  optionalString,
  type JsonObject,
} from './wire.js';

// -- Constants ----------------------------------------------------------------

export const DEFAULT_API_VERSION = '3.19';

const AUTH_HEADER = 'X-Tableau-Auth';

// -- Types --------------------------------------------------------------------

export interface PatCredentials {
  tokenName: string;
  tokenSecret: string;
  /** Content URL of the site to sign in to ("" = default site) */
  siteContentUrl: string;
}

export interface SignInResult {
  token: string;
  siteId: string;
  siteContentUrl: string;
  userId: string;
  /** Server estimate of token lifetime in ms, when reported */
  expiresInMs: number | null;
}

export interface PageParams {
  pageNumber: number;
  pageSize: number;
}

export interface PagedResult<T> {
  items: T[];
  pageNumber: number;
  pageSize: number;
  totalAvailable: number;
}

export interface RawSite {
  id: string;
  name: string;
  contentUrl: string;
  adminMode: string | null;
  state: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  userQuota: number | null;
  storageQuota: number | null;
}

export interface RawUser {
  id: string;
  name: string;
  fullName: string | null;
  email: string | null;
  siteRole: string | null;
  lastLogin: string | null;
  domainName: string | null;
}

export interface RawContentItem {
  id: string;
  name: string;
  contentUrl: string | null;
  projectName: string | null;
  ownerId: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  sizeBytes: number | null;
}

export interface RawExtractTask {
  id: string;
  priority: number | null;
  taskType: string | null;
  targetType: 'workbook' | 'datasource' | null;
  targetId: string | null;
  consecutiveFailedCount: number | null;
  frequency: string | null;
  nextRunAt: string | null;
  /** frequencyDetails.start, "HH:MM:SS" */
  startTime: string | null;
}

export interface RestClientConfig {
  apiVersion: string;
}

// -- Parsing ------------------------------------------------------------------

function parsePagination(body: JsonObject, requested: PageParams, itemCount: number): Omit<PagedResult<never>, 'items'> {
  const pagination = optionalObject(body, 'pagination');
  if (!pagination) {
    // Unpaginated response: everything arrived in one page
    return { pageNumber: requested.pageNumber, pageSize: requested.pageSize, totalAvailable: itemCount };
  }
  return {
    pageNumber: optionalNumber(pagination, 'pageNumber') ?? requested.pageNumber,
    pageSize: optionalNumber(pagination, 'pageSize') ?? requested.pageSize,
    totalAvailable: optionalNumber(pagination, 'totalAvailable') ?? itemCount,
  };
}

/**
 * "HHH:MM:SS" -> ms
 */
export function parseDurationHms(value: string | null): number | null {
  if (value === null) return null;
  const match = /^(\d+):(\d{1,2}):(\d{1,2})$/.exec(value.trim());
  if (!match) return null;
  const [, hours, minutes, seconds] = match;
  return ((Number(hours) * 60 + Number(minutes)) * 60 + Number(seconds)) * 1000;
}

export function parseSite(raw: JsonObject, path = 'site'): RawSite {
  return {
    id: expectString(raw, 'id', path),
    name: expectString(raw, 'name', path),
    contentUrl: optionalString(raw, 'contentUrl') ?? '',
    adminMode: optionalString(raw, 'adminMode'),
    state: optionalString(raw, 'state'),
    createdAt: optionalString(raw, 'createdAt'),
    updatedAt: optionalString(raw, 'updatedAt'),
    userQuota: optionalNumber(raw, 'userQuota'),
    storageQuota: optionalNumber(raw, 'storageQuota'),
  };
}

export function parseUser(raw: JsonObject, path = 'user'): RawUser {
  const domain = optionalObject(raw, 'domain');
  return {
    id: expectString(raw, 'id', path),
    name: expectString(raw, 'name', path),
    fullName: optionalString(raw, 'fullName'),
    email: optionalString(raw, 'email'),
    siteRole: optionalString(raw, 'siteRole'),
    lastLogin: optionalString(raw, 'lastLogin'),
    domainName: domain ? optionalString(domain, 'name') : null,
  };
}

export function parseContentItem(raw: JsonObject, path: string): RawContentItem {
  const project = optionalObject(raw, 'project');
  const owner = optionalObject(raw, 'owner');
  return {
    id: expectString(raw, 'id', path),
    name: expectString(raw, 'name', path),
    contentUrl: optionalString(raw, 'contentUrl'),
    projectName: project ? optionalString(project, 'name') : null,
    ownerId: owner ? optionalString(owner, 'id') : null,
    createdAt: optionalString(raw, 'createdAt'),
    updatedAt: optionalString(raw, 'updatedAt'),
    sizeBytes: optionalNumber(raw, 'size'),
  };
}

export function parseExtractTask(raw: JsonObject, path: string): RawExtractTask {
  const refresh = expectObject(raw.extractRefresh, `${path}.extractRefresh`);
  const schedule = optionalObject(refresh, 'schedule');
  const details = schedule ? optionalObject(schedule, 'frequencyDetails') : null;
  const workbook = optionalObject(refresh, 'workbook');
  const datasource = optionalObject(refresh, 'datasource');

  let targetType: RawExtractTask['targetType'] = null;
  let targetId: string | null = null;
  if (workbook) {
    targetType = 'workbook';
    targetId = optionalString(workbook, 'id');
  } else if (datasource) {
    targetType = 'datasource';
    targetId = optionalString(datasource, 'id');
  }

  return {
    id: expectString(refresh, 'id', `${path}.extractRefresh`),
    priority: optionalNumber(refresh, 'priority'),
    taskType: optionalString(refresh, 'type'),
    targetType,
    targetId,
    consecutiveFailedCount: optionalNumber(refresh, 'consecutiveFailedCount'),
    frequency: schedule ? optionalString(schedule, 'frequency') : null,
    nextRunAt: schedule ? optionalString(schedule, 'nextRunAt') : null,
    startTime: details ? optionalString(details, 'start') : null,
  };
}

export function parseCredentials(body: unknown): SignInResult {
  const creds = expectObject(expectObject(body, 'response').credentials, 'credentials');
  const site = expectObject(creds.site, 'credentials.site');
  const user = expectObject(creds.user, 'credentials.user');

  return {
    token: expectString(creds, 'token', 'credentials'),
    siteId: expectString(site, 'id', 'credentials.site'),
    siteContentUrl: optionalString(site, 'contentUrl') ?? '',
    userId: expectString(user, 'id', 'credentials.user'),
    expiresInMs: parseDurationHms(optionalString(creds, 'estimatedTimeToExpiration')),
  };
}

// -- RestClient class ---------------------------------------------------------

export class RestClient {
  private readonly apiVersion: string;

  constructor(
    private readonly transport: HttpTransport,
    config: Partial<RestClientConfig> = {},
  ) {
    this.apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
  }

  private apiBase(serverUrl: string): string {
    return `${serverUrl.replace(/\/+$/, '')}/api/${this.apiVersion}`;
  }

  private async get(session: Session, path: string, signal?: AbortSignal): Promise<JsonObject> {
    const body = await this.transport.request({
      method: 'GET',
      url: `${this.apiBase(session.serverUrl)}${path}`,
      headers: { [AUTH_HEADER]: session.token },
      signal,
    });
    return expectObject(body, 'response');
  }

  /** Sign in with a personal access token. */
  async signIn(serverUrl: string, credentials: PatCredentials, signal?: AbortSignal): Promise<SignInResult> {
    const body = await this.transport.request({
      method: 'POST',
      url: `${this.apiBase(serverUrl)}/auth/signin`,
      body: {
        credentials: {
          personalAccessTokenName: credentials.tokenName,
          personalAccessTokenSecret: credentials.tokenSecret,
          site: { contentUrl: credentials.siteContentUrl },
        },
      },
      signal,
    });

    return parseCredentials(body);
  }

  /**
   * Exchange a token for one scoped to another site on the same server.
   * The server answers with fresh credentials; the old token is invalidated.
   */
  async switchSite(session: Session, siteContentUrl: string, signal?: AbortSignal): Promise<SignInResult> {
    const body = await this.transport.request({
      method: 'POST',
      url: `${this.apiBase(session.serverUrl)}/auth/switchSite`,
      headers: { [AUTH_HEADER]: session.token },
      body: { site: { contentUrl: siteContentUrl } },
      signal,
    });
    return parseCredentials(body);
  }

  /** Invalidate the session token server-side. */
  async signOut(session: Session, signal?: AbortSignal): Promise<void> {
    await this.transport.request({
      method: 'POST',
      url: `${this.apiBase(session.serverUrl)}/auth/signout`,
      headers: { [AUTH_HEADER]: session.token },
      signal,
    });
  }

  /** Server-level site listing. Requires a server administrator token. */
  async querySitesPage(session: Session, page: PageParams, signal?: AbortSignal): Promise<PagedResult<RawSite>> {
    const body = await this.get(session, `/sites?${pageQuery(page)}`, signal);
    const items = collectionItems(body, 'sites', 'site').map((raw, i) => parseSite(raw, `sites.site[${i}]`));
    return { items, ...parsePagination(body, page, items.length) };
  }

  async querySite(session: Session, siteId: string, signal?: AbortSignal): Promise<RawSite> {
    const body = await this.get(session, `/sites/${encodeURIComponent(siteId)}`, signal);
    return parseSite(expectObject(body.site, 'site'));
  }

  async queryUsersPage(
    session: Session,
    siteId: string,
    page: PageParams,
    signal?: AbortSignal,
  ): Promise<PagedResult<RawUser>> {
    const body = await this.get(
      session,
      `/sites/${encodeURIComponent(siteId)}/users?${pageQuery(page)}&fields=_all_`,
      signal,
    );
    const items = collectionItems(body, 'users', 'user').map((raw, i) => parseUser(raw, `users.user[${i}]`));
    return { items, ...parsePagination(body, page, items.length) };
  }

  async queryWorkbooksPage(
    session: Session,
    siteId: string,
    page: PageParams,
    signal?: AbortSignal,
  ): Promise<PagedResult<RawContentItem>> {
    const body = await this.get(session, `/sites/${encodeURIComponent(siteId)}/workbooks?${pageQuery(page)}`, signal);
    const items = collectionItems(body, 'workbooks', 'workbook').map((raw, i) =>
      parseContentItem(raw, `workbooks.workbook[${i}]`),
    );
    return { items, ...parsePagination(body, page, items.length) };
  }

  async queryDatasourcesPage(
    session: Session,
    siteId: string,
    page: PageParams,
    signal?: AbortSignal,
  ): Promise<PagedResult<RawContentItem>> {
    const body = await this.get(
      session,
      `/sites/${encodeURIComponent(siteId)}/datasources?${pageQuery(page)}`,
      signal,
    );
    const items = collectionItems(body, 'datasources', 'datasource').map((raw, i) =>
      parseContentItem(raw, `datasources.datasource[${i}]`),
    );
    return { items, ...parsePagination(body, page, items.length) };
  }

  /** Extract refresh tasks are not paginated by the server. */
  async queryExtractRefreshTasks(session: Session, siteId: string, signal?: AbortSignal): Promise<RawExtractTask[]> {
    const body = await this.get(session, `/sites/${encodeURIComponent(siteId)}/tasks/extractRefreshes`, signal);
    return collectionItems(body, 'tasks', 'task').map((raw, i) => parseExtractTask(raw, `tasks.task[${i}]`));
  }
}

function pageQuery(page: PageParams): string {
  return `pageSize=${page.pageSize}&pageNumber=${page.pageNumber}`;
}

/**
 * Next page number, or null when the listing is complete.
 */
export function nextPageNumber(result: Omit<PagedResult<unknown>, 'items'>, itemsOnPage: number): number | null {
  if (itemsOnPage === 0) return null;
  return result.pageNumber * result.pageSize < result.totalAvailable ? result.pageNumber + 1 : null;
}
