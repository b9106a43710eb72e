/**
 * Resource Capabilities
 *
 * One capability per resource type: how to fetch a page of raw items, where
 * the activity timestamp lives, and how a raw item becomes a ResourceRecord.
 * The scanner itself knows nothing about any particular endpoint.
 *
 * @module scanning/capabilities
 */

import {
  nextPageNumber,
  type PagedResult,
  type RawContentItem,
  type RawExtractTask,
  type RawSite,
  type RawUser,
  type RestClient,
} from '../client/rest-client.js';
import { parseTimestamp } from '../client/wire.js';
import type { ResourceType, ScheduleInfo, Session, SiteDescriptor } from '../types.js';

// =============================================================================
// Capability Contract
// =============================================================================

export interface PageRequest {
  session: Session;
  site: SiteDescriptor;
  /** null requests the first page */
  cursor: string | null;
  pageSize: number;
  signal?: AbortSignal;
}

export interface Page<Raw> {
  items: Raw[];
  /** null when this was the last page */
  nextCursor: string | null;
}

export interface RecordDescription {
  id: string;
  name: string;
  ownerId: string | null;
  metadata: Record<string, unknown>;
  schedule?: ScheduleInfo;
}

export type PolicyKind = 'age' | 'schedule';

export interface ResourceCapability<Raw> {
  readonly tag: ResourceType;
  readonly policyKind: PolicyKind;
  fetchPage(request: PageRequest): Promise<Page<Raw>>;
  extractActivity(raw: Raw): Date | null;
  describe(raw: Raw): RecordDescription;
}

export type UsersCapability = ResourceCapability<RawUser> & { readonly tag: 'users'; readonly policyKind: 'age' };
export type WorkbooksCapability = ResourceCapability<RawContentItem> & {
  readonly tag: 'workbooks';
  readonly policyKind: 'age';
};
export type DatasourcesCapability = ResourceCapability<RawContentItem> & {
  readonly tag: 'datasources';
  readonly policyKind: 'age';
};
export type SitesCapability = ResourceCapability<RawSite> & { readonly tag: 'sites'; readonly policyKind: 'age' };
export type ExtractsCapability = ResourceCapability<RawExtractTask> & {
  readonly tag: 'extracts';
  readonly policyKind: 'schedule';
};

export type Capability =
  | UsersCapability
  | WorkbooksCapability
  | DatasourcesCapability
  | SitesCapability
  | ExtractsCapability;

export type CapabilityRegistry = { readonly [K in ResourceType]: Extract<Capability, { tag: K }> };

export type ResourceApi = Pick<
  RestClient,
  'queryUsersPage' | 'queryWorkbooksPage' | 'queryDatasourcesPage' | 'querySite' | 'queryExtractRefreshTasks'
>;

// =============================================================================
// Cursor Helpers
// =============================================================================

export function pageFromCursor(cursor: string | null): number {
  if (cursor === null) return 1;
  const page = Number(cursor);
  if (!Number.isInteger(page) || page < 1) {
    throw new RangeError(`Invalid page cursor: ${cursor}`);
  }
  return page;
}

function toPage<T>(result: PagedResult<T>): Page<T> {
  const next = nextPageNumber(result, result.items.length);
  return { items: result.items, nextCursor: next === null ? null : String(next) };
}

function describeContent(raw: RawContentItem): RecordDescription {
  return {
    id: raw.id,
    name: raw.name,
    ownerId: raw.ownerId,
    metadata: {
      contentUrl: raw.contentUrl,
      projectName: raw.projectName,
      createdAt: raw.createdAt,
      updatedAt: raw.updatedAt,
      sizeBytes: raw.sizeBytes,
    },
  };
}

// =============================================================================
// Capabilities
// =============================================================================

export function createCapabilities(client: ResourceApi): CapabilityRegistry {
  const users: UsersCapability = {
    tag: 'users',
    policyKind: 'age',
    async fetchPage({ session, site, cursor, pageSize, signal }) {
      return toPage(await client.queryUsersPage(session, site.id, { pageNumber: pageFromCursor(cursor), pageSize }, signal));
    },
    extractActivity: (raw) => parseTimestamp(raw.lastLogin),
    describe: (raw) => ({
      id: raw.id,
      name: raw.name,
      ownerId: null,
      metadata: {
        fullName: raw.fullName,
        email: raw.email,
        siteRole: raw.siteRole,
        domainName: raw.domainName,
        lastLogin: raw.lastLogin,
      },
    }),
  };

  const workbooks: WorkbooksCapability = {
    tag: 'workbooks',
    policyKind: 'age',
    async fetchPage({ session, site, cursor, pageSize, signal }) {
      return toPage(
        await client.queryWorkbooksPage(session, site.id, { pageNumber: pageFromCursor(cursor), pageSize }, signal),
      );
    },
    extractActivity: (raw) => parseTimestamp(raw.updatedAt),
    describe: describeContent,
  };

  const datasources: DatasourcesCapability = {
    tag: 'datasources',
    policyKind: 'age',
    async fetchPage({ session, site, cursor, pageSize, signal }) {
      return toPage(
        await client.queryDatasourcesPage(session, site.id, { pageNumber: pageFromCursor(cursor), pageSize }, signal),
      );
    },
    extractActivity: (raw) => parseTimestamp(raw.updatedAt),
    describe: describeContent,
  };

  // The site record itself; always a single page
  const sites: SitesCapability = {
    tag: 'sites',
    policyKind: 'age',
    async fetchPage({ session, site, signal }) {
      return { items: [await client.querySite(session, site.id, signal)], nextCursor: null };
    },
    extractActivity: (raw) => parseTimestamp(raw.updatedAt) ?? parseTimestamp(raw.createdAt),
    describe: (raw) => ({
      id: raw.id,
      name: raw.name,
      ownerId: null,
      metadata: {
        contentUrl: raw.contentUrl,
        state: raw.state,
        adminMode: raw.adminMode,
        createdAt: raw.createdAt,
        updatedAt: raw.updatedAt,
        userQuota: raw.userQuota,
        storageQuota: raw.storageQuota,
      },
    }),
  };

  // Extract refresh tasks are returned in one response
  const extracts: ExtractsCapability = {
    tag: 'extracts',
    policyKind: 'schedule',
    async fetchPage({ session, site, signal }) {
      return { items: await client.queryExtractRefreshTasks(session, site.id, signal), nextCursor: null };
    },
    extractActivity: (raw) => parseTimestamp(raw.nextRunAt),
    describe: (raw) => ({
      id: raw.id,
      name: raw.targetId ? `${raw.targetType ?? 'extract'} ${raw.targetId}` : `extract task ${raw.id}`,
      ownerId: null,
      schedule: { runTime: raw.startTime, frequency: raw.frequency },
      metadata: {
        priority: raw.priority,
        taskType: raw.taskType,
        targetType: raw.targetType,
        targetId: raw.targetId,
        consecutiveFailedCount: raw.consecutiveFailedCount,
        nextRunAt: raw.nextRunAt,
      },
    }),
  };

  return { users, workbooks, datasources, sites, extracts };
}
