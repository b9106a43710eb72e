/**
 * Resource Scanner - lazy, resumable paginated scans
 *
 * A ResourceScan keeps its position between iterations: the cursor of the
 * next page to fetch and any records already fetched but not yet handed
 * out. When a page fetch fails (after the retry layer gave up) the error
 * propagates to the consumer, and iterating the same scan again continues
 * from that exact point. Every record is yielded once.
 *
 * @module scanning/resource-scanner
 */

import { GovernanceError } from '../errors.js';
import type { RetryExecutor } from '../retry/retry-executor.js';
import type { AuthSession } from '../session/auth-session.js';
import type { ResourceRecord, ResourceType, Session, SiteDescriptor } from '../types.js';
import type { Page, ResourceCapability } from './capabilities.js';

export const DEFAULT_PAGE_SIZE = 100;

export interface ScanProgress {
  readonly cursor: string | null;
  readonly pagesFetched: number;
  readonly recordsDelivered: number;
  readonly buffered: number;
  readonly done: boolean;
}

export interface ResourceScannerOptions {
  auth: AuthSession;
  retry: RetryExecutor;
  pageSize?: number;
  signal?: AbortSignal;
}

/**
 * Build the frozen ResourceRecord for one raw item.
 */
export function toResourceRecord<Raw>(capability: ResourceCapability<Raw>, raw: Raw): ResourceRecord {
  const description = capability.describe(raw);
  const record: ResourceRecord = {
    type: capability.tag,
    id: description.id,
    name: description.name,
    ownerId: description.ownerId,
    lastActivityAt: capability.extractActivity(raw),
    metadata: Object.freeze({ ...description.metadata }),
    ...(description.schedule ? { schedule: Object.freeze({ ...description.schedule }) } : {}),
  };
  return Object.freeze(record);
}

export class ResourceScan<Raw = unknown> implements AsyncIterable<ResourceRecord> {
  private cursor: string | null = null;
  private buffer: ResourceRecord[] = [];
  private done = false;
  private iterating = false;
  private pagesFetched = 0;
  private recordsDelivered = 0;

  constructor(
    readonly site: SiteDescriptor,
    private readonly capability: ResourceCapability<Raw>,
    private readonly fetchPage: (cursor: string | null) => Promise<Page<Raw>>,
  ) {}

  get resourceType(): ResourceType {
    return this.capability.tag;
  }

  progress(): ScanProgress {
    return {
      cursor: this.cursor,
      pagesFetched: this.pagesFetched,
      recordsDelivered: this.recordsDelivered,
      buffered: this.buffer.length,
      done: this.done,
    };
  }

  /**
   * @throws GovernanceError (SCAN_IN_PROGRESS) when already being iterated
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<ResourceRecord, void, undefined> {
    if (this.iterating) {
      throw new GovernanceError(
        `Scan of ${this.capability.tag} on site ${this.site.name} is already being iterated`,
        'SCAN_IN_PROGRESS',
      );
    }
    this.iterating = true;

    try {
      for (;;) {
        let next = this.buffer.shift();
        while (next !== undefined) {
          this.recordsDelivered++;
          yield next;
          next = this.buffer.shift();
        }

        if (this.done) {
          return;
        }

        // Cursor and buffer only advance once the page is in hand
        const page = await this.fetchPage(this.cursor);
        this.pagesFetched++;
        for (const raw of page.items) {
          this.buffer.push(toResourceRecord(this.capability, raw));
        }
        this.cursor = page.nextCursor;
        this.done = page.nextCursor === null;
      }
    } finally {
      this.iterating = false;
    }
  }
}

export class ResourceScanner {
  private readonly pageSize: number;

  constructor(private readonly options: ResourceScannerOptions) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  /**
   * Create a lazy scan of one resource type at one site. Nothing is fetched
   * until the scan is iterated.
   */
  scan<Raw>(
    session: Session,
    site: SiteDescriptor,
    capability: ResourceCapability<Raw>,
    pageSize: number = this.pageSize,
  ): ResourceScan<Raw> {
    const { auth, retry, signal } = this.options;
    // The caller's session serves the first page; later pages use the site's current one
    let hint: Session | null = session;

    const fetchPage = (cursor: string | null): Promise<Page<Raw>> =>
      retry.run(
        () => {
          const start = hint;
          hint = null;
          return auth.withSession(
            (s) => capability.fetchPage({ session: s, site, cursor, pageSize, signal }),
            start,
            site,
          );
        },
        { label: `${capability.tag}@${site.contentUrl || 'default'} page ${cursor ?? '1'}`, signal },
      );

    return new ResourceScan(site, capability, fetchPage);
  }
}
