/**
 * Site Enumerator - lists the sites of a multi-site deployment
 *
 * @module scanning/site-enumerator
 */

import {
  AuthError,
  ClientError,
  ExhaustedRetriesError,
  PartialEnumerationError,
  UnauthorizedError,
  describeError,
} from '../errors.js';
import { nextPageNumber, type RawSite, type RestClient } from '../client/rest-client.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { RetryExecutor } from '../retry/retry-executor.js';
import type { AuthSession } from '../session/auth-session.js';
import type { Session, SiteDescriptor } from '../types.js';

export const DEFAULT_SITE_PAGE_SIZE = 100;

export type SiteApi = Pick<RestClient, 'querySitesPage' | 'querySite'>;

export interface SiteEnumeratorOptions {
  client: SiteApi;
  auth: AuthSession;
  retry: RetryExecutor;
  /** Content URL of the only site to audit; "" means every site */
  siteScope?: string;
  pageSize?: number;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface SiteListing {
  sites: SiteDescriptor[];
  /** Set when a page could not be fetched; `sites` holds what was obtained */
  partial: PartialEnumerationError | null;
}

export function toSiteDescriptor(raw: RawSite): SiteDescriptor {
  return Object.freeze({ id: raw.id, contentUrl: raw.contentUrl, name: raw.name });
}

export class SiteEnumerator {
  private readonly options: SiteEnumeratorOptions;
  private readonly pageSize: number;
  private readonly logger: Logger;

  constructor(options: SiteEnumeratorOptions) {
    this.options = options;
    this.pageSize = options.pageSize ?? DEFAULT_SITE_PAGE_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Enumerate sites page by page. A page that cannot be fetched ends the
   * listing with a PartialEnumerationError marker instead of throwing.
   *
   * @throws AuthError when the session cannot be (re)established
   * @throws ScanCancelledError when the run is cancelled
   */
  async listSites(session: Session): Promise<SiteListing> {
    const { client, auth, retry, signal } = this.options;
    const scope = this.options.siteScope ?? '';
    await auth.ensureValid(session);

    // A scoped sign-in only sees its own site
    if (scope !== '') {
      const raw = await retry.run(
        () => auth.withSession((s) => client.querySite(s, s.siteId, signal)),
        { label: 'sites.get', signal },
      );
      if (raw.contentUrl !== scope) {
        this.logger.warn(`Signed-in site "${raw.contentUrl}" differs from configured scope "${scope}"`);
      }
      this.logger.info(`Site scope limited to "${raw.name}"`, { siteId: raw.id });
      return { sites: [toSiteDescriptor(raw)], partial: null };
    }

    const sites: SiteDescriptor[] = [];
    const seen = new Set<string>();
    let pageNumber: number | null = 1;

    while (pageNumber !== null) {
      const current: number = pageNumber;
      try {
        const page = await retry.run(
          () =>
            auth.withSession((s) =>
              client.querySitesPage(s, { pageNumber: current, pageSize: this.pageSize }, signal),
            ),
          { label: `sites.list page ${current}`, signal },
        );

        for (const raw of page.items) {
          if (seen.has(raw.id)) continue;
          seen.add(raw.id);
          sites.push(toSiteDescriptor(raw));
        }
        pageNumber = nextPageNumber(page, page.items.length);
      } catch (error) {
        if (!isPartialFailure(error)) {
          throw error;
        }
        const partial = new PartialEnumerationError(sites.length, current, error);
        this.logger.warn(`Site enumeration incomplete: ${describeError(error)}`, {
          sitesObtained: sites.length,
          failedPage: current,
        });
        return { sites, partial };
      }
    }

    this.logger.info(`Enumerated ${sites.length} site(s)`);
    return { sites, partial: null };
  }
}

/**
 * Errors that end enumeration early without failing the run.
 */
function isPartialFailure(error: unknown): boolean {
  if (error instanceof AuthError || error instanceof UnauthorizedError) {
    return false;
  }
  return error instanceof ExhaustedRetriesError || error instanceof ClientError;
}
