/**
 * Site enumeration and resource scanning
 *
 * @module scanning
 */

export {
  createCapabilities,
  pageFromCursor,
  type Capability,
  type CapabilityRegistry,
  type Page,
  type PageRequest,
  type PolicyKind,
  type RecordDescription,
  type ResourceApi,
  type ResourceCapability,
} from './capabilities.js';

export {
  DEFAULT_PAGE_SIZE,
  ResourceScan,
  ResourceScanner,
  toResourceRecord,
  type ResourceScannerOptions,
  type ScanProgress,
} from './resource-scanner.js';

export {
  DEFAULT_SITE_PAGE_SIZE,
  SiteEnumerator,
  toSiteDescriptor,
  type SiteApi,
  type SiteEnumeratorOptions,
  type SiteListing,
} from './site-enumerator.js';
