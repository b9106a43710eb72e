/**
 * Governance Audit - Core Types
 *
 * Sessions, sites, scanned records, policy thresholds, verdicts and log
 * entries shared by every module.
 */

// =============================================================================
// Resource Types
// =============================================================================

export type ResourceType = 'users' | 'workbooks' | 'datasources' | 'sites' | 'extracts';

export const RESOURCE_TYPES: readonly ResourceType[] = [
  'users',
  'workbooks',
  'datasources',
  'sites',
  'extracts',
];

export function isResourceType(value: string): value is ResourceType {
  return (RESOURCE_TYPES as readonly string[]).includes(value);
}

// =============================================================================
// Session & Sites
// =============================================================================

export interface Session {
  /** Server root, e.g. https://bi.example.com */
  readonly serverUrl: string;

  /** Opaque credentials token sent as X-Tableau-Auth */
  readonly token: string;

  /** Site the token was issued for */
  readonly siteId: string;

  /** Content-URL slug of that site ("" for the default site) */
  readonly siteContentUrl: string;

  /** Signed-in user id */
  readonly userId: string;

  readonly issuedAt: Date;
  readonly expiresAt: Date;
}

export interface SiteDescriptor {
  readonly id: string;
  /** Content-path slug ("" for the default site) */
  readonly contentUrl: string;
  readonly name: string;
}

// =============================================================================
// Scanned Records
// =============================================================================

/**
 * Schedule details for refresh-job records.
 */
export interface ScheduleInfo {
  /** Configured time of day, "HH:MM" or "HH:MM:SS" */
  readonly runTime: string | null;
  /** Hourly, Daily, Weekly, Monthly ... */
  readonly frequency: string | null;
}

export interface ResourceRecord {
  readonly type: ResourceType;
  readonly id: string;
  readonly name: string;
  readonly ownerId: string | null;

  /** Last login / update; null when the server did not report one */
  readonly lastActivityAt: Date | null;

  /** Present on extract refresh tasks only */
  readonly schedule?: ScheduleInfo;

  readonly metadata: Readonly<Record<string, unknown>>;
}

// =============================================================================
// Policy
// =============================================================================

export type EnforcementMode = 'log-only' | 'cleanup';

export interface AgeThreshold {
  readonly kind: 'age';
  readonly type: Exclude<ResourceType, 'extracts'>;
  readonly thresholdDays: number;
  readonly mode: EnforcementMode;
}

/** Time-of-day interval, start inclusive and end exclusive. May wrap midnight. */
export interface TimeWindow {
  readonly start: string;
  readonly end: string;
}

export interface ScheduleThreshold {
  readonly kind: 'schedule';
  readonly type: 'extracts';
  readonly peakWindow: TimeWindow;
  readonly mode: EnforcementMode;
}

export type PolicyThreshold = AgeThreshold | ScheduleThreshold;

export type DataQualityCode = 'missing-activity-timestamp' | 'missing-run-time' | 'unparseable-run-time';

export interface DataQualityWarning {
  readonly code: DataQualityCode;
  readonly message: string;
}

export interface AgeVerdict {
  readonly kind: 'age';
  readonly stale: boolean;
  /** Whole days since last activity; null when the timestamp is missing */
  readonly ageDays: number | null;
  readonly thresholdDays: number;
  readonly reason: 'aged' | 'within-window' | 'missing-data';
  readonly warning?: DataQualityWarning;
}

export interface ScheduleVerdict {
  readonly kind: 'schedule';
  /** Staleness never applies to schedule records */
  readonly stale: false;
  readonly inPeakWindow: boolean;
  readonly runTime: string | null;
  readonly reason: 'peak-hours' | 'off-peak' | 'missing-data';
  readonly warning?: DataQualityWarning;
}

export type Verdict = AgeVerdict | ScheduleVerdict;

export type ReasonCode = Verdict['reason'];

// =============================================================================
// Scan Results
// =============================================================================

export type ScanStatus = 'completed' | 'failed' | 'cancelled';

export interface ScannedItem {
  readonly record: ResourceRecord;
  readonly verdict: Verdict;
}

export interface ScanResult {
  readonly site: SiteDescriptor;
  readonly resourceType: ResourceType;
  readonly items: readonly ScannedItem[];
  readonly startedAt: Date;
  readonly durationMs: number;
  readonly recordCount: number;
  readonly flaggedCount: number;
  readonly warningCount: number;
  readonly errorCount: number;
  readonly status: ScanStatus;
  /** Last error message when status is not "completed" */
  readonly error?: string;
}

// =============================================================================
// Log Entries
// =============================================================================

export type Severity = 'debug' | 'info' | 'warning' | 'error';

export const SEVERITY_ORDER: Record<Severity, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

export interface LogEntry {
  /** Shared by every entry of one run */
  readonly correlationId: string;
  /** ISO-8601 */
  readonly timestamp: string;
  readonly severity: Severity;
  readonly event: string;
  readonly payload: Readonly<Record<string, unknown>>;
}
