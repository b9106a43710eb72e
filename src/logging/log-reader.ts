/**
 * Log Reader - parses JSON-lines streams back into LogEntry values
 *
 * @module logging/log-reader
 */

import { readFile } from 'fs/promises';
import { isObject } from '../client/wire.js';
import {
  SEVERITY_ORDER,
  isResourceType,
  type LogEntry,
  type ResourceType,
  type ScanStatus,
  type Severity,
} from '../types.js';
import { EVENTS, type VerdictTally } from './structured-logger.js';

export interface ScanSummary {
  correlationId: string;
  timestamp: string;
  siteId: string;
  siteName: string;
  resourceType: ResourceType;
  recordCount: number;
  flaggedCount: number;
  warningCount: number;
  errorCount: number;
  durationMs: number;
  status: ScanStatus;
  verdicts: VerdictTally;
  /** Ids of the records flagged in this scan, in log order */
  flaggedRecordIds: string[];
}

export interface ReadResult {
  entries: LogEntry[];
  /** Lines that were not valid entries */
  malformed: number;
}

function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && Object.hasOwn(SEVERITY_ORDER, value);
}

function isScanStatus(value: unknown): value is ScanStatus {
  return value === 'completed' || value === 'failed' || value === 'cancelled';
}

function numberField(obj: Record<string, unknown>, key: string): number {
  const value = obj[key];
  return typeof value === 'number' ? value : 0;
}

/**
 * Parse one line; null when it is not a well-formed entry.
 */
export function parseLogEntry(line: string): LogEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isObject(parsed)) return null;

  const { correlationId, timestamp, severity, event, payload } = parsed;
  if (
    typeof correlationId !== 'string' ||
    typeof timestamp !== 'string' ||
    !isSeverity(severity) ||
    typeof event !== 'string' ||
    !isObject(payload)
  ) {
    return null;
  }
  return { correlationId, timestamp, severity, event, payload };
}

/**
 * Read every entry of a JSON-lines file. A missing file reads as empty.
 */
export async function readLogEntries(path: string): Promise<ReadResult> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { entries: [], malformed: 0 };
    }
    throw error;
  }

  const entries: LogEntry[] = [];
  let malformed = 0;
  for (const line of content.split('\n')) {
    if (line.trim() === '') continue;
    const entry = parseLogEntry(line);
    if (entry) {
      entries.push(entry);
    } else {
      malformed++;
    }
  }
  return { entries, malformed };
}

function parseTally(value: unknown): VerdictTally {
  const tally: VerdictTally = {};
  if (!isObject(value)) return tally;
  for (const reason of ['aged', 'within-window', 'missing-data', 'peak-hours', 'off-peak'] as const) {
    const count = value[reason];
    if (typeof count === 'number') tally[reason] = count;
  }
  return tally;
}

function scanKey(correlationId: string, siteId: string, type: string): string {
  return `${correlationId}|${siteId}|${type}`;
}

/**
 * Rebuild per-scan summaries from `scan.summary` entries, attaching the ids
 * of the `record.flagged` entries that share the scan's run, site and type.
 */
export function collectScanSummaries(entries: readonly LogEntry[]): ScanSummary[] {
  const flagged = new Map<string, string[]>();
  const summaries: ScanSummary[] = [];

  for (const entry of entries) {
    const site = isObject(entry.payload.site) ? entry.payload.site : null;
    const siteId = site && typeof site.id === 'string' ? site.id : null;
    const type = entry.payload.resourceType;
    if (siteId === null || typeof type !== 'string' || !isResourceType(type)) continue;

    if (entry.event === EVENTS.RECORD_FLAGGED) {
      const record = entry.payload.record;
      if (isObject(record) && typeof record.id === 'string') {
        const key = scanKey(entry.correlationId, siteId, type);
        const ids = flagged.get(key) ?? [];
        ids.push(record.id);
        flagged.set(key, ids);
      }
      continue;
    }

    if (entry.event !== EVENTS.SCAN_SUMMARY) continue;

    const payload = entry.payload;
    const status = payload.status;
    summaries.push({
      correlationId: entry.correlationId,
      timestamp: entry.timestamp,
      siteId,
      siteName: site && typeof site.name === 'string' ? site.name : siteId,
      resourceType: type,
      recordCount: numberField(payload, 'recordCount'),
      flaggedCount: numberField(payload, 'flaggedCount'),
      warningCount: numberField(payload, 'warningCount'),
      errorCount: numberField(payload, 'errorCount'),
      durationMs: numberField(payload, 'durationMs'),
      status: isScanStatus(status) ? status : 'failed',
      verdicts: parseTally(payload.verdicts),
      flaggedRecordIds: flagged.get(scanKey(entry.correlationId, siteId, type)) ?? [],
    });
  }

  return summaries;
}
