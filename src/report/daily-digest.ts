/**
 * Daily Digest - per-day roll-up of the governance log streams
 *
 * A pure consumer of LogEntry values: it never talks to the BI server.
 *
 * @module report/daily-digest
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { collectScanSummaries, readLogEntries } from '../logging/log-reader.js';
import { APP_LOG_FILE, STREAM_PREFIXES } from '../logging/structured-logger.js';
import { RESOURCE_TYPES, type LogEntry, type ResourceType, type Severity } from '../types.js';

export interface DigestTypeTotals {
  resourceType: ResourceType;
  title: string;
  scans: number;
  sites: number;
  recordCount: number;
  flaggedCount: number;
  warningCount: number;
  errorCount: number;
  failedScans: number;
  cancelledScans: number;
}

export interface DigestRun {
  correlationId: string;
  timestamp: string;
  status: string;
  pairsCompleted: number;
  pairsTotal: number;
  flaggedCount: number;
}

export interface DailyDigest {
  date: string;
  types: DigestTypeTotals[];
  runs: DigestRun[];
  totalFlagged: number;
  totalErrors: number;
  /** Highest severity worth notifying about */
  severity: Severity;
}

export function digestFileName(date: string): string {
  return `daily_summary_${date}.txt`;
}

/** "inactive_users" -> "Inactive Users" */
function titleFor(type: ResourceType): string {
  return STREAM_PREFIXES[type]
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

/**
 * Roll up the entries whose timestamp falls on `date` (UTC, YYYY-MM-DD).
 */
export function buildDailyDigest(entries: readonly LogEntry[], date: string): DailyDigest {
  const sameDay = entries.filter((entry) => entry.timestamp.slice(0, 10) === date);
  const summaries = collectScanSummaries(sameDay);

  const types = RESOURCE_TYPES.map((resourceType): DigestTypeTotals => {
    const scans = summaries.filter((s) => s.resourceType === resourceType);
    return {
      resourceType,
      title: titleFor(resourceType),
      scans: scans.length,
      sites: new Set(scans.map((s) => s.siteId)).size,
      recordCount: scans.reduce((n, s) => n + s.recordCount, 0),
      flaggedCount: scans.reduce((n, s) => n + s.flaggedCount, 0),
      warningCount: scans.reduce((n, s) => n + s.warningCount, 0),
      errorCount: scans.reduce((n, s) => n + s.errorCount, 0),
      failedScans: scans.filter((s) => s.status === 'failed').length,
      cancelledScans: scans.filter((s) => s.status === 'cancelled').length,
    };
  });

  const runs: DigestRun[] = sameDay
    .filter((entry) => entry.event === 'run.completed')
    .map((entry) => ({
      correlationId: entry.correlationId,
      timestamp: entry.timestamp,
      status: typeof entry.payload.status === 'string' ? entry.payload.status : 'unknown',
      pairsCompleted: numberOr(entry.payload.pairsCompleted, 0),
      pairsTotal: numberOr(entry.payload.pairsTotal, 0),
      flaggedCount: numberOr(entry.payload.flaggedCount, 0),
    }));

  const totalFlagged = types.reduce((n, t) => n + t.flaggedCount, 0);
  const totalErrors = types.reduce((n, t) => n + t.errorCount, 0);

  let severity: Severity = 'info';
  if (totalFlagged > 0 || totalErrors > 0 || runs.some((r) => r.status === 'partial')) severity = 'warning';
  if (runs.some((r) => r.status === 'failed')) severity = 'error';

  return { date, types, runs, totalFlagged, totalErrors, severity };
}

export function renderDigest(digest: DailyDigest): string {
  const lines = [`BI Governance Summary - ${digest.date}`, ''];

  for (const t of digest.types) {
    if (t.scans === 0) {
      lines.push(`${t.title}: no scans logged`);
      continue;
    }
    let line = `${t.title}: ${t.flaggedCount} flagged of ${t.recordCount} scanned across ${t.sites} site(s)`;
    if (t.warningCount > 0) line += `, ${t.warningCount} data-quality warning(s)`;
    if (t.errorCount > 0) line += `, ${t.errorCount} error(s)`;
    if (t.failedScans > 0) line += `, ${t.failedScans} failed scan(s)`;
    if (t.cancelledScans > 0) line += `, ${t.cancelledScans} cancelled scan(s)`;
    lines.push(line);
  }

  lines.push('');
  if (digest.runs.length === 0) {
    lines.push('Runs: none completed');
  } else {
    lines.push('Runs:');
    for (const run of digest.runs) {
      lines.push(
        `  ${run.timestamp} ${run.status} (${run.pairsCompleted}/${run.pairsTotal} scans, ` +
          `${run.flaggedCount} flagged) [${run.correlationId}]`,
      );
    }
  }

  return `${lines.join('\n')}\n`;
}

/**
 * `path` and its rotated files, oldest first: `path.N` ... `path.1`, `path`.
 */
function withRotations(path: string, maxFiles: number): string[] {
  return [...Array.from({ length: maxFiles }, (_, i) => `${path}.${maxFiles - i}`), path];
}

/**
 * Every entry from the day's resource streams and the application log,
 * including their rotated files.
 */
export async function loadDayEntries(logDir: string, date: string, maxFiles = 5): Promise<LogEntry[]> {
  const paths = [
    ...RESOURCE_TYPES.flatMap((type) => withRotations(join(logDir, `${STREAM_PREFIXES[type]}_${date}.jsonl`), maxFiles)),
    ...withRotations(join(logDir, APP_LOG_FILE), maxFiles),
  ];

  const entries: LogEntry[] = [];
  for (const path of paths) {
    const { entries: fromFile, malformed } = await readLogEntries(path);
    if (malformed > 0) {
      console.warn(`[daily-digest] Skipped ${malformed} malformed line(s) in ${path}`);
    }
    entries.push(...fromFile);
  }
  return entries;
}

export interface WrittenDigest {
  digest: DailyDigest;
  text: string;
  path: string;
}

export async function writeDailyDigest(logDir: string, date: string, maxFiles?: number): Promise<WrittenDigest> {
  const digest = buildDailyDigest(await loadDayEntries(logDir, date, maxFiles), date);
  const text = renderDigest(digest);
  const path = join(logDir, digestFileName(date));
  await mkdir(logDir, { recursive: true });
  await writeFile(path, text, 'utf-8');
  return { digest, text, path };
}
