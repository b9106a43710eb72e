/**
 * Structured Logger - correlated JSON-lines output for a governance run
 *
 * Two kinds of stream, each a rotating JsonlSink:
 *
 * - governance.log: run-level events and module diagnostics
 * - <prefix>_<YYYY-MM-DD>.jsonl: one file per resource type per day holding
 *   flagged records, data-quality warnings and scan summaries
 *
 * Every entry written by one logger carries the same correlation id.
 *
 * @module logging/structured-logger
 */

import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { isFlagged } from '../policy/policy-evaluator.js';
import {
  SEVERITY_ORDER,
  type LogEntry,
  type ReasonCode,
  type ResourceRecord,
  type ResourceType,
  type ScanResult,
  type Severity,
  type SiteDescriptor,
} from '../types.js';
import { describeError } from '../errors.js';
import { JsonlSink } from './jsonl-sink.js';
import type { LogFields, Logger } from './logger.js';

// =============================================================================
// Streams
// =============================================================================

export const APP_LOG_FILE = 'governance.log';

export const STREAM_PREFIXES: Readonly<Record<ResourceType, string>> = {
  users: 'inactive_users',
  workbooks: 'stale_workbooks',
  datasources: 'stale_datasources',
  sites: 'stale_sites',
  extracts: 'extract_tasks',
};

export const EVENTS = {
  RECORD_FLAGGED: 'record.flagged',
  RECORD_DATA_QUALITY: 'record.data_quality',
  SCAN_SUMMARY: 'scan.summary',
  DIAGNOSTIC: 'diagnostic',
} as const;

/** UTC calendar date, YYYY-MM-DD */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function streamFileName(type: ResourceType, date: Date): string {
  return `${STREAM_PREFIXES[type]}_${formatDate(date)}.jsonl`;
}

// =============================================================================
// Types
// =============================================================================

export interface StructuredLoggerConfig {
  dir: string;
  /** Minimum severity for module diagnostics */
  level?: Severity;
  maxFileBytes?: number;
  maxFiles?: number;
  /** Defaults to a fresh UUID */
  correlationId?: string;
  /** Mirror diagnostics to the console as `[module] message` */
  mirrorToConsole?: boolean;
  clock?: () => Date;
}

export interface EmitInput {
  event: string;
  severity?: Severity;
  payload?: Record<string, unknown>;
  /** Resource stream to write to; the application log when omitted */
  stream?: ResourceType;
}

export type VerdictTally = Partial<Record<ReasonCode, number>>;

// =============================================================================
// Serialization helpers
// =============================================================================

export function siteRef(site: SiteDescriptor): Record<string, unknown> {
  return { id: site.id, name: site.name, contentUrl: site.contentUrl };
}

export function recordRef(record: ResourceRecord): Record<string, unknown> {
  return {
    id: record.id,
    name: record.name,
    type: record.type,
    ownerId: record.ownerId,
    lastActivityAt: record.lastActivityAt ? record.lastActivityAt.toISOString() : null,
    ...(record.schedule ? { schedule: record.schedule } : {}),
    metadata: record.metadata,
  };
}

export function tallyVerdicts(result: ScanResult): VerdictTally {
  const tally: VerdictTally = {};
  for (const { verdict } of result.items) {
    tally[verdict.reason] = (tally[verdict.reason] ?? 0) + 1;
  }
  return tally;
}

function summarySeverity(result: ScanResult): Severity {
  if (result.status === 'failed') return 'error';
  if (result.status === 'cancelled' || result.errorCount > 0) return 'warning';
  return 'info';
}

// =============================================================================
// StructuredLogger class
// =============================================================================

export class StructuredLogger {
  readonly correlationId: string;

  private readonly dir: string;
  private readonly level: Severity;
  private readonly maxFileBytes?: number;
  private readonly maxFiles?: number;
  private readonly mirrorToConsole: boolean;
  private readonly clock: () => Date;
  private readonly sinks = new Map<string, JsonlSink>();

  constructor(config: StructuredLoggerConfig) {
    this.dir = config.dir;
    this.level = config.level ?? 'info';
    this.maxFileBytes = config.maxFileBytes;
    this.maxFiles = config.maxFiles;
    this.correlationId = config.correlationId ?? uuidv4();
    this.mirrorToConsole = config.mirrorToConsole ?? true;
    this.clock = config.clock ?? (() => new Date());
  }

  appLogPath(): string {
    return join(this.dir, APP_LOG_FILE);
  }

  streamPath(type: ResourceType, date: Date = this.clock()): string {
    return join(this.dir, streamFileName(type, date));
  }

  /**
   * Write one entry and resolve with it once it is on disk.
   */
  async emit(input: EmitInput): Promise<LogEntry> {
    const now = this.clock();
    const entry: LogEntry = Object.freeze({
      correlationId: this.correlationId,
      timestamp: now.toISOString(),
      severity: input.severity ?? 'info',
      event: input.event,
      payload: Object.freeze({ ...(input.payload ?? {}) }),
    });

    const path = input.stream ? this.streamPath(input.stream, now) : this.appLogPath();
    await this.sinkFor(path).append(entry);
    return entry;
  }

  /**
   * Write the flagged records, the data-quality warnings and the summary of
   * one (site, resource type) scan to that type's stream.
   */
  async emitScanResult(result: ScanResult): Promise<void> {
    const stream = result.resourceType;
    const site = siteRef(result.site);

    for (const { record, verdict } of result.items) {
      if (isFlagged(verdict)) {
        await this.emit({
          event: EVENTS.RECORD_FLAGGED,
          stream,
          payload: { site, resourceType: stream, record: recordRef(record), verdict },
        });
      }
      if (verdict.warning) {
        await this.emit({
          event: EVENTS.RECORD_DATA_QUALITY,
          severity: 'warning',
          stream,
          payload: { site, resourceType: stream, record: recordRef(record), warning: verdict.warning },
        });
      }
    }

    await this.emit({
      event: EVENTS.SCAN_SUMMARY,
      severity: summarySeverity(result),
      stream,
      payload: {
        site,
        resourceType: stream,
        startedAt: result.startedAt.toISOString(),
        durationMs: result.durationMs,
        recordCount: result.recordCount,
        flaggedCount: result.flaggedCount,
        warningCount: result.warningCount,
        errorCount: result.errorCount,
        status: result.status,
        verdicts: tallyVerdicts(result),
        ...(result.error ? { error: result.error } : {}),
      },
    });
  }

  /**
   * Diagnostic Logger for one module, writing to the application log.
   */
  forModule(module: string): Logger {
    const write = (severity: Severity, message: string, fields?: LogFields): void => {
      if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.level]) return;

      if (this.mirrorToConsole) {
        mirror(severity, `[${module}] ${message}`);
      }

      this.emit({
        event: EVENTS.DIAGNOSTIC,
        severity,
        payload: { module, message, ...(fields ?? {}) },
      }).catch((error: unknown) => {
        console.error(`[structured-logger] Failed to write diagnostic: ${describeError(error)}`);
      });
    };

    return {
      debug: (message, fields) => write('debug', message, fields),
      info: (message, fields) => write('info', message, fields),
      warn: (message, fields) => write('warning', message, fields),
      error: (message, fields) => write('error', message, fields),
    };
  }

  /** Wait for every pending append on every stream. */
  async close(): Promise<void> {
    await Promise.all([...this.sinks.values()].map((sink) => sink.flush()));
  }

  private sinkFor(path: string): JsonlSink {
    let sink = this.sinks.get(path);
    if (!sink) {
      sink = new JsonlSink({ path, maxSizeBytes: this.maxFileBytes, maxFiles: this.maxFiles });
      this.sinks.set(path, sink);
    }
    return sink;
  }
}

function mirror(severity: Severity, line: string): void {
  switch (severity) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warning':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}
