/**
 * Tests for StructuredLogger and the log reader
 *
 * @module logging/__tests__/structured-logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { evaluate } from '../../policy/policy-evaluator.js';
import { ScanResultBuilder } from '../../run/scan-result.js';
import type { AgeThreshold, ResourceRecord, SiteDescriptor } from '../../types.js';
import { collectScanSummaries, parseLogEntry, readLogEntries } from '../log-reader.js';
import { StructuredLogger, streamFileName } from '../structured-logger.js';

const NOW = new Date('2026-03-04T05:06:07.000Z');
const SITE: SiteDescriptor = { id: 'site-1', contentUrl: 'finance', name: 'Finance' };
const USERS: AgeThreshold = { kind: 'age', type: 'users', thresholdDays: 730, mode: 'log-only' };

function user(id: string, lastActivityAt: Date | null): ResourceRecord {
  return { type: 'users', id, name: `user-${id}`, ownerId: null, lastActivityAt, metadata: {} };
}

describe('StructuredLogger', () => {
  let tempDir: string;
  let logger: StructuredLogger;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'governance-log-test-'));
    logger = new StructuredLogger({
      dir: tempDir,
      correlationId: 'run-1',
      mirrorToConsole: false,
      clock: () => NOW,
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should name resource streams by prefix and UTC date', () => {
    expect(streamFileName('users', NOW)).toBe('inactive_users_2026-03-04.jsonl');
    expect(streamFileName('extracts', NOW)).toBe('extract_tasks_2026-03-04.jsonl');
    expect(logger.streamPath('workbooks')).toBe(path.join(tempDir, 'stale_workbooks_2026-03-04.jsonl'));
  });

  it('should write self-contained entries to the application log', async () => {
    const entry = await logger.emit({ event: 'run.started', payload: { logOnly: true } });

    expect(entry).toEqual({
      correlationId: 'run-1',
      timestamp: '2026-03-04T05:06:07.000Z',
      severity: 'info',
      event: 'run.started',
      payload: { logOnly: true },
    });
    expect(Object.isFrozen(entry)).toBe(true);
    const content = await fs.promises.readFile(logger.appLogPath(), 'utf-8');
    expect(content).toBe(`${JSON.stringify(entry)}\n`);
  });

  it('should generate a correlation id when none is given', () => {
    const generated = new StructuredLogger({ dir: tempDir });

    expect(generated.correlationId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should round-trip a scan result through the resource stream', async () => {
    const builder = new ScanResultBuilder(SITE, 'users', NOW, () => NOW.getTime() + 250);
    for (const record of [
      user('u1', new Date('2023-01-01T00:00:00Z')),
      user('u2', new Date('2026-02-01T00:00:00Z')),
      user('u3', null),
    ]) {
      builder.add(record, evaluate(record, USERS, NOW));
    }
    await logger.emitScanResult(builder.finalize('completed'));

    const { entries, malformed } = await readLogEntries(logger.streamPath('users'));
    expect(malformed).toBe(0);
    expect(entries.map((e) => `${e.severity} ${e.event}`)).toEqual([
      'info record.flagged',
      'warning record.data_quality',
      'info scan.summary',
    ]);
    expect(entries.every((e) => e.correlationId === 'run-1')).toBe(true);

    const [summary] = collectScanSummaries(entries);
    expect(summary).toEqual({
      correlationId: 'run-1',
      timestamp: '2026-03-04T05:06:07.000Z',
      siteId: 'site-1',
      siteName: 'Finance',
      resourceType: 'users',
      recordCount: 3,
      flaggedCount: 1,
      warningCount: 1,
      errorCount: 0,
      durationMs: 250,
      status: 'completed',
      verdicts: { aged: 1, 'within-window': 1, 'missing-data': 1 },
      flaggedRecordIds: ['u1'],
    });
  });

  it('should mark a failed scan summary as an error', async () => {
    const builder = new ScanResultBuilder(SITE, 'workbooks', NOW, () => NOW.getTime());
    builder.recordError(new Error('page 3 unavailable'));
    await logger.emitScanResult(builder.finalize('failed'));

    const { entries } = await readLogEntries(logger.streamPath('workbooks'));

    expect(entries).toHaveLength(1);
    expect(entries[0].severity).toBe('error');
    expect(entries[0].payload.error).toBe('Error: page 3 unavailable');
  });

  describe('forModule', () => {
    it('should filter by level and mirror to the console', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const mirrored = new StructuredLogger({ dir: tempDir, level: 'info', correlationId: 'run-2', clock: () => NOW });
      const moduleLogger = mirrored.forModule('sites');

      moduleLogger.debug('hidden');
      moduleLogger.info('Enumerated 3 site(s)', { count: 3 });
      await mirrored.close();

      expect(log).toHaveBeenCalledWith('[sites] Enumerated 3 site(s)');
      const { entries } = await readLogEntries(mirrored.appLogPath());
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        event: 'diagnostic',
        severity: 'info',
        payload: { module: 'sites', message: 'Enumerated 3 site(s)', count: 3 },
      });
    });
  });
});

describe('log reader', () => {
  it('should reject lines that are not log entries', () => {
    expect(parseLogEntry('not json')).toBeNull();
    expect(parseLogEntry('{"event":"x"}')).toBeNull();
    expect(
      parseLogEntry('{"correlationId":"c","timestamp":"t","severity":"loud","event":"e","payload":{}}'),
    ).toBeNull();
    expect(parseLogEntry('{"correlationId":"c","timestamp":"t","severity":"info","event":"e","payload":{}}')).toEqual({
      correlationId: 'c',
      timestamp: 't',
      severity: 'info',
      event: 'e',
      payload: {},
    });
  });

  it('should reject inherited property names as severities', () => {
    for (const severity of ['toString', 'constructor', '__proto__']) {
      expect(
        parseLogEntry(`{"correlationId":"c","timestamp":"t","severity":"${severity}","event":"e","payload":{}}`),
      ).toBeNull();
    }
  });

  it('should count malformed lines and read a missing file as empty', async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'governance-reader-test-'));
    try {
      const file = path.join(dir, 'mixed.jsonl');
      await fs.promises.writeFile(
        file,
        '{"correlationId":"c","timestamp":"t","severity":"info","event":"e","payload":{}}\n{broken\n\n',
      );

      expect(await readLogEntries(file)).toMatchObject({ malformed: 1 });
      expect(await readLogEntries(path.join(dir, 'absent.jsonl'))).toEqual({ entries: [], malformed: 0 });
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  });
});
