/**
 * Policy Evaluator
 *
 * Pure functions from (record, threshold, now) to a Verdict. No I/O and no
 * clock reads: `now` is always passed in.
 *
 * @module policy/policy-evaluator
 */

import type {
  AgeThreshold,
  AgeVerdict,
  DataQualityWarning,
  PolicyThreshold,
  ResourceRecord,
  ScheduleThreshold,
  ScheduleVerdict,
  TimeWindow,
  Verdict,
} from '../types.js';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

const SECONDS_PER_DAY = 24 * 60 * 60;

const TIME_OF_DAY = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Whole days between two instants, floored; 0 when `from` is in the future.
 */
export function daysBetween(from: Date, to: Date): number {
  const diff = to.getTime() - from.getTime();
  if (diff <= 0) return 0;
  return Math.floor(diff / MS_PER_DAY);
}

/**
 * Parse "HH:MM" or "HH:MM:SS" into seconds since midnight, or null.
 */
export function parseTimeOfDay(value: string): number | null {
  const match = TIME_OF_DAY.exec(value.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * `[start, end)` membership; a window whose end precedes its start wraps
 * midnight. An empty window (start == end) contains nothing.
 */
export function isWithinWindow(secondsOfDay: number, window: TimeWindow): boolean {
  const start = parseTimeOfDay(window.start);
  const end = parseTimeOfDay(window.end);
  if (start === null || end === null) {
    throw new RangeError(`Invalid time window ${window.start}-${window.end}`);
  }
  const t = ((secondsOfDay % SECONDS_PER_DAY) + SECONDS_PER_DAY) % SECONDS_PER_DAY;
  if (start === end) return false;
  if (start < end) return t >= start && t < end;
  return t >= start || t < end;
}

export function evaluateAge(record: ResourceRecord, threshold: AgeThreshold, now: Date): AgeVerdict {
  if (record.lastActivityAt === null) {
    const warning: DataQualityWarning = {
      code: 'missing-activity-timestamp',
      message: `${record.type} ${record.id} has no activity timestamp`,
    };
    return {
      kind: 'age',
      stale: false,
      ageDays: null,
      thresholdDays: threshold.thresholdDays,
      reason: 'missing-data',
      warning,
    };
  }

  const ageDays = daysBetween(record.lastActivityAt, now);
  const stale = ageDays >= threshold.thresholdDays;
  return {
    kind: 'age',
    stale,
    ageDays,
    thresholdDays: threshold.thresholdDays,
    reason: stale ? 'aged' : 'within-window',
  };
}

export function evaluateSchedule(record: ResourceRecord, threshold: ScheduleThreshold): ScheduleVerdict {
  const runTime = record.schedule?.runTime ?? null;
  if (runTime === null) {
    return {
      kind: 'schedule',
      stale: false,
      inPeakWindow: false,
      runTime: null,
      reason: 'missing-data',
      warning: { code: 'missing-run-time', message: `${record.type} ${record.id} has no scheduled run time` },
    };
  }

  const seconds = parseTimeOfDay(runTime);
  if (seconds === null) {
    return {
      kind: 'schedule',
      stale: false,
      inPeakWindow: false,
      runTime,
      reason: 'missing-data',
      warning: {
        code: 'unparseable-run-time',
        message: `${record.type} ${record.id} has unparseable run time "${runTime}"`,
      },
    };
  }

  const inPeakWindow = isWithinWindow(seconds, threshold.peakWindow);
  return {
    kind: 'schedule',
    stale: false,
    inPeakWindow,
    runTime,
    reason: inPeakWindow ? 'peak-hours' : 'off-peak',
  };
}

/**
 * Apply a threshold to one record.
 *
 * @throws TypeError when the threshold is for a different resource type
 */
export function evaluate(record: ResourceRecord, threshold: PolicyThreshold, now: Date): Verdict {
  if (record.type !== threshold.type) {
    throw new TypeError(`Threshold for ${threshold.type} applied to ${record.type} record ${record.id}`);
  }
  return threshold.kind === 'age' ? evaluateAge(record, threshold, now) : evaluateSchedule(record, threshold);
}

/** Stale for age verdicts, in the peak window for schedule verdicts. */
export function isFlagged(verdict: Verdict): boolean {
  return verdict.kind === 'age' ? verdict.stale : verdict.inPeakWindow;
}
