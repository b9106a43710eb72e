import type { RuntimeEnv } from '../runtime.js';
import type { EnvSource } from '../config/credentials.js';
import { formatDate } from '../logging/structured-logger.js';
import { writeDailyDigest } from '../report/daily-digest.js';
import { createNotificationSink, type NotificationResult } from '../report/notification-sink.js';
import { requireValidConfig } from './command-shared.js';

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export type ReportOpts = {
  config?: string;
  /** UTC day, YYYY-MM-DD; today when omitted */
  date?: string;
  notify?: boolean;
};

export type ReportDeps = {
  env?: EnvSource;
  cwd?: string;
  now?: () => Date;
  fetchImpl?: typeof fetch;
};

export function isValidDate(value: string): boolean {
  if (!DATE_RE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && formatDate(parsed) === value;
}

export async function reportCommand(opts: ReportOpts, runtime: RuntimeEnv, deps: ReportDeps = {}): Promise<void> {
  const date = opts.date ?? formatDate((deps.now ?? (() => new Date()))());
  if (!isValidDate(date)) {
    runtime.error(`Invalid --date "${date}" (expected YYYY-MM-DD)`);
    runtime.exit(1);
    return;
  }

  // The digest only reads local logs
  const config = await requireValidConfig(
    { configPath: opts.config, env: deps.env, cwd: deps.cwd, requireCredentials: false },
    runtime,
  );
  if (!config) return;

  const { digest, text, path } = await writeDailyDigest(config.logging.dir, date, config.logging.maxFiles);
  runtime.log(text.trimEnd());
  runtime.log(`Summary written to ${path}`);

  if (!opts.notify) {
    runtime.exit(0);
    return;
  }

  const sink = createNotificationSink(config.notifications.channels, {
    fetchImpl: deps.fetchImpl,
    now: deps.now,
    timeoutMs: config.server.requestTimeoutMs,
  });
  const results: NotificationResult[] = await sink.notify(digest.severity, text.trimEnd(), {
    date,
    totalFlagged: digest.totalFlagged,
    totalErrors: digest.totalErrors,
  });

  const attempted = results.filter((r) => r.attempted);
  const failed = attempted.filter((r) => !r.success);
  runtime.log(`Notified ${attempted.length - failed.length}/${attempted.length} channel(s)`);
  for (const result of failed) {
    runtime.error(`  ${result.channel}: ${result.error ?? 'failed'}`);
  }
  runtime.exit(failed.length > 0 ? 2 : 0);
}
