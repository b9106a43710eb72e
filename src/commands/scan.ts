import type { RuntimeEnv } from '../runtime.js';
import type { EnvSource } from '../config/credentials.js';
import { StructuredLogger } from '../logging/structured-logger.js';
import {
  exitCodeFor,
  runGovernanceAudit,
  type GovernanceApi,
  type RunSummary,
} from '../run/governance-run.js';
import type { Mutator } from '../run/mode-gate.js';
import type { SleepFn } from '../retry/retry-executor.js';
import { parseList, requireValidConfig } from './command-shared.js';

// ---------------------------------------------------------------------------
// Scan
// ---------------------------------------------------------------------------

export type ScanOpts = {
  config?: string;
  /** Comma separated resource types */
  types?: string;
  site?: string;
  cleanup?: boolean;
  json?: boolean;
};

/** Seams for tests and embedding; the CLI passes none. */
export type ScanDeps = {
  env?: EnvSource;
  cwd?: string;
  api?: GovernanceApi;
  mutator?: Mutator | null;
  now?: () => Date;
  sleep?: SleepFn;
  signal?: AbortSignal;
};

export async function scanCommand(
  opts: ScanOpts,
  runtime: RuntimeEnv,
  deps: ScanDeps = {},
): Promise<RunSummary | null> {
  const config = await requireValidConfig(
    {
      configPath: opts.config,
      env: deps.env,
      cwd: deps.cwd,
      overrides: {
        siteScope: opts.site,
        resourceTypes: parseList(opts.types),
        ...(opts.cleanup ? { logOnly: false } : {}),
      },
    },
    runtime,
  );
  if (!config) return null;

  const logger = new StructuredLogger({
    dir: config.logging.dir,
    level: config.logging.level,
    maxFileBytes: config.logging.maxFileBytes,
    maxFiles: config.logging.maxFiles,
    // stdout carries only the summary in JSON mode
    mirrorToConsole: !opts.json,
    clock: deps.now,
  });

  let summary: RunSummary;
  try {
    summary = await runGovernanceAudit(config, {
      logger,
      api: deps.api,
      mutator: deps.mutator,
      now: deps.now,
      sleep: deps.sleep,
      signal: deps.signal,
    });
  } finally {
    await logger.close();
  }

  if (opts.json) {
    runtime.log(JSON.stringify(summary, null, 2));
  } else {
    runtime.log(`Run ${summary.correlationId}: ${summary.status}`);
    runtime.log(
      `  ${summary.pairsCompleted}/${summary.pairsTotal} scans completed across ${summary.sitesEnumerated} site(s)` +
        (summary.enumerationPartial ? ' (site list incomplete)' : ''),
    );
    runtime.log(
      `  ${summary.recordCount} records, ${summary.flaggedCount} flagged, ` +
        `${summary.warningCount} data-quality warning(s), ${summary.errorCount} error(s)`,
    );
    if (!summary.logOnly) {
      runtime.log(`  ${summary.mutations} cleanup action(s), ${summary.mutationFailures} failed`);
    }
    for (const pair of summary.pairs.filter((p) => p.status !== 'completed')) {
      runtime.log(`  ${pair.status}: ${pair.resourceType} on ${pair.site.name}`);
    }
    if (summary.error) {
      runtime.error(`Run failed: ${summary.error}`);
    }
    runtime.log(`  Logs: ${config.logging.dir}`);
  }

  runtime.exit(exitCodeFor(summary));
  return summary;
}
