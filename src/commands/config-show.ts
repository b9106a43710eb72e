import type { RuntimeEnv } from '../runtime.js';
import type { EnvSource } from '../config/credentials.js';
import { redactConfig } from '../config/config.js';
import { requireValidConfig } from './command-shared.js';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export type ConfigShowOpts = {
  config?: string;
  json?: boolean;
};

export type ConfigShowDeps = {
  env?: EnvSource;
  cwd?: string;
};

export async function configShowCommand(
  opts: ConfigShowOpts,
  runtime: RuntimeEnv,
  deps: ConfigShowDeps = {},
): Promise<void> {
  const config = await requireValidConfig({ configPath: opts.config, env: deps.env, cwd: deps.cwd }, runtime);
  if (!config) return;

  const redacted = redactConfig(config);
  if (opts.json) {
    runtime.log(JSON.stringify(redacted, null, 2));
    runtime.exit(0);
    return;
  }

  const { server, policy, scan, logging, notifications } = config;
  runtime.log(`Config: ${config.sourcePath ?? '(environment and defaults only)'}`);
  runtime.log(`Server: ${server.url} (site: ${server.siteScope === '' ? 'all sites' : server.siteScope})`);
  runtime.log(`Token: ${server.tokenName}`);
  runtime.log(`Mode: ${policy.logOnly ? 'log-only' : 'cleanup enabled'}`);
  for (const type of scan.resourceTypes) {
    const threshold = policy.thresholds[type];
    const rule =
      threshold.kind === 'age'
        ? `inactive for ${threshold.thresholdDays} day(s)`
        : `scheduled inside ${threshold.peakWindow.start}-${threshold.peakWindow.end}`;
    runtime.log(`  ${type}: ${rule} [${threshold.mode}]`);
  }
  runtime.log(`Scan: page size ${scan.pageSize}, concurrency ${scan.concurrency}, deadline ${scan.deadlineMinutes} min`);
  runtime.log(`Logs: ${logging.dir} (level ${logging.level})`);
  runtime.log(`Notifications: ${notifications.channels.map((c) => `${c.type}>=${c.minSeverity}`).join(', ')}`);
  runtime.exit(0);
}
