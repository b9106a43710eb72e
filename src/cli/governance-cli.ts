import { Command } from 'commander';
import { configShowCommand, type ConfigShowOpts } from '../commands/config-show.js';
import { reportCommand, type ReportOpts } from '../commands/report.js';
import { scanCommand, type ScanOpts } from '../commands/scan.js';
import { RESOURCE_TYPES } from '../types.js';
import { defaultRuntime, type RuntimeEnv } from '../runtime.js';
import { runCommandWithRuntime } from './cli-utils.js';

export function registerScanCli(program: Command, runtime: RuntimeEnv = defaultRuntime) {
  program
    .command('scan')
    .description('Audit every site against the governance policy')
    .option('-c, --config <file>', 'Config file (governance.yaml in the working directory by default)')
    .option('--types <list>', `Comma separated resource types (${RESOURCE_TYPES.join(', ')})`)
    .option('--site <contentUrl>', 'Audit a single site')
    .option('--cleanup', 'Allow cleanup actions (overrides log_only)', false)
    .option('--json', 'Output the run summary as JSON', false)
    .action(async (opts: ScanOpts) => {
      await runCommandWithRuntime(runtime, async () => {
        const controller = new AbortController();
        const onSigint = (): void => controller.abort();
        process.once('SIGINT', onSigint);
        try {
          await scanCommand(
            {
              config: opts.config,
              types: opts.types,
              site: opts.site,
              cleanup: Boolean(opts.cleanup),
              json: Boolean(opts.json),
            },
            runtime,
            { signal: controller.signal },
          );
        } finally {
          process.removeListener('SIGINT', onSigint);
        }
      });
    });
}

export function registerReportCli(program: Command, runtime: RuntimeEnv = defaultRuntime) {
  program
    .command('report')
    .description("Write the daily summary from a day's governance logs")
    .option('-c, --config <file>', 'Config file')
    .option('--date <YYYY-MM-DD>', 'UTC day to summarize (default: today)')
    .option('--notify', 'Send the summary to the configured channels', false)
    .action(async (opts: ReportOpts) => {
      await runCommandWithRuntime(runtime, async () => {
        await reportCommand({ config: opts.config, date: opts.date, notify: Boolean(opts.notify) }, runtime);
      });
    });
}

export function registerConfigCli(program: Command, runtime: RuntimeEnv = defaultRuntime) {
  program
    .command('config')
    .description('Validate and print the effective configuration (secrets masked)')
    .option('-c, --config <file>', 'Config file')
    .option('--json', 'Output JSON', false)
    .action(async (opts: ConfigShowOpts) => {
      await runCommandWithRuntime(runtime, async () => {
        await configShowCommand({ config: opts.config, json: Boolean(opts.json) }, runtime);
      });
    });
}

export function buildProgram(runtime: RuntimeEnv = defaultRuntime): Command {
  const program = new Command();
  program
    .name('governance-audit')
    .description('Governance audit for multi-site BI server deployments')
    .version('1.0.0');

  registerScanCli(program, runtime);
  registerReportCli(program, runtime);
  registerConfigCli(program, runtime);
  return program;
}
