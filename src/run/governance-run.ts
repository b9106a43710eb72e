/**
 * Governance Run - one audit pass over a deployment
 *
 * Sign in, enumerate sites, then scan every (site, resource type) pair in a
 * bounded worker pool. Each record is evaluated against its threshold and
 * routed through the mode gate; each pair's ScanResult is written to the
 * structured log. A single pair failing never stops the others. Only an
 * authentication failure aborts the whole run.
 *
 * @module run/governance-run
 */

import { FetchTransport } from '../client/http-transport.js';
import { RestClient } from '../client/rest-client.js';
import { thresholdFor, type FrozenConfig } from '../config/config.js';
import { AuthError, ExhaustedRetriesError, GovernanceError, ScanCancelledError, describeError } from '../errors.js';
import { siteRef, type StructuredLogger } from '../logging/structured-logger.js';
import { evaluate } from '../policy/policy-evaluator.js';
import { RetryExecutor, type SleepFn } from '../retry/retry-executor.js';
import { createCapabilities, type ResourceApi } from '../scanning/capabilities.js';
import { ResourceScanner, type ResourceScan } from '../scanning/resource-scanner.js';
import { SiteEnumerator, type SiteApi } from '../scanning/site-enumerator.js';
import { AuthSession, type AuthApi } from '../session/auth-session.js';
import type { ResourceType, ScanResult, ScanStatus, SiteDescriptor } from '../types.js';
import { ModeGate, type Mutator } from './mode-gate.js';
import { ScanResultBuilder } from './scan-result.js';
import { runWithConcurrency } from './worker-pool.js';

// =============================================================================
// Types
// =============================================================================

export type RunStatus = 'success' | 'partial' | 'failed';

export type GovernanceApi = AuthApi & SiteApi & ResourceApi;

export interface GovernanceRunDeps {
  logger: StructuredLogger;
  /** Defaults to a RestClient over fetch */
  api?: GovernanceApi;
  mutator?: Mutator | null;
  now?: () => Date;
  sleep?: SleepFn;
  random?: () => number;
  /** External cancellation (e.g. SIGINT) */
  signal?: AbortSignal;
}

export interface PairOutcome {
  site: SiteDescriptor;
  resourceType: ResourceType;
  status: ScanStatus;
  recordCount: number;
  flaggedCount: number;
  warningCount: number;
  errorCount: number;
  /** Passes over the scan, 1 unless it was resumed */
  passes: number;
}

export interface RunSummary {
  correlationId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  logOnly: boolean;
  resourceTypes: ResourceType[];
  sitesEnumerated: number;
  enumerationPartial: boolean;
  pairsTotal: number;
  pairsCompleted: number;
  pairsFailed: number;
  pairsCancelled: number;
  recordCount: number;
  flaggedCount: number;
  warningCount: number;
  errorCount: number;
  mutations: number;
  mutationFailures: number;
  sessionRenewals: number;
  /** Run-level failure (auth, enumeration), when there was one */
  error?: string;
  pairs: PairOutcome[];
}

interface RunState {
  sitesEnumerated: number;
  enumerationPartial: boolean;
  pairs: PairOutcome[];
  mutationFailures: number;
  fatal: string | null;
}

// =============================================================================
// Status & exit codes
// =============================================================================

export function deriveRunStatus(
  state: Pick<RunState, 'enumerationPartial' | 'pairs' | 'mutationFailures' | 'fatal'>,
): RunStatus {
  if (state.fatal !== null) return 'failed';
  const completed = state.pairs.filter((p) => p.status === 'completed').length;
  if (completed === 0) return 'failed';
  if (completed < state.pairs.length || state.enumerationPartial || state.mutationFailures > 0) {
    return 'partial';
  }
  return 'success';
}

/** 0 success, 2 partial, 1 failed */
export function exitCodeFor(summary: Pick<RunSummary, 'status'>): 0 | 1 | 2 {
  switch (summary.status) {
    case 'success':
      return 0;
    case 'partial':
      return 2;
    case 'failed':
      return 1;
  }
}

// =============================================================================
// Run
// =============================================================================

/**
 * Execute one governance audit.
 *
 * Never throws for scan-level problems; the returned summary carries the
 * outcome. Errors writing the log itself do propagate.
 */
export async function runGovernanceAudit(config: FrozenConfig, deps: GovernanceRunDeps): Promise<RunSummary> {
  const { logger } = deps;
  const clock = deps.now ?? (() => new Date());
  const startedAt = clock();
  const runLog = logger.forModule('run');

  const api: GovernanceApi =
    deps.api ??
    new RestClient(new FetchTransport({ timeoutMs: config.server.requestTimeoutMs }), {
      apiVersion: config.server.apiVersion,
    });

  // -- deadline ------------------------------------------------------------
  const controller = new AbortController();
  const deadlineMs = config.scan.deadlineMinutes * 60 * 1000;
  const deadline = setTimeout(() => {
    controller.abort(new ScanCancelledError(`Run deadline of ${config.scan.deadlineMinutes} minute(s) exceeded`));
  }, deadlineMs);
  const onExternalAbort = (): void => controller.abort(new ScanCancelledError('Run cancelled'));
  if (deps.signal?.aborted) onExternalAbort();
  deps.signal?.addEventListener('abort', onExternalAbort, { once: true });
  const signal = controller.signal;

  const retry = new RetryExecutor({
    policy: config.retry,
    logger: logger.forModule('retry'),
    sleep: deps.sleep,
    random: deps.random,
  });
  const auth = new AuthSession({
    client: api,
    retry,
    sessionTtlMs: config.server.sessionTtlMinutes * 60 * 1000,
    logger: logger.forModule('auth'),
    now: () => clock().getTime(),
    signal,
  });
  const gate = new ModeGate({
    logOnly: config.policy.logOnly,
    mutator: deps.mutator,
    retry,
    auth,
    events: logger,
    signal,
  });

  const resourceTypes = [...config.scan.resourceTypes];
  const state: RunState = { sitesEnumerated: 0, enumerationPartial: false, pairs: [], mutationFailures: 0, fatal: null };

  await logger.emit({
    event: 'run.started',
    payload: {
      serverUrl: config.server.url,
      siteScope: config.server.siteScope,
      resourceTypes,
      logOnly: config.policy.logOnly,
      deadlineMinutes: config.scan.deadlineMinutes,
    },
  });
  runLog.info(`Starting governance audit of ${config.server.url} (log_only=${config.policy.logOnly})`);

  try {
    // -- sign in -----------------------------------------------------------
    const session = await auth.signIn({
      serverUrl: config.server.url,
      tokenName: config.server.tokenName,
      tokenSecret: config.server.tokenSecret,
      siteScope: config.server.siteScope,
    });

    // -- enumerate ---------------------------------------------------------
    const enumerator = new SiteEnumerator({
      client: api,
      auth,
      retry,
      siteScope: config.server.siteScope,
      pageSize: config.scan.pageSize,
      logger: logger.forModule('sites'),
      signal,
    });
    const listing = await enumerator.listSites(session);
    state.sitesEnumerated = listing.sites.length;

    if (listing.partial) {
      state.enumerationPartial = true;
      await logger.emit({
        event: 'sites.partial',
        severity: 'warning',
        payload: {
          sitesObtained: listing.partial.sitesObtained,
          failedPage: listing.partial.failedPage,
          error: describeError(listing.partial.cause),
        },
      });
    }
    await logger.emit({
      event: 'sites.enumerated',
      payload: { count: listing.sites.length, sites: listing.sites.map(siteRef) },
    });

    if (listing.sites.length === 0) {
      state.fatal = listing.partial ? listing.partial.message : 'No sites found';
    } else {
      // -- scan ------------------------------------------------------------
      const scanner = new ResourceScanner({ auth, retry, pageSize: config.scan.pageSize, signal });
      const capabilities = createCapabilities(api);
      const pairs = listing.sites.flatMap((site) => resourceTypes.map((type) => ({ site, type })));

      await runWithConcurrency(pairs, config.scan.concurrency, async ({ site, type }) => {
        const builder = new ScanResultBuilder(site, type, clock(), () => clock().getTime());
        const threshold = thresholdFor(config, type);
        // Stays cancelled when the run is aborted before this pair starts
        let status: ScanStatus = 'cancelled';
        let passes = 0;
        let scan: ResourceScan<unknown> | null = null;

        while (!signal.aborted) {
          passes++;
          try {
            scan ??= scanner.scan<unknown>(await auth.sessionFor(site), site, capabilities[type]);
            for await (const record of scan) {
              const verdict = evaluate(record, threshold, startedAt);
              builder.add(record, verdict);
              try {
                await gate.handle(site, record, verdict, threshold);
              } catch (error) {
                if (error instanceof AuthError || error instanceof ScanCancelledError) throw error;
                state.mutationFailures++;
                builder.recordError(error);
                runLog.error(`Cleanup of ${type} ${record.id} failed: ${describeError(error)}`);
              }
            }
            status = 'completed';
            break;
          } catch (error) {
            builder.recordError(error);
            if (error instanceof AuthError) {
              // Fatal for the whole run: stop every other pair too
              state.fatal = error.message;
              controller.abort(error);
              status = 'failed';
              break;
            }
            if (error instanceof ScanCancelledError || signal.aborted) {
              status = 'cancelled';
              break;
            }
            if (error instanceof ExhaustedRetriesError && scan && passes <= config.scan.resumeAttempts) {
              runLog.warn(`Resuming ${type} scan of ${site.name} after: ${describeError(error)}`, {
                progress: scan.progress(),
              });
              continue;
            }
            runLog.error(`Scan of ${type} on ${site.name} failed: ${describeError(error)}`);
            status = 'failed';
            break;
          }
        }
        const result: ScanResult = builder.finalize(status);
        await logger.emitScanResult(result);
        state.pairs.push({
          site,
          resourceType: type,
          status,
          recordCount: result.recordCount,
          flaggedCount: result.flaggedCount,
          warningCount: result.warningCount,
          errorCount: result.errorCount,
          passes,
        });
      });
    }
  } catch (error) {
    // Sign-in and enumeration failures end the run; anything else is a bug
    if (!(error instanceof GovernanceError)) {
      throw error;
    }
    state.fatal = describeError(error);
    runLog.error(`Run aborted: ${describeError(error)}`);
  } finally {
    clearTimeout(deadline);
    deps.signal?.removeEventListener('abort', onExternalAbort);
    await auth.signOut();
  }

  const finishedAt = clock();
  const summary = summarize(state, {
    correlationId: logger.correlationId,
    startedAt,
    finishedAt,
    logOnly: config.policy.logOnly,
    resourceTypes,
    mutations: gate.mutations,
    sessionRenewals: auth.renewalCount,
  });

  const { pairs, ...totals } = summary;
  await logger.emit({
    event: 'run.completed',
    severity: summary.status === 'success' ? 'info' : summary.status === 'partial' ? 'warning' : 'error',
    payload: {
      ...totals,
      unfinished: pairs
        .filter((p) => p.status !== 'completed')
        .map((p) => ({ site: p.site.name, resourceType: p.resourceType, status: p.status })),
    },
  });
  runLog.info(
    `Run ${summary.status}: ${summary.pairsCompleted}/${summary.pairsTotal} scans completed, ` +
      `${summary.flaggedCount} flagged, ${summary.errorCount} error(s)`,
  );

  return summary;
}

function summarize(
  state: RunState,
  meta: {
    correlationId: string;
    startedAt: Date;
    finishedAt: Date;
    logOnly: boolean;
    resourceTypes: ResourceType[];
    mutations: number;
    sessionRenewals: number;
  },
): RunSummary {
  const count = (status: ScanStatus): number => state.pairs.filter((p) => p.status === status).length;
  const sum = (key: 'recordCount' | 'flaggedCount' | 'warningCount' | 'errorCount'): number =>
    state.pairs.reduce((total, p) => total + p[key], 0);

  return {
    correlationId: meta.correlationId,
    status: deriveRunStatus(state),
    startedAt: meta.startedAt.toISOString(),
    finishedAt: meta.finishedAt.toISOString(),
    durationMs: Math.max(0, meta.finishedAt.getTime() - meta.startedAt.getTime()),
    logOnly: meta.logOnly,
    resourceTypes: meta.resourceTypes,
    sitesEnumerated: state.sitesEnumerated,
    enumerationPartial: state.enumerationPartial,
    pairsTotal: state.pairs.length,
    pairsCompleted: count('completed'),
    pairsFailed: count('failed'),
    pairsCancelled: count('cancelled'),
    recordCount: sum('recordCount'),
    flaggedCount: sum('flaggedCount'),
    warningCount: sum('warningCount'),
    errorCount: sum('errorCount'),
    mutations: meta.mutations,
    mutationFailures: state.mutationFailures,
    sessionRenewals: meta.sessionRenewals,
    ...(state.fatal !== null ? { error: state.fatal } : {}),
    pairs: state.pairs,
  };
}
