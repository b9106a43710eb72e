/**
 * Mode Gate - decides whether a flagged record goes any further than the log
 *
 * The run-level `logOnly` flag wins over everything: while it is set the
 * Mutator is never called. Otherwise a flagged record is handed to the
 * Mutator only when its threshold's mode is `cleanup`.
 *
 * @module run/mode-gate
 */

import { isFlagged } from '../policy/policy-evaluator.js';
import type { RetryExecutor } from '../retry/retry-executor.js';
import type { AuthSession } from '../session/auth-session.js';
import { recordRef, siteRef, type EmitInput } from '../logging/structured-logger.js';
import type { LogEntry, PolicyThreshold, ResourceRecord, Session, SiteDescriptor, Verdict } from '../types.js';

/**
 * Performs the destructive action for a flagged record (suspend a user,
 * archive a workbook, reschedule a refresh). Not implemented here.
 */
export interface Mutator {
  apply(site: SiteDescriptor, record: ResourceRecord, verdict: Verdict, session: Session): Promise<void>;
}

export type GateOutcome = 'not-flagged' | 'log-only' | 'unavailable' | 'mutated';

export interface ModeGateOptions {
  logOnly: boolean;
  mutator?: Mutator | null;
  retry: RetryExecutor;
  auth: AuthSession;
  events: { emit(input: EmitInput): Promise<LogEntry> };
  signal?: AbortSignal;
}

export class ModeGate {
  private readonly options: ModeGateOptions;
  private unavailableLogged = false;
  private mutationCount = 0;

  constructor(options: ModeGateOptions) {
    this.options = options;
  }

  get logOnly(): boolean {
    return this.options.logOnly;
  }

  get mutations(): number {
    return this.mutationCount;
  }

  /**
   * Route one verdict. Mutator failures propagate to the caller after the
   * retry layer gives up.
   */
  async handle(
    site: SiteDescriptor,
    record: ResourceRecord,
    verdict: Verdict,
    threshold: PolicyThreshold,
  ): Promise<GateOutcome> {
    if (!isFlagged(verdict)) return 'not-flagged';
    if (this.options.logOnly || threshold.mode === 'log-only') return 'log-only';

    const { mutator, retry, auth, events, signal } = this.options;
    if (!mutator) {
      if (!this.unavailableLogged) {
        this.unavailableLogged = true;
        await events.emit({
          event: 'cleanup.unavailable',
          severity: 'warning',
          payload: { message: 'Cleanup requested but no mutator is configured; nothing will be changed' },
        });
      }
      return 'unavailable';
    }

    await retry.run(() => auth.withSession((session) => mutator.apply(site, record, verdict, session), null, site), {
      label: `cleanup ${record.type} ${record.id}`,
      signal,
    });
    this.mutationCount++;

    await events.emit({
      event: 'record.mutated',
      severity: 'warning',
      stream: record.type,
      payload: { site: siteRef(site), resourceType: record.type, record: recordRef(record), verdict },
    });
    return 'mutated';
  }
}
