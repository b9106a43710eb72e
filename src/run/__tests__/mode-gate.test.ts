/**
 * Tests for ModeGate
 *
 * @module run/__tests__/mode-gate
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { ServerError, ExhaustedRetriesError } from '../../errors.js';
import type { EmitInput } from '../../logging/structured-logger.js';
import { RetryExecutor } from '../../retry/retry-executor.js';
import { AuthSession } from '../../session/auth-session.js';
import { FakeBiApi, TEST_SERVER_URL, rawSite } from '../../__tests__/fake-bi-api.js';
import type { AgeThreshold, AgeVerdict, LogEntry, ResourceRecord, SiteDescriptor } from '../../types.js';
import { ModeGate, type Mutator } from '../mode-gate.js';

const SITE: SiteDescriptor = { id: 'site-1', contentUrl: '', name: 'Default' };
const RECORD: ResourceRecord = {
  type: 'workbooks',
  id: 'w1',
  name: 'Old dashboard',
  ownerId: 'owner-1',
  lastActivityAt: new Date('2020-01-01T00:00:00Z'),
  metadata: {},
};
const STALE: AgeVerdict = { kind: 'age', stale: true, ageDays: 900, thresholdDays: 730, reason: 'aged' };
const FRESH: AgeVerdict = { kind: 'age', stale: false, ageDays: 10, thresholdDays: 730, reason: 'within-window' };
const CLEANUP: AgeThreshold = { kind: 'age', type: 'workbooks', thresholdDays: 730, mode: 'cleanup' };
const LOG_ONLY: AgeThreshold = { ...CLEANUP, mode: 'log-only' };

describe('ModeGate', () => {
  let auth: AuthSession;
  let retry: RetryExecutor;
  let emitted: EmitInput[];
  let events: { emit(input: EmitInput): Promise<LogEntry> };
  let apply: Mock<Mutator['apply']>;
  let mutator: Mutator;

  beforeEach(async () => {
    const api = new FakeBiApi([{ site: rawSite('site-1', '') }]);
    retry = new RetryExecutor({ sleep: async () => undefined, policy: { maxAttempts: 2 } });
    auth = new AuthSession({ client: api, retry });
    await auth.signIn({ serverUrl: TEST_SERVER_URL, tokenName: 'n', tokenSecret: 'test-secret', siteScope: '' });
    emitted = [];
    events = {
      emit: async (input) => {
        emitted.push(input);
        return {
          correlationId: 'run-1',
          timestamp: '2026-01-01T00:00:00.000Z',
          severity: input.severity ?? 'info',
          event: input.event,
          payload: input.payload ?? {},
        };
      },
    };
    apply = vi.fn<Mutator['apply']>(async () => undefined);
    mutator = { apply };
  });

  it('should never call the mutator in log-only mode', async () => {
    const gate = new ModeGate({ logOnly: true, mutator, retry, auth, events });

    await expect(gate.handle(SITE, RECORD, STALE, CLEANUP)).resolves.toBe('log-only');
    expect(apply).not.toHaveBeenCalled();
    expect(emitted).toEqual([]);
  });

  it('should leave unflagged records alone', async () => {
    const gate = new ModeGate({ logOnly: false, mutator, retry, auth, events });

    await expect(gate.handle(SITE, RECORD, FRESH, CLEANUP)).resolves.toBe('not-flagged');
    expect(apply).not.toHaveBeenCalled();
  });

  it('should respect a log-only threshold even when the run allows cleanup', async () => {
    const gate = new ModeGate({ logOnly: false, mutator, retry, auth, events });

    await expect(gate.handle(SITE, RECORD, STALE, LOG_ONLY)).resolves.toBe('log-only');
    expect(apply).not.toHaveBeenCalled();
  });

  it('should apply the mutator with the current session and log the mutation', async () => {
    const gate = new ModeGate({ logOnly: false, mutator, retry, auth, events });

    await expect(gate.handle(SITE, RECORD, STALE, CLEANUP)).resolves.toBe('mutated');

    expect(apply).toHaveBeenCalledWith(SITE, RECORD, STALE, auth.current());
    expect(gate.mutations).toBe(1);
    expect(emitted).toHaveLength(1);
    expect(emitted[0]).toMatchObject({ event: 'record.mutated', stream: 'workbooks', severity: 'warning' });
  });

  it('should log cleanup.unavailable once when no mutator is configured', async () => {
    const gate = new ModeGate({ logOnly: false, mutator: null, retry, auth, events });

    await gate.handle(SITE, RECORD, STALE, CLEANUP);
    await gate.handle(SITE, { ...RECORD, id: 'w2' }, STALE, CLEANUP);

    expect(emitted.map((e) => e.event)).toEqual(['cleanup.unavailable']);
    expect(gate.mutations).toBe(0);
  });

  it('should retry a failing mutator and then propagate', async () => {
    apply.mockRejectedValue(new ServerError('HTTP 503', 503));
    const gate = new ModeGate({ logOnly: false, mutator, retry, auth, events });

    await expect(gate.handle(SITE, RECORD, STALE, CLEANUP)).rejects.toBeInstanceOf(ExhaustedRetriesError);
    expect(apply).toHaveBeenCalledTimes(2);
    expect(gate.mutations).toBe(0);
  });
});
