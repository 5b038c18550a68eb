import type { CheckResult } from '@pulsewatch/records';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { StaleDependencyError, StorageError } from '../src/errors';
import type { ExecutionContext } from '../src/monitor/types';
import { pendingEntryFromRecords } from '../src/monitor/pending';
import { dependencyFailed, runChecks } from '../src/scheduler/run-checks';
import type { CheckDefinition } from '../src/schemas/checks';
import {
  T0,
  MemoryResultStore,
  buildConfig,
  buildRecord,
  httpCheck,
  knowledgeCheck,
  silentLogger,
} from './helpers/data-builders';
import { hangUntilAborted, jsonResponse, stubFetch } from './helpers/fetch';

type Execute = (definition: CheckDefinition, ctx: ExecutionContext) => Promise<CheckResult[]>;

function deps(store: MemoryResultStore, execute?: Execute) {
  return {
    store,
    logger: silentLogger,
    clock: () => T0,
    env: {},
    ...(execute ? { execute } : {}),
  };
}

describe('scheduler/run-checks', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.clearAllMocks();
  });

  it('records a dependent as down without any request when its dependency is down', async () => {
    const { calls } = stubFetch(() => new Response('unavailable', { status: 503 }));
    const store = new MemoryResultStore();
    const config = buildConfig([
      httpCheck('sandbox', { url: 'https://sandbox.example.com/health' }, { depends_on: 'api' }),
      httpCheck('api', { url: 'https://api.example.com/health' }),
    ]);

    const cycle = await runChecks(config, deps(store));

    expect(calls.map((c) => c.url)).toEqual(['https://api.example.com/health']);
    expect(cycle.get('api')?.[0]).toMatchObject({ status: 'down', message: 'HTTP 503 (expected 2xx)' });
    expect(cycle.get('sandbox')).toEqual([
      {
        check_id: 'sandbox',
        timestamp: '2026-10-18T10:00:00Z',
        status: 'down',
        response_time_ms: -1,
        message: 'Skipped: dependency api failed',
      },
    ]);
    expect(store.records.map((r) => r.check_id)).toEqual(['api', 'sandbox']);
  });

  it('lets dependents run when the dependency is degraded', async () => {
    const seen = new Map<string, boolean>();
    const execute: Execute = async (def, ctx) => {
      seen.set(def.id, ctx.dependencyFailed);
      return [buildRecord(def.id, ctx.clock(), def.id === 'api' ? 'degraded' : 'up')];
    };
    const config = buildConfig([httpCheck('api'), httpCheck('sandbox', {}, { depends_on: 'api' })]);

    await runChecks(config, deps(new MemoryResultStore(), execute));

    expect(seen.get('sandbox')).toBe(false);
  });

  it('fails closed when the dependency produced no record this cycle', async () => {
    const seen = new Map<string, boolean>();
    const execute: Execute = async (def, ctx) => {
      seen.set(def.id, ctx.dependencyFailed);
      return def.id === 'kb' ? [] : [buildRecord(def.id, ctx.clock(), 'up')];
    };
    const config = buildConfig([knowledgeCheck('kb'), httpCheck('search', {}, { depends_on: 'kb' })]);

    await runChecks(config, deps(new MemoryResultStore(), execute));

    expect(seen.get('search')).toBe(true);
  });

  it('raises StaleDependencyError for a missing dependency result', () => {
    expect(() => dependencyFailed('search', 'kb', new Map())).toThrow(StaleDependencyError);
    expect(dependencyFailed('search', 'kb', new Map([['kb', [buildRecord('kb', T0, 'up')]]]))).toBe(false);
  });

  it('hands the outstanding claim to two-phase checks', async () => {
    const store = new MemoryResultStore();
    await store.append(
      buildRecord('kb', T0 - 900, 'up', {
        cycle_phase: 'start',
        pending_token: 'abc',
        pending_deadline: '2026-10-18T10:45:00Z',
        pending_context: { document_id: 'doc-1' },
      }),
    );
    const pendingSeen = new Map<string, string | null>();
    const execute: Execute = async (def, ctx) => {
      pendingSeen.set(def.id, ctx.pending?.token ?? null);
      return [];
    };

    await runChecks(buildConfig([knowledgeCheck('kb'), httpCheck('api')]), deps(store, execute));

    expect(pendingSeen.get('kb')).toBe('abc');
    expect(pendingSeen.get('api')).toBeNull();
  });

  it('resolves a check that exceeds its timeout to down and aborts only that check', async () => {
    const slow: { signal?: AbortSignal } = {};
    const execute: Execute = (def, ctx) => {
      if (def.id === 'slow') {
        slow.signal = ctx.signal;
        return new Promise<CheckResult[]>(() => undefined);
      }
      return Promise.resolve([buildRecord(def.id, ctx.clock(), 'up')]);
    };
    const config = buildConfig([httpCheck('slow'), httpCheck('fast')], { check_timeout_ms: 50 });

    const cycle = await runChecks(config, deps(new MemoryResultStore(), execute));

    expect(cycle.get('slow')).toEqual([
      {
        check_id: 'slow',
        timestamp: '2026-10-18T10:00:00Z',
        status: 'down',
        response_time_ms: -1,
        message: 'Check timed out after 50ms',
      },
    ]);
    expect(cycle.get('fast')?.[0]?.status).toBe('up');
    expect(slow.signal?.aborted).toBe(true);
  });

  it('keeps a resolved claim when the replacement upload times out', async () => {
    stubFetch((call) => {
      if (call.method === 'POST') return hangUntilAborted(call.signal);
      if (call.method === 'DELETE') return new Response(null, { status: 204 });
      return jsonResponse({ data: [{ indexing_status: 'completed' }] });
    });
    const store = new MemoryResultStore();
    await store.append(
      buildRecord('kb', T0 - 900, 'up', {
        cycle_phase: 'start',
        pending_token: 'abc',
        pending_deadline: '2026-10-18T10:45:00Z',
        pending_context: { document_id: 'doc-1' },
      }),
    );
    const config = buildConfig([knowledgeCheck('kb')], { check_timeout_ms: 200 });

    const cycle = await runChecks(config, {
      ...deps(store),
      env: { DATASET_ID: 'ds-1', KB_API_KEY: 'test-secret' },
    });

    expect(cycle.get('kb')).toEqual([
      {
        check_id: 'kb',
        timestamp: '2026-10-18T10:00:00Z',
        status: 'up',
        response_time_ms: 900_000,
        message: 'Indexing completed',
        pending_token: 'abc',
        cycle_phase: 'verify',
      },
      {
        check_id: 'kb',
        timestamp: '2026-10-18T10:00:00Z',
        status: 'down',
        response_time_ms: -1,
        message: 'Check timed out after 200ms',
        cycle_phase: 'start',
      },
    ]);
    expect(store.records.map((r) => [r.cycle_phase, r.pending_token ?? null, r.status])).toEqual([
      ['start', 'abc', 'up'],
      ['verify', 'abc', 'up'],
      ['start', null, 'down'],
    ]);
    expect(pendingEntryFromRecords(store.records)).toBeNull();
  });

  it('turns an executor exception into a down record', async () => {
    const execute: Execute = async () => {
      throw new Error('boom');
    };

    const cycle = await runChecks(buildConfig([httpCheck('api')]), deps(new MemoryResultStore(), execute));

    expect(cycle.get('api')?.[0]).toMatchObject({ status: 'down', message: 'Unhandled: boom' });
  });

  it('aborts the cycle on a storage failure', async () => {
    const store = new MemoryResultStore();
    store.append = async () => {
      throw new StorageError('disk full', '/srv/pulsewatch/data');
    };
    const execute: Execute = async (def, ctx) => [buildRecord(def.id, ctx.clock(), 'up')];

    await expect(runChecks(buildConfig([httpCheck('api')]), deps(store, execute))).rejects.toBeInstanceOf(
      StorageError,
    );
  });

  it('keeps at most `concurrency` checks in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const execute: Execute = async (def, ctx) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      return [buildRecord(def.id, ctx.clock(), 'up')];
    };
    const checks = ['a', 'b', 'c', 'd', 'e'].map((id) => httpCheck(id));

    const cycle = await runChecks(buildConfig(checks, { concurrency: 2 }), deps(new MemoryResultStore(), execute));

    expect(peak).toBe(2);
    expect([...cycle.keys()]).toEqual(['a', 'b', 'c', 'd', 'e']);
  });
});
