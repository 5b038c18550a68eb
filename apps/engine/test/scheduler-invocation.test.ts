import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { transitionStateSchema, type CheckResult, type CheckStatus, type TransitionState } from '@pulsewatch/records';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { EngineConfig } from '../src/config';
import { StorageError } from '../src/errors';
import type { ExecutionContext } from '../src/monitor/types';
import { runInvocation } from '../src/scheduler/invocation';
import type { CheckDefinition } from '../src/schemas/checks';
import { FileResultStore } from '../src/store/results';
import { FileTransitionStateStore } from '../src/store/transition-state';
import {
  T0,
  MemoryResultStore,
  MemoryStateStore,
  RecordingNotifier,
  buildConfig,
  buildRecord,
  httpCheck,
  silentLogger,
} from './helpers/data-builders';
import { makeTempDir, removeTempDir } from './helpers/temp-dir';

describe('scheduler/invocation', () => {
  let dir: string;
  let config: EngineConfig;
  let now: number;
  let apiStatus: CheckStatus;

  const execute = async (def: CheckDefinition, ctx: ExecutionContext): Promise<CheckResult[]> => [
    buildRecord(def.id, ctx.clock(), def.id === 'api' ? apiStatus : 'up'),
  ];

  beforeEach(async () => {
    dir = await makeTempDir();
    config = buildConfig([httpCheck('api'), httpCheck('docs')], {
      data_dir: path.join(dir, 'data'),
      summary_path: path.join(dir, 'site', 'data', 'summary.json'),
      state_path: path.join(dir, 'data', '.transition_state.json'),
    });
    now = T0;
    apiStatus = 'up';
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function fileDeps(notifier: RecordingNotifier) {
    return {
      store: new FileResultStore(config.settings.data_dir, silentLogger),
      stateStore: new FileTransitionStateStore(config.settings.state_path),
      notifier,
      logger: silentLogger,
      clock: () => now,
      env: {},
      execute,
    };
  }

  async function readState(): Promise<TransitionState> {
    return transitionStateSchema.parse(JSON.parse(await readFile(config.settings.state_path, 'utf-8')));
  }

  it('notifies once per edge across invocations', async () => {
    const notifier = new RecordingNotifier();

    const first = await runInvocation(config, fileDeps(notifier));
    expect(first.event).toBeNull();
    expect((await readState()).overall).toBe('up');

    now = T0 + 900;
    apiStatus = 'down';
    const second = await runInvocation(config, fileDeps(notifier));
    expect(second.event?.key).toBe('incident:2026-10-18T10:15:00Z');
    expect(second.event?.affected_checks).toEqual(['api']);

    now = T0 + 1_800;
    const third = await runInvocation(config, fileDeps(notifier));
    expect(third.event).toBeNull();

    now = T0 + 2_700;
    apiStatus = 'up';
    await runInvocation(config, fileDeps(notifier));

    expect(notifier.events.map((e) => e.key)).toEqual([
      'incident:2026-10-18T10:15:00Z',
      'recovered:2026-10-18T10:45:00Z',
    ]);
    expect((await readState()).outbox).toEqual([]);
  });

  it('writes the status summary', async () => {
    apiStatus = 'degraded';

    const report = await runInvocation(config, fileDeps(new RecordingNotifier()));

    const written: unknown = JSON.parse(await readFile(config.settings.summary_path, 'utf-8'));
    expect(written).toMatchObject({ current_overall: 'Degraded Performance', current_overall_status: 'degraded' });
    expect(report.summary.checks.map((c) => c.current_status)).toEqual(['degraded', 'up']);
    expect([...report.cycle.keys()]).toEqual(['api', 'docs']);
  });

  it('redelivers an undelivered event with the same key on the next invocation', async () => {
    const notifier = new RecordingNotifier();
    await runInvocation(config, fileDeps(notifier));

    now = T0 + 900;
    apiStatus = 'down';
    notifier.failWith = new Error('channel unavailable');
    const failed = await runInvocation(config, fileDeps(notifier));
    expect(failed.delivery?.failed).toEqual(['incident:2026-10-18T10:15:00Z']);
    expect((await readState()).outbox.map((e) => e.key)).toEqual(['incident:2026-10-18T10:15:00Z']);

    now = T0 + 1_800;
    notifier.failWith = null;
    const retried = await runInvocation(config, fileDeps(notifier));

    expect(retried.event).toBeNull();
    expect(retried.delivery?.delivered).toEqual(['incident:2026-10-18T10:15:00Z']);
    expect(notifier.events.map((e) => e.key)).toEqual(['incident:2026-10-18T10:15:00Z']);
    expect((await readState()).outbox).toEqual([]);
  });

  it('sends nothing when the state cannot be persisted', async () => {
    const stateStore = new MemoryStateStore({
      overall: 'up',
      checks: { api: 'up', docs: 'up' },
      updated_at: '2026-10-18T09:45:00Z',
      outbox: [],
    });
    stateStore.write = async () => {
      throw new StorageError('read-only file system', config.settings.state_path);
    };
    const notifier = new RecordingNotifier();
    apiStatus = 'down';

    await expect(
      runInvocation(config, {
        store: new MemoryResultStore(),
        stateStore,
        notifier,
        logger: silentLogger,
        clock: () => now,
        env: {},
        execute,
      }),
    ).rejects.toBeInstanceOf(StorageError);
    expect(notifier.events).toEqual([]);
  });
});
