import type { TransitionEvent } from '@pulsewatch/records';

import {
  buildStatusSummary,
  loadWindowRecords,
  writeStatusSummary,
  type StatusSummary,
} from '../analytics/summary';
import type { EngineConfig } from '../config';
import type { Logger } from '../logger';
import { deliverOutbox, type DeliveryReport } from '../notify/deliver';
import type { Notifier } from '../notify/notifier';
import { detectTransition } from '../notify/transitions';
import type { ResultStore } from '../store/results';
import type { TransitionStateStore } from '../store/transition-state';
import { runChecks, type CycleResults, type RunChecksDeps } from './run-checks';

export type InvocationDeps = RunChecksDeps & {
  stateStore: TransitionStateStore;
  notifier: Notifier;
  store: ResultStore;
};

export type InvocationReport = {
  cycle: CycleResults;
  summary: StatusSummary;
  event: TransitionEvent | null;
  delivery: DeliveryReport | null;
};

/**
 * One batch: run checks, recompute the summary from history, persist the transition
 * state (with any new event in its outbox), then deliver the outbox.
 */
export async function runInvocation(config: EngineConfig, deps: InvocationDeps): Promise<InvocationReport> {
  const log: Logger = deps.logger;
  const started = Date.now();

  const cycle = await runChecks(config, deps);

  const now = deps.clock();
  const records = await loadWindowRecords(deps.store, config.checks, now, config.settings.retention_days);
  const summary = buildStatusSummary({
    checks: config.checks,
    records,
    now,
    retentionDays: config.settings.retention_days,
    siteTitle: config.settings.site_title,
  });
  await writeStatusSummary(config.settings.summary_path, summary);

  const prev = await deps.stateStore.read();
  const checks: Record<string, StatusSummary['current_overall_status']> = {};
  for (const c of summary.checks) checks[c.id] = c.current_status;

  const { event, next } = detectTransition(prev, {
    overall: summary.current_overall_status,
    checks,
    now,
  });

  // A failed write propagates before anything is sent.
  if (next) await deps.stateStore.write(next);
  if (event) log.warn({ event_key: event.key, kind: event.kind, affected: event.affected_checks }, 'transition detected');

  const state = next ?? prev;
  const delivery =
    state && state.outbox.length > 0
      ? await deliverOutbox(state, { notifier: deps.notifier, stateStore: deps.stateStore, logger: log })
      : null;

  let recorded = 0;
  for (const list of cycle.values()) recorded += list.length;
  log.info(
    {
      checks: config.checks.length,
      records: recorded,
      overall: summary.current_overall_status,
      delivered: delivery?.delivered.length ?? 0,
      duration_ms: Date.now() - started,
    },
    'invocation complete',
  );

  return { cycle, summary, event, delivery };
}
