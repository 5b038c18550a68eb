import { formatTimestamp, type CheckResult } from '@pulsewatch/records';

import type { EngineConfig } from '../config';
import { StaleDependencyError, StorageError, toErrorMessage } from '../errors';
import type { Logger } from '../logger';
import { findPendingEntry } from '../monitor/pending';
import { executeCheck } from '../monitor/registry';
import type { ExecutionContext } from '../monitor/types';
import { isTwoPhase, type CheckDefinition } from '../schemas/checks';
import { pendingDeadlineSeconds, pendingLookbackSeconds } from '../settings';
import type { ResultStore } from '../store/results';
import { buildExecutionLevels } from './plan';
import { mapWithConcurrency } from './pool';

export type RunChecksDeps = {
  store: ResultStore;
  logger: Logger;
  // unix seconds
  clock: () => number;
  env: Readonly<Record<string, string | undefined>>;
  execute?: (definition: CheckDefinition, ctx: ExecutionContext) => Promise<CheckResult[]>;
};

/** Records produced this cycle, keyed by check id. */
export type CycleResults = Map<string, CheckResult[]>;

/**
 * Throws StaleDependencyError when the dependency produced nothing this cycle;
 * otherwise reports whether any of its records is `down`.
 */
export function dependencyFailed(
  checkId: string,
  dependsOn: string,
  cycle: ReadonlyMap<string, readonly CheckResult[]>,
): boolean {
  const records = cycle.get(dependsOn);
  if (!records || records.length === 0) {
    throw new StaleDependencyError(checkId, dependsOn);
  }
  return records.some((r) => r.status === 'down');
}

function resolveDependency(
  definition: CheckDefinition,
  cycle: ReadonlyMap<string, readonly CheckResult[]>,
  logger: Logger,
): boolean {
  if (definition.depends_on === undefined) return false;
  try {
    return dependencyFailed(definition.id, definition.depends_on, cycle);
  } catch (err) {
    if (err instanceof StaleDependencyError) {
      logger.warn({ check_id: err.checkId, depends_on: err.dependsOn }, 'scheduler: stale dependency, failing closed');
      return true;
    }
    throw err;
  }
}

type Settled = { kind: 'done'; results: CheckResult[] } | { kind: 'timeout' };

function logRecord(logger: Logger, record: CheckResult): void {
  logger.info(
    {
      check_id: record.check_id,
      status: record.status,
      response_time_ms: record.response_time_ms,
      cycle_phase: record.cycle_phase,
      message: record.message,
    },
    'check result',
  );
}

function failureRecord(definition: CheckDefinition, at: number, message: string): CheckResult {
  return {
    check_id: definition.id,
    timestamp: formatTimestamp(at),
    status: 'down',
    response_time_ms: -1,
    message,
    // A failed start opens no claim, so the outstanding one (if any) stays open.
    ...(isTwoPhase(definition) ? { cycle_phase: 'start' as const } : {}),
  };
}

async function runOne(
  definition: CheckDefinition,
  config: EngineConfig,
  deps: RunChecksDeps,
  cycle: ReadonlyMap<string, readonly CheckResult[]>,
): Promise<CheckResult[]> {
  const { settings } = config;
  const execute = deps.execute ?? executeCheck;
  const failed = resolveDependency(definition, cycle, deps.logger);

  const pending =
    isTwoPhase(definition) && !failed
      ? await findPendingEntry(deps.store, definition.id, deps.clock(), pendingLookbackSeconds(settings))
      : null;

  const controller = new AbortController();
  // Records already appended through ctx.persist, in order.
  const persisted: CheckResult[] = [];
  const ctx: ExecutionContext = {
    clock: deps.clock,
    signal: controller.signal,
    dependencyFailed: failed,
    dependsOn: definition.depends_on ?? null,
    requestTimeoutMs: settings.request_timeout_ms,
    env: deps.env,
    pending,
    pendingDeadlineSec: pendingDeadlineSeconds(settings),
    persist: async (record) => {
      if (controller.signal.aborted) {
        deps.logger.warn({ check_id: record.check_id }, 'scheduler: dropping record produced after timeout');
        return;
      }
      persisted.push(record);
      await deps.store.append(record);
      logRecord(deps.logger, record);
    },
    logger: deps.logger,
  };

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<Settled>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ kind: 'timeout' });
    }, settings.check_timeout_ms);
  });

  let results: CheckResult[];
  try {
    const settled = await Promise.race([
      execute(definition, ctx).then((r): Settled => ({ kind: 'done', results: r })),
      timeout,
    ]);
    results =
      settled.kind === 'done'
        ? settled.results
        : [
            ...persisted,
            failureRecord(definition, deps.clock(), `Check timed out after ${settings.check_timeout_ms}ms`),
          ];
  } catch (err) {
    if (err instanceof StorageError) throw err;
    deps.logger.error({ check_id: definition.id, err: toErrorMessage(err) }, 'scheduler: executor threw');
    results = [...persisted, failureRecord(definition, deps.clock(), `Unhandled: ${toErrorMessage(err)}`)];
  } finally {
    clearTimeout(timer);
  }

  for (const record of results) {
    if (persisted.includes(record)) continue;
    await deps.store.append(record);
    logRecord(deps.logger, record);
  }
  if (results.length === 0) {
    deps.logger.info({ check_id: definition.id }, 'check pending, no record this cycle');
  }

  return results;
}

/**
 * Runs every check once. Levels run one after another; checks inside a level run
 * concurrently, bounded by `settings.concurrency`. A StorageError aborts the cycle.
 */
export async function runChecks(config: EngineConfig, deps: RunChecksDeps): Promise<CycleResults> {
  const cycle: CycleResults = new Map();
  const levels = buildExecutionLevels(config.checks);

  for (const level of levels) {
    const produced = await mapWithConcurrency(level, config.settings.concurrency, (definition) =>
      runOne(definition, config, deps, cycle),
    );
    level.forEach((definition, i) => {
      cycle.set(definition.id, produced[i] ?? []);
    });
  }

  return cycle;
}
