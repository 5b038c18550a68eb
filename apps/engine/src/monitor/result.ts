import { formatTimestamp, type CheckResult } from '@pulsewatch/records';

import type { ExecutionContext, ProbeOutcome } from './types';

export function buildResult(
  checkId: string,
  ctx: ExecutionContext,
  outcome: ProbeOutcome,
  extra: Pick<CheckResult, 'pending_token' | 'cycle_phase' | 'pending_deadline' | 'pending_context'> = {},
): CheckResult {
  return {
    check_id: checkId,
    timestamp: formatTimestamp(ctx.clock()),
    status: outcome.status,
    response_time_ms: outcome.responseTimeMs,
    message: outcome.message,
    ...extra,
  };
}

/** Recorded instead of probing when the dependency failed this cycle. No network call is made. */
export function dependencyFailedResult(checkId: string, ctx: ExecutionContext): CheckResult {
  const dep = ctx.dependsOn ?? 'dependency';
  return buildResult(checkId, ctx, {
    status: 'down',
    responseTimeMs: -1,
    message: `Skipped: dependency ${dep} failed`,
  });
}

export function readEnv(ctx: ExecutionContext, name: string | undefined): string {
  if (name === undefined) return '';
  return ctx.env[name] ?? '';
}
