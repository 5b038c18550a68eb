import { randomUUID } from 'node:crypto';

import type { WebhookParams } from '../schemas/checks';
import type { VerifyObservation } from './pending';
import { readPath } from './payload';
import { bearerHeaders, sendJsonRequest } from './request';
import { readEnv } from './result';
import { joinUrl } from './targets';
import { runTwoPhase, type StartOutcome } from './two-phase';
import type { CheckExecutor, ExecutionContext, PendingEntry } from './types';

export function newTriggerId(): string {
  return `status-check-${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

function triggerUrl(params: WebhookParams, ctx: ExecutionContext): string {
  const token = readEnv(ctx, params.trigger_token_env);
  return token ? joinUrl(params.trigger_url, encodeURIComponent(token)) : params.trigger_url;
}

async function fireTrigger(params: WebhookParams, ctx: ExecutionContext): Promise<StartOutcome> {
  const triggerId = newTriggerId();
  const res = await sendJsonRequest({
    url: triggerUrl(params, ctx),
    method: 'POST',
    body: { id: triggerId, timestamp: ctx.clock() },
    timeoutMs: params.timeout_ms ?? ctx.requestTimeoutMs,
    signal: ctx.signal,
  });

  if (res.status !== 200) {
    return {
      ok: false,
      responseTimeMs: res.latencyMs,
      message: `Webhook trigger failed: HTTP ${res.status}`,
    };
  }

  return {
    ok: true,
    token: triggerId,
    context: {},
    responseTimeMs: res.latencyMs,
    message: `Webhook triggered (${triggerId})`,
  };
}

async function readWorkflowRun(
  params: WebhookParams,
  ctx: ExecutionContext,
  entry: PendingEntry,
): Promise<VerifyObservation> {
  const query = new URLSearchParams({ keyword: entry.token, limit: '1' });
  const res = await sendJsonRequest({
    url: `${joinUrl(params.base_url, '/workflows/logs')}?${query.toString()}`,
    method: 'GET',
    headers: bearerHeaders(readEnv(ctx, params.api_key_env)),
    timeoutMs: params.timeout_ms ?? ctx.requestTimeoutMs,
    signal: ctx.signal,
  });

  if (res.status !== 200) {
    return { state: 'failed', message: `Failed to fetch workflow logs: HTTP ${res.status}` };
  }

  const logs = readPath(res.json, 'data');
  if (!Array.isArray(logs) || logs.length === 0) {
    return { state: 'in_progress', message: 'no workflow run recorded yet' };
  }

  const status = readPath(logs, '[0].workflow_run.status');
  if (status === 'succeeded') {
    const elapsed = readPath(logs, '[0].workflow_run.elapsed_time');
    const detail = typeof elapsed === 'number' ? ` in ${elapsed.toFixed(1)}s` : '';
    return { state: 'completed', message: `Webhook processed${detail}` };
  }
  if (status === 'failed') {
    const error = readPath(logs, '[0].workflow_run.error');
    return {
      state: 'failed',
      message: `Webhook processing failed: ${typeof error === 'string' ? error : 'unknown error'}`,
    };
  }
  return { state: 'in_progress', message: `status: ${String(status ?? 'unknown')}` };
}

export const runWebhookCheck: CheckExecutor<'webhook'> = (definition, ctx) => {
  const { params } = definition;
  return runTwoPhase(definition.id, ctx, {
    verifyAfterMinutes: params.verify_after_minutes,
    start: () => fireTrigger(params, ctx),
    verify: (entry) => readWorkflowRun(params, ctx, entry),
  });
};
