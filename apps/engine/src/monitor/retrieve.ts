import type { CheckResult } from '@pulsewatch/records';

import { TransportError, toErrorMessage } from '../errors';
import type { RetrieveParams } from '../schemas/checks';
import { hasPath, readPath, renderJsonTemplate } from './payload';
import { bearerHeaders, sendJsonRequest } from './request';
import { buildResult, dependencyFailedResult, readEnv } from './result';
import { joinUrl } from './targets';
import type { CheckExecutor, ExecutionContext, ProbeOutcome } from './types';

export const DEFAULT_RETRIEVE_PAYLOAD = {
  query: '{{query}}',
  retrieval_model: {
    search_method: 'semantic_search',
    reranking_enable: false,
    top_k: 1,
    score_threshold_enabled: false,
  },
} as const;

export function buildRetrievePayload(params: RetrieveParams): unknown {
  const template = params.payload_template ?? DEFAULT_RETRIEVE_PAYLOAD;
  return renderJsonTemplate(template, { query: params.query });
}

async function probeRetrieve(params: RetrieveParams, ctx: ExecutionContext): Promise<ProbeOutcome> {
  const datasetId = readEnv(ctx, params.dataset_id_env);
  const url = joinUrl(params.base_url, `/datasets/${encodeURIComponent(datasetId)}/retrieve`);

  try {
    const res = await sendJsonRequest({
      url,
      method: 'POST',
      headers: bearerHeaders(readEnv(ctx, params.api_key_env)),
      body: buildRetrievePayload(params),
      timeoutMs: params.timeout_ms ?? ctx.requestTimeoutMs,
      signal: ctx.signal,
    });

    if (res.status !== 200) {
      return { status: 'down', responseTimeMs: res.latencyMs, message: `HTTP ${res.status} (expected 200)` };
    }

    // Presence is the success criterion; the value may be empty.
    if (res.json === undefined || !hasPath(res.json, params.expected_field)) {
      return {
        status: 'down',
        responseTimeMs: res.latencyMs,
        message: `Response missing '${params.expected_field}' field`,
      };
    }

    const value = readPath(res.json, params.expected_field);
    const detail = Array.isArray(value)
      ? `${value.length} record(s) returned`
      : `'${params.expected_field}' present`;
    return { status: 'up', responseTimeMs: res.latencyMs, message: `HTTP 200, ${detail}` };
  } catch (err) {
    if (err instanceof TransportError) {
      return { status: 'down', responseTimeMs: -1, message: err.message };
    }
    return { status: 'down', responseTimeMs: -1, message: `Error: ${toErrorMessage(err)}` };
  }
}

export const runRetrieveCheck: CheckExecutor<'retrieve'> = async (
  definition,
  ctx,
): Promise<CheckResult[]> => {
  if (ctx.dependencyFailed) {
    return [dependencyFailedResult(definition.id, ctx)];
  }
  return [buildResult(definition.id, ctx, await probeRetrieve(definition.params, ctx))];
};
