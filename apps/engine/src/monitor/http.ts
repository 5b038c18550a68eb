import type { CheckResult } from '@pulsewatch/records';

import { TransportError, toErrorMessage } from '../errors';
import type { HttpParams } from '../schemas/checks';
import { MAX_BODY_BYTES, bearerHeaders, sendRequest } from './request';
import { buildResult, dependencyFailedResult, readEnv } from './result';
import type { CheckExecutor, ExecutionContext, ProbeOutcome } from './types';

export type HttpCheckConfig = {
  url: string;
  timeoutMs: number;
  method: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';
  headers: Record<string, string> | null;
  body: string | null;
  expectedStatus: number[] | null;
  expectedBody: string | null;
  retries: number;
};

const RETRY_DELAYS_MS = [300, 800] as const;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function statusOk(httpStatus: number, expectedStatus: number[] | null): boolean {
  if (expectedStatus && expectedStatus.length > 0) {
    return expectedStatus.includes(httpStatus);
  }
  return httpStatus >= 200 && httpStatus < 300;
}

async function attemptHttpCheck(config: HttpCheckConfig, signal?: AbortSignal): Promise<ProbeOutcome> {
  try {
    const res = await sendRequest({
      url: config.url,
      method: config.method,
      headers: config.headers ?? undefined,
      body: config.body ?? undefined,
      timeoutMs: config.timeoutMs,
      signal,
    });

    if (!statusOk(res.status, config.expectedStatus)) {
      const expected = config.expectedStatus ? config.expectedStatus.join('/') : '2xx';
      return {
        status: 'down',
        responseTimeMs: res.latencyMs,
        message: `HTTP ${res.status} (expected ${expected})`,
      };
    }

    const mustContain = config.expectedBody;
    if (!mustContain) {
      return { status: 'up', responseTimeMs: res.latencyMs, message: `HTTP ${res.status}` };
    }

    if (res.text.includes(mustContain)) {
      return {
        status: 'up',
        responseTimeMs: res.latencyMs,
        message: `HTTP ${res.status}, body contains '${mustContain}'`,
      };
    }

    return {
      status: 'down',
      responseTimeMs: res.latencyMs,
      message: res.truncated
        ? `HTTP ${res.status}, body exceeded ${MAX_BODY_BYTES} bytes without '${mustContain}'`
        : `HTTP ${res.status}, body missing '${mustContain}'`,
    };
  } catch (err) {
    if (err instanceof TransportError) {
      return { status: 'down', responseTimeMs: -1, message: err.message };
    }
    return { status: 'down', responseTimeMs: -1, message: `Error: ${toErrorMessage(err)}` };
  }
}

export async function probeHttp(
  config: HttpCheckConfig,
  signal?: AbortSignal,
): Promise<ProbeOutcome & { attempts: number }> {
  const maxAttempts = 1 + Math.min(config.retries, RETRY_DELAYS_MS.length);
  let last: ProbeOutcome = { status: 'down', responseTimeMs: -1, message: 'No attempts executed' };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    last = await attemptHttpCheck(config, signal);
    if (last.status === 'up') {
      return { ...last, attempts: attempt };
    }
    if (attempt === maxAttempts || signal?.aborted) {
      return { ...last, attempts: attempt };
    }

    const delay = RETRY_DELAYS_MS[attempt - 1];
    if (delay !== undefined) {
      await sleep(delay);
    }
  }

  return { ...last, attempts: maxAttempts };
}

export function httpConfigFromDefinition(
  params: HttpParams,
  ctx: ExecutionContext,
): HttpCheckConfig {
  const token = readEnv(ctx, params.api_key_env);
  const headers = { ...bearerHeaders(token), ...params.headers };

  return {
    url: params.url,
    timeoutMs: params.timeout_ms ?? ctx.requestTimeoutMs,
    method: params.method,
    headers: Object.keys(headers).length > 0 ? headers : null,
    body: params.body ?? null,
    expectedStatus: params.expected_status ?? null,
    expectedBody: params.expected_body ?? null,
    retries: params.retries,
  };
}

export const runHttpCheck: CheckExecutor<'http'> = async (definition, ctx): Promise<CheckResult[]> => {
  if (ctx.dependencyFailed) {
    return [dependencyFailedResult(definition.id, ctx)];
  }

  const { attempts, ...outcome } = await probeHttp(
    httpConfigFromDefinition(definition.params, ctx),
    ctx.signal,
  );
  const message = attempts > 1 ? `${outcome.message} (attempt ${attempts})` : outcome.message;
  return [buildResult(definition.id, ctx, { ...outcome, message })];
};
