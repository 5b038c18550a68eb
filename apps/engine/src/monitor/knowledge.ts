import { formatTimestamp } from '@pulsewatch/records';

import type { KnowledgeParams } from '../schemas/checks';
import type { VerifyObservation } from './pending';
import { readPath } from './payload';
import { bearerHeaders, sendJsonRequest, sendRequest } from './request';
import { readEnv } from './result';
import { joinUrl } from './targets';
import { runTwoPhase, type StartOutcome } from './two-phase';
import type { CheckExecutor, ExecutionContext, PendingEntry } from './types';

function datasetUrl(params: KnowledgeParams, ctx: ExecutionContext, suffix: string): string {
  const datasetId = encodeURIComponent(readEnv(ctx, params.dataset_id_env));
  return joinUrl(params.base_url, `/datasets/${datasetId}${suffix}`);
}

function requestOptions(params: KnowledgeParams, ctx: ExecutionContext) {
  return {
    headers: bearerHeaders(readEnv(ctx, params.api_key_env)),
    timeoutMs: params.timeout_ms ?? ctx.requestTimeoutMs,
    signal: ctx.signal,
  };
}

export function probeDocumentName(unixSeconds: number): string {
  // 2026-10-18T10:00:00Z -> status-check-20261018-100000
  const compact = formatTimestamp(unixSeconds).replace(/[-:Z]/g, '').replace('T', '-');
  return `status-check-${compact}`;
}

async function uploadDocument(params: KnowledgeParams, ctx: ExecutionContext): Promise<StartOutcome> {
  const res = await sendJsonRequest({
    ...requestOptions(params, ctx),
    url: datasetUrl(params, ctx, '/document/create-by-text'),
    method: 'POST',
    body: {
      name: probeDocumentName(ctx.clock()),
      text: params.document_text,
      indexing_technique: 'economy',
      process_rule: { mode: 'automatic' },
    },
  });

  if (res.status !== 200) {
    return { ok: false, responseTimeMs: res.latencyMs, message: `Upload failed: HTTP ${res.status}` };
  }

  const documentId = readPath(res.json, 'document.id');
  const batch = readPath(res.json, 'batch');
  if (typeof documentId !== 'string' || !documentId || typeof batch !== 'string' || !batch) {
    return {
      ok: false,
      responseTimeMs: res.latencyMs,
      message: 'Upload failed: missing document ID or batch ID in response',
    };
  }

  return {
    ok: true,
    token: batch,
    context: { document_id: documentId },
    responseTimeMs: res.latencyMs,
    message: `Document uploaded (batch ${batch})`,
  };
}

async function readIndexingStatus(
  params: KnowledgeParams,
  ctx: ExecutionContext,
  entry: PendingEntry,
): Promise<VerifyObservation> {
  const res = await sendJsonRequest({
    ...requestOptions(params, ctx),
    url: datasetUrl(params, ctx, `/documents/${encodeURIComponent(entry.token)}/indexing-status`),
    method: 'GET',
  });

  if (res.status !== 200) {
    return { state: 'failed', message: `Status check failed: HTTP ${res.status}` };
  }

  const data = readPath(res.json, 'data');
  if (!Array.isArray(data) || data.length === 0) {
    return { state: 'failed', message: 'Status check returned empty data' };
  }

  const indexingStatus = readPath(data, '[0].indexing_status');
  if (indexingStatus === 'completed') {
    return { state: 'completed', message: 'Indexing completed' };
  }
  if (indexingStatus === 'error') {
    const error = readPath(data, '[0].error');
    return { state: 'failed', message: `Indexing failed: ${typeof error === 'string' ? error : 'unknown error'}` };
  }
  return { state: 'in_progress', message: `status: ${String(indexingStatus ?? 'unknown')}` };
}

async function deleteDocument(
  params: KnowledgeParams,
  ctx: ExecutionContext,
  entry: PendingEntry,
): Promise<void> {
  const documentId = entry.context.document_id;
  if (!documentId) return;

  const res = await sendRequest({
    ...requestOptions(params, ctx),
    url: datasetUrl(params, ctx, `/documents/${encodeURIComponent(documentId)}`),
    method: 'DELETE',
  });
  if (res.status < 200 || res.status >= 300) {
    throw new Error(`Delete of document ${documentId} returned HTTP ${res.status}`);
  }
}

export const runKnowledgeCheck: CheckExecutor<'knowledge'> = (definition, ctx) => {
  const { params } = definition;
  return runTwoPhase(definition.id, ctx, {
    verifyAfterMinutes: params.verify_after_minutes,
    start: () => uploadDocument(params, ctx),
    verify: (entry) => readIndexingStatus(params, ctx, entry),
    cleanup: (entry) => deleteDocument(params, ctx, entry),
  });
};
