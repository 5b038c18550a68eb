import { toErrorMessage, TransportError } from '../errors';

const USER_AGENT = 'pulsewatch/0.1';
export const MAX_BODY_BYTES = 1024 * 1024; // 1 MiB

export type RequestSpec = {
  url: string;
  method: string;
  headers?: Record<string, string> | undefined;
  body?: string | undefined;
  timeoutMs: number;
  // Aborted when the whole check runs out of time.
  signal?: AbortSignal | undefined;
};

export type ResponseSnapshot = {
  status: number;
  latencyMs: number;
  text: string;
  truncated: boolean;
};

function isAbortError(err: unknown): boolean {
  if (err && typeof err === 'object' && 'name' in err) {
    return err.name === 'AbortError';
  }
  return false;
}

type ResponseBody = NonNullable<Response['body']>;

export async function readTextUpTo(
  stream: ResponseBody,
  maxBytes: number,
): Promise<{ text: string; truncated: boolean }> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let bytes = 0;
  let text = '';
  let truncated = false;

  try {
    while (true) {
      const r = await reader.read();
      if (r.done) break;

      const chunk: Uint8Array = r.value;
      if (!chunk || chunk.length === 0) continue;

      const remaining = maxBytes - bytes;
      if (remaining <= 0) {
        truncated = true;
        break;
      }

      if (chunk.length <= remaining) {
        bytes += chunk.length;
        text += decoder.decode(chunk, { stream: true });
      } else {
        bytes += remaining;
        text += decoder.decode(chunk.slice(0, remaining), { stream: true });
        truncated = true;
        break;
      }
    }
  } finally {
    if (truncated) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }

  text += decoder.decode();
  return { text, truncated };
}

/**
 * Issues one request bounded by `timeoutMs` and reads at most 1 MiB of the body.
 * Every network failure, including the timeout, surfaces as a TransportError.
 */
export async function sendRequest(spec: RequestSpec): Promise<ResponseSnapshot> {
  const controller = new AbortController();
  let timedOut = false;

  const onOuterAbort = () => controller.abort();
  if (spec.signal) {
    if (spec.signal.aborted) controller.abort();
    spec.signal.addEventListener('abort', onOuterAbort);
  }

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, spec.timeoutMs);

  const headers = new Headers(spec.headers);
  if (!headers.has('user-agent')) {
    headers.set('User-Agent', USER_AGENT);
  }

  const started = performance.now();
  try {
    const res = await fetch(spec.url, {
      method: spec.method,
      headers,
      body: spec.body,
      redirect: 'follow',
      signal: controller.signal,
    });
    const latencyMs = Math.round(performance.now() - started);

    if (!res.body) {
      return { status: res.status, latencyMs, text: '', truncated: false };
    }
    const { text, truncated } = await readTextUpTo(res.body, MAX_BODY_BYTES);
    return { status: res.status, latencyMs, text, truncated };
  } catch (err) {
    if (isAbortError(err)) {
      const message = timedOut ? `Timeout after ${spec.timeoutMs}ms` : 'Request aborted';
      throw new TransportError(message, true, { cause: err });
    }
    throw new TransportError(toErrorMessage(err), false, { cause: err });
  } finally {
    clearTimeout(timer);
    spec.signal?.removeEventListener('abort', onOuterAbort);
  }
}

export type JsonResponse = ResponseSnapshot & {
  // undefined when the body is not valid JSON.
  json: unknown;
};

export async function sendJsonRequest(
  spec: Omit<RequestSpec, 'body'> & { body?: unknown },
): Promise<JsonResponse> {
  const headers: Record<string, string> = { Accept: 'application/json', ...spec.headers };
  let body: string | undefined;
  if (spec.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(spec.body);
  }

  const res = await sendRequest({ ...spec, headers, body });

  let json: unknown;
  if (!res.truncated && res.text.length > 0) {
    try {
      json = JSON.parse(res.text) as unknown;
    } catch {
      json = undefined;
    }
  }
  return { ...res, json };
}

export function bearerHeaders(token: string): Record<string, string> {
  return token ? { Authorization: `Bearer ${token}` } : {};
}
