import { vi } from 'vitest';

export type FetchCall = {
  url: string;
  method: string;
  headers: Headers;
  body: string | undefined;
  signal: AbortSignal | undefined;
};

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function bodyText(body: RequestInit['body']): string | undefined {
  return typeof body === 'string' ? body : undefined;
}

/**
 * Replaces globalThis.fetch with a mock routed through `handler`.
 * Every call is recorded in `calls`.
 */
export function stubFetch(handler: (call: FetchCall) => Response | Promise<Response>) {
  const calls: FetchCall[] = [];
  const mock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const call: FetchCall = {
      url: String(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: bodyText(init?.body),
      signal: init?.signal ?? undefined,
    };
    calls.push(call);
    return handler(call);
  });
  globalThis.fetch = mock as unknown as typeof fetch;
  return { mock, calls };
}

/** A response that never arrives; rejects like fetch once `signal` aborts. */
export function hangUntilAborted(signal: AbortSignal | undefined): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    signal?.addEventListener('abort', () => {
      reject(new DOMException('The operation was aborted.', 'AbortError'));
    });
  });
}

/** A fetch that never answers until its signal aborts. */
export function stubHangingFetch() {
  const mock = vi.fn((_input: string | URL | Request, init?: RequestInit) =>
    hangUntilAborted(init?.signal ?? undefined),
  );
  globalThis.fetch = mock as unknown as typeof fetch;
  return mock;
}

export function parseBody(call: FetchCall | undefined): unknown {
  if (!call?.body) return undefined;
  return JSON.parse(call.body) as unknown;
}
