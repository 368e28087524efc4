export interface FakeRequest {
  url: URL;
  method: string;
  headers: Headers;
  body: unknown;
  redirect?: RequestRedirect;
  signal?: AbortSignal;
}

export type FakeHandler = (request: FakeRequest) => Promise<Response> | Response;

export interface FakeFetch {
  fetch: (input: string | URL | Request, init?: RequestInit) => Promise<Response>;
  calls: FakeRequest[];
}

function parseBody(body: RequestInit['body']): unknown {
  if (typeof body !== 'string') return undefined;
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

/** Stand-in for the global fetch: records every call and routes it to `handler`. */
export function createFakeFetch(handler: FakeHandler): FakeFetch {
  const calls: FakeRequest[] = [];

  const fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const request: FakeRequest = {
      url: new URL(href),
      method: (init?.method ?? 'GET').toUpperCase(),
      headers: new Headers(init?.headers),
      body: parseBody(init?.body),
      redirect: init?.redirect,
      signal: init?.signal ?? undefined,
    };
    calls.push(request);
    if (request.signal?.aborted) throw request.signal.reason;
    return handler(request);
  };

  return { fetch, calls };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function waitFor<T>(
  check: () => Promise<T | null | undefined>,
  timeoutMs = 3000,
  intervalMs = 10,
): Promise<T> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    const value = await check();
    if (value !== null && value !== undefined) return value;
    await new Promise(resolve => setTimeout(resolve, intervalMs));
  }
  throw new Error(`Condition not met within ${timeoutMs}ms`);
}
