import type { Logger } from '../logger.js';
import type { HttpMethod, ParamSet, UpstreamFailure } from '../types/batch.js';
import { describeError } from '../errors.js';

export interface UpstreamRequest {
  url: string;
  method: HttpMethod;
  params: ParamSet;
  sourceId?: string | number | null;
}

export type UpstreamOutcome =
  | { ok: true; statusCode: number; data: unknown }
  | { ok: false; error: UpstreamFailure };

export interface UpstreamClientOptions {
  timeoutMs: number;
  logger?: Logger;
}

function queryValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Builds the outgoing request for one parameter set. GET carries the
 * parameters in the query string; every other method sends them as the JSON
 * body. `sourceId` is merged in unless the parameter set names its own.
 */
export function buildRequest(request: UpstreamRequest): { url: string; init: RequestInit } {
  const payload: ParamSet = request.sourceId !== undefined && request.sourceId !== null
    ? { sourceId: request.sourceId, ...request.params }
    : { ...request.params };

  if (request.method === 'GET') {
    const url = new URL(request.url);
    for (const [key, value] of Object.entries(payload)) {
      if (value === undefined || value === null) continue;
      url.searchParams.set(key, queryValue(value));
    }
    return { url: url.toString(), init: { method: 'GET', headers: { Accept: 'application/json' } } };
  }

  return {
    url: request.url,
    init: {
      method: request.method,
      headers: { 'Accept': 'application/json', 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    },
  };
}

function isTimeout(error: unknown): boolean {
  // AbortSignal.timeout rejects with a DOMException named TimeoutError
  if (typeof error !== 'object' || error === null || !('name' in error)) return false;
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

/**
 * Single-attempt HTTP caller. Every failure is returned as a classified
 * outcome; `call` never rejects. A 3xx answer is an `http_status` failure.
 */
export class UpstreamClient {
  constructor(private readonly options: UpstreamClientOptions) {}

  async call(request: UpstreamRequest): Promise<UpstreamOutcome> {
    let url: string;
    let init: RequestInit;
    try {
      ({ url, init } = buildRequest(request));
    } catch (error) {
      return { ok: false, error: { kind: 'invalid_response', message: `Could not build request: ${describeError(error)}` } };
    }

    const started = Date.now();
    let response: Response;
    let text: string;
    try {
      // Redirects are not followed: a Location header never passed the allowlist
      response = await fetch(url, { ...init, redirect: 'manual', signal: AbortSignal.timeout(this.options.timeoutMs) });
      text = await response.text();
    } catch (error) {
      const timedOut = isTimeout(error);
      this.options.logger?.debug({ method: request.method, durationMs: Date.now() - started, timedOut }, 'upstream call failed');
      return timedOut
        ? { ok: false, error: { kind: 'timeout', message: `No response within ${this.options.timeoutMs}ms` } }
        : { ok: false, error: { kind: 'connection', message: describeError(error) } };
    }

    this.options.logger?.debug({ method: request.method, statusCode: response.status, durationMs: Date.now() - started }, 'upstream call finished');

    if (!response.ok) {
      return {
        ok: false,
        error: { kind: 'http_status', message: `HTTP ${response.status}`, statusCode: response.status },
      };
    }

    return { ok: true, statusCode: response.status, data: parseBody(text) };
  }
}

function parseBody(text: string): unknown {
  if (text === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
