// ═══════════════════════════════════════════════════════════════════════════════
// COLLECTOR HTTP — JSON Requests with Timeout and Error Classification
// ═══════════════════════════════════════════════════════════════════════════════

import type { Result } from '../types/result.js';
import { ok, err } from '../types/result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface JsonRequest {
  readonly url: string;
  readonly method?: 'GET' | 'POST';
  readonly query?: Readonly<Record<string, string | number | undefined>>;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: unknown;
  readonly timeoutMs: number;
  /** Outer cancellation (the fan-out envelope) */
  readonly signal?: AbortSignal;
}

/**
 * Fetch function shape, injectable so collectors can be tested without network.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

// ─────────────────────────────────────────────────────────────────────────────────
// URL
// ─────────────────────────────────────────────────────────────────────────────────

export function buildUrl(
  base: string,
  query: Readonly<Record<string, string | number | undefined>> = {}
): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSIFICATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Map an HTTP status onto the error strings collectors record.
 */
export function describeStatus(status: number, retryAfter: string | null): string {
  switch (status) {
    case 429:
      return `Rate limited (retry after ${retryAfter ?? 'unknown'}s)`;
    case 401:
    case 403:
      return 'Authentication failed - invalid API key';
    case 400:
      return 'Invalid query parameters';
    default:
      return `HTTP ${status}`;
  }
}

export function describeFetchError(error: unknown, timedOut: boolean): string {
  if (timedOut) {
    return 'Request timeout';
  }
  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return 'Request cancelled';
    }
    if (error instanceof SyntaxError) {
      return 'Invalid JSON response';
    }
    return `Network error: ${error.name}`;
  }
  return `Network error: ${String(error)}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REQUEST
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Perform one JSON request. Never throws: every failure is returned as
 * a classified error string.
 */
export async function fetchJson(
  request: JsonRequest,
  fetchFn: FetchLike = fetch
): Promise<Result<unknown, string>> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, request.timeoutMs);

  const onOuterAbort = (): void => controller.abort();
  if (request.signal?.aborted) {
    controller.abort();
  } else {
    request.signal?.addEventListener('abort', onOuterAbort, { once: true });
  }

  try {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...request.headers,
    };
    let body: string | undefined;
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.body);
    }

    const response = await fetchFn(buildUrl(request.url, request.query), {
      method: request.method ?? 'GET',
      headers,
      body,
      signal: controller.signal,
    });

    if (!response.ok) {
      return err(describeStatus(response.status, response.headers.get('Retry-After')));
    }

    const data: unknown = await response.json();
    return ok(data);
  } catch (error) {
    return err(describeFetchError(error, timedOut));
  } finally {
    clearTimeout(timeoutId);
    request.signal?.removeEventListener('abort', onOuterAbort);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SAFE FIELD ACCESS
// ─────────────────────────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function arrayField(record: unknown, key: string): unknown[] {
  return isRecord(record) ? asArray(record[key]) : [];
}

/**
 * Numeric field or 0. Accepts numeric strings, which some APIs return.
 */
export function numberField(record: unknown, key: string): number {
  if (!isRecord(record)) return 0;
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function stringField(record: unknown, key: string, fallback = ''): string {
  if (!isRecord(record)) return fallback;
  const value = record[key];
  return typeof value === 'string' ? value : fallback;
}

// ─────────────────────────────────────────────────────────────────────────────────
// QUERY TERMS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * `"keyword"` alone, or `("keyword" OR "term1" OR ...)` with expansion terms.
 */
export function buildOrQuery(keyword: string, terms: readonly string[] = []): string {
  if (terms.length === 0) {
    return `"${keyword}"`;
  }
  return `(${[keyword, ...terms].map((term) => `"${term}"`).join(' OR ')})`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// TIME
// ─────────────────────────────────────────────────────────────────────────────────

export const DAY_MS = 24 * 60 * 60 * 1000;

export function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
