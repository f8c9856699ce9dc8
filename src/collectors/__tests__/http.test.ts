// ═══════════════════════════════════════════════════════════════════════════════
// COLLECTOR HTTP TESTS — Requests, Error Strings and Field Access
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import {
  buildOrQuery,
  buildUrl,
  describeStatus,
  fetchJson,
  numberField,
  type FetchLike,
} from '../http.js';

function abortError(): Error {
  return Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
}

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), { status, headers });
}

describe('buildOrQuery', () => {
  it('should quote the keyword alone', () => {
    expect(buildOrQuery('edge inference')).toBe('"edge inference"');
  });

  it('should OR the keyword with expansion terms', () => {
    expect(buildOrQuery('edge inference', ['TinyML', 'edge AI'])).toBe('("edge inference" OR "TinyML" OR "edge AI")');
  });
});

describe('buildUrl', () => {
  it('should encode query parameters and skip undefined ones', () => {
    expect(buildUrl('https://api.test/search', { query: '"edge inference"', page: 2, cursor: undefined }))
      .toBe('https://api.test/search?query=%22edge+inference%22&page=2');
  });
});

describe('describeStatus', () => {
  it('should name the common failures', () => {
    expect(describeStatus(429, '30')).toBe('Rate limited (retry after 30s)');
    expect(describeStatus(429, null)).toBe('Rate limited (retry after unknowns)');
    expect(describeStatus(401, null)).toBe('Authentication failed - invalid API key');
    expect(describeStatus(403, null)).toBe('Authentication failed - invalid API key');
    expect(describeStatus(400, null)).toBe('Invalid query parameters');
    expect(describeStatus(503, null)).toBe('HTTP 503');
  });
});

describe('fetchJson', () => {
  it('should return the decoded body', async () => {
    const fetchFn = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(async () => json({ nbHits: 3 }));

    const result = await fetchJson({ url: 'https://api.test/search', query: { q: 'x' }, timeoutMs: 1000 }, fetchFn);

    expect(result).toEqual({ ok: true, value: { nbHits: 3 } });
    expect(fetchFn.mock.calls[0][0]).toBe('https://api.test/search?q=x');
    expect(fetchFn.mock.calls[0][1]?.method).toBe('GET');
  });

  it('should send JSON bodies', async () => {
    const fetchFn = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(async () => json({}));

    await fetchJson({ url: 'https://api.test/q', method: 'POST', body: { a: 1 }, timeoutMs: 1000 }, fetchFn);

    const init = fetchFn.mock.calls[0][1];
    expect(init?.body).toBe('{"a":1}');
    expect(init?.headers).toEqual({ Accept: 'application/json', 'Content-Type': 'application/json' });
  });

  it('should classify HTTP failures', async () => {
    const fetchFn: FetchLike = async () => json({}, 429, { 'Retry-After': '12' });
    const result = await fetchJson({ url: 'https://api.test/q', timeoutMs: 1000 }, fetchFn);
    expect(result).toEqual({ ok: false, error: 'Rate limited (retry after 12s)' });
  });

  it('should classify network failures', async () => {
    const fetchFn: FetchLike = async () => {
      throw new TypeError('fetch failed');
    };
    const result = await fetchJson({ url: 'https://api.test/q', timeoutMs: 1000 }, fetchFn);
    expect(result).toEqual({ ok: false, error: 'Network error: TypeError' });
  });

  it('should classify invalid JSON bodies', async () => {
    const fetchFn: FetchLike = async () => new Response('<html>', { status: 200 });
    const result = await fetchJson({ url: 'https://api.test/q', timeoutMs: 1000 }, fetchFn);
    expect(result).toEqual({ ok: false, error: 'Invalid JSON response' });
  });

  it('should time out slow requests', async () => {
    const fetchFn: FetchLike = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(abortError()));
      });
    const result = await fetchJson({ url: 'https://api.test/q', timeoutMs: 10 }, fetchFn);
    expect(result).toEqual({ ok: false, error: 'Request timeout' });
  });

  it('should report cancellation by the outer signal', async () => {
    const outer = new AbortController();
    outer.abort();
    const fetchFn: FetchLike = async (_input, init) => {
      if (init?.signal?.aborted) throw abortError();
      return json({});
    };
    const result = await fetchJson({ url: 'https://api.test/q', timeoutMs: 1000, signal: outer.signal }, fetchFn);
    expect(result).toEqual({ ok: false, error: 'Request cancelled' });
  });
});

describe('numberField', () => {
  it('should accept numbers and numeric strings', () => {
    expect(numberField({ a: 4 }, 'a')).toBe(4);
    expect(numberField({ a: '17' }, 'a')).toBe(17);
    expect(numberField({ a: 'n/a' }, 'a')).toBe(0);
    expect(numberField(null, 'a')).toBe(0);
  });
});
