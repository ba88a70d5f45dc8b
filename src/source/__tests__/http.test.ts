import { describe, it, expect, vi, afterEach } from 'vitest';
import { fetchPage, isTransientStatus } from '../http.js';
import { FetchError, isAbortError } from '../../shared/errors.js';

const URL_UNDER_TEST = 'https://example.com/search';

// Resolves only when the request signal aborts, then rejects like fetch does.
function hangingFetch(_input: Parameters<typeof fetch>[0], init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => {
      reject(new DOMException('This operation was aborted', 'AbortError'));
    });
  });
}

describe('isTransientStatus', () => {
  it('classifies statuses', () => {
    expect([500, 503, 408, 429, 404, 403, 400].map(isTransientStatus)).toEqual([
      true,
      true,
      true,
      true,
      false,
      false,
      false,
    ]);
  });
});

describe('fetchPage', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('returns the body on success', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('<html></html>', { status: 200 }));
    await expect(fetchPage(URL_UNDER_TEST, { timeoutMs: 1000, userAgent: 'test' })).resolves.toBe(
      '<html></html>',
    );
  });

  it('maps 404 to a permanent error', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('gone', { status: 404 }));
    const err = await fetchPage(URL_UNDER_TEST, { timeoutMs: 1000, userAgent: 'test' }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(FetchError);
    expect(err instanceof FetchError && err.kind).toBe('permanent');
    expect(err instanceof FetchError && err.message).toBe(`Fetch failed: 404 from ${URL_UNDER_TEST}`);
  });

  it('maps network faults to a transient error', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    const err = await fetchPage(URL_UNDER_TEST, { timeoutMs: 1000, userAgent: 'test' }).catch(
      (e: unknown) => e,
    );
    expect(err instanceof FetchError && err.kind).toBe('transient');
  });

  it('maps a timeout to a transient error', async () => {
    globalThis.fetch = vi.fn(hangingFetch);
    const err = await fetchPage(URL_UNDER_TEST, { timeoutMs: 10, userAgent: 'test' }).catch(
      (e: unknown) => e,
    );
    expect(err instanceof FetchError && err.kind).toBe('transient');
    expect(err instanceof FetchError && err.message).toBe(
      `Fetch timed out after 10ms: ${URL_UNDER_TEST}`,
    );
  });

  it('times out a body that stalls after the headers', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response(new ReadableStream({ start() {} }), { status: 200 }),
    );
    const err = await fetchPage(URL_UNDER_TEST, { timeoutMs: 10, userAgent: 'test' }).catch(
      (e: unknown) => e,
    );
    expect(err instanceof FetchError && err.message).toBe(
      `Fetch timed out after 10ms: ${URL_UNDER_TEST}`,
    );
  });

  it('rejects with an AbortError on shutdown', async () => {
    globalThis.fetch = vi.fn(hangingFetch);
    const controller = new AbortController();
    const pending = fetchPage(URL_UNDER_TEST, {
      timeoutMs: 60_000,
      userAgent: 'test',
      signal: controller.signal,
    });
    controller.abort();
    const err = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
    expect(err).not.toBeInstanceOf(FetchError);
  });
});
