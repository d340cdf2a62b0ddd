import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fetchWithTimeout, fetchStream } from './http.js';
import { TransportError } from '../types/error.js';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

function lastInit(): RequestInit | undefined {
  const calls = vi.mocked(globalThis.fetch).mock.calls;
  expect(calls.length).toBeGreaterThan(0);
  return calls[calls.length - 1]?.[1];
}

describe('http', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  describe('fetchWithTimeout', () => {
    it('should return decoded JSON body on successful response', async () => {
      const response = jsonResponse({ test: 'data' });
      vi.mocked(globalThis.fetch).mockResolvedValue(response);

      const result = await fetchWithTimeout({ url: 'https://upstream.test/api' });

      expect(result.body).toEqual({ test: 'data' });
      expect(result.response).toBe(response);
    });

    it('should return text for a non-JSON reply', async () => {
      vi.mocked(globalThis.fetch).mockResolvedValue(
        new Response('hello there', { headers: { 'Content-Type': 'text/plain' } }),
      );

      const result = await fetchWithTimeout({ url: 'https://upstream.test/api' });
      expect(result.body).toBe('hello there');
    });

    it('should decode an empty body as an empty object', async () => {
      vi.mocked(globalThis.fetch).mockResolvedValue(new Response('', { status: 200 }));

      const result = await fetchWithTimeout({ url: 'https://upstream.test/api' });
      expect(result.body).toEqual({});
    });

    it('should throw a decode TransportError for invalid JSON labelled as JSON', async () => {
      vi.mocked(globalThis.fetch).mockResolvedValue(
        new Response('{oops', { headers: { 'Content-Type': 'application/json' } }),
      );

      await expect(fetchWithTimeout({ url: 'https://upstream.test/api' })).rejects.toMatchObject({
        kind: 'decode',
        body: '{oops',
      });
    });

    it('should throw an aborted TransportError if external signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        fetchWithTimeout({ url: 'https://upstream.test/api', signal: controller.signal }),
      ).rejects.toMatchObject({ kind: 'aborted' });

      expect(vi.mocked(globalThis.fetch)).not.toHaveBeenCalled();
    });

    it('should throw an http-status TransportError on non-2xx status', async () => {
      vi.mocked(globalThis.fetch).mockResolvedValue(
        new Response('{"error":"boom"}', { status: 500, headers: { 'Retry-After': '3' } }),
      );

      const error = await fetchWithTimeout({ url: 'https://upstream.test/api' }).catch(
        (err: unknown) => err,
      );

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({
        kind: 'http-status',
        statusCode: 500,
        body: '{"error":"boom"}',
        retryAfterMs: 3000,
        message: 'Server error (500): {"error":"boom"}',
      });
    });

    it('should merge default Content-Type header and let custom headers override it', async () => {
      vi.mocked(globalThis.fetch).mockResolvedValue(jsonResponse({}));

      await fetchWithTimeout({
        url: 'https://upstream.test/api',
        headers: { 'Content-Type': 'application/xml', 'X-Test': 'true' },
      });

      expect(lastInit()?.headers).toEqual({
        'Content-Type': 'application/xml',
        'X-Test': 'true',
      });
    });

    it('should serialize body as JSON when provided', async () => {
      vi.mocked(globalThis.fetch).mockResolvedValue(jsonResponse({}));

      await fetchWithTimeout({
        url: 'https://upstream.test/api',
        method: 'POST',
        body: { key: 'value' },
      });

      expect(lastInit()?.method).toBe('POST');
      expect(lastInit()?.body).toBe('{"key":"value"}');
    });

    it('should convert a native AbortError to an aborted TransportError', async () => {
      const nativeAbortError = new Error('Aborted');
      nativeAbortError.name = 'AbortError';
      vi.mocked(globalThis.fetch).mockRejectedValue(nativeAbortError);

      const error = await fetchWithTimeout({ url: 'https://upstream.test/api' }).catch(
        (err: unknown) => err,
      );

      expect(error).toMatchObject({ kind: 'aborted', cause: nativeAbortError });
    });

    it('should convert a network failure to a connection TransportError', async () => {
      vi.mocked(globalThis.fetch).mockRejectedValue(new TypeError('fetch failed'));

      await expect(fetchWithTimeout({ url: 'https://upstream.test/api' })).rejects.toMatchObject({
        kind: 'connection',
        message: 'connection failed: fetch failed',
      });
    });

    it('should report a timeout when the timer fires first', async () => {
      vi.useFakeTimers();
      vi.mocked(globalThis.fetch).mockImplementation(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              const err = new Error('The operation was aborted');
              err.name = 'AbortError';
              reject(err);
            });
          }),
      );

      const pending = fetchWithTimeout({ url: 'https://upstream.test/api', timeoutMs: 50 }).catch(
        (err: unknown) => err,
      );
      await vi.advanceTimersByTimeAsync(50);

      expect(await pending).toMatchObject({ kind: 'timeout' });
    });
  });

  describe('fetchStream', () => {
    it('should return the raw Response object without reading the body', async () => {
      const response = new Response('data: x\n\n', {
        headers: { 'Content-Type': 'text/event-stream' },
      });
      vi.mocked(globalThis.fetch).mockResolvedValue(response);

      const result = await fetchStream({ url: 'https://upstream.test/api' });

      expect(result).toBe(response);
      expect(result.bodyUsed).toBe(false);
    });

    it('should throw an http-status TransportError on non-2xx status', async () => {
      vi.mocked(globalThis.fetch).mockResolvedValue(new Response('Not Found', { status: 404 }));

      await expect(fetchStream({ url: 'https://upstream.test/api' })).rejects.toMatchObject({
        kind: 'http-status',
        statusCode: 404,
        message: 'Resource not found (404): Not Found',
      });
    });

    it('should throw if external signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        fetchStream({ url: 'https://upstream.test/api', signal: controller.signal }),
      ).rejects.toThrow(TransportError);

      expect(vi.mocked(globalThis.fetch)).not.toHaveBeenCalled();
    });
  });

  describe('caller signal listeners', () => {
    function spyOnListeners(signal: AbortSignal) {
      return {
        added: vi.spyOn(signal, 'addEventListener'),
        removed: vi.spyOn(signal, 'removeEventListener'),
      };
    }

    it('should detach from a reused caller signal after each request', async () => {
      vi.mocked(globalThis.fetch).mockImplementation(async () => jsonResponse({ ok: true }));
      const controller = new AbortController();
      const { added, removed } = spyOnListeners(controller.signal);

      await fetchWithTimeout({ url: 'https://upstream.test/a', signal: controller.signal });
      await fetchWithTimeout({ url: 'https://upstream.test/b', signal: controller.signal });

      expect(added).toHaveBeenCalledTimes(2);
      expect(removed.mock.calls.map((call) => call[1])).toEqual(
        added.mock.calls.map((call) => call[1]),
      );
    });

    it('should detach when the request fails', async () => {
      vi.mocked(globalThis.fetch).mockResolvedValue(new Response('boom', { status: 500 }));
      const controller = new AbortController();
      const { added, removed } = spyOnListeners(controller.signal);

      await expect(
        fetchWithTimeout({ url: 'https://upstream.test/a', signal: controller.signal }),
      ).rejects.toMatchObject({ kind: 'http-status' });

      expect(removed).toHaveBeenCalledWith('abort', added.mock.calls[0]?.[1]);
    });

    it('should stay attached to an open stream so the caller can still abort it', async () => {
      vi.mocked(globalThis.fetch).mockResolvedValue(
        new Response('data: {}\n\n', { headers: { 'Content-Type': 'text/event-stream' } }),
      );
      const controller = new AbortController();
      const { removed } = spyOnListeners(controller.signal);

      await fetchStream({ url: 'https://upstream.test/a', signal: controller.signal });
      controller.abort();

      expect(removed).not.toHaveBeenCalled();
      expect(lastInit()?.signal?.aborted).toBe(true);
    });
  });
});
