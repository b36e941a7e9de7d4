import { describe, it, expect, vi, afterEach } from 'vitest';
import { request, requestOk, probeUrl, readJson } from '../http.js';
import { FetchError } from '../../shared/errors.js';
import { stalledBody } from './fakes.js';

const opts = { timeoutMs: 1000, userAgent: 'test-agent' };

describe('http helpers', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('wraps network errors in FetchError', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));
    await expect(request('https://example.com', opts)).rejects.toThrow('Request failed: ECONNREFUSED');
    await expect(request('https://example.com', opts)).rejects.toBeInstanceOf(FetchError);
  });

  it('times out slow requests', async () => {
    globalThis.fetch = vi.fn().mockImplementation((_url: string, init?: RequestInit) => {
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }));
        });
      });
    });

    await expect(request('https://example.com', { ...opts, timeoutMs: 20 })).rejects.toThrow(
      'Request timed out after 20ms: https://example.com',
    );
  });

  it('times out a body that stalls after the headers', async () => {
    globalThis.fetch = vi.fn().mockImplementation((_url: string, init?: RequestInit) => {
      return Promise.resolve(new Response(stalledBody('<rss>', init?.signal), { status: 200 }));
    });

    await expect(request('https://example.com/feed', { ...opts, timeoutMs: 20 })).rejects.toThrow(
      'Request timed out after 20ms: https://example.com/feed',
    );
  });

  it('returns status and body text', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('{"a":1}', { status: 201 }));

    const response = await request('https://example.com', opts);
    expect(response).toEqual({ url: 'https://example.com', status: 201, ok: true, body: '{"a":1}' });
    expect(readJson(response)).toEqual({ a: 1 });
  });

  it('readJson wraps invalid JSON in FetchError', () => {
    const response = { url: 'https://example.com', status: 200, ok: true, body: 'nope' };
    expect(() => readJson(response)).toThrow(FetchError);
  });

  it('requestOk rejects error statuses', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('Not Found', { status: 404 }));
    await expect(requestOk('https://example.com', opts)).rejects.toThrow('HTTP 404 from https://example.com');
  });

  it('probeUrl falls back to GET when HEAD is refused', async () => {
    const mockFetch = vi
      .fn()
      .mockResolvedValueOnce(new Response(null, { status: 405 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));
    globalThis.fetch = mockFetch;

    expect(await probeUrl('https://example.com', opts)).toBe(true);
    expect(mockFetch.mock.calls.map((call) => call[1].method)).toEqual(['HEAD', 'GET']);
  });
});
