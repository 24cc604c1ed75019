/**
 * HTTP Client Tests
 *
 * KEY TEST CASES:
 * - JSON parsing, empty and malformed bodies
 * - Retry on 429/5xx, no retry on 4xx
 * - Retry on network failure, bounded by maxRetries
 * - Timeout via AbortController
 * - URL building
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  HTTPClient,
  HTTPEmptyBodyError,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
  buildUrl,
} from '../../../core/http-client.js';

const URL_UNDER_TEST = 'https://stats.test/api/dataset/X.jsonstat.json';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('HTTPClient', () => {
  const fetchMock = vi.fn<[string, RequestInit?], Promise<Response>>();
  let client: HTTPClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    client = new HTTPClient({ maxRetries: 2, initialDelayMs: 0, jitterFactor: 0, timeoutMs: 1000 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('fetchJSON', () => {
    test('parses a JSON body', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ value: [1, 2] }));

      await expect(client.fetchJSON(URL_UNDER_TEST)).resolves.toEqual({ value: [1, 2] });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test('sends JSON accept and user agent headers', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}));

      await client.fetchJSON(URL_UNDER_TEST);

      const init = fetchMock.mock.calls[0][1];
      expect(init?.headers).toEqual({ 'User-Agent': 'transit-eqia/0.1', Accept: 'application/json' });
    });

    test('rejects an empty body', async () => {
      fetchMock.mockResolvedValueOnce(new Response('  ', { status: 200 }));

      await expect(client.fetchJSON(URL_UNDER_TEST)).rejects.toBeInstanceOf(HTTPEmptyBodyError);
    });

    test('rejects a body that is not JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

      await expect(client.fetchJSON(URL_UNDER_TEST)).rejects.toBeInstanceOf(HTTPJSONParseError);
    });
  });

  describe('retry behaviour', () => {
    test('retries rate limiting and succeeds', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
        .mockResolvedValueOnce(new Response('busy', { status: 503 }))
        .mockResolvedValueOnce(jsonResponse({ ok: true }));

      await expect(client.fetchJSON(URL_UNDER_TEST)).resolves.toEqual({ ok: true });
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    test('gives up after maxRetries and reports the last status', async () => {
      fetchMock.mockImplementation(() => Promise.resolve(new Response('bad gateway', { status: 502 })));

      const error = await client.fetchJSON(URL_UNDER_TEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HTTPError);
      if (error instanceof HTTPError) {
        expect(error.statusCode).toBe(502);
        expect(error.bodySnippet).toBe('bad gateway');
      }
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    test('does not retry client errors', async () => {
      fetchMock.mockResolvedValueOnce(new Response('missing', { status: 404 }));

      await expect(client.fetchJSON(URL_UNDER_TEST)).rejects.toBeInstanceOf(HTTPError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test('retries network failures', async () => {
      fetchMock
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(jsonResponse([1]));

      await expect(client.fetchJSON(URL_UNDER_TEST)).resolves.toEqual([1]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    test('wraps a final network failure', async () => {
      fetchMock.mockImplementation(() => Promise.reject(new TypeError('fetch failed')));

      await expect(client.fetchJSON(URL_UNDER_TEST, { retries: 0 })).rejects.toBeInstanceOf(HTTPNetworkError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test('throws the last network failure once retries run out', async () => {
      fetchMock.mockImplementation(() => Promise.reject(new TypeError('fetch failed')));

      const error = await client.fetchJSON(URL_UNDER_TEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HTTPNetworkError);
      if (error instanceof HTTPNetworkError) {
        expect(error.message).toBe('Network error: fetch failed');
      }
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });
  });

  describe('timeout', () => {
    test('aborts a request that outlives the timeout', async () => {
      fetchMock.mockImplementation(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }));
            });
          })
      );

      await expect(
        client.fetchJSON(URL_UNDER_TEST, { timeoutMs: 10, retries: 0 })
      ).rejects.toBeInstanceOf(HTTPTimeoutError);
    });
  });
});

describe('buildUrl', () => {
  test('appends parameters and skips undefined values', () => {
    const url = buildUrl('https://stats.test/api/dataset/NM_1.jsonstat.json', {
      geography: '641734708',
      date: 'latest',
      measures: '20100,20301',
      extra: undefined,
    });

    expect(url).toBe(
      'https://stats.test/api/dataset/NM_1.jsonstat.json?geography=641734708&date=latest&measures=20100%2C20301'
    );
  });
});
