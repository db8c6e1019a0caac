import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetchWithRetry, HttpError, isRetryableStatus } from './retry.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

function mockResponse(status: number, statusText: string, body = '', headers?: Headers): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    headers: headers ?? new Headers(),
    json: async () => ({}),
    text: async () => body,
  } as unknown as Response;
}

describe('isRetryableStatus', () => {
  it('retries rate limits and server errors only', () => {
    expect([429, 500, 503, 599].map(isRetryableStatus)).toEqual([true, true, true, true]);
    expect([400, 401, 404, 600].map(isRetryableStatus)).toEqual([false, false, false, false]);
  });
});

describe('fetchWithRetry', () => {
  it('returns the response on success', async () => {
    mockFetch.mockResolvedValueOnce(mockResponse(200, 'OK'));

    const response = await fetchWithRetry('https://api.invalid/items');
    expect(response.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('retries 429 and 5xx until one succeeds', async () => {
    mockFetch
      .mockResolvedValueOnce(mockResponse(429, 'Too Many Requests'))
      .mockResolvedValueOnce(mockResponse(502, 'Bad Gateway'))
      .mockResolvedValueOnce(mockResponse(200, 'OK'));

    const response = await fetchWithRetry('https://api.invalid/items', {}, { maxRetries: 3, initialDelayMs: 10 });

    expect(response.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('throws an HttpError without retrying a client error', async () => {
    mockFetch.mockResolvedValueOnce(mockResponse(401, 'Unauthorized', '{"code":"rest_not_logged_in"}'));

    const error = await fetchWithRetry('https://blog.invalid/wp-json/wp/v2/posts').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({
      status: 401,
      body: '{"code":"rest_not_logged_in"}',
      message: 'HTTP 401 Unauthorized for https://blog.invalid/wp-json/wp/v2/posts',
    });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last retry', async () => {
    mockFetch.mockResolvedValue(mockResponse(429, 'Too Many Requests'));

    await expect(
      fetchWithRetry('https://api.invalid/items', {}, { maxRetries: 2, initialDelayMs: 10 }),
    ).rejects.toThrow('HTTP 429 Too Many Requests (rate limited) for https://api.invalid/items');

    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('waits at least as long as Retry-After', async () => {
    const headers = new Headers();
    headers.set('Retry-After', '1');
    mockFetch
      .mockResolvedValueOnce(mockResponse(503, 'Service Unavailable', '', headers))
      .mockResolvedValueOnce(mockResponse(200, 'OK'));

    const start = Date.now();
    await fetchWithRetry('https://api.invalid/items', {}, { maxRetries: 1, initialDelayMs: 10 });

    expect(Date.now() - start).toBeGreaterThanOrEqual(900);
  });

  it('retries network failures', async () => {
    mockFetch
      .mockRejectedValueOnce(new Error('fetch failed: ECONNRESET'))
      .mockResolvedValueOnce(mockResponse(200, 'OK'));

    const response = await fetchWithRetry('https://api.invalid/items', {}, { maxRetries: 1, initialDelayMs: 10 });

    expect(response.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('does not retry other thrown errors', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Invalid URL'));

    await expect(fetchWithRetry('https://api.invalid/items')).rejects.toThrow('Invalid URL');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('stops on abort', async () => {
    mockFetch.mockRejectedValueOnce(new DOMException('Aborted', 'AbortError'));

    await expect(fetchWithRetry('https://api.invalid/items')).rejects.toMatchObject({ name: 'AbortError' });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('does not sleep past an abort between retries', async () => {
    const controller = new AbortController();
    mockFetch.mockImplementationOnce(async () => {
      controller.abort();
      return mockResponse(500, 'Internal Server Error');
    });

    await expect(
      fetchWithRetry('https://api.invalid/items', { signal: controller.signal }, { initialDelayMs: 10_000 }),
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
