import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { getJson, ResponseShapeError, withParams } from './http.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

function jsonResponse(data: unknown): Response {
  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    headers: new Headers(),
    json: async () => data,
    text: async () => JSON.stringify(data),
  } as unknown as Response;
}

describe('withParams', () => {
  it('skips undefined values', () => {
    expect(withParams('https://api.invalid/search', { q: 'disk full', page: 2, key: undefined }))
      .toBe('https://api.invalid/search?q=disk+full&page=2');
  });

  it('leaves the url alone without params', () => {
    expect(withParams('https://api.invalid/search', {})).toBe('https://api.invalid/search');
  });
});

describe('getJson', () => {
  const Schema = z.object({ items: z.array(z.number()) });

  it('returns the validated document', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ items: [1, 2], extra: true }));

    await expect(getJson('https://api.invalid/items', Schema)).resolves.toEqual({ items: [1, 2] });
    expect(mockFetch.mock.calls[0]?.[1]).toMatchObject({
      headers: { Accept: 'application/json', 'User-Agent': 'erratum/0.1' },
    });
  });

  it('names the offending field of an unexpected document', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ items: ['a'] }));

    const error = await getJson('https://api.invalid/items', Schema).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResponseShapeError);
    expect(error).toMatchObject({
      message: 'Unexpected response from https://api.invalid/items: items.0: Expected number, received string',
    });
  });
});
