import { describe, it, expect, vi, beforeEach } from 'vitest';
import { StackExchangeAdapter } from './adapter.js';
import { HttpError } from '../retry.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

function jsonResponse(data: unknown, status = 200, statusText = 'OK'): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    headers: new Headers(),
    json: async () => data,
    text: async () => JSON.stringify(data),
  } as unknown as Response;
}

const QUESTIONS = {
  items: [
    {
      question_id: 1,
      title: 'Backup stops with ERROR_DISK_FULL',
      link: 'https://stackoverflow.com/q/1',
      score: 12,
      view_count: 2400,
      answer_count: 3,
      creation_date: 1767225600,
    },
    {
      question_id: 1,
      title: 'Backup stops with ERROR_DISK_FULL',
      link: 'https://stackoverflow.com/q/1',
      creation_date: 1767225600,
    },
    {
      question_id: 2,
      title: 'w'.repeat(120),
      link: 'https://stackoverflow.com/q/2',
      creation_date: 1767225600,
    },
  ],
};

// random() = 0 picks the smallest sample sizes and a window ending now, 30 days long
const ctx = { random: () => 0 };
const now = () => new Date('2026-03-01T00:00:00.000Z');

describe('StackExchangeAdapter', () => {
  it('searches titles anonymously without a key', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(QUESTIONS));
    const adapter = new StackExchangeAdapter({ keywords: ['error'], requestDelayMs: 0, now });

    const candidates = await adapter.discover(ctx);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      'https://api.stackexchange.com/2.3/search?site=stackoverflow&order=desc&sort=activity&pagesize=15'
        + '&intitle=error&filter=default',
    );
    expect(candidates).toEqual([{
      text: 'ERROR_DISK_FULL',
      provider: 'stackoverflow',
      metrics: { score: 12, view_count: 2400, answer_count: 3 },
      timestamp: '2026-01-01T00:00:00.000Z',
      sourceUrl: 'https://stackoverflow.com/q/1',
      title: 'Backup stops with ERROR_DISK_FULL',
    }]);
  });

  it('runs a tagged, dated search with a key', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ items: [] }));
    const adapter = new StackExchangeAdapter({
      apiKey: 'test-key',
      keywords: ['error'],
      tags: ['windows'],
      requestDelayMs: 0,
      now,
    });

    await adapter.discover(ctx);

    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      'https://api.stackexchange.com/2.3/search/advanced?site=stackoverflow&order=desc&sort=votes&pagesize=30'
        + '&q=error&tagged=windows&min_score=3&fromdate=1769731200&todate=1772323200&filter=default&key=test-key',
    );
  });

  it('skips a failed keyword when another one delivers', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({}, 404, 'Not Found'))
      .mockResolvedValueOnce(jsonResponse(QUESTIONS));
    const adapter = new StackExchangeAdapter({ keywords: ['error', 'failed'], requestDelayMs: 0, now });

    const candidates = await adapter.discover(ctx);

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(candidates.map(c => c.text)).toEqual(['ERROR_DISK_FULL']);
  });

  it('stops at the anonymous quota and reports it', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ error_name: 'throttle_violation' }, 400, 'Bad Request'));
    const adapter = new StackExchangeAdapter({ keywords: ['error', 'failed'], requestDelayMs: 0, now });

    await expect(adapter.discover(ctx)).rejects.toBeInstanceOf(HttpError);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
