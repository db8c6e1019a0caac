import { randomInt, sample, sleep } from '@erratum/core';
import type { RawCandidate, SourceAdapter, SourceContext } from '@erratum/core';
import { HttpError } from '../retry.js';
import { extractErrorText, searchQuestions, type Question } from './client.js';

export const DEFAULT_QUESTION_TAGS = [
  'windows', 'macos', 'linux', 'ubuntu', 'debian', 'centos',
  'python', 'javascript', 'java', 'c#', 'php', 'node.js', 'typescript',
  'html', 'css', 'reactjs', 'angular', 'vue.js', 'nginx', 'apache',
  'mysql', 'postgresql', 'mongodb', 'redis', 'sqlite',
  'docker', 'kubernetes', 'amazon-web-services', 'azure', 'google-cloud-platform', 'git',
];

export const DEFAULT_ERROR_KEYWORDS = [
  'error', 'exception', 'failed', 'cannot', 'unable', 'issue',
  'bug', 'problem', 'crash', 'timeout', 'denied', 'not found',
  'invalid', 'unexpected', 'fatal', 'critical', 'warning',
];

export interface StackExchangeAdapterOptions {
  apiKey?: string;
  /** Minimum question score for keyed searches (default 5). */
  minScore?: number;
  /** Page size cap for keyed searches (default 50, the API allows 30 per page here). */
  maxResults?: number;
  tags?: string[];
  keywords?: string[];
  /** Pause between keyword queries; default 100 with a key, 300 without. */
  requestDelayMs?: number;
  now?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Discovers error texts from Stack Overflow questions.
 *
 * Each run samples 3-5 error keywords and 5-8 tags and searches a random
 * 30-90 day window within the last year. Without an API key only the
 * throttled `/search` endpoint is used, one title query per keyword.
 * A failed query is skipped; the adapter throws only when nothing was found
 * and at least one query failed.
 */
export class StackExchangeAdapter implements SourceAdapter {
  readonly name = 'stackoverflow';

  constructor(private readonly options: StackExchangeAdapterOptions = {}) {}

  async discover(ctx: SourceContext): Promise<RawCandidate[]> {
    const { apiKey } = this.options;
    const random = ctx.random;
    const tags = sample(this.options.tags ?? DEFAULT_QUESTION_TAGS, randomInt(random, 5, 8), random);
    const keywords = sample(this.options.keywords ?? DEFAULT_ERROR_KEYWORDS, randomInt(random, 3, 5), random);
    const delayMs = this.options.requestDelayMs ?? (apiKey ? 100 : 300);

    const now = (this.options.now ?? (() => new Date()))();
    const toDate = new Date(now.getTime() - randomInt(random, 0, 300) * DAY_MS);
    const fromDate = new Date(toDate.getTime() - randomInt(random, 30, 90) * DAY_MS);

    const seen = new Set<number>();
    const candidates: RawCandidate[] = [];
    const failures: Error[] = [];

    for (const [i, keyword] of keywords.entries()) {
      let backoffSeconds = 0;
      try {
        const page = apiKey
          ? await searchQuestions(
            {
              q: keyword,
              tagged: tags,
              sort: 'votes',
              pagesize: Math.min(30, this.options.maxResults ?? 50),
              minScore: Math.max(1, (this.options.minScore ?? 5) - 2),
              fromDate,
              toDate,
            },
            { apiKey, signal: ctx.abortSignal },
          )
          : await searchQuestions(
            { intitle: keyword, sort: 'activity', pagesize: 15 },
            { signal: ctx.abortSignal },
          );
        backoffSeconds = page.backoffSeconds;

        for (const question of page.items) {
          if (seen.has(question.question_id)) continue;
          seen.add(question.question_id);
          const candidate = toCandidate(question);
          if (candidate) candidates.push(candidate);
        }
      } catch (err) {
        if (err instanceof Error && err.name === 'AbortError') throw err;
        // Anonymous quota exhausted; further queries fail the same way
        if (!apiKey && err instanceof HttpError && err.status === 400) {
          failures.push(err);
          break;
        }
        failures.push(err instanceof Error ? err : new Error(String(err)));
      }

      if (i < keywords.length - 1) {
        await sleep(Math.max(delayMs, backoffSeconds * 1000), ctx.abortSignal);
      }
    }

    if (candidates.length === 0 && failures[0]) {
      throw failures[0];
    }
    return candidates;
  }
}

export function toCandidate(question: Question): RawCandidate | null {
  const text = extractErrorText(question.title);
  if (!text) return null;
  return {
    text,
    provider: 'stackoverflow',
    metrics: {
      score: question.score,
      view_count: question.view_count,
      answer_count: question.answer_count,
    },
    timestamp: new Date(question.creation_date * 1000).toISOString(),
    sourceUrl: question.link,
    title: question.title,
  };
}
