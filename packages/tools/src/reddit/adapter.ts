import { randomInt, sample, sleep } from '@erratum/core';
import type { RawCandidate, SourceAdapter, SourceContext } from '@erratum/core';
import { REDDIT_BASE, extractPostError, isErrorRelated, searchSubreddit, type RedditPost } from './client.js';

export const DEFAULT_SUBREDDITS = [
  'techsupport', 'pcmasterrace', 'buildapc', 'sysadmin',
  'windows', 'MacOS', 'linux', 'Ubuntu', 'debian',
  'programming', 'learnprogramming', 'Python', 'javascript', 'webdev',
  'docker', 'kubernetes', 'aws', 'devops', 'selfhosted',
  'mysql', 'PostgreSQL', 'mongodb', 'Database', 'node',
];

export const DEFAULT_SEARCH_TERMS = ['error', 'issue', 'problem', 'help', 'fix', 'crash', 'fail'];

export interface RedditAdapterOptions {
  subreddits?: string[];
  searchTerms?: string[];
  /** Posts below this many upvotes are ignored (default 5). */
  minUpvotes?: number;
  /** Subreddits queried per run (default 3). */
  maxSubreddits?: number;
  /** Posts requested per subreddit (default 10). */
  limit?: number;
  /** Pause between subreddit requests (default 1000). */
  requestDelayMs?: number;
  now?: () => Date;
}

/**
 * Discovers error texts from r/ searches through the public JSON listings.
 * Samples 3-6 subreddits, queries at most `maxSubreddits` of them with one
 * random search term each, and keeps error-related posts above the
 * upvote floor.
 */
export class RedditAdapter implements SourceAdapter {
  readonly name = 'reddit';

  constructor(private readonly options: RedditAdapterOptions = {}) {}

  async discover(ctx: SourceContext): Promise<RawCandidate[]> {
    const random = ctx.random;
    const pool = this.options.subreddits ?? DEFAULT_SUBREDDITS;
    const terms = this.options.searchTerms ?? DEFAULT_SEARCH_TERMS;
    const minUpvotes = this.options.minUpvotes ?? 5;
    const delayMs = this.options.requestDelayMs ?? 1000;
    const discoveredAt = (this.options.now ?? (() => new Date()))().toISOString();

    const subreddits = sample(pool, randomInt(random, 3, 6), random).slice(0, this.options.maxSubreddits ?? 3);
    const candidates: RawCandidate[] = [];
    const failures: Error[] = [];

    for (const [i, subreddit] of subreddits.entries()) {
      const query = terms[Math.floor(random() * terms.length)] ?? 'error';
      try {
        const posts = await searchSubreddit({
          subreddit,
          query,
          limit: this.options.limit ?? 10,
          signal: ctx.abortSignal,
        });
        for (const post of posts) {
          if (post.ups < minUpvotes || !isErrorRelated(post)) continue;
          const candidate = toCandidate(post, discoveredAt);
          if (candidate) candidates.push(candidate);
        }
      } catch (err) {
        if (err instanceof Error && err.name === 'AbortError') throw err;
        failures.push(err instanceof Error ? err : new Error(String(err)));
      }

      if (i < subreddits.length - 1) {
        await sleep(delayMs, ctx.abortSignal);
      }
    }

    if (candidates.length === 0 && failures[0]) {
      throw failures[0];
    }
    return candidates;
  }
}

export function toCandidate(post: RedditPost, discoveredAt: string): RawCandidate | null {
  const text = extractPostError(post);
  if (!text) return null;
  return {
    text,
    provider: 'reddit',
    metrics: { ups: post.ups, num_comments: post.num_comments },
    timestamp: post.created_utc === undefined ? discoveredAt : new Date(post.created_utc * 1000).toISOString(),
    sourceUrl: `${REDDIT_BASE}${post.permalink}`,
    title: post.title.slice(0, 100),
  };
}
