import { z } from 'zod';
import { getJson } from '../http.js';

export const REDDIT_BASE = 'https://www.reddit.com';

const PostSchema = z.object({
  title: z.string(),
  permalink: z.string().default(''),
  ups: z.number().default(0),
  num_comments: z.number().default(0),
  created_utc: z.number().optional(),
  link_flair_text: z.string().nullable().default(null),
  selftext: z.string().default(''),
});

const ListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ data: PostSchema })),
  }),
});

export type RedditPost = z.infer<typeof PostSchema>;

export interface SubredditSearch {
  subreddit: string;
  query: string;
  limit: number;
  signal?: AbortSignal;
}

/** Top posts of one subreddit matching `query`, via the public JSON listing. */
export async function searchSubreddit({ subreddit, query, limit, signal }: SubredditSearch): Promise<RedditPost[]> {
  const listing = await getJson(`${REDDIT_BASE}/r/${encodeURIComponent(subreddit)}/search.json`, ListingSchema, {
    params: { q: query, restrict_sr: 'true', sort: 'top', limit },
    signal,
  });
  return listing.data.children.map(child => child.data);
}

const ERROR_INDICATORS = [
  'error', 'problem', 'issue', 'help', 'failed', 'crash',
  'not working', 'broken', 'bug', 'trouble',
];

const ERROR_TITLE_KEYWORDS = ['error', 'failed', 'crash', 'issue', 'problem', 'bug'];

const MAX_TEXT_LENGTH = 100;

/** Title or flair mentions a failure. */
export function isErrorRelated(post: RedditPost): boolean {
  const title = post.title.toLowerCase();
  const flair = (post.link_flair_text ?? '').toLowerCase();
  return ERROR_INDICATORS.some(indicator => title.includes(indicator) || flair.includes(indicator));
}

/**
 * The post title as error text when it names a failure; titles of 100
 * characters or more are cut to 100 and marked with `...`.
 */
export function extractPostError(post: RedditPost): string | null {
  const title = post.title.trim();
  if (!ERROR_TITLE_KEYWORDS.some(k => title.toLowerCase().includes(k))) return null;
  return title.length < MAX_TEXT_LENGTH ? title : `${title.slice(0, MAX_TEXT_LENGTH)}...`;
}
