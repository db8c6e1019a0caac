import { z } from 'zod';
import { Marked } from 'marked';
import type { Article, PublishContext, Publisher, PublishResult, QualityReport } from '@erratum/core';
import { WordPressClient, WordPressError, type WordPressCredentials } from './client.js';

export type PostStatus = 'publish' | 'draft' | 'pending' | 'private';
export type DiscussionStatus = 'open' | 'closed';

export interface WordPressSettings extends WordPressCredentials {
  /** Every post goes into this one category (default 1). */
  defaultCategoryId?: number;
  status?: PostStatus;
  commentStatus?: DiscussionStatus;
  pingStatus?: DiscussionStatus;
  now?: () => Date;
}

const MAX_TAGS = 10;
const MAX_TAG_SLUG = 50;

const TagSchema = z.object({ id: z.number(), name: z.string() });
const TagListSchema = z.array(TagSchema);
const PostSchema = z.object({
  id: z.number(),
  link: z.string(),
  status: z.string(),
});

/** Lowercase, letters, digits and hyphens; non-Latin letters are kept. */
export function tagSlug(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_TAG_SLUG)
    .replace(/-+$/, '');
}

export function buildPostBody(
  article: Article,
  report: QualityReport,
  html: string,
  tagIds: number[],
  settings: WordPressSettings,
) {
  return {
    title: article.title,
    content: html,
    excerpt: article.excerpt,
    status: settings.status ?? 'publish',
    slug: article.slug,
    categories: [settings.defaultCategoryId ?? 1],
    tags: tagIds,
    comment_status: settings.commentStatus ?? 'open',
    ping_status: settings.pingStatus ?? 'open',
    meta: {
      error_message: article.keyword,
      seo_score: report.seoScore,
      quality_score: report.overallScore,
      word_count: article.wordCount,
      generated_by: 'erratum',
    },
  };
}

/**
 * Publishes articles through the WordPress REST API with an application
 * password. Tags are looked up by exact name and created when missing.
 */
export class WordPressPublisher implements Publisher {
  private readonly client: WordPressClient;
  private readonly markdown = new Marked({ gfm: true });

  constructor(private readonly settings: WordPressSettings) {
    this.client = new WordPressClient(settings);
  }

  async publish(article: Article, report: QualityReport, ctx: PublishContext = {}): Promise<PublishResult> {
    const tagIds = await this.resolveTags(article.tags, ctx.abortSignal);
    const html = await this.markdown.parse(article.content);

    const post = await this.client.request({
      method: 'POST',
      path: '/posts',
      schema: PostSchema,
      body: buildPostBody(article, report, html, tagIds, this.settings),
      signal: ctx.abortSignal,
      // A retried create can publish the same article twice
      retry: { maxRetries: 0 },
    });

    const now = (this.settings.now ?? (() => new Date()))();
    return { postId: post.id, url: post.link, status: post.status, publishedAt: now.toISOString() };
  }

  async resolveTags(names: readonly string[], signal?: AbortSignal): Promise<number[]> {
    const ids: number[] = [];
    for (const name of names.slice(0, MAX_TAGS)) {
      const id = await this.findTag(name, signal) ?? await this.createTag(name, signal);
      if (!ids.includes(id)) ids.push(id);
    }
    return ids;
  }

  private async findTag(name: string, signal?: AbortSignal): Promise<number | undefined> {
    const tags = await this.client.request({
      method: 'GET',
      path: '/tags',
      schema: TagListSchema,
      params: { search: name, per_page: '100' },
      signal,
    });
    return tags.find(tag => tag.name === name)?.id;
  }

  private async createTag(name: string, signal?: AbortSignal): Promise<number> {
    const slug = tagSlug(name);
    try {
      const tag = await this.client.request({
        method: 'POST',
        path: '/tags',
        schema: TagSchema,
        body: slug ? { name, slug } : { name },
        signal,
      });
      return tag.id;
    } catch (err) {
      // Search missed an existing tag (HTML-escaped name, for instance)
      if (err instanceof WordPressError && err.code === 'term_exists' && err.termId !== undefined) {
        return err.termId;
      }
      throw err;
    }
  }
}
