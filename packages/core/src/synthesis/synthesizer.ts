import { z } from 'zod';
import type { LanguageModel } from 'ai';
import type { AggregatedBundle } from '../aggregation/types.js';
import type { Article } from '../quality/types.js';
import { callLLMWithJsonRetry, extractJsonObject } from '../router/llm.js';
import type { ModelRetryConfig } from '../router/retry.js';
import { buildSystemPrompt, buildUserPrompt, selectTemplate } from './prompt.js';
import { buildExcerpt, generateSlug, generateTags, optimizeTitle } from './optimize.js';

export interface SynthesisContext {
  abortSignal?: AbortSignal;
}

export interface ArticleSynthesizer {
  synthesize(bundle: AggregatedBundle, ctx?: SynthesisContext): Promise<Article>;
}

export interface SynthesisSettings {
  /** Target content length window, in characters. */
  minLength: number;
  maxLength: number;
  maxOutputTokens: number;
  temperature: number;
}

export const DEFAULT_SYNTHESIS_SETTINGS: SynthesisSettings = {
  minLength: 3000,
  maxLength: 5000,
  maxOutputTokens: 6000,
  temperature: 0.7,
};

export interface LLMArticleSynthesizerOptions {
  model: LanguageModel;
  settings?: Partial<SynthesisSettings>;
  retry?: Omit<ModelRetryConfig, 'abortSignal'>;
  /** Clock for the year in titles and slugs. */
  now?: () => Date;
}

export class SynthesisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SynthesisError';
  }
}

const ArticleDraftSchema = z.object({
  title: z.string().default(''),
  slug: z.string().default(''),
  content: z.string().min(1),
  excerpt: z.string().default(''),
  tags: z.array(z.string()).default([]),
});

export type ArticleDraft = z.infer<typeof ArticleDraftSchema>;

export function parseArticleDraft(reply: string): ArticleDraft | undefined {
  const parsed = ArticleDraftSchema.safeParse(extractJsonObject(reply));
  return parsed.success ? parsed.data : undefined;
}

/**
 * Writes the article with a language model and normalizes the result.
 * A reply that never parses as JSON is used verbatim as the body.
 */
export class LLMArticleSynthesizer implements ArticleSynthesizer {
  private readonly settings: SynthesisSettings;
  private readonly now: () => Date;

  constructor(private readonly options: LLMArticleSynthesizerOptions) {
    this.settings = { ...DEFAULT_SYNTHESIS_SETTINGS, ...options.settings };
    this.now = options.now ?? (() => new Date());
  }

  async synthesize(bundle: AggregatedBundle, ctx: SynthesisContext = {}): Promise<Article> {
    const keyword = bundle.candidate.text;
    const system = buildSystemPrompt({
      template: selectTemplate(keyword),
      minLength: this.settings.minLength,
      maxLength: this.settings.maxLength,
    });

    const response = await callLLMWithJsonRetry(
      {
        model: this.options.model,
        system,
        messages: [{ role: 'user', content: buildUserPrompt(bundle) }],
        maxOutputTokens: this.settings.maxOutputTokens,
        temperature: this.settings.temperature,
        retry: this.options.retry,
        abortSignal: ctx.abortSignal,
      },
      reply => parseArticleDraft(reply) !== undefined,
    );

    const draft = parseArticleDraft(response.content) ?? this.fallbackDraft(response.content);
    return finalizeArticle(draft, bundle, this.now().getFullYear());
  }

  private fallbackDraft(reply: string): ArticleDraft {
    const content = reply.trim();
    if (!content) {
      throw new SynthesisError('Model returned an empty article');
    }
    return { title: '', slug: '', content, excerpt: '', tags: [] };
  }
}

/** Apply title, excerpt, slug and tag conventions to a draft. */
export function finalizeArticle(draft: ArticleDraft, bundle: AggregatedBundle, year: number): Article {
  const keyword = bundle.candidate.text;
  const content = draft.content;
  return {
    title: optimizeTitle(draft.title, keyword, year),
    slug: generateSlug(keyword, year),
    content,
    excerpt: buildExcerpt(draft.excerpt, keyword, bundle.solutions.length),
    tags: generateTags(draft.tags, keyword),
    wordCount: content.length,
    keyword,
  };
}
