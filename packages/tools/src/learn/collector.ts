import { z } from 'zod';
import type { CollectedSolutions, SolutionCollector, SolutionFragment, SourceCitation, SourceContext } from '@erratum/core';
import { getJson } from '../http.js';

export const LEARN_SEARCH_URL = 'https://learn.microsoft.com/api/search';

const SearchResponseSchema = z.object({
  results: z.array(z.object({
    title: z.string(),
    url: z.string(),
    description: z.string().optional(),
  })).default([]),
});

export interface LearnCollectorOptions {
  /** Results requested (default 5). */
  top?: number;
  locale?: string;
}

const OFFICIAL_RELIABILITY = 1.0;
const FRAGMENT_RELIABILITY = 0.8;

/** Microsoft Learn search: every hit is an official citation, described hits are also fixes. */
export class LearnCollector implements SolutionCollector {
  readonly name = 'microsoft-learn';

  constructor(private readonly options: LearnCollectorOptions = {}) {}

  async collect(errorText: string, ctx: SourceContext): Promise<CollectedSolutions> {
    const response = await getJson(LEARN_SEARCH_URL, SearchResponseSchema, {
      params: {
        search: errorText,
        locale: this.options.locale ?? 'en-us',
        $top: this.options.top ?? 5,
      },
      signal: ctx.abortSignal,
    });

    const solutions: SolutionFragment[] = [];
    const citations: SourceCitation[] = [];

    for (const result of response.results) {
      const description = result.description?.trim();
      citations.push({
        title: result.title,
        url: result.url,
        type: 'official',
        reliability: OFFICIAL_RELIABILITY,
        snippet: description,
      });
      if (description) {
        solutions.push({
          description,
          steps: [],
          reliability: FRAGMENT_RELIABILITY,
          sourceUrl: result.url,
          sourceTitle: result.title,
        });
      }
    }

    return { solutions, citations };
  }
}
