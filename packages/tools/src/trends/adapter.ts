import { randomInt, randomUniform, sample, shuffle } from '@erratum/core';
import type { RawCandidate, SourceAdapter, SourceContext } from '@erratum/core';
import { loadDefaultTrendCatalog, seasonalWeight, type TrendCatalog } from './catalog.js';

export interface TrendCatalogAdapterOptions {
  catalog?: TrendCatalog;
  /** Candidates kept after shuffling (default 20). */
  maxCandidates?: number;
  now?: () => Date;
}

/**
 * Synthetic trend signal. No search-trend API is called: entries are sampled
 * from a fixed catalog, 1-3 per category, with a random search volume scaled
 * by the category's seasonal weight for the current month.
 */
export class TrendCatalogAdapter implements SourceAdapter {
  readonly name = 'google_trends';
  private readonly catalog: TrendCatalog;

  constructor(private readonly options: TrendCatalogAdapterOptions = {}) {
    this.catalog = options.catalog ?? loadDefaultTrendCatalog();
  }

  async discover(ctx: SourceContext): Promise<RawCandidate[]> {
    const random = ctx.random;
    const now = (this.options.now ?? (() => new Date()))();
    const month = now.getUTCMonth() + 1;

    const picked = this.catalog.categories.flatMap(category => {
      const weight = seasonalWeight(category, month);
      const count = randomInt(random, 1, Math.min(3, category.errors.length));
      return sample(category.errors, count, random).map(text => ({ text, weight }));
    });

    return shuffle(picked, random)
      .slice(0, this.options.maxCandidates ?? 20)
      .map(({ text, weight }): RawCandidate => ({
        text,
        provider: 'google_trends',
        metrics: {
          search_volume: Math.floor(randomInt(random, 500, 2000) * weight),
          trend_score: Math.round(randomUniform(random, 0.6, 0.9) * 100) / 100,
        },
        timestamp: now.toISOString(),
      }));
  }
}
