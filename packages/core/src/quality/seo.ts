import type { Article, QualityThresholds, SubScore } from './types.js';
import { ScoreTally, countOccurrences } from './tally.js';

const SLUG_PATTERN = /^[a-z0-9-]+$/;

/**
 * Keyword density as a percentage: keyword occurrences over
 * whitespace-separated tokens. 0 for empty content.
 */
export function keywordDensity(content: string, keyword: string): number {
  const tokens = content.split(/\s+/).filter(Boolean).length;
  if (tokens === 0) return 0;
  return (countOccurrences(content, keyword) / tokens) * 100;
}

/** Keyword placement, slug shape and tagging. */
export function scoreSeo(article: Article, _thresholds: QualityThresholds): SubScore {
  const tally = new ScoreTally('seo');
  const keyword = article.keyword.trim();

  if (keyword) {
    if (countOccurrences(article.title, keyword) > 0) {
      tally.award(20);
    } else {
      tally.flag('high', `Title does not contain the keyword "${keyword}"`);
    }

    if (countOccurrences(article.excerpt, keyword) > 0) {
      tally.award(15);
    } else {
      tally.flag('medium', `Excerpt does not contain the keyword "${keyword}"`);
    }

    // Density is not judged on an empty body; the other dimensions flag that.
    if (article.content.trim()) {
      const density = keywordDensity(article.content, keyword);
      const shown = density.toFixed(2);
      if (density >= 1 && density <= 3) {
        tally.award(25);
      } else if (density >= 0.5 && density < 1) {
        tally.award(15);
        tally.flag('low', `Keyword density ${shown}% is slightly low (target 1-3%)`);
      } else if (density > 3) {
        tally.flag('high', `Keyword density ${shown}% is too high (target 1-3%)`);
      } else {
        tally.flag('medium', `Keyword density ${shown}% is too low (target 1-3%)`);
      }
    }
  }

  if (!article.slug) {
    tally.flag('low', 'Slug is missing');
  } else if (SLUG_PATTERN.test(article.slug)) {
    tally.award(10);
  } else {
    tally.flag('low', `Slug "${article.slug}" should contain only lowercase letters, digits and hyphens`);
  }

  const tagCount = article.tags.length;
  if (tagCount >= 3) {
    tally.award(15);
  } else if (tagCount > 0) {
    tally.award(10);
    tally.flag('low', `Only ${tagCount} tag(s); at least 3 recommended`);
  } else {
    tally.flag('medium', 'No tags');
  }

  return tally.toSubScore();
}
