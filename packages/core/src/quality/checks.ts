import type { Article, QualityIssue, QualityThresholds } from './types.js';
import { ScoreTally, countOccurrences } from './tally.js';

const MARKDOWN_LINK = /\[[^\]]*\]\(([^)\s]*)[^)]*\)/g;

export function isValidLink(url: string): boolean {
  if (!URL.canParse(url)) return false;
  return new URL(url).host.length > 0;
}

/** Targets of inline Markdown links, in document order. */
export function extractLinks(content: string): string[] {
  return Array.from(content.matchAll(MARKDOWN_LINK), match => match[1] ?? '');
}

/** Checks that report issues without contributing to the score. */
export function runOptionalChecks(article: Article, thresholds: QualityThresholds): QualityIssue[] {
  const tally = new ScoreTally('checks');

  for (const phrase of thresholds.duplicatePhrases) {
    if (countOccurrences(article.title, phrase) > 1) {
      tally.flag('low', `Title repeats "${phrase}"`);
    }
  }

  if (thresholds.validateLinks) {
    for (const link of extractLinks(article.content)) {
      if (!isValidLink(link)) {
        tally.flag('medium', `Invalid link: "${link}"`);
      }
    }
  }

  return [...tally.flagged];
}
