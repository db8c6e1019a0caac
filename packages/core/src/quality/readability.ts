import type { Article, QualityThresholds, SubScore } from './types.js';
import { ScoreTally, countMatches, countOccurrences, escapeRegExp } from './tally.js';

const LONG_SENTENCE = 100;
const LONG_SENTENCE_SHARE = 0.2;
const IDEOGRAPH_RATIO_MIN = 0.2;
const IDEOGRAPH_RATIO_MAX = 0.4;

export function splitSentences(content: string): string[] {
  return content
    .split(/[。！？]/)
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

/** CJK unified ideographs over non-whitespace characters. */
export function ideographRatio(content: string): number {
  const visible = content.replace(/\s/g, '').length;
  if (visible === 0) return 0;
  return countMatches(content, /[一-龯]/g) / visible;
}

export function hasExplainedTerm(content: string, terms: readonly string[]): boolean {
  return terms.some(term => new RegExp(`${escapeRegExp(term)}[（(].*?[）)]`).test(content));
}

export function scoreReadability(article: Article, thresholds: QualityThresholds): SubScore {
  const tally = new ScoreTally('readability');
  const content = article.content;

  if (content.trim().length === 0) {
    tally.flag('high', 'Content is empty');
    return tally.toSubScore();
  }

  const sentences = splitSentences(content);
  const longShare = sentences.length > 0
    ? sentences.filter(s => s.length > LONG_SENTENCE).length / sentences.length
    : 0;
  if (longShare < LONG_SENTENCE_SHARE) {
    tally.award(25);
  } else {
    tally.flag('medium', `${Math.round(longShare * 100)}% of sentences exceed ${LONG_SENTENCE} characters`);
  }

  const ratio = ideographRatio(content);
  if (ratio >= IDEOGRAPH_RATIO_MIN && ratio <= IDEOGRAPH_RATIO_MAX) {
    tally.award(25);
  } else {
    tally.flag('low', `Kanji ratio ${(ratio * 100).toFixed(1)}% is outside ${IDEOGRAPH_RATIO_MIN * 100}-${IDEOGRAPH_RATIO_MAX * 100}%`);
  }

  if (hasExplainedTerm(content, thresholds.technicalTerms)) {
    tally.award(15);
  }

  const connectives = thresholds.connectives.reduce((sum, word) => sum + countOccurrences(content, word), 0);
  if (connectives >= 3) {
    tally.award(15);
  } else if (connectives > 0) {
    tally.award(10);
  } else {
    tally.flag('low', 'No transition words');
  }

  const breaks = countMatches(content, /\n\s*\n/g);
  if (breaks >= 5) {
    tally.award(20);
  } else if (breaks >= 2) {
    tally.award(15);
  } else {
    tally.flag('low', 'Too few blank-line breaks between sections');
  }

  return tally.toSubScore();
}
