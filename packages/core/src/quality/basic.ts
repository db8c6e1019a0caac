import type { Article, QualityThresholds, SubScore } from './types.js';
import { ScoreTally } from './tally.js';

const TITLE_MIN = 20;
const TITLE_MAX = 70;
const EXCERPT_MIN = 100;
const EXCERPT_MAX = 160;

/** Length window, title, body and excerpt presence. */
export function scoreBasic(article: Article, thresholds: QualityThresholds): SubScore {
  const tally = new ScoreTally('basic');
  const { minWordCount, maxWordCount } = thresholds;

  if (article.wordCount < minWordCount) {
    tally.flag('high', `Content too short: ${article.wordCount} characters (minimum ${minWordCount})`);
  } else if (article.wordCount > maxWordCount) {
    tally.flag('medium', `Content too long: ${article.wordCount} characters (maximum ${maxWordCount})`);
  } else {
    tally.award(30);
  }

  const titleLength = article.title.length;
  if (titleLength === 0) {
    tally.flag('high', 'Title is missing');
  } else if (titleLength < TITLE_MIN || titleLength > TITLE_MAX) {
    tally.flag('medium', `Title length ${titleLength} is outside ${TITLE_MIN}-${TITLE_MAX} characters`);
  } else {
    tally.award(25);
  }

  if (article.content.trim().length === 0) {
    tally.flag('high', 'Content is empty');
  } else {
    tally.award(20);
  }

  const excerptLength = article.excerpt.length;
  if (excerptLength === 0) {
    tally.flag('medium', 'Excerpt is missing');
  } else if (excerptLength < EXCERPT_MIN || excerptLength > EXCERPT_MAX) {
    tally.flag('low', `Excerpt length ${excerptLength} is outside ${EXCERPT_MIN}-${EXCERPT_MAX} characters`);
  } else {
    tally.award(25);
  }

  return tally.toSubScore();
}
