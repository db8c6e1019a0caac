import type { Article, QualityThresholds, SubScore } from './types.js';
import { ScoreTally, countMatches } from './tally.js';

const MAX_PARAGRAPH_LENGTH = 500;

export interface MarkdownOutline {
  h1: number;
  h2: number;
  h3: number;
  listItems: number;
  fences: number;
  longestParagraph: number;
}

export function outlineMarkdown(content: string): MarkdownOutline {
  const paragraphs = content.split('\n\n');
  return {
    h1: countMatches(content, /^# /gm),
    h2: countMatches(content, /^## /gm),
    h3: countMatches(content, /^### /gm),
    listItems: countMatches(content, /^(?:[-*+] |\d+\. )/gm),
    fences: countMatches(content, /```/g),
    longestParagraph: paragraphs.reduce((max, p) => Math.max(max, p.length), 0),
  };
}

/** Heading hierarchy, lists, code fences and paragraph length. */
export function scoreStructure(article: Article, _thresholds: QualityThresholds): SubScore {
  const tally = new ScoreTally('structure');
  const outline = outlineMarkdown(article.content);

  if (outline.h1 === 1) {
    tally.award(20);
  } else if (outline.h1 === 0) {
    tally.flag('high', 'Missing top-level (#) heading');
  } else {
    tally.flag('medium', `${outline.h1} top-level (#) headings; expected exactly one`);
  }

  if (outline.h2 >= 3) {
    tally.award(25);
  } else if (outline.h2 > 0) {
    tally.award(15);
    tally.flag('low', `Only ${outline.h2} second-level (##) heading(s); 3 or more recommended`);
  } else {
    tally.flag('medium', 'No second-level (##) headings');
  }

  if (outline.h3 >= 2) {
    tally.award(15);
  } else if (outline.h3 === 1) {
    tally.award(10);
  }

  if (outline.listItems >= 3) {
    tally.award(20);
  } else if (outline.listItems > 0) {
    tally.award(10);
    tally.flag('low', `Only ${outline.listItems} list item(s)`);
  } else {
    tally.flag('low', 'No lists');
  }

  if (outline.fences >= 2) {
    tally.award(10);
  }

  if (outline.longestParagraph > MAX_PARAGRAPH_LENGTH) {
    tally.flag('low', `A paragraph exceeds ${MAX_PARAGRAPH_LENGTH} characters`);
  } else {
    tally.award(10);
  }

  return tally.toSubScore();
}
