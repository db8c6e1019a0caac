import { describe, it, expect } from 'vitest';
import { keywordDensity, scoreSeo } from './seo.js';
import { DEFAULT_QUALITY_THRESHOLDS } from './gate.js';
import type { Article } from './types.js';

function words(keywordCount: number, total: number): string {
  return [
    ...Array<string>(keywordCount).fill('ERROR_X'),
    ...Array<string>(total - keywordCount).fill('word'),
  ].join(' ');
}

function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    title: 'How to fix error_x on Windows',
    slug: 'error-x-solution',
    content: words(1, 50),
    excerpt: 'Steps to resolve ERROR_X quickly.',
    tags: ['windows', 'error', 'fix'],
    wordCount: 3500,
    keyword: 'ERROR_X',
    ...overrides,
  };
}

describe('keywordDensity', () => {
  it('divides occurrences by whitespace tokens', () => {
    expect(keywordDensity(words(1, 50), 'ERROR_X')).toBe(2);
  });

  it('is 0 for empty content', () => {
    expect(keywordDensity('', 'ERROR_X')).toBe(0);
  });
});

describe('scoreSeo', () => {
  it('awards every check for a well-optimized article', () => {
    const sub = scoreSeo(makeArticle(), DEFAULT_QUALITY_THRESHOLDS);
    expect(sub.score).toBe(85);
    expect(sub.issues).toEqual([]);
  });

  it('flags keyword stuffing as high', () => {
    const sub = scoreSeo(makeArticle({ content: 'ERROR_X word' }), DEFAULT_QUALITY_THRESHOLDS);
    expect(sub.score).toBe(60);
    expect(sub.issues).toEqual([{
      message: 'Keyword density 50.00% is too high (target 1-3%)',
      severity: 'high',
      dimension: 'seo',
    }]);
  });

  it('does not judge density without content', () => {
    const sub = scoreSeo(makeArticle({ content: '' }), DEFAULT_QUALITY_THRESHOLDS);
    expect(sub.score).toBe(60);
    expect(sub.issues).toEqual([]);
    expect(scoreSeo(makeArticle({ content: ' \n ' }), DEFAULT_QUALITY_THRESHOLDS).issues).toEqual([]);
  });

  it('flags content that never uses the keyword as medium', () => {
    const sub = scoreSeo(makeArticle({ content: words(0, 50) }), DEFAULT_QUALITY_THRESHOLDS);
    expect(sub.score).toBe(60);
    expect(sub.issues).toEqual([{
      message: 'Keyword density 0.00% is too low (target 1-3%)',
      severity: 'medium',
      dimension: 'seo',
    }]);
  });

  it('gives partial credit for slightly low density', () => {
    const sub = scoreSeo(makeArticle({ content: words(1, 150) }), DEFAULT_QUALITY_THRESHOLDS);
    expect(sub.score).toBe(75);
    expect(sub.issues.map(i => i.severity)).toEqual(['low']);
  });

  it('flags a title without the keyword as high', () => {
    const sub = scoreSeo(makeArticle({ title: 'Fixing a Windows problem' }), DEFAULT_QUALITY_THRESHOLDS);
    expect(sub.score).toBe(65);
    expect(sub.issues[0]?.severity).toBe('high');
  });

  it('skips keyword checks when the keyword is empty', () => {
    const sub = scoreSeo(makeArticle({ keyword: '', slug: 'abc', tags: [] }), DEFAULT_QUALITY_THRESHOLDS);
    expect(sub.score).toBe(10);
    expect(sub.issues).toEqual([{ message: 'No tags', severity: 'medium', dimension: 'seo' }]);
  });

  it('flags a slug with invalid characters as low', () => {
    const sub = scoreSeo(makeArticle({ slug: 'Bad Slug' }), DEFAULT_QUALITY_THRESHOLDS);
    expect(sub.score).toBe(75);
    expect(sub.issues.map(i => i.severity)).toEqual(['low']);
  });
});
