import type {
  Article,
  QualityIssue,
  QualityReport,
  QualityThresholds,
  ScoredDimension,
  Severity,
  SubScore,
} from './types.js';
import { scoreBasic } from './basic.js';
import { scoreSeo } from './seo.js';
import { scoreStructure } from './structure.js';
import { scoreReadability } from './readability.js';
import { runOptionalChecks } from './checks.js';

export const DEFAULT_QUALITY_THRESHOLDS: QualityThresholds = {
  minWordCount: 3000,
  maxWordCount: 5000,
  minOverallScore: 70,
  technicalTerms: ['API', 'SQL', 'HTTP', 'URL', 'OS', 'CPU', 'RAM'],
  connectives: ['しかし', 'ただし', 'また', 'さらに', 'そのため', 'つまり', 'なお'],
  // Optional checks are off unless configured.
  duplicatePhrases: [],
  validateLinks: false,
};

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function asCount(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Coerces loosely-shaped input into an Article; missing or mistyped fields become empty. */
export function normalizeArticle(input: unknown): Article {
  const raw = isRecord(input) ? input : {};
  const tags = Array.isArray(raw.tags)
    ? raw.tags.filter((tag): tag is string => typeof tag === 'string')
    : [];
  return {
    title: asString(raw.title),
    slug: asString(raw.slug),
    content: asString(raw.content),
    excerpt: asString(raw.excerpt),
    tags,
    wordCount: asCount(raw.wordCount ?? raw.word_count),
    keyword: asString(raw.keyword),
  };
}

function percentage(sub: SubScore): number {
  return Math.round((sub.score / sub.maxScore) * 1000) / 10;
}

export function evaluateArticle(
  input: unknown,
  thresholds: QualityThresholds = DEFAULT_QUALITY_THRESHOLDS,
): QualityReport {
  const article = normalizeArticle(input);

  const subScores: Record<ScoredDimension, SubScore> = {
    basic: scoreBasic(article, thresholds),
    seo: scoreSeo(article, thresholds),
    structure: scoreStructure(article, thresholds),
    readability: scoreReadability(article, thresholds),
  };
  const scored = Object.values(subScores);

  const issues: QualityIssue[] = [
    ...scored.flatMap(sub => sub.issues),
    ...runOptionalChecks(article, thresholds),
  ];

  const totalScore = scored.reduce((sum, sub) => sum + sub.score, 0);
  const totalMax = scored.reduce((sum, sub) => sum + sub.maxScore, 0);
  const overallScore = Math.round((totalScore / totalMax) * 1000) / 10;

  const summary: Record<Severity, number> = { high: 0, medium: 0, low: 0 };
  for (const issue of issues) summary[issue.severity]++;

  return {
    subScores,
    overallScore,
    passed: overallScore >= thresholds.minOverallScore && summary.high === 0,
    issues,
    seoScore: percentage(subScores.seo),
    readabilityScore: percentage(subScores.readability),
    summary,
  };
}
