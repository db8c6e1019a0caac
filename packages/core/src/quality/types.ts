/**
 * Article quality gate types.
 *
 * The gate scores an article along independent dimensions, each out of 100,
 * and derives an overall pass/fail verdict from the combined score and the
 * severity of the issues found.
 */

/** A synthesized article, as handed to the gate and the publisher. */
export interface Article {
  title: string;
  slug: string;
  /** Markdown body. */
  content: string;
  excerpt: string;
  tags: string[];
  /** Length of `content` in characters. */
  wordCount: number;
  /** The error text the article is about. */
  keyword: string;
}

export type Severity = 'low' | 'medium' | 'high';

export type QualityDimension = 'basic' | 'seo' | 'structure' | 'readability' | 'checks';

export interface QualityIssue {
  message: string;
  severity: Severity;
  dimension: QualityDimension;
}

export interface SubScore {
  score: number;
  maxScore: number;
  issues: QualityIssue[];
}

export type ScoredDimension = Exclude<QualityDimension, 'checks'>;

export interface QualityReport {
  subScores: Record<ScoredDimension, SubScore>;
  /** Sum of scores over sum of max scores, as a percentage with one decimal. */
  overallScore: number;
  passed: boolean;
  /** All issues, in dimension order. */
  issues: QualityIssue[];
  /** Percentage of the SEO dimension. */
  seoScore: number;
  /** Percentage of the readability dimension. */
  readabilityScore: number;
  summary: Record<Severity, number>;
}

export interface QualityThresholds {
  /** Inclusive target window for `wordCount`. */
  minWordCount: number;
  maxWordCount: number;
  /** Minimum overall score for `passed`. */
  minOverallScore: number;
  /** Acronyms that should be explained with a parenthetical on first use. */
  technicalTerms: string[];
  /** Transition words counted by the readability check. */
  connectives: string[];
  /** Report titles that repeat any of these phrases. */
  duplicatePhrases: string[];
  /** Report Markdown links that lack a scheme or host. */
  validateLinks: boolean;
}

