export type {
  Article,
  Severity,
  QualityDimension,
  QualityIssue,
  SubScore,
  ScoredDimension,
  QualityReport,
  QualityThresholds,
} from './types.js';
export { ScoreTally, DIMENSION_MAX_SCORE, countOccurrences, countMatches, escapeRegExp } from './tally.js';
export { scoreBasic } from './basic.js';
export { scoreSeo, keywordDensity } from './seo.js';
export { scoreStructure, outlineMarkdown } from './structure.js';
export type { MarkdownOutline } from './structure.js';
export { scoreReadability, splitSentences, ideographRatio, hasExplainedTerm } from './readability.js';
export { runOptionalChecks, extractLinks, isValidLink } from './checks.js';
export { DEFAULT_QUALITY_THRESHOLDS, normalizeArticle, evaluateArticle } from './gate.js';
export { renderQualityReportMarkdown, renderQualityReportJSON } from './report.js';
