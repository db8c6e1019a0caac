/**
 * Solution aggregator. Merges fragments and citations gathered from several
 * collectors into one ranked, de-duplicated bundle.
 */

import type { ScoredCandidate } from '../discovery/types.js';
import { clamp01 } from '../discovery/scoring.js';
import type {
  AggregatedBundle,
  AggregationLimits,
  BundleSummary,
  SolutionFragment,
  SourceCitation,
} from './types.js';

export const DEFAULT_AGGREGATION_LIMITS: AggregationLimits = {
  maxSolutions: 10,
  maxCitations: 15,
};

/**
 * Build a bundle for `candidate`.
 *
 * Solutions are ranked by reliability (stable on ties) and truncated to
 * `maxSolutions`. Citations keep the first occurrence of each url and are
 * truncated to `maxCitations`. An empty solution list is allowed.
 */
export function aggregateSolutions(
  candidate: ScoredCandidate,
  solutions: readonly SolutionFragment[],
  citations: readonly SourceCitation[],
  limits: AggregationLimits = DEFAULT_AGGREGATION_LIMITS,
): AggregatedBundle {
  const normalized = solutions.map(normalizeSolution);
  const ranked = rankSolutions(normalized);
  const unique = dedupeCitations(citations.map(normalizeCitation));

  const bundle: AggregatedBundle = {
    candidate,
    solutions: Object.freeze(ranked.slice(0, Math.max(0, limits.maxSolutions))),
    citations: Object.freeze(unique.slice(0, Math.max(0, limits.maxCitations))),
    summary: summarize(normalized, unique),
  };
  return Object.freeze(bundle);
}

/** Stable sort, highest reliability first. */
export function rankSolutions(solutions: readonly SolutionFragment[]): SolutionFragment[] {
  return solutions
    .map((solution, index) => ({ solution, index }))
    .sort((a, b) => b.solution.reliability - a.solution.reliability || a.index - b.index)
    .map(entry => entry.solution);
}

/** First occurrence of each exact url wins; citations without a url are dropped. */
export function dedupeCitations(citations: readonly SourceCitation[]): SourceCitation[] {
  const seen = new Set<string>();
  const unique: SourceCitation[] = [];
  for (const citation of citations) {
    if (!citation.url || seen.has(citation.url)) continue;
    seen.add(citation.url);
    unique.push(citation);
  }
  return unique;
}

function summarize(solutions: readonly SolutionFragment[], uniqueCitations: readonly SourceCitation[]): BundleSummary {
  const total = solutions.reduce((sum, s) => sum + s.reliability, 0);
  const average = solutions.length > 0 ? total / solutions.length : 0;
  return {
    totalSolutions: solutions.length,
    uniqueCitations: uniqueCitations.length,
    averageReliability: Math.round(average * 1000) / 1000,
  };
}

function normalizeSolution(solution: SolutionFragment): SolutionFragment {
  return {
    description: solution.description ?? '',
    steps: Array.isArray(solution.steps) ? [...solution.steps] : [],
    reliability: clamp01(solution.reliability),
    sourceUrl: solution.sourceUrl ?? '',
    sourceTitle: solution.sourceTitle ?? '',
  };
}

function normalizeCitation(citation: SourceCitation): SourceCitation {
  return { ...citation, reliability: clamp01(citation.reliability) };
}
