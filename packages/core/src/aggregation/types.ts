import type { ScoredCandidate } from '../discovery/types.js';

export type CitationType = 'official' | 'community';

/** One candidate fix gathered from a source. */
export interface SolutionFragment {
  description: string;
  steps: string[];
  /** In [0, 1], never above the collector's declared ceiling. */
  reliability: number;
  sourceUrl: string;
  sourceTitle: string;
}

export interface SourceCitation {
  title: string;
  url: string;
  type: CitationType;
  reliability: number;
  snippet?: string;
}

export interface BundleSummary {
  /** Solutions received, before truncation. */
  totalSolutions: number;
  /** Citations left after url de-duplication, before truncation. */
  uniqueCitations: number;
  /** Mean reliability over every received solution, 0 when there are none. */
  averageReliability: number;
}

/** Everything gathered for one chosen candidate. Read-only once built. */
export interface AggregatedBundle {
  readonly candidate: ScoredCandidate;
  readonly solutions: readonly SolutionFragment[];
  readonly citations: readonly SourceCitation[];
  readonly summary: BundleSummary;
}

export interface AggregationLimits {
  maxSolutions: number;
  maxCitations: number;
}
