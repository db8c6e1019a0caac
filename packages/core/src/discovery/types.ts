/**
 * Candidate discovery types.
 *
 * A source adapter produces raw candidates, the scorer attaches a confidence,
 * and the filter/selector reduces a pool of scored candidates to one choice.
 */

// ---------------------------------------------------------------------------
// Candidates
// ---------------------------------------------------------------------------

/** Known providers. `manual` marks operator-supplied error text. */
export type ProviderName = 'stackoverflow' | 'reddit' | 'google_trends' | 'manual';

/** A provider-native record, before scoring. */
export interface RawCandidate {
  /** The error text proposed as an article subject. */
  readonly text: string;
  readonly provider: ProviderName;
  /** Flat numeric engagement metrics (e.g. score, view_count, ups). */
  readonly metrics: Readonly<Record<string, number>>;
  /** ISO-8601 discovery time. */
  readonly timestamp: string;
  readonly sourceUrl?: string;
  /** Original post/question title when the text was extracted from it. */
  readonly title?: string;
}

export interface ScoredCandidate extends RawCandidate {
  /** Normalized confidence in [0, 1]. */
  readonly confidence: number;
}

/** All scored candidates of one discovery run, in discovery order. */
export type CandidatePool = readonly ScoredCandidate[];

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

export type RejectionReason =
  | 'low_confidence'
  | 'too_short'
  | 'excluded_keyword'
  | 'already_processed';

export interface RejectedCandidate {
  candidate: ScoredCandidate;
  reason: RejectionReason;
}

export interface FilterResult {
  kept: ScoredCandidate[];
  rejected: RejectedCandidate[];
}

export interface FilterCriteria {
  /** Minimum confidence (inclusive). */
  minConfidence: number;
  /** Minimum trimmed text length (inclusive). */
  minTextLength: number;
  /** Case-insensitive substrings that disqualify a candidate. */
  excludeKeywords: string[];
}

/** Duplicate-check predicate supplied by the history collaborator. */
export type AlreadyProcessed = (text: string) => boolean;

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

export interface SelectionResult {
  candidate: ScoredCandidate;
  provider: ProviderName;
  /** 0-based rank within the confidence-sorted filtered pool. */
  rank: number;
  /** Size of the top-K window the draw was made from. */
  windowSize: number;
  /** Size of the filtered pool. */
  poolSize: number;
}

export interface DiscoveryResult {
  selection: SelectionResult | null;
  filtered: ScoredCandidate[];
  rejected: RejectedCandidate[];
}
