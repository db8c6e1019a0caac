import type {
  AlreadyProcessed,
  CandidatePool,
  DiscoveryResult,
  FilterCriteria,
  ScoredCandidate,
  SelectionResult,
} from './types.js';
import { DEFAULT_FILTER_CRITERIA, filterCandidates } from './filter.js';
import { defaultRandom, type RandomSource } from './random.js';

/** K = max(3, floor(n / 3)). May exceed n; the window is clipped when drawn. */
export function selectionWindowSize(poolSize: number): number {
  return Math.max(3, Math.floor(poolSize / 3));
}

/** Weight of window position i (0 = best): 4, 3, 2, 1, 1, ... */
export function selectionWeight(index: number): number {
  return Math.max(1, 4 - index);
}

/** Stable sort by confidence, highest first. Ties keep discovery order. */
export function rankByConfidence(pool: CandidatePool): ScoredCandidate[] {
  return pool
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => b.candidate.confidence - a.candidate.confidence || a.index - b.index)
    .map(entry => entry.candidate);
}

/**
 * Draw one index from `weights` with a single call to `random`.
 * Walks the cumulative weights until `r * total` falls below the running sum.
 */
export function weightedIndex(weights: readonly number[], random: RandomSource): number {
  const total = weights.reduce((sum, w) => sum + w, 0);
  const target = random() * total;
  let cumulative = 0;
  for (let i = 0; i < weights.length; i++) {
    cumulative += weights[i];
    if (target < cumulative) return i;
  }
  // random() returned 1 or floating error pushed target past the end
  return weights.length - 1;
}

/**
 * Weighted random choice among the top-K of an already filtered pool.
 * Returns null for an empty pool.
 */
export function selectCandidate(
  pool: CandidatePool,
  random: RandomSource = defaultRandom,
): SelectionResult | null {
  if (pool.length === 0) return null;

  const ranked = rankByConfidence(pool);
  const windowSize = Math.min(selectionWindowSize(ranked.length), ranked.length);
  const weights = Array.from({ length: windowSize }, (_, i) => selectionWeight(i));
  const rank = weightedIndex(weights, random);
  const candidate = ranked[rank];

  return {
    candidate,
    provider: candidate.provider,
    rank,
    windowSize,
    poolSize: ranked.length,
  };
}

export interface DiscoverOptions {
  criteria?: FilterCriteria;
  alreadyProcessed?: AlreadyProcessed;
  random?: RandomSource;
}

/** Filter, then select. */
export function discoverCandidate(pool: CandidatePool, options: DiscoverOptions = {}): DiscoveryResult {
  const { kept, rejected } = filterCandidates(
    pool,
    options.criteria ?? DEFAULT_FILTER_CRITERIA,
    options.alreadyProcessed,
  );
  return {
    selection: selectCandidate(kept, options.random ?? defaultRandom),
    filtered: kept,
    rejected,
  };
}
