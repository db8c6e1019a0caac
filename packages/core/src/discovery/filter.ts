import type {
  AlreadyProcessed,
  CandidatePool,
  FilterCriteria,
  FilterResult,
  RejectionReason,
  ScoredCandidate,
} from './types.js';

export const DEFAULT_FILTER_CRITERIA: FilterCriteria = {
  minConfidence: 0.5,
  minTextLength: 10,
  excludeKeywords: ['test', 'sample', 'example', 'dummy'],
};

export function normalizeCandidateText(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Apply the rejection rules in fixed order and return the first one that
 * fails, or null when the candidate is kept.
 */
export function rejectionReason(
  candidate: ScoredCandidate,
  criteria: FilterCriteria,
  alreadyProcessed?: AlreadyProcessed,
): RejectionReason | null {
  if (!(candidate.confidence >= criteria.minConfidence)) {
    return 'low_confidence';
  }

  const normalized = normalizeCandidateText(candidate.text);
  if (normalized.length < criteria.minTextLength) {
    return 'too_short';
  }

  if (criteria.excludeKeywords.some(k => k.length > 0 && normalized.includes(k.toLowerCase()))) {
    return 'excluded_keyword';
  }

  if (alreadyProcessed?.(candidate.text)) {
    return 'already_processed';
  }

  return null;
}

/** Split a pool into kept and rejected candidates, preserving pool order in both. */
export function filterCandidates(
  pool: CandidatePool,
  criteria: FilterCriteria = DEFAULT_FILTER_CRITERIA,
  alreadyProcessed?: AlreadyProcessed,
): FilterResult {
  const result: FilterResult = { kept: [], rejected: [] };

  for (const candidate of pool) {
    const reason = rejectionReason(candidate, criteria, alreadyProcessed);
    if (reason) {
      result.rejected.push({ candidate, reason });
    } else {
      result.kept.push(candidate);
    }
  }

  return result;
}
