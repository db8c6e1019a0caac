import type { QualityDimension, QualityIssue, Severity, SubScore } from './types.js';

export const DIMENSION_MAX_SCORE = 100;

/** Accumulates points and issues for one dimension. */
export class ScoreTally {
  private points = 0;
  private readonly issues: QualityIssue[] = [];

  constructor(private readonly dimension: QualityDimension) {}

  award(points: number): void {
    this.points += points;
  }

  flag(severity: Severity, message: string): void {
    this.issues.push({ message, severity, dimension: this.dimension });
  }

  toSubScore(): SubScore {
    return {
      score: Math.min(this.points, DIMENSION_MAX_SCORE),
      maxScore: DIMENSION_MAX_SCORE,
      issues: [...this.issues],
    };
  }

  get flagged(): readonly QualityIssue[] {
    return this.issues;
  }
}

/** Non-overlapping, case-insensitive occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  const h = haystack.toLowerCase();
  const n = needle.toLowerCase();
  let count = 0;
  let from = 0;
  for (;;) {
    const index = h.indexOf(n, from);
    if (index === -1) return count;
    count++;
    from = index + n.length;
  }
}

export function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
