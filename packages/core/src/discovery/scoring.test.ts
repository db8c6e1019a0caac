import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SCORING_TABLES,
  ScoringTableError,
  resolveScoringTables,
  scoreCandidate,
  scorePool,
  validateScoringTable,
  type EngagementTable,
} from './scoring.js';
import type { ProviderName, RawCandidate } from './types.js';

function raw(provider: ProviderName, metrics: Record<string, number>, text = 'ERROR_ACCESS_DENIED'): RawCandidate {
  return { text, provider, metrics, timestamp: '2026-01-15T00:00:00.000Z' };
}

describe('scoreCandidate: engagement tables', () => {
  it('sums the top tier of every stackoverflow metric', () => {
    const scored = scoreCandidate(raw('stackoverflow', { score: 11, view_count: 1001, answer_count: 3 }));
    expect(scored.confidence).toBe(0.8);
  });

  it('uses the middle tiers', () => {
    const scored = scoreCandidate(raw('stackoverflow', { score: 6, view_count: 600, answer_count: 1 }));
    expect(scored.confidence).toBe(0.5);
  });

  it('requires a metric to strictly exceed a threshold', () => {
    const scored = scoreCandidate(raw('stackoverflow', { score: 10, view_count: 1000, answer_count: 2 }));
    // score 10 -> 0.2, view_count 1000 -> 0.1, answer_count 2 -> 0.2
    expect(scored.confidence).toBe(0.5);
  });

  it('defaults missing and NaN metrics to zero', () => {
    expect(scoreCandidate(raw('stackoverflow', {})).confidence).toBe(0);
    expect(scoreCandidate(raw('reddit', { ups: Number.NaN, num_comments: 6 })).confidence).toBe(0.1);
  });

  it('keeps infinite metrics in the top tier', () => {
    expect(scoreCandidate(raw('stackoverflow', { score: Number.POSITIVE_INFINITY })).confidence).toBe(0.3);
    expect(scoreCandidate(raw('stackoverflow', { score: Number.NEGATIVE_INFINITY })).confidence).toBe(0);
  });

  it('scores reddit posts by ups and comments', () => {
    expect(scoreCandidate(raw('reddit', { ups: 51, num_comments: 21 })).confidence).toBe(0.7);
    expect(scoreCandidate(raw('reddit', { ups: 21, num_comments: 11 })).confidence).toBe(0.5);
    expect(scoreCandidate(raw('reddit', { ups: 5, num_comments: 5 })).confidence).toBe(0);
  });

  it('handles very large values', () => {
    const scored = scoreCandidate(raw('stackoverflow', {
      score: Number.POSITIVE_INFINITY,
      view_count: Number.MAX_SAFE_INTEGER,
      answer_count: 1e12,
    }));
    expect(scored.confidence).toBe(0.8);
  });

  it('clamps the sum to 1', () => {
    const generous: EngagementTable = {
      kind: 'engagement',
      metrics: {
        a: [{ above: 0, bonus: 0.8 }],
        b: [{ above: 0, bonus: 0.8 }],
      },
    };
    const scored = scoreCandidate(raw('stackoverflow', { a: 1, b: 1 }), { tables: { stackoverflow: generous } });
    expect(scored.confidence).toBe(1);
  });

  it('keeps the raw fields on the scored candidate', () => {
    const input = { ...raw('reddit', { ups: 60 }), sourceUrl: 'https://reddit.com/r/x/1', title: 'Crash on boot' };
    const scored = scoreCandidate(input);
    expect(scored.text).toBe('ERROR_ACCESS_DENIED');
    expect(scored.sourceUrl).toBe('https://reddit.com/r/x/1');
    expect(scored.title).toBe('Crash on boot');
    expect(scored.confidence).toBe(0.4);
  });
});

describe('scoreCandidate: monotonicity', () => {
  const values = [0, 1, 5, 6, 10, 11, 20, 21, 50, 51, 499, 501, 1000, 1001, 100000];

  it('never lowers confidence when a single metric grows', () => {
    for (const provider of ['stackoverflow', 'reddit'] as const) {
      const table = DEFAULT_SCORING_TABLES[provider];
      if (table.kind !== 'engagement') throw new Error('expected engagement table');
      const metricNames = Object.keys(table.metrics);

      for (const metric of metricNames) {
        for (let i = 1; i < values.length; i++) {
          const base: Record<string, number> = Object.fromEntries(metricNames.map(m => [m, 3]));
          const lower = scoreCandidate(raw(provider, { ...base, [metric]: values[i - 1] }));
          const higher = scoreCandidate(raw(provider, { ...base, [metric]: values[i] }));
          expect(higher.confidence).toBeGreaterThanOrEqual(lower.confidence);
        }
      }
    }
  });

  it('always lands in [0, 1]', () => {
    for (const v of values) {
      const so = scoreCandidate(raw('stackoverflow', { score: v, view_count: v, answer_count: v }));
      const rd = scoreCandidate(raw('reddit', { ups: v, num_comments: v }));
      for (const c of [so.confidence, rd.confidence]) {
        expect(c).toBeGreaterThanOrEqual(0);
        expect(c).toBeLessThanOrEqual(1);
      }
    }
  });
});

describe('scoreCandidate: synthetic and fixed tables', () => {
  it('draws trend confidence from the configured range', () => {
    expect(scoreCandidate(raw('google_trends', {}), { random: () => 0 }).confidence).toBe(0.4);
    expect(scoreCandidate(raw('google_trends', {}), { random: () => 0.5 }).confidence).toBe(0.6);
    expect(scoreCandidate(raw('google_trends', {}), { random: () => 0.999 }).confidence).toBe(0.8);
  });

  it('ignores engagement metrics on synthetic providers', () => {
    const scored = scoreCandidate(raw('google_trends', { search_volume: 1_000_000 }), { random: () => 0.25 });
    expect(scored.confidence).toBe(0.5);
  });

  it('gives manual candidates full confidence', () => {
    expect(scoreCandidate(raw('manual', {})).confidence).toBe(1);
  });
});

describe('scorePool', () => {
  it('preserves pool order', () => {
    const pool = scorePool([
      raw('reddit', { ups: 60 }, 'first error text'),
      raw('stackoverflow', { score: 11 }, 'second error text'),
    ]);
    expect(pool.map(c => c.text)).toEqual(['first error text', 'second error text']);
    expect(pool.map(c => c.confidence)).toEqual([0.4, 0.3]);
  });

  it('applies a valid override table', () => {
    const pool = scorePool([raw('google_trends', {})], {
      tables: { google_trends: { kind: 'fixed', confidence: 0.55 } },
    });
    expect(pool[0]?.confidence).toBe(0.55);
  });
});

describe('override tables', () => {
  const INVERTED: EngagementTable = {
    kind: 'engagement',
    metrics: { score: [{ above: 10, bonus: 0.1 }, { above: 0, bonus: 0.5 }] },
  };

  it('are rejected by scorePool when they break monotonicity', () => {
    expect(() => scorePool([raw('stackoverflow', { score: 11 })], { tables: { stackoverflow: INVERTED } }))
      .toThrow(ScoringTableError);
  });

  it('are rejected by scoreCandidate when they break monotonicity', () => {
    expect(() => scoreCandidate(raw('stackoverflow', { score: 5 }), { tables: { stackoverflow: INVERTED } }))
      .toThrow('awards more than a higher tier');
  });

  it('are not checked for providers the candidate does not use', () => {
    expect(scoreCandidate(raw('manual', {}), { tables: { stackoverflow: INVERTED } }).confidence).toBe(1);
  });
});

describe('validateScoringTable', () => {
  it('accepts the default tables', () => {
    expect(() => resolveScoringTables()).not.toThrow();
  });

  it('rejects ascending thresholds', () => {
    expect(() => validateScoringTable({
      kind: 'engagement',
      metrics: { score: [{ above: 0, bonus: 0.1 }, { above: 10, bonus: 0.3 }] },
    })).toThrow(ScoringTableError);
  });

  it('rejects a lower tier that pays more', () => {
    expect(() => validateScoringTable({
      kind: 'engagement',
      metrics: { score: [{ above: 10, bonus: 0.1 }, { above: 5, bonus: 0.3 }] },
    })).toThrow('awards more than a higher tier');
  });

  it('rejects synthetic ranges outside [0, 1]', () => {
    expect(() => validateScoringTable({ kind: 'synthetic', min: 0.5, max: 1.5 })).toThrow(ScoringTableError);
  });

  it('merges overrides over the defaults', () => {
    const tables = resolveScoringTables({ google_trends: { kind: 'fixed', confidence: 0.55 } });
    expect(tables.google_trends).toEqual({ kind: 'fixed', confidence: 0.55 });
    expect(tables.reddit).toBe(DEFAULT_SCORING_TABLES.reddit);
  });
});
