import { describe, it, expect } from 'vitest';
import {
  discoverCandidate,
  rankByConfidence,
  selectCandidate,
  selectionWeight,
  selectionWindowSize,
  weightedIndex,
} from './selector.js';
import { createSeededRandom, type RandomSource } from './random.js';
import type { ScoredCandidate } from './types.js';

function candidate(text: string, confidence: number): ScoredCandidate {
  return {
    text,
    confidence,
    provider: 'reddit',
    metrics: {},
    timestamp: '2026-01-15T00:00:00.000Z',
  };
}

function scripted(...values: number[]): RandomSource {
  let i = 0;
  return () => values[i++ % values.length];
}

describe('selection window and weights', () => {
  it('uses at least three slots', () => {
    expect(selectionWindowSize(0)).toBe(3);
    expect(selectionWindowSize(2)).toBe(3);
    expect(selectionWindowSize(9)).toBe(3);
    expect(selectionWindowSize(12)).toBe(4);
    expect(selectionWindowSize(31)).toBe(10);
  });

  it('weights positions 4, 3, 2, then 1', () => {
    expect([0, 1, 2, 3, 4, 5].map(selectionWeight)).toEqual([4, 3, 2, 1, 1, 1]);
  });
});

describe('rankByConfidence', () => {
  it('sorts descending and keeps discovery order on ties', () => {
    const ranked = rankByConfidence([
      candidate('first tied entry', 0.6),
      candidate('highest entry', 0.9),
      candidate('second tied entry', 0.6),
    ]);
    expect(ranked.map(c => c.text)).toEqual(['highest entry', 'first tied entry', 'second tied entry']);
  });
});

describe('weightedIndex', () => {
  it('walks cumulative weights', () => {
    const weights = [4, 3, 2];
    expect(weightedIndex(weights, () => 0)).toBe(0);
    expect(weightedIndex(weights, () => 0.44)).toBe(0); // 3.96 < 4
    expect(weightedIndex(weights, () => 0.45)).toBe(1); // 4.05
    expect(weightedIndex(weights, () => 0.77)).toBe(1); // 6.93 < 7
    expect(weightedIndex(weights, () => 0.78)).toBe(2); // 7.02
    expect(weightedIndex(weights, () => 1)).toBe(2);
  });
});

describe('selectCandidate', () => {
  it('returns null for an empty pool', () => {
    expect(selectCandidate([], () => 0.5)).toBeNull();
  });

  it('clips the window to the pool size', () => {
    const pool = [candidate('OUT_OF_MEMORY_0x1', 0.9), candidate('ERROR_DISK_FULL', 0.6)];

    const first = selectCandidate(pool, () => 0.5); // 0.5 * 7 = 3.5 < 4
    expect(first).toEqual({
      candidate: pool[0],
      provider: 'reddit',
      rank: 0,
      windowSize: 2,
      poolSize: 2,
    });

    const second = selectCandidate(pool, () => 0.6); // 4.2
    expect(second?.candidate.text).toBe('ERROR_DISK_FULL');
    expect(second?.rank).toBe(1);
  });

  it('never leaves the top-K window', () => {
    const pool = Array.from({ length: 12 }, (_, i) => candidate(`error number ${i}`, 0.5 + i * 0.01));
    const random = createSeededRandom(7);
    const ranked = rankByConfidence(pool);
    const window = new Set(ranked.slice(0, 4).map(c => c.text));

    for (let i = 0; i < 500; i++) {
      const result = selectCandidate(pool, random);
      expect(result?.windowSize).toBe(4);
      expect(window.has(result?.candidate.text ?? '')).toBe(true);
    }
    expect(selectCandidate(pool, () => 0.9999)?.rank).toBe(3);
  });

  it('draws the best of three about 4/9 of the time', () => {
    const pool = [candidate('best candidate', 0.9), candidate('second candidate', 0.8), candidate('third candidate', 0.7)];
    const random = createSeededRandom(42);
    const counts = [0, 0, 0];

    for (let i = 0; i < 10_000; i++) {
      const result = selectCandidate(pool, random);
      if (result) counts[result.rank]++;
    }

    expect(counts[0] / 10_000).toBeCloseTo(4 / 9, 1);
    expect(counts[1] / 10_000).toBeCloseTo(3 / 9, 1);
    expect(counts[2] / 10_000).toBeCloseTo(2 / 9, 1);
  });

  it('is reproducible with a scripted source', () => {
    const pool = [candidate('alpha error text', 0.7), candidate('beta error text', 0.9), candidate('gamma error text', 0.8)];
    const picks = [0.1, 0.5, 0.9].map(r => selectCandidate(pool, scripted(r))?.candidate.text);
    expect(picks).toEqual(['beta error text', 'gamma error text', 'alpha error text']);
  });
});

describe('discoverCandidate', () => {
  it('filters then selects', () => {
    const pool = [
      candidate('OUT_OF_MEMORY_0x1', 0.9),
      candidate('DISK_FULL', 0.6),
      candidate('test sample error', 0.95),
    ];

    const result = discoverCandidate(pool, {
      criteria: { minConfidence: 0.5, minTextLength: 10, excludeKeywords: ['test'] },
      random: () => 0.99,
    });

    expect(result.filtered.map(c => c.text)).toEqual(['OUT_OF_MEMORY_0x1']);
    expect(result.rejected).toHaveLength(2);
    expect(result.selection?.candidate.text).toBe('OUT_OF_MEMORY_0x1');
    expect(result.selection?.windowSize).toBe(1);
  });

  it('reports no selection when everything is filtered out', () => {
    const result = discoverCandidate([candidate('test harness failure', 0.9)]);
    expect(result.selection).toBeNull();
    expect(result.rejected[0].reason).toBe('excluded_keyword');
  });
});
