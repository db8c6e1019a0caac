import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseSeed, randomFor } from './shared.js';
import { manualCandidate } from './generate.js';

describe('parseSeed', () => {
  it('accepts integers only', () => {
    expect(parseSeed('42')).toBe(42);
    expect(() => parseSeed('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseSeed('abc')).toThrow('Seed must be an integer.');
  });
});

describe('randomFor', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = randomFor(7);
    const b = randomFor(7);
    expect([a(), a(), a()]).toEqual([b(), b(), b()]);
  });

  it('falls back to Math.random without a seed', () => {
    expect(randomFor(undefined)).toBe(Math.random);
  });
});

describe('manualCandidate', () => {
  it('trusts operator input fully', () => {
    expect(manualCandidate('  ERROR_ACCESS_DENIED ', new Date('2026-03-02T09:00:00.000Z'))).toEqual({
      text: 'ERROR_ACCESS_DENIED',
      provider: 'manual',
      metrics: {},
      timestamp: '2026-03-02T09:00:00.000Z',
      confidence: 1,
    });
  });

  it('rejects blank text', () => {
    expect(() => manualCandidate('   ')).toThrow(InvalidArgumentError);
  });
});
