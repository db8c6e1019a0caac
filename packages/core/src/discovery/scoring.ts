import type { ProviderName, RawCandidate, ScoredCandidate } from './types.js';
import { defaultRandom, randomUniform, type RandomSource } from './random.js';

// ---------------------------------------------------------------------------
// Scoring tables
// ---------------------------------------------------------------------------

/** A bonus awarded when a metric strictly exceeds `above`. */
export interface MetricTier {
  above: number;
  bonus: number;
}

/**
 * Additive bucketed scoring. For each metric, tiers are ordered from the
 * highest threshold down and only the first tier the value exceeds counts.
 */
export interface EngagementTable {
  kind: 'engagement';
  metrics: Record<string, MetricTier[]>;
}

/** Providers with no measured engagement draw a confidence from a range. */
export interface SyntheticTable {
  kind: 'synthetic';
  min: number;
  max: number;
}

/** Every candidate of the provider gets the same confidence. */
export interface FixedTable {
  kind: 'fixed';
  confidence: number;
}

export type ScoringTable = EngagementTable | SyntheticTable | FixedTable;

export type ScoringTables = Record<ProviderName, ScoringTable>;

export const DEFAULT_SCORING_TABLES: ScoringTables = {
  stackoverflow: {
    kind: 'engagement',
    metrics: {
      score: [
        { above: 10, bonus: 0.3 },
        { above: 5, bonus: 0.2 },
        { above: 0, bonus: 0.1 },
      ],
      view_count: [
        { above: 1000, bonus: 0.2 },
        { above: 500, bonus: 0.1 },
      ],
      answer_count: [
        { above: 2, bonus: 0.3 },
        { above: 0, bonus: 0.2 },
      ],
    },
  },
  reddit: {
    kind: 'engagement',
    metrics: {
      ups: [
        { above: 50, bonus: 0.4 },
        { above: 20, bonus: 0.3 },
        { above: 5, bonus: 0.2 },
      ],
      num_comments: [
        { above: 20, bonus: 0.3 },
        { above: 10, bonus: 0.2 },
        { above: 5, bonus: 0.1 },
      ],
    },
  },
  // Speculative by construction: no measured signal, not reproducible unless
  // a seeded random source is passed in.
  google_trends: { kind: 'synthetic', min: 0.4, max: 0.8 },
  manual: { kind: 'fixed', confidence: 1 },
};

export class ScoringTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScoringTableError';
  }
}

/**
 * Reject tables that would break monotonicity: tiers must descend strictly by
 * threshold and never award more for a lower tier.
 */
export function validateScoringTable(table: ScoringTable): void {
  switch (table.kind) {
    case 'engagement':
      for (const [metric, tiers] of Object.entries(table.metrics)) {
        for (let i = 0; i < tiers.length; i++) {
          const tier = tiers[i];
          if (!Number.isFinite(tier.above) || !Number.isFinite(tier.bonus) || tier.bonus < 0) {
            throw new ScoringTableError(`Metric "${metric}" tier ${i} must have a finite threshold and a non-negative bonus`);
          }
          if (i > 0) {
            const prev = tiers[i - 1];
            if (tier.above >= prev.above) {
              throw new ScoringTableError(`Metric "${metric}" tiers must be ordered by descending threshold`);
            }
            if (tier.bonus > prev.bonus) {
              throw new ScoringTableError(`Metric "${metric}" tier ${i} awards more than a higher tier`);
            }
          }
        }
      }
      return;
    case 'synthetic':
      if (!(table.min >= 0 && table.max <= 1 && table.min <= table.max)) {
        throw new ScoringTableError('Synthetic range must satisfy 0 <= min <= max <= 1');
      }
      return;
    case 'fixed':
      if (!(table.confidence >= 0 && table.confidence <= 1)) {
        throw new ScoringTableError('Fixed confidence must lie in [0, 1]');
      }
      return;
  }
}

/** Merge overrides over the defaults, validating every table that ends up in use. */
export function resolveScoringTables(overrides: Partial<ScoringTables> = {}): ScoringTables {
  const tables: ScoringTables = { ...DEFAULT_SCORING_TABLES, ...overrides };
  for (const table of Object.values(tables)) {
    validateScoringTable(table);
  }
  return tables;
}

// ---------------------------------------------------------------------------
// Scorer
// ---------------------------------------------------------------------------

export interface ScoringOptions {
  /** Per-provider overrides merged over the defaults. */
  tables?: Partial<ScoringTables>;
  random?: RandomSource;
}

/** Missing or NaN metrics count as zero; infinities are kept so larger still scores higher. */
export function metricValue(metrics: Readonly<Record<string, number>>, name: string): number {
  const value = metrics[name];
  return typeof value === 'number' && !Number.isNaN(value) ? value : 0;
}

/** Missing and NaN values become 0; fragments parsed from sources may omit them. */
export function clamp01(value: number | undefined): number {
  if (typeof value !== 'number' || Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Sum the first matching tier bonus of every metric, clamped to [0, 1]. */
export function scoreEngagement(metrics: Readonly<Record<string, number>>, table: EngagementTable): number {
  let total = 0;
  for (const [name, tiers] of Object.entries(table.metrics)) {
    const value = metricValue(metrics, name);
    const tier = tiers.find(t => value > t.above);
    if (tier) total += tier.bonus;
  }
  return roundTo(clamp01(total), 2);
}

/** Score one candidate. An override table for its provider is validated first. */
export function scoreCandidate(raw: RawCandidate, options: ScoringOptions = {}): ScoredCandidate {
  const override = options.tables?.[raw.provider];
  if (override) validateScoringTable(override);
  return scoreWith(raw, override ?? DEFAULT_SCORING_TABLES[raw.provider], options.random ?? defaultRandom);
}

/** Score a whole pool, resolving and validating the tables once. */
export function scorePool(raws: readonly RawCandidate[], options: ScoringOptions = {}): ScoredCandidate[] {
  const tables = resolveScoringTables(options.tables);
  const random = options.random ?? defaultRandom;
  return raws.map(raw => scoreWith(raw, tables[raw.provider], random));
}

function scoreWith(raw: RawCandidate, table: ScoringTable, random: RandomSource): ScoredCandidate {
  let confidence: number;
  switch (table.kind) {
    case 'engagement':
      confidence = scoreEngagement(raw.metrics, table);
      break;
    case 'synthetic':
      confidence = roundTo(clamp01(randomUniform(random, table.min, table.max)), 2);
      break;
    case 'fixed':
      confidence = clamp01(table.confidence);
      break;
  }
  return { ...raw, confidence };
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
