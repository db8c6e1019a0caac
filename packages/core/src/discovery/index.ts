export {
  type ProviderName,
  type RawCandidate,
  type ScoredCandidate,
  type CandidatePool,
  type RejectionReason,
  type RejectedCandidate,
  type FilterResult,
  type FilterCriteria,
  type AlreadyProcessed,
  type SelectionResult,
  type DiscoveryResult,
} from './types.js';

export {
  type MetricTier,
  type EngagementTable,
  type SyntheticTable,
  type FixedTable,
  type ScoringTable,
  type ScoringTables,
  type ScoringOptions,
  DEFAULT_SCORING_TABLES,
  ScoringTableError,
  validateScoringTable,
  resolveScoringTables,
  metricValue,
  clamp01,
  scoreEngagement,
  scoreCandidate,
  scorePool,
} from './scoring.js';

export {
  DEFAULT_FILTER_CRITERIA,
  normalizeCandidateText,
  rejectionReason,
  filterCandidates,
} from './filter.js';

export {
  type DiscoverOptions,
  selectionWindowSize,
  selectionWeight,
  rankByConfidence,
  weightedIndex,
  selectCandidate,
  discoverCandidate,
} from './selector.js';

export {
  type RandomSource,
  defaultRandom,
  createSeededRandom,
  randomInt,
  randomUniform,
  shuffle,
  sample,
} from './random.js';
