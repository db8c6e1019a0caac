export {
  type CitationType,
  type SolutionFragment,
  type SourceCitation,
  type BundleSummary,
  type AggregatedBundle,
  type AggregationLimits,
} from './types.js';

export {
  DEFAULT_AGGREGATION_LIMITS,
  aggregateSolutions,
  rankSolutions,
  dedupeCitations,
} from './aggregator.js';
