export {
  type SourceContext,
  type SourceAdapter,
  type CollectedSolutions,
  type SolutionCollector,
  type PublishResult,
  type PublishContext,
  type Publisher,
} from './types.js';

export {
  type RunStage,
  type RunStatus,
  type StageStartEvent,
  type StageCompleteEvent,
  type StageErrorEvent,
  type SourceCompleteEvent,
  type SourceErrorEvent,
  type DiscoveryOutcome,
  type RunResult,
  type RunEvents,
  type RunPipelineOptions,
  RunPipeline,
} from './engine.js';
