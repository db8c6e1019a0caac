import { EventEmitter } from 'eventemitter3';
import { defaultRandom, type RandomSource } from '../discovery/random.js';
import { resolveScoringTables, scorePool, type ScoringTables } from '../discovery/scoring.js';
import { discoverCandidate } from '../discovery/selector.js';
import type {
  CandidatePool,
  DiscoveryResult,
  FilterCriteria,
  RawCandidate,
  RejectedCandidate,
  ScoredCandidate,
  SelectionResult,
} from '../discovery/types.js';
import { aggregateSolutions } from '../aggregation/aggregator.js';
import type { AggregatedBundle, AggregationLimits, SolutionFragment, SourceCitation } from '../aggregation/types.js';
import { evaluateArticle } from '../quality/gate.js';
import type { Article, QualityReport, QualityThresholds } from '../quality/types.js';
import type { ArticleSynthesizer } from '../synthesis/synthesizer.js';
import type { HistoryLedger } from '../history/ledger.js';
import { archiveArticle, recordPublish } from '../archive/writer.js';
import { isAbortError, sleep } from '../router/retry.js';
import type { Publisher, PublishResult, SolutionCollector, SourceAdapter, SourceContext } from './types.js';

// ---------------------------------------------------------------------------
// Run event types
// ---------------------------------------------------------------------------

export type RunStage = 'discover' | 'collect' | 'synthesize' | 'evaluate' | 'archive' | 'publish' | 'record';

export type RunStatus =
  | 'no_candidate'
  | 'collection_failed'
  | 'synthesis_failed'
  | 'quality_rejected'
  | 'publish_failed'
  | 'published'
  | 'completed';

export interface StageStartEvent {
  stage: RunStage;
}

export interface StageCompleteEvent {
  stage: RunStage;
  durationMs: number;
}

export interface StageErrorEvent {
  stage: RunStage;
  error: Error;
}

export interface SourceCompleteEvent {
  name: string;
  count: number;
  durationMs: number;
}

export interface SourceErrorEvent {
  name: string;
  error: Error;
}

export interface DiscoveryOutcome extends DiscoveryResult {
  /** Every scored candidate, before filtering. */
  pool: CandidatePool;
}

export interface RunResult {
  status: RunStatus;
  discovery?: DiscoveryOutcome;
  candidate?: ScoredCandidate;
  bundle?: AggregatedBundle;
  article?: Article;
  report?: QualityReport;
  publish?: PublishResult;
  archiveDir?: string;
  error?: Error;
  durationMs: number;
}

export interface RunEvents {
  'stage:start': (event: StageStartEvent) => void;
  'stage:complete': (event: StageCompleteEvent) => void;
  'stage:error': (event: StageErrorEvent) => void;
  'adapter:complete': (event: SourceCompleteEvent) => void;
  'adapter:error': (event: SourceErrorEvent) => void;
  'collector:complete': (event: SourceCompleteEvent) => void;
  'collector:error': (event: SourceErrorEvent) => void;
  'candidate:rejected': (event: RejectedCandidate) => void;
  'candidate:selected': (event: SelectionResult) => void;
  'quality:complete': (event: QualityReport) => void;
  'run:complete': (event: RunResult) => void;
}

// ---------------------------------------------------------------------------
// Run options
// ---------------------------------------------------------------------------

export interface RunPipelineOptions {
  adapters: SourceAdapter[];
  collectors: SolutionCollector[];
  synthesizer: ArticleSynthesizer;
  /** Without a publisher an accepted article ends the run as `completed`. */
  publisher?: Publisher;
  history?: HistoryLedger;
  scoringTables?: Partial<ScoringTables>;
  criteria?: FilterCriteria;
  limits?: AggregationLimits;
  thresholds?: QualityThresholds;
  /** Publish even when the quality gate fails. */
  allowLowQuality?: boolean;
  /** Pause between consecutive adapters (default 1000). */
  adapterDelayMs?: number;
  /** Write accepted and rejected articles to numbered directories here. */
  archiveDir?: string;
  random?: RandomSource;
  abortSignal?: AbortSignal;
  now?: () => Date;
}

const DEFAULT_ADAPTER_DELAY_MS = 1000;

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ---------------------------------------------------------------------------
// Run pipeline
// ---------------------------------------------------------------------------

/**
 * One discover → collect → synthesize → evaluate → publish cycle.
 *
 * Collaborator failures become `*:error` events and a terminal status;
 * only aborts propagate to the caller.
 */
export class RunPipeline extends EventEmitter<RunEvents> {
  private readonly random: RandomSource;
  private readonly now: () => Date;
  private readonly scoringTables: ScoringTables;

  /** @throws ScoringTableError when an override table breaks monotonicity. */
  constructor(private readonly options: RunPipelineOptions) {
    super();
    this.scoringTables = resolveScoringTables(options.scoringTables);
    this.random = options.random ?? defaultRandom;
    this.now = options.now ?? (() => new Date());
  }

  private get context(): SourceContext {
    return { abortSignal: this.options.abortSignal, random: this.random };
  }

  async run(): Promise<RunResult> {
    const started = Date.now();
    const discovery = await this.discover();
    if (!discovery.selection) {
      return this.finish({ status: 'no_candidate', discovery, durationMs: 0 }, started);
    }
    const result = await this.process(discovery.selection.candidate);
    return this.finish({ ...result, discovery }, started);
  }

  /** Run everything after discovery for a given candidate. */
  async runFor(candidate: ScoredCandidate): Promise<RunResult> {
    const started = Date.now();
    return this.finish(await this.process(candidate), started);
  }

  async discover(): Promise<DiscoveryOutcome> {
    const { adapters, history, criteria, abortSignal } = this.options;
    const delayMs = this.options.adapterDelayMs ?? DEFAULT_ADAPTER_DELAY_MS;
    const stageStart = this.startStage('discover');

    const raw: RawCandidate[] = [];
    for (const [i, adapter] of adapters.entries()) {
      const adapterStart = Date.now();
      try {
        const found = await adapter.discover(this.context);
        raw.push(...found);
        this.emit('adapter:complete', { name: adapter.name, count: found.length, durationMs: Date.now() - adapterStart });
      } catch (err) {
        if (isAbortError(err)) throw err;
        this.emit('adapter:error', { name: adapter.name, error: toError(err) });
      }
      if (i < adapters.length - 1 && delayMs > 0) {
        await sleep(delayMs, abortSignal);
      }
    }

    const pool = scorePool(raw, { tables: this.scoringTables, random: this.random });
    const result = discoverCandidate(pool, {
      criteria,
      alreadyProcessed: history ? text => history.has(text) : undefined,
      random: this.random,
    });

    for (const rejected of result.rejected) {
      this.emit('candidate:rejected', rejected);
    }
    if (result.selection) {
      this.emit('candidate:selected', result.selection);
    }

    this.completeStage('discover', stageStart);
    return { ...result, pool };
  }

  private async process(candidate: ScoredCandidate): Promise<RunResult> {
    const { solutions, citations } = await this.collect(candidate.text);
    if (solutions.length === 0 && citations.length === 0) {
      const error = new Error(`No solutions or citations found for "${candidate.text}"`);
      this.emit('stage:error', { stage: 'collect', error });
      return { status: 'collection_failed', candidate, error, durationMs: 0 };
    }

    const bundle = aggregateSolutions(candidate, solutions, citations, this.options.limits);

    let article: Article;
    const synthStart = this.startStage('synthesize');
    try {
      article = await this.options.synthesizer.synthesize(bundle, { abortSignal: this.options.abortSignal });
      this.completeStage('synthesize', synthStart);
    } catch (err) {
      if (isAbortError(err)) throw err;
      const error = toError(err);
      this.emit('stage:error', { stage: 'synthesize', error });
      return { status: 'synthesis_failed', candidate, bundle, error, durationMs: 0 };
    }

    const evalStart = this.startStage('evaluate');
    const report = evaluateArticle(article, this.options.thresholds);
    this.emit('quality:complete', report);
    this.completeStage('evaluate', evalStart);

    const archiveDir = this.archive(article, report, candidate);
    const base = { candidate, bundle, article, report, archiveDir, durationMs: 0 };

    if (!report.passed && !this.options.allowLowQuality) {
      return { ...base, status: 'quality_rejected' };
    }

    const { publisher } = this.options;
    if (!publisher) {
      this.remember(candidate, article);
      return { ...base, status: 'completed' };
    }

    const publishStart = this.startStage('publish');
    let publish: PublishResult;
    try {
      publish = await publisher.publish(article, report, { abortSignal: this.options.abortSignal });
      this.completeStage('publish', publishStart);
    } catch (err) {
      if (isAbortError(err)) throw err;
      const error = toError(err);
      this.emit('stage:error', { stage: 'publish', error });
      return { ...base, status: 'publish_failed', error };
    }

    // The post is live from here on; bookkeeping failures do not change the status.
    this.remember(candidate, article, publish.url);
    if (archiveDir) {
      try {
        recordPublish(archiveDir, publish);
      } catch (err) {
        this.emit('stage:error', { stage: 'archive', error: toError(err) });
      }
    }
    return { ...base, status: 'published', publish };
  }

  private async collect(errorText: string): Promise<{ solutions: SolutionFragment[]; citations: SourceCitation[] }> {
    const stageStart = this.startStage('collect');
    const solutions: SolutionFragment[] = [];
    const citations: SourceCitation[] = [];

    for (const collector of this.options.collectors) {
      const collectorStart = Date.now();
      try {
        const found = await collector.collect(errorText, this.context);
        solutions.push(...found.solutions);
        citations.push(...found.citations);
        this.emit('collector:complete', {
          name: collector.name,
          count: found.solutions.length + found.citations.length,
          durationMs: Date.now() - collectorStart,
        });
      } catch (err) {
        if (isAbortError(err)) throw err;
        this.emit('collector:error', { name: collector.name, error: toError(err) });
      }
    }

    this.completeStage('collect', stageStart);
    return { solutions, citations };
  }

  private archive(article: Article, report: QualityReport, candidate: ScoredCandidate): string | undefined {
    const { archiveDir } = this.options;
    if (!archiveDir) return undefined;
    const stageStart = this.startStage('archive');
    try {
      const result = archiveArticle({ outputDir: archiveDir, article, report, candidate, now: this.now() });
      this.completeStage('archive', stageStart);
      return result.directory;
    } catch (err) {
      this.emit('stage:error', { stage: 'archive', error: toError(err) });
      return undefined;
    }
  }

  private remember(candidate: ScoredCandidate, article: Article, url?: string): void {
    try {
      this.options.history?.record({
        text: candidate.text,
        title: article.title,
        url,
        processedAt: this.now().toISOString(),
      });
    } catch (err) {
      this.emit('stage:error', { stage: 'record', error: toError(err) });
    }
  }

  private startStage(stage: RunStage): number {
    this.emit('stage:start', { stage });
    return Date.now();
  }

  private completeStage(stage: RunStage, startedAt: number): void {
    this.emit('stage:complete', { stage, durationMs: Date.now() - startedAt });
  }

  private finish(result: RunResult, startedAt: number): RunResult {
    const complete = { ...result, durationMs: Date.now() - startedAt };
    this.emit('run:complete', complete);
    return complete;
  }
}
