import {
  DEFAULT_QUALITY_THRESHOLDS,
  FileHistory,
  LLMArticleSynthesizer,
  ProviderRegistry,
  RunPipeline,
  type AggregationLimits,
  type ArticleSynthesizer,
  type FilterCriteria,
  type Publisher,
  type QualityThresholds,
  type RandomSource,
  type SolutionCollector,
  type SourceAdapter,
} from '@erratum/core';
import {
  LearnCollector,
  RedditAdapter,
  StackExchangeAdapter,
  StackExchangeCollector,
  TrendCatalogAdapter,
  WordPressPublisher,
} from '@erratum/tools';
import { ConfigError, type Config } from './config/index.js';

export function filterCriteria(config: Config): FilterCriteria {
  const { min_confidence, min_text_length, exclude_keywords } = config.discovery;
  return { minConfidence: min_confidence, minTextLength: min_text_length, excludeKeywords: exclude_keywords };
}

export function aggregationLimits(config: Config): AggregationLimits {
  return { maxSolutions: config.collection.max_solutions, maxCitations: config.collection.max_citations };
}

export function qualityThresholds(config: Config): QualityThresholds {
  const { min_word_count, max_word_count, min_overall_score, validate_links, duplicate_phrases } = config.quality;
  return {
    ...DEFAULT_QUALITY_THRESHOLDS,
    minWordCount: min_word_count,
    maxWordCount: max_word_count,
    minOverallScore: min_overall_score,
    validateLinks: validate_links,
    duplicatePhrases: duplicate_phrases,
  };
}

/** Enabled signal sources, in the order they are queried. */
export function buildAdapters(config: Config): SourceAdapter[] {
  const { stackoverflow, reddit, google_trends } = config.discovery.sources;
  const adapters: SourceAdapter[] = [];
  if (stackoverflow.enabled) {
    adapters.push(new StackExchangeAdapter({
      apiKey: stackoverflow.api_key,
      tags: stackoverflow.tags,
      keywords: stackoverflow.keywords,
      minScore: stackoverflow.min_score,
    }));
  }
  if (reddit.enabled) {
    adapters.push(new RedditAdapter({
      subreddits: reddit.subreddits,
      minUpvotes: reddit.min_upvotes,
      maxSubreddits: reddit.max_subreddits,
    }));
  }
  if (google_trends.enabled) {
    adapters.push(new TrendCatalogAdapter({ maxCandidates: google_trends.max_candidates }));
  }
  return adapters;
}

export function buildCollectors(config: Config): SolutionCollector[] {
  const { stackexchange, microsoft_learn } = config.collection.sources;
  const collectors: SolutionCollector[] = [];
  if (stackexchange.enabled) {
    collectors.push(new StackExchangeCollector({ apiKey: config.discovery.sources.stackoverflow.api_key }));
  }
  if (microsoft_learn.enabled) {
    collectors.push(new LearnCollector({ locale: microsoft_learn.locale }));
  }
  return collectors;
}

export function hasWordPressCredentials(config: Config): boolean {
  const { site_url, username, app_password } = config.wordpress;
  return Boolean(site_url && username && app_password);
}

/** A WordPress publisher, or undefined while any credential is missing. */
export function buildPublisher(config: Config): Publisher | undefined {
  const { site_url, username, app_password } = config.wordpress;
  if (!site_url || !username || !app_password) return undefined;
  return new WordPressPublisher({
    siteUrl: site_url,
    username,
    appPassword: app_password,
    defaultCategoryId: config.wordpress.default_category_id,
    status: config.wordpress.status,
    commentStatus: config.wordpress.comment_status,
    pingStatus: config.wordpress.ping_status,
  });
}

export function createProviderRegistry(config: Config): ProviderRegistry {
  return new ProviderRegistry({
    providers: {
      anthropic: { apiKey: config.providers.anthropic.api_key },
      openai: { apiKey: config.providers.openai.api_key },
      google: { apiKey: config.providers.google.api_key },
    },
  });
}

/** Resolve the configured model once, on the first article. */
export function createSynthesizer(config: Config, registry = createProviderRegistry(config)): ArticleSynthesizer {
  const { model, max_tokens, temperature, target_length } = config.generation;
  let synthesizer: LLMArticleSynthesizer | undefined;
  return {
    async synthesize(bundle, ctx) {
      synthesizer ??= new LLMArticleSynthesizer({
        model: registry.getModel(registry.remapModel(model)),
        settings: {
          minLength: target_length.min,
          maxLength: target_length.max,
          maxOutputTokens: max_tokens,
          temperature,
        },
      });
      return synthesizer.synthesize(bundle, ctx);
    },
  };
}

export function assertModelConfigured(config: Config): void {
  if (!createProviderRegistry(config).hasAnyKey()) {
    throw new ConfigError(
      'No language model API key configured. Set providers.<name>.api_key or ANTHROPIC_API_KEY, OPENAI_API_KEY or GEMINI_API_KEY.',
    );
  }
}

export interface CreatePipelineOptions {
  /** Attach the WordPress publisher when credentials are present. */
  publish: boolean;
  random: RandomSource;
  abortSignal?: AbortSignal;
}

export function createRunPipeline(config: Config, options: CreatePipelineOptions): RunPipeline {
  return new RunPipeline({
    adapters: buildAdapters(config),
    collectors: buildCollectors(config),
    synthesizer: createSynthesizer(config),
    publisher: options.publish ? buildPublisher(config) : undefined,
    history: new FileHistory(config.history_file),
    criteria: filterCriteria(config),
    limits: aggregationLimits(config),
    thresholds: qualityThresholds(config),
    allowLowQuality: config.quality.allow_low_quality,
    adapterDelayMs: config.discovery.adapter_delay_ms,
    archiveDir: config.output_dir,
    random: options.random,
    abortSignal: options.abortSignal,
  });
}
