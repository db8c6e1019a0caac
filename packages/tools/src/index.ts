export { fetchWithRetry, isRetryableStatus, HttpError, type FetchRetryConfig } from './retry.js';
export { getJson, parseJson, withParams, ResponseShapeError, USER_AGENT, type GetJsonOptions } from './http.js';
export { extractSteps, extractSnippet, decodeEntities } from './html.js';

export {
  STACKEXCHANGE_API,
  searchQuestions,
  fetchAnswers,
  extractErrorText,
  type Question,
  type Answer,
  type Page,
  type QuestionQuery,
  type StackExchangeRequest,
} from './stackexchange/client.js';
export {
  StackExchangeAdapter,
  DEFAULT_QUESTION_TAGS,
  DEFAULT_ERROR_KEYWORDS,
  type StackExchangeAdapterOptions,
} from './stackexchange/adapter.js';
export {
  StackExchangeCollector,
  answerReliability,
  isUsableAnswer,
  answerToSolution,
  questionToCitation,
  type StackExchangeCollectorOptions,
} from './stackexchange/collector.js';

export {
  REDDIT_BASE,
  searchSubreddit,
  isErrorRelated,
  extractPostError,
  type RedditPost,
  type SubredditSearch,
} from './reddit/client.js';
export { RedditAdapter, DEFAULT_SUBREDDITS, DEFAULT_SEARCH_TERMS, type RedditAdapterOptions } from './reddit/adapter.js';

export {
  TrendCatalogSchema,
  loadDefaultTrendCatalog,
  seasonalWeight,
  type TrendCatalog,
  type TrendCategory,
} from './trends/catalog.js';
export { TrendCatalogAdapter, type TrendCatalogAdapterOptions } from './trends/adapter.js';

export { LearnCollector, LEARN_SEARCH_URL, type LearnCollectorOptions } from './learn/collector.js';

export { WordPressClient, WordPressError, type WordPressCredentials, type WordPressRequest } from './wordpress/client.js';
export {
  WordPressPublisher,
  tagSlug,
  buildPostBody,
  type WordPressSettings,
  type PostStatus,
  type DiscussionStatus,
} from './wordpress/publisher.js';
