export {
  type ProviderId,
  type ProviderConfig,
  detectProvider,
  remapModelForProvider,
  ProviderConfigError,
  ProviderRegistry,
} from './providers.js';

export {
  type LLMCallOptions,
  type LLMResponse,
  callLLM,
  callLLMWithJsonRetry,
  extractJsonObject,
} from './llm.js';

export {
  type ModelRetryConfig,
  MODEL_RETRY_DEFAULTS,
  ModelTimeoutError,
  AbortError,
  isAbortError,
  isRetryableModelError,
  retryAfterMs,
  retryModelCall,
  sleep,
} from './retry.js';
