export {
  type PlatformTemplate,
  type SystemPromptOptions,
  selectTemplate,
  buildSystemPrompt,
  buildUserPrompt,
} from './prompt.js';

export { optimizeTitle, buildExcerpt, generateSlug, generateTags } from './optimize.js';

export {
  type SynthesisContext,
  type ArticleSynthesizer,
  type SynthesisSettings,
  type LLMArticleSynthesizerOptions,
  type ArticleDraft,
  DEFAULT_SYNTHESIS_SETTINGS,
  SynthesisError,
  LLMArticleSynthesizer,
  parseArticleDraft,
  finalizeArticle,
} from './synthesizer.js';
