import { z } from 'zod';

const envVarPattern = /^(env:|\\?\$\{?)/;

const envVarSchema = z.string().refine(
  (val) => envVarPattern.test(val),
  { message: 'Must start with env:, $, or ${' }
).brand('envVar');

export type EnvVar = z.infer<typeof envVarSchema>;

const secretSchema = z.union([
  envVarSchema,
  z.string().min(1),
]);

const providerConfigSchema = z.object({
  api_key: secretSchema.optional(),
}).strict();

const providersSchema = z.object({
  anthropic: providerConfigSchema.optional(),
  openai: providerConfigSchema.optional(),
  google: providerConfigSchema.optional(),
}).strict();

const generationSchema = z.object({
  model: z.string().min(1).optional(),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  target_length: z.object({
    min: z.number().int().positive(),
    max: z.number().int().positive(),
  }).strict().refine(len => len.min <= len.max, { message: 'min must not exceed max' }).optional(),
}).strict();

const stackOverflowSourceSchema = z.object({
  enabled: z.boolean().optional(),
  api_key: secretSchema.optional(),
  tags: z.array(z.string().min(1)).optional(),
  keywords: z.array(z.string().min(1)).optional(),
  min_score: z.number().int().optional(),
}).strict();

const redditSourceSchema = z.object({
  enabled: z.boolean().optional(),
  subreddits: z.array(z.string().min(1)).optional(),
  min_upvotes: z.number().int().min(0).optional(),
  max_subreddits: z.number().int().positive().optional(),
}).strict();

const trendsSourceSchema = z.object({
  enabled: z.boolean().optional(),
  max_candidates: z.number().int().positive().optional(),
}).strict();

const discoverySchema = z.object({
  adapter_delay_ms: z.number().int().min(0).optional(),
  min_confidence: z.number().min(0).max(1).optional(),
  min_text_length: z.number().int().min(0).optional(),
  exclude_keywords: z.array(z.string()).optional(),
  sources: z.object({
    stackoverflow: stackOverflowSourceSchema.optional(),
    reddit: redditSourceSchema.optional(),
    google_trends: trendsSourceSchema.optional(),
  }).strict().optional(),
}).strict();

const collectionSchema = z.object({
  max_solutions: z.number().int().positive().optional(),
  max_citations: z.number().int().positive().optional(),
  sources: z.object({
    stackexchange: z.object({ enabled: z.boolean().optional() }).strict().optional(),
    microsoft_learn: z.object({
      enabled: z.boolean().optional(),
      locale: z.string().min(1).optional(),
    }).strict().optional(),
  }).strict().optional(),
}).strict();

const qualitySchema = z.object({
  min_word_count: z.number().int().min(0).optional(),
  max_word_count: z.number().int().positive().optional(),
  min_overall_score: z.number().min(0).max(100).optional(),
  allow_low_quality: z.boolean().optional(),
  validate_links: z.boolean().optional(),
  duplicate_phrases: z.array(z.string().min(1)).optional(),
}).strict();

const postStatusSchema = z.enum(['publish', 'draft', 'pending', 'private']);
const discussionStatusSchema = z.enum(['open', 'closed']);

const wordpressSchema = z.object({
  site_url: z.string().optional(),
  username: z.string().optional(),
  app_password: secretSchema.optional(),
  default_category_id: z.number().int().positive().optional(),
  status: postStatusSchema.optional(),
  comment_status: discussionStatusSchema.optional(),
  ping_status: discussionStatusSchema.optional(),
}).strict();

const ConfigSchema = z.object({
  providers: providersSchema.optional(),
  generation: generationSchema.optional(),
  discovery: discoverySchema.optional(),
  collection: collectionSchema.optional(),
  quality: qualitySchema.optional(),
  wordpress: wordpressSchema.optional(),
  history_file: z.string().min(1).optional(),
  output_dir: z.string().min(1).optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export type ProviderKey = 'anthropic' | 'openai' | 'google';
export type PostStatus = z.infer<typeof postStatusSchema>;
export type DiscussionStatus = z.infer<typeof discussionStatusSchema>;

export interface ResolvedProviderConfig {
  api_key?: string;
}

export interface Config {
  providers: Record<ProviderKey, ResolvedProviderConfig>;
  generation: {
    model: string;
    max_tokens: number;
    temperature: number;
    target_length: { min: number; max: number };
  };
  discovery: {
    adapter_delay_ms: number;
    min_confidence: number;
    min_text_length: number;
    exclude_keywords: string[];
    sources: {
      stackoverflow: {
        enabled: boolean;
        api_key?: string;
        tags?: string[];
        keywords?: string[];
        min_score?: number;
      };
      reddit: {
        enabled: boolean;
        subreddits?: string[];
        min_upvotes?: number;
        max_subreddits?: number;
      };
      google_trends: {
        enabled: boolean;
        max_candidates?: number;
      };
    };
  };
  collection: {
    max_solutions: number;
    max_citations: number;
    sources: {
      stackexchange: { enabled: boolean };
      microsoft_learn: { enabled: boolean; locale?: string };
    };
  };
  quality: {
    min_word_count: number;
    max_word_count: number;
    min_overall_score: number;
    allow_low_quality: boolean;
    validate_links: boolean;
    /** Flag titles that repeat any of these phrases. */
    duplicate_phrases: string[];
  };
  wordpress: {
    site_url?: string;
    username?: string;
    app_password?: string;
    default_category_id: number;
    status: PostStatus;
    comment_status: DiscussionStatus;
    ping_status: DiscussionStatus;
  };
  history_file: string;
  /** Article archive root; archiving is off when unset. */
  output_dir?: string;
}

export const ConfigDefaults: Config = {
  providers: {
    anthropic: {},
    openai: {},
    google: {},
  },
  generation: {
    model: 'claude-sonnet-4-20250514',
    max_tokens: 6000,
    temperature: 0.7,
    target_length: { min: 3000, max: 5000 },
  },
  discovery: {
    adapter_delay_ms: 1000,
    min_confidence: 0.5,
    min_text_length: 10,
    exclude_keywords: ['test', 'sample', 'example', 'dummy'],
    sources: {
      stackoverflow: { enabled: true },
      reddit: { enabled: true },
      google_trends: { enabled: true },
    },
  },
  collection: {
    max_solutions: 10,
    max_citations: 15,
    sources: {
      stackexchange: { enabled: true },
      microsoft_learn: { enabled: true },
    },
  },
  quality: {
    min_word_count: 3000,
    max_word_count: 5000,
    min_overall_score: 70,
    allow_low_quality: false,
    validate_links: false,
    duplicate_phrases: [],
  },
  wordpress: {
    default_category_id: 1,
    status: 'publish',
    comment_status: 'open',
    ping_status: 'open',
  },
  history_file: '~/.erratum/history.json',
};

export { ConfigSchema };
