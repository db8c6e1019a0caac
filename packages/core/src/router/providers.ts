import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModel } from 'ai';

export type ProviderId = 'anthropic' | 'openai' | 'google';

export interface ProviderConfig {
  providers: Partial<Record<ProviderId, { apiKey?: string }>>;
}

export class ProviderConfigError extends Error {
  constructor(message: string, public readonly provider: ProviderId) {
    super(message);
    this.name = 'ProviderConfigError';
  }
}

type ModelFactory = (modelId: string) => LanguageModel;

interface ProviderSpec {
  label: string;
  /** Model used when the configured model's provider has no key. */
  fallbackModel: string;
  matches: (modelId: string) => boolean;
  create: (apiKey: string) => ModelFactory;
}

const PROVIDERS: Record<ProviderId, ProviderSpec> = {
  anthropic: {
    label: 'Anthropic',
    fallbackModel: 'claude-sonnet-4-20250514',
    matches: id => id.startsWith('claude-'),
    create: apiKey => createAnthropic({ apiKey }),
  },
  openai: {
    label: 'OpenAI',
    fallbackModel: 'gpt-4o',
    matches: id => id.startsWith('gpt-') || /^o\d/.test(id),
    create: apiKey => createOpenAI({ apiKey }),
  },
  google: {
    label: 'Google',
    fallbackModel: 'gemini-2.5-pro',
    matches: id => id.startsWith('gemini-'),
    create: apiKey => createGoogleGenerativeAI({ apiKey }),
  },
};

const PROVIDER_PRIORITY: ProviderId[] = ['anthropic', 'openai', 'google'];

/** Determine which provider a model string belongs to. */
export function detectProvider(modelId: string): ProviderId {
  const match = PROVIDER_PRIORITY.find(id => PROVIDERS[id].matches(modelId));
  if (!match) throw new Error(`Cannot determine provider for model: ${modelId}`);
  return match;
}

/**
 * Keep `modelId` when its provider has a key; otherwise switch to the
 * fallback model of the first provider that does. Unknown models and
 * configurations without any key are returned unchanged.
 */
export function remapModelForProvider(modelId: string, config: ProviderConfig): string {
  const own = PROVIDER_PRIORITY.find(id => PROVIDERS[id].matches(modelId));
  if (!own || config.providers[own]?.apiKey) return modelId;

  const available = PROVIDER_PRIORITY.find(id => config.providers[id]?.apiKey);
  return available ? PROVIDERS[available].fallbackModel : modelId;
}

/**
 * Lazily initialises AI SDK providers and hands out LanguageModel
 * instances by model-id string.
 */
export class ProviderRegistry {
  private readonly factories = new Map<ProviderId, ModelFactory>();

  constructor(private readonly config: ProviderConfig) {}

  remapModel(modelId: string): string {
    return remapModelForProvider(modelId, this.config);
  }

  hasAnyKey(): boolean {
    return PROVIDER_PRIORITY.some(id => Boolean(this.config.providers[id]?.apiKey));
  }

  getModel(modelId: string): LanguageModel {
    const providerId = detectProvider(modelId);
    let factory = this.factories.get(providerId);
    if (!factory) {
      const spec = PROVIDERS[providerId];
      const apiKey = this.config.providers[providerId]?.apiKey;
      if (!apiKey) {
        throw new ProviderConfigError(
          `${spec.label} API key not configured. Set providers.${providerId}.api_key in ~/.erratum/config.yaml`,
          providerId,
        );
      }
      factory = spec.create(apiKey);
      this.factories.set(providerId, factory);
    }
    return factory(modelId);
  }
}
