import { describe, it, expect } from 'vitest';
import {
  detectProvider,
  remapModelForProvider,
  ProviderConfigError,
  ProviderRegistry,
} from './providers.js';

describe('detectProvider', () => {
  it('detects providers by model prefix', () => {
    expect(detectProvider('claude-sonnet-4-20250514')).toBe('anthropic');
    expect(detectProvider('gpt-4o-mini')).toBe('openai');
    expect(detectProvider('o3-mini')).toBe('openai');
    expect(detectProvider('gemini-2.5-flash')).toBe('google');
  });

  it('throws for unknown model prefix', () => {
    expect(() => detectProvider('llama-3-70b')).toThrow('Cannot determine provider for model: llama-3-70b');
  });
});

describe('remapModelForProvider', () => {
  it('keeps the model when its provider has a key', () => {
    const config = { providers: { anthropic: { apiKey: 'test-secret' } } };
    expect(remapModelForProvider('claude-opus-4-20250514', config)).toBe('claude-opus-4-20250514');
  });

  it('falls back to the first provider with a key', () => {
    const config = { providers: { google: { apiKey: 'test-secret' }, openai: { apiKey: 'test-secret' } } };
    expect(remapModelForProvider('claude-sonnet-4-20250514', config)).toBe('gpt-4o');
  });

  it('returns unknown models and keyless configs unchanged', () => {
    expect(remapModelForProvider('llama-3', { providers: { openai: { apiKey: 'test-secret' } } })).toBe('llama-3');
    expect(remapModelForProvider('gpt-4o', { providers: {} })).toBe('gpt-4o');
  });
});

describe('ProviderRegistry', () => {
  it('names the config key when the provider key is missing', () => {
    const registry = new ProviderRegistry({ providers: {} });
    expect(() => registry.getModel('gemini-2.5-pro')).toThrow(ProviderConfigError);
    expect(() => registry.getModel('claude-sonnet-4-20250514')).toThrow(
      'Anthropic API key not configured. Set providers.anthropic.api_key in ~/.erratum/config.yaml',
    );
  });

  it('creates models once a key is configured', () => {
    const registry = new ProviderRegistry({ providers: { openai: { apiKey: 'test-secret' } } });
    expect(registry.hasAnyKey()).toBe(true);
    expect(registry.getModel('gpt-4o')).toBeDefined();
    expect(registry.remapModel('claude-sonnet-4-20250514')).toBe('gpt-4o');
  });

  it('reports when no provider is configured', () => {
    expect(new ProviderRegistry({ providers: { anthropic: { apiKey: '' } } }).hasAnyKey()).toBe(false);
  });
});
