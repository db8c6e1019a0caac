import { describe, it, expect } from 'vitest';
import { WordPressPublisher } from '@erratum/tools';
import { ConfigDefaults, ConfigError, type Config } from './config/index.js';
import {
  assertModelConfigured,
  buildAdapters,
  buildCollectors,
  buildPublisher,
  filterCriteria,
  hasWordPressCredentials,
  qualityThresholds,
} from './factory.js';

function configWith(patch: (config: Config) => void): Config {
  const config = structuredClone(ConfigDefaults);
  patch(config);
  return config;
}

describe('pipeline factory', () => {
  it('builds every source in query order by default', () => {
    expect(buildAdapters(ConfigDefaults).map(a => a.name)).toEqual(['stackoverflow', 'reddit', 'google_trends']);
    expect(buildCollectors(ConfigDefaults).map(c => c.name)).toEqual(['stackexchange', 'microsoft-learn']);
  });

  it('leaves out disabled sources', () => {
    const config = configWith(c => {
      c.discovery.sources.reddit.enabled = false;
      c.collection.sources.stackexchange.enabled = false;
    });

    expect(buildAdapters(config).map(a => a.name)).toEqual(['stackoverflow', 'google_trends']);
    expect(buildCollectors(config).map(c => c.name)).toEqual(['microsoft-learn']);
  });

  it('maps the discovery and quality sections onto engine settings', () => {
    const config = configWith(c => {
      c.discovery.min_confidence = 0.7;
      c.discovery.exclude_keywords = ['demo'];
      c.quality.min_overall_score = 60;
      c.quality.validate_links = true;
      c.quality.duplicate_phrases = ['解決方法'];
    });

    expect(filterCriteria(config)).toEqual({ minConfidence: 0.7, minTextLength: 10, excludeKeywords: ['demo'] });
    expect(qualityThresholds(config)).toMatchObject({
      minWordCount: 3000,
      maxWordCount: 5000,
      minOverallScore: 60,
      validateLinks: true,
      duplicatePhrases: ['解決方法'],
    });
  });

  it('leaves the optional quality checks off by default', () => {
    expect(qualityThresholds(ConfigDefaults)).toMatchObject({ validateLinks: false, duplicatePhrases: [] });
  });

  it('publishes only with complete WordPress credentials', () => {
    const partial = configWith(c => {
      c.wordpress.site_url = 'https://blog.invalid';
      c.wordpress.username = 'editor';
    });
    const complete = configWith(c => {
      c.wordpress.site_url = 'https://blog.invalid';
      c.wordpress.username = 'editor';
      c.wordpress.app_password = 'test-secret';
    });

    expect(hasWordPressCredentials(partial)).toBe(false);
    expect(buildPublisher(partial)).toBeUndefined();
    expect(hasWordPressCredentials(complete)).toBe(true);
    expect(buildPublisher(complete)).toBeInstanceOf(WordPressPublisher);
  });

  it('requires at least one model key', () => {
    expect(() => assertModelConfigured(ConfigDefaults)).toThrow(ConfigError);
    const config = configWith(c => {
      c.providers.openai.api_key = 'test-openai';
    });
    expect(() => assertModelConfigured(config)).not.toThrow();
  });
});
