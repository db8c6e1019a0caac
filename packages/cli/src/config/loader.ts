import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { parse } from 'yaml';
import { ConfigSchema, ConfigDefaults, type RawConfig, type Config } from './schema.js';

const DEFAULT_CONFIG_PATH = '.erratum/config.yaml';

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

export function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  let envKey: string | undefined;
  if (value.startsWith('env:')) {
    envKey = value.slice(4);
  } else if (value.startsWith('${') && value.endsWith('}')) {
    envKey = value.slice(2, -1);
  } else if (value.startsWith('$')) {
    envKey = value.slice(1);
  }
  if (!envKey) return value;
  const envVal = process.env[envKey];
  return envVal ? envVal : value;
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (obj !== null && typeof obj === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  if (!value) return false;
  return value.startsWith('env:') || value.startsWith('$');
}

/** A configured value, or the environment variable when the value is missing or an unresolved reference. */
function withFallback(value: string | undefined, envKey: string, used: string[]): string | undefined {
  if (value && !isUnresolvedEnvRef(value)) return value;
  const envVal = process.env[envKey];
  if (envVal) {
    used.push(envKey);
    return envVal;
  }
  return undefined;
}

/**
 * Clear unresolved env references and fill secrets and WordPress
 * credentials from their standard environment variables.
 */
function applyEnvVarFallbacks(config: Config): string[] {
  const used: string[] = [];
  const { providers, wordpress } = config;
  const stackoverflow = config.discovery.sources.stackoverflow;

  providers.anthropic.api_key = withFallback(providers.anthropic.api_key, 'ANTHROPIC_API_KEY', used);
  providers.openai.api_key = withFallback(providers.openai.api_key, 'OPENAI_API_KEY', used);
  providers.google.api_key = withFallback(providers.google.api_key, 'GEMINI_API_KEY', used);
  stackoverflow.api_key = withFallback(stackoverflow.api_key, 'STACKEXCHANGE_API_KEY', used);
  wordpress.site_url = withFallback(wordpress.site_url, 'WORDPRESS_URL', used);
  wordpress.username = withFallback(wordpress.username, 'WORDPRESS_USERNAME', used);
  wordpress.app_password = withFallback(wordpress.app_password, 'WORDPRESS_APP_PASSWORD', used);

  return used;
}

function mergeConfig(data: RawConfig): Config {
  const result = structuredClone(ConfigDefaults);
  const { providers, generation, discovery, collection, quality, wordpress } = data;

  if (providers) {
    result.providers = {
      anthropic: { ...result.providers.anthropic, ...providers.anthropic },
      openai: { ...result.providers.openai, ...providers.openai },
      google: { ...result.providers.google, ...providers.google },
    };
  }
  if (generation) {
    result.generation = { ...result.generation, ...generation };
  }
  if (discovery) {
    const { sources, ...rest } = discovery;
    const defaults = result.discovery.sources;
    result.discovery = {
      ...result.discovery,
      ...rest,
      sources: {
        stackoverflow: { ...defaults.stackoverflow, ...sources?.stackoverflow },
        reddit: { ...defaults.reddit, ...sources?.reddit },
        google_trends: { ...defaults.google_trends, ...sources?.google_trends },
      },
    };
  }
  if (collection) {
    const { sources, ...rest } = collection;
    const defaults = result.collection.sources;
    result.collection = {
      ...result.collection,
      ...rest,
      sources: {
        stackexchange: { ...defaults.stackexchange, ...sources?.stackexchange },
        microsoft_learn: { ...defaults.microsoft_learn, ...sources?.microsoft_learn },
      },
    };
  }
  if (quality) {
    result.quality = { ...result.quality, ...quality };
  }
  if (wordpress) {
    result.wordpress = { ...result.wordpress, ...wordpress };
  }
  if (data.history_file) {
    result.history_file = data.history_file;
  }
  if (data.output_dir) {
    result.output_dir = data.output_dir;
  }
  return result;
}

function readRawConfig(configPath: string): unknown {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }
  try {
    return parse(fileContent);
  } catch {
    throw new ConfigError(`Failed to parse config file: ${configPath}`);
  }
}

export interface LoadConfigResult {
  config: Config;
  configPath: string;
  configFileExists: boolean;
  /** Environment variables that supplied a value the file did not. */
  envKeysUsed: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);

  let result = structuredClone(ConfigDefaults);

  if (configFileExists) {
    const rawConfig = readRawConfig(configPath);
    if (rawConfig !== null && rawConfig !== undefined) {
      const validated = ConfigSchema.safeParse(resolveEnvVarsInObject(stripNullValues(rawConfig)));
      if (!validated.success) {
        const issues = validated.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
        throw new ConfigError(`Invalid config: ${issues}`);
      }
      result = mergeConfig(validated.data);
    }
  }

  const envKeysUsed = applyEnvVarFallbacks(result);
  result.history_file = expandTilde(result.history_file);
  if (result.output_dir) {
    result.output_dir = expandTilde(result.output_dir);
  }

  return { config: result, configPath, configFileExists, envKeysUsed };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

const SECRET_KEYS = new Set(['api_key', 'app_password']);

function maskSecret(value: string): string {
  return value.length <= 8 ? '****' : `${value.slice(0, 4)}****`;
}

/** Copy of `value` with every `api_key` and `app_password` masked. */
export function maskSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(maskSecrets);
  }
  if (value !== null && typeof value === 'object') {
    const masked: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      masked[key] = SECRET_KEYS.has(key) && typeof entry === 'string' ? maskSecret(entry) : maskSecrets(entry);
    }
    return masked;
  }
  return value;
}
