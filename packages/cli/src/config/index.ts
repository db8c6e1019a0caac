export { ConfigSchema, ConfigDefaults, type RawConfig, type Config, type ProviderKey, type PostStatus, type DiscussionStatus } from './schema.js';
export { loadConfig, loadConfigWithMeta, getConfigPath, expandTilde, maskSecrets, type LoadConfigOptions, type LoadConfigResult, ConfigError } from './loader.js';
