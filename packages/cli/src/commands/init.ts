import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, resolve } from 'path';

export interface InitCommandOptions {
  configPath?: string;
  homeDir?: string;
  logger?: (...args: unknown[]) => void;
}

export interface InitResult {
  configPath: string;
  created: boolean;
}

function expandTilde(pathValue: string, homeDirectory: string): string {
  if (pathValue === '~') {
    return homeDirectory;
  }
  if (pathValue.startsWith('~/')) {
    return resolve(homeDirectory, pathValue.slice(2));
  }
  return pathValue;
}

function resolveConfigPath(configPath: string | undefined, homeDirectory: string): string {
  if (configPath) {
    return expandTilde(configPath, homeDirectory);
  }
  return resolve(homeDirectory, '.erratum', 'config.yaml');
}

export const CONFIG_TEMPLATE = `# erratum configuration
# Values of the form env:NAME, $NAME or \${NAME} are read from the environment.

# Language model providers. Keys also fall back to ANTHROPIC_API_KEY,
# OPENAI_API_KEY and GEMINI_API_KEY.
providers:
  anthropic:
    api_key: env:ANTHROPIC_API_KEY
  # openai:
  #   api_key: env:OPENAI_API_KEY
  # google:
  #   api_key: env:GEMINI_API_KEY

generation:
  model: claude-sonnet-4-20250514   # claude-*, gpt-*, o*, gemini-*
  max_tokens: 6000
  temperature: 0.7
  target_length:                    # article body, in characters
    min: 3000
    max: 5000

discovery:
  adapter_delay_ms: 1000            # pause between signal sources
  min_confidence: 0.5
  min_text_length: 10
  exclude_keywords: [test, sample, example, dummy]
  sources:
    stackoverflow:
      enabled: true
      # api_key: env:STACKEXCHANGE_API_KEY
    reddit:
      enabled: true
      # subreddits: [techsupport, sysadmin]
    google_trends:
      enabled: true

collection:
  max_solutions: 10
  max_citations: 15
  sources:
    stackexchange:
      enabled: true
    microsoft_learn:
      enabled: true
      # locale: en-us

quality:
  min_word_count: 3000
  max_word_count: 5000
  min_overall_score: 70
  allow_low_quality: false
  validate_links: false             # flag Markdown links without scheme and host
  duplicate_phrases: []             # e.g. [解決方法]: flag titles repeating these

# Credentials also fall back to WORDPRESS_URL, WORDPRESS_USERNAME and
# WORDPRESS_APP_PASSWORD. Without them, runs stop after the quality gate.
wordpress:
  # site_url: https://blog.example.com
  # username: editor
  # app_password: env:WORDPRESS_APP_PASSWORD
  default_category_id: 1
  status: publish                   # publish | draft | pending | private
  comment_status: open
  ping_status: open

history_file: ~/.erratum/history.json
# output_dir: ./articles            # archive every generated article here
`;

/** Write the commented template; an existing file is left untouched. */
export async function initCommand(options: InitCommandOptions = {}): Promise<InitResult> {
  const log = options.logger ?? console.log;
  const homeDirectory = options.homeDir ?? homedir();

  const configPath = resolveConfigPath(options.configPath, homeDirectory);
  const configDir = dirname(configPath);

  if (existsSync(configPath)) {
    log(chalk.yellow('Config already exists at:'), configPath);
    log(chalk.yellow('Remove it first or pass --config <path> to write elsewhere.'));
    return { configPath, created: false };
  }

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    log(chalk.green('Created directory:'), configDir);
  }

  writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  log(chalk.green('Created config file:'), configPath);
  log('');
  log(chalk.cyan('Next steps:'));
  log('  1. Edit', configPath);
  log('  2. Add your API keys or set environment variables');
  log('  3. Run', chalk.green('erratum discover'), 'to check the signal sources');
  return { configPath, created: true };
}
