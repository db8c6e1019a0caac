import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfigWithMeta } from './config/index.js';
import { setConfig, type GlobalOptions } from './context.js';
import { assertModelConfigured } from './factory.js';
import { registerRunCommand } from './commands/run.js';
import { registerDiscoverCommand } from './commands/discover.js';
import { registerGenerateCommand } from './commands/generate.js';
import { registerEvaluateCommand } from './commands/evaluate.js';
import { registerConfigCommand } from './commands/config.js';
import { parseSeed } from './commands/shared.js';

export const VERSION = '0.1.0';

/** Commands that call a language model. */
const MODEL_COMMANDS = new Set(['run', 'generate']);

export function createProgram(): Command {
  const program = new Command();

  program
    .name('erratum')
    .description('Find trending technical errors and publish troubleshooting articles for them')
    .version(VERSION)
    .option('-v, --verbose', 'Show per-source and per-candidate detail')
    .option('--json', 'Machine-readable JSON output')
    .option('-c, --config <path>', 'Path to config file')
    .option('--seed <n>', 'Seed the random source for reproducible runs', parseSeed);

  registerRunCommand(program);
  registerDiscoverCommand(program);
  registerGenerateCommand(program);
  registerEvaluateCommand(program);
  registerConfigCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const chain = getCommandChain(actionCommand, program);

    // Skip config loading for 'config init'
    if (chain[0] === 'config' && chain[1] === 'init') {
      return;
    }

    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: opts.config });

    if (!configFileExists && envKeysUsed.length > 0 && !opts.json) {
      console.error(chalk.cyan(`  Using ${envKeysUsed.join(', ')} from environment.`));
      console.error(chalk.dim('  Run "erratum config init" to create a config file for more options.\n'));
    }

    if (chain[0] && MODEL_COMMANDS.has(chain[0])) {
      assertModelConfigured(config);
    }

    setConfig(config);
  });

  return program;
}

export function getCommandChain(cmd: Command, root: Command): string[] {
  const chain: string[] = [];
  let current: Command | null = cmd;
  while (current && current !== root) {
    chain.unshift(current.name());
    current = current.parent;
  }
  return chain;
}
