import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'yaml';
import { initCommand } from './init.js';
import { getConfig, type GlobalOptions } from '../context.js';
import { getConfigPath, maskSecrets } from '../config/index.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage erratum configuration');

  config
    .command('init')
    .description('Write a commented config template to ~/.erratum/config.yaml')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await initCommand({ configPath: globalOpts.config });
    });

  config
    .command('show')
    .description('Show the resolved configuration with secrets masked')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const masked = maskSecrets(getConfig());

      if (globalOpts.json) {
        console.log(JSON.stringify(masked, null, 2));
      } else {
        console.log(chalk.bold('Current configuration:'));
        console.log(chalk.dim(`# ${getConfigPath(globalOpts.config)}\n`));
        console.log(stringify(masked));
      }
    });
}
