import { Command } from 'commander';
import chalk from 'chalk';
import { getConfig, type GlobalOptions } from '../context.js';
import { createRunPipeline, hasWordPressCredentials } from '../factory.js';
import { executeRun, randomFor, withInterrupt } from './shared.js';

interface RunOptions {
  publish: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Discover an error, gather fixes, write the article, check it and publish it')
    .option('--no-publish', 'Stop after the quality gate')
    .action(async (options: RunOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();

      if (options.publish && !hasWordPressCredentials(config) && !globalOpts.json) {
        console.error(chalk.yellow('WordPress credentials not configured; the run stops after the quality gate.'));
      }

      await withInterrupt(abortSignal => {
        const pipeline = createRunPipeline(config, {
          publish: options.publish,
          random: randomFor(globalOpts.seed),
          abortSignal,
        });
        return executeRun(pipeline, () => pipeline.run(), globalOpts);
      });
    });
}
