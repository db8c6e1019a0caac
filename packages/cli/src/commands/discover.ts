import { Command } from 'commander';
import chalk from 'chalk';
import { getConfig, type GlobalOptions } from '../context.js';
import { createRunPipeline } from '../factory.js';
import { attachReporter, formatDiscovery } from '../reporter/headless.js';
import { randomFor, withInterrupt } from './shared.js';

export function registerDiscoverCommand(program: Command): void {
  program
    .command('discover')
    .description('Query the signal sources and show which error would be chosen')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();

      const outcome = await withInterrupt(abortSignal => {
        const pipeline = createRunPipeline(config, { publish: false, random: randomFor(globalOpts.seed), abortSignal });
        if (!globalOpts.json) {
          attachReporter(pipeline, { verbose: globalOpts.verbose });
        }
        return pipeline.discover();
      });

      if (globalOpts.json) {
        console.log(JSON.stringify(outcome, null, 2));
        return;
      }
      console.log('');
      for (const line of formatDiscovery(outcome)) {
        console.log(line.startsWith('Selected:') ? chalk.green(line) : line);
      }
    });
}
