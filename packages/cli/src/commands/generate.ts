import { Command, InvalidArgumentError } from 'commander';
import type { ScoredCandidate } from '@erratum/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { createRunPipeline } from '../factory.js';
import { executeRun, randomFor, withInterrupt } from './shared.js';

interface GenerateOptions {
  publish: boolean;
}

/** Operator-supplied error text, trusted fully. */
export function manualCandidate(text: string, now: Date = new Date()): ScoredCandidate {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new InvalidArgumentError('Error text must not be empty.');
  }
  return { text: trimmed, provider: 'manual', metrics: {}, timestamp: now.toISOString(), confidence: 1 };
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Write an article for the given error text, skipping discovery')
    .argument('<error>', 'Error message, e.g. "0x80070005"', value => manualCandidate(value))
    .option('--no-publish', 'Stop after the quality gate')
    .action(async (candidate: ScoredCandidate, options: GenerateOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();

      await withInterrupt(abortSignal => {
        const pipeline = createRunPipeline(config, {
          publish: options.publish,
          random: randomFor(globalOpts.seed),
          abortSignal,
        });
        return executeRun(pipeline, () => pipeline.runFor(candidate), globalOpts);
      });
    });
}
