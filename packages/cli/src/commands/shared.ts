import { InvalidArgumentError } from 'commander';
import { createSeededRandom, defaultRandom, type RandomSource, type RunPipeline, type RunResult } from '@erratum/core';
import type { GlobalOptions } from '../context.js';
import { attachReporter, exitCodeFor, printRunSummary, toJsonResult } from '../reporter/headless.js';

export function parseSeed(value: string): number {
  const seed = Number(value);
  if (!Number.isSafeInteger(seed)) {
    throw new InvalidArgumentError('Seed must be an integer.');
  }
  return seed;
}

export function randomFor(seed: number | undefined): RandomSource {
  return seed === undefined ? defaultRandom : createSeededRandom(seed);
}

/** Abort the returned signal on Ctrl-C until `run` settles. */
export async function withInterrupt<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await run(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/** Run with progress output (or one JSON document) and set the exit code from the status. */
export async function executeRun(
  pipeline: RunPipeline,
  start: () => Promise<RunResult>,
  globalOpts: GlobalOptions,
): Promise<RunResult> {
  if (!globalOpts.json) {
    attachReporter(pipeline, { verbose: globalOpts.verbose });
  }
  const result = await start();
  if (globalOpts.json) {
    console.log(JSON.stringify(toJsonResult(result), null, 2));
  } else {
    printRunSummary(result);
  }
  process.exitCode = exitCodeFor(result);
  return result;
}
