#!/usr/bin/env node

import chalk from 'chalk';
import { isAbortError } from '@erratum/core';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (isAbortError(err)) {
      console.error(chalk.yellow('Interrupted.'));
      process.exitCode = 130;
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(message));
    if (program.opts<{ verbose?: boolean }>().verbose && err instanceof Error && err.stack) {
      console.error(chalk.dim(err.stack));
    }
    process.exitCode = 1;
  }
}

void main();
