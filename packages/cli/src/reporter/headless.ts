import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type {
  DiscoveryOutcome,
  RunPipeline,
  RunResult,
  RunStage,
  RunStatus,
  StageCompleteEvent,
  StageErrorEvent,
  StageStartEvent,
} from '@erratum/core';

const STAGE_LABELS: Record<RunStage, string> = {
  discover: 'Discovering candidates',
  collect: 'Collecting solutions',
  synthesize: 'Writing article',
  evaluate: 'Checking quality',
  archive: 'Archiving',
  publish: 'Publishing to WordPress',
  record: 'Recording history',
};

const FAILURE_STATUSES: ReadonlySet<RunStatus> = new Set<RunStatus>([
  'collection_failed',
  'synthesis_failed',
  'quality_rejected',
  'publish_failed',
]);

export function isFailureStatus(status: RunStatus): boolean {
  return FAILURE_STATUSES.has(status);
}

export function exitCodeFor(result: RunResult): number {
  return isFailureStatus(result.status) ? 1 : 0;
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatRunSummary(result: RunResult): string[] {
  const lines = [`Status: ${result.status}`];
  const { candidate, article, report, publish } = result;
  if (candidate) {
    lines.push(`Error: ${candidate.text} (${candidate.provider}, confidence ${candidate.confidence.toFixed(2)})`);
  }
  if (article) lines.push(`Title: ${article.title}`);
  if (report) {
    lines.push(`Quality: ${report.overallScore} ${report.passed ? 'passed' : 'failed'}, ${report.issues.length} issue(s)`);
  }
  if (result.archiveDir) lines.push(`Archive: ${result.archiveDir}`);
  if (publish) lines.push(`URL: ${publish.url} (${publish.status})`);
  if (result.error) lines.push(`Reason: ${result.error.message}`);
  lines.push(`Duration: ${seconds(result.durationMs)}`);
  return lines;
}

export function formatDiscovery(outcome: DiscoveryOutcome): string[] {
  const lines = [
    `Pool: ${outcome.pool.length} candidates, ${outcome.filtered.length} kept, ${outcome.rejected.length} rejected`,
  ];
  const { selection } = outcome;
  if (selection) {
    lines.push(
      `Selected: ${selection.candidate.text} from ${selection.provider}` +
      ` (confidence ${selection.candidate.confidence.toFixed(2)}, rank ${selection.rank + 1} of ${selection.windowSize})`,
    );
  } else {
    lines.push('No new error found');
  }
  return lines;
}

/** A JSON-safe copy of a run result; errors become their message. */
export function toJsonResult(result: RunResult): Record<string, unknown> {
  const { error, ...rest } = result;
  return error ? { ...rest, error: error.message } : rest;
}

export interface ReporterOptions {
  verbose?: boolean;
}

/**
 * Render pipeline progress with one spinner per stage. Source and
 * candidate detail is buffered and printed when the stage settles.
 */
export function attachReporter(pipeline: RunPipeline, options: ReporterOptions = {}): void {
  const { verbose } = options;
  let activeSpinner: Ora = ora();
  let pending: string[] = [];

  const flush = (): void => {
    for (const line of pending) console.log(line);
    pending = [];
  };

  pipeline.on('stage:start', (event: StageStartEvent) => {
    activeSpinner = ora({
      text: chalk.bold(STAGE_LABELS[event.stage]),
      prefixText: chalk.dim(' '),
    }).start();
  });

  pipeline.on('stage:complete', (event: StageCompleteEvent) => {
    activeSpinner.succeed(`${chalk.bold(STAGE_LABELS[event.stage])}${chalk.dim(`  ${seconds(event.durationMs)}`)}`);
    flush();
  });

  pipeline.on('stage:error', (event: StageErrorEvent) => {
    const label = chalk.bold(STAGE_LABELS[event.stage]);
    if (activeSpinner.isSpinning) {
      activeSpinner.fail(`${label} ${chalk.red(event.error.message)}`);
    } else {
      console.log(`${chalk.red('✗')} ${label} ${chalk.red(event.error.message)}`);
    }
    flush();
  });

  pipeline.on('adapter:complete', event => {
    if (verbose) pending.push(chalk.dim(`    ${event.name}: ${event.count} candidates (${seconds(event.durationMs)})`));
  });
  pipeline.on('adapter:error', event => {
    pending.push(chalk.yellow(`    ${event.name} failed: ${event.error.message}`));
  });
  pipeline.on('collector:complete', event => {
    if (verbose) pending.push(chalk.dim(`    ${event.name}: ${event.count} results (${seconds(event.durationMs)})`));
  });
  pipeline.on('collector:error', event => {
    pending.push(chalk.yellow(`    ${event.name} failed: ${event.error.message}`));
  });
  pipeline.on('candidate:rejected', ({ candidate, reason }) => {
    if (verbose) pending.push(chalk.dim(`    rejected ${candidate.text}: ${reason}`));
  });
  pipeline.on('candidate:selected', selection => {
    pending.push(`    ${chalk.green('selected')} ${chalk.bold(selection.candidate.text)}` +
      chalk.dim(` (${selection.provider}, ${selection.candidate.confidence.toFixed(2)})`));
  });
  pipeline.on('quality:complete', report => {
    const verdict = report.passed ? chalk.green('passed') : chalk.red('failed');
    pending.push(`    score ${chalk.bold(String(report.overallScore))} ${verdict}`);
    if (verbose) {
      for (const issue of report.issues) {
        pending.push(chalk.dim(`    [${issue.severity}] ${issue.dimension}: ${issue.message}`));
      }
    }
  });
}

export function printRunSummary(result: RunResult): void {
  const failed = isFailureStatus(result.status);
  console.log('');
  console.log(failed ? chalk.red.bold('✗ Run failed') : chalk.green.bold('✓ Run finished'));
  for (const line of formatRunSummary(result)) {
    console.log(chalk.dim(`  ${line}`));
  }
  console.log('');
}
