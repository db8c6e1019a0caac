import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { parse } from 'yaml';
import {
  evaluateArticle,
  renderQualityReportJSON,
  renderQualityReportMarkdown,
  type Article,
} from '@erratum/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { qualityThresholds } from '../factory.js';

const FRONT_MATTER = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)/;

const FrontMatterSchema = z.object({
  title: z.string().optional(),
  slug: z.string().optional(),
  excerpt: z.string().optional(),
  tags: z.array(z.string()).optional(),
  keyword: z.string().optional(),
});

export class ArticleFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArticleFileError';
  }
}

/**
 * Split optional YAML front matter from a Markdown body. The word count
 * is the body length in characters, as for generated articles.
 */
export function parseArticleFile(source: string): Article {
  const match = FRONT_MATTER.exec(source);
  const content = match ? source.slice(match[0].length) : source;

  let meta: unknown = {};
  if (match) {
    try {
      meta = parse(match[1] ?? '') ?? {};
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new ArticleFileError(`Invalid front matter: ${msg}`);
    }
  }

  const parsed = FrontMatterSchema.safeParse(meta);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ');
    throw new ArticleFileError(`Invalid front matter: ${issues}`);
  }

  const { title = '', slug = '', excerpt = '', tags = [], keyword = '' } = parsed.data;
  return { title, slug, content, excerpt, tags, keyword, wordCount: content.length };
}

export function registerEvaluateCommand(program: Command): void {
  program
    .command('evaluate')
    .description('Run the quality gate over a Markdown article')
    .argument('<file>', 'Markdown file, optionally with YAML front matter')
    .action(async (file: string, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();

      let source: string;
      try {
        source = readFileSync(file, 'utf-8');
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        throw new ArticleFileError(`Cannot read ${file}: ${msg}`);
      }

      const report = evaluateArticle(parseArticleFile(source), qualityThresholds(getConfig()));

      if (globalOpts.json) {
        console.log(renderQualityReportJSON(report));
      } else {
        console.log(renderQualityReportMarkdown(report));
        console.log(report.passed ? chalk.green.bold('✓ Passed') : chalk.red.bold('✗ Failed'));
      }
      process.exitCode = report.passed ? 0 : 1;
    });
}
