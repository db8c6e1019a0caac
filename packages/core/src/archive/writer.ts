import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Article, QualityReport } from '../quality/types.js';
import type { ScoredCandidate } from '../discovery/types.js';
import type { PublishResult } from '../pipeline/types.js';
import { sanitizeErrorName } from '../history/ledger.js';

export interface ArchiveArticleOptions {
  outputDir: string;
  article: Article;
  report: QualityReport;
  candidate: ScoredCandidate;
  /** Creation timestamp written to metadata.json. */
  now?: Date;
}

export interface ArchiveResult {
  directory: string;
  number: number;
  files: string[];
}

const NUMBERED_DIR = /^(\d{4})_/;

/** One past the highest `NNNN_` directory under `outputDir`, starting at 1. */
export function nextArticleNumber(outputDir: string): number {
  if (!existsSync(outputDir)) return 1;
  let highest = 0;
  for (const entry of readdirSync(outputDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const match = NUMBERED_DIR.exec(entry.name);
    if (match?.[1]) highest = Math.max(highest, Number(match[1]));
  }
  return highest + 1;
}

export function articleDirectoryName(number: number, errorText: string): string {
  return `${String(number).padStart(4, '0')}_${sanitizeErrorName(errorText)}`;
}

/**
 * Write an article and its quality report to a new numbered directory.
 */
export function archiveArticle(options: ArchiveArticleOptions): ArchiveResult {
  const { outputDir, article, report, candidate } = options;
  const now = options.now ?? new Date();

  const number = nextArticleNumber(outputDir);
  const directory = join(outputDir, articleDirectoryName(number, candidate.text));
  mkdirSync(directory, { recursive: true });

  const files: string[] = [];
  const write = (name: string, content: string): void => {
    const path = join(directory, name);
    writeFileSync(path, content, 'utf-8');
    files.push(path);
  };

  write('article.md', article.content);
  write('metadata.json', toJson({
    title: article.title,
    slug: article.slug,
    tags: article.tags,
    excerpt: article.excerpt,
    wordCount: article.wordCount,
    errorText: candidate.text,
    provider: candidate.provider,
    confidence: candidate.confidence,
    createdAt: now.toISOString(),
  }));
  write('quality.json', toJson(report));

  return { directory, number, files };
}

export function recordPublish(directory: string, record: PublishResult): string {
  const path = join(directory, 'publish.json');
  writeFileSync(path, toJson(record), 'utf-8');
  return path;
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n';
}
