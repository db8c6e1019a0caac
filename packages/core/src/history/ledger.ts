/**
 * Processing history: remembers which error texts already produced an
 * article so discovery does not pick them again.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';

const MAX_NAME_LENGTH = 50;

export interface HistoryEntry {
  text: string;
  title?: string;
  url?: string;
  processedAt: string;
}

export interface HistoryLedger {
  has(text: string): boolean;
  record(entry: HistoryEntry): void;
}

/**
 * Filesystem-safe key for an error text: runs of characters other than
 * letters, digits, `_` and `-` (in any script) become a single `_`, edges are
 * trimmed, and the result is capped at 50 code points.
 */
export function sanitizeErrorName(text: string): string {
  let name = text
    .replace(/[^\p{L}\p{N}_-]/gu, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
  const chars = [...name];
  if (chars.length > MAX_NAME_LENGTH) {
    name = chars.slice(0, MAX_NAME_LENGTH).join('').replace(/_+$/, '');
  }
  return name || 'UNKNOWN_ERROR';
}

export class MemoryHistory implements HistoryLedger {
  protected readonly entries = new Map<string, HistoryEntry>();

  constructor(initial: Iterable<HistoryEntry> = []) {
    for (const entry of initial) {
      this.entries.set(sanitizeErrorName(entry.text), entry);
    }
  }

  has(text: string): boolean {
    return this.entries.has(sanitizeErrorName(text));
  }

  record(entry: HistoryEntry): void {
    this.entries.set(sanitizeErrorName(entry.text), entry);
  }

  list(): HistoryEntry[] {
    return [...this.entries.values()];
  }
}

const HistoryFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.object({
    text: z.string(),
    title: z.string().optional(),
    url: z.string().optional(),
    processedAt: z.string(),
  })),
});

export class HistoryFileError extends Error {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'HistoryFileError';
  }
}

/** JSON-file ledger. Reads once on construction and rewrites the file on every record. */
export class FileHistory extends MemoryHistory {
  constructor(private readonly path: string) {
    super(FileHistory.read(path));
  }

  private static read(path: string): HistoryEntry[] {
    if (!existsSync(path)) return [];
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new HistoryFileError(`Invalid history file ${path}: ${msg}`, path);
    }
    const parsed = HistoryFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new HistoryFileError(`Invalid history file ${path}: ${issues}`, path);
    }
    return Object.values(parsed.data.entries);
  }

  override record(entry: HistoryEntry): void {
    super.record(entry);
    this.flush();
  }

  private flush(): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const entries: Record<string, HistoryEntry> = {};
    for (const [key, entry] of this.entries) entries[key] = entry;
    writeFileSync(this.path, JSON.stringify({ version: 1, entries }, null, 2) + '\n', 'utf-8');
  }
}
