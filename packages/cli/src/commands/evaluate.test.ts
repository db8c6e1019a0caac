import { describe, it, expect } from 'vitest';
import { ArticleFileError, parseArticleFile } from './evaluate.js';

describe('parseArticleFile', () => {
  it('reads front matter and measures the body', () => {
    const source = [
      '---',
      'title: ERROR_DISK_FULL fix guide',
      'tags: [windows, disk]',
      'keyword: ERROR_DISK_FULL',
      'date: 2026-03-02',
      '---',
      '# 見出し',
      '本文',
      '',
    ].join('\n');

    expect(parseArticleFile(source)).toEqual({
      title: 'ERROR_DISK_FULL fix guide',
      slug: '',
      content: '# 見出し\n本文\n',
      excerpt: '',
      tags: ['windows', 'disk'],
      keyword: 'ERROR_DISK_FULL',
      wordCount: 9,
    });
  });

  it('treats a file without front matter as body only', () => {
    const article = parseArticleFile('# Title\n\nBody text.\n');

    expect(article.title).toBe('');
    expect(article.tags).toEqual([]);
    expect(article.content).toBe('# Title\n\nBody text.\n');
    expect(article.wordCount).toBe(20);
  });

  it('rejects mistyped front matter fields', () => {
    const source = '---\ntags: 5\n---\nbody\n';

    expect(() => parseArticleFile(source)).toThrow(ArticleFileError);
    expect(() => parseArticleFile(source)).toThrow(/^Invalid front matter: tags: /);
  });
});
