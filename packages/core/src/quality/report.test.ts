import { describe, it, expect } from 'vitest';
import { evaluateArticle } from './gate.js';
import { renderQualityReportJSON, renderQualityReportMarkdown } from './report.js';

const report = evaluateArticle({
  title: 'Fix error today',
  slug: '',
  content: '',
  excerpt: '',
  tags: [],
  wordCount: 500,
  keyword: '',
});

describe('renderQualityReportMarkdown', () => {
  it('renders a score table and issues ordered by severity', () => {
    const md = renderQualityReportMarkdown(report);
    const lines = md.split('\n');

    expect(lines[0]).toBe('## Quality Report: FAILED');
    expect(lines).toContain('| Basic | 0/100 |');
    expect(lines).toContain('| Structure | 10/100 |');
    expect(lines).toContain('| **Overall** | **2.5** |');

    const firstIssue = lines.findIndex(l => l.startsWith('- '));
    expect(lines[firstIssue]).toBe('- ✗ **high** [basic] Content too short: 500 characters (minimum 3000)');
    expect(lines.filter(l => l.startsWith('- ')).at(-1)).toBe('- · **low** [structure] No lists');
  });
});

describe('renderQualityReportJSON', () => {
  it('produces parseable JSON with the verdict', () => {
    const parsed: unknown = JSON.parse(renderQualityReportJSON(report));
    expect(parsed).toMatchObject({ passed: false, overallScore: 2.5, summary: { high: 4, medium: 4, low: 2 } });
  });
});
