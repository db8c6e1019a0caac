/**
 * Quality report rendering for terminal/Markdown output and JSON.
 */

import type { QualityIssue, QualityReport, ScoredDimension, Severity } from './types.js';

const DIMENSION_LABELS: ReadonlyArray<readonly [ScoredDimension, string]> = [
  ['basic', 'Basic'],
  ['seo', 'SEO'],
  ['structure', 'Structure'],
  ['readability', 'Readability'],
];

const SEVERITY_ORDER: Severity[] = ['high', 'medium', 'low'];

function getSeverityIcon(severity: Severity): string {
  switch (severity) {
    case 'high': return '✗';
    case 'medium': return '!';
    case 'low': return '·';
  }
}

export function renderQualityReportMarkdown(report: QualityReport): string {
  const lines: string[] = [];

  lines.push(`## Quality Report: ${report.passed ? 'PASSED' : 'FAILED'}\n`);
  lines.push(`| Dimension | Score |`);
  lines.push(`|-----------|-------|`);
  for (const [dimension, label] of DIMENSION_LABELS) {
    const sub = report.subScores[dimension];
    lines.push(`| ${label} | ${sub.score}/${sub.maxScore} |`);
  }
  lines.push(`| **Overall** | **${report.overallScore}** |`);
  lines.push('');

  if (report.issues.length > 0) {
    lines.push('## Issues\n');
    for (const severity of SEVERITY_ORDER) {
      for (const issue of report.issues.filter(i => i.severity === severity)) {
        lines.push(formatIssue(issue));
      }
    }
    lines.push('');
  }

  return lines.join('\n');
}

function formatIssue(issue: QualityIssue): string {
  return `- ${getSeverityIcon(issue.severity)} **${issue.severity}** [${issue.dimension}] ${issue.message}`;
}

export function renderQualityReportJSON(report: QualityReport): string {
  return JSON.stringify({
    passed: report.passed,
    overallScore: report.overallScore,
    seoScore: report.seoScore,
    readabilityScore: report.readabilityScore,
    subScores: report.subScores,
    summary: report.summary,
    issues: report.issues,
  }, null, 2);
}
