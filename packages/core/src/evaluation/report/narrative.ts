import type { AggregatedMetrics, ItemEvaluation } from '../types.js';
import { findCommonIssues } from './common-issues.js';
import { summarizeCoverage } from './structured.js';

const RULE_WIDTH = 80;
const FIELD_COLUMN_WIDTH = 30;
const METRIC_COLUMN_WIDTH = 10;

export function formatPercent(value: number, digits: number): string {
  return `${(value * 100).toFixed(digits)}%`;
}

/**
 * Render the human-readable validation report.
 */
export function formatNarrativeReport(
  byPaper: Readonly<Record<string, ItemEvaluation>>,
  summary: AggregatedMetrics,
): string {
  const lines: string[] = [];
  const heavyRule = '='.repeat(RULE_WIDTH);
  const lightRule = '-'.repeat(RULE_WIDTH);

  lines.push(heavyRule);
  lines.push('EXTRACTION VALIDATION REPORT');
  lines.push(heavyRule);
  lines.push('');

  const { overall } = summary;
  const coverage = summarizeCoverage(byPaper);
  const skipped = coverage.notAnnotated + coverage.invalid;

  lines.push('OVERALL METRICS');
  lines.push(lightRule);
  lines.push(`Papers evaluated: ${summary.num_papers_evaluated}`);
  if (skipped > 0) {
    lines.push(
      `Papers skipped: ${skipped} of ${coverage.total} (not annotated: ${coverage.notAnnotated}, invalid: ${coverage.invalid})`,
    );
  }
  lines.push(`Precision: ${formatPercent(overall.precision, 2)}`);
  lines.push(`Recall:    ${formatPercent(overall.recall, 2)}`);
  lines.push(`F1 Score:  ${formatPercent(overall.f1, 2)}`);
  lines.push(`True Positives:  ${overall.tp}`);
  lines.push(`False Positives: ${overall.fp}`);
  lines.push(`False Negatives: ${overall.fn}`);
  lines.push('');

  lines.push('METRICS BY FIELD');
  lines.push(lightRule);
  lines.push(
    [
      'Field'.padEnd(FIELD_COLUMN_WIDTH),
      'Precision'.padStart(METRIC_COLUMN_WIDTH),
      'Recall'.padStart(METRIC_COLUMN_WIDTH),
      'F1'.padStart(METRIC_COLUMN_WIDTH),
    ].join(' '),
  );
  lines.push(lightRule);
  for (const [field, metrics] of Object.entries(summary.by_field)) {
    lines.push(
      [
        field.padEnd(FIELD_COLUMN_WIDTH),
        formatPercent(metrics.precision, 1).padStart(METRIC_COLUMN_WIDTH),
        formatPercent(metrics.recall, 1).padStart(METRIC_COLUMN_WIDTH),
        formatPercent(metrics.f1, 1).padStart(METRIC_COLUMN_WIDTH),
      ].join(' '),
    );
  }
  lines.push('');

  lines.push('COMMON ISSUES');
  lines.push(lightRule);

  const { lowRecall, lowPrecision } = findCommonIssues(summary.by_field);
  if (lowRecall.length > 0) {
    lines.push('');
    lines.push('Fields with low recall (missed information):');
    for (const { field, metrics } of lowRecall) {
      lines.push(`  - ${field}: ${formatPercent(metrics.recall, 1)} recall, ${metrics.fn} missed items`);
    }
  }
  if (lowPrecision.length > 0) {
    lines.push('');
    lines.push('Fields with low precision (incorrect extractions):');
    for (const { field, metrics } of lowPrecision) {
      lines.push(
        `  - ${field}: ${formatPercent(metrics.precision, 1)} precision, ${metrics.fp} incorrect items`,
      );
    }
  }

  lines.push('');
  lines.push(heavyRule);

  return lines.join('\n');
}

/**
 * One-line summary printed while a corpus is being evaluated.
 */
export function formatItemProgress(itemId: string, evaluation: ItemEvaluation): string {
  if (evaluation.status !== 'evaluated') {
    return `${itemId}: skipped (${evaluation.message})`;
  }
  const { overall } = evaluation;
  return `${itemId}: P=${formatPercent(overall.precision, 2)} R=${formatPercent(overall.recall, 2)} F1=${formatPercent(overall.f1, 2)}`;
}
