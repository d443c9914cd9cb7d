import { describe, expect, it } from 'vitest';

import { aggregateEvaluations } from '../../../src/evaluation/aggregator.js';
import { computeMetrics } from '../../../src/evaluation/counts.js';
import {
  formatItemProgress,
  formatNarrativeReport,
  formatPercent,
} from '../../../src/evaluation/report/narrative.js';
import type { ItemEvaluation } from '../../../src/evaluation/types.js';

const annotated: ItemEvaluation = {
  status: 'evaluated',
  field_metrics: {
    count: computeMetrics({ tp: 2, fp: 0, fn: 0 }),
    species: computeMetrics({ tp: 1, fp: 1, fn: 1 }),
  },
  overall: computeMetrics({ tp: 3, fp: 1, fn: 1 }),
};

const pending: ItemEvaluation = { status: 'not_annotated', message: 'Ground truth not provided' };

describe('formatPercent', () => {
  it('renders a ratio as a percentage with fixed digits', () => {
    expect(formatPercent(0.75, 2)).toBe('75.00%');
    expect(formatPercent(1, 1)).toBe('100.0%');
    expect(formatPercent(0, 1)).toBe('0.0%');
  });
});

describe('formatNarrativeReport', () => {
  it('renders overall metrics, the field table and common issues', () => {
    const byPaper = { 'paper-1': annotated, 'paper-2': pending };
    const summary = aggregateEvaluations(Object.values(byPaper));

    const lines = formatNarrativeReport(byPaper, summary).split('\n');

    expect(lines).toEqual([
      '='.repeat(80),
      'EXTRACTION VALIDATION REPORT',
      '='.repeat(80),
      '',
      'OVERALL METRICS',
      '-'.repeat(80),
      'Papers evaluated: 1',
      'Papers skipped: 1 of 2 (not annotated: 1, invalid: 0)',
      'Precision: 75.00%',
      'Recall:    75.00%',
      'F1 Score:  75.00%',
      'True Positives:  3',
      'False Positives: 1',
      'False Negatives: 1',
      '',
      'METRICS BY FIELD',
      '-'.repeat(80),
      `${'Field'.padEnd(30)}  Precision     Recall         F1`,
      '-'.repeat(80),
      `${'count'.padEnd(30)}     100.0%     100.0%     100.0%`,
      `${'species'.padEnd(30)}      50.0%      50.0%      50.0%`,
      '',
      'COMMON ISSUES',
      '-'.repeat(80),
      '',
      'Fields with low recall (missed information):',
      '  - species: 50.0% recall, 1 missed items',
      '',
      'Fields with low precision (incorrect extractions):',
      '  - species: 50.0% precision, 1 incorrect items',
      '',
      '='.repeat(80),
    ]);
  });

  it('omits the skipped line and issue lists when every paper scores perfectly', () => {
    const perfect: ItemEvaluation = {
      status: 'evaluated',
      field_metrics: { count: computeMetrics({ tp: 1, fp: 0, fn: 0 }) },
      overall: computeMetrics({ tp: 1, fp: 0, fn: 0 }),
    };
    const byPaper = { 'paper-1': perfect };

    const report = formatNarrativeReport(byPaper, aggregateEvaluations([perfect]));
    const lines = report.split('\n');

    expect(lines).not.toContain('Papers skipped: 0 of 1 (not annotated: 0, invalid: 0)');
    expect(lines[6]).toBe('Papers evaluated: 1');
    expect(lines[7]).toBe('Precision: 100.00%');
    expect(lines.slice(-4)).toEqual(['COMMON ISSUES', '-'.repeat(80), '', '='.repeat(80)]);
  });
});

describe('formatItemProgress', () => {
  it('summarizes an evaluated paper', () => {
    expect(formatItemProgress('paper-1', annotated)).toBe(
      'paper-1: P=75.00% R=75.00% F1=75.00%',
    );
  });

  it('reports why a paper was skipped', () => {
    expect(formatItemProgress('paper-2', pending)).toBe(
      'paper-2: skipped (Ground truth not provided)',
    );
  });
});
