import type { Metrics } from '../types.js';

export const LOW_RECALL_THRESHOLD = 0.7;
export const LOW_PRECISION_THRESHOLD = 0.7;

export interface FieldIssue {
  readonly field: string;
  readonly metrics: Metrics;
}

export interface CommonIssues {
  /** Fields the extraction systematically misses, worst recall first. */
  readonly lowRecall: readonly FieldIssue[];
  /** Fields the extraction systematically gets wrong, worst precision first. */
  readonly lowPrecision: readonly FieldIssue[];
}

export function findCommonIssues(byField: Readonly<Record<string, Metrics>>): CommonIssues {
  const fields = Object.entries(byField)
    .map(([field, metrics]) => ({ field, metrics }))
    .sort((a, b) => compareText(a.field, b.field));

  const lowRecall = fields
    .filter(({ metrics }) => metrics.recall < LOW_RECALL_THRESHOLD && metrics.fn > 0)
    .sort((a, b) => a.metrics.recall - b.metrics.recall);

  const lowPrecision = fields
    .filter(({ metrics }) => metrics.precision < LOW_PRECISION_THRESHOLD && metrics.fp > 0)
    .sort((a, b) => a.metrics.precision - b.metrics.precision);

  return { lowRecall, lowPrecision };
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
