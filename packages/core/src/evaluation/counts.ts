import type { Count, Metrics } from './types.js';

export const EMPTY_COUNT: Count = Object.freeze({ tp: 0, fp: 0, fn: 0 });

/** A single correct value. */
export const MATCH: Count = Object.freeze({ tp: 1, fp: 0, fn: 0 });

/** A wrong value is both an incorrect output and a missed correct one. */
export const MISMATCH: Count = Object.freeze({ tp: 0, fp: 1, fn: 1 });

export const SPURIOUS: Count = Object.freeze({ tp: 0, fp: 1, fn: 0 });

export const MISSED: Count = Object.freeze({ tp: 0, fp: 0, fn: 1 });

export function matchCount(matched: boolean): Count {
  return matched ? MATCH : MISMATCH;
}

export function addCounts(a: Count, b: Count): Count {
  return { tp: a.tp + b.tp, fp: a.fp + b.fp, fn: a.fn + b.fn };
}

export function sumCounts(counts: Iterable<Count>): Count {
  let total = EMPTY_COUNT;
  for (const count of counts) {
    total = addCounts(total, count);
  }
  return total;
}

export function toCount(metrics: Count): Count {
  return { tp: metrics.tp, fp: metrics.fp, fn: metrics.fn };
}

/**
 * Derive precision, recall and F1 from raw counts.
 * Each ratio is 0 when its denominator is 0.
 */
export function computeMetrics(count: Count): Metrics {
  const { tp, fp, fn } = count;
  const precision = tp + fp > 0 ? tp / (tp + fp) : 0;
  const recall = tp + fn > 0 ? tp / (tp + fn) : 0;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;

  return { precision, recall, f1, tp, fp, fn };
}
