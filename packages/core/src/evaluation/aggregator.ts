import { addCounts, computeMetrics, EMPTY_COUNT, sumCounts } from './counts.js';
import { fieldEvaluationCount } from './record-evaluator.js';
import type { AggregatedMetrics, Count, ItemEvaluation, Metrics } from './types.js';

/**
 * Running corpus totals. Accumulators are immutable values; merging two of them is associative
 * and commutative, so items may be folded in any order or in parallel partitions.
 */
export interface MetricsAccumulator {
  readonly fieldCounts: ReadonlyMap<string, Count>;
  readonly evaluatedItems: number;
}

export function createAccumulator(): MetricsAccumulator {
  return { fieldCounts: new Map(), evaluatedItems: 0 };
}

/**
 * Fold one item into the totals. Items that were not evaluated are skipped, not counted as zero.
 */
export function accumulateItem(
  accumulator: MetricsAccumulator,
  item: ItemEvaluation,
): MetricsAccumulator {
  if (item.status !== 'evaluated') {
    return accumulator;
  }

  const fieldCounts = new Map(accumulator.fieldCounts);
  for (const [field, evaluation] of Object.entries(item.field_metrics)) {
    const previous = fieldCounts.get(field) ?? EMPTY_COUNT;
    fieldCounts.set(field, addCounts(previous, fieldEvaluationCount(evaluation)));
  }

  return { fieldCounts, evaluatedItems: accumulator.evaluatedItems + 1 };
}

export function mergeAccumulators(
  left: MetricsAccumulator,
  right: MetricsAccumulator,
): MetricsAccumulator {
  const fieldCounts = new Map(left.fieldCounts);
  for (const [field, count] of right.fieldCounts) {
    fieldCounts.set(field, addCounts(fieldCounts.get(field) ?? EMPTY_COUNT, count));
  }
  return { fieldCounts, evaluatedItems: left.evaluatedItems + right.evaluatedItems };
}

/**
 * Derive corpus metrics from summed integer counts. Ratios are never averaged across items.
 */
export function finalizeAccumulator(accumulator: MetricsAccumulator): AggregatedMetrics {
  const byField: [string, Metrics][] = Array.from(accumulator.fieldCounts)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([field, count]): [string, Metrics] => [field, computeMetrics(count)]);

  return {
    overall: computeMetrics(sumCounts(accumulator.fieldCounts.values())),
    by_field: Object.fromEntries(byField),
    num_papers_evaluated: accumulator.evaluatedItems,
  };
}

/**
 * Aggregate item evaluations into corpus-wide metrics, overall and per field.
 */
export function aggregateEvaluations(items: Iterable<ItemEvaluation>): AggregatedMetrics {
  let accumulator = createAccumulator();
  for (const item of items) {
    accumulator = accumulateItem(accumulator, item);
  }
  return finalizeAccumulator(accumulator);
}
