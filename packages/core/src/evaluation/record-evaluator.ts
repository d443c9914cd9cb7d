import { compareLists } from './comparators/list.js';
import { compareValues } from './comparators/value-comparator.js';
import { computeMetrics, sumCounts, toCount } from './counts.js';
import type {
  ComparisonConfig,
  Count,
  FieldEvaluation,
  ItemEvaluation,
  RecordDetail,
  RecordsFieldEvaluation,
} from './types.js';
import { isRecordsFieldEvaluation } from './types.js';
import { classifyValue, fieldValue, isPlainObject, unionKeys } from './value.js';

/**
 * Top-level field holding a list of structured sub-records.
 */
export const RECORDS_FIELD = 'records';

/**
 * Evaluate one corpus item: every top-level field of the automated extraction against the
 * annotator's ground truth.
 *
 * The item's overall metrics come from the summed field counts. For `records` only the
 * count-level tally enters that sum; per-record detail is reported alongside it.
 */
export function evaluateItem(
  itemId: string,
  automated: unknown,
  truth: unknown,
  config: ComparisonConfig,
): ItemEvaluation {
  if (truth === null || truth === undefined) {
    return { status: 'not_annotated', message: 'Ground truth not provided' };
  }
  if (!isPlainObject(truth)) {
    return {
      status: 'invalid',
      message: `Ground truth for ${itemId} must be an object, got ${classifyValue(truth).kind}`,
    };
  }

  const candidate: Readonly<Record<string, unknown>> = isPlainObject(automated) ? automated : {};
  const fieldMetrics: [string, FieldEvaluation][] = [];

  for (const field of unionKeys(truth, candidate)) {
    const automatedValue = fieldValue(candidate, field);
    const truthValue = fieldValue(truth, field);

    if (field === RECORDS_FIELD && holdsRecordList(automatedValue, truthValue)) {
      fieldMetrics.push([
        field,
        evaluateRecords(toList(automatedValue), toList(truthValue), config),
      ]);
    } else {
      fieldMetrics.push([field, computeMetrics(compareValues(automatedValue, truthValue, config))]);
    }
  }

  const overall = computeMetrics(
    sumCounts(fieldMetrics.map(([, evaluation]) => fieldEvaluationCount(evaluation))),
  );

  return { status: 'evaluated', field_metrics: Object.fromEntries(fieldMetrics), overall };
}

/**
 * Count-level tally plus per-index detail for a list of sub-records.
 *
 * Sub-records are paired by list index, not by similarity. Detail is only meaningful when the
 * extraction keeps the source order. One inserted or dropped record shifts every later pair;
 * `count_metrics` treats each sub-record as one opaque unit and is unaffected.
 */
export function evaluateRecords(
  automated: readonly unknown[],
  truth: readonly unknown[],
  config: ComparisonConfig,
): RecordsFieldEvaluation {
  const countMetrics = computeMetrics(
    compareLists(automated, truth, { orderMatters: false, fuzzy: false }),
  );

  const details: RecordDetail[] = [];
  const paired = Math.min(automated.length, truth.length);
  for (let index = 0; index < paired; index += 1) {
    details.push({
      record_index: index,
      metrics: computeMetrics(compareValues(automated[index], truth[index], config)),
    });
  }

  return { count_metrics: countMetrics, record_details: details };
}

/**
 * The count a field contributes to item and corpus totals.
 */
export function fieldEvaluationCount(evaluation: FieldEvaluation): Count {
  return toCount(isRecordsFieldEvaluation(evaluation) ? evaluation.count_metrics : evaluation);
}

function holdsRecordList(automated: unknown, truth: unknown): boolean {
  const isListOrAbsent = (value: unknown) =>
    value === null || value === undefined || Array.isArray(value);
  return (
    isListOrAbsent(automated) &&
    isListOrAbsent(truth) &&
    (Array.isArray(automated) || Array.isArray(truth))
  );
}

function toList(value: unknown): readonly unknown[] {
  return Array.isArray(value) ? value : [];
}
