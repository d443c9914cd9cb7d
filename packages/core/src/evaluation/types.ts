/**
 * JSON primitive values appearing in extraction payloads.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Immutable JSON object representation for extracted and annotated records.
 */
export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/**
 * Recursive JSON value supporting nested structures.
 */
export type JsonValue = JsonPrimitive | JsonObject | readonly JsonValue[];

/**
 * Options controlling how automated values are matched against ground truth.
 */
export interface ComparisonConfig {
  /** Absolute difference under which two numbers are considered equal. */
  readonly numeric_tolerance: number;
  /** Lower-case and collapse whitespace before comparing strings. */
  readonly fuzzy_strings: boolean;
  /** Compare lists positionally instead of as sets. */
  readonly list_order_matters: boolean;
}

/**
 * Additive true-positive / false-positive / false-negative tally.
 */
export interface Count {
  readonly tp: number;
  readonly fp: number;
  readonly fn: number;
}

/**
 * Precision, recall and F1 together with the counts they were derived from.
 */
export interface Metrics extends Count {
  readonly precision: number;
  readonly recall: number;
  readonly f1: number;
}

export interface RecordDetail {
  readonly record_index: number;
  readonly metrics: Metrics;
}

/**
 * Evaluation of the `records` field: a count-level metric over whole sub-records plus
 * per-index detail for positionally paired sub-records.
 */
export interface RecordsFieldEvaluation {
  readonly count_metrics: Metrics;
  readonly record_details: readonly RecordDetail[];
}

export type FieldEvaluation = Metrics | RecordsFieldEvaluation;

export type ItemEvaluationStatus = 'not_annotated' | 'invalid' | 'evaluated';

export interface NotAnnotatedEvaluation {
  readonly status: 'not_annotated';
  readonly message: string;
}

export interface InvalidEvaluation {
  readonly status: 'invalid';
  readonly message: string;
}

export interface EvaluatedItem {
  readonly status: 'evaluated';
  readonly field_metrics: Readonly<Record<string, FieldEvaluation>>;
  readonly overall: Metrics;
}

export type ItemEvaluation = NotAnnotatedEvaluation | InvalidEvaluation | EvaluatedItem;

/**
 * Corpus-wide metrics derived from summed counts.
 */
export interface AggregatedMetrics {
  readonly overall: Metrics;
  readonly by_field: Readonly<Record<string, Metrics>>;
  readonly num_papers_evaluated: number;
}

/**
 * Machine-readable report written next to the narrative report.
 */
export interface MetricsReport {
  readonly summary: AggregatedMetrics;
  readonly by_paper: Readonly<Record<string, ItemEvaluation>>;
  readonly config: ComparisonConfig;
}

/**
 * Guard matching JSON objects.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isJsonValue);
}

/**
 * Guard matching JSON values.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === 'object') {
    return isJsonObject(value);
  }
  return false;
}

export function isRecordsFieldEvaluation(
  evaluation: FieldEvaluation,
): evaluation is RecordsFieldEvaluation {
  return 'count_metrics' in evaluation;
}
