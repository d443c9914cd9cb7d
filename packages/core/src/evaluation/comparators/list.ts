import type { Count } from '../types.js';
import { canonicalJson, normalizeString, toComparisonText } from './normalize.js';

export interface ListComparisonOptions {
  readonly orderMatters: boolean;
  readonly fuzzy: boolean;
}

/**
 * Compare a list field.
 *
 * Ordered lists are zipped by index: each equal pair is a true positive and every surplus or
 * missing position counts once, regardless of content. Unordered lists are compared as sets,
 * so duplicate elements collapse into one comparison unit.
 */
export function compareLists(
  automated: unknown,
  truth: readonly unknown[],
  options: ListComparisonOptions,
): Count {
  const candidates = toItems(automated);

  if (options.orderMatters) {
    const paired = Math.min(candidates.length, truth.length);
    let tp = 0;
    for (let index = 0; index < paired; index += 1) {
      if (textEquals(candidates[index], truth[index], options.fuzzy)) {
        tp += 1;
      }
    }
    return {
      tp,
      fp: Math.max(0, candidates.length - truth.length),
      fn: Math.max(0, truth.length - candidates.length),
    };
  }

  const candidateKeys = new Set(candidates.map((item) => comparisonKey(item, options.fuzzy)));
  const truthKeys = new Set(truth.map((item) => comparisonKey(item, options.fuzzy)));

  let tp = 0;
  for (const key of candidateKeys) {
    if (truthKeys.has(key)) {
      tp += 1;
    }
  }

  return {
    tp,
    fp: candidateKeys.size - tp,
    fn: truthKeys.size - tp,
  };
}

function toItems(value: unknown): readonly unknown[] {
  if (value === null || value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function textEquals(a: unknown, b: unknown, fuzzy: boolean): boolean {
  if (a === null || a === undefined || b === null || b === undefined) {
    return (a === null || a === undefined) && (b === null || b === undefined);
  }
  return normalizeString(toComparisonText(a), fuzzy) === normalizeString(toComparisonText(b), fuzzy);
}

/**
 * Set key for an element. Without normalization `"1"` and `1` stay distinct; with it, both
 * collapse to the same text.
 */
function comparisonKey(value: unknown, fuzzy: boolean): string {
  return fuzzy ? normalizeString(toComparisonText(value), true) : canonicalJson(value);
}
