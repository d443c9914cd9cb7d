import { EMPTY_COUNT, MATCH, MISMATCH, MISSED, SPURIOUS, matchCount } from '../counts.js';
import type { Count } from '../types.js';
import { deepEqual, isEmptyValue } from '../value.js';
import { isTruthy, normalizeString, toComparisonText, toNumber } from './normalize.js';

/**
 * Boolean fields: an extra `true` is a false positive, a missing `true` a false negative.
 * Only `true`/`false` or the numbers 1/0 match. Any other answer that agrees with the truth in
 * truthiness is a true negative and adds nothing.
 */
export function compareBooleans(automated: unknown, truth: boolean): Count {
  if (automated === truth || automated === (truth ? 1 : 0)) {
    return MATCH;
  }
  const predicted = isTruthy(automated);
  if (predicted && !truth) {
    return SPURIOUS;
  }
  if (!predicted && truth) {
    return MISSED;
  }
  return EMPTY_COUNT;
}

export function compareNumbers(automated: unknown, truth: number, tolerance: number): Count {
  const candidate = toNumber(automated);
  if (candidate === null) {
    return MISMATCH;
  }
  return matchCount(Math.abs(candidate - truth) <= tolerance);
}

export function compareStrings(automated: unknown, truth: string, fuzzy: boolean): Count {
  if (automated === null || automated === undefined) {
    return MISMATCH;
  }
  const candidate = normalizeString(toComparisonText(automated), fuzzy);
  return matchCount(candidate === normalizeString(truth, fuzzy));
}

/**
 * Ground truth says the field is empty: nothing can be missed, only spuriously filled.
 */
export function compareWithEmpty(automated: unknown): Count {
  return isEmptyValue(automated) ? MATCH : SPURIOUS;
}

export function compareExact(automated: unknown, truth: unknown): Count {
  return matchCount(deepEqual(automated, truth));
}
