import { addCounts, EMPTY_COUNT } from '../counts.js';
import type { ComparisonConfig, Count } from '../types.js';
import { classifyValue, fieldValue, isPlainObject, unionKeys } from '../value.js';
import { compareLists } from './list.js';
import {
  compareBooleans,
  compareExact,
  compareNumbers,
  compareStrings,
  compareWithEmpty,
} from './scalar.js';

/**
 * Compare an automated value against ground truth and tally the outcome.
 *
 * The ground-truth side decides the comparison: it defines the expected shape, and an absent
 * truth value means the field is expected to be empty. Mismatched shapes never throw; they
 * surface as false positives and negatives. Recursion depth follows the nesting depth of the
 * ground truth.
 */
export function compareValues(automated: unknown, truth: unknown, config: ComparisonConfig): Count {
  const expected = classifyValue(truth);

  switch (expected.kind) {
    case 'boolean':
      return compareBooleans(automated, expected.value);
    case 'number':
      return compareNumbers(automated, expected.value, config.numeric_tolerance);
    case 'string':
      return compareStrings(automated, expected.value, config.fuzzy_strings);
    case 'null':
      return compareWithEmpty(automated);
    case 'list':
      return compareLists(automated, expected.items, {
        orderMatters: config.list_order_matters,
        fuzzy: config.fuzzy_strings,
      });
    case 'map':
      return compareMappings(automated, expected.fields, config);
    case 'other':
      return compareExact(automated, expected.value);
    default: {
      const exhaustiveCheck: never = expected;
      throw new Error(`Unsupported value kind: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

/**
 * Field-by-field comparison over the union of keys on both sides. A non-mapping automated
 * value is compared as an empty mapping.
 */
export function compareMappings(
  automated: unknown,
  truth: Readonly<Record<string, unknown>>,
  config: ComparisonConfig,
): Count {
  const candidate: Readonly<Record<string, unknown>> = isPlainObject(automated) ? automated : {};

  let total = EMPTY_COUNT;
  for (const field of unionKeys(truth, candidate)) {
    total = addCounts(
      total,
      compareValues(fieldValue(candidate, field), fieldValue(truth, field), config),
    );
  }
  return total;
}
