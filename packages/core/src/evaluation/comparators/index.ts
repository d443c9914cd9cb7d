export { compareLists, type ListComparisonOptions } from './list.js';
export { canonicalJson, normalizeString, toComparisonText, toNumber } from './normalize.js';
export {
  compareBooleans,
  compareExact,
  compareNumbers,
  compareStrings,
  compareWithEmpty,
} from './scalar.js';
export { compareMappings, compareValues } from './value-comparator.js';
