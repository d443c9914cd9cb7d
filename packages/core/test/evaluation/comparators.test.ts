import { describe, expect, it } from 'vitest';

import {
  canonicalJson,
  compareLists,
  compareMappings,
  compareValues,
  normalizeString,
  toNumber,
} from '../../src/evaluation/comparators/index.js';
import type { ComparisonConfig } from '../../src/evaluation/types.js';

const exact: ComparisonConfig = {
  numeric_tolerance: 0,
  fuzzy_strings: false,
  list_order_matters: false,
};

const fuzzy: ComparisonConfig = { ...exact, fuzzy_strings: true };
const ordered: ComparisonConfig = { ...exact, list_order_matters: true };

describe('compareValues', () => {
  describe('boolean truth', () => {
    it('counts an exact match as a true positive', () => {
      expect(compareValues(true, true, exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
      expect(compareValues(false, false, exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
    });

    it('counts an extra true as a false positive', () => {
      expect(compareValues(true, false, exact)).toEqual({ tp: 0, fp: 1, fn: 0 });
    });

    it('counts a missing true as a false negative', () => {
      expect(compareValues(false, true, exact)).toEqual({ tp: 0, fp: 0, fn: 1 });
      expect(compareValues(null, true, exact)).toEqual({ tp: 0, fp: 0, fn: 1 });
    });

    it('adds nothing for an empty answer when truth is false', () => {
      expect(compareValues(null, false, exact)).toEqual({ tp: 0, fp: 0, fn: 0 });
      expect(compareValues('', false, exact)).toEqual({ tp: 0, fp: 0, fn: 0 });
    });

    it('matches the numbers 1 and 0 against true and false', () => {
      expect(compareValues(1, true, exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
      expect(compareValues(0, false, exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
      expect(compareValues(1, false, exact)).toEqual({ tp: 0, fp: 1, fn: 0 });
      expect(compareValues(0, true, exact)).toEqual({ tp: 0, fp: 0, fn: 1 });
    });

    it('adds nothing for a truthy non-boolean answer when truth is true', () => {
      expect(compareValues('yes', true, exact)).toEqual({ tp: 0, fp: 0, fn: 0 });
      expect(compareValues(2, true, exact)).toEqual({ tp: 0, fp: 0, fn: 0 });
      expect(compareValues([], true, exact)).toEqual({ tp: 0, fp: 0, fn: 1 });
    });
  });

  describe('numeric truth', () => {
    const tolerant: ComparisonConfig = { ...exact, numeric_tolerance: 0.5 };

    it('matches within the tolerance', () => {
      expect(compareValues(5.3, 5.0, tolerant)).toEqual({ tp: 1, fp: 0, fn: 0 });
      expect(compareValues(4.5, 5.0, tolerant)).toEqual({ tp: 1, fp: 0, fn: 0 });
    });

    it('counts a value outside the tolerance as both wrong and missed', () => {
      expect(compareValues(6.0, 5.0, tolerant)).toEqual({ tp: 0, fp: 1, fn: 1 });
    });

    it('requires exact equality with zero tolerance', () => {
      expect(compareValues(5, 5, exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
      expect(compareValues(5.001, 5, exact)).toEqual({ tp: 0, fp: 1, fn: 1 });
    });

    it('parses numeric strings', () => {
      expect(compareValues(' 5.2 ', 5, tolerant)).toEqual({ tp: 1, fp: 0, fn: 0 });
    });

    it('reads booleans as 1 and 0', () => {
      expect(compareValues(true, 1, exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
      expect(compareValues(false, 0, exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
      expect(compareValues(true, 0, exact)).toEqual({ tp: 0, fp: 1, fn: 1 });
    });

    it('treats non-numeric and absent answers as mismatches', () => {
      expect(compareValues('five', 5, exact)).toEqual({ tp: 0, fp: 1, fn: 1 });
      expect(compareValues(null, 5, exact)).toEqual({ tp: 0, fp: 1, fn: 1 });
      expect(compareValues(undefined, 5, exact)).toEqual({ tp: 0, fp: 1, fn: 1 });
    });
  });

  describe('string truth', () => {
    it('is case sensitive without fuzzy matching', () => {
      expect(compareValues('apis', 'Apis', exact)).toEqual({ tp: 0, fp: 1, fn: 1 });
    });

    it('ignores case and whitespace with fuzzy matching', () => {
      expect(compareValues('  APIS   mellifera ', 'Apis mellifera', fuzzy)).toEqual({
        tp: 1,
        fp: 0,
        fn: 0,
      });
    });

    it('coerces non-string answers to text', () => {
      expect(compareValues(3, '3', exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
      expect(compareValues(true, 'true', exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
    });

    it('treats an absent answer as a mismatch', () => {
      expect(compareValues(null, 'Apis', exact)).toEqual({ tp: 0, fp: 1, fn: 1 });
    });
  });

  describe('null truth', () => {
    it('accepts empty answers', () => {
      for (const empty of [null, undefined, '', []]) {
        expect(compareValues(empty, null, exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
      }
    });

    it('counts any other answer as a false positive only', () => {
      expect(compareValues('something', null, exact)).toEqual({ tp: 0, fp: 1, fn: 0 });
      expect(compareValues({}, null, exact)).toEqual({ tp: 0, fp: 1, fn: 0 });
      expect(compareValues(0, undefined, exact)).toEqual({ tp: 0, fp: 1, fn: 0 });
    });
  });

  describe('mapping truth', () => {
    it('recurses over the fields of nested objects', () => {
      const truth = { species: 'Apis', count: 3 };
      const automated = { species: 'apis', count: 3 };

      expect(compareValues(automated, truth, exact)).toEqual({ tp: 1, fp: 1, fn: 1 });
    });

    it('walks the union of keys on both sides', () => {
      const truth = { site: 'A' };
      const automated = { site: 'A', extra: 'invented' };

      expect(compareValues(automated, truth, exact)).toEqual({ tp: 1, fp: 1, fn: 0 });
    });

    it('reads keys named after Object.prototype members as absent on the other side', () => {
      expect(compareValues({}, { constructor: null }, exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
      expect(compareValues({ toString: 'x' }, {}, exact)).toEqual({ tp: 0, fp: 1, fn: 0 });
      expect(compareValues({}, { valueOf: ['a'] }, exact)).toEqual({ tp: 0, fp: 0, fn: 1 });
      expect(compareValues('oops', { hasOwnProperty: 'x' }, exact)).toEqual({
        tp: 0,
        fp: 1,
        fn: 1,
      });
    });

    it('compares a scalar answer as an empty object', () => {
      const truth = { a: 1, b: 'x' };

      expect(compareValues('oops', truth, exact)).toEqual({ tp: 0, fp: 2, fn: 2 });
    });

    it('sums counts through several levels', () => {
      const truth = {
        location: { country: 'Kenya', coords: { lat: 1.5, lon: 36.8 } },
        tags: ['a', 'b'],
      };
      const automated = {
        location: { country: 'Kenya', coords: { lat: 1.5, lon: 37 } },
        tags: ['a'],
      };

      expect(compareMappings(automated, truth, exact)).toEqual({ tp: 3, fp: 1, fn: 2 });
    });
  });

  describe('fallback', () => {
    it('uses exact equality for values outside the JSON vocabulary', () => {
      expect(compareValues(10n, 10n, exact)).toEqual({ tp: 1, fp: 0, fn: 0 });
      expect(compareValues(10, 10n, exact)).toEqual({ tp: 0, fp: 1, fn: 1 });
    });
  });
});

describe('compareLists', () => {
  it('ignores order when comparing as sets', () => {
    expect(compareValues(['a', 'b'], ['b', 'a'], exact)).toEqual({ tp: 2, fp: 0, fn: 0 });
    expect(compareValues(['b', 'a'], ['a', 'b'], exact)).toEqual({ tp: 2, fp: 0, fn: 0 });
  });

  it('collapses duplicates into one comparison unit', () => {
    expect(compareValues(['a', 'a', 'b'], ['a', 'c'], exact)).toEqual({ tp: 1, fp: 1, fn: 1 });
  });

  it('normalizes elements with fuzzy matching', () => {
    expect(compareValues(['Apis ', 'BOMBUS'], ['apis', 'bombus'], fuzzy)).toEqual({
      tp: 2,
      fp: 0,
      fn: 0,
    });
  });

  it('keeps strings and numbers distinct unless normalizing', () => {
    expect(compareValues([1], ['1'], exact)).toEqual({ tp: 0, fp: 1, fn: 1 });
    expect(compareValues([1], ['1'], fuzzy)).toEqual({ tp: 1, fp: 0, fn: 0 });
  });

  it('treats an absent answer as an empty list and a scalar as a one-element list', () => {
    expect(compareValues(null, ['a'], exact)).toEqual({ tp: 0, fp: 0, fn: 1 });
    expect(compareValues('a', ['a', 'b'], exact)).toEqual({ tp: 1, fp: 0, fn: 1 });
  });

  it('compares positionally when order matters', () => {
    expect(compareValues(['a', 'b', 'c'], ['a', 'x'], ordered)).toEqual({ tp: 1, fp: 1, fn: 0 });
    expect(compareValues(['a'], ['a', 'b', 'c'], ordered)).toEqual({ tp: 1, fp: 0, fn: 2 });
  });

  it('does not match null against the text "null" positionally', () => {
    expect(compareValues([null], ['null'], ordered)).toEqual({ tp: 0, fp: 0, fn: 0 });
    expect(compareValues(['null'], [null], ordered)).toEqual({ tp: 0, fp: 0, fn: 0 });
    expect(compareValues([null, 'a'], [null, 'a'], ordered)).toEqual({ tp: 2, fp: 0, fn: 0 });
  });

  it('counts only length differences for misplaced elements', () => {
    expect(compareValues(['b', 'a'], ['a', 'b'], ordered)).toEqual({ tp: 0, fp: 0, fn: 0 });
  });

  it('compares structured elements by content regardless of key order', () => {
    const result = compareLists([{ n: 1, site: 'A' }], [{ site: 'A', n: 1 }], {
      orderMatters: false,
      fuzzy: false,
    });

    expect(result).toEqual({ tp: 1, fp: 0, fn: 0 });
  });
});

describe('normalization helpers', () => {
  it('collapses whitespace and lower-cases only when fuzzy', () => {
    expect(normalizeString('  Hello \t  World\n', true)).toBe('hello world');
    expect(normalizeString('  Hello  World', false)).toBe('  Hello  World');
  });

  it('renders canonical JSON with sorted keys', () => {
    expect(canonicalJson({ b: [1, 'x'], a: null })).toBe('{"a":null,"b":[1,"x"]}');
    expect(canonicalJson(undefined)).toBe('null');
  });

  it('parses numbers strictly', () => {
    expect(toNumber('12.5')).toBe(12.5);
    expect(toNumber('12.5 mm')).toBeNull();
    expect(toNumber('')).toBeNull();
    expect(toNumber(true)).toBe(1);
    expect(toNumber(false)).toBe(0);
  });
});
