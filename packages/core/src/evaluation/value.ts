/**
 * Tagged view of a value whose shape is only known at run time.
 *
 * Ground truth decides how a field is compared, so the comparator classifies the truth side
 * once and switches over `kind`. Absent values (`undefined`) classify as `null`. Anything
 * outside the JSON vocabulary (bigint, functions, class instances) is `other`.
 */
export type ClassifiedValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'list'; readonly items: readonly unknown[] }
  | { readonly kind: 'map'; readonly fields: Readonly<Record<string, unknown>> }
  | { readonly kind: 'other'; readonly value: unknown };

export type ValueKind = ClassifiedValue['kind'];

const NULL_VALUE: ClassifiedValue = { kind: 'null' };

export function classifyValue(value: unknown): ClassifiedValue {
  if (value === null || value === undefined) {
    return NULL_VALUE;
  }
  switch (typeof value) {
    case 'boolean':
      return { kind: 'boolean', value };
    case 'number':
      return { kind: 'number', value };
    case 'string':
      return { kind: 'string', value };
    default:
      break;
  }
  if (Array.isArray(value)) {
    return { kind: 'list', items: value };
  }
  if (isPlainObject(value)) {
    return { kind: 'map', fields: value };
  }
  return { kind: 'other', value };
}

export function isPlainObject(value: unknown): value is Readonly<Record<string, unknown>> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Values an annotator would write for "nothing extracted".
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined || value === '') {
    return true;
  }
  return Array.isArray(value) && value.length === 0;
}

/**
 * Field names present on either side: truth order first, then automated-only fields.
 */
export function unionKeys(
  truth: Readonly<Record<string, unknown>>,
  automated: Readonly<Record<string, unknown>>,
): string[] {
  const keys = new Set(Object.keys(truth));
  for (const key of Object.keys(automated)) {
    keys.add(key);
  }
  return Array.from(keys);
}

/**
 * Own field of a mapping; inherited members such as `constructor` read as absent.
 */
export function fieldValue(fields: Readonly<Record<string, unknown>>, field: string): unknown {
  return Object.hasOwn(fields, field) ? fields[field] : undefined;
}

/**
 * Structural equality over classified values.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === null || b === null) return a === b;
  if (typeof a !== typeof b) return false;
  if (typeof a !== 'object') return a === b;

  if (Array.isArray(a) !== Array.isArray(b)) return false;
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((val, i) => deepEqual(val, b[i]));
  }

  if (!isPlainObject(a) || !isPlainObject(b)) return false;
  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]));
}
