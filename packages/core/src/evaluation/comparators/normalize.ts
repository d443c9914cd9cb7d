import { isPlainObject } from '../value.js';

/**
 * Lower-case and collapse whitespace runs when `fuzzy` is set; otherwise return the text as is.
 */
export function normalizeString(text: string, fuzzy: boolean): string {
  if (!fuzzy) {
    return text;
  }
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join(' ');
}

/**
 * Deterministic JSON text for any value: object keys are sorted so that two mappings with the
 * same content produce the same key regardless of field order.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? JSON.stringify(value) : String(value);
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  if (isPlainObject(value)) {
    const entries = Object.keys(value)
      .filter((key) => value[key] !== undefined)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return String(value);
}

/**
 * Text form used when a string is expected: strings pass through, everything else is rendered
 * as canonical JSON (`3`, `true`, `["a"]`).
 */
export function toComparisonText(value: unknown): string {
  return typeof value === 'string' ? value : canonicalJson(value);
}

/**
 * Convert a value to a number, returning null if not possible. Booleans read as 1 and 0;
 * strings must be numeric in full after trimming.
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return null;
    }
    const num = Number(trimmed);
    return Number.isNaN(num) ? null : num;
  }
  return null;
}

/**
 * Truthiness as an annotator reads it: empty strings, lists and mappings count as "no".
 */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isPlainObject(value)) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}
