import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse } from 'yaml';
import { z } from 'zod';

import type { ComparisonConfig } from './types.js';

export const DEFAULT_COMPARISON_CONFIG: ComparisonConfig = Object.freeze({
  numeric_tolerance: 0,
  fuzzy_strings: false,
  list_order_matters: false,
});

/**
 * Comparison options as authored in a YAML or JSON config file.
 */
export const comparisonConfigSchema = z
  .object({
    numeric_tolerance: z
      .number()
      .finite('numeric_tolerance must be a finite number')
      .nonnegative('numeric_tolerance must be >= 0')
      .optional(),
    fuzzy_strings: z.boolean().optional(),
    list_order_matters: z.boolean().optional(),
  })
  .strict();

export type ComparisonConfigInput = z.infer<typeof comparisonConfigSchema>;

/**
 * Values given on the command line; `undefined` means "not given".
 */
export interface ComparisonConfigOverrides {
  readonly numericTolerance?: number;
  readonly fuzzyStrings?: boolean;
  readonly listOrderMatters?: boolean;
}

export function parseComparisonConfig(input: unknown, source = 'comparison config'): ComparisonConfigInput {
  const result = comparisonConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new Error(`Invalid ${source}:\n${formatZodIssues(result.error)}`);
  }
  return result.data;
}

export async function loadComparisonConfig(configPath: string): Promise<ComparisonConfigInput> {
  const resolvedPath = path.isAbsolute(configPath)
    ? path.normalize(configPath)
    : path.resolve(configPath);

  const raw = await readFile(resolvedPath, 'utf8');
  // JSON is a subset of YAML, so one parser covers both formats.
  const parsed: unknown = parse(raw);
  return parseComparisonConfig(parsed, `comparison config at ${resolvedPath}`);
}

/**
 * Command-line overrides take precedence over the config file, which takes precedence over the
 * defaults.
 */
export function resolveComparisonConfig(
  fileConfig: ComparisonConfigInput = {},
  overrides: ComparisonConfigOverrides = {},
): ComparisonConfig {
  const numericTolerance =
    overrides.numericTolerance ??
    fileConfig.numeric_tolerance ??
    DEFAULT_COMPARISON_CONFIG.numeric_tolerance;

  if (!Number.isFinite(numericTolerance) || numericTolerance < 0) {
    throw new Error(`numeric_tolerance must be a non-negative number, got ${numericTolerance}`);
  }

  return Object.freeze({
    numeric_tolerance: numericTolerance,
    fuzzy_strings:
      overrides.fuzzyStrings ?? fileConfig.fuzzy_strings ?? DEFAULT_COMPARISON_CONFIG.fuzzy_strings,
    list_order_matters:
      overrides.listOrderMatters ??
      fileConfig.list_order_matters ??
      DEFAULT_COMPARISON_CONFIG.list_order_matters,
  });
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  - ${location}: ${issue.message}`;
    })
    .join('\n');
}
