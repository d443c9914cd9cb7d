import type {
  AggregatedMetrics,
  ComparisonConfig,
  ItemEvaluation,
  MetricsReport,
} from '../types.js';

/**
 * How many corpus items made it into the metrics, and why the rest did not.
 */
export interface CorpusCoverage {
  readonly total: number;
  readonly evaluated: number;
  readonly notAnnotated: number;
  readonly invalid: number;
}

export function buildMetricsReport(
  byPaper: Readonly<Record<string, ItemEvaluation>>,
  summary: AggregatedMetrics,
  config: ComparisonConfig,
): MetricsReport {
  return {
    summary,
    by_paper: byPaper,
    config: {
      numeric_tolerance: config.numeric_tolerance,
      fuzzy_strings: config.fuzzy_strings,
      list_order_matters: config.list_order_matters,
    },
  };
}

export function summarizeCoverage(byPaper: Readonly<Record<string, ItemEvaluation>>): CorpusCoverage {
  let evaluated = 0;
  let notAnnotated = 0;
  let invalid = 0;

  for (const evaluation of Object.values(byPaper)) {
    switch (evaluation.status) {
      case 'evaluated':
        evaluated += 1;
        break;
      case 'not_annotated':
        notAnnotated += 1;
        break;
      case 'invalid':
        invalid += 1;
        break;
      default: {
        const exhaustiveCheck: never = evaluation;
        throw new Error(`Unknown evaluation status: ${JSON.stringify(exhaustiveCheck)}`);
      }
    }
  }

  return { total: evaluated + notAnnotated + invalid, evaluated, notAnnotated, invalid };
}
