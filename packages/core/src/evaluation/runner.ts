import { aggregateEvaluations } from './aggregator.js';
import type { AnnotationCorpus } from './loaders/annotations-loader.js';
import { evaluateItem } from './record-evaluator.js';
import type { AggregatedMetrics, ComparisonConfig, ItemEvaluation } from './types.js';

export interface EvaluateCorpusOptions {
  /** Called once per paper, in corpus order, right after it is evaluated. */
  readonly onResult?: (paperId: string, evaluation: ItemEvaluation) => void;
}

export interface CorpusEvaluation {
  readonly byPaper: Readonly<Record<string, ItemEvaluation>>;
  readonly summary: AggregatedMetrics;
}

/**
 * Evaluate every paper of a corpus and aggregate the results.
 */
export function evaluateCorpus(
  corpus: AnnotationCorpus,
  config: ComparisonConfig,
  options: EvaluateCorpusOptions = {},
): CorpusEvaluation {
  const evaluations: [string, ItemEvaluation][] = [];

  for (const [paperId, paper] of corpus.papers) {
    const evaluation = evaluateItem(
      paperId,
      paper.automated_extraction,
      paper.ground_truth,
      config,
    );
    evaluations.push([paperId, evaluation]);
    options.onResult?.(paperId, evaluation);
  }

  return {
    byPaper: Object.fromEntries(evaluations),
    summary: aggregateEvaluations(evaluations.map(([, evaluation]) => evaluation)),
  };
}
