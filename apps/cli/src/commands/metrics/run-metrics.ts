import path from 'node:path';

import {
  buildMetricsReport,
  type ComparisonConfigOverrides,
  countAnnotated,
  evaluateCorpus,
  formatItemProgress,
  formatNarrativeReport,
  loadAnnotationCorpus,
  loadComparisonConfig,
  type MetricsReport,
  resolveComparisonConfig,
} from '@fieldcheck/core';

import { logWarning } from '../../utils/logging.js';
import { writeMetricsReport, writeNarrativeReport } from './output-writer.js';

export interface RunMetricsOptions {
  readonly annotationFiles: readonly string[];
  readonly outputPath: string;
  readonly reportPath: string;
  readonly configPath?: string;
  readonly overrides?: ComparisonConfigOverrides;
  readonly cwd?: string;
}

export interface RunMetricsResult {
  readonly report: MetricsReport;
  readonly narrative: string;
  readonly outputPath: string;
  readonly reportPath: string;
}

export async function runMetricsCommand(options: RunMetricsOptions): Promise<RunMetricsResult> {
  const cwd = options.cwd ?? process.cwd();
  const corpus = await loadAnnotationCorpus(
    options.annotationFiles.map((filePath) => path.resolve(cwd, filePath)),
  );
  console.log(`Loaded ${corpus.papers.size} validation papers`);

  const annotated = countAnnotated(corpus);
  console.log(`Papers with ground truth: ${annotated}`);
  if (annotated === 0) {
    throw new Error(
      "No ground truth annotations found. Fill in the 'ground_truth' field for each paper in the annotation file.",
    );
  }

  const fileConfig = options.configPath
    ? await loadComparisonConfig(path.resolve(cwd, options.configPath))
    : {};
  const config = resolveComparisonConfig(fileConfig, options.overrides);

  const { byPaper, summary } = evaluateCorpus(corpus, config, {
    onResult: (paperId, evaluation) => {
      switch (evaluation.status) {
        case 'evaluated':
          console.log(formatItemProgress(paperId, evaluation));
          break;
        case 'invalid':
          logWarning(evaluation.message);
          break;
        case 'not_annotated':
          break;
        default: {
          const exhaustiveCheck: never = evaluation;
          throw new Error(`Unknown evaluation status: ${JSON.stringify(exhaustiveCheck)}`);
        }
      }
    },
  });

  const skipped = corpus.papers.size - summary.num_papers_evaluated;
  if (skipped > 0) {
    logWarning(`${skipped} of ${corpus.papers.size} papers could not be evaluated`);
  }

  const outputPath = path.resolve(cwd, options.outputPath);
  const report = buildMetricsReport(byPaper, summary, config);
  await writeMetricsReport(outputPath, report);
  console.log(`\nDetailed metrics saved to: ${outputPath}`);

  const reportPath = path.resolve(cwd, options.reportPath);
  const narrative = formatNarrativeReport(byPaper, summary);
  await writeNarrativeReport(reportPath, narrative);
  console.log(narrative);
  console.log(`Validation report saved to: ${reportPath}`);

  return { report, narrative, outputPath, reportPath };
}
