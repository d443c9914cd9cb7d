import { command, flag, number, option, optional, restPositionals, string } from 'cmd-ts';

import { logError } from '../../utils/logging.js';
import { runMetricsCommand } from './run-metrics.js';
import { resolveAnnotationPaths } from './shared.js';

export const metricsCommand = command({
  name: 'metrics',
  description:
    'Compare automated extractions against ground truth and report precision, recall and F1',
  args: {
    annotations: restPositionals({
      type: string,
      displayName: 'annotations',
      description: 'Path(s) or glob(s) to annotation .json file(s) with ground truth filled in',
    }),
    output: option({
      type: string,
      long: 'output',
      short: 'o',
      description: 'Detailed metrics file; .json or .yaml (default: validation_metrics.json)',
      defaultValue: () => 'validation_metrics.json',
    }),
    report: option({
      type: string,
      long: 'report',
      description: 'Human-readable validation report (default: validation_report.txt)',
      defaultValue: () => 'validation_report.txt',
    }),
    config: option({
      type: optional(string),
      long: 'config',
      description: 'YAML or JSON file with numeric_tolerance, fuzzy_strings, list_order_matters',
    }),
    numericTolerance: option({
      type: optional(number),
      long: 'numeric-tolerance',
      description: 'Tolerance for numeric comparisons (default: 0 for exact match)',
    }),
    fuzzyStrings: flag({
      long: 'fuzzy-strings',
      description: 'Ignore case and whitespace differences when comparing strings',
    }),
    listOrderMatters: flag({
      long: 'list-order-matters',
      description: 'Compare lists by position (default: treat lists as sets)',
    }),
  },
  handler: async (args) => {
    try {
      const annotationFiles = await resolveAnnotationPaths(args.annotations, process.cwd());
      await runMetricsCommand({
        annotationFiles,
        outputPath: args.output,
        reportPath: args.report,
        configPath: args.config,
        overrides: {
          numericTolerance: args.numericTolerance,
          fuzzyStrings: args.fuzzyStrings ? true : undefined,
          listOrderMatters: args.listOrderMatters ? true : undefined,
        },
      });
    } catch (error) {
      logError(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  },
});
