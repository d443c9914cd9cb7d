export {
  type CommonIssues,
  type FieldIssue,
  findCommonIssues,
  LOW_PRECISION_THRESHOLD,
  LOW_RECALL_THRESHOLD,
} from './common-issues.js';
export { formatItemProgress, formatNarrativeReport, formatPercent } from './narrative.js';
export { buildMetricsReport, type CorpusCoverage, summarizeCoverage } from './structured.js';
