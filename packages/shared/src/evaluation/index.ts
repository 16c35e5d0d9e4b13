export {
  classify,
  isAbsent,
  parseNumeric,
  outcomeLabel,
  DEFAULT_TOLERANCE,
} from './confusion';
export { aggregate, countLabels, formatMetric, formatMetricsReport } from './metrics';
export {
  loadGroundTruth,
  groundTruthFromTable,
  parseTrueValue,
  normalizeDocumentId,
  GroundTruthIndex,
  DOCUMENT_COLUMNS,
  type TruthColumn,
} from './ground-truth';
export {
  scoreResults,
  compareIterations,
  type ScoredResult,
  type ScoreReport,
  type DocumentOutcome,
  type IterationChanges,
} from './scoring';
