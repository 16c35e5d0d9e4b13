/**
 * Evaluation Reports
 */

import {
  aggregate,
  compareIterations,
  formatMetricsReport,
  groundTruthFromTable,
  scoreResults,
  ConfigurationError,
  NOT_FOUND,
  type CsvTable,
  type DocumentOutcome,
  type EvaluationMetrics,
  type ExtractionResult,
  type IterationChanges,
  type RefinementRow,
  type ScoreReport,
} from '@epiparam/shared';

export interface IterationReport {
  iteration: number;
  rows: number;
  metrics: EvaluationMetrics;
  /** per-parameter metrics, filled when the report spans several parameters */
  byParameter: Map<string, EvaluationMetrics>;
  /** null when iteration n-1 has no rows */
  changes: IterationChanges | null;
}

/**
 * Metrics of one iteration from the labels stored in the cumulative table.
 * Each parameter keeps its own iteration counter, so without a parameter
 * filter flips are tracked per (parameter, document).
 */
export function evaluateIteration(
  rows: readonly RefinementRow[],
  iteration: number,
  parameter: string | null = null
): IterationReport {
  const selected = parameter === null ? rows : rows.filter((r) => r.parameter_name === parameter);
  const current = selected.filter((r) => r.iteration === iteration);
  const previous = selected.filter((r) => r.iteration === iteration - 1);

  if (current.length === 0) {
    throw new ConfigurationError(`No rows found for iteration ${iteration}`);
  }

  const labelsOf = (subset: readonly RefinementRow[]) =>
    subset.flatMap((r) => (r.confusion_label ? [r.confusion_label] : []));
  const parameterNames = [...new Set(current.map((r) => r.parameter_name))];
  const byParameter = new Map<string, EvaluationMetrics>();
  if (parameterNames.length > 1) {
    for (const name of parameterNames) {
      byParameter.set(name, aggregate(labelsOf(current.filter((r) => r.parameter_name === name))));
    }
  }

  const toOutcome = (r: RefinementRow): DocumentOutcome =>
    parameter === null
      ? { documentId: r.document_id, parameterName: r.parameter_name, outcome: r.outcome_label }
      : { documentId: r.document_id, outcome: r.outcome_label };

  return {
    iteration,
    rows: current.length,
    metrics: aggregate(labelsOf(current)),
    byParameter,
    changes: previous.length > 0 ? compareIterations(previous.map(toOutcome), current.map(toOutcome)) : null,
  };
}

function listOrNone(ids: string[], none: string): string {
  return ids.length > 0 ? ids.join(', ') : none;
}

export function renderIterationReport(report: IterationReport): string {
  const lines = [
    `Confusion matrix counts for iteration ${report.iteration} (${report.rows} rows):`,
    formatMetricsReport(report.metrics),
  ];
  for (const [name, metrics] of report.byParameter) {
    lines.push('', `${name}:`, formatMetricsReport(metrics));
  }
  if (report.changes === null) {
    lines.push('', `No rows for iteration ${report.iteration - 1}; comparison skipped.`);
  } else {
    lines.push(
      '',
      `Fail -> Success: ${listOrNone(report.changes.failToSuccess, 'none')}`,
      `Success -> Fail: ${listOrNone(report.changes.successToFail, 'none')}`
    );
  }
  return lines.join('\n');
}

const LONG_FORM_COLUMNS = ['document_id', 'parameter_name', 'extracted_value'];

/**
 * Rebuild extraction results from a long-form pipeline table.
 */
export function resultsFromTable(table: CsvTable, label = 'results'): ExtractionResult[] {
  const missing = LONG_FORM_COLUMNS.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new ConfigurationError(`${label} is missing columns: ${missing.join(', ')}`);
  }
  return table.rows.map((row) => ({
    documentId: row.document_id,
    parameterName: row.parameter_name,
    rawExplanation: null,
    extractedValue: row.extracted_value || NOT_FOUND,
    confidenceNotes: row.confidence_notes || null,
  }));
}

/**
 * Score results against a truth table whose columns are parameter names.
 * Parameters without a truth column stay unscored.
 */
export function evaluateExtraction(
  extracted: CsvTable,
  truth: CsvTable,
  tolerance: number
): ScoreReport {
  const results = resultsFromTable(extracted, 'extracted table');
  const parameterNames = [...new Set(results.map((r) => r.parameterName))];
  const columns = parameterNames
    .filter((name) => truth.columns.includes(name))
    .map((name) => ({ parameterName: name }));
  const records = groundTruthFromTable(truth, columns, 'truth table');
  return scoreResults(results, records, tolerance);
}

export function renderScoreReport(report: ScoreReport): string {
  const lines = [`Scored rows: ${report.scored.length}, unscored rows: ${report.unscored.length}`, ''];
  lines.push('All parameters:', formatMetricsReport(report.metrics));
  for (const [name, metrics] of report.byParameter) {
    lines.push('', `${name}:`, formatMetricsReport(metrics));
  }
  return lines.join('\n');
}
