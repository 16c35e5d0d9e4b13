/**
 * Scoring of extraction results against ground truth, and comparison of two
 * refinement iterations.
 */

import type {
  ConfusionLabel,
  EvaluationMetrics,
  ExtractionResult,
  GroundTruthRecord,
  OutcomeLabel,
  TrueValue,
} from '../types';
import { classify, DEFAULT_TOLERANCE, outcomeLabel } from './confusion';
import { aggregate } from './metrics';
import { GroundTruthIndex } from './ground-truth';

export interface ScoredResult {
  result: ExtractionResult;
  trueValue: TrueValue;
  label: ConfusionLabel;
  outcome: OutcomeLabel;
}

export interface ScoreReport {
  scored: ScoredResult[];
  /** Results without a ground-truth record */
  unscored: ExtractionResult[];
  metrics: EvaluationMetrics;
  /** Metrics per parameter name */
  byParameter: Map<string, EvaluationMetrics>;
}

export function scoreResults(
  results: readonly ExtractionResult[],
  groundTruth: readonly GroundTruthRecord[],
  tolerance: number = DEFAULT_TOLERANCE
): ScoreReport {
  const truth = new GroundTruthIndex(groundTruth);
  const scored: ScoredResult[] = [];
  const unscored: ExtractionResult[] = [];

  for (const result of results) {
    const trueValue = truth.get(result.documentId, result.parameterName);
    if (trueValue === undefined) {
      unscored.push(result);
      continue;
    }
    const label = classify(trueValue, result.extractedValue, tolerance);
    scored.push({ result, trueValue, label, outcome: outcomeLabel(label) });
  }

  const labelsByParameter = new Map<string, ConfusionLabel[]>();
  for (const { result, label } of scored) {
    const labels = labelsByParameter.get(result.parameterName) ?? [];
    labels.push(label);
    labelsByParameter.set(result.parameterName, labels);
  }

  return {
    scored,
    unscored,
    metrics: aggregate(scored.map((s) => s.label)),
    byParameter: new Map([...labelsByParameter].map(([name, labels]) => [name, aggregate(labels)])),
  };
}

export interface DocumentOutcome {
  documentId: string;
  /** set when outcomes of several parameters are compared together */
  parameterName?: string;
  outcome: OutcomeLabel | '';
}

export interface IterationChanges {
  failToSuccess: string[];
  successToFail: string[];
}

function outcomeKey(d: DocumentOutcome): string {
  return d.parameterName === undefined ? d.documentId : `${d.parameterName}\u0000${d.documentId}`;
}

function changeLabel(d: DocumentOutcome): string {
  return d.parameterName === undefined ? d.documentId : `${d.documentId} (${d.parameterName})`;
}

/**
 * Documents present in both iterations whose outcome flipped. Outcomes are
 * matched per (parameter, document) when they carry a parameter name.
 */
export function compareIterations(
  previous: readonly DocumentOutcome[],
  current: readonly DocumentOutcome[]
): IterationChanges {
  const before = new Map(previous.map((d) => [outcomeKey(d), d.outcome]));
  const changes: IterationChanges = { failToSuccess: [], successToFail: [] };

  for (const d of current) {
    const prior = before.get(outcomeKey(d));
    if (prior === 'Fail' && d.outcome === 'Success') {
      changes.failToSuccess.push(changeLabel(d));
    } else if (prior === 'Success' && d.outcome === 'Fail') {
      changes.successToFail.push(changeLabel(d));
    }
  }
  return changes;
}
