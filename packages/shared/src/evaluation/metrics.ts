/**
 * Aggregate metrics over confusion counts. A metric whose formula has a zero
 * denominator is null.
 */

import type { ConfusionCounts, ConfusionLabel, EvaluationMetrics, MetricValue } from '../types';

export function countLabels(labels: readonly ConfusionLabel[]): ConfusionCounts {
  const counts: ConfusionCounts = { TP: 0, TN: 0, FP: 0, FN: 0 };
  for (const label of labels) {
    counts[label] += 1;
  }
  return counts;
}

function safeDivide(numerator: number, denominator: number): MetricValue {
  return denominator === 0 ? null : numerator / denominator;
}

function isLabelList(
  input: readonly ConfusionLabel[] | ConfusionCounts
): input is readonly ConfusionLabel[] {
  return Array.isArray(input);
}

export function aggregate(input: readonly ConfusionLabel[] | ConfusionCounts): EvaluationMetrics {
  const counts: ConfusionCounts = isLabelList(input) ? countLabels(input) : { ...input };
  const { TP, TN, FP, FN } = counts;

  return {
    counts,
    sensitivity: safeDivide(TP, TP + FN),
    specificity: safeDivide(TN, TN + FP),
    accuracy: safeDivide(TP + TN, TP + TN + FP + FN),
    precision: safeDivide(TP, TP + FP),
    f1: safeDivide(2 * TP, 2 * TP + FP + FN),
    mcc: safeDivide(TP * TN - FP * FN, Math.sqrt((TP + FP) * (TP + FN) * (TN + FP) * (TN + FN))),
  };
}

/** Three decimals, or "NA" for an undefined metric */
export function formatMetric(value: MetricValue, digits = 3): string {
  return value === null ? 'NA' : value.toFixed(digits);
}

export function formatMetricsReport(metrics: EvaluationMetrics): string {
  const { TP, TN, FP, FN } = metrics.counts;
  return [
    `TP = ${TP}, TN = ${TN}, FP = ${FP}, FN = ${FN}`,
    `Sensitivity (Recall): ${formatMetric(metrics.sensitivity)}`,
    `Specificity:          ${formatMetric(metrics.specificity)}`,
    `Precision (PPV):      ${formatMetric(metrics.precision)}`,
    `Accuracy:             ${formatMetric(metrics.accuracy)}`,
    `F1-score:             ${formatMetric(metrics.f1)}`,
    `Matthews CC (MCC):    ${formatMetric(metrics.mcc)}`,
  ].join('\n');
}
