/**
 * Confusion-Matrix Classification
 *
 * Labels one extracted value against its ground truth. The tolerance is an
 * absolute band around the true value.
 */

import type { ConfusionLabel, OutcomeLabel, TrueValue } from '../types';

export const DEFAULT_TOLERANCE = 1;

const ABSENT_VALUE = /^(not\s+found\.?|n\/?a)$/i;
// A number not glued to a preceding letter, digit or point ("R0" is not 0)
const FIRST_NUMBER = /(?<![A-Za-z\d.])-?\d+(?:\.\d+)?|(?<![A-Za-z\d])\.\d+/;

/**
 * "Not found" (any case, optional trailing period), "NA", "N/A" and blank
 * strings count as absent.
 */
export function isAbsent(value: string | number | null | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  const text = value.trim();
  return text === '' || ABSENT_VALUE.test(text);
}

/**
 * First number in the text, after removing thousands separators. A trailing
 * percent sign is ignored. Returns null when the text has no number.
 */
export function parseNumeric(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const text = value.replace(/(\d),(?=\d)/g, '$1');
  const match = FIRST_NUMBER.exec(text);
  if (!match) return null;
  const parsed = Number(match[0]);
  return Number.isFinite(parsed) ? parsed : null;
}

function normalizeText(value: string | number): string {
  return String(value).trim().toLowerCase();
}

/**
 * 1. true absent, extracted absent: TN
 * 2. true absent, extracted present: FP
 * 3. true present, extracted absent: FN
 * 4. both present and within tolerance (or equal as text when either side is
 *    not numeric): TP
 * 5. otherwise: FN
 */
export function classify(
  trueValue: TrueValue | null | undefined,
  extractedValue: string | null | undefined,
  tolerance: number = DEFAULT_TOLERANCE
): ConfusionLabel {
  const trueAbsent = isAbsent(trueValue);
  const extractedAbsent = isAbsent(extractedValue);

  if (trueAbsent) {
    return extractedAbsent ? 'TN' : 'FP';
  }
  if (extractedAbsent || trueValue === null || trueValue === undefined || !extractedValue) {
    return 'FN';
  }

  const trueNumber = parseNumeric(trueValue);
  const extractedNumber = parseNumeric(extractedValue);
  if (trueNumber !== null && extractedNumber !== null) {
    return Math.abs(trueNumber - extractedNumber) <= tolerance ? 'TP' : 'FN';
  }
  return normalizeText(trueValue) === normalizeText(extractedValue) ? 'TP' : 'FN';
}

export function outcomeLabel(label: ConfusionLabel): OutcomeLabel {
  return label === 'TP' || label === 'TN' ? 'Success' : 'Fail';
}
