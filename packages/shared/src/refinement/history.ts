import type { RefinementRow } from '../types';

/**
 * Earlier prompts for one parameter with their results, as blocks separated
 * by "---" lines.
 */
export function buildPromptHistory(rows: readonly RefinementRow[], parameterName: string): string {
  return rows
    .filter((row) => row.parameter_name === parameterName)
    .map(
      (row) =>
        `Prompt: ${row.prompt_text.trim()}\n` +
        `Extracted: ${row.extracted_value.trim()}\n` +
        `True: ${row.true_value.trim()}\n` +
        `Success: ${row.outcome_label}\n`
    )
    .join('\n---\n');
}

/**
 * Highest iteration recorded for the parameter, or 0.
 */
export function lastIteration(rows: readonly RefinementRow[], parameterName: string): number {
  return rows
    .filter((row) => row.parameter_name === parameterName)
    .reduce((max, row) => Math.max(max, row.iteration), 0);
}

/**
 * Prompt of the last row of the highest recorded iteration.
 */
export function lastPrompt(rows: readonly RefinementRow[], parameterName: string): string | null {
  const iteration = lastIteration(rows, parameterName);
  const matching = rows.filter(
    (row) => row.parameter_name === parameterName && row.iteration === iteration && row.prompt_text
  );
  return matching.length > 0 ? matching[matching.length - 1].prompt_text : null;
}
