/**
 * Prompt Refinement Templates
 *
 * The meta-prompt asks the model for an improved extraction prompt given the
 * history of earlier prompts and how they scored.
 */

import { fillTemplate } from './extraction.template';

/**
 * {{parameter}}: parameter name
 * {{history}}: "Prompt / Extracted / True / Success" blocks separated by ---
 */
export const REFINEMENT_META_PROMPT_TEMPLATE = `You improve prompts that extract epidemiological parameters from medical research articles with a large language model.

### Objective:
Write a prompt that extracts only the **{{parameter}}** from the text of a research article. Below is the history of earlier prompts for this parameter. Each block gives:
- the prompt that was used
- the value the model extracted
- the ground-truth value
- whether the extraction was scored a success or a failure

### Instructions:
- Keep a retrieval instructions section in front of the task. You may rewrite it, but you must not remove it.
- Compare failed extractions with the true values and name what misled the model: vague wording, subgroup values, missing unit guidance or a value that had to be computed.
- Keep the phrasing that made successful prompts work.
- Return a single improved prompt.

### Constraints:
- The prompt extracts this parameter only.
- Return the prompt as plain text with no explanation or commentary.

### Historical Prompt Examples with Performance:
{{history}}`;

export function buildRefinementMetaPrompt(parameter: string, history: string): string {
  return fillTemplate(REFINEMENT_META_PROMPT_TEMPLATE, { parameter, history });
}

/**
 * A candidate prompt is the configured retrieval instructions, the parameter
 * marker and the model's suggested prompt.
 */
export function buildCandidatePrompt(
  retrievalInstructions: string,
  parameter: string,
  suggestion: string
): string {
  return `${retrievalInstructions}

**Parameter to Extract:** ${parameter}
${suggestion.trim()}`;
}
