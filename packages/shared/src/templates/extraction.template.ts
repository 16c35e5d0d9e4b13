/**
 * Two-Stage Extraction Templates
 *
 * Stage 1 (discovery) lets the model reason freely about each parameter.
 * Stage 2 (formatting) turns that reasoning into one value per parameter.
 */

import type { ParameterSpec } from '../types';
import { NOT_FOUND } from '../types';
import type { ChatMessage, JsonSchemaFormat } from './types';

/**
 * Stage 1 user message carrying the document context.
 * {{context}} is the full text or the retrieved excerpts.
 */
export const STAGE1_CONTEXT_TEMPLATE = `This is the article text:
{{context}}

`;

/**
 * Parameter block sent in both stages.
 * {{parameters}} is one "- name: description" line per parameter.
 */
export const PARAMETERS_TEMPLATE = `These are the requested parameters:
{{parameters}}`;

/**
 * Stage 2 user message carrying the Stage 1 response.
 */
export const STAGE2_TEXT_TEMPLATE = `This is the text:
{{stage1}}

`;

/**
 * Replace {{name}} placeholders in a single pass. Unknown placeholders are
 * left in place; inserted values are never re-scanned.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}

export function formatParameterBlock(parameters: readonly ParameterSpec[]): string {
  return parameters
    .map((p) => (p.description ? `- ${p.name}: ${p.description}` : `- ${p.name}`))
    .join('\n');
}

export function buildStage1Messages(
  systemPrompt: string,
  context: string,
  parameters: readonly ParameterSpec[]
): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: fillTemplate(STAGE1_CONTEXT_TEMPLATE, { context }) },
    {
      role: 'user',
      content: fillTemplate(PARAMETERS_TEMPLATE, { parameters: formatParameterBlock(parameters) }),
    },
  ];
}

export function buildStage2Messages(
  refinePrompt: string,
  stage1: string,
  parameters: readonly ParameterSpec[]
): ChatMessage[] {
  return [
    { role: 'system', content: refinePrompt },
    { role: 'user', content: fillTemplate(STAGE2_TEXT_TEMPLATE, { stage1 }) },
    {
      role: 'user',
      content: fillTemplate(PARAMETERS_TEMPLATE, { parameters: formatParameterBlock(parameters) }),
    },
  ];
}

/**
 * JSON Schema for the Stage 2 response (OpenAI Structured Outputs):
 * one required string property per parameter name.
 */
export function buildStructuredOutputSchema(parameters: readonly ParameterSpec[]): JsonSchemaFormat {
  const properties: Record<string, unknown> = {};
  for (const parameter of parameters) {
    properties[parameter.name] = {
      type: 'string',
      description: parameter.description
        ? `${parameter.description} Use "${NOT_FOUND}" when the value cannot be determined.`
        : `Use "${NOT_FOUND}" when the value cannot be determined.`,
    };
  }

  return {
    name: 'parameter_values',
    strict: true,
    schema: {
      type: 'object',
      additionalProperties: false,
      required: parameters.map((p) => p.name),
      properties,
    },
  };
}
