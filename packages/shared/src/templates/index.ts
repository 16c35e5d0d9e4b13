/**
 * Prompt Templates
 */

export type { ChatMessage, ChatRole, JsonSchemaFormat } from './types';

export {
  STAGE1_CONTEXT_TEMPLATE,
  STAGE2_TEXT_TEMPLATE,
  PARAMETERS_TEMPLATE,
  fillTemplate,
  formatParameterBlock,
  buildStage1Messages,
  buildStage2Messages,
  buildStructuredOutputSchema,
} from './extraction.template';

export {
  REFINEMENT_META_PROMPT_TEMPLATE,
  buildRefinementMetaPrompt,
  buildCandidatePrompt,
} from './refinement.template';
