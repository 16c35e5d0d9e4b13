/**
 * Prompt Template Types
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Response format passed to the chat service when structured output is
 * requested (OpenAI `response_format: { type: 'json_schema' }`).
 */
export interface JsonSchemaFormat {
  name: string;
  strict: boolean;
  schema: Record<string, unknown>;
}
