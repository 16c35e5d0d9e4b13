import type { ChatMessage, JsonSchemaFormat } from '../templates/types';

export interface ChatCompletionOptions {
  /** Overrides the completer's default model */
  model?: string;
  /** Request a JSON-schema constrained response */
  responseFormat?: JsonSchemaFormat;
}

/**
 * Chat completion capability. Implementations return the assistant text or
 * throw ServiceCallError; an empty response is a failure.
 */
export interface ChatCompleter {
  readonly model: string;
  complete(messages: ChatMessage[], options?: ChatCompletionOptions): Promise<string>;
}
