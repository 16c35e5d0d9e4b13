export type { ChatCompleter, ChatCompletionOptions } from './types';
export {
  OpenAiChatCompleter,
  createOpenAiClient,
  type ChatCompletionsClient,
  type OpenAiChatCompleterOptions,
} from './openai-chat';
export { RetryingChatCompleter, backoffDelay, type RetryPolicy, type Sleep } from './retrying-chat';
