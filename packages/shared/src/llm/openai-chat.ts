/**
 * OpenAI Chat Completion Adapter
 *
 * Talks to api.openai.com, or to Azure OpenAI when an endpoint is configured.
 */

import OpenAI, { AzureOpenAI } from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { config as defaultConfig, type Config } from '../config';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import { ConfigurationError, ServiceCallError, errorMessage } from '../errors';
import type { ChatMessage } from '../templates/types';
import type { ChatCompleter, ChatCompletionOptions } from './types';

export function createOpenAiClient(cfg: Config = defaultConfig): OpenAI {
  if (!cfg.openaiApiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is not set');
  }
  if (cfg.azureEndpoint) {
    return new AzureOpenAI({
      endpoint: cfg.azureEndpoint,
      apiKey: cfg.openaiApiKey,
      apiVersion: cfg.azureApiVersion,
      timeout: cfg.llmRequestTimeoutMs,
      maxRetries: 0,
    });
  }
  return new OpenAI({
    apiKey: cfg.openaiApiKey,
    timeout: cfg.llmRequestTimeoutMs,
    maxRetries: 0,
  });
}

function toOpenAiMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/** The slice of the OpenAI client the completer calls */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAiChatCompleterOptions {
  config?: Config;
  /** Default model; falls back to config.llmModelChat */
  model?: string;
  client?: ChatCompletionsClient;
}

export class OpenAiChatCompleter implements ChatCompleter {
  readonly model: string;
  private readonly client: ChatCompletionsClient;
  private readonly temperature: number;

  constructor(options: OpenAiChatCompleterOptions = {}) {
    const cfg = options.config ?? defaultConfig;
    this.model = options.model ?? cfg.llmModelChat;
    this.temperature = cfg.llmTemperature;
    this.client = options.client ?? createOpenAiClient(cfg);
  }

  async complete(messages: ChatMessage[], options: ChatCompletionOptions = {}): Promise<string> {
    const model = options.model ?? this.model;
    const startTime = Date.now();

    logger.debug('Sending chat completion request', {
      model,
      messageCount: messages.length,
      promptChars: messages.reduce((sum, m) => sum + m.content.length, 0),
      structured: options.responseFormat !== undefined,
    });

    try {
      const response = await this.client.chat.completions.create({
        model,
        messages: messages.map(toOpenAiMessage),
        temperature: this.temperature,
        ...(options.responseFormat
          ? {
              response_format: {
                type: 'json_schema' as const,
                json_schema: options.responseFormat,
              },
            }
          : {}),
      });

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model }, duration);

      const content = response.choices[0]?.message?.content;
      if (!content || !content.trim()) {
        throw new ServiceCallError('chat', `Empty chat completion response from ${model}`);
      }

      llmRequestsCounter.inc({ model, status: 'success' });
      logger.debug('Chat completion received', {
        model,
        requestId: response.id,
        finishReason: response.choices[0]?.finish_reason,
        responseChars: content.length,
        durationSeconds: duration,
      });

      return content;
    } catch (error) {
      llmRequestsCounter.inc({ model, status: 'error' });
      if (error instanceof ServiceCallError) {
        throw error;
      }
      throw new ServiceCallError('chat', `Chat completion failed (${model}): ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
