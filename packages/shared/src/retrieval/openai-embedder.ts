/**
 * OpenAI Embeddings Adapter
 */

import type OpenAI from 'openai';
import { config as defaultConfig, type Config } from '../config';
import { logger } from '../logger';
import { embeddingRequestsCounter } from '../metrics';
import { ServiceCallError, errorMessage } from '../errors';
import { createOpenAiClient } from '../llm/openai-chat';
import type { Embedder } from './types';

export interface OpenAiEmbedderOptions {
  config?: Config;
  client?: OpenAI;
}

export class OpenAiEmbedder implements Embedder {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAiEmbedderOptions = {}) {
    const cfg = options.config ?? defaultConfig;
    this.model = cfg.embeddingModel;
    this.client =
      options.client ?? createOpenAiClient({ ...cfg, azureEndpoint: cfg.embeddingEndpoint });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
      });
      embeddingRequestsCounter.inc({ model: this.model, status: 'success' });

      logger.debug('Embeddings received', {
        model: this.model,
        inputs: texts.length,
        promptTokens: response.usage?.prompt_tokens,
      });

      return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    } catch (error) {
      embeddingRequestsCounter.inc({ model: this.model, status: 'error' });
      throw new ServiceCallError('embedding', `Embedding request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
