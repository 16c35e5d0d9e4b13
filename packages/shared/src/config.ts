/**
 * Centralized Configuration
 *
 * Runtime settings come from environment variables (a local .env is loaded
 * first). Prompt and parameter files are loaded separately by the prompt library.
 */

import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  // LLM
  openaiApiKey: string;
  /** When set, requests go to Azure OpenAI instead of api.openai.com */
  azureEndpoint: string;
  azureApiVersion: string;
  llmModelChat: string;
  llmModelRefiner: string;
  llmTemperature: number;
  llmRequestTimeoutMs: number;
  /** Ask the model for a JSON-schema constrained Stage 2 response */
  structuredOutput: boolean;

  // Embeddings
  embeddingModel: string;
  embeddingEndpoint: string;
  embeddingBatchSize: number;

  // Retry policy for external calls
  maxAttempts: number;
  backoffBaseMs: number;

  // Pipeline
  ragN: number;
  tolerance: number;
  configDir: string;
  textCacheDir: string;
  maxContextChars: number;
}

export const config: Config = {
  // LLM
  openaiApiKey: process.env.OPENAI_API_KEY || process.env.OPENAI_KEY || '',
  azureEndpoint: process.env.OPENAI_ENDPOINT || '',
  azureApiVersion: process.env.OPENAI_VERSION || '2024-10-21',
  llmModelChat: process.env.LLM_MODEL_CHAT || 'gpt-4o-mini',
  llmModelRefiner: process.env.LLM_MODEL_REFINER || process.env.LLM_MODEL_CHAT || 'gpt-4o-mini',
  llmTemperature: parseFloat(process.env.LLM_TEMPERATURE || '0'),
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  structuredOutput: process.env.LLM_STRUCTURED_OUTPUT !== 'false',

  // Embeddings
  embeddingModel: process.env.EMBEDDING_MODEL || 'text-embedding-3-large',
  embeddingEndpoint: process.env.OPENAI_EMBEDDING_ENDPOINT || process.env.OPENAI_ENDPOINT || '',
  embeddingBatchSize: parseInt(process.env.EMBEDDING_BATCH_SIZE || '16', 10),

  // Retry policy for external calls
  maxAttempts: parseInt(process.env.LLM_MAX_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Pipeline
  ragN: parseInt(process.env.RAG_N || '5', 10),
  tolerance: parseFloat(process.env.EVAL_TOLERANCE || '1'),
  configDir: process.env.CONFIG_DIR || path.join(process.cwd(), 'config'),
  textCacheDir: process.env.TEXT_CACHE_DIR || path.join(process.cwd(), 'cached_texts'),
  maxContextChars: parseInt(process.env.MAX_CONTEXT_CHARS || '120000', 10),
};
