export type { Embedder, VectorIndex, QueryFilter } from './types';
export {
  InMemoryVectorIndex,
  cosineSimilarity,
  type InMemoryVectorIndexOptions,
} from './vector-index';
export { OpenAiEmbedder, type OpenAiEmbedderOptions } from './openai-embedder';
