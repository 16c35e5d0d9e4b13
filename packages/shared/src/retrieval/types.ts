import type { ScoredChunk } from '../types';

/**
 * Embedding capability: one vector per input text, in input order.
 */
export interface Embedder {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

export interface QueryFilter {
  /** Only return chunks added for this document */
  documentId?: string;
}

export interface VectorIndex {
  readonly size: number;
  add(documentId: string, chunks: string[]): Promise<void>;
  /** At most k chunks, by descending score; ties keep insertion order */
  query(text: string, k: number, filter?: QueryFilter): Promise<ScoredChunk[]>;
  /** Drop every stored vector */
  reset(): void;
}
