/**
 * Flat in-memory vector index with cosine similarity ranking.
 */

import { logger } from '../logger';
import { ServiceCallError } from '../errors';
import type { ScoredChunk } from '../types';
import type { Embedder, QueryFilter, VectorIndex } from './types';

interface IndexEntry {
  documentId: string;
  chunkIndex: number;
  text: string;
  vector: number[];
  /** Insertion sequence, used to break score ties */
  seq: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new ServiceCallError(
      'embedding',
      `Embedding dimension mismatch: ${a.length} vs ${b.length}`
    );
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export interface InMemoryVectorIndexOptions {
  /** Texts per embedding request */
  batchSize?: number;
}

export class InMemoryVectorIndex implements VectorIndex {
  private entries: IndexEntry[] = [];
  private nextSeq = 0;
  private readonly batchSize: number;

  constructor(
    private readonly embedder: Embedder,
    options: InMemoryVectorIndexOptions = {}
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? 16);
  }

  get size(): number {
    return this.entries.length;
  }

  async add(documentId: string, chunks: string[]): Promise<void> {
    const pending = chunks
      .map((text, chunkIndex) => ({ text, chunkIndex }))
      .filter((chunk) => chunk.text.trim() !== '');
    if (pending.length === 0) {
      return;
    }

    const vectors: number[][] = [];
    for (let start = 0; start < pending.length; start += this.batchSize) {
      const batch = pending.slice(start, start + this.batchSize);
      const embedded = await this.embedder.embed(batch.map((c) => c.text));
      if (embedded.length !== batch.length) {
        throw new ServiceCallError(
          'embedding',
          `Expected ${batch.length} embeddings, received ${embedded.length}`
        );
      }
      vectors.push(...embedded);
    }

    pending.forEach((chunk, i) => {
      this.entries.push({
        documentId,
        chunkIndex: chunk.chunkIndex,
        text: chunk.text,
        vector: vectors[i],
        seq: this.nextSeq++,
      });
    });

    logger.debug('Chunks indexed', { documentId, added: pending.length, indexSize: this.size });
  }

  async query(text: string, k: number, filter: QueryFilter = {}): Promise<ScoredChunk[]> {
    const candidates = filter.documentId === undefined
      ? this.entries
      : this.entries.filter((e) => e.documentId === filter.documentId);
    if (k <= 0 || candidates.length === 0) {
      return [];
    }

    const [queryVector] = await this.embedder.embed([text]);
    if (!queryVector) {
      throw new ServiceCallError('embedding', 'No embedding returned for query');
    }

    return candidates
      .map((entry) => ({ entry, score: cosineSimilarity(queryVector, entry.vector) }))
      .sort((a, b) => b.score - a.score || a.entry.seq - b.entry.seq)
      .slice(0, k)
      .map(({ entry, score }) => ({
        documentId: entry.documentId,
        chunkIndex: entry.chunkIndex,
        text: entry.text,
        score,
      }));
  }

  reset(): void {
    this.entries = [];
    this.nextSeq = 0;
  }
}
