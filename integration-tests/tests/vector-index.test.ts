/**
 * In-memory vector index
 */

import { cosineSimilarity, InMemoryVectorIndex, ServiceCallError } from '@epiparam/shared';
import { FakeEmbedder } from './helpers';

const VOCABULARY = ['fatality', 'died', 'cases', 'incubation', 'days', 'obesity'];

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is 0 when either vector is all zeros', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different length', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow(ServiceCallError);
  });
});

describe('InMemoryVectorIndex', () => {
  it('returns at most k chunks sorted by non-increasing score', async () => {
    const index = new InMemoryVectorIndex(new FakeEmbedder(VOCABULARY));
    await index.add('doc1', [
      'Incubation lasted 12 days',
      'Of 398 cases, 80 died',
      'Case fatality: 80 cases died',
      'Obesity was common',
    ]);

    const hits = await index.query('fatality died cases', 2);

    expect(hits).toHaveLength(2);
    expect(hits[0].text).toBe('Case fatality: 80 cases died');
    expect(hits[1].text).toBe('Of 398 cases, 80 died');
    expect(hits[0].score).toBeGreaterThanOrEqual(hits[1].score);

    const all = await index.query('fatality died cases', 10);
    expect(all).toHaveLength(4);
    for (let i = 1; i < all.length; i++) {
      expect(all[i - 1].score).toBeGreaterThanOrEqual(all[i].score);
    }
  });

  it('breaks ties by insertion order', async () => {
    const index = new InMemoryVectorIndex(new FakeEmbedder(VOCABULARY));
    await index.add('doc1', ['obesity first', 'obesity second']);
    await index.add('doc2', ['obesity third']);

    const hits = await index.query('obesity', 3);

    expect(hits.map((h) => h.text)).toEqual(['obesity first', 'obesity second', 'obesity third']);
  });

  it('restricts results to one document', async () => {
    const index = new InMemoryVectorIndex(new FakeEmbedder(VOCABULARY));
    await index.add('doc1', ['80 cases died']);
    await index.add('doc2', ['12 cases died', 'incubation days']);

    const hits = await index.query('cases died', 5, { documentId: 'doc2' });

    expect(hits.map((h) => [h.documentId, h.chunkIndex])).toEqual([
      ['doc2', 0],
      ['doc2', 1],
    ]);
  });

  it('forgets every vector on reset', async () => {
    const embedder = new FakeEmbedder(VOCABULARY);
    const index = new InMemoryVectorIndex(embedder);
    await index.add('old-run', ['80 cases died']);

    index.reset();

    expect(index.size).toBe(0);
    expect(await index.query('cases died', 5)).toEqual([]);

    await index.add('new-run', ['obesity was common']);
    const hits = await index.query('cases died', 5);
    expect(hits.map((h) => h.documentId)).toEqual(['new-run']);
  });

  it('skips blank chunks and keeps original chunk positions', async () => {
    const embedder = new FakeEmbedder(VOCABULARY);
    const index = new InMemoryVectorIndex(embedder);

    await index.add('doc1', []);
    expect(embedder.batches).toHaveLength(0);

    await index.add('doc1', ['  ', 'cases died', '', 'obesity']);
    expect(index.size).toBe(2);

    const hits = await index.query('obesity', 1);
    expect(hits[0].chunkIndex).toBe(3);
  });

  it('embeds chunks in batches', async () => {
    const embedder = new FakeEmbedder(VOCABULARY);
    const index = new InMemoryVectorIndex(embedder, { batchSize: 2 });

    await index.add('doc1', ['a cases', 'b died', 'c days', 'd obesity', 'e fatality']);

    expect(embedder.batches.map((b) => b.length)).toEqual([2, 2, 1]);
    expect(index.size).toBe(5);
  });

  it('returns nothing for k of zero', async () => {
    const index = new InMemoryVectorIndex(new FakeEmbedder(VOCABULARY));
    await index.add('doc1', ['cases died']);
    expect(await index.query('cases', 0)).toEqual([]);
  });
});
