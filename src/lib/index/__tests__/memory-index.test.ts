import { describe, it, expect, beforeEach } from 'vitest';
import { IndexWriteError } from '@/lib/errors';
import { MemoryVectorIndex } from '../memory-index';

describe('MemoryVectorIndex', () => {
  let index: MemoryVectorIndex;

  beforeEach(async () => {
    index = new MemoryVectorIndex(3);
    await index.upsert([
      { documentId: 'a', chunkId: 'a:0', vector: [1, 0, 0] },
      { documentId: 'a', chunkId: 'a:1', vector: [0, 1, 0] },
      { documentId: 'b', chunkId: 'b:0', vector: [0.9, 0.1, 0] },
    ]);
  });

  it('returns the k nearest entries by cosine similarity', async () => {
    const hits = await index.query([1, 0, 0], 2);
    expect(hits.map((h) => h.chunkId)).toEqual(['a:0', 'b:0']);
    expect(hits[0]?.score).toBeCloseTo(1, 10);
    expect(hits[1]?.score).toBeCloseTo(0.9 / Math.sqrt(0.82), 10);
  });

  it('restricts queries to the given documents', async () => {
    const hits = await index.query([1, 0, 0], 5, { documentIds: ['b'] });
    expect(hits.map((h) => h.chunkId)).toEqual(['b:0']);
  });

  it('replaces an existing entry on upsert', async () => {
    await index.upsert([{ documentId: 'a', chunkId: 'a:1', vector: [0, 0, 1] }]);
    const entries = await index.entriesFor('a');
    expect(entries.find((e) => e.chunkId === 'a:1')?.vector).toEqual([0, 0, 1]);
    expect(index.size()).toBe(3);
  });

  it('swaps the whole set of a document', async () => {
    await index.replaceDocument('a', [{ documentId: 'a', chunkId: 'a:0', vector: [0, 0, 1] }]);
    expect(await index.entriesFor('a')).toEqual([{ documentId: 'a', chunkId: 'a:0', vector: [0, 0, 1] }]);
  });

  it('keeps the previous set when a replacement is invalid', async () => {
    const replacement = index.replaceDocument('a', [
      { documentId: 'a', chunkId: 'a:0', vector: [0, 0, 1] },
      { documentId: 'a', chunkId: 'a:1', vector: [Number.NaN, 0, 0] },
    ]);

    await expect(replacement).rejects.toBeInstanceOf(IndexWriteError);
    expect((await index.entriesFor('a')).map((e) => e.chunkId)).toEqual(['a:0', 'a:1']);
  });

  it('rejects vectors of the wrong dimension', async () => {
    await expect(index.upsert([{ documentId: 'c', chunkId: 'c:0', vector: [1, 0] }])).rejects.toThrow(
      'has 2 dimensions, expected 3'
    );
  });

  it('deletes every entry of a document', async () => {
    expect(await index.deleteDocument('a')).toBe(2);
    expect(await index.entriesFor('a')).toEqual([]);
    const hits = await index.query([1, 0, 0], 10);
    expect(hits.every((h) => h.documentId !== 'a')).toBe(true);
  });

  it('applies concurrent replacements of one document in call order', async () => {
    await Promise.all([
      index.replaceDocument('a', [{ documentId: 'a', chunkId: 'a:0', vector: [0, 1, 0] }]),
      index.replaceDocument('a', [{ documentId: 'a', chunkId: 'a:5', vector: [0, 0, 1] }]),
    ]);
    expect((await index.entriesFor('a')).map((e) => e.chunkId)).toEqual(['a:5']);
  });
});
