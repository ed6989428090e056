/**
 * MongoDB-backed vector index. Vectors are stored per chunk and scored in
 * process with cosine similarity.
 *
 * `replaceDocument` writes the new set under a fresh generation, then drops
 * every older generation. A failed insert removes what it wrote, so readers
 * only ever see the old set, the new set, or (briefly, between the two
 * steps) both with identical chunk ids, which `query` collapses.
 */

import { randomUUID } from 'crypto';
import { IndexWriteError, errorMessage } from '@/lib/errors';
import { IndexEntryModel } from '@/lib/db/models/index-entry';
import { KeyedMutex } from '@/lib/utils/async';
import { groupByDocument } from './memory-index';
import type { IndexEntry, IndexHit, IndexQueryOptions, VectorIndex } from './types';
import { cosineSimilarity, topK } from './vector-math';

export class MongoVectorIndex implements VectorIndex {
  private readonly mutex = new KeyedMutex();

  async upsert(entries: IndexEntry[]): Promise<void> {
    for (const [documentId, group] of groupByDocument(entries)) {
      await this.mutex.runExclusive(documentId, async () => {
        try {
          await IndexEntryModel.bulkWrite(
            group.map((entry) => ({
              updateOne: {
                filter: { documentId, chunkId: entry.chunkId },
                update: { $set: { vector: entry.vector }, $setOnInsert: { generation: randomUUID() } },
                upsert: true,
              },
            }))
          );
        } catch (error) {
          throw new IndexWriteError(documentId, error);
        }
      });
    }
  }

  async query(vector: number[], k: number, options?: IndexQueryOptions): Promise<IndexHit[]> {
    const filter = options?.documentIds ? { documentId: { $in: options.documentIds } } : {};
    const best = new Map<string, IndexHit>();

    const cursor = IndexEntryModel.find(filter).select('documentId chunkId vector').lean().cursor();
    for await (const entry of cursor) {
      const hit = { documentId: entry.documentId, chunkId: entry.chunkId, score: cosineSimilarity(vector, entry.vector) };
      const key = `${hit.documentId}\u0000${hit.chunkId}`;
      const seen = best.get(key);
      if (!seen || hit.score > seen.score) best.set(key, hit);
    }

    return topK([...best.values()], k);
  }

  async replaceDocument(documentId: string, entries: IndexEntry[]): Promise<void> {
    await this.mutex.runExclusive(documentId, async () => {
      const generation = randomUUID();

      try {
        if (entries.length > 0) {
          await IndexEntryModel.insertMany(
            entries.map((entry) => ({ documentId, chunkId: entry.chunkId, vector: entry.vector, generation })),
            { ordered: true }
          );
        }
      } catch (error) {
        await this.rollback(documentId, generation);
        throw new IndexWriteError(documentId, error);
      }

      try {
        await IndexEntryModel.deleteMany({ documentId, generation: { $ne: generation } });
      } catch (error) {
        await this.rollback(documentId, generation);
        throw new IndexWriteError(documentId, error);
      }
    });
  }

  async deleteDocument(documentId: string): Promise<number> {
    return this.mutex.runExclusive(documentId, async () => {
      try {
        const result = await IndexEntryModel.deleteMany({ documentId });
        return result.deletedCount;
      } catch (error) {
        throw new IndexWriteError(documentId, error);
      }
    });
  }

  async entriesFor(documentId: string): Promise<IndexEntry[]> {
    const rows = await IndexEntryModel.find({ documentId }).sort({ createdAt: -1 }).lean();
    const latest = new Map<string, IndexEntry>();
    for (const row of rows) {
      if (!latest.has(row.chunkId)) {
        latest.set(row.chunkId, { documentId, chunkId: row.chunkId, vector: row.vector });
      }
    }
    return [...latest.values()];
  }

  private async rollback(documentId: string, generation: string): Promise<void> {
    try {
      await IndexEntryModel.deleteMany({ documentId, generation });
    } catch (error) {
      console.error(`[Index] Rollback of generation ${generation} for ${documentId} failed: ${errorMessage(error)}`);
    }
  }
}
