import { IndexWriteError } from '@/lib/errors';
import { KeyedMutex } from '@/lib/utils/async';
import type { IndexEntry, IndexHit, IndexQueryOptions, VectorIndex } from './types';
import { cosineSimilarity, topK } from './vector-math';

/** In-process index for development and tests. */
export class MemoryVectorIndex implements VectorIndex {
  private readonly documents = new Map<string, Map<string, number[]>>();
  private readonly mutex = new KeyedMutex();

  constructor(private readonly dimensions: number | null = null) {}

  async upsert(entries: IndexEntry[]): Promise<void> {
    for (const [documentId, group] of groupByDocument(entries)) {
      await this.mutex.runExclusive(documentId, async () => {
        this.validate(documentId, group);
        const chunks = this.documents.get(documentId) ?? new Map<string, number[]>();
        for (const entry of group) chunks.set(entry.chunkId, [...entry.vector]);
        this.documents.set(documentId, chunks);
      });
    }
  }

  async query(vector: number[], k: number, options?: IndexQueryOptions): Promise<IndexHit[]> {
    const allowed = options?.documentIds ? new Set(options.documentIds) : null;
    const hits: IndexHit[] = [];
    for (const [documentId, chunks] of this.documents) {
      if (allowed && !allowed.has(documentId)) continue;
      for (const [chunkId, stored] of chunks) {
        hits.push({ documentId, chunkId, score: cosineSimilarity(vector, stored) });
      }
    }
    return topK(hits, k);
  }

  async replaceDocument(documentId: string, entries: IndexEntry[]): Promise<void> {
    await this.mutex.runExclusive(documentId, async () => {
      this.validate(documentId, entries);
      const next = new Map<string, number[]>();
      for (const entry of entries) next.set(entry.chunkId, [...entry.vector]);

      if (next.size === 0) this.documents.delete(documentId);
      else this.documents.set(documentId, next);
    });
  }

  async deleteDocument(documentId: string): Promise<number> {
    return this.mutex.runExclusive(documentId, async () => {
      const removed = this.documents.get(documentId)?.size ?? 0;
      this.documents.delete(documentId);
      return removed;
    });
  }

  async entriesFor(documentId: string): Promise<IndexEntry[]> {
    const chunks = this.documents.get(documentId);
    if (!chunks) return [];
    return [...chunks].map(([chunkId, vector]) => ({ documentId, chunkId, vector: [...vector] }));
  }

  size(): number {
    let total = 0;
    for (const chunks of this.documents.values()) total += chunks.size;
    return total;
  }

  private validate(documentId: string, entries: IndexEntry[]): void {
    for (const entry of entries) {
      if (entry.documentId !== documentId) {
        throw new IndexWriteError(documentId, new Error(`entry ${entry.chunkId} belongs to ${entry.documentId}`));
      }
      if (entry.vector.length === 0 || entry.vector.some((v) => !Number.isFinite(v))) {
        throw new IndexWriteError(documentId, new Error(`invalid vector for ${entry.chunkId}`));
      }
      if (this.dimensions !== null && entry.vector.length !== this.dimensions) {
        throw new IndexWriteError(
          documentId,
          new Error(`vector for ${entry.chunkId} has ${entry.vector.length} dimensions, expected ${this.dimensions}`)
        );
      }
    }
  }
}

export function groupByDocument(entries: IndexEntry[]): Map<string, IndexEntry[]> {
  const groups = new Map<string, IndexEntry[]>();
  for (const entry of entries) {
    const group = groups.get(entry.documentId) ?? [];
    group.push(entry);
    groups.set(entry.documentId, group);
  }
  return groups;
}
