/**
 * Glue between an embedding provider and a vector index: embeds chunks in
 * batches (each batch with its own deadline and retry budget) and answers
 * text queries.
 */

import { EmbeddingFailureError, PipelineError, TimeoutError, errorMessage } from '@/lib/errors';
import type { EmbeddingProvider, EmbeddingPurpose } from '@/lib/embedding/types';
import { withRetry, withTimeout } from '@/lib/utils/async';
import type { Chunk } from '@/types/document';
import type { IndexEntry, IndexHit, IndexQueryOptions, VectorIndex } from './types';

const DEFAULT_RETRY_DELAYS = [1000, 2000, 4000, 8000];

export interface EmbeddingIndexOptions {
  timeoutMs: number;
  maxRetries: number;
  retryDelays?: number[];
  batchSize?: number;
}

export class EmbeddingIndex {
  private readonly batchSize: number;
  private readonly retryDelays: number[];

  constructor(
    readonly provider: EmbeddingProvider,
    readonly index: VectorIndex,
    private readonly options: EmbeddingIndexOptions
  ) {
    this.batchSize = options.batchSize ?? 64;
    this.retryDelays = options.retryDelays ?? DEFAULT_RETRY_DELAYS;
  }

  async embedChunks(chunks: Chunk[], signal?: AbortSignal): Promise<IndexEntry[]> {
    const entries: IndexEntry[] = [];
    for (let i = 0; i < chunks.length; i += this.batchSize) {
      const batch = chunks.slice(i, i + this.batchSize);
      const vectors = await this.embed(
        batch.map((c) => c.text),
        'document',
        signal
      );
      batch.forEach((chunk, j) => {
        const vector = vectors[j];
        if (!vector) throw new EmbeddingFailureError(`No vector returned for chunk ${chunk.id}`, undefined, false);
        entries.push({ documentId: chunk.documentId, chunkId: chunk.id, vector });
      });
    }
    return entries;
  }

  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embed([text], 'query', signal);
    if (!vector) throw new EmbeddingFailureError('No vector returned for query', undefined, false);
    return vector;
  }

  async queryText(
    text: string,
    k: number,
    options?: IndexQueryOptions & { signal?: AbortSignal }
  ): Promise<IndexHit[]> {
    const vector = await this.embedQuery(text, options?.signal);
    return this.index.query(vector, k, { documentIds: options?.documentIds });
  }

  private async embed(texts: string[], purpose: EmbeddingPurpose, signal?: AbortSignal): Promise<number[][]> {
    try {
      const vectors = await withRetry(
        () =>
          withTimeout(
            (timeoutSignal) => this.provider.embed(texts, { signal: timeoutSignal, purpose }),
            this.options.timeoutMs,
            `embed ${texts.length} texts`,
            signal
          ),
        {
          retries: this.options.maxRetries,
          delays: this.retryDelays,
          shouldRetry: (error) => !(error instanceof PipelineError) || error.retryable,
          onRetry: (error, attempt, delayMs) =>
            console.warn(
              `[Embedding] ${this.provider.name} failed (${errorMessage(error)}), retry ${attempt}/${this.options.maxRetries} in ${delayMs}ms`
            ),
          signal,
        }
      );

      if (vectors.length !== texts.length) {
        throw new EmbeddingFailureError(
          `${this.provider.name} returned ${vectors.length} vectors for ${texts.length} texts`,
          undefined,
          false
        );
      }
      return vectors;
    } catch (error) {
      if (signal?.aborted) throw error;
      if (error instanceof EmbeddingFailureError && !error.retryable) throw error;
      const reason = error instanceof TimeoutError ? `timed out after ${this.options.timeoutMs}ms` : errorMessage(error);
      throw new EmbeddingFailureError(`Embedding with ${this.provider.name} failed: ${reason}`, error, false);
    }
  }
}
