/**
 * Gemini embeddings (`text-embedding-004`), sent in batches.
 *
 * Retries and deadlines are applied by the caller (EmbeddingIndex); this
 * class only maps texts to one batch request per slice and checks shapes.
 */

import { GoogleGenerativeAI, TaskType, type GenerativeModel } from '@google/generative-ai';
import { EmbeddingFailureError, errorMessage } from '@/lib/errors';
import type { EmbeddingProvider, EmbedOptions } from './types';

export const GEMINI_EMBEDDING_MODEL = 'text-embedding-004';
/** The API accepts at most 100 requests per batch call. */
const MAX_BATCH = 100;

export interface GeminiEmbedderOptions {
  apiKey: string;
  model?: string;
  dimensions?: number;
  batchSize?: number;
}

export class GeminiEmbedder implements EmbeddingProvider {
  readonly name = 'gemini';
  readonly dimensions: number;
  private readonly model: GenerativeModel;
  private readonly batchSize: number;

  constructor(options: GeminiEmbedderOptions) {
    const genAI = new GoogleGenerativeAI(options.apiKey);
    this.model = genAI.getGenerativeModel({ model: options.model ?? GEMINI_EMBEDDING_MODEL });
    this.dimensions = options.dimensions ?? 768;
    this.batchSize = Math.min(options.batchSize ?? MAX_BATCH, MAX_BATCH);
  }

  async embed(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    const taskType = options?.purpose === 'query' ? TaskType.RETRIEVAL_QUERY : TaskType.RETRIEVAL_DOCUMENT;
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const embeddings = await this.request(batch, taskType, options?.signal);

      if (embeddings.length !== batch.length) {
        throw new EmbeddingFailureError(
          `Gemini returned ${embeddings.length} embeddings for ${batch.length} texts`,
          undefined,
          false
        );
      }
      for (const values of embeddings) {
        if (values.length !== this.dimensions) {
          throw new EmbeddingFailureError(
            `Gemini returned ${values.length} dimensions, expected ${this.dimensions}`,
            undefined,
            false
          );
        }
        vectors.push(values);
      }
    }

    return vectors;
  }

  private async request(batch: string[], taskType: TaskType, signal?: AbortSignal): Promise<number[][]> {
    try {
      const response = await this.model.batchEmbedContents(
        {
          requests: batch.map((text) => ({
            content: { role: 'user', parts: [{ text }] },
            taskType,
          })),
        },
        { signal }
      );
      return response.embeddings.map((e) => e.values);
    } catch (error) {
      throw new EmbeddingFailureError(`Gemini embedding failed: ${errorMessage(error)}`, error, isTransient(error));
    }
  }
}

/** Rate limits, server errors and network failures are worth another attempt. */
function isTransient(error: unknown): boolean {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status === 429 || error.status >= 500;
  }
  return true;
}
