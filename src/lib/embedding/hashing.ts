/**
 * Deterministic feature-hashing embedder for offline and development use.
 *
 * Word unigrams and bigrams are hashed into a fixed number of signed
 * buckets, then L2-normalised. Texts sharing vocabulary land close together,
 * which is all the retrieval path needs without a model backend.
 */

import { fnv1a } from '@/lib/utils/hash';
import type { EmbeddingProvider, EmbedOptions } from './types';

const WORD = /[\p{L}\p{N}]+/gu;

export function features(text: string): string[] {
  const words = (text.toLowerCase().match(WORD) ?? []).filter((w) => w.length > 1);
  const grams = [...words];
  for (let i = 1; i < words.length; i++) {
    grams.push(`${words[i - 1]} ${words[i]}`);
  }
  return grams;
}

export function normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector : vector.map((v) => v / norm);
}

export class HashingEmbedder implements EmbeddingProvider {
  readonly name = 'hashing';

  constructor(readonly dimensions: number = 256) {}

  async embed(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    options?.signal?.throwIfAborted();
    return texts.map((text) => this.vectorize(text));
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const feature of features(text)) {
      const hash = fnv1a(feature);
      const bucket = hash % this.dimensions;
      // Bigrams weigh half as much as words.
      const weight = feature.includes(' ') ? 0.5 : 1;
      vector[bucket] = (vector[bucket] ?? 0) + ((hash >>> 31) === 1 ? -weight : weight);
    }
    return normalize(vector);
  }
}
