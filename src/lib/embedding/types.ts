export type EmbeddingPurpose = 'document' | 'query';

export interface EmbedOptions {
  signal?: AbortSignal;
  /** Some backends embed queries and passages differently. */
  purpose?: EmbeddingPurpose;
}

/** Turns texts into vectors of a fixed dimension, one per input, in input order. */
export interface EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  embed(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}
