export type { IndexEntry, IndexHit, IndexQueryOptions, VectorIndex } from './types';
export { MemoryVectorIndex } from './memory-index';
export { MongoVectorIndex } from './mongo-index';
export { EmbeddingIndex, type EmbeddingIndexOptions } from './embedding-index';
export { cosineSimilarity } from './vector-math';
