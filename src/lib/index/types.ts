export interface IndexEntry {
  documentId: string;
  chunkId: string;
  vector: number[];
}

export interface IndexHit {
  documentId: string;
  chunkId: string;
  /** Cosine similarity, -1 to 1. */
  score: number;
}

export interface IndexQueryOptions {
  /** Restrict the search to these documents. */
  documentIds?: string[];
}

/**
 * Nearest-neighbour store keyed by (documentId, chunkId).
 *
 * Mutations for one document id are serialised. `replaceDocument` either
 * publishes the whole new set or leaves the previous one untouched.
 */
export interface VectorIndex {
  upsert(entries: IndexEntry[]): Promise<void>;
  query(vector: number[], k: number, options?: IndexQueryOptions): Promise<IndexHit[]>;
  replaceDocument(documentId: string, entries: IndexEntry[]): Promise<void>;
  /** Returns the number of entries removed. */
  deleteDocument(documentId: string): Promise<number>;
  entriesFor(documentId: string): Promise<IndexEntry[]>;
}
