import type { Chunk } from './document';
import type { Metadata } from './metadata';

export type QueryMode = 'question' | 'semantic' | 'keyword';

export type CitationStyle = 'apa' | 'mla' | 'chicago' | 'harvard' | 'ieee';

export type RerankStrategy = 'none' | 'recency' | 'filter-match';

export interface QueryFilters {
  /** Case-insensitive substring match against any author */
  author?: string;
  yearFrom?: number;
  yearTo?: number;
  documentIds?: string[];
  /** Case-insensitive substring match against journal or publisher */
  source?: string;
}

export interface QueryInput {
  text: string;
  mode: QueryMode;
  filters: QueryFilters;
  maxResults: number;
  rerank: RerankStrategy;
  citationStyle: CitationStyle;
}

export interface RankedChunk {
  chunk: Chunk;
  score: number;
  title: string | null;
  /** Short in-text citation, e.g. "(Smith, 2020)" */
  citation: string;
}

export interface CitationMarker {
  marker: number;
  documentId: string;
  chunkId: string;
  page: number | null;
  inline: string;
}

export interface SourceEntry {
  documentId: string;
  citation: string;
  metadata: Metadata;
}

export interface QueryResult {
  mode: QueryMode;
  results: RankedChunk[];
  answer: string | null;
  citations: CitationMarker[];
  sources: SourceEntry[];
  degraded: boolean;
  warnings: string[];
}
