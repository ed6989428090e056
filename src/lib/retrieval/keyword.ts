/**
 * Term-presence relevance: the share of distinct query terms that occur as
 * whole words in the chunk text. Used for `keyword` mode and when the query
 * cannot be embedded.
 */

import type { IndexHit } from '@/lib/index/types';
import type { Chunk } from '@/types/document';

function words(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

export function queryTerms(query: string): string[] {
  return [...new Set(words(query).filter((w) => w.length > 1))];
}

export function keywordSearch(query: string, chunks: Chunk[]): IndexHit[] {
  const terms = queryTerms(query);
  if (terms.length === 0) return [];

  const hits: IndexHit[] = [];
  for (const chunk of chunks) {
    const vocabulary = new Set(words(chunk.text));
    const present = terms.filter((term) => vocabulary.has(term)).length;
    if (present > 0) {
      hits.push({ documentId: chunk.documentId, chunkId: chunk.id, score: present / terms.length });
    }
  }
  return hits;
}
