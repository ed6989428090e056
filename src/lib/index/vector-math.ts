import type { IndexHit } from './types';

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Highest score first; ties broken by document then chunk id so results are stable. */
export function compareHits(a: IndexHit, b: IndexHit): number {
  return (
    b.score - a.score ||
    a.documentId.localeCompare(b.documentId) ||
    a.chunkId.localeCompare(b.chunkId, undefined, { numeric: true })
  );
}

export function topK(hits: IndexHit[], k: number): IndexHit[] {
  return [...hits].sort(compareHits).slice(0, Math.max(0, k));
}
