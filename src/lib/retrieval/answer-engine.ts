/**
 * Query entry point: semantic, keyword or question-answering retrieval over
 * the indexed chunks.
 *
 * Semantic results come from the vector index, over-fetched so that filters
 * and stale entries (chunks that no longer resolve) still leave enough
 * results. When the query cannot be embedded, retrieval falls back to
 * keyword relevance and the result is marked degraded. In question mode a
 * generator failure keeps the ranked chunks and returns no answer.
 */

import type { AnswerGenerator } from '@/lib/ai/types';
import { ANSWER_SYSTEM_PROMPT, buildAnswerPrompt, type ContextPassage } from '@/lib/ai/prompts/answer';
import type { EmbeddingIndex } from '@/lib/index/embedding-index';
import type { IndexHit } from '@/lib/index/types';
import { compareHits } from '@/lib/index/vector-math';
import { formatInline, formatReference } from '@/lib/metadata/formatter';
import type { DocumentStore } from '@/lib/store/types';
import { errorMessage } from '@/lib/errors';
import { parseQueryInput } from '@/lib/utils/validation';
import type { Chunk, DocumentRecord } from '@/types/document';
import { emptyMetadata, type Metadata } from '@/types/metadata';
import type { CitationMarker, QueryInput, QueryResult, RankedChunk, SourceEntry } from '@/types/query';
import { citedMarkers, stripInvalidMarkers } from './citations';
import { activeChecks, filterMatchRatio, matchesFilters } from './filters';
import { keywordSearch } from './keyword';

const OVERFETCH = 4;
const RECENCY_WEIGHT = 0.1;

export interface AnswerEngineDeps {
  store: DocumentStore;
  embeddings: EmbeddingIndex;
  /** Null when no language model is configured; question mode then degrades. */
  generator: AnswerGenerator | null;
}

export interface QueryContext {
  signal?: AbortSignal;
}

interface Resolved {
  hit: IndexHit;
  chunk: Chunk;
  record: DocumentRecord;
}

interface Retrieval {
  hits: IndexHit[];
  degraded: boolean;
  warnings: string[];
}

export class RetrievalAnswerEngine {
  constructor(private readonly deps: AnswerEngineDeps) {}

  async query(input: unknown, context: QueryContext = {}): Promise<QueryResult> {
    const query = parseQueryInput(input);
    const startTime = Date.now();

    const retrieval = await this.retrieve(query, context.signal);
    const ranked = await this.rank(query, retrieval.hits);
    const results = ranked.map((r) => this.toRankedChunk(r, ranked, query));

    const result: QueryResult = {
      mode: query.mode,
      results,
      answer: null,
      citations: [],
      sources: this.sources(ranked, query),
      degraded: retrieval.degraded,
      warnings: [...retrieval.warnings],
    };

    if (query.mode === 'question') await this.answer(query, ranked, result, context.signal);

    console.log(
      `[Retrieval] ${query.mode} query returned ${results.length} chunks in ${Date.now() - startTime}ms` +
        (result.degraded ? ' (degraded)' : '')
    );
    return result;
  }

  private async retrieve(query: QueryInput, signal?: AbortSignal): Promise<Retrieval> {
    const k = query.maxResults * OVERFETCH;
    const documentIds = query.filters.documentIds;

    if (query.mode === 'keyword') {
      return { hits: await this.keyword(query.text, documentIds), degraded: false, warnings: [] };
    }

    try {
      const hits = await this.deps.embeddings.queryText(query.text, k, { documentIds, signal });
      return { hits, degraded: false, warnings: [] };
    } catch (error) {
      if (signal?.aborted) throw error;
      const reason = errorMessage(error);
      console.warn(`[Retrieval] Semantic search unavailable, using keyword search: ${reason}`);
      return {
        hits: await this.keyword(query.text, documentIds),
        degraded: true,
        warnings: [`Semantic search unavailable (${reason}); results are keyword matches`],
      };
    }
  }

  private async keyword(text: string, documentIds?: string[]): Promise<IndexHit[]> {
    const chunks = await this.deps.store.listChunks({ documentIds });
    return keywordSearch(text, chunks);
  }

  /** Resolves hits to chunks and documents, applies filters and re-ranking, best first. */
  private async rank(query: QueryInput, hits: IndexHit[]): Promise<Resolved[]> {
    if (hits.length === 0) return [];

    const chunks = new Map(
      (await this.deps.store.getChunksById(hits.map((h) => h.chunkId))).map((c) => [c.id, c])
    );
    const records = new Map(
      (await this.deps.store.getMany([...new Set(hits.map((h) => h.documentId))])).map((r) => [r.id, r])
    );

    const checks = activeChecks(query.filters);
    const soft = query.rerank === 'filter-match';
    const resolved: Resolved[] = [];
    for (const hit of hits) {
      const chunk = chunks.get(hit.chunkId);
      const record = records.get(hit.documentId);
      if (!chunk || !record || chunk.documentId !== record.id) continue;
      if (!soft && !matchesFilters(record, checks)) continue;
      resolved.push({ hit, chunk, record });
    }

    const rescored = resolved.map((r) => ({
      ...r,
      hit: { ...r.hit, score: this.rerankScore(query.rerank, r, resolved, checks) },
    }));
    return rescored.sort((a, b) => compareHits(a.hit, b.hit)).slice(0, query.maxResults);
  }

  private rerankScore(
    strategy: QueryInput['rerank'],
    item: Resolved,
    all: Resolved[],
    checks: ReturnType<typeof activeChecks>
  ): number {
    const score = item.hit.score;
    switch (strategy) {
      case 'none':
        return score;
      case 'filter-match':
        return score * (0.5 + 0.5 * filterMatchRatio(item.record, checks));
      case 'recency': {
        const years = all.map((r) => r.record.metadata?.year).filter((y): y is number => typeof y === 'number');
        const year = item.record.metadata?.year;
        if (typeof year !== 'number' || years.length === 0) return score;
        const min = Math.min(...years);
        const max = Math.max(...years);
        const weight = max === min ? 1 : (year - min) / (max - min);
        return score + RECENCY_WEIGHT * weight;
      }
    }
  }

  private toRankedChunk(item: Resolved, ranked: Resolved[], query: QueryInput): RankedChunk {
    const metadata = metadataOf(item.record);
    return {
      chunk: item.chunk,
      score: round(item.hit.score),
      title: metadata.title,
      citation: formatInline(metadata, query.citationStyle, {
        page: item.chunk.page,
        number: this.sourceNumber(item.record.id, ranked),
      }),
    };
  }

  /** 1-based position of the document among the distinct documents in rank order. */
  private sourceNumber(documentId: string, ranked: Resolved[]): number {
    const order = [...new Set(ranked.map((r) => r.record.id))];
    return order.indexOf(documentId) + 1;
  }

  private sources(ranked: Resolved[], query: QueryInput, only?: Set<string>): SourceEntry[] {
    const seen = new Map<string, DocumentRecord>();
    for (const { record } of ranked) {
      if (only && !only.has(record.id)) continue;
      if (!seen.has(record.id)) seen.set(record.id, record);
    }
    return [...seen.values()].map((record) => {
      const metadata = metadataOf(record);
      return {
        documentId: record.id,
        citation: formatReference(metadata, query.citationStyle, this.sourceNumber(record.id, ranked)),
        metadata,
      };
    });
  }

  private async answer(query: QueryInput, ranked: Resolved[], result: QueryResult, signal?: AbortSignal): Promise<void> {
    if (ranked.length === 0) {
      result.warnings.push('No passages matched the question');
      return;
    }
    const generator = this.deps.generator;
    if (!generator) {
      result.degraded = true;
      result.warnings.push('No answer generator configured; returning ranked passages only');
      return;
    }

    const passages: ContextPassage[] = ranked.map((r, i) => ({
      marker: i + 1,
      citation: formatInline(metadataOf(r.record), query.citationStyle, {
        number: this.sourceNumber(r.record.id, ranked),
      }),
      page: r.chunk.page,
      text: r.chunk.text,
    }));

    let text: string;
    try {
      const generated = await generator.generate({
        system: ANSWER_SYSTEM_PROMPT,
        prompt: buildAnswerPrompt(query.text, passages),
        signal,
      });
      text = generated.text;
    } catch (error) {
      if (signal?.aborted) throw error;
      const reason = errorMessage(error);
      console.warn(`[Retrieval] Answer generation with ${generator.name} failed: ${reason}`);
      result.degraded = true;
      result.warnings.push(`Answer generation failed (${reason}); returning ranked passages only`);
      return;
    }

    const markers = citedMarkers(text, ranked.length);
    result.answer = stripInvalidMarkers(text, ranked.length);
    result.citations = markers.flatMap((marker): CitationMarker[] => {
      const item = ranked[marker - 1];
      if (!item) return [];
      return [
        {
          marker,
          documentId: item.record.id,
          chunkId: item.chunk.id,
          page: item.chunk.page,
          inline: formatInline(metadataOf(item.record), query.citationStyle, {
            page: item.chunk.page,
            number: this.sourceNumber(item.record.id, ranked),
          }),
        },
      ];
    });
    if (result.citations.length > 0) {
      result.sources = this.sources(ranked, query, new Set(result.citations.map((c) => c.documentId)));
    }
  }
}

function metadataOf(record: DocumentRecord): Metadata {
  return record.metadata ?? emptyMetadata();
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}
