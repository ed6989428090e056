/**
 * Shared plumbing for bibliographic sources: HTTP with the caller's abort
 * signal, an optional response cache, response validation with zod, and
 * fuzzy-candidate scoring.
 */

import { z } from 'zod';
import { SourceUnavailableError, errorMessage } from '@/lib/errors';
import type { CandidateFields, MetadataCandidate, MetadataHints, SourceId } from '@/types/metadata';
import { responseCacheKey, type ResponseCache } from '../response-cache';
import { familyName, fuzzyConfidence } from '../similarity';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface SourceOptions {
  fetch?: FetchLike;
  /** Contact address sent to APIs that ask for one (CrossRef, OpenAlex). */
  mailto?: string | null;
  apiKey?: string | null;
  cache?: ResponseCache | null;
  /** Lifetime of cached responses; 0 disables the cache. */
  cacheTtlMs?: number;
}

export interface LookupContext {
  signal: AbortSignal;
  /** Fuzzy candidates scoring below this are dropped. */
  similarityFloor: number;
}

export interface SourceRecord {
  fields: CandidateFields;
  extra: Record<string, unknown>;
}

/** Optional field that is dropped, not fatal, when the API sends an unexpected shape. */
export function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

export function yearOf(value: string | number | null | undefined): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  const match = value?.match(/(1[5-9]\d\d|20\d\d)/);
  return match?.[1] ? Number(match[1]) : null;
}

/** MARC and library catalogues often give ISO 639-2 codes. */
const ISO_639_2: Record<string, string> = {
  eng: 'en',
  ger: 'de',
  deu: 'de',
  fre: 'fr',
  fra: 'fr',
  spa: 'es',
  ita: 'it',
  dut: 'nl',
  nld: 'nl',
  por: 'pt',
  lat: 'la',
};

export function languageCode(value: string | null | undefined): string | null {
  if (!value) return null;
  const lower = value.trim().toLowerCase().split(/[-_]/)[0] ?? '';
  if (/^[a-z]{2}$/.test(lower)) return lower;
  return ISO_639_2[lower] ?? (/^[a-z]{3}$/.test(lower) ? lower : null);
}

export function lastNameOfFirstAuthor(hints: MetadataHints): string | null {
  const first = hints.authors[0];
  return first ? familyName(first) || null : null;
}

const COMPLETENESS_FIELDS = ['year', 'journal', 'publisher', 'doi'] as const;

export abstract class MetadataSource {
  abstract readonly id: SourceId;
  protected readonly fetchImpl: FetchLike;

  constructor(protected readonly options: SourceOptions = {}) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /** Zero or more candidates, best first by the source's own ordering. */
  abstract lookup(hints: MetadataHints, context: LookupContext): Promise<MetadataCandidate[]>;

  /** Whether the hints carry anything this source can search by. */
  canLookup(hints: MetadataHints): boolean {
    return Boolean(hints.doi || hints.isbn || hints.title);
  }

  protected async request(url: string, signal: AbortSignal, accept = 'application/json'): Promise<Response | null> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        signal,
        headers: {
          Accept: accept,
          'User-Agent': `scholarly-ingest/1.0${this.options.mailto ? ` (mailto:${this.options.mailto})` : ''}`,
        },
      });
    } catch (error) {
      if (signal.aborted) throw error;
      throw new SourceUnavailableError(this.id, errorMessage(error), error);
    }

    if (response.status === 404) return null;
    if (!response.ok) {
      throw new SourceUnavailableError(this.id, `HTTP ${response.status}`);
    }
    return response;
  }

  /** Successful response body, from the cache when a fresh copy is there. */
  protected async fetchBody(url: string, signal: AbortSignal, accept = 'application/json'): Promise<string | null> {
    const cache = this.options.cacheTtlMs ? this.options.cache : null;
    const key = responseCacheKey(this.id, url);

    if (cache) {
      try {
        const cached = await cache.get(key);
        if (cached !== null) return cached;
      } catch (error) {
        console.warn(`[MetadataSource] ${this.id} cache read failed: ${errorMessage(error)}`);
      }
    }

    const response = await this.request(url, signal, accept);
    if (!response) return null;
    const body = await response.text();

    if (cache) {
      try {
        await cache.set(key, body, this.options.cacheTtlMs ?? 0);
      } catch (error) {
        console.warn(`[MetadataSource] ${this.id} cache write failed: ${errorMessage(error)}`);
      }
    }
    return body;
  }

  protected async getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, signal: AbortSignal): Promise<T | null> {
    const text = await this.fetchBody(url, signal);
    if (text === null) return null;

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new SourceUnavailableError(this.id, 'response is not JSON', error);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailableError(this.id, `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  protected async getText(url: string, signal: AbortSignal, accept: string): Promise<string | null> {
    return this.fetchBody(url, signal, accept);
  }

  protected identifierCandidate(
    record: SourceRecord,
    matchKey: 'doi' | 'isbn',
    matched: boolean
  ): MetadataCandidate {
    return {
      source: this.id,
      confidence: matched ? 1 : 0.9,
      matchKey,
      rank: 0,
      fields: record.fields,
      extra: record.extra,
    };
  }

  /**
   * Scores records against the hints, keeps those above the floor, preserves
   * source order. Records that fill more of year/journal/publisher/doi get a
   * small completeness bonus once past the floor.
   */
  protected fuzzyCandidates(
    records: SourceRecord[],
    hints: MetadataHints,
    floor: number
  ): MetadataCandidate[] {
    const candidates: MetadataCandidate[] = [];
    records.forEach((record, rank) => {
      const confidence = fuzzyConfidence(hints, record.fields);
      if (confidence < floor) return;
      const completeness = COMPLETENESS_FIELDS.filter((f) => record.fields[f] != null).length;
      candidates.push({
        source: this.id,
        confidence: Math.round(Math.min(1, confidence + completeness * 0.01) * 1000) / 1000,
        matchKey: 'fuzzy',
        rank,
        fields: record.fields,
        extra: record.extra,
      });
    });
    return candidates;
  }
}
