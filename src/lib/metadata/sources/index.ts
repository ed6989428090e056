import type { SourceId } from '@/types/metadata';
import type { ResponseCache } from '../response-cache';
import type { MetadataSource, SourceOptions } from './base';
import { CrossrefSource } from './crossref';
import { GoogleBooksSource } from './googlebooks';
import { K10plusSource } from './k10plus';
import { OpenAlexSource } from './openalex';
import { OpenLibrarySource } from './openlibrary';

export { MetadataSource } from './base';
export type { FetchLike, LookupContext, SourceOptions } from './base';

export interface SourceFactoryOptions {
  fetch?: SourceOptions['fetch'];
  crossrefMailto?: string | null;
  googleBooksApiKey?: string | null;
  cache?: ResponseCache | null;
  cacheTtlMs?: number;
}

export function createSources(ids: SourceId[], options: SourceFactoryOptions = {}): MetadataSource[] {
  const shared: SourceOptions = { fetch: options.fetch, cache: options.cache, cacheTtlMs: options.cacheTtlMs };
  const build: Record<SourceId, () => MetadataSource> = {
    crossref: () => new CrossrefSource({ ...shared, mailto: options.crossrefMailto }),
    openalex: () => new OpenAlexSource({ ...shared, mailto: options.crossrefMailto }),
    openlibrary: () => new OpenLibrarySource(shared),
    googlebooks: () => new GoogleBooksSource({ ...shared, apiKey: options.googleBooksApiKey }),
    k10plus: () => new K10plusSource(shared),
  };
  return [...new Set(ids)].map((id) => build[id]());
}
