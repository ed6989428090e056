import { z } from 'zod';
import type { MetadataCandidate, MetadataHints } from '@/types/metadata';
import { normalizeDoi } from '../similarity';
import { MetadataSource, lenient, type LookupContext, type SourceRecord } from './base';

const BASE_URL = 'https://api.openalex.org/works';

const workSchema = z.object({
  doi: lenient(z.string().nullable()),
  title: lenient(z.string().nullable()),
  display_name: lenient(z.string().nullable()),
  publication_year: lenient(z.number().nullable()),
  language: lenient(z.string().nullable()),
  type: lenient(z.string().nullable()),
  cited_by_count: lenient(z.number()),
  authorships: lenient(z.array(z.object({ author: z.object({ display_name: z.string().nullable().optional() }) }))),
  primary_location: lenient(
    z
      .object({
        source: z
          .object({
            display_name: z.string().nullable().optional(),
            issn_l: z.string().nullable().optional(),
            host_organization_name: z.string().nullable().optional(),
          })
          .nullable()
          .optional(),
      })
      .nullable()
  ),
  concepts: lenient(z.array(z.object({ display_name: z.string(), score: z.number().optional() }))),
  open_access: lenient(z.object({ is_oa: z.boolean().optional() }).nullable()),
  abstract_inverted_index: lenient(z.record(z.array(z.number())).nullable()),
});

type OpenAlexWork = z.infer<typeof workSchema>;

const searchSchema = z.object({ results: z.array(workSchema).default([]) });

/** OpenAlex ships abstracts as word → positions; put the words back in order. */
export function reconstructAbstract(index: Record<string, number[]>): string {
  const words: string[] = [];
  for (const [word, positions] of Object.entries(index)) {
    for (const position of positions) words[position] = word;
  }
  return words.filter((w) => w !== undefined).join(' ');
}

export function openAlexRecord(work: OpenAlexWork): SourceRecord {
  const authors = (work.authorships ?? [])
    .map((a) => a.author.display_name ?? '')
    .filter((name) => name.length > 0);
  const source = work.primary_location?.source;

  const extra: Record<string, unknown> = {};
  if (work.abstract_inverted_index) extra.abstract = reconstructAbstract(work.abstract_inverted_index);
  if (source?.issn_l) extra.issn = source.issn_l;
  if (work.type) extra.type = work.type;
  if (work.cited_by_count !== undefined) extra.citationCount = work.cited_by_count;
  if (work.concepts?.length) extra.concepts = work.concepts.slice(0, 3).map((c) => c.display_name);
  if (work.open_access?.is_oa !== undefined) extra.openAccess = work.open_access.is_oa;

  return {
    fields: {
      title: work.title ?? work.display_name ?? null,
      authors: authors.length ? authors : null,
      year: work.publication_year ?? null,
      journal: source?.display_name ?? null,
      publisher: source?.host_organization_name ?? null,
      doi: normalizeDoi(work.doi),
      language: work.language ?? null,
    },
    extra,
  };
}

export class OpenAlexSource extends MetadataSource {
  readonly id = 'openalex' as const;

  override canLookup(hints: MetadataHints): boolean {
    return Boolean(hints.doi || hints.title);
  }

  private withMailto(params: URLSearchParams): string {
    if (this.options.mailto) params.set('mailto', this.options.mailto);
    return params.toString();
  }

  async lookup(hints: MetadataHints, context: LookupContext): Promise<MetadataCandidate[]> {
    const doi = normalizeDoi(hints.doi);
    if (doi) {
      const params = new URLSearchParams({ filter: `doi:${doi}`, 'per-page': '1' });
      const found = await this.getJson(`${BASE_URL}?${this.withMailto(params)}`, searchSchema, context.signal);
      const work = found?.results[0];
      if (work) {
        const record = openAlexRecord(work);
        return [this.identifierCandidate(record, 'doi', record.fields.doi === doi)];
      }
      console.log(`[OpenAlex] DOI ${doi} not found, falling back to title search`);
    }

    if (!hints.title) return [];

    const params = new URLSearchParams({ search: hints.title, 'per-page': '5' });
    const found = await this.getJson(`${BASE_URL}?${this.withMailto(params)}`, searchSchema, context.signal);
    const records = (found?.results ?? []).map(openAlexRecord);
    return this.fuzzyCandidates(records, hints, context.similarityFloor);
  }
}
