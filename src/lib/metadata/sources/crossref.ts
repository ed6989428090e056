import { z } from 'zod';
import type { MetadataCandidate, MetadataHints } from '@/types/metadata';
import { normalizeDoi, normalizeIsbn } from '../similarity';
import { MetadataSource, lastNameOfFirstAuthor, lenient, type LookupContext, type SourceRecord } from './base';

const BASE_URL = 'https://api.crossref.org/works';

const dateSchema = z.object({ 'date-parts': z.array(z.array(z.number().nullable())) });

const workSchema = z.object({
  DOI: lenient(z.string()),
  title: lenient(z.array(z.string())),
  author: lenient(
    z.array(z.object({ given: z.string().optional(), family: z.string().optional(), name: z.string().optional() }))
  ),
  'container-title': lenient(z.array(z.string())),
  published: lenient(dateSchema),
  'published-print': lenient(dateSchema),
  issued: lenient(dateSchema),
  publisher: lenient(z.string()),
  ISSN: lenient(z.array(z.string())),
  ISBN: lenient(z.array(z.string())),
  type: lenient(z.string()),
  abstract: lenient(z.string()),
  subject: lenient(z.array(z.string())),
  language: lenient(z.string()),
  page: lenient(z.string()),
  'is-referenced-by-count': lenient(z.number()),
});

type CrossrefWork = z.infer<typeof workSchema>;

const singleSchema = z.object({ message: workSchema });
const searchSchema = z.object({ message: z.object({ items: z.array(workSchema).default([]) }) });

function firstYear(work: CrossrefWork): number | null {
  for (const date of [work.published, work['published-print'], work.issued]) {
    const year = date?.['date-parts'][0]?.[0];
    if (typeof year === 'number') return year;
  }
  return null;
}

/** JATS abstracts arrive as XML fragments. */
function stripJats(abstract: string): string {
  return abstract
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function crossrefRecord(work: CrossrefWork): SourceRecord {
  const authors = (work.author ?? [])
    .map((a) => a.name ?? [a.given, a.family].filter(Boolean).join(' '))
    .filter((name) => name.length > 0);

  const extra: Record<string, unknown> = {};
  if (work.abstract) extra.abstract = stripJats(work.abstract);
  if (work.ISSN?.[0]) extra.issn = work.ISSN[0];
  if (work.type) extra.type = work.type;
  if (work.subject?.length) extra.subjects = work.subject;
  if (work.page) extra.pages = work.page;
  if (work['is-referenced-by-count'] !== undefined) extra.citationCount = work['is-referenced-by-count'];

  return {
    fields: {
      title: work.title?.[0] ?? null,
      authors: authors.length ? authors : null,
      year: firstYear(work),
      journal: work['container-title']?.[0] ?? null,
      publisher: work.publisher ?? null,
      doi: normalizeDoi(work.DOI),
      isbn: normalizeIsbn(work.ISBN?.[0]),
      language: work.language ?? null,
    },
    extra,
  };
}

export class CrossrefSource extends MetadataSource {
  readonly id = 'crossref' as const;

  override canLookup(hints: MetadataHints): boolean {
    return Boolean(hints.doi || hints.title);
  }

  async lookup(hints: MetadataHints, context: LookupContext): Promise<MetadataCandidate[]> {
    const doi = normalizeDoi(hints.doi);
    if (doi) {
      const found = await this.getJson(`${BASE_URL}/${encodeURIComponent(doi)}`, singleSchema, context.signal);
      if (found) {
        const record = crossrefRecord(found.message);
        return [this.identifierCandidate(record, 'doi', record.fields.doi === doi)];
      }
      console.log(`[CrossRef] DOI ${doi} not found, falling back to title search`);
    }

    if (!hints.title) return [];

    const params = new URLSearchParams({ 'query.bibliographic': hints.title, rows: '5' });
    const author = lastNameOfFirstAuthor(hints);
    if (author) params.set('query.author', author);
    if (this.options.mailto) params.set('mailto', this.options.mailto);

    const found = await this.getJson(`${BASE_URL}?${params.toString()}`, searchSchema, context.signal);
    const records = (found?.message.items ?? []).map(crossrefRecord);
    return this.fuzzyCandidates(records, hints, context.similarityFloor);
  }
}
