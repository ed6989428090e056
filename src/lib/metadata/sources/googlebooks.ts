import { z } from 'zod';
import type { MetadataCandidate, MetadataHints } from '@/types/metadata';
import { normalizeIsbn } from '../similarity';
import { MetadataSource, languageCode, lastNameOfFirstAuthor, lenient, yearOf, type LookupContext, type SourceRecord } from './base';

const BASE_URL = 'https://www.googleapis.com/books/v1/volumes';

const volumeSchema = z.object({
  id: lenient(z.string()),
  volumeInfo: z.object({
    title: lenient(z.string()),
    subtitle: lenient(z.string()),
    authors: lenient(z.array(z.string())),
    publisher: lenient(z.string()),
    publishedDate: lenient(z.string()),
    description: lenient(z.string()),
    industryIdentifiers: lenient(z.array(z.object({ type: z.string(), identifier: z.string() }))),
    pageCount: lenient(z.number()),
    categories: lenient(z.array(z.string())),
    language: lenient(z.string()),
  }),
});

type GoogleVolume = z.infer<typeof volumeSchema>;

const searchSchema = z.object({ items: z.array(volumeSchema).default([]) });

function isbnOf(info: GoogleVolume['volumeInfo']): string | null {
  const ids = info.industryIdentifiers ?? [];
  const preferred = ids.find((i) => i.type === 'ISBN_13') ?? ids.find((i) => i.type === 'ISBN_10');
  return normalizeIsbn(preferred?.identifier);
}

export function googleBooksRecord(volume: GoogleVolume): SourceRecord {
  const info = volume.volumeInfo;

  const extra: Record<string, unknown> = {};
  if (info.description) extra.abstract = info.description;
  if (info.subtitle) extra.subtitle = info.subtitle;
  if (info.categories?.length) extra.subjects = info.categories;
  if (volume.id) extra.googleBooksId = volume.id;

  return {
    fields: {
      title: info.title ?? null,
      authors: info.authors?.length ? info.authors : null,
      year: yearOf(info.publishedDate),
      publisher: info.publisher ?? null,
      isbn: isbnOf(info),
      language: languageCode(info.language),
      pageCount: info.pageCount ?? null,
    },
    extra,
  };
}

export class GoogleBooksSource extends MetadataSource {
  readonly id = 'googlebooks' as const;

  override canLookup(hints: MetadataHints): boolean {
    return Boolean(hints.isbn || hints.title);
  }

  private url(q: string, maxResults: number): string {
    const params = new URLSearchParams({ q, maxResults: String(maxResults) });
    if (this.options.apiKey) params.set('key', this.options.apiKey);
    return `${BASE_URL}?${params.toString()}`;
  }

  async lookup(hints: MetadataHints, context: LookupContext): Promise<MetadataCandidate[]> {
    const isbn = normalizeIsbn(hints.isbn);
    if (isbn) {
      const found = await this.getJson(this.url(`isbn:${isbn}`, 1), searchSchema, context.signal);
      const volume = found?.items[0];
      if (volume) {
        const record = googleBooksRecord(volume);
        return [this.identifierCandidate(record, 'isbn', record.fields.isbn === isbn)];
      }
      console.log(`[GoogleBooks] ISBN ${isbn} not found, falling back to title search`);
    }

    if (!hints.title) return [];

    const author = lastNameOfFirstAuthor(hints);
    const q = `intitle:${hints.title}${author ? ` inauthor:${author}` : ''}`;
    const found = await this.getJson(this.url(q, 5), searchSchema, context.signal);
    const records = (found?.items ?? []).map(googleBooksRecord);
    return this.fuzzyCandidates(records, hints, context.similarityFloor);
  }
}
