import { z } from 'zod';
import type { MetadataCandidate, MetadataHints } from '@/types/metadata';
import { normalizeIsbn } from '../similarity';
import { MetadataSource, languageCode, lastNameOfFirstAuthor, lenient, type LookupContext, type SourceRecord } from './base';

const SEARCH_URL = 'https://openlibrary.org/search.json';

const docSchema = z.object({
  key: lenient(z.string()),
  title: lenient(z.string()),
  subtitle: lenient(z.string()),
  author_name: lenient(z.array(z.string())),
  first_publish_year: lenient(z.number()),
  publish_year: lenient(z.array(z.number())),
  publisher: lenient(z.array(z.string())),
  isbn: lenient(z.array(z.string())),
  language: lenient(z.array(z.string())),
  number_of_pages_median: lenient(z.number()),
  subject: lenient(z.array(z.string())),
});

type OpenLibraryDoc = z.infer<typeof docSchema>;

const searchSchema = z.object({ docs: z.array(docSchema).default([]) });

function preferredIsbn(isbns: string[] | undefined, wanted: string | null): string | null {
  const normalized = (isbns ?? []).map(normalizeIsbn).filter((i): i is string => i !== null);
  if (wanted && normalized.includes(wanted)) return wanted;
  return normalized[0] ?? null;
}

export function openLibraryRecord(doc: OpenLibraryDoc, wantedIsbn: string | null = null): SourceRecord {
  const years = doc.publish_year ?? [];
  const year = doc.first_publish_year ?? (years.length ? Math.min(...years) : null);

  const extra: Record<string, unknown> = {};
  if (doc.subject?.length) extra.subjects = doc.subject.slice(0, 5);
  if (doc.subtitle) extra.subtitle = doc.subtitle;
  if (doc.key) extra.openLibraryKey = doc.key;

  return {
    fields: {
      title: doc.title ?? null,
      authors: doc.author_name?.length ? doc.author_name : null,
      year,
      publisher: doc.publisher?.[0] ?? null,
      isbn: preferredIsbn(doc.isbn, wantedIsbn),
      language: languageCode(doc.language?.[0]),
      pageCount: doc.number_of_pages_median ?? null,
    },
    extra,
  };
}

export class OpenLibrarySource extends MetadataSource {
  readonly id = 'openlibrary' as const;

  override canLookup(hints: MetadataHints): boolean {
    return Boolean(hints.isbn || hints.title);
  }

  async lookup(hints: MetadataHints, context: LookupContext): Promise<MetadataCandidate[]> {
    const isbn = normalizeIsbn(hints.isbn);
    if (isbn) {
      const params = new URLSearchParams({ isbn, limit: '1' });
      const found = await this.getJson(`${SEARCH_URL}?${params.toString()}`, searchSchema, context.signal);
      const doc = found?.docs[0];
      if (doc) {
        const record = openLibraryRecord(doc, isbn);
        return [this.identifierCandidate(record, 'isbn', record.fields.isbn === isbn)];
      }
      console.log(`[OpenLibrary] ISBN ${isbn} not found, falling back to title search`);
    }

    if (!hints.title) return [];

    const params = new URLSearchParams({ title: hints.title, limit: '5' });
    const author = lastNameOfFirstAuthor(hints);
    if (author) params.set('author', author);

    const found = await this.getJson(`${SEARCH_URL}?${params.toString()}`, searchSchema, context.signal);
    const records = (found?.docs ?? []).map((doc) => openLibraryRecord(doc));
    return this.fuzzyCandidates(records, hints, context.similarityFloor);
  }
}
