/**
 * K10plus union catalogue over SRU, records in MARCXML.
 */

import type { MetadataCandidate, MetadataHints } from '@/types/metadata';
import { SourceUnavailableError, errorMessage } from '@/lib/errors';
import { attrOf, children, descend, parseXml, textOf, type XmlNode } from '@/lib/utils/xml';
import { normalizeIsbn } from '../similarity';
import { MetadataSource, languageCode, lastNameOfFirstAuthor, yearOf, type LookupContext, type SourceRecord } from './base';

const SRU_URL = 'https://sru.k10plus.de/opac-de-627';

/** MARC personal names are "Family, Given"; drop trailing dates and punctuation. */
function marcName(value: string): string {
  const cleaned = value.replace(/[,.\s]+$/, '').trim();
  const [family, given] = cleaned.split(/,\s*/, 2);
  return given ? `${given} ${family}` : cleaned;
}

function trimIsbdPunctuation(value: string): string {
  return value.replace(/\s*[/:;,=]\s*$/, '').trim();
}

class MarcRecord {
  constructor(private readonly node: unknown) {}

  control(tag: string): string | null {
    const field = children(this.node, 'controlfield').find((f) => attrOf(f, 'tag') === tag);
    return textOf(field);
  }

  subfields(tag: string, code: string): string[] {
    return children(this.node, 'datafield')
      .filter((f) => attrOf(f, 'tag') === tag)
      .flatMap((f) => children(f, 'subfield').filter((s) => attrOf(s, 'code') === code))
      .map(textOf)
      .filter((v): v is string => v !== null);
  }

  first(tag: string, code: string): string | null {
    return this.subfields(tag, code)[0] ?? null;
  }
}

export function marcToRecord(node: unknown): SourceRecord {
  const marc = new MarcRecord(node);

  const main = marc.first('245', 'a');
  const sub = marc.first('245', 'b');
  const title = main
    ? sub
      ? `${trimIsbdPunctuation(main)}: ${trimIsbdPunctuation(sub)}`
      : trimIsbdPunctuation(main)
    : null;

  const authors = [...marc.subfields('100', 'a'), ...marc.subfields('700', 'a')].map(marcName);

  const fixed = marc.control('008');
  const fixedYear = fixed ? yearOf(fixed.slice(7, 11)) : null;
  const year = fixedYear ?? yearOf(marc.first('264', 'c') ?? marc.first('260', 'c'));
  const publisher = marc.first('264', 'b') ?? marc.first('260', 'b');
  const extent = marc.first('300', 'a')?.match(/(\d+)\s*(?:S\.|p\.|pages|Seiten)/i);

  const extra: Record<string, unknown> = {};
  const subjects = marc.subfields('650', 'a');
  if (subjects.length) extra.subjects = subjects;
  const ppn = marc.control('001');
  if (ppn) extra.ppn = ppn;

  return {
    fields: {
      title,
      authors: authors.length ? authors : null,
      year,
      publisher: publisher ? trimIsbdPunctuation(publisher) : null,
      isbn: normalizeIsbn(marc.first('020', 'a')),
      language: languageCode(fixed?.slice(35, 38)),
      pageCount: extent?.[1] ? Number(extent[1]) : null,
    },
    extra,
  };
}

export function marcRecords(doc: XmlNode): unknown[] {
  const records = descend(doc, 'searchRetrieveResponse', 'records');
  return children(records, 'record')
    .map((r) => descend(r, 'recordData', 'record'))
    .filter((r) => r !== undefined);
}

export function cleanSruTerm(value: string): string {
  return value.replace(/["\\]/g, ' ').replace(/\s+/g, ' ').trim();
}

export class K10plusSource extends MetadataSource {
  readonly id = 'k10plus' as const;

  override canLookup(hints: MetadataHints): boolean {
    return Boolean(hints.isbn || hints.title);
  }

  private async search(query: string, maximumRecords: number, signal: AbortSignal): Promise<SourceRecord[]> {
    const params = new URLSearchParams({
      version: '1.1',
      operation: 'searchRetrieve',
      query,
      maximumRecords: String(maximumRecords),
      recordSchema: 'marcxml',
    });
    const xml = await this.getText(`${SRU_URL}?${params.toString()}`, signal, 'application/xml');
    if (!xml) return [];

    let doc: XmlNode;
    try {
      doc = await parseXml(xml);
    } catch (error) {
      throw new SourceUnavailableError(this.id, `unreadable SRU response: ${errorMessage(error)}`, error);
    }
    return marcRecords(doc).map(marcToRecord);
  }

  async lookup(hints: MetadataHints, context: LookupContext): Promise<MetadataCandidate[]> {
    const isbn = normalizeIsbn(hints.isbn);
    if (isbn) {
      const [record] = await this.search(`NUM=ISBN ${isbn}`, 1, context.signal);
      if (record) return [this.identifierCandidate(record, 'isbn', record.fields.isbn === isbn)];
      console.log(`[K10plus] ISBN ${isbn} not found, falling back to title search`);
    }

    if (!hints.title) return [];

    let query = `pica.tit="${cleanSruTerm(hints.title)}"`;
    const author = lastNameOfFirstAuthor(hints);
    if (author) query += ` and pica.per="${cleanSruTerm(author)}"`;

    const records = await this.search(query, 5, context.signal);
    return this.fuzzyCandidates(records, hints, context.similarityFloor);
  }
}
