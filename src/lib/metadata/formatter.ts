/**
 * Reference-list and in-text citations in a fixed set of styles.
 * Plain text output; italics are not marked.
 */

import type { CitationStyle } from '@/types/query';
import type { MetadataValues } from '@/types/metadata';

export const CITATION_STYLES: CitationStyle[] = ['apa', 'mla', 'chicago', 'harvard', 'ieee'];

type CitableMetadata = Pick<MetadataValues, 'title' | 'authors' | 'year' | 'journal' | 'publisher' | 'doi'>;

export interface InlineOptions {
  page?: number | null;
  /** Position in the source list, used by numbered styles. */
  number?: number;
}

interface PersonName {
  given: string[];
  family: string;
}

export function parseName(name: string): PersonName {
  const trimmed = name.trim().replace(/\s+/g, ' ');
  if (trimmed.includes(',')) {
    const [family = '', given = ''] = trimmed.split(/,\s*/, 2);
    return { family, given: given.split(' ').filter(Boolean) };
  }
  const parts = trimmed.split(' ');
  const family = parts.pop() ?? '';
  return { family, given: parts };
}

function initials(given: string[]): string {
  return given
    .map((g) =>
      g
        .split('-')
        .map((part) => `${part.charAt(0).toUpperCase()}.`)
        .join('-')
    )
    .join(' ');
}

/** "Smith, J. O." */
function invertedInitials(name: PersonName): string {
  const init = initials(name.given);
  return init ? `${name.family}, ${init}` : name.family;
}

/** "Smith, Jane" */
function invertedFull(name: PersonName): string {
  return name.given.length ? `${name.family}, ${name.given.join(' ')}` : name.family;
}

/** "Jane Smith" */
function direct(name: PersonName): string {
  return [...name.given, name.family].join(' ');
}

/** "J. Smith" */
function initialsFirst(name: PersonName): string {
  const init = initials(name.given);
  return init ? `${init} ${name.family}` : name.family;
}

function joinList(items: string[], conjunction: string, serialComma: boolean): string {
  if (items.length <= 1) return items[0] ?? '';
  if (items.length === 2) return `${items[0]} ${conjunction} ${items[1]}`;
  const head = items.slice(0, -1).join(', ');
  return `${head}${serialComma ? ',' : ''} ${conjunction} ${items[items.length - 1]}`;
}

function withPeriod(text: string): string {
  return /[.?!]$/.test(text) ? text : `${text}.`;
}

function yearText(year: number | null): string {
  return year === null ? 'n.d.' : String(year);
}

function doiUrl(doi: string | null): string {
  return doi ? ` https://doi.org/${doi}` : '';
}

function venue(meta: CitableMetadata): string | null {
  return meta.journal ?? meta.publisher ?? null;
}

function names(meta: CitableMetadata): PersonName[] {
  return (meta.authors ?? []).filter((a) => a.trim()).map(parseName);
}

function apa(meta: CitableMetadata): string {
  const people = names(meta).map(invertedInitials);
  const authors = people.length === 2 ? `${people[0]}, & ${people[1]}` : people.length ? joinList(people, '&', true) : null;
  const title = meta.title ?? 'Untitled';
  const head = authors ? `${withPeriod(authors)} (${yearText(meta.year)}). ${withPeriod(title)}` : `${withPeriod(title)} (${yearText(meta.year)}).`;
  const where = venue(meta);
  return `${head}${where ? ` ${withPeriod(where)}` : ''}${doiUrl(meta.doi)}`;
}

function mla(meta: CitableMetadata): string {
  const people = names(meta);
  let authors: string | null = null;
  if (people.length === 1 && people[0]) authors = invertedFull(people[0]);
  else if (people.length === 2 && people[0] && people[1]) authors = `${invertedFull(people[0])}, and ${direct(people[1])}`;
  else if (people[0]) authors = `${invertedFull(people[0])}, et al`;

  const title = `"${withPeriod(meta.title ?? 'Untitled')}"`;
  const tail = [venue(meta), meta.year !== null ? String(meta.year) : null].filter(Boolean).join(', ');
  return [authors ? withPeriod(authors) : null, title, tail ? withPeriod(tail) : null, meta.doi ? `https://doi.org/${meta.doi}.` : null]
    .filter(Boolean)
    .join(' ');
}

function chicago(meta: CitableMetadata): string {
  const people = names(meta);
  const listed = people.map((p, i) => (i === 0 ? invertedFull(p) : direct(p)));
  const authors = listed.length ? joinList(listed, 'and', true) : null;
  const title = `"${withPeriod(meta.title ?? 'Untitled')}"`;
  const where = venue(meta);
  return [authors ? withPeriod(authors) : null, `${yearText(meta.year)}.`, title, where ? withPeriod(where) : null, meta.doi ? `https://doi.org/${meta.doi}.` : null]
    .filter(Boolean)
    .join(' ');
}

function harvard(meta: CitableMetadata): string {
  const people = names(meta).map(invertedInitials);
  const authors = people.length ? joinList(people, 'and', false) : null;
  const title = withPeriod(meta.title ?? 'Untitled');
  const where = venue(meta);
  const head = authors ? `${authors} (${yearText(meta.year)})` : `(${yearText(meta.year)})`;
  return `${head} ${title}${where ? ` ${withPeriod(where)}` : ''}${meta.doi ? ` doi:${meta.doi}.` : ''}`;
}

function ieee(meta: CitableMetadata, number?: number): string {
  const people = names(meta).map(initialsFirst);
  const authors = people.length > 6 ? `${people[0]} et al.` : joinList(people, 'and', people.length > 2);
  const parts = [`"${meta.title ?? 'Untitled'},"`];
  const where = venue(meta);
  if (where) parts.push(`${where},`);
  parts.push(meta.doi ? `${yearText(meta.year)}, doi: ${meta.doi}.` : `${yearText(meta.year)}.`);
  const body = `${authors ? `${authors}, ` : ''}${parts.join(' ')}`;
  return number !== undefined ? `[${number}] ${body}` : body;
}

export function formatReference(meta: CitableMetadata, style: CitationStyle, number?: number): string {
  switch (style) {
    case 'apa':
      return apa(meta);
    case 'mla':
      return mla(meta);
    case 'chicago':
      return chicago(meta);
    case 'harvard':
      return harvard(meta);
    case 'ieee':
      return ieee(meta, number);
  }
}

function shortAuthors(meta: CitableMetadata, conjunction: string, etAlFrom: number): string {
  const families = names(meta).map((n) => n.family);
  if (families.length === 0) {
    const title = meta.title ?? 'Untitled';
    const words = title.split(/\s+/);
    return `"${words.length > 4 ? `${words.slice(0, 4).join(' ')}...` : title}"`;
  }
  if (families.length >= etAlFrom) return `${families[0]} et al.`;
  return joinList(families, conjunction, false);
}

export function formatInline(meta: CitableMetadata, style: CitationStyle, options: InlineOptions = {}): string {
  const page = options.page ?? null;
  const year = yearText(meta.year);

  switch (style) {
    case 'apa':
      return `(${shortAuthors(meta, '&', 3)}, ${year}${page !== null ? `, p. ${page}` : ''})`;
    case 'harvard':
      return `(${shortAuthors(meta, 'and', 3)}, ${year}${page !== null ? `, p. ${page}` : ''})`;
    case 'mla':
      return `(${shortAuthors(meta, 'and', 3)}${page !== null ? ` ${page}` : ''})`;
    case 'chicago':
      return `(${shortAuthors(meta, 'and', 4)} ${year}${page !== null ? `, ${page}` : ''})`;
    case 'ieee':
      return `[${options.number ?? 1}]`;
  }
}
