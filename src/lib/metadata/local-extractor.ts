/**
 * Metadata available without any network call: embedded document
 * properties first, then heuristics over the opening text.
 */

import path from 'path';
import type { DocumentProperties } from '@/lib/parsing/types';
import { detectLanguage, UNDETERMINED } from '@/lib/segmentation/language';
import type { LocalOrigin, MetadataField, MetadataHints, MetadataValues } from '@/types/metadata';
import { normalizeDoi, normalizeIsbn } from './similarity';
import venues from './data/known-venues.json';

export interface LocalValue<K extends MetadataField> {
  value: NonNullable<MetadataValues[K]>;
  origin: LocalOrigin;
}

export type LocalMetadata = { [K in MetadataField]?: LocalValue<K> };

export interface LocalExtractionInput {
  text: string;
  filename: string;
  properties: DocumentProperties;
  pageCount: number;
  /** Text came mostly from OCR; heuristic values are recorded as such. */
  ocrUsed: boolean;
  languageHint: string | null;
}

const HEAD_CHARS = 3000;
const YEAR_WINDOW = 2000;
const MIN_YEAR = 1900;

const NON_TITLE_LINE =
  /(abstract|zusammenfassung|keywords|schlüsselwörter|introduction|einleitung|chapter|kapitel|volume|edition|©|copyright|author|\bby\s+|university|universität|journal|doi|https?:\/\/|@)/i;

const JUNK_PROPERTY_TITLE = /^(?:microsoft (?:word|powerpoint)|untitled|document\d*$|slide\s*\d*$)|\.(?:docx?|pdf|pptx?|tex|dvi)$/i;

export function extractTitle(text: string): string | null {
  const lines = text
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean)
    .slice(0, 20);

  const candidates = lines.filter(
    (line) =>
      line.length >= 10 &&
      line.length <= 300 &&
      !NON_TITLE_LINE.test(line) &&
      !/^[\d.]+\s+/.test(line) &&
      /^\p{Lu}/u.test(line)
  );

  // A leading candidate among the first lines wins, else the longest one.
  const leading = candidates.find((line) => lines.indexOf(line) < 3);
  if (leading) return leading.replace(/[.:;,]$/, '');

  const longest = [...candidates].sort((a, b) => b.length - a.length)[0];
  return longest ?? null;
}

const NAME = "\\p{Lu}[\\p{Ll}'’-]+(?:\\s+\\p{Lu}\\.)*(?:\\s+(?:van|von|de|der|da|di|le)\\b)*\\s+\\p{Lu}[\\p{Ll}'’-]+";
const NAME_LIST = new RegExp(`^(${NAME}(?:\\s*(?:,|;|\\band\\b|\\bund\\b|&)\\s*${NAME})*)\\s*[\\d*†‡§,]*$`, 'u');
const BY_LINE = /^(?:by|von|authors?|autor(?:en)?)[:\s]+(.+)$/i;
const NOT_A_NAME = /(university|universität|institute|institut|department|abstract|keyword|introduction|journal|press)/i;

function splitAuthorList(list: string): string[] {
  return list
    .split(/\s*(?:,|;|\band\b|\bund\b|&)\s*/)
    .map((a) => a.replace(/[\d*†‡§]+$/, '').trim())
    .filter((a) => a.length > 3 && !NOT_A_NAME.test(a));
}

export function extractAuthors(text: string, filename?: string): string[] {
  const lines = text
    .slice(0, 1500)
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean)
    .slice(0, 15);

  for (const line of lines) {
    const byLine = line.match(BY_LINE);
    if (byLine?.[1]) {
      const authors = splitAuthorList(byLine[1]);
      if (authors.length > 0) return authors;
    }
  }

  for (const line of lines.slice(1)) {
    if (NOT_A_NAME.test(line)) continue;
    const list = line.match(NAME_LIST);
    if (list?.[1]) {
      const authors = splitAuthorList(list[1]);
      if (authors.length > 0) return authors;
    }
  }

  // "Author_Title.pdf" / "Author et al - Title.pdf"
  if (filename) {
    const fromName = path.basename(filename).match(/^([A-Za-z]+(?:\s*et\s*al)?)[_\s-]/);
    if (fromName?.[1] && fromName[1].length > 2) return [fromName[1]];
  }
  return [];
}

/** Most frequent plausible year in the opening text. */
export function extractYear(text: string, now = new Date()): number | null {
  const head = text.slice(0, YEAR_WINDOW);
  const maxYear = now.getFullYear() + 1;
  const counts = new Map<number, number>();
  const firstSeen = new Map<number, number>();

  for (const match of head.matchAll(/(?<![\d./-])(1[89]\d\d|20\d\d)(?![\d/-])/g)) {
    const year = Number(match[1]);
    if (year < MIN_YEAR || year > maxYear) continue;
    counts.set(year, (counts.get(year) ?? 0) + 1);
    if (!firstSeen.has(year)) firstSeen.set(year, match.index ?? 0);
  }

  let best: number | null = null;
  for (const [year, count] of counts) {
    if (
      best === null ||
      count > (counts.get(best) ?? 0) ||
      (count === counts.get(best) && (firstSeen.get(year) ?? 0) < (firstSeen.get(best) ?? 0))
    ) {
      best = year;
    }
  }
  return best;
}

const DOI_PATTERN = /(?:doi|https?:\/\/(?:dx\.)?doi\.org\/)[:\s/]*(10\.\d{4,}(?:\.\d+)*\/[^\s"&'<>]+)/i;
const BARE_DOI_PATTERN = /\b(10\.\d{4,9}\/[^\s"&'<>]+)/;

export function extractDoi(text: string): string | null {
  const match = text.match(DOI_PATTERN) ?? text.match(BARE_DOI_PATTERN);
  return normalizeDoi(match?.[1]);
}

const ISBN_PATTERNS = [
  /ISBN(?:-13)?[:\s]*(97[89][- ]?\d{1,5}[- ]?\d{1,7}[- ]?\d{1,7}[- ]?\d)/i,
  /ISBN(?:-10)?[:\s]*(\d{1,5}[- ]?\d{1,7}[- ]?\d{1,7}[- ]?[\dX])/i,
];

export function extractIsbn(text: string): string | null {
  for (const pattern of ISBN_PATTERNS) {
    const isbn = normalizeIsbn(text.match(pattern)?.[1]);
    if (isbn) return isbn;
  }
  return null;
}

function findKnown(names: string[], head: string): string | null {
  for (const name of names) {
    const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    if (new RegExp(`\\b${escaped}\\b`, 'i').test(head)) return name;
  }
  return null;
}

export function extractJournal(text: string): string | null {
  const head = text.slice(0, HEAD_CHARS);
  const known = findKnown(venues.journals, head);
  if (known) return known;

  const patterns = [
    /published in[:\s]*([^.\n]+)/i,
    /\b(journal of [^.\n]+)/i,
    /\b(proceedings of [^.\n]+)/i,
    /\b(transactions on [^.\n]+)/i,
    /\b(zeitschrift für [^.\n]+)/i,
    /\bin: ([^.\n]+), vol\./i,
  ];
  for (const pattern of patterns) {
    const raw = head.match(pattern)?.[1]?.trim();
    if (!raw || raw.length <= 3 || raw.length >= 100) continue;
    const cleaned = raw
      .replace(/\s*\(.*?\)/g, '')
      .replace(/\s*vol\..*$/i, '')
      .replace(/\s*pp\..*$/i, '')
      .replace(/[\s,;:]+$/, '')
      .trim();
    if (cleaned) return cleaned;
  }
  return null;
}

export function extractPublisher(text: string): string | null {
  const head = text.slice(0, HEAD_CHARS);
  const known = findKnown(venues.publishers, head);
  if (known) return known;

  const patterns = [/published by\s+([^.\n]+)\./i, /©\s*\d{4}\s+([^.\n]+)/i, /\b([\p{Lu}][\p{L}-]+ Verlag)\b/u];
  for (const pattern of patterns) {
    const raw = head.match(pattern)?.[1]?.trim();
    if (raw && raw.length > 3 && raw.length < 100) return raw;
  }
  return null;
}

function languageCode(value: string | null): string | null {
  const code = value?.trim().toLowerCase().split(/[-_]/)[0];
  return code && /^[a-z]{2,3}$/.test(code) ? code : null;
}

function yearFrom(value: string | null): number | null {
  const match = value?.match(/(1[5-9]\d\d|20\d\d)/);
  return match?.[1] ? Number(match[1]) : null;
}

/**
 * Values from properties win over text heuristics. The returned hints are
 * what the harvester queries external sources with.
 */
export function extractLocalMetadata(input: LocalExtractionInput): {
  local: LocalMetadata;
  hints: MetadataHints;
} {
  const { properties: props } = input;
  const head = input.text.slice(0, HEAD_CHARS);
  const textOrigin: LocalOrigin = input.ocrUsed ? 'ocr_text' : 'text_heuristics';
  const local: LocalMetadata = {};

  const propTitle = props.title && !JUNK_PROPERTY_TITLE.test(props.title) ? props.title : null;
  const title = propTitle ?? extractTitle(head);
  if (title) local.title = { value: title, origin: propTitle ? 'document_properties' : textOrigin };

  const propAuthors = props.authors.filter((a) => a.length > 1);
  const authors = propAuthors.length > 0 ? propAuthors : extractAuthors(head, input.filename);
  if (authors.length > 0) {
    local.authors = { value: authors, origin: propAuthors.length > 0 ? 'document_properties' : textOrigin };
  }

  const propYear = yearFrom(props.date);
  const year = propYear ?? extractYear(input.text);
  if (year) local.year = { value: year, origin: propYear ? 'document_properties' : textOrigin };

  const propDoi = normalizeDoi(props.doi);
  const doi = propDoi ?? extractDoi(head);
  if (doi) local.doi = { value: doi, origin: propDoi ? 'document_properties' : textOrigin };

  const propIsbn = normalizeIsbn(props.isbn);
  const isbn = propIsbn ?? extractIsbn(head);
  if (isbn) local.isbn = { value: isbn, origin: propIsbn ? 'document_properties' : textOrigin };

  const journal = extractJournal(head);
  if (journal) local.journal = { value: journal, origin: textOrigin };

  const publisher = props.publisher ?? extractPublisher(head);
  if (publisher) {
    local.publisher = { value: publisher, origin: props.publisher ? 'document_properties' : textOrigin };
  }

  const propLanguage = languageCode(props.language);
  const detected = detectLanguage(input.text.slice(0, 5000), input.languageHint);
  const language = propLanguage ?? (detected === UNDETERMINED ? input.languageHint : detected);
  if (language) local.language = { value: language, origin: propLanguage ? 'document_properties' : textOrigin };

  if (input.pageCount > 0) local.pageCount = { value: input.pageCount, origin: 'extraction' };

  return {
    local,
    hints: {
      doi: local.doi?.value ?? null,
      isbn: local.isbn?.value ?? null,
      title: local.title?.value ?? null,
      authors: local.authors?.value ?? [],
      year: local.year?.value ?? null,
    },
  };
}
