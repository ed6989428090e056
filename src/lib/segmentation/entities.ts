/**
 * Rule-based entity spans: identifiers and contact details by pattern,
 * people, organisations and dates with the help of a small gazetteer.
 */

import type { EntityMap, EntityType } from '@/types/document';
import gazetteer from './data/gazetteer.json';

export interface EntitySpan {
  type: EntityType;
  start: number;
  end: number;
  text: string;
}

const alternation = (words: string[]) =>
  [...words].sort((a, b) => b.length - a.length).map((w) => w.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')).join('|');

const CAP_WORD = "\\p{Lu}[\\p{Ll}'’-]+";
const MONTHS = alternation(gazetteer.months);

const PATTERNS: Array<{ type: EntityType; pattern: RegExp; group?: number }> = [
  { type: 'URL', pattern: /https?:\/\/[^\s<>"]+/g },
  { type: 'EMAIL', pattern: /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g },
  { type: 'DOI', pattern: /(?<![\w.])10\.\d{4,9}\/[^\s"<>]+/g },
  { type: 'ISBN', pattern: /\bISBN(?:-1[03])?:?\s*(\d[\d -]{8,15}[\dX])\b/gi, group: 1 },
  { type: 'DATE', pattern: new RegExp(`\\b\\d{1,2}\\.?\\s+(?:${MONTHS})\\.?\\s+\\d{4}\\b`, 'gu') },
  { type: 'DATE', pattern: new RegExp(`\\b(?:${MONTHS})\\.?\\s+\\d{1,2},\\s+\\d{4}\\b`, 'gu') },
  { type: 'DATE', pattern: new RegExp(`\\b(?:${MONTHS})\\.?\\s+\\d{4}\\b`, 'gu') },
  { type: 'DATE', pattern: /\b\d{4}-\d{2}-\d{2}\b/g },
  { type: 'DATE', pattern: /\b\d{1,2}\.\d{1,2}\.\d{4}\b/g },
  {
    type: 'PERSON',
    pattern: new RegExp(
      `\\b(?:${alternation(gazetteer.personTitles)})\\.?\\s+(${CAP_WORD}(?:\\s+\\p{Lu}\\.)*(?:\\s+${CAP_WORD})*)`,
      'gu'
    ),
    group: 1,
  },
  {
    type: 'PERSON',
    pattern: new RegExp(`\\b(?:${alternation(gazetteer.givenNames)})(?:\\s+\\p{Lu}\\.)*\\s+${CAP_WORD}`, 'gu'),
  },
  {
    type: 'ORG',
    pattern: new RegExp(
      `(?<!\\p{L})(?:\\p{Lu}[\\p{L}'&-]*\\s+){0,4}(?:${alternation(gazetteer.orgKeywords)})(?!\\p{L})` +
        `(?:\\s+(?:of|for)(?:\\s+(?:the\\s+)?\\p{Lu}[\\p{L}'-]*){1,4})?`,
      'gu'
    ),
  },
];

/** Trailing sentence punctuation is not part of a URL or DOI. */
function trimTrailing(type: EntityType, text: string): string {
  if (type !== 'URL' && type !== 'DOI') return text;
  return text.replace(/[.,;:!?)\]'"]+$/, '');
}

/** Within one type, overlapping matches collapse to the longest (earliest on ties). */
function dropOverlaps(spans: EntitySpan[]): EntitySpan[] {
  const sorted = [...spans].sort((a, b) => a.start - b.start || b.end - b.start - (a.end - a.start));
  const kept: EntitySpan[] = [];
  for (const span of sorted) {
    const clash = kept.find((k) => k.type === span.type && span.start < k.end && k.start < span.end);
    if (!clash) {
      kept.push(span);
    } else if (span.end - span.start > clash.end - clash.start) {
      kept.splice(kept.indexOf(clash), 1, span);
    }
  }
  return kept.sort((a, b) => a.start - b.start || a.end - b.end);
}

export function detectEntities(text: string): EntitySpan[] {
  const spans: EntitySpan[] = [];

  for (const { type, pattern, group } of PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const whole = match[0];
      const surface = group !== undefined ? match[group] : whole;
      if (!surface || match.index === undefined) continue;

      const offset = match.index + whole.indexOf(surface);
      const trimmed = trimTrailing(type, surface).trim();
      if (!trimmed) continue;
      spans.push({ type, start: offset, end: offset + trimmed.length, text: trimmed });
    }
  }

  return dropOverlaps(spans);
}

/** Whether a cut at `position` would fall strictly inside a span. */
export function insideSpan(spans: EntitySpan[], position: number): boolean {
  return spans.some((s) => s.start < position && position < s.end);
}

export function entityMap(spans: EntitySpan[], start: number, end: number): EntityMap {
  const grouped = new Map<EntityType, Set<string>>();
  for (const span of spans) {
    if (span.start < start || span.end > end) continue;
    const set = grouped.get(span.type) ?? new Set<string>();
    set.add(span.text);
    grouped.set(span.type, set);
  }

  const map: EntityMap = {};
  for (const [type, values] of [...grouped].sort(([a], [b]) => a.localeCompare(b))) {
    map[type] = [...values].sort();
  }
  return map;
}
