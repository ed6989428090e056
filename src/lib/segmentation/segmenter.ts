/**
 * Splits normalised document text into retrievable chunks.
 *
 * Units are sentences (or word runs of an over-long sentence); chunks are
 * filled greedily up to the token budget. When a chunk overflows it is cut at
 * its last paragraph end if that keeps at least half the budget, otherwise
 * at the last sentence end. No cut ever falls inside an entity span.
 */

import type { PageText } from '@/lib/parsing/types';
import type { Chunk } from '@/types/document';
import { detectEntities, entityMap, insideSpan, type EntitySpan } from './entities';
import { detectLanguage } from './language';
import { countTokens, normalizePages, pageAt } from './normalize';
import gazetteer from './data/gazetteer.json';

export interface SegmenterOptions {
  maxTokens: number;
  languageHint?: string | null;
}

export interface SegmentInput {
  documentId: string;
  pages: PageText[];
}

export interface SegmentResult {
  text: string;
  chunks: Chunk[];
}

interface Unit {
  start: number;
  end: number;
  tokens: number;
  /** The unit closes a paragraph. */
  paragraphEnd: boolean;
}

const ABBREVIATIONS: ReadonlySet<string> = new Set(gazetteer.abbreviations);
const SENTENCE_END = /[.!?]["'”’)\]]*\s+/g;

function isAbbreviation(before: string): boolean {
  const word = before.match(/(\S+)$/)?.[1]?.toLowerCase() ?? '';
  if (ABBREVIATIONS.has(word)) return true;
  // Initials such as "J." and dotted acronyms such as "U.S."
  return /^(?:\p{L}\.)+$/u.test(word);
}

function paragraphs(text: string): Array<{ start: number; end: number }> {
  const result: Array<{ start: number; end: number }> = [];
  let start = 0;
  for (const match of text.matchAll(/\n\n/g)) {
    const index = match.index ?? 0;
    if (index > start) result.push({ start, end: index });
    start = index + match[0].length;
  }
  if (start < text.length) result.push({ start, end: text.length });
  return result;
}

/** Sentence ranges inside [start, end), in text offsets. */
export function sentenceRanges(
  text: string,
  start: number,
  end: number,
  spans: EntitySpan[]
): Array<{ start: number; end: number }> {
  const paragraph = text.slice(start, end);
  const ranges: Array<{ start: number; end: number }> = [];
  let sentenceStart = 0;

  for (const match of paragraph.matchAll(SENTENCE_END)) {
    const punctEnd = (match.index ?? 0) + match[0].trimEnd().length;
    const nextStart = (match.index ?? 0) + match[0].length;
    const next = paragraph.charAt(nextStart);

    if (!next || !/[\p{Lu}\p{N}"'“‘(\[]/u.test(next)) continue;
    if (isAbbreviation(paragraph.slice(sentenceStart, punctEnd))) continue;
    if (insideSpan(spans, start + punctEnd)) continue;

    ranges.push({ start: start + sentenceStart, end: start + punctEnd });
    sentenceStart = nextStart;
  }

  if (sentenceStart < paragraph.length) {
    ranges.push({ start: start + sentenceStart, end: end });
  }
  return ranges.filter((r) => r.end > r.start);
}

/** Cuts an over-long sentence at whitespace outside entity spans. */
function splitLongSentence(
  text: string,
  range: { start: number; end: number },
  maxTokens: number,
  spans: EntitySpan[]
): Array<{ start: number; end: number; tokens: number }> {
  const pieces: Array<{ start: number; end: number; tokens: number }> = [];
  let pieceStart = range.start;
  let lastCut: number | null = null;

  const sentence = text.slice(range.start, range.end);
  for (const match of sentence.matchAll(/\s+/g)) {
    const cut = range.start + (match.index ?? 0);
    if (insideSpan(spans, cut)) continue;

    const tokens = countTokens(text.slice(pieceStart, cut));
    if (tokens > maxTokens && lastCut !== null) {
      pieces.push({ start: pieceStart, end: lastCut, tokens: countTokens(text.slice(pieceStart, lastCut)) });
      pieceStart = nextNonSpace(text, lastCut);
    }
    lastCut = cut;
  }

  const tail = countTokens(text.slice(pieceStart, range.end));
  if (tail > maxTokens && lastCut !== null && lastCut > pieceStart) {
    pieces.push({ start: pieceStart, end: lastCut, tokens: countTokens(text.slice(pieceStart, lastCut)) });
    pieceStart = nextNonSpace(text, lastCut);
  }
  pieces.push({ start: pieceStart, end: range.end, tokens: countTokens(text.slice(pieceStart, range.end)) });
  return pieces;
}

function nextNonSpace(text: string, index: number): number {
  let i = index;
  while (i < text.length && /\s/.test(text.charAt(i))) i++;
  return i;
}

export class Segmenter {
  constructor(private readonly options: SegmenterOptions) {}

  units(text: string, spans: EntitySpan[]): Unit[] {
    const units: Unit[] = [];
    for (const paragraph of paragraphs(text)) {
      const sentences = sentenceRanges(text, paragraph.start, paragraph.end, spans);
      sentences.forEach((sentence, i) => {
        const tokens = countTokens(text.slice(sentence.start, sentence.end));
        const pieces =
          tokens > this.options.maxTokens
            ? splitLongSentence(text, sentence, this.options.maxTokens, spans)
            : [{ ...sentence, tokens }];
        pieces.forEach((piece, j) => {
          units.push({
            ...piece,
            paragraphEnd: i === sentences.length - 1 && j === pieces.length - 1,
          });
        });
      });
    }
    return units;
  }

  segment(input: SegmentInput): SegmentResult {
    const { text, pages } = normalizePages(input.pages);
    if (!text) return { text, chunks: [] };

    const spans = detectEntities(text);
    const groups = this.pack(this.units(text, spans));

    const chunks = groups.map((group, sequence): Chunk => {
      const first = group[0];
      const last = group[group.length - 1];
      const start = first?.start ?? 0;
      const end = last?.end ?? start;
      const chunkText = text.slice(start, end);
      return {
        id: `${input.documentId}:${sequence}`,
        documentId: input.documentId,
        sequence,
        text: chunkText,
        start,
        end,
        page: pageAt(pages, start),
        tokenCount: group.reduce((sum, u) => sum + u.tokens, 0),
        language: detectLanguage(chunkText, this.options.languageHint),
        entities: entityMap(spans, start, end),
      };
    });

    return { text, chunks };
  }

  private pack(units: Unit[]): Unit[][] {
    const max = this.options.maxTokens;
    const groups: Unit[][] = [];
    let current: Unit[] = [];
    let tokens = 0;

    for (const unit of units) {
      if (current.length > 0 && tokens + unit.tokens > max) {
        const cut = this.cutIndex(current);
        groups.push(current.slice(0, cut));
        current = current.slice(cut);
        tokens = current.reduce((sum, u) => sum + u.tokens, 0);

        // Carried-over units may still not leave room.
        if (current.length > 0 && tokens + unit.tokens > max) {
          groups.push(current);
          current = [];
          tokens = 0;
        }
      }
      current.push(unit);
      tokens += unit.tokens;
    }

    if (current.length > 0) groups.push(current);
    return groups;
  }

  /** Number of leading units that form the chunk being closed. */
  private cutIndex(current: Unit[]): number {
    const half = this.options.maxTokens / 2;
    let running = 0;
    let best = current.length;
    for (let i = 0; i < current.length; i++) {
      const unit = current[i];
      if (!unit) continue;
      running += unit.tokens;
      if (unit.paragraphEnd && running >= half) best = i + 1;
    }
    return best;
  }
}
