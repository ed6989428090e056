import type { PageText } from '@/lib/parsing/types';

/**
 * NFC, line breaks unified, words hyphenated across a line break rejoined,
 * whitespace collapsed. Paragraphs (blank-line separated) survive as "\n\n".
 */
export function normalizeText(raw: string): string {
  return raw
    .normalize('NFC')
    .replace(/\r\n?/g, '\n')
    .replace(/\u00AD/g, '')
    .replace(/(\p{L})-\n[ \t]*(\p{Ll})/gu, '$1$2')
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .join('\n\n');
}

export interface PageOffset {
  page: number;
  start: number;
}

export interface NormalizedDocument {
  text: string;
  pages: PageOffset[];
}

/** Pages are normalised one by one and joined as paragraphs; empty pages leave no trace. */
export function normalizePages(pages: PageText[]): NormalizedDocument {
  let text = '';
  const offsets: PageOffset[] = [];

  for (const page of pages) {
    const normalized = normalizeText(page.text);
    if (!normalized) continue;
    if (text) text += '\n\n';
    offsets.push({ page: page.page, start: text.length });
    text += normalized;
  }

  return { text, pages: offsets };
}

export function pageAt(offsets: PageOffset[], position: number): number | null {
  let page: number | null = null;
  for (const offset of offsets) {
    if (offset.start > position) break;
    page = offset.page;
  }
  return page;
}

/** Words and punctuation marks each count as one token. */
export function countTokens(text: string): number {
  return text.match(/[\p{L}\p{N}_]+|[^\s\p{L}\p{N}_]/gu)?.length ?? 0;
}
