import { describe, it, expect } from 'vitest';
import type { PageText } from '@/lib/parsing/types';
import { detectEntities } from '../entities';
import { detectLanguage } from '../language';
import { countTokens, normalizeText } from '../normalize';
import { Segmenter, sentenceRanges } from '../segmenter';

function page(n: number, text: string): PageText {
  return { page: n, text, method: 'native' };
}

describe('normalizeText', () => {
  it('rejoins hyphenated words and keeps paragraphs', () => {
    expect(normalizeText('Hyphen-\nated words\r\nacross  lines\n\n\nNew para')).toBe(
      'Hyphenated words across lines\n\nNew para'
    );
  });

  it('counts words and punctuation as tokens', () => {
    expect(countTokens('Hello, world!')).toBe(4);
  });
});

describe('detectEntities', () => {
  it('tags people, organisations, contacts and dates', () => {
    const { chunks } = new Segmenter({ maxTokens: 256 }).segment({
      documentId: 'doc-1',
      pages: [
        page(1, 'Jane Smith works at the University of Oxford.\nShe wrote a paper.'),
        page(2, 'Contact jane@example.org or see https://example.org/paper. Published 12 March 2020.'),
      ],
    });

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.entities).toEqual({
      DATE: ['12 March 2020'],
      EMAIL: ['jane@example.org'],
      ORG: ['University of Oxford'],
      PERSON: ['Jane Smith'],
      URL: ['https://example.org/paper'],
    });
  });

  it('finds DOIs and ISBNs', () => {
    const spans = detectEntities('See doi:10.1234/dla.2020.7, or ISBN 978-3-16-148410-0 for the book.');
    expect(spans.map((s) => [s.type, s.text])).toEqual([
      ['DOI', '10.1234/dla.2020.7'],
      ['ISBN', '978-3-16-148410-0'],
    ]);
  });
});

describe('sentenceRanges', () => {
  it('does not split after abbreviations or initials', () => {
    const text = 'Results were reported by Dr. Smith et al. in 2020. The method e.g. works on J. R. Tolkien texts.';
    const ranges = sentenceRanges(text, 0, text.length, detectEntities(text));
    expect(ranges.map((r) => text.slice(r.start, r.end))).toEqual([
      'Results were reported by Dr. Smith et al. in 2020.',
      'The method e.g. works on J. R. Tolkien texts.',
    ]);
  });
});

describe('Segmenter', () => {
  const pages = [
    page(1, 'Alpha beta gamma. Delta epsilon zeta.\n\nEta theta iota. Kappa lambda mu.'),
    page(2, 'Nu xi omicron. Pi rho sigma.'),
  ];

  it('packs sentences up to the token budget with page attribution', () => {
    const { chunks } = new Segmenter({ maxTokens: 8 }).segment({ documentId: 'doc-1', pages });

    expect(chunks.map((c) => [c.id, c.text, c.page, c.tokenCount])).toEqual([
      ['doc-1:0', 'Alpha beta gamma. Delta epsilon zeta.', 1, 8],
      ['doc-1:1', 'Eta theta iota. Kappa lambda mu.', 1, 8],
      ['doc-1:2', 'Nu xi omicron. Pi rho sigma.', 2, 8],
    ]);
  });

  it('prefers paragraph ends over filling the budget', () => {
    const { chunks } = new Segmenter({ maxTokens: 12 }).segment({ documentId: 'doc-1', pages });

    expect(chunks.map((c) => c.text)).toEqual([
      'Alpha beta gamma. Delta epsilon zeta.',
      'Eta theta iota. Kappa lambda mu.',
      'Nu xi omicron. Pi rho sigma.',
    ]);
  });

  it('records offsets into the normalised text', () => {
    const { text, chunks } = new Segmenter({ maxTokens: 8 }).segment({ documentId: 'doc-1', pages });
    for (const chunk of chunks) {
      expect(text.slice(chunk.start, chunk.end)).toBe(chunk.text);
    }
  });

  it('splits an over-long sentence at word boundaries outside entities', () => {
    const { chunks } = new Segmenter({ maxTokens: 10 }).segment({
      documentId: 'doc-2',
      pages: [page(1, 'See https://example.org/a/b/c/d/e for details and more words here')],
    });

    expect(chunks.map((c) => c.text)).toEqual([
      'See',
      'https://example.org/a/b/c/d/e',
      'for details and more words here',
    ]);
    expect(chunks[1]?.entities.URL).toEqual(['https://example.org/a/b/c/d/e']);
  });

  it('is deterministic', () => {
    const segmenter = new Segmenter({ maxTokens: 8 });
    expect(segmenter.segment({ documentId: 'doc-1', pages })).toEqual(
      segmenter.segment({ documentId: 'doc-1', pages })
    );
  });

  it('returns no chunks for empty text', () => {
    const { chunks } = new Segmenter({ maxTokens: 8 }).segment({ documentId: 'doc-3', pages: [page(1, '  ')] });
    expect(chunks).toEqual([]);
  });

  it('tags each chunk with its own language', () => {
    const { chunks } = new Segmenter({ maxTokens: 20 }).segment({
      documentId: 'doc-4',
      pages: [
        page(1, 'The results of the study are shown in the table and the figure.'),
        page(2, 'Die Ergebnisse der Studie sind in der Tabelle und in der Abbildung dargestellt.'),
      ],
    });

    expect(chunks.map((c) => c.language)).toEqual(['en', 'de']);
  });
});

describe('detectLanguage', () => {
  it('returns und for too little text', () => {
    expect(detectLanguage('Hello')).toBe('und');
  });

  it('uses the hint to break ties', () => {
    expect(detectLanguage('alpha in beta die gamma in delta die', 'de')).toBe('de');
    expect(detectLanguage('alpha in beta die gamma in delta die')).toBe('und');
  });
});
