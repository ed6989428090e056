import { describe, it, expect } from 'vitest';
import { OcrFallback, charsPerPage, needsOcr } from '../ocr-fallback';
import type { PageText } from '../types';
import { FakePdfReader } from '@/__tests__/fixtures';

const longText = 'x'.repeat(80);

function pages(texts: string[]): PageText[] {
  return texts.map((text, i): PageText => ({ page: i + 1, text, method: text ? 'native' : 'empty' }));
}

describe('needsOcr', () => {
  it('never triggers when chars per page reach the threshold', () => {
    const native = pages([longText, longText, 'short']);
    expect(charsPerPage(native)).toBeCloseTo(55, 5);
    expect(needsOcr('pdf', native, 50)).toBe(false);
  });

  it('triggers for thin PDFs only', () => {
    const thin = pages(['', '', 'abc']);
    expect(needsOcr('pdf', thin, 50)).toBe(true);
    expect(needsOcr('docx', thin, 50)).toBe(false);
  });
});

describe('OcrFallback', () => {
  it('recognises every page of a scanned document', async () => {
    const reader = new FakePdfReader();
    const scanned = Object.fromEntries(Array.from({ length: 10 }, (_, i) => [i, `Scanned text of page ${i + 1}`]));
    const buffer = reader.add('scan', { pages: Array.from({ length: 10 }, () => ''), scanned });

    const fallback = new OcrFallback(reader, reader.ocrEngine());
    const result = await fallback.run(buffer, pages(Array.from({ length: 10 }, () => '')), {
      minCharsPerPage: 50,
      pageTimeoutMs: 1000,
    });

    expect(result.ocrPages).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(result.ocrFailedPages).toEqual([]);
    expect(result.pages.every((p) => p.method === 'ocr')).toBe(true);
    expect(result.pages[3]?.text).toBe('Scanned text of page 4');
  });

  it('keeps pages with usable text and fails soft on bad pages', async () => {
    const reader = new FakePdfReader();
    const buffer = reader.add('mixed', {
      pages: [longText, '', '', 'short native'],
      scanned: { 1: 'Recovered by OCR' },
    });

    const fallback = new OcrFallback(reader, reader.ocrEngine());
    const result = await fallback.run(buffer, pages([longText, '', '', 'short native']), {
      minCharsPerPage: 50,
      pageTimeoutMs: 1000,
    });

    expect(reader.rendered).toEqual([1, 2, 3]);
    expect(result.pages).toEqual([
      { page: 1, text: longText, method: 'native' },
      { page: 2, text: 'Recovered by OCR', method: 'ocr' },
      { page: 3, text: '', method: 'empty' },
      { page: 4, text: '', method: 'empty' },
    ]);
    expect(result.ocrPages).toEqual([2]);
    expect(result.ocrFailedPages).toEqual([3, 4]);
    expect(result.warnings).toHaveLength(2);
  });

  it('empties every target page when the document cannot be rendered', async () => {
    const reader = new FakePdfReader();
    const fallback = new OcrFallback(reader, reader.ocrEngine());
    const result = await fallback.run(Buffer.from('not a pdf'), pages([longText, 'thin']), {
      minCharsPerPage: 50,
      pageTimeoutMs: 1000,
    });

    expect(result.pages).toEqual([
      { page: 1, text: longText, method: 'native' },
      { page: 2, text: '', method: 'empty' },
    ]);
    expect(result.ocrFailedPages).toEqual([2]);
    expect(result.warnings).toEqual(['OCR skipped, document could not be rendered: Invalid PDF structure']);
  });
});
