import { describe, it, expect } from 'vitest';
import { createDefaultRegistry, ExtractorRegistry } from '../registry';
import { extractDocument } from '../parse-pipeline';
import type { FormatExtractor } from '../types';
import { ExtractionTimeoutError, CorruptFileError } from '@/lib/errors';
import { buildDocx, buildEpub, buildPptx, FakePdfReader } from '@/__tests__/fixtures';

function setup() {
  const reader = new FakePdfReader();
  return { reader, registry: createDefaultRegistry({ pdfReader: reader }) };
}

describe('extractDocument', () => {
  it('extracts DOCX body text and core properties', async () => {
    const { registry } = setup();
    const buffer = await buildDocx(['Graph neural networks', 'A survey of message passing.'], {
      title: 'GNN Survey',
      creator: 'Ada Lovelace; Alan Turing',
    });

    const result = await extractDocument(buffer, { filename: 'survey.docx', timeoutMs: 5000, registry });

    expect(result.format).toBe('docx');
    expect(result.text).toBe('Graph neural networks\n\nA survey of message passing.');
    expect(result.structural.properties.title).toBe('GNN Survey');
    expect(result.structural.properties.authors).toEqual(['Ada Lovelace', 'Alan Turing']);
  });

  it('extracts PPTX slides in presentation order with speaker notes', async () => {
    const { registry } = setup();
    const buffer = await buildPptx([
      { paragraphs: ['Intro', 'Why retrieval matters'], notes: ['Mention the benchmark'] },
      { paragraphs: ['Method'] },
    ]);

    const result = await extractDocument(buffer, { filename: 'talk.pptx', timeoutMs: 5000, registry });

    expect(result.pages.map((p) => p.text)).toEqual(['Intro\nWhy retrieval matters\nMention the benchmark', 'Method']);
    expect(result.structural.pageCount).toBe(2);
  });

  it('extracts EPUB spine items and Dublin Core metadata', async () => {
    const { registry } = setup();
    const buffer = await buildEpub({
      title: 'Foundations of Retrieval',
      creators: ['Maria Weber', 'Tom Lee'],
      language: 'en',
      publisher: 'Example Press',
      isbn: '9780306406157',
      chapters: ['Chapter one text.', 'Chapter two text.'],
    });

    const result = await extractDocument(buffer, { filename: 'book.epub', timeoutMs: 5000, registry });

    expect(result.pages.map((p) => p.text)).toEqual(['Chapter one text.', 'Chapter two text.']);
    expect(result.structural.properties).toMatchObject({
      title: 'Foundations of Retrieval',
      authors: ['Maria Weber', 'Tom Lee'],
      language: 'en',
      publisher: 'Example Press',
      isbn: '9780306406157',
    });
    expect(result.structural.pageCount).toBe(1);
  });

  it('splits plain text pages on form feeds and strips the BOM', async () => {
    const { registry } = setup();
    const buffer = Buffer.from('\uFEFFFirst page\r\nline two\fSecond page', 'utf-8');

    const result = await extractDocument(buffer, { filename: 'notes.txt', timeoutMs: 5000, registry });

    expect(result.pages).toEqual([
      { page: 1, text: 'First page\nline two', method: 'native' },
      { page: 2, text: 'Second page', method: 'native' },
    ]);
    expect(result.text).toBe('First page\nline two\n\nSecond page');
  });

  it('reads PDF pages and info dictionary through the reader', async () => {
    const { reader, registry } = setup();
    const buffer = reader.add('paper', {
      pages: ['Page one text', ''],
      info: { Title: 'On Chunking', Author: 'R. Roe and S. Poe', Subject: 'doi:10.1234/chunk.5' },
    });

    const result = await extractDocument(buffer, { filename: 'paper.pdf', timeoutMs: 5000, registry });

    expect(result.pages.map((p) => p.method)).toEqual(['native', 'empty']);
    expect(result.structural.properties).toMatchObject({
      title: 'On Chunking',
      authors: ['R. Roe', 'S. Poe'],
      doi: '10.1234/chunk.5',
    });
  });

  it('reports unreadable PDFs as corrupt', async () => {
    const { registry } = setup();
    const buffer = Buffer.from('%PDF-1.4\n%unknown\n');
    await expect(
      extractDocument(buffer, { filename: 'bad.pdf', timeoutMs: 5000, registry })
    ).rejects.toBeInstanceOf(CorruptFileError);
  });

  it('times out slow extractors', async () => {
    const stuck: FormatExtractor = {
      format: 'txt',
      extract: () => new Promise(() => undefined),
    };
    const registry = new ExtractorRegistry().register(stuck);

    await expect(
      extractDocument(Buffer.from('hello'), { filename: 'slow.txt', timeoutMs: 20, registry })
    ).rejects.toBeInstanceOf(ExtractionTimeoutError);
  });
});
