/**
 * PDF native text extraction, page by page through pdfjs-dist.
 *
 * Pages that yield little or no text are left for the OCR fallback,
 * which decides on the whole document's chars-per-page.
 */

import { CorruptFileError } from '@/lib/errors';
import type {
  DocumentProperties,
  ExtractorContext,
  ExtractorOutput,
  FormatExtractor,
  PageText,
  PdfHandle,
  PdfReader,
} from './types';
import { emptyProperties } from './types';
import { splitKeywords, splitPeople } from './ooxml-properties';

function propertiesFromInfo(info: Record<string, string>): DocumentProperties {
  const props = emptyProperties();
  props.title = info.Title ?? null;
  props.authors = splitPeople(info.Author ?? null);
  props.subject = info.Subject ?? null;
  props.keywords = splitKeywords(info.Keywords ?? null);

  const doi = `${info.Subject ?? ''} ${info.Keywords ?? ''}`.match(/\b(10\.\d{4,9}\/[^\s,;]+)/);
  if (doi?.[1]) props.doi = doi[1];
  return props;
}

export class PdfExtractor implements FormatExtractor {
  readonly format = 'pdf' as const;

  constructor(private readonly reader: PdfReader) {}

  async extract(buffer: Buffer, context: ExtractorContext): Promise<ExtractorOutput> {
    let handle: PdfHandle;
    try {
      handle = await this.reader.open(buffer);
    } catch (error) {
      throw new CorruptFileError(context.filename, error);
    }

    try {
      const pageCount = handle.pageCount;
      const pages: PageText[] = [];

      for (let index = 0; index < pageCount; index++) {
        if (context.signal?.aborted) break;
        const pageNum = index + 1;

        let text = '';
        try {
          text = await handle.pageText(index);
        } catch (err) {
          console.warn(`[PdfExtractor] ${context.filename} page ${pageNum}: native text failed:`, err);
        }

        pages.push({ page: pageNum, text, method: text ? 'native' : 'empty' });
      }

      let info: Record<string, string> = {};
      try {
        info = await handle.info();
      } catch (err) {
        console.warn(`[PdfExtractor] ${context.filename}: info dictionary unreadable:`, err);
      }

      const nativePages = pages.filter((p) => p.method === 'native').length;
      console.log(`[PdfExtractor] ${context.filename}: ${pageCount} pages, ${nativePages} with native text`);

      return { pages, structural: { pageCount, properties: propertiesFromInfo(info) } };
    } finally {
      await handle.close();
    }
  }
}
