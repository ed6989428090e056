/**
 * DOCX extraction: mammoth for the body, core.xml for properties.
 * Word files carry no reliable page breaks, so the body is one page.
 */

import JSZip from 'jszip';
import { CorruptFileError } from '@/lib/errors';
import type { ExtractorContext, ExtractorOutput, FormatExtractor } from './types';
import { htmlToText } from './html';
import { readAppPageCount, readCoreProperties } from './ooxml-properties';

export class DocxExtractor implements FormatExtractor {
  readonly format = 'docx' as const;

  async extract(buffer: Buffer, context: ExtractorContext): Promise<ExtractorOutput> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer);
    } catch (error) {
      throw new CorruptFileError(context.filename, error);
    }

    const mammoth = await import('mammoth');
    const result = await mammoth.convertToHtml({ buffer });
    const text = htmlToText(result.value ?? '');

    const properties = await readCoreProperties(zip);
    const pageCount = (await readAppPageCount(zip, 'Pages')) ?? 1;

    console.log(`[DocxExtractor] ${context.filename}: ${text.length} chars`);

    return {
      pages: [{ page: 1, text, method: text ? 'native' : 'empty' }],
      structural: { pageCount, properties },
    };
  }
}
