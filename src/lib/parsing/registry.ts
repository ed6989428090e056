import type { DocumentFormat } from '@/types/document';
import type { FormatExtractor, PdfReader } from './types';
import { PdfExtractor } from './pdf-extractor';
import { DocxExtractor } from './docx-extractor';
import { PptxExtractor } from './pptx-extractor';
import { EpubExtractor } from './epub-extractor';
import { TextExtractor } from './text-extractor';

/**
 * Format → extractor lookup. Callers only ever see `FormatExtractor`;
 * a new format is one `register` call.
 */
export class ExtractorRegistry {
  private readonly extractors = new Map<DocumentFormat, FormatExtractor>();

  register(extractor: FormatExtractor): this {
    this.extractors.set(extractor.format, extractor);
    return this;
  }

  get(format: DocumentFormat): FormatExtractor | undefined {
    return this.extractors.get(format);
  }

  formats(): DocumentFormat[] {
    return [...this.extractors.keys()];
  }
}

export function createDefaultRegistry(deps: { pdfReader: PdfReader }): ExtractorRegistry {
  return new ExtractorRegistry()
    .register(new PdfExtractor(deps.pdfReader))
    .register(new DocxExtractor())
    .register(new PptxExtractor())
    .register(new EpubExtractor())
    .register(new TextExtractor());
}
