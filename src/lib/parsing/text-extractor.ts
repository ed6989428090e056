import type { ExtractorContext, ExtractorOutput, FormatExtractor, PageText } from './types';
import { emptyProperties } from './types';

/** Plain UTF-8 text. Form feeds separate pages. */
export class TextExtractor implements FormatExtractor {
  readonly format = 'txt' as const;

  async extract(buffer: Buffer, context: ExtractorContext): Promise<ExtractorOutput> {
    const text = buffer
      .toString('utf-8')
      .replace(/^\uFEFF/, '')
      .replace(/\r\n?/g, '\n');

    const pages = text.split('\f').map((pageText, i): PageText => {
      const trimmed = pageText.trim();
      return { page: i + 1, text: trimmed, method: trimmed ? 'native' : 'empty' };
    });

    console.log(`[TextExtractor] ${context.filename}: ${text.length} chars, ${pages.length} pages`);

    return { pages, structural: { pageCount: pages.length, properties: emptyProperties() } };
  }
}
