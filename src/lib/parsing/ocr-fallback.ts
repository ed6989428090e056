/**
 * OCR fallback for paged documents whose native text is too thin.
 *
 * Decision is made on the whole document (average chars per page), work is
 * done per page: only pages below the threshold are rendered and recognised.
 * A page that fails OCR is emptied and reported.
 */

import { withTimeout } from '@/lib/utils/async';
import { OcrFailureError, errorMessage } from '@/lib/errors';
import type { DocumentFormat } from '@/types/document';
import type { OcrEngine, OcrResult, PageText, PdfHandle, PdfReader } from './types';

export interface OcrFallbackOptions {
  minCharsPerPage: number;
  pageTimeoutMs: number;
  signal?: AbortSignal;
}

export function charsPerPage(pages: PageText[]): number {
  if (pages.length === 0) return 0;
  const total = pages.reduce((sum, p) => sum + p.text.trim().length, 0);
  return total / pages.length;
}

/** Formats whose pages can be rendered to images. */
const RENDERABLE: ReadonlySet<DocumentFormat> = new Set(['pdf']);

export function needsOcr(format: DocumentFormat, pages: PageText[], minCharsPerPage: number): boolean {
  return RENDERABLE.has(format) && pages.length > 0 && charsPerPage(pages) < minCharsPerPage;
}

function emptyPage(page: number): PageText {
  return { page, text: '', method: 'empty' };
}

export class OcrFallback {
  constructor(
    private readonly reader: PdfReader,
    private readonly engine: OcrEngine
  ) {}

  async run(buffer: Buffer, pages: PageText[], options: OcrFallbackOptions): Promise<OcrResult> {
    const targets = pages.filter((p) => p.text.trim().length < options.minCharsPerPage);
    const result: OcrResult = { pages: [...pages], ocrPages: [], ocrFailedPages: [], warnings: [] };
    if (targets.length === 0) return result;

    console.log(`[OcrFallback] Running OCR on ${targets.length}/${pages.length} pages`);

    let handle: PdfHandle;
    try {
      handle = await this.reader.open(buffer);
    } catch (error) {
      result.ocrFailedPages = targets.map((p) => p.page);
      result.pages = result.pages.map((p) => (result.ocrFailedPages.includes(p.page) ? emptyPage(p.page) : p));
      result.warnings.push(`OCR skipped, document could not be rendered: ${errorMessage(error)}`);
      return result;
    }

    try {
      for (const target of targets) {
        if (options.signal?.aborted) break;

        const replacement = await this.recognizePage(handle, target, options);
        if (replacement instanceof OcrFailureError) {
          console.warn(`[OcrFallback] ${replacement.message}`);
          result.pages = result.pages.map((p) => (p.page === target.page ? emptyPage(target.page) : p));
          result.ocrFailedPages.push(target.page);
          result.warnings.push(replacement.message);
          continue;
        }

        result.pages = result.pages.map((p) => (p.page === target.page ? replacement : p));
        if (replacement.method === 'ocr') result.ocrPages.push(target.page);
      }
    } finally {
      await handle.close();
    }

    console.log(
      `[OcrFallback] Done: ${result.ocrPages.length} pages recognised, ${result.ocrFailedPages.length} failed`
    );
    return result;
  }

  private async recognizePage(
    handle: PdfHandle,
    target: PageText,
    options: OcrFallbackOptions
  ): Promise<PageText | OcrFailureError> {
    try {
      const recognized = await withTimeout(
        async (signal) => {
          const image = await handle.renderPage(target.page - 1);
          return this.engine.recognize(image, signal);
        },
        options.pageTimeoutMs,
        `OCR page ${target.page}`,
        options.signal
      );

      const text = recognized.text.trim();
      if (text.length > target.text.trim().length) {
        return { page: target.page, text, method: 'ocr' };
      }
      return target;
    } catch (error) {
      return new OcrFailureError(target.page, error);
    }
  }
}
