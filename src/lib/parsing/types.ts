/**
 * Shared types for format extraction and OCR.
 */

import type { DocumentFormat, PageMethod } from '@/types/document';

export interface PageText {
  /** 1-based */
  page: number;
  text: string;
  method: PageMethod;
}

/** Properties embedded in the file itself (PDF info dict, OOXML core.xml, OPF). */
export interface DocumentProperties {
  title: string | null;
  authors: string[];
  subject: string | null;
  keywords: string[];
  language: string | null;
  publisher: string | null;
  doi: string | null;
  isbn: string | null;
  /** Raw date string as found in the file */
  date: string | null;
}

export interface StructuralMetadata {
  pageCount: number;
  properties: DocumentProperties;
}

export interface ExtractorContext {
  filename: string;
  signal?: AbortSignal;
}

export interface ExtractorOutput {
  pages: PageText[];
  structural: StructuralMetadata;
}

/** One implementation per format, selected through the registry. */
export interface FormatExtractor {
  readonly format: DocumentFormat;
  extract(buffer: Buffer, context: ExtractorContext): Promise<ExtractorOutput>;
}

export interface ExtractionResult extends ExtractorOutput {
  format: DocumentFormat;
  /** Pages joined with blank lines */
  text: string;
  processingTimeMs: number;
}

export interface OcrResult {
  pages: PageText[];
  ocrPages: number[];
  ocrFailedPages: number[];
  warnings: string[];
}

/** Minimal OCR capability, so tests can swap Tesseract out. */
export interface OcrEngine {
  /** Aborting `signal` stops the recognition and frees the engine for the next image. */
  recognize(image: Buffer, signal?: AbortSignal): Promise<{ text: string; confidence: number }>;
  terminate(): Promise<void>;
}

/** Read-only handle over an opened PDF. Page indexes are 0-based. */
export interface PdfHandle {
  readonly pageCount: number;
  info(): Promise<Record<string, string>>;
  pageText(index: number): Promise<string>;
  renderPage(index: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface PdfReader {
  open(buffer: Buffer): Promise<PdfHandle>;
}

export function emptyProperties(): DocumentProperties {
  return {
    title: null,
    authors: [],
    subject: null,
    keywords: [],
    language: null,
    publisher: null,
    doi: null,
    isbn: null,
    date: null,
  };
}

export function joinPages(pages: PageText[]): string {
  return pages
    .map((p) => p.text.trim())
    .filter(Boolean)
    .join('\n\n');
}
