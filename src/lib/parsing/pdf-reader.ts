/**
 * pdfjs-dist backed PDF access: per-page text, the info dictionary and
 * page rendering through @napi-rs/canvas (sharp's libvips has no poppler).
 */

import path from 'path';
import type { PdfHandle, PdfReader } from './types';
import { TARGET_DPI } from './preprocessor';

let pdfjsInitialized = false;

async function ensurePdfjs() {
  if (pdfjsInitialized) return;

  const { DOMMatrix: CanvasDOMMatrix } = await import('@napi-rs/canvas');
  if (typeof globalThis.DOMMatrix === 'undefined') {
    (globalThis as Record<string, unknown>).DOMMatrix = CanvasDOMMatrix;
  }

  const pdfjsLib = await import('pdfjs-dist/legacy/build/pdf.mjs');
  if (!pdfjsLib.GlobalWorkerOptions.workerSrc) {
    pdfjsLib.GlobalWorkerOptions.workerSrc = path.resolve(
      'node_modules/pdfjs-dist/legacy/build/pdf.worker.mjs'
    );
  }

  pdfjsInitialized = true;
}

async function loadPdfDocument(pdfBuffer: Buffer) {
  await ensurePdfjs();
  const pdfjsLib = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const loadingTask = pdfjsLib.getDocument({
    data: new Uint8Array(pdfBuffer),
    useWorkerFetch: false,
    isEvalSupported: false,
    useSystemFonts: true,
  });
  return loadingTask.promise;
}

type PdfDocument = Awaited<ReturnType<typeof loadPdfDocument>>;

class PdfjsHandle implements PdfHandle {
  constructor(private readonly doc: PdfDocument) {}

  get pageCount(): number {
    return this.doc.numPages;
  }

  async info(): Promise<Record<string, string>> {
    const { info } = await this.doc.getMetadata();
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(info)) {
      if (typeof value === 'string' && value.trim()) result[key] = value.trim();
    }
    return result;
  }

  async pageText(index: number): Promise<string> {
    const page = await this.doc.getPage(index + 1);
    const content = await page.getTextContent();

    let lastY: number | null = null;
    const parts: string[] = [];

    for (const item of content.items) {
      if (!('str' in item)) continue;
      const y: unknown = item.transform[5];
      const currentY = typeof y === 'number' ? y : null;

      if (lastY !== null && currentY !== null && Math.abs(currentY - lastY) > 5) {
        parts.push('\n');
      } else if (parts.length > 0 && !item.str.startsWith(' ')) {
        parts.push(' ');
      }

      parts.push(item.str);
      if (item.hasEOL) parts.push('\n');
      lastY = currentY;
    }

    return parts
      .join('')
      .replace(/[ \t]+\n/g, '\n')
      .replace(/ {2,}/g, ' ')
      .trim();
  }

  async renderPage(index: number): Promise<Buffer> {
    const { createCanvas } = await import('@napi-rs/canvas');
    const page = await this.doc.getPage(index + 1);
    const viewport = page.getViewport({ scale: TARGET_DPI / 72 });

    const canvas = createCanvas(Math.floor(viewport.width), Math.floor(viewport.height));
    const ctx = canvas.getContext('2d');

    // @napi-rs/canvas context is compatible at runtime but types don't match
    const renderParams = { canvasContext: ctx, viewport } as unknown;
    await page.render(renderParams as Parameters<typeof page.render>[0]).promise;

    return canvas.toBuffer('image/png');
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }
}

export class PdfjsReader implements PdfReader {
  async open(buffer: Buffer): Promise<PdfHandle> {
    return new PdfjsHandle(await loadPdfDocument(buffer));
  }
}
