/**
 * Format detection by content sniffing, with the file extension as a hint.
 * Content wins when the two disagree.
 */

import path from 'path';
import JSZip from 'jszip';
import type { DocumentFormat } from '@/types/document';
import { CorruptFileError, UnsupportedFormatError } from '@/lib/errors';

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  '.pdf': 'pdf',
  '.epub': 'epub',
  '.docx': 'docx',
  '.pptx': 'pptx',
  '.txt': 'txt',
  '.text': 'txt',
  '.md': 'txt',
};

const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

export function formatFromExtension(filename: string): DocumentFormat | null {
  return EXTENSION_FORMATS[path.extname(filename).toLowerCase()] ?? null;
}

export function looksLikePdf(buffer: Buffer): boolean {
  // The header may be preceded by junk within the first KB.
  return buffer.subarray(0, 1024).includes('%PDF-');
}

export function looksLikeText(buffer: Buffer): boolean {
  if (buffer.includes(0)) return false;
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    return true;
  } catch {
    return false;
  }
}

async function sniffZip(buffer: Buffer, filename: string): Promise<DocumentFormat> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (error) {
    throw new CorruptFileError(filename, error);
  }

  const mimetype = zip.file('mimetype');
  if (mimetype && (await mimetype.async('string')).trim() === 'application/epub+zip') return 'epub';
  if (zip.file('word/document.xml')) return 'docx';
  if (zip.file('ppt/presentation.xml')) return 'pptx';
  if (zip.file('META-INF/container.xml')) return 'epub';

  throw new UnsupportedFormatError(filename, 'ZIP container is not EPUB, DOCX or PPTX');
}

/**
 * Decide the format of `buffer`. Files that claim a binary format but don't
 * carry its signature are reported corrupt; anything else unknown is unsupported.
 */
export async function detectFormat(
  buffer: Buffer,
  filename: string,
  declared?: DocumentFormat | null
): Promise<DocumentFormat> {
  if (buffer.length === 0) throw new CorruptFileError(filename, new Error('file is empty'));

  if (looksLikePdf(buffer)) return 'pdf';
  if (buffer.subarray(0, 4).equals(ZIP_MAGIC)) return sniffZip(buffer, filename);

  const hinted = declared ?? formatFromExtension(filename);
  if (looksLikeText(buffer)) {
    if (hinted && hinted !== 'txt') {
      console.warn(`[Detector] ${filename} claims ${hinted} but contains plain text`);
    }
    return 'txt';
  }

  if (hinted && hinted !== 'txt') {
    throw new CorruptFileError(filename, new Error(`missing ${hinted.toUpperCase()} signature`));
  }
  throw new UnsupportedFormatError(filename, 'unrecognised binary content');
}
