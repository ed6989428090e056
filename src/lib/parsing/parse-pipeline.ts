/**
 * Extraction entry point: detect → dispatch → timeout.
 *
 * Every failure leaves here as UnsupportedFormatError, CorruptFileError or
 * ExtractionTimeoutError, so a batch can report it per file.
 */

import type { DocumentFormat } from '@/types/document';
import {
  CorruptFileError,
  ExtractionTimeoutError,
  PipelineError,
  TimeoutError,
  UnsupportedFormatError,
} from '@/lib/errors';
import { withTimeout } from '@/lib/utils/async';
import type { ExtractionResult } from './types';
import { joinPages } from './types';
import { detectFormat } from './detector';
import type { ExtractorRegistry } from './registry';

export interface ExtractOptions {
  filename: string;
  declaredFormat?: DocumentFormat | null;
  timeoutMs: number;
  registry: ExtractorRegistry;
  signal?: AbortSignal;
}

export async function extractDocument(buffer: Buffer, options: ExtractOptions): Promise<ExtractionResult> {
  const startTime = Date.now();
  const { filename } = options;

  const format = await detectFormat(buffer, filename, options.declaredFormat);
  const extractor = options.registry.get(format);
  if (!extractor) throw new UnsupportedFormatError(filename, `no extractor registered for ${format}`);

  console.log(`[ParsePipeline] Parsing ${filename} (${format}, ${formatSize(buffer.length)})`);

  try {
    const output = await withTimeout(
      (signal) => extractor.extract(buffer, { filename, signal }),
      options.timeoutMs,
      `extract ${filename}`,
      options.signal
    );

    return {
      ...output,
      format,
      text: joinPages(output.pages),
      processingTimeMs: Date.now() - startTime,
    };
  } catch (error) {
    if (error instanceof TimeoutError) throw new ExtractionTimeoutError(filename, options.timeoutMs);
    if (error instanceof PipelineError) throw error;
    throw new CorruptFileError(filename, error);
  }
}

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
