/**
 * Tesseract.js OCR engine with Sharp preprocessing.
 *
 * Language data comes from the @tesseract.js-data/<code> npm packages, so
 * the engine never fetches traineddata at run time.
 */

import { readFileSync } from 'fs';
import { createRequire } from 'module';
import path from 'path';
import { gunzipSync } from 'zlib';
import { createWorker, type Worker } from 'tesseract.js';
import { errorMessage } from '@/lib/errors';
import type { OcrEngine } from './types';
import { preprocessForOcr } from './preprocessor';

/** Model variant tesseract.js uses for its default LSTM engine. */
const DATA_VARIANT = '4.0.0_best_int';

export interface TesseractOptions {
  /** Tesseract language string, e.g. "eng+deu" */
  languages: string;
  /** Rendered PDF pages are clean 300 DPI PNGs; skip upscaling for them. */
  upscale?: boolean;
  /** Defaults to reading the installed @tesseract.js-data packages. */
  loadLanguages?: (languages: string) => LanguageData[];
}

export interface LanguageData {
  code: string;
  data: Uint8Array;
}

export type PackageResolver = (specifier: string) => string;

const requireFromHere = createRequire(import.meta.url);

/** Locate `<code>.traineddata.gz` inside the installed @tesseract.js-data package of each language. */
export function languageDataFiles(
  languages: string,
  resolve: PackageResolver = (specifier) => requireFromHere.resolve(specifier)
): Array<{ code: string; file: string }> {
  const codes = languages
    .split('+')
    .map((code) => code.trim())
    .filter(Boolean);

  return codes.map((code) => {
    let manifest: string;
    try {
      manifest = resolve(`@tesseract.js-data/${code}/package.json`);
    } catch (error) {
      throw new Error(
        `OCR language data for "${code}" is not installed (add @tesseract.js-data/${code}): ${errorMessage(error)}`
      );
    }
    return { code, file: path.join(path.dirname(manifest), DATA_VARIANT, `${code}.traineddata.gz`) };
  });
}

export function loadLanguageData(languages: string): LanguageData[] {
  return languageDataFiles(languages).map(({ code, file }) => ({
    code,
    data: new Uint8Array(gunzipSync(readFileSync(file))),
  }));
}

export class TesseractOcrEngine implements OcrEngine {
  private worker: Promise<Worker> | null = null;

  constructor(private readonly options: TesseractOptions) {}

  private getWorker(): Promise<Worker> {
    if (!this.worker) {
      console.log(`[OCR] Starting Tesseract worker (${this.options.languages})`);
      const starting = Promise.resolve()
        .then(() => createWorker((this.options.loadLanguages ?? loadLanguageData)(this.options.languages), undefined, {
            cacheMethod: 'none',
          }))
        .catch((error: unknown) => {
          if (this.worker === starting) this.worker = null;
          throw error;
        });
      this.worker = starting;
    }
    return this.worker;
  }

  /**
   * Recognise one image. When `signal` aborts mid-recognition the worker is
   * terminated and replaced, so the next page starts on an idle worker.
   */
  async recognize(image: Buffer, signal?: AbortSignal): Promise<{ text: string; confidence: number }> {
    const prepared = await preprocessForOcr(image, { upscale: this.options.upscale ?? false });
    const starting = this.getWorker();
    const worker = await starting;
    if (signal?.aborted) throw new Error('recognition aborted');

    const recognition = worker.recognize(prepared.buffer);
    let rejectAborted: (reason: Error) => void = () => undefined;
    const aborted = new Promise<never>((_, reject) => {
      rejectAborted = reject;
    });
    const onAbort = () => rejectAborted(new Error('recognition aborted'));
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await Promise.race([recognition, aborted]);
      return {
        text: result.data.text ?? '',
        confidence: result.data.confidence ?? 0,
      };
    } catch (error) {
      if (signal?.aborted) {
        void recognition.catch((late: unknown) => {
          console.warn(`[OCR] Abandoned recognition ended with: ${errorMessage(late)}`);
        });
        console.warn('[OCR] Recognition aborted, replacing Tesseract worker');
        await this.discard(starting);
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  async terminate(): Promise<void> {
    if (!this.worker) return;
    await this.discard(this.worker);
  }

  private async discard(starting: Promise<Worker>): Promise<void> {
    if (this.worker === starting) this.worker = null;
    const worker = await starting;
    await worker.terminate();
  }
}
