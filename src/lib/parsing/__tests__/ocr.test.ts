import { describe, it, expect, vi, beforeEach } from 'vitest';

const { createWorker } = vi.hoisted(() => ({ createWorker: vi.fn() }));

vi.mock('tesseract.js', () => ({ createWorker }));
vi.mock('../preprocessor', () => ({
  preprocessForOcr: async (image: Buffer) => ({ buffer: image, dpi: 300, warnings: [] }),
}));

import { TesseractOcrEngine, languageDataFiles } from '../ocr';

const english = [{ code: 'eng', data: new Uint8Array([1, 2, 3]) }];

function fakeWorker(recognize: () => Promise<{ data: { text: string; confidence: number } }>) {
  return { recognize: vi.fn(recognize), terminate: vi.fn(async () => undefined) };
}

describe('languageDataFiles', () => {
  const resolve = (specifier: string) => {
    if (specifier === '@tesseract.js-data/fra/package.json') throw new Error('Cannot find module');
    return `/deps/node_modules/${specifier}`;
  };

  it('points at the gzipped traineddata of every language', () => {
    expect(languageDataFiles('eng+deu', resolve)).toEqual([
      { code: 'eng', file: '/deps/node_modules/@tesseract.js-data/eng/4.0.0_best_int/eng.traineddata.gz' },
      { code: 'deu', file: '/deps/node_modules/@tesseract.js-data/deu/4.0.0_best_int/deu.traineddata.gz' },
    ]);
  });

  it('names the package to add for a missing language', () => {
    expect(() => languageDataFiles('eng+fra', resolve)).toThrow(
      'OCR language data for "fra" is not installed (add @tesseract.js-data/fra): Cannot find module'
    );
  });
});

describe('TesseractOcrEngine', () => {
  beforeEach(() => {
    createWorker.mockReset();
  });

  it('starts one worker with bundled language data and reuses it', async () => {
    const worker = fakeWorker(async () => ({ data: { text: 'Page text', confidence: 91 } }));
    createWorker.mockResolvedValue(worker);
    const engine = new TesseractOcrEngine({ languages: 'eng', loadLanguages: () => english });

    expect(await engine.recognize(Buffer.from('a'))).toEqual({ text: 'Page text', confidence: 91 });
    await engine.recognize(Buffer.from('b'));

    expect(createWorker).toHaveBeenCalledTimes(1);
    expect(createWorker).toHaveBeenCalledWith(english, undefined, { cacheMethod: 'none' });
    await engine.terminate();
    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });

  it('replaces a worker whose recognition was aborted', async () => {
    const stuck = fakeWorker(() => new Promise(() => undefined));
    const fresh = fakeWorker(async () => ({ data: { text: 'Next page', confidence: 88 } }));
    createWorker.mockResolvedValueOnce(stuck).mockResolvedValueOnce(fresh);
    const engine = new TesseractOcrEngine({ languages: 'eng', loadLanguages: () => english });

    const controller = new AbortController();
    const pending = engine.recognize(Buffer.from('a'), controller.signal);
    await vi.waitFor(() => expect(stuck.recognize).toHaveBeenCalled());
    controller.abort();

    await expect(pending).rejects.toThrow('recognition aborted');
    expect(stuck.terminate).toHaveBeenCalledTimes(1);

    expect(await engine.recognize(Buffer.from('b'))).toEqual({ text: 'Next page', confidence: 88 });
    expect(createWorker).toHaveBeenCalledTimes(2);
  });
});
