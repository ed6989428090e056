/**
 * Sharp preprocessing applied to page images before OCR.
 */

import sharp from 'sharp';

export const TARGET_DPI = 300;
const MIN_OCR_DPI = 150;
/** ~400MB RGBA */
const MAX_UPSCALE_PIXELS = 100_000_000;

export interface PreprocessOptions {
  /** Upscale images below 150 DPI to 300 DPI. Rendered PDF pages are already at 300. */
  upscale?: boolean;
  /** Binarization cut-off, 0–255 */
  threshold?: number;
}

export interface PreprocessedImage {
  buffer: Buffer;
  dpi: number;
  warnings: string[];
}

export async function preprocessForOcr(
  image: Buffer,
  options: PreprocessOptions = {}
): Promise<PreprocessedImage> {
  const warnings: string[] = [];
  const meta = await sharp(image).metadata();
  const width = meta.width ?? 0;
  const height = meta.height ?? 0;
  let dpi = meta.density ?? 72;

  let pipeline = sharp(image);

  if ((options.upscale ?? true) && dpi < MIN_OCR_DPI) {
    const scale = TARGET_DPI / dpi;
    const outWidth = Math.round(width * scale);
    const outHeight = Math.round(height * scale);

    if (outWidth * outHeight > MAX_UPSCALE_PIXELS) {
      warnings.push(`Low resolution (${dpi} DPI) but ${width}x${height} is too large to upscale`);
    } else {
      pipeline = pipeline.resize({
        width: outWidth,
        height: outHeight,
        fit: 'fill',
        kernel: sharp.kernel.lanczos3,
      });
      warnings.push(`Upscaled ${dpi} DPI image to ~${TARGET_DPI} DPI`);
      dpi = TARGET_DPI;
    }
  }

  const buffer = await pipeline
    .grayscale()
    .normalize()
    .median(3)
    .threshold(options.threshold ?? 128)
    .png()
    .toBuffer();

  return { buffer, dpi, warnings };
}

export function isLowQuality(dpi: number): boolean {
  return dpi < MIN_OCR_DPI;
}
