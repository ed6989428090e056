/**
 * PPTX extraction with jszip: one page per slide in presentation order,
 * slide text followed by its speaker notes.
 */

import path from 'path';
import JSZip from 'jszip';
import { CorruptFileError } from '@/lib/errors';
import { unescapeXml } from '@/lib/utils/xml';
import type { ExtractorContext, ExtractorOutput, FormatExtractor, PageText } from './types';
import { readCoreProperties } from './ooxml-properties';

function paragraphsOf(xml: string): string[] {
  const paragraphs: string[] = [];
  const paraRegex = /<a:p[ >][\s\S]*?<\/a:p>/g;
  let match: RegExpExecArray | null;

  while ((match = paraRegex.exec(xml)) !== null) {
    const runs: string[] = [];
    const runRegex = /<a:t(?:\s[^>]*)?>([^<]*)<\/a:t>/g;
    let run: RegExpExecArray | null;
    while ((run = runRegex.exec(match[0])) !== null) {
      runs.push(run[1] ?? '');
    }
    const text = unescapeXml(runs.join('')).trim();
    if (text) paragraphs.push(text);
  }
  return paragraphs;
}

/** Relationship id → target path, resolved against the part's folder. */
async function readRels(zip: JSZip, partPath: string): Promise<Map<string, { target: string; type: string }>> {
  const rels = new Map<string, { target: string; type: string }>();
  const dir = path.posix.dirname(partPath);
  const relsFile = zip.file(path.posix.join(dir, '_rels', `${path.posix.basename(partPath)}.rels`));
  if (!relsFile) return rels;

  const xml = await relsFile.async('string');
  for (const m of xml.matchAll(/<Relationship\b([^>]*)\/?>/g)) {
    const attrs = m[1] ?? '';
    const id = attrs.match(/\bId="([^"]+)"/)?.[1];
    const target = attrs.match(/\bTarget="([^"]+)"/)?.[1];
    const type = attrs.match(/\bType="([^"]+)"/)?.[1] ?? '';
    if (id && target) rels.set(id, { target: path.posix.normalize(path.posix.join(dir, target)), type });
  }
  return rels;
}

async function slideOrder(zip: JSZip): Promise<string[]> {
  const presentation = zip.file('ppt/presentation.xml');
  if (presentation) {
    const xml = await presentation.async('string');
    const rels = await readRels(zip, 'ppt/presentation.xml');
    const ordered = [...xml.matchAll(/<p:sldId\b[^>]*\br:id="([^"]+)"/g)]
      .map((m) => rels.get(m[1] ?? '')?.target)
      .filter((t): t is string => typeof t === 'string' && zip.file(t) !== null);
    if (ordered.length > 0) return ordered;
  }

  const slideNumber = (name: string) => parseInt(name.match(/slide(\d+)\.xml$/)?.[1] ?? '0', 10);
  return Object.keys(zip.files)
    .filter((f) => /^ppt\/slides\/slide\d+\.xml$/.test(f))
    .sort((a, b) => slideNumber(a) - slideNumber(b));
}

export class PptxExtractor implements FormatExtractor {
  readonly format = 'pptx' as const;

  async extract(buffer: Buffer, context: ExtractorContext): Promise<ExtractorOutput> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer);
    } catch (error) {
      throw new CorruptFileError(context.filename, error);
    }

    const slides = await slideOrder(zip);
    const pages: PageText[] = [];

    for (const [index, slidePath] of slides.entries()) {
      const slideFile = zip.file(slidePath);
      if (!slideFile) continue;
      const parts = paragraphsOf(await slideFile.async('string'));

      const rels = await readRels(zip, slidePath);
      for (const rel of rels.values()) {
        if (!rel.type.endsWith('/notesSlide')) continue;
        const notesFile = zip.file(rel.target);
        if (!notesFile) continue;
        // Notes placeholders repeat the slide number; drop bare numbers.
        const notes = paragraphsOf(await notesFile.async('string')).filter((p) => !/^\d+$/.test(p));
        parts.push(...notes);
      }

      const text = parts.join('\n');
      pages.push({ page: index + 1, text, method: text ? 'native' : 'empty' });
    }

    console.log(`[PptxExtractor] ${context.filename}: ${pages.length} slides`);

    return {
      pages,
      structural: { pageCount: pages.length, properties: await readCoreProperties(zip) },
    };
  }
}
