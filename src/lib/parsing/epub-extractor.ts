/**
 * EPUB extraction: container.xml → OPF package, Dublin Core metadata,
 * and one page per spine item in reading order.
 */

import path from 'path';
import JSZip from 'jszip';
import { CorruptFileError } from '@/lib/errors';
import { attrOf, children, descend, parseXml, textOf } from '@/lib/utils/xml';
import type { DocumentProperties, ExtractorContext, ExtractorOutput, FormatExtractor, PageText } from './types';
import { emptyProperties } from './types';
import { splitKeywords } from './ooxml-properties';
import { htmlToText } from './html';

/** EPUBs have no fixed pages; estimate from text length. */
const CHARS_PER_PRINTED_PAGE = 2000;

function readIdentifiers(metadata: unknown, props: DocumentProperties): void {
  for (const node of children(metadata, 'identifier')) {
    const value = textOf(node);
    if (!value) continue;
    const scheme = (attrOf(node, 'scheme') ?? '').toLowerCase();
    const lower = value.toLowerCase();

    if (scheme === 'isbn' || lower.startsWith('urn:isbn:') || lower.startsWith('isbn:')) {
      props.isbn ??= value.replace(/^(?:urn:)?isbn:/i, '').replace(/[\s-]/g, '');
    } else if (scheme === 'doi' || lower.startsWith('doi:') || /^10\.\d{4,}\//.test(value)) {
      props.doi ??= value.replace(/^doi:/i, '');
    }
  }
}

export class EpubExtractor implements FormatExtractor {
  readonly format = 'epub' as const;

  async extract(buffer: Buffer, context: ExtractorContext): Promise<ExtractorOutput> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer);
    } catch (error) {
      throw new CorruptFileError(context.filename, error);
    }

    const container = zip.file('META-INF/container.xml');
    if (!container) throw new CorruptFileError(context.filename, new Error('META-INF/container.xml missing'));

    const containerXml = await parseXml(await container.async('string'));
    const opfPath = attrOf(descend(containerXml, 'container', 'rootfiles', 'rootfile'), 'full-path');
    const opfFile = opfPath ? zip.file(opfPath) : null;
    if (!opfPath || !opfFile) throw new CorruptFileError(context.filename, new Error('OPF package not found'));

    const pkg = descend(await parseXml(await opfFile.async('string')), 'package');
    const metadata = descend(pkg, 'metadata');

    const properties = emptyProperties();
    properties.title = textOf(descend(metadata, 'title'));
    properties.authors = children(metadata, 'creator')
      .map(textOf)
      .filter((v): v is string => v !== null);
    properties.subject = textOf(descend(metadata, 'description'));
    properties.keywords = children(metadata, 'subject').flatMap((s) => splitKeywords(textOf(s)));
    properties.language = textOf(descend(metadata, 'language'));
    properties.publisher = textOf(descend(metadata, 'publisher'));
    properties.date = textOf(descend(metadata, 'date'));
    readIdentifiers(metadata, properties);

    const manifest = new Map<string, string>();
    for (const item of children(descend(pkg, 'manifest'), 'item')) {
      const id = attrOf(item, 'id');
      const href = attrOf(item, 'href');
      if (id && href) manifest.set(id, href);
    }

    const baseDir = path.posix.dirname(opfPath);
    const pages: PageText[] = [];

    for (const itemref of children(descend(pkg, 'spine'), 'itemref')) {
      if (context.signal?.aborted) break;
      const href = manifest.get(attrOf(itemref, 'idref') ?? '');
      if (!href) continue;
      const file = zip.file(path.posix.normalize(path.posix.join(baseDir, decodeURIComponent(href))));
      if (!file) continue;

      const text = htmlToText(await file.async('string'));
      if (!text) continue;
      pages.push({ page: pages.length + 1, text, method: 'native' });
    }

    const totalChars = pages.reduce((sum, p) => sum + p.text.length, 0);
    console.log(`[EpubExtractor] ${context.filename}: ${pages.length} spine items, ${totalChars} chars`);

    return {
      pages,
      structural: {
        pageCount: Math.max(1, Math.round(totalChars / CHARS_PER_PRINTED_PAGE)),
        properties,
      },
    };
  }
}
