/**
 * Builders for in-memory test documents. Office and EPUB files are real
 * ZIP containers; PDFs are tagged byte strings read through FakePdfReader.
 */

import JSZip from 'jszip';
import type { FetchLike } from '@/lib/metadata/sources';
import type { OcrEngine, PdfHandle, PdfReader } from '@/lib/parsing/types';

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export interface CoreProps {
  title?: string;
  creator?: string;
  keywords?: string;
}

function coreXml(props: CoreProps): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:dcterms="http://purl.org/dc/terms/">
${props.title ? `<dc:title>${escapeXml(props.title)}</dc:title>` : ''}
${props.creator ? `<dc:creator>${escapeXml(props.creator)}</dc:creator>` : ''}
${props.keywords ? `<cp:keywords>${escapeXml(props.keywords)}</cp:keywords>` : ''}
</cp:coreProperties>`;
}

export async function buildDocx(paragraphs: string[], props: CoreProps = {}): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    '[Content_Types].xml',
    `<?xml version="1.0" encoding="UTF-8"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
<Default Extension="xml" ContentType="application/xml"/>
<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
</Types>`
  );
  zip.file(
    '_rels/.rels',
    `<?xml version="1.0" encoding="UTF-8"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`
  );
  const body = paragraphs
    .map((p) => `<w:p><w:r><w:t xml:space="preserve">${escapeXml(p)}</w:t></w:r></w:p>`)
    .join('');
  zip.file(
    'word/document.xml',
    `<?xml version="1.0" encoding="UTF-8"?>
<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${body}</w:body></w:document>`
  );
  zip.file('docProps/core.xml', coreXml(props));
  return zip.generateAsync({ type: 'nodebuffer' });
}

export interface SlideSpec {
  paragraphs: string[];
  notes?: string[];
}

function slideXml(paragraphs: string[], root: 'p:sld' | 'p:notes'): string {
  const paras = paragraphs.map((p) => `<a:p><a:r><a:t>${escapeXml(p)}</a:t></a:r></a:p>`).join('');
  return `<?xml version="1.0" encoding="UTF-8"?>
<${root} xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main"><p:cSld><p:spTree><p:sp><p:txBody>${paras}</p:txBody></p:sp></p:spTree></p:cSld></${root}>`;
}

/** Slides are listed in presentation.xml in the given order, numbered in reverse to exercise ordering. */
export async function buildPptx(slides: SlideSpec[], props: CoreProps = {}): Promise<Buffer> {
  const zip = new JSZip();
  const count = slides.length;
  const ids = slides.map((_, i) => `<p:sldId id="${256 + i}" r:id="rId${i + 1}"/>`).join('');
  const rels = slides
    .map(
      (_, i) =>
        `<Relationship Id="rId${i + 1}" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/slide" Target="slides/slide${count - i}.xml"/>`
    )
    .join('');

  zip.file(
    'ppt/presentation.xml',
    `<?xml version="1.0" encoding="UTF-8"?>
<p:presentation xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships"><p:sldIdLst>${ids}</p:sldIdLst></p:presentation>`
  );
  zip.file(
    'ppt/_rels/presentation.xml.rels',
    `<?xml version="1.0" encoding="UTF-8"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">${rels}</Relationships>`
  );

  slides.forEach((slide, i) => {
    const n = count - i;
    zip.file(`ppt/slides/slide${n}.xml`, slideXml(slide.paragraphs, 'p:sld'));
    if (slide.notes) {
      zip.file(`ppt/notesSlides/notesSlide${n}.xml`, slideXml([...slide.notes, String(n)], 'p:notes'));
      zip.file(
        `ppt/slides/_rels/slide${n}.xml.rels`,
        `<?xml version="1.0" encoding="UTF-8"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"><Relationship Id="rId9" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/notesSlide" Target="../notesSlides/notesSlide${n}.xml"/></Relationships>`
      );
    }
  });

  zip.file('docProps/core.xml', coreXml(props));
  return zip.generateAsync({ type: 'nodebuffer' });
}

export interface EpubSpec {
  title: string;
  creators: string[];
  language?: string;
  publisher?: string;
  date?: string;
  isbn?: string;
  chapters: string[];
}

export async function buildEpub(book: EpubSpec): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('mimetype', 'application/epub+zip');
  zip.file(
    'META-INF/container.xml',
    `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container"><rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles></container>`
  );

  const manifest = book.chapters
    .map((_, i) => `<item id="ch${i + 1}" href="text/ch${i + 1}.xhtml" media-type="application/xhtml+xml"/>`)
    .join('');
  // Spine lists chapters in order; manifest order is irrelevant.
  const spine = book.chapters.map((_, i) => `<itemref idref="ch${i + 1}"/>`).join('');
  const creators = book.creators.map((c) => `<dc:creator>${escapeXml(c)}</dc:creator>`).join('');

  zip.file(
    'OEBPS/content.opf',
    `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="bookid">
<metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
<dc:title>${escapeXml(book.title)}</dc:title>${creators}
${book.language ? `<dc:language>${book.language}</dc:language>` : ''}
${book.publisher ? `<dc:publisher>${escapeXml(book.publisher)}</dc:publisher>` : ''}
${book.date ? `<dc:date>${book.date}</dc:date>` : ''}
${book.isbn ? `<dc:identifier id="bookid">urn:isbn:${book.isbn}</dc:identifier>` : ''}
</metadata>
<manifest>${manifest}</manifest>
<spine>${spine}</spine>
</package>`
  );

  book.chapters.forEach((chapter, i) => {
    zip.file(
      `OEBPS/text/ch${i + 1}.xhtml`,
      `<?xml version="1.0" encoding="UTF-8"?>
<html xmlns="http://www.w3.org/1999/xhtml"><head><title>c${i + 1}</title></head><body><p>${escapeXml(chapter)}</p></body></html>`
    );
  });

  return zip.generateAsync({ type: 'nodebuffer' });
}

export interface FakePdf {
  pages: string[];
  info?: Record<string, string>;
  /** OCR text per 0-based page index; pages missing here fail to recognise. */
  scanned?: Record<number, string>;
}

/** Bytes that sniff as PDF and identify a FakePdf by name. */
export function fakePdfBytes(name: string): Buffer {
  return Buffer.from(`%PDF-1.7\n%${name}\n%%EOF\n`, 'latin1');
}

function fakePdfName(buffer: Buffer): string {
  return buffer.toString('latin1').split('\n')[1]?.slice(1) ?? '';
}

export class FakePdfReader implements PdfReader {
  readonly rendered: number[] = [];
  private readonly docs = new Map<string, FakePdf>();

  add(name: string, pdf: FakePdf): Buffer {
    this.docs.set(name, pdf);
    return fakePdfBytes(name);
  }

  async open(buffer: Buffer): Promise<PdfHandle> {
    const name = fakePdfName(buffer);
    const pdf = this.docs.get(name);
    if (!pdf) throw new Error('Invalid PDF structure');
    const rendered = this.rendered;

    return {
      pageCount: pdf.pages.length,
      info: async () => pdf.info ?? {},
      pageText: async (index) => pdf.pages[index] ?? '',
      renderPage: async (index) => {
        rendered.push(index);
        return Buffer.from(`${name}#${index}`);
      },
      close: async () => undefined,
    };
  }

  ocrEngine(): OcrEngine {
    return {
      recognize: async (image) => {
        const [name, index] = image.toString().split('#');
        const text = this.docs.get(name ?? '')?.scanned?.[Number(index)];
        if (text === undefined) throw new Error('Tesseract could not read the image');
        return { text, confidence: 90 };
      },
      terminate: async () => undefined,
    };
  }
}

/** Ten pages of born-digital text with a DOI on the first page. */
export function bornDigitalPages(doi: string): string[] {
  return Array.from({ length: 10 }, (_, i) =>
    i === 0
      ? `Deep Learning for Document Analysis\nJane Smith and Omar Khan\nhttps://doi.org/${doi}\nAbstract. Neural networks learn layered representations of scanned documents.`
      : `Section ${i}. Neural networks are trained with gradient descent on labelled pages. ` +
        `Each layer transforms the representation produced by the previous one, page ${i + 1}.`
  );
}

export interface FakeRoute {
  /** Substring of the request URL. */
  match: string;
  status?: number;
  body: unknown;
}

/** First matching route answers; anything else is a 404. */
export function fakeFetch(routes: FakeRoute[]): { fetch: FetchLike; calls: string[] } {
  const calls: string[] = [];
  const fetch: FetchLike = async (url) => {
    calls.push(url);
    const route = routes.find((r) => url.includes(r.match));
    if (!route) return new Response('not found', { status: 404 });
    const body = typeof route.body === 'string' ? route.body : JSON.stringify(route.body);
    return new Response(body, { status: route.status ?? 200 });
  };
  return { fetch, calls };
}
