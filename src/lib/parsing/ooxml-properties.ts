/**
 * OOXML `docProps/core.xml` and `docProps/app.xml`, shared by DOCX and PPTX.
 */

import type JSZip from 'jszip';
import { descend, parseXml, textOf } from '@/lib/utils/xml';
import type { DocumentProperties } from './types';
import { emptyProperties } from './types';

export function splitPeople(value: string | null): string[] {
  if (!value) return [];
  return value
    .split(/\s*;\s*|\s+(?:and|und|&)\s+/i)
    .map((s) => s.trim())
    .filter(Boolean);
}

export function splitKeywords(value: string | null): string[] {
  if (!value) return [];
  return value
    .split(/[,;]/)
    .map((s) => s.trim())
    .filter(Boolean);
}

export async function readCoreProperties(zip: JSZip): Promise<DocumentProperties> {
  const props = emptyProperties();
  const file = zip.file('docProps/core.xml');
  if (!file) return props;

  const root = descend(await parseXml(await file.async('string')), 'coreProperties');

  props.title = textOf(descend(root, 'title'));
  props.authors = splitPeople(textOf(descend(root, 'creator')));
  props.subject = textOf(descend(root, 'subject')) ?? textOf(descend(root, 'description'));
  props.keywords = splitKeywords(textOf(descend(root, 'keywords')));
  props.language = textOf(descend(root, 'language'));
  props.date = textOf(descend(root, 'created'));

  const identifier = textOf(descend(root, 'identifier'));
  if (identifier && /^10\.\d{4,}\//.test(identifier)) props.doi = identifier;

  return props;
}

/** Page or slide count recorded by the authoring application, if any. */
export async function readAppPageCount(zip: JSZip, element: 'Pages' | 'Slides'): Promise<number | null> {
  const file = zip.file('docProps/app.xml');
  if (!file) return null;
  const raw = textOf(descend(await parseXml(await file.async('string')), 'Properties', element));
  const count = raw ? parseInt(raw, 10) : NaN;
  return Number.isFinite(count) && count > 0 ? count : null;
}
