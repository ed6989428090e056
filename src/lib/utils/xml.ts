/**
 * xml2js helpers. Documents are parsed with namespace prefixes stripped and
 * every child as an array, so lookups read the same for OPF, MARCXML and friends.
 */

import { parseStringPromise, processors } from 'xml2js';

export type XmlNode = Record<string, unknown>;

export async function parseXml(xml: string): Promise<XmlNode> {
  const parsed: unknown = await parseStringPromise(xml, {
    explicitArray: true,
    trim: true,
    tagNameProcessors: [processors.stripPrefix],
    attrNameProcessors: [processors.stripPrefix],
  });
  return isNode(parsed) ? parsed : {};
}

export function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** All children named `name`. */
export function children(node: unknown, name: string): unknown[] {
  if (!isNode(node)) return [];
  const value = node[name];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/** Follow a path of element names, taking the first match at each step. */
export function descend(node: unknown, ...names: string[]): unknown {
  let current: unknown = node;
  for (const name of names) {
    current = children(current, name)[0];
    if (current === undefined) return undefined;
  }
  return current;
}

export function textOf(node: unknown): string | null {
  if (typeof node === 'string') return node.trim() || null;
  if (isNode(node) && typeof node._ === 'string') return node._.trim() || null;
  return null;
}

export function attrOf(node: unknown, name: string): string | null {
  if (!isNode(node)) return null;
  const attrs = node.$;
  if (!isNode(attrs)) return null;
  const value = attrs[name];
  return typeof value === 'string' ? value : null;
}

export function unescapeXml(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&amp;/g, '&');
}
