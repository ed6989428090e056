/**
 * String similarity and identifier normalisation for metadata matching.
 */

export function normalizeText(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

function tokenDice(a: string, b: string): number {
  const ta = new Set(a.split(' ').filter(Boolean));
  const tb = new Set(b.split(' ').filter(Boolean));
  if (ta.size === 0 || tb.size === 0) return 0;
  let shared = 0;
  for (const t of ta) if (tb.has(t)) shared++;
  return (2 * shared) / (ta.size + tb.size);
}

/** 0–1; the better of edit-distance ratio and token overlap on normalised text. */
export function similarity(a: string | null | undefined, b: string | null | undefined): number {
  if (!a || !b) return 0;
  const na = normalizeText(a);
  const nb = normalizeText(b);
  if (!na || !nb) return 0;
  if (na === nb) return 1;
  const ratio = 1 - levenshtein(na, nb) / Math.max(na.length, nb.length);
  return Math.max(ratio, tokenDice(na, nb));
}

/** "Smith, Jane" and "Jane Smith" both give "smith". */
export function familyName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.includes(',')) return normalizeText(trimmed.split(',')[0] ?? '');
  const parts = normalizeText(trimmed).split(' ');
  return parts[parts.length - 1] ?? '';
}

/** Share of `wanted` family names that appear in `found`, or null when either side is empty. */
export function authorOverlap(wanted: string[], found: string[] | null | undefined): number | null {
  if (wanted.length === 0 || !found || found.length === 0) return null;
  const families = new Set(found.map(familyName).filter(Boolean));
  const hits = wanted.filter((name) => families.has(familyName(name))).length;
  return hits / wanted.length;
}

/**
 * Confidence for a title/author match. Title similarity carries 70%,
 * author overlap 30% when both sides name authors.
 */
export function fuzzyConfidence(
  hints: { title: string | null; authors: string[] },
  candidate: { title?: string | null; authors?: string[] | null }
): number {
  const titleScore = similarity(hints.title, candidate.title);
  const authorScore = authorOverlap(hints.authors, candidate.authors);

  if (!hints.title) return authorScore === null ? 0 : authorScore * 0.5;
  if (authorScore === null) return titleScore;
  return 0.7 * titleScore + 0.3 * authorScore;
}

export function normalizeDoi(doi: string | null | undefined): string | null {
  if (!doi) return null;
  const cleaned = doi
    .trim()
    .replace(/^https?:\/\/(?:dx\.)?doi\.org\//i, '')
    .replace(/^doi:\s*/i, '')
    .replace(/[.,;)\]]+$/, '')
    .toLowerCase();
  return /^10\.\d{4,9}\/\S+$/.test(cleaned) ? cleaned : null;
}

export function isbn10To13(isbn10: string): string {
  const core = `978${isbn10.slice(0, 9)}`;
  let sum = 0;
  for (let i = 0; i < 12; i++) sum += Number(core[i]) * (i % 2 === 0 ? 1 : 3);
  return `${core}${(10 - (sum % 10)) % 10}`;
}

/** Strips separators; returns ISBN-13 form, or null when not 10/13 characters. */
export function normalizeIsbn(isbn: string | null | undefined): string | null {
  if (!isbn) return null;
  const cleaned = isbn.replace(/^isbn(?:-1[03])?:?\s*/i, '').replace(/[^0-9Xx]/g, '').toUpperCase();
  if (/^\d{13}$/.test(cleaned)) return cleaned;
  if (/^\d{9}[\dX]$/.test(cleaned)) return isbn10To13(cleaned);
  return null;
}
