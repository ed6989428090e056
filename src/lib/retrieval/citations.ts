/** `[n]` markers in generated answers. */

const MARKER_GROUP = /\[(\d+(?:\s*,\s*\d+)*)\]/g;

/** Distinct marker numbers in order of first use, limited to 1..max. */
export function citedMarkers(answer: string, max: number): number[] {
  const seen: number[] = [];
  for (const match of answer.matchAll(MARKER_GROUP)) {
    for (const part of (match[1] ?? '').split(',')) {
      const n = Number(part.trim());
      if (n >= 1 && n <= max && !seen.includes(n)) seen.push(n);
    }
  }
  return seen;
}

/** Removes marker numbers outside 1..max; a group left empty disappears. */
export function stripInvalidMarkers(answer: string, max: number): string {
  return answer
    .replace(MARKER_GROUP, (_whole, group: string) => {
      const valid = group
        .split(',')
        .map((p) => Number(p.trim()))
        .filter((n) => n >= 1 && n <= max);
      return valid.length > 0 ? `[${valid.join(', ')}]` : '';
    })
    .replace(/[ \t]+([.,;:!?])/g, '$1')
    .replace(/[ \t]{2,}/g, ' ')
    .trim();
}
