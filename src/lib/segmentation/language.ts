/**
 * Stop-word profile language detection. Works per chunk, so mixed-language
 * documents get per-chunk codes.
 */

import stopwords from './data/stopwords.json';

export const UNDETERMINED = 'und';

const PROFILES: Array<{ code: string; words: ReadonlySet<string> }> = Object.entries(stopwords).map(
  ([code, words]) => ({ code, words: new Set(words) })
);

const MIN_WORDS = 5;
const MIN_HITS = 2;

export interface LanguageScore {
  code: string;
  hits: number;
}

export function scoreLanguages(text: string): { total: number; scores: LanguageScore[] } {
  const words = text.toLowerCase().match(/\p{L}+/gu) ?? [];
  const scores = PROFILES.map(({ code, words: profile }) => ({
    code,
    hits: words.reduce((n, w) => (profile.has(w) ? n + 1 : n), 0),
  })).sort((a, b) => b.hits - a.hits || a.code.localeCompare(b.code));
  return { total: words.length, scores };
}

/**
 * ISO 639-1 code of the dominant language, `und` when the text carries too
 * little evidence. The hint decides between equally scored languages.
 */
export function detectLanguage(text: string, hint?: string | null): string {
  const { total, scores } = scoreLanguages(text);
  const best = scores[0];
  if (!best || total < MIN_WORDS || best.hits < MIN_HITS) return UNDETERMINED;

  const tied = scores.filter((s) => s.hits === best.hits);
  if (tied.length === 1) return best.code;
  if (hint && tied.some((s) => s.code === hint)) return hint;
  return UNDETERMINED;
}
