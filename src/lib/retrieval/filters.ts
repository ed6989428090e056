import type { DocumentRecord } from '@/types/document';
import type { QueryFilters } from '@/types/query';

type FilterCheck = (record: DocumentRecord) => boolean;

/** One check per filter that is set. `documentIds` is handled by the index query. */
export function activeChecks(filters: QueryFilters): FilterCheck[] {
  const checks: FilterCheck[] = [];

  const author = filters.author?.toLowerCase();
  if (author) {
    checks.push((r) => (r.metadata?.authors ?? []).some((a) => a.toLowerCase().includes(author)));
  }
  const { yearFrom, yearTo } = filters;
  const yearOf = (r: DocumentRecord) => r.metadata?.year ?? null;
  if (yearFrom !== undefined) {
    checks.push((r) => {
      const year = yearOf(r);
      return year !== null && year >= yearFrom;
    });
  }
  if (yearTo !== undefined) {
    checks.push((r) => {
      const year = yearOf(r);
      return year !== null && year <= yearTo;
    });
  }

  const source = filters.source?.toLowerCase();
  if (source) {
    checks.push((r) =>
      [r.metadata?.journal, r.metadata?.publisher].some((v) => v != null && v.toLowerCase().includes(source))
    );
  }
  return checks;
}

export function matchesFilters(record: DocumentRecord, checks: FilterCheck[]): boolean {
  return checks.every((check) => check(record));
}

/** Share of the set filters the document satisfies; 1 when none are set. */
export function filterMatchRatio(record: DocumentRecord, checks: FilterCheck[]): number {
  if (checks.length === 0) return 1;
  return checks.filter((check) => check(record)).length / checks.length;
}
