export type SourceId = 'crossref' | 'openalex' | 'openlibrary' | 'googlebooks' | 'k10plus';

export const ALL_SOURCES: SourceId[] = ['crossref', 'openalex', 'openlibrary', 'googlebooks', 'k10plus'];

/** Non-external origins a field value can come from. */
export type LocalOrigin = 'document_properties' | 'text_heuristics' | 'ocr_text' | 'extraction' | 'manual';

export type ProvenanceSource = SourceId | LocalOrigin;

export type MatchKey = 'doi' | 'isbn' | 'fuzzy';

export const METADATA_FIELDS = [
  'title',
  'authors',
  'year',
  'journal',
  'publisher',
  'doi',
  'isbn',
  'language',
  'pageCount',
] as const;

export type MetadataField = (typeof METADATA_FIELDS)[number];

/** Fields merged candidate-by-candidate during reconciliation. */
export const RECONCILED_FIELDS = [
  'title',
  'authors',
  'year',
  'journal',
  'publisher',
  'doi',
  'isbn',
] as const satisfies readonly MetadataField[];

export type ReconciledField = (typeof RECONCILED_FIELDS)[number];

export interface MetadataValues {
  title: string | null;
  authors: string[] | null;
  year: number | null;
  journal: string | null;
  publisher: string | null;
  doi: string | null;
  isbn: string | null;
  language: string | null;
  pageCount: number | null;
}

export interface ProvenanceEntry {
  source: ProvenanceSource;
  confidence: number;
  matchKey?: MatchKey;
}

export interface ExtraAttribute {
  value: unknown;
  source: ProvenanceSource;
}

export interface ReconciliationConflict {
  field: MetadataField;
  values: Array<{ source: ProvenanceSource; value: string }>;
  resolution: string;
}

export interface MetadataReview {
  required: boolean;
  reasons: string[];
  conflicts: ReconciliationConflict[];
}

export interface Metadata extends MetadataValues {
  provenance: Partial<Record<MetadataField, ProvenanceEntry>>;
  extra: Record<string, ExtraAttribute>;
  review: MetadataReview;
  /** Mean provenance confidence over populated fields (0–1). */
  confidence: number;
}

export type CandidateFields = Partial<Omit<MetadataValues, 'pageCount' | 'language'>> & {
  language?: string | null;
  pageCount?: number | null;
};

export interface MetadataCandidate {
  source: SourceId;
  /** Match confidence, 0–1. */
  confidence: number;
  matchKey: MatchKey;
  /** Position in the source's own relevance ordering (0 = best). */
  rank: number;
  fields: CandidateFields;
  extra: Record<string, unknown>;
}

/** Locally available lookup keys, from document properties and first-page heuristics. */
export interface MetadataHints {
  doi: string | null;
  isbn: string | null;
  title: string | null;
  authors: string[];
  year: number | null;
}

export type MetadataPatch = Partial<MetadataValues>;

export function emptyMetadata(): Metadata {
  return {
    title: null,
    authors: null,
    year: null,
    journal: null,
    publisher: null,
    doi: null,
    isbn: null,
    language: null,
    pageCount: null,
    provenance: {},
    extra: {},
    review: { required: false, reasons: [], conflicts: [] },
    confidence: 0,
  };
}
