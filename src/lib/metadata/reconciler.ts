/**
 * Field-by-field merge of harvested candidates with locally extracted values.
 *
 * Candidate order is total: identifier matches before fuzzy ones, then
 * confidence, then the configured source trust order, then source id, then
 * the source's own rank. Each field takes its value from the first candidate
 * in that order that has one, so the result never depends on arrival order.
 */

import type {
  LocalOrigin,
  Metadata,
  MetadataCandidate,
  MetadataField,
  MetadataPatch,
  MetadataValues,
  ProvenanceEntry,
  ReconciliationConflict,
  SourceId,
} from '@/types/metadata';
import { METADATA_FIELDS, emptyMetadata } from '@/types/metadata';
import type { LocalMetadata } from './local-extractor';
import { normalizeDoi } from './similarity';

/** How much a locally derived value is trusted. */
const LOCAL_CONFIDENCE: Record<LocalOrigin, number> = {
  manual: 1,
  extraction: 1,
  document_properties: 0.8,
  text_heuristics: 0.5,
  ocr_text: 0.4,
};

const NO_TITLE = 'no title could be determined';
const NO_MATCH = 'no external source matched';

export interface ManualOverrides {
  fields: MetadataField[];
  values: MetadataPatch;
}

export interface ReconcileInput {
  candidates: MetadataCandidate[];
  local: LocalMetadata;
  manual?: ManualOverrides;
}

function hasValue(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export class MetadataReconciler {
  private readonly trust: Map<SourceId, number>;

  constructor(trustOrder: SourceId[]) {
    this.trust = new Map(trustOrder.map((id, i) => [id, i]));
  }

  /** Candidates in merge order, best first. */
  rank(candidates: MetadataCandidate[]): MetadataCandidate[] {
    const trustOf = (id: SourceId) => this.trust.get(id) ?? Number.MAX_SAFE_INTEGER;
    return [...candidates].sort((a, b) => {
      const tier = Number(b.matchKey !== 'fuzzy') - Number(a.matchKey !== 'fuzzy');
      if (tier !== 0) return tier;
      if (b.confidence !== a.confidence) return b.confidence - a.confidence;
      const trust = trustOf(a.source) - trustOf(b.source);
      if (trust !== 0) return trust;
      if (a.source !== b.source) return a.source < b.source ? -1 : 1;
      return a.rank - b.rank;
    });
  }

  reconcile(input: ReconcileInput): Metadata {
    const ranked = this.rank(input.candidates);
    const metadata = emptyMetadata();

    for (const field of METADATA_FIELDS) {
      this.resolveField(metadata, field, ranked, input.local);
    }

    const conflict = this.doiConflict(ranked, input.local, metadata.doi);
    if (conflict) metadata.review.conflicts.push(conflict);

    for (const candidate of ranked) {
      for (const [key, value] of Object.entries(candidate.extra)) {
        if (!(key in metadata.extra) && hasValue(value)) {
          metadata.extra[key] = { value, source: candidate.source };
        }
      }
    }

    if (ranked.length === 0) metadata.review.reasons.push(NO_MATCH);
    if (input.manual) applyManual(metadata, input.manual);
    refreshReview(metadata);
    metadata.confidence = overallConfidence(metadata);
    return metadata;
  }

  private resolveField(
    metadata: Metadata,
    field: MetadataField,
    ranked: MetadataCandidate[],
    local: LocalMetadata
  ): void {
    const winner = ranked.find((c) => hasValue(c.fields[field]));
    if (winner) {
      assign(metadata, field, winner.fields[field] ?? null, {
        source: winner.source,
        confidence: round(winner.confidence),
        matchKey: winner.matchKey,
      });
      return;
    }

    const fallback = local[field];
    if (fallback) {
      assign(metadata, field, fallback.value, {
        source: fallback.origin,
        confidence: LOCAL_CONFIDENCE[fallback.origin],
      });
    }
  }

  private doiConflict(
    ranked: MetadataCandidate[],
    local: LocalMetadata,
    kept: string | null
  ): ReconciliationConflict | null {
    const values: ReconciliationConflict['values'] = [];
    const seen = new Set<string>();

    for (const candidate of ranked) {
      const doi = normalizeDoi(candidate.fields.doi);
      if (doi && !seen.has(doi)) {
        seen.add(doi);
        values.push({ source: candidate.source, value: doi });
      }
    }
    const localDoi = normalizeDoi(local.doi?.value);
    if (localDoi && local.doi && !seen.has(localDoi)) {
      seen.add(localDoi);
      values.push({ source: local.doi.origin, value: localDoi });
    }

    if (values.length < 2) return null;
    const keptFrom = values.find((v) => v.value === kept)?.source ?? 'none';
    return { field: 'doi', values, resolution: `kept ${kept ?? 'none'} from ${keptFrom}` };
  }
}

function assign<K extends MetadataField>(
  metadata: Metadata,
  field: K,
  value: MetadataValues[K] | null,
  provenance: ProvenanceEntry
): void {
  if (!hasValue(value)) return;
  setField(metadata, field, value);
  metadata.provenance[field] = provenance;
}

function setField<K extends MetadataField>(metadata: MetadataValues, field: K, value: MetadataValues[K] | null): void {
  Object.assign(metadata, { [field]: value });
}

/**
 * Recompute review reasons. A conflict on a hand-edited field counts as
 * resolved.
 */
export function refreshReview(metadata: Metadata): void {
  const review = metadata.review;
  review.conflicts = review.conflicts.filter((c) => metadata.provenance[c.field]?.source !== 'manual');
  review.reasons = [
    ...review.conflicts.map((c) => `conflicting ${c.field} values: ${c.values.map((v) => v.value).join(', ')}`),
    ...(metadata.title ? [] : [NO_TITLE]),
    ...review.reasons.filter((r) => r === NO_MATCH),
  ];
  review.required = review.conflicts.length > 0 || !metadata.title;
}

/** Hand-edited fields override whatever reconciliation produced. */
export function applyManual(metadata: Metadata, manual: ManualOverrides): void {
  for (const field of manual.fields) {
    if (!(field in manual.values)) continue;
    const value = manual.values[field] ?? null;
    setField(metadata, field, value);
    if (hasValue(value)) {
      metadata.provenance[field] = { source: 'manual', confidence: 1 };
    } else {
      delete metadata.provenance[field];
    }
  }
  refreshReview(metadata);
  metadata.confidence = overallConfidence(metadata);
}

export function overallConfidence(metadata: Metadata): number {
  const entries = METADATA_FIELDS.map((f) => metadata.provenance[f]).filter(
    (p): p is ProvenanceEntry => p !== undefined
  );
  if (entries.length === 0) return 0;
  return round(entries.reduce((sum, p) => sum + p.confidence, 0) / entries.length);
}

/** Current values of the given fields, for carrying manual edits into a new run. */
export function manualOverridesFrom(metadata: Metadata | null, fields: MetadataField[]): ManualOverrides | undefined {
  if (!metadata || fields.length === 0) return undefined;
  const values: MetadataPatch = {};
  for (const field of fields) Object.assign(values, { [field]: metadata[field] });
  return { fields, values };
}
