/**
 * Concurrent lookups against every configured bibliographic source.
 *
 * Sources never fail the harvest: an error or a timeout becomes a report
 * entry and the source contributes no candidates.
 */

import { PipelineError, SourceTimeoutError, TimeoutError, errorMessage } from '@/lib/errors';
import { withTimeout } from '@/lib/utils/async';
import type { MetadataCandidate, MetadataHints, SourceId } from '@/types/metadata';
import type { MetadataSource } from './sources';

export type SourceStatus = 'ok' | 'skipped' | 'unavailable' | 'timeout';

export interface SourceReport {
  source: SourceId;
  status: SourceStatus;
  candidates: number;
  durationMs: number;
  error: string | null;
}

export interface HarvestResult {
  candidates: MetadataCandidate[];
  reports: SourceReport[];
}

export interface HarvesterOptions {
  timeoutMs: number;
  similarityFloor: number;
}

export interface HarvestRequest {
  /** Restrict to these sources; all configured sources when omitted. */
  sources?: SourceId[];
  signal?: AbortSignal;
}

export class MetadataHarvester {
  constructor(
    private readonly sources: MetadataSource[],
    private readonly options: HarvesterOptions
  ) {}

  async harvest(hints: MetadataHints, request: HarvestRequest = {}): Promise<HarvestResult> {
    const enabled = request.sources ? new Set(request.sources) : null;
    const active = this.sources.filter((s) => !enabled || enabled.has(s.id));
    const startTime = Date.now();

    const outcomes = await Promise.all(active.map((source) => this.lookupOne(source, hints, request.signal)));

    const candidates = outcomes.flatMap((o) => o.candidates);
    const reports = outcomes.map((o) => o.report);
    const failed = reports.filter((r) => r.status === 'unavailable' || r.status === 'timeout').length;
    console.log(
      `[Harvester] ${candidates.length} candidates from ${active.length} sources in ${Date.now() - startTime}ms` +
        (failed ? ` (${failed} failed)` : '')
    );

    return { candidates, reports };
  }

  private async lookupOne(
    source: MetadataSource,
    hints: MetadataHints,
    signal?: AbortSignal
  ): Promise<{ candidates: MetadataCandidate[]; report: SourceReport }> {
    const started = Date.now();
    const report = (status: SourceStatus, count: number, error: string | null = null): SourceReport => ({
      source: source.id,
      status,
      candidates: count,
      durationMs: Date.now() - started,
      error,
    });

    if (!source.canLookup(hints)) {
      return { candidates: [], report: report('skipped', 0) };
    }

    try {
      const candidates = await withTimeout(
        (lookupSignal) =>
          source.lookup(hints, { signal: lookupSignal, similarityFloor: this.options.similarityFloor }),
        this.options.timeoutMs,
        `${source.id} lookup`,
        signal
      );
      return { candidates, report: report('ok', candidates.length) };
    } catch (error) {
      if (error instanceof TimeoutError) {
        const timeout = new SourceTimeoutError(source.id, this.options.timeoutMs);
        console.warn(`[Harvester] ${timeout.message}`);
        return { candidates: [], report: report('timeout', 0, timeout.message) };
      }
      const message = error instanceof PipelineError ? error.message : `${source.id} unavailable: ${errorMessage(error)}`;
      console.warn(`[Harvester] ${message}`);
      return { candidates: [], report: report('unavailable', 0, message) };
    }
  }
}
