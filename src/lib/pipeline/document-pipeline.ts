/**
 * One processing run for one document:
 * extract → (OCR) → harvest → reconcile → segment → embed → commit.
 *
 * Results become visible only in the commit step, which swaps the index
 * entries and the chunk list together under the document's lock and
 * restores the previous set if any write fails.
 */

import type { EmbeddingIndex } from '@/lib/index/embedding-index';
import type { IndexEntry } from '@/lib/index/types';
import type { JobTracker, RunHandle } from '@/lib/jobs/tracker';
import type { MetadataHarvester, SourceReport } from '@/lib/metadata/harvester';
import { extractLocalMetadata } from '@/lib/metadata/local-extractor';
import { applyManual, manualOverridesFrom, type MetadataReconciler } from '@/lib/metadata/reconciler';
import { OcrFallback, needsOcr } from '@/lib/parsing/ocr-fallback';
import { extractDocument } from '@/lib/parsing/parse-pipeline';
import type { ExtractorRegistry } from '@/lib/parsing/registry';
import type { PageText } from '@/lib/parsing/types';
import { Segmenter } from '@/lib/segmentation/segmenter';
import type { FileStorage } from '@/lib/storage/file-storage';
import type { DocumentStore } from '@/lib/store/types';
import {
  DocumentNotFoundError,
  IndexWriteError,
  JobCancelledError,
  errorMessage,
  toPipelineError,
} from '@/lib/errors';
import type { KeyedMutex } from '@/lib/utils/async';
import type { Chunk, DocumentFormat, DocumentRecord, PageProvenance } from '@/types/document';
import type { Metadata } from '@/types/metadata';
import type { PipelineStage } from '@/types/pipeline';

export interface PipelineSettings {
  extractionTimeoutMs: number;
  ocrMinCharsPerPage: number;
  ocrPageTimeoutMs: number;
  chunkMaxTokens: number;
}

export interface PipelineDeps {
  store: DocumentStore;
  storage: FileStorage;
  embeddings: EmbeddingIndex;
  tracker: JobTracker;
  harvester: MetadataHarvester;
  reconciler: MetadataReconciler;
  registry: ExtractorRegistry;
  /** Null when OCR is not available in this process. */
  ocr: OcrFallback | null;
  /** Shared with the ingestion service: commit, metadata edits and deletion take it. */
  locks: KeyedMutex;
  settings: PipelineSettings;
}

export interface Analysis {
  format: DocumentFormat;
  pages: PageText[];
  provenance: PageProvenance[];
  ocrPages: number[];
  metadata: Metadata;
  sourceReports: SourceReport[];
  warnings: string[];
}

export interface AnalyzeContext {
  signal?: AbortSignal;
  onStage?: (stage: PipelineStage) => Promise<void>;
}

export type RunOutcome =
  | { status: 'complete'; documentId: string; chunkCount: number }
  | { status: 'failed'; documentId: string; code: string; message: string }
  | { status: 'cancelled'; documentId: string };

export class DocumentPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  /**
   * Extraction through reconciliation. Used on its own for previews and as
   * the first half of a full run.
   */
  async analyze(record: DocumentRecord, buffer: Buffer, context: AnalyzeContext = {}): Promise<Analysis> {
    const { settings } = this.deps;
    const { options } = record;
    const warnings: string[] = [];

    await context.onStage?.('extracting');
    const extraction = await extractDocument(buffer, {
      filename: record.filename,
      declaredFormat: record.format,
      timeoutMs: settings.extractionTimeoutMs,
      registry: this.deps.registry,
      signal: context.signal,
    });

    let pages = extraction.pages;
    let ocrPages: number[] = [];
    if (needsOcr(extraction.format, pages, settings.ocrMinCharsPerPage)) {
      if (!options.allowOcr) {
        warnings.push('Little native text found and OCR is disabled; text may be incomplete');
      } else if (!this.deps.ocr) {
        warnings.push('Little native text found and no OCR engine is available');
      } else {
        await context.onStage?.('ocr');
        const ocr = await this.deps.ocr.run(buffer, pages, {
          minCharsPerPage: settings.ocrMinCharsPerPage,
          pageTimeoutMs: settings.ocrPageTimeoutMs,
          signal: context.signal,
        });
        pages = ocr.pages;
        ocrPages = ocr.ocrPages;
        warnings.push(...ocr.warnings);
      }
    }
    throwIfCancelled(record.id, context.signal);

    await context.onStage?.('harvesting_metadata');
    const text = pages.map((p) => p.text).join('\n\n');
    const { local, hints } = extractLocalMetadata({
      text,
      filename: record.filename,
      properties: extraction.structural.properties,
      pageCount: extraction.structural.pageCount,
      ocrUsed: ocrPages.length > pages.length / 2,
      languageHint: options.languageHint,
    });
    const harvest = await this.deps.harvester.harvest(hints, { sources: options.sources, signal: context.signal });
    for (const report of harvest.reports) {
      if (report.error) warnings.push(report.error);
    }
    throwIfCancelled(record.id, context.signal);

    await context.onStage?.('reconciling');
    const metadata = this.deps.reconciler.reconcile({
      candidates: harvest.candidates,
      local,
      manual: manualOverridesFrom(record.metadata, record.manualFields),
    });

    return {
      format: extraction.format,
      pages,
      provenance: pages.map((p) => {
        const chars = p.text.trim().length;
        return { page: p.page, method: chars > 0 ? p.method : 'empty', chars };
      }),
      ocrPages,
      metadata,
      sourceReports: harvest.reports,
      warnings,
    };
  }

  /** Run the job that `JobTracker.begin` queued for this document. */
  async run(documentId: string): Promise<RunOutcome> {
    const { tracker, store } = this.deps;
    let handle: RunHandle;
    try {
      handle = await tracker.attach(documentId);
    } catch (error) {
      if (error instanceof JobCancelledError) return { status: 'cancelled', documentId };
      throw error;
    }

    const startTime = Date.now();
    console.log(`[Pipeline] Processing ${documentId} (run ${handle.run})`);

    try {
      const record = await store.get(documentId);
      if (!record) throw new DocumentNotFoundError(documentId);
      await store.update(documentId, { status: 'processing', error: null });

      const buffer = await this.deps.storage.read(record.storageKey);
      const analysis = await this.analyze(record, buffer, {
        signal: handle.signal,
        onStage: async (stage) => {
          await tracker.advance(handle, stage);
        },
      });

      await tracker.advance(handle, 'segmenting');
      const segmenter = new Segmenter({
        maxTokens: this.deps.settings.chunkMaxTokens,
        languageHint: record.options.languageHint ?? analysis.metadata.language,
      });
      const { text, chunks } = segmenter.segment({ documentId, pages: analysis.pages });

      await tracker.advance(handle, 'embedding');
      const entries = await this.deps.embeddings.embedChunks(chunks, handle.signal);

      await this.commit(handle, record, analysis, text, chunks, entries);

      console.log(
        `[Pipeline] ${documentId} complete: ${chunks.length} chunks, ${analysis.ocrPages.length} OCR pages in ${Date.now() - startTime}ms`
      );
      await store.audit({
        documentId,
        action: 'document_processed',
        details: { run: handle.run, chunks: chunks.length, ocrPages: analysis.ocrPages.length },
        fileHash: record.sha256,
      });
      return { status: 'complete', documentId, chunkCount: chunks.length };
    } catch (error) {
      return this.handleFailure(handle, error);
    }
  }

  private async commit(
    handle: RunHandle,
    record: DocumentRecord,
    analysis: Analysis,
    text: string,
    chunks: Chunk[],
    entries: IndexEntry[]
  ): Promise<void> {
    const { store, embeddings, locks, tracker } = this.deps;
    const documentId = record.id;

    await locks.runExclusive(documentId, async () => {
      throwIfCancelled(documentId, handle.signal);
      const current = await store.get(documentId);
      if (!current) throw new JobCancelledError(documentId);

      // Edits made while the run was in flight win over its reconciliation.
      const metadata = structuredClone(analysis.metadata);
      const manual = manualOverridesFrom(current.metadata, current.manualFields);
      if (manual) applyManual(metadata, manual);

      const previousEntries = await embeddings.index.entriesFor(documentId);
      const previousChunks = await store.getChunks(documentId);

      await embeddings.index.replaceDocument(documentId, entries);
      try {
        await store.replaceChunks(documentId, chunks);
        await store.update(documentId, {
          format: analysis.format,
          status: 'complete',
          rawText: text,
          pages: analysis.provenance,
          ocrPages: analysis.ocrPages,
          metadata,
          chunkCount: chunks.length,
          warnings: analysis.warnings,
          error: null,
        });
        await tracker.complete(handle);
      } catch (error) {
        console.error(`[Pipeline] Commit for ${documentId} failed, restoring previous chunks: ${errorMessage(error)}`);
        await embeddings.index.replaceDocument(documentId, previousEntries);
        await store.replaceChunks(documentId, previousChunks);
        await store.update(documentId, {
          status: current.status,
          rawText: current.rawText,
          pages: current.pages,
          ocrPages: current.ocrPages,
          metadata: current.metadata,
          chunkCount: current.chunkCount,
          warnings: current.warnings,
        });
        if (error instanceof JobCancelledError) throw error;
        throw new IndexWriteError(documentId, error);
      }
    });
  }

  private async handleFailure(handle: RunHandle, error: unknown): Promise<RunOutcome> {
    const { documentId } = handle;
    const failure = toPipelineError(error);

    const job = await this.deps.tracker.fail(handle, failure);
    if (!job || failure.code === 'cancelled') {
      console.log(`[Pipeline] ${documentId} run ${handle.run} cancelled, results discarded`);
      return { status: 'cancelled', documentId };
    }

    console.error(`[Pipeline] ${documentId} failed at ${job.failure?.stage ?? 'unknown'}: ${failure.message}`);
    try {
      await this.deps.store.update(documentId, { status: 'failed', error: failure.message });
      await this.deps.store.audit({
        documentId,
        action: 'document_failed',
        details: { run: handle.run, stage: job.failure?.stage, code: failure.code, message: failure.message },
      });
    } catch (storeError) {
      if (!(storeError instanceof DocumentNotFoundError)) throw storeError;
    }
    return { status: 'failed', documentId, code: failure.code, message: failure.message };
  }
}

function throwIfCancelled(documentId: string, signal?: AbortSignal): void {
  if (signal?.aborted) throw new JobCancelledError(documentId);
}
