/**
 * Entry points for ingesting, reprocessing, editing and deleting documents.
 *
 * `ingest` stores each original and returns at once; processing happens on
 * the JobRunner. Per-file failures become error entries and never affect the
 * rest of the batch.
 */

import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import type { EmbeddingIndex } from '@/lib/index/embedding-index';
import type { JobTracker } from '@/lib/jobs/tracker';
import type { SourceReport } from '@/lib/metadata/harvester';
import { applyManual } from '@/lib/metadata/reconciler';
import { detectFormat } from '@/lib/parsing/detector';
import { generateStorageKey, type FileStorage } from '@/lib/storage/file-storage';
import type { DocumentStore } from '@/lib/store/types';
import {
  CorruptFileError,
  DocumentNotFoundError,
  JobCancelledError,
  ValidationError,
  errorMessage,
  toPipelineError,
} from '@/lib/errors';
import { mapWithConcurrency, type KeyedMutex } from '@/lib/utils/async';
import { hashBuffer } from '@/lib/utils/hash';
import {
  MAX_BATCH_FILES,
  MAX_FILE_SIZE_BYTES,
  parseIngestOptions,
  parseMetadataPatch,
  validateFileSize,
} from '@/lib/utils/validation';
import type { DocumentFormat, DocumentRecord } from '@/types/document';
import { METADATA_FIELDS, emptyMetadata, type Metadata } from '@/types/metadata';
import type { IngestOptions, JobStatusView } from '@/types/pipeline';
import type { DocumentPipeline } from './document-pipeline';
import type { JobRunner } from './runner';

export type IngestFile = { path: string } | { buffer: Buffer; filename: string };

export interface IngestPreview {
  format: DocumentFormat;
  pageCount: number;
  ocrPages: number[];
  metadata: Metadata;
  sourceReports: SourceReport[];
  warnings: string[];
}

export type IngestItem =
  | { outcome: 'queued'; filename: string; documentId: string; jobId: string }
  | { outcome: 'preview'; filename: string; documentId: string; preview: IngestPreview }
  | { outcome: 'error'; filename: string; code: string; message: string };

export interface QueuedRun {
  documentId: string;
  jobId: string;
  run: number;
}

export interface DeleteResult {
  documentId: string;
  indexEntriesRemoved: number;
}

export interface IngestionDeps {
  store: DocumentStore;
  storage: FileStorage;
  embeddings: EmbeddingIndex;
  tracker: JobTracker;
  pipeline: DocumentPipeline;
  runner: JobRunner;
  locks: KeyedMutex;
  concurrency: number;
  now?: () => Date;
}

export class IngestionService {
  private readonly now: () => Date;

  constructor(private readonly deps: IngestionDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async ingest(files: IngestFile[], optionsInput?: unknown): Promise<IngestItem[]> {
    const options = parseIngestOptions(optionsInput);
    if (files.length === 0) {
      throw new ValidationError('No files to ingest', [{ path: ['files'], message: 'at least one file is required' }]);
    }
    if (files.length > MAX_BATCH_FILES) {
      throw new ValidationError(`At most ${MAX_BATCH_FILES} files per batch`, [
        { path: ['files'], message: `${files.length} files given` },
      ]);
    }

    const startTime = Date.now();
    const items = await mapWithConcurrency(files, this.deps.concurrency, (file) => this.ingestOne(file, options));
    const failed = items.filter((i) => i.outcome === 'error').length;
    console.log(
      `[Ingest] ${items.length} files (${options.mode}) in ${Date.now() - startTime}ms` + (failed ? `, ${failed} failed` : '')
    );
    return items;
  }

  /** Start processing a previewed document, optionally applying metadata edits first. */
  async confirm(documentId: string, patch?: unknown): Promise<QueuedRun> {
    if (!(await this.deps.store.get(documentId))) throw new DocumentNotFoundError(documentId);
    if (patch !== undefined) await this.updateMetadata(documentId, patch);
    return this.queue(documentId);
  }

  async getStatus(documentId: string): Promise<JobStatusView | null> {
    const status = await this.deps.tracker.getStatus(documentId);
    if (status) return status;

    const record = await this.deps.store.get(documentId);
    if (!record) return null;
    return {
      jobId: null,
      documentId,
      status: record.status,
      state: 'queued',
      run: 0,
      documentRef: null,
      failure: null,
    };
  }

  async getDocument(documentId: string): Promise<DocumentRecord | null> {
    return this.deps.store.get(documentId);
  }

  /** Rerun the full pipeline from the stored original. Throws JobConflictError while a run is active. */
  async reprocess(documentId: string): Promise<QueuedRun> {
    const record = await this.deps.store.get(documentId);
    if (!record) throw new DocumentNotFoundError(documentId);

    const queued = await this.queue(documentId);
    await this.deps.store.audit({
      documentId,
      action: 'document_reprocessed',
      details: { run: queued.run, previousStatus: record.status },
      fileHash: record.sha256,
    });
    return queued;
  }

  /** Overwrite fields by hand. They keep provenance `manual` through later runs. */
  async updateMetadata(documentId: string, patchInput: unknown): Promise<Metadata> {
    const patch = parseMetadataPatch(patchInput);
    const fields = METADATA_FIELDS.filter((field) => field in patch);

    return this.deps.locks.runExclusive(documentId, async () => {
      const record = await this.deps.store.get(documentId);
      if (!record) throw new DocumentNotFoundError(documentId);

      const metadata = record.metadata ?? emptyMetadata();
      applyManual(metadata, { fields, values: patch });
      const manualFields = METADATA_FIELDS.filter((f) => fields.includes(f) || record.manualFields.includes(f));

      await this.deps.store.update(documentId, { metadata, manualFields });
      await this.deps.store.audit({ documentId, action: 'metadata_updated', details: { fields } });
      console.log(`[Ingest] ${documentId} metadata edited: ${fields.join(', ') || 'nothing'}`);
      return metadata;
    });
  }

  /** Stop the active run, if any. The document is marked failed; its previous chunks stay. */
  async cancel(documentId: string): Promise<boolean> {
    const cancelled = await this.deps.tracker.cancel(documentId);
    if (cancelled) {
      await this.deps.store.update(documentId, {
        status: 'failed',
        error: new JobCancelledError(documentId).message,
      });
    }
    return cancelled;
  }

  async deleteDocument(documentId: string): Promise<DeleteResult> {
    const record = await this.deps.store.get(documentId);
    if (!record) throw new DocumentNotFoundError(documentId);

    await this.deps.tracker.cancel(documentId);

    const removed = await this.deps.locks.runExclusive(documentId, async () => {
      const entries = await this.deps.embeddings.index.deleteDocument(documentId);
      await this.deps.store.delete(documentId);
      await this.deps.storage.delete(record.storageKey);
      await this.deps.tracker.forget(documentId);
      return entries;
    });

    await this.deps.store.audit({
      documentId,
      action: 'document_deleted',
      details: { filename: record.filename, indexEntriesRemoved: removed },
      fileHash: record.sha256,
    });
    console.log(`[Ingest] Deleted ${documentId} (${removed} index entries)`);
    return { documentId, indexEntriesRemoved: removed };
  }

  private async queue(documentId: string): Promise<QueuedRun> {
    const handle = await this.deps.tracker.begin(documentId);
    try {
      await this.deps.store.update(documentId, { status: 'pending', error: null });
      await this.deps.runner.enqueue(documentId, handle.run);
    } catch (error) {
      // A run that never reached the runner must not hold the document.
      const failure = toPipelineError(error);
      console.error(`[Ingest] Could not queue run ${handle.run} of ${documentId}: ${failure.message}`);
      await this.deps.tracker.fail(handle, failure);
      await this.deps.store.update(documentId, { status: 'failed', error: failure.message });
      throw error;
    }
    return { documentId, jobId: handle.jobId, run: handle.run };
  }

  private async ingestOne(file: IngestFile, options: IngestOptions): Promise<IngestItem> {
    const filename = 'path' in file ? path.basename(file.path) : file.filename;
    let stored: DocumentRecord | null = null;

    try {
      const buffer = 'path' in file ? await fs.readFile(file.path) : file.buffer;
      if (buffer.length === 0) throw new CorruptFileError(filename, new Error('file is empty'));
      if (!validateFileSize(buffer.length)) {
        throw new ValidationError(`${filename} exceeds the ${MAX_FILE_SIZE_BYTES / 1024 / 1024}MB limit`, [
          { path: ['files', filename], message: 'file too large' },
        ]);
      }

      const format = await detectFormat(buffer, filename);
      stored = await this.storeOriginal(filename, buffer, format, options);

      if (options.mode === 'process') {
        const queued = await this.queue(stored.id);
        return { outcome: 'queued', filename, documentId: stored.id, jobId: queued.jobId };
      }
      const preview = await this.preview(stored, buffer);
      return { outcome: 'preview', filename, documentId: stored.id, preview };
    } catch (error) {
      const failure = toPipelineError(error);
      console.warn(`[Ingest] ${filename} rejected (${failure.code}): ${failure.message}`);
      if (stored) await this.abandon(stored, options.mode, failure.message);
      return { outcome: 'error', filename, code: failure.code, message: failure.message };
    }
  }

  private async storeOriginal(
    filename: string,
    buffer: Buffer,
    format: DocumentFormat,
    options: IngestOptions
  ): Promise<DocumentRecord> {
    const id = randomUUID();
    const at = this.now();
    const record: DocumentRecord = {
      id,
      filename,
      storageKey: generateStorageKey(id, filename),
      sha256: hashBuffer(buffer),
      sizeBytes: buffer.length,
      format,
      status: 'pending',
      rawText: '',
      pages: [],
      ocrPages: [],
      metadata: null,
      manualFields: [],
      chunkCount: 0,
      options,
      warnings: [],
      error: null,
      createdAt: at,
      updatedAt: at,
    };

    await this.deps.storage.save(record.storageKey, buffer);
    await this.deps.store.create(record);
    await this.deps.store.audit({
      documentId: id,
      action: 'document_ingested',
      details: { filename, format, sizeBytes: buffer.length, mode: options.mode },
      fileHash: record.sha256,
    });
    return record;
  }

  private async preview(record: DocumentRecord, buffer: Buffer): Promise<IngestPreview> {
    const analysis = await this.deps.pipeline.analyze(record, buffer);
    await this.deps.store.update(record.id, {
      format: analysis.format,
      metadata: analysis.metadata,
      pages: analysis.provenance,
      ocrPages: analysis.ocrPages,
      warnings: analysis.warnings,
    });
    return {
      format: analysis.format,
      pageCount: analysis.pages.length,
      ocrPages: analysis.ocrPages,
      metadata: analysis.metadata,
      sourceReports: analysis.sourceReports,
      warnings: analysis.warnings,
    };
  }

  /** A failed preview leaves nothing behind; a document that could not be queued stays, marked failed. */
  private async abandon(record: DocumentRecord, mode: IngestOptions['mode'], message: string): Promise<void> {
    try {
      if (mode === 'preview') {
        await this.deps.store.delete(record.id);
        await this.deps.storage.delete(record.storageKey);
        return;
      }
      await this.deps.tracker.cancel(record.id);
      await this.deps.store.update(record.id, { status: 'failed', error: message });
    } catch (error) {
      console.error(`[Ingest] Could not clean up ${record.id}: ${errorMessage(error)}`);
    }
  }
}
