/**
 * Builds the service graph from configuration. Everything is constructed
 * here and passed down; nothing in the pipeline reaches for a global client.
 *
 * With MONGODB_URI set, documents, chunks, index entries and jobs live in
 * MongoDB; otherwise in memory. Background runs go to BullMQ when asked for
 * (or, in `auto`, when Redis answers and MongoDB is shared), else inline.
 */

import { createAnswerGenerator, type AnswerGenerator } from '@/lib/ai';
import type { AppConfig } from '@/lib/config';
import { connectToDatabase, disconnectFromDatabase } from '@/lib/db';
import { createEmbeddingProvider, type EmbeddingProvider } from '@/lib/embedding';
import { EmbeddingIndex, MemoryVectorIndex, MongoVectorIndex, type VectorIndex } from '@/lib/index';
import { JobTracker, MemoryJobStore, MongoJobStore, type JobStore } from '@/lib/jobs';
import { MetadataHarvester } from '@/lib/metadata/harvester';
import { MetadataReconciler } from '@/lib/metadata/reconciler';
import { MemoryResponseCache, MongoResponseCache, type ResponseCache } from '@/lib/metadata/response-cache';
import { createSources, type FetchLike } from '@/lib/metadata/sources';
import { TesseractOcrEngine } from '@/lib/parsing/ocr';
import { OcrFallback } from '@/lib/parsing/ocr-fallback';
import { PdfjsReader } from '@/lib/parsing/pdf-reader';
import { createDefaultRegistry } from '@/lib/parsing/registry';
import type { OcrEngine, PdfReader } from '@/lib/parsing/types';
import { checkRedisHealth, redisConnection } from '@/lib/queue/connection';
import { BullMqJobRunner } from '@/lib/queue/queues';
import { RetrievalAnswerEngine } from '@/lib/retrieval';
import { LocalFileStorage, type FileStorage } from '@/lib/storage/file-storage';
import { MemoryDocumentStore, MongoDocumentStore, type DocumentStore } from '@/lib/store';
import { KeyedMutex } from '@/lib/utils/async';
import { DocumentPipeline } from './document-pipeline';
import { IngestionService } from './ingestion-service';
import { InlineJobRunner, type JobRunner } from './runner';

export type RunnerMode = 'inline' | 'queue' | 'auto';

/** Replacements for the clients that talk to the outside world. */
export interface ServiceOverrides {
  fetch?: FetchLike;
  pdfReader?: PdfReader;
  /** Null disables OCR. */
  ocrEngine?: OcrEngine | null;
  embedder?: EmbeddingProvider;
  generator?: AnswerGenerator | null;
  store?: DocumentStore;
  storage?: FileStorage;
  vectorIndex?: VectorIndex;
  jobStore?: JobStore;
  /** Null disables the metadata response cache. */
  responseCache?: ResponseCache | null;
  runner?: RunnerMode;
  embeddingRetryDelays?: number[];
}

export interface Services {
  config: AppConfig;
  store: DocumentStore;
  storage: FileStorage;
  embeddings: EmbeddingIndex;
  tracker: JobTracker;
  pipeline: DocumentPipeline;
  ingestion: IngestionService;
  retrieval: RetrievalAnswerEngine;
  runner: JobRunner;
  close(): Promise<void>;
}

export async function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Promise<Services> {
  const mongo = config.mongodbUri !== null && !(overrides.store && overrides.vectorIndex && overrides.jobStore);
  if (mongo) await connectToDatabase(config.mongodbUri ?? undefined);

  const store = overrides.store ?? (mongo ? new MongoDocumentStore() : new MemoryDocumentStore());
  const vectorIndex = overrides.vectorIndex ?? (mongo ? new MongoVectorIndex() : new MemoryVectorIndex());
  const jobStore = overrides.jobStore ?? (mongo ? new MongoJobStore() : new MemoryJobStore());
  const storage = overrides.storage ?? new LocalFileStorage(config.storageDir);
  const responseCache =
    overrides.responseCache === undefined
      ? mongo
        ? new MongoResponseCache()
        : new MemoryResponseCache()
      : overrides.responseCache;

  const embeddings = new EmbeddingIndex(overrides.embedder ?? createEmbeddingProvider(config), vectorIndex, {
    timeoutMs: config.embeddingTimeoutMs,
    maxRetries: config.embeddingMaxRetries,
    retryDelays: overrides.embeddingRetryDelays,
  });

  const pdfReader = overrides.pdfReader ?? new PdfjsReader();
  const ocrEngine =
    overrides.ocrEngine === undefined
      ? new TesseractOcrEngine({ languages: config.ocrLanguages, upscale: false })
      : overrides.ocrEngine;

  const tracker = new JobTracker(jobStore);
  const locks = new KeyedMutex();
  const pipeline = new DocumentPipeline({
    store,
    storage,
    embeddings,
    tracker,
    harvester: new MetadataHarvester(
      createSources(config.metadataSources, {
        fetch: overrides.fetch,
        crossrefMailto: config.crossrefMailto,
        googleBooksApiKey: config.googleBooksApiKey,
        cache: responseCache,
        cacheTtlMs: config.metadataCacheTtlMs,
      }),
      { timeoutMs: config.sourceTimeoutMs, similarityFloor: config.metadataSimilarityFloor }
    ),
    reconciler: new MetadataReconciler(config.metadataSourceTrust),
    registry: createDefaultRegistry({ pdfReader }),
    ocr: ocrEngine ? new OcrFallback(pdfReader, ocrEngine) : null,
    locks,
    settings: {
      extractionTimeoutMs: config.extractionTimeoutMs,
      ocrMinCharsPerPage: config.ocrMinCharsPerPage,
      ocrPageTimeoutMs: config.ocrPageTimeoutMs,
      chunkMaxTokens: config.chunkMaxTokens,
    },
  });

  const runner = await createRunner(config, overrides.runner ?? 'auto', mongo, (id) => pipeline.run(id));

  const ingestion = new IngestionService({
    store,
    storage,
    embeddings,
    tracker,
    pipeline,
    runner,
    locks,
    concurrency: config.ingestConcurrency,
  });

  const retrieval = new RetrievalAnswerEngine({
    store,
    embeddings,
    generator: overrides.generator === undefined ? createAnswerGenerator(config) : overrides.generator,
  });

  return {
    config,
    store,
    storage,
    embeddings,
    tracker,
    pipeline,
    ingestion,
    retrieval,
    runner,
    async close() {
      await runner.close();
      await ocrEngine?.terminate();
      if (mongo) await disconnectFromDatabase();
    },
  };
}

async function createRunner(
  config: AppConfig,
  mode: RunnerMode,
  sharedStore: boolean,
  run: (documentId: string) => Promise<unknown>
): Promise<JobRunner> {
  const inline = () => new InlineJobRunner(run, config.ingestConcurrency);
  if (mode === 'inline') return inline();

  const connection = redisConnection(config.redisUrl);
  if (mode === 'queue') return new BullMqJobRunner(connection);

  // Queue workers are separate processes and need the shared MongoDB state.
  if (sharedStore && (await checkRedisHealth(connection))) {
    console.log('[Services] Using BullMQ ingest queue');
    return new BullMqJobRunner(connection);
  }
  console.log('[Services] Running ingest jobs in process');
  return inline();
}
