import type { Metadata, MetadataField } from './metadata';
import type { IngestOptions } from './pipeline';

export type DocumentFormat = 'pdf' | 'epub' | 'docx' | 'pptx' | 'txt';

export const SUPPORTED_FORMATS: DocumentFormat[] = ['pdf', 'epub', 'docx', 'pptx', 'txt'];

/** Externally visible lifecycle, derived from the job state. */
export type DocumentStatus = 'pending' | 'processing' | 'complete' | 'failed';

export type PageMethod = 'native' | 'ocr' | 'empty';

export interface PageProvenance {
  page: number;
  method: PageMethod;
  chars: number;
}

export type EntityType = 'PERSON' | 'ORG' | 'DATE' | 'DOI' | 'ISBN' | 'URL' | 'EMAIL';

export type EntityMap = Partial<Record<EntityType, string[]>>;

export interface Chunk {
  /** `<documentId>:<sequence>` */
  id: string;
  documentId: string;
  sequence: number;
  text: string;
  start: number;
  end: number;
  page: number | null;
  tokenCount: number;
  language: string;
  entities: EntityMap;
}

export interface DocumentRecord {
  id: string;
  filename: string;
  storageKey: string;
  sha256: string;
  sizeBytes: number;
  format: DocumentFormat | null;
  status: DocumentStatus;
  rawText: string;
  pages: PageProvenance[];
  ocrPages: number[];
  metadata: Metadata | null;
  /** Fields edited by hand; they survive reprocessing. */
  manualFields: MetadataField[];
  chunkCount: number;
  options: IngestOptions;
  warnings: string[];
  error: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export const AUDIT_ACTIONS = [
  'document_ingested',
  'document_processed',
  'document_failed',
  'document_reprocessed',
  'document_deleted',
  'metadata_updated',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];
