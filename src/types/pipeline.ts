import type { DocumentStatus } from './document';
import type { SourceId } from './metadata';

export type IngestMode = 'preview' | 'process';

export interface IngestOptions {
  sources: SourceId[];
  allowOcr: boolean;
  /** ISO 639-1 code, or null for automatic detection */
  languageHint: string | null;
  mode: IngestMode;
}

export const JOB_STATES = [
  'queued',
  'extracting',
  'ocr',
  'harvesting_metadata',
  'reconciling',
  'segmenting',
  'embedding',
  'complete',
  'failed',
] as const;

export type JobState = (typeof JOB_STATES)[number];

export type TerminalJobState = 'complete' | 'failed';

export type PipelineStage = Exclude<JobState, 'queued' | TerminalJobState>;

export interface JobFailure {
  stage: JobState;
  code: string;
  message: string;
}

export interface JobTransition {
  state: JobState;
  run: number;
  at: Date;
}

export interface ProcessingJob {
  jobId: string;
  documentId: string;
  state: JobState;
  /** Incremented on every reprocess. */
  run: number;
  ocrUsed: boolean;
  failure: JobFailure | null;
  history: JobTransition[];
  createdAt: Date;
  updatedAt: Date;
}

export interface JobStatusView {
  /** Null for a previewed document that was never queued. */
  jobId: string | null;
  documentId: string;
  status: DocumentStatus;
  state: JobState;
  run: number;
  /** Set once the document is complete. */
  documentRef: string | null;
  failure: JobFailure | null;
}
