/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Every error carries a stable `code` that ends up in job failures and
 * per-file batch reports.
 */

export type PipelineErrorCode =
  | 'unsupported_format'
  | 'corrupt_file'
  | 'extraction_timeout'
  | 'ocr_failure'
  | 'source_unavailable'
  | 'source_timeout'
  | 'embedding_failure'
  | 'index_write'
  | 'generation_failure'
  | 'job_conflict'
  | 'cancelled'
  | 'not_found'
  | 'validation'
  | 'timeout'
  | 'internal';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly retryable: boolean;

  constructor(
    code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown; retryable?: boolean }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

export class UnsupportedFormatError extends PipelineError {
  constructor(filename: string, detail?: string) {
    super('unsupported_format', `Unsupported format for ${filename}${detail ? `: ${detail}` : ''}`);
  }
}

export class CorruptFileError extends PipelineError {
  constructor(filename: string, cause?: unknown) {
    super('corrupt_file', `Could not read ${filename}: ${errorMessage(cause)}`, { cause });
  }
}

export class ExtractionTimeoutError extends PipelineError {
  constructor(filename: string, timeoutMs: number) {
    super('extraction_timeout', `Extraction of ${filename} timed out after ${timeoutMs}ms`, {
      retryable: true,
    });
  }
}

export class OcrFailureError extends PipelineError {
  readonly page: number;

  constructor(page: number, cause?: unknown) {
    super('ocr_failure', `OCR failed on page ${page}: ${errorMessage(cause)}`, { cause });
    this.page = page;
  }
}

export class SourceUnavailableError extends PipelineError {
  constructor(source: string, detail: string, cause?: unknown) {
    super('source_unavailable', `${source} unavailable: ${detail}`, { cause, retryable: true });
  }
}

export class SourceTimeoutError extends PipelineError {
  constructor(source: string, timeoutMs: number) {
    super('source_timeout', `${source} did not answer within ${timeoutMs}ms`, { retryable: true });
  }
}

export class EmbeddingFailureError extends PipelineError {
  constructor(message: string, cause?: unknown, retryable = true) {
    super('embedding_failure', message, { cause, retryable });
  }
}

export class IndexWriteError extends PipelineError {
  constructor(documentId: string, cause?: unknown) {
    super('index_write', `Index write failed for ${documentId}: ${errorMessage(cause)}`, { cause });
  }
}

export class GenerationFailureError extends PipelineError {
  constructor(message: string, cause?: unknown, retryable = true) {
    super('generation_failure', message, { cause, retryable });
  }
}

export class JobConflictError extends PipelineError {
  constructor(documentId: string) {
    super('job_conflict', `A processing run is already active for document ${documentId}`);
  }
}

export class JobCancelledError extends PipelineError {
  constructor(documentId: string) {
    super('cancelled', `Processing of document ${documentId} was cancelled`);
  }
}

export class DocumentNotFoundError extends PipelineError {
  constructor(documentId: string) {
    super('not_found', `Document not found: ${documentId}`);
  }
}

export class ValidationError extends PipelineError {
  readonly issues: Array<{ path: (string | number)[]; message: string }>;

  constructor(message: string, issues: Array<{ path: (string | number)[]; message: string }>) {
    super('validation', message);
    this.issues = issues;
  }
}

export class TimeoutError extends PipelineError {
  constructor(operation: string, timeoutMs: number) {
    super('timeout', `${operation} timed out after ${timeoutMs}ms`, { retryable: true });
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}

export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  return new PipelineError('internal', errorMessage(error), { cause: error });
}
