export { DocumentPipeline } from './document-pipeline';
export type { Analysis, PipelineDeps, PipelineSettings, RunOutcome } from './document-pipeline';
export { IngestionService } from './ingestion-service';
export type { DeleteResult, IngestFile, IngestItem, IngestPreview, QueuedRun } from './ingestion-service';
export { InlineJobRunner, type JobRunner } from './runner';
export { createServices, type RunnerMode, type ServiceOverrides, type Services } from './container';
