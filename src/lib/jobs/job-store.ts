import { ProcessingJobModel } from '@/lib/db/models/processing-job';
import type { ProcessingJob } from '@/types/pipeline';

/** Where job snapshots live so any process can poll them. */
export interface JobStore {
  save(job: ProcessingJob): Promise<void>;
  get(documentId: string): Promise<ProcessingJob | null>;
  delete(documentId: string): Promise<void>;
}

export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, ProcessingJob>();

  async save(job: ProcessingJob): Promise<void> {
    this.jobs.set(job.documentId, structuredClone(job));
  }

  async get(documentId: string): Promise<ProcessingJob | null> {
    const job = this.jobs.get(documentId);
    return job ? structuredClone(job) : null;
  }

  async delete(documentId: string): Promise<void> {
    this.jobs.delete(documentId);
  }
}

export class MongoJobStore implements JobStore {
  async save(job: ProcessingJob): Promise<void> {
    const { createdAt: _createdAt, updatedAt: _updatedAt, ...fields } = job;
    await ProcessingJobModel.updateOne({ documentId: job.documentId }, { $set: fields }, { upsert: true });
  }

  async get(documentId: string): Promise<ProcessingJob | null> {
    const doc = await ProcessingJobModel.findOne({ documentId }).lean();
    if (!doc) return null;
    return {
      jobId: doc.jobId,
      documentId: doc.documentId,
      state: doc.state,
      run: doc.run,
      ocrUsed: doc.ocrUsed,
      failure: doc.failure,
      history: doc.history.map((h) => ({ state: h.state, run: h.run, at: h.at })),
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    };
  }

  async delete(documentId: string): Promise<void> {
    await ProcessingJobModel.deleteOne({ documentId });
  }
}
