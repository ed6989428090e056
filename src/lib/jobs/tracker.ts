/**
 * Job lifecycle per document: one job record, many runs.
 *
 * The JobStore holds the authoritative snapshot; every mutation reads it,
 * checks the transition and writes it back under a per-document lock. A run
 * that finds its job failed, or superseded by a newer run, stops with
 * JobCancelledError at its next transition.
 */

import { randomUUID } from 'crypto';
import { JobCancelledError, JobConflictError, PipelineError, TimeoutError, toPipelineError } from '@/lib/errors';
import { KeyedMutex, sleep } from '@/lib/utils/async';
import type { JobState, JobStatusView, ProcessingJob } from '@/types/pipeline';
import type { JobStore } from './job-store';
import { canAdvance, isTerminal, toDocumentStatus } from './state-machine';

export interface RunHandle {
  documentId: string;
  jobId: string;
  run: number;
  signal: AbortSignal;
}

export interface WaitOptions {
  intervalMs?: number;
  timeoutMs?: number;
}

export class JobTracker {
  private readonly mutex = new KeyedMutex();
  private readonly controllers = new Map<string, { run: number; controller: AbortController }>();

  constructor(
    private readonly store: JobStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Start a run: a new job for an unknown document, otherwise a reprocess of
   * a finished one. Throws JobConflictError while a run is active.
   */
  async begin(documentId: string): Promise<RunHandle> {
    return this.mutex.runExclusive(documentId, async () => {
      const existing = await this.store.get(documentId);
      if (existing && !isTerminal(existing.state)) throw new JobConflictError(documentId);

      const at = this.now();
      const job: ProcessingJob = existing
        ? {
            ...existing,
            state: 'queued',
            run: existing.run + 1,
            ocrUsed: false,
            failure: null,
            history: [...existing.history, { state: 'queued', run: existing.run + 1, at }],
            updatedAt: at,
          }
        : {
            jobId: randomUUID(),
            documentId,
            state: 'queued',
            run: 1,
            ocrUsed: false,
            failure: null,
            history: [{ state: 'queued', run: 1, at }],
            createdAt: at,
            updatedAt: at,
          };

      await this.store.save(job);
      console.log(`[JobTracker] ${documentId} queued (run ${job.run})`);
      return this.handle(job);
    });
  }

  /** Re-attach to a queued or running job, e.g. from a worker process. */
  async attach(documentId: string): Promise<RunHandle> {
    const job = await this.store.get(documentId);
    if (!job || isTerminal(job.state)) throw new JobCancelledError(documentId);
    return this.handle(job);
  }

  async advance(handle: RunHandle, to: JobState): Promise<ProcessingJob> {
    return this.mutate(handle, (job) => {
      if (!canAdvance(job.state, to)) {
        throw new PipelineError('internal', `Illegal job transition ${job.state} → ${to} for ${job.documentId}`);
      }
      job.state = to;
      if (to === 'ocr') job.ocrUsed = true;
    });
  }

  async complete(handle: RunHandle): Promise<ProcessingJob> {
    const job = await this.advance(handle, 'complete');
    this.release(handle);
    return job;
  }

  /** Marks the run failed at its current stage. A run that is no longer current is left alone. */
  async fail(handle: RunHandle, error: unknown): Promise<ProcessingJob | null> {
    const failure = toPipelineError(error);
    try {
      return await this.mutate(handle, (job) => {
        job.failure = { stage: job.state, code: failure.code, message: failure.message };
        job.state = 'failed';
      });
    } catch (mutateError) {
      if (mutateError instanceof JobCancelledError) return null;
      throw mutateError;
    } finally {
      this.release(handle);
    }
  }

  /**
   * Abort the local run (if any) and fail the job with code `cancelled`.
   * Runs in other processes notice at their next transition.
   */
  async cancel(documentId: string): Promise<boolean> {
    this.controllers.get(documentId)?.controller.abort(new JobCancelledError(documentId));

    return this.mutex.runExclusive(documentId, async () => {
      const job = await this.store.get(documentId);
      if (!job || isTerminal(job.state)) return false;

      const cancelled = new JobCancelledError(documentId);
      job.failure = { stage: job.state, code: cancelled.code, message: cancelled.message };
      job.state = 'failed';
      this.record(job);
      await this.store.save(job);
      console.log(`[JobTracker] ${documentId} cancelled (run ${job.run})`);
      return true;
    });
  }

  async forget(documentId: string): Promise<void> {
    await this.mutex.runExclusive(documentId, () => this.store.delete(documentId));
    this.controllers.delete(documentId);
  }

  async getJob(documentId: string): Promise<ProcessingJob | null> {
    return this.store.get(documentId);
  }

  async getStatus(documentId: string): Promise<JobStatusView | null> {
    const job = await this.store.get(documentId);
    return job ? toStatusView(job) : null;
  }

  async isActive(documentId: string): Promise<boolean> {
    const job = await this.store.get(documentId);
    return job !== null && !isTerminal(job.state);
  }

  /** Poll until the job is complete or failed. */
  async waitFor(documentId: string, options: WaitOptions = {}): Promise<JobStatusView> {
    const intervalMs = Math.max(10, options.intervalMs ?? 250);
    const timeoutMs = options.timeoutMs ?? 5 * 60 * 1000;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const status = await this.getStatus(documentId);
      if (status && isTerminal(status.state)) return status;
      if (Date.now() >= deadline) throw new TimeoutError(`waiting for ${documentId}`, timeoutMs);
      await sleep(Math.min(intervalMs, Math.max(0, deadline - Date.now())));
    }
  }

  private handle(job: ProcessingJob): RunHandle {
    const current = this.controllers.get(job.documentId);
    const entry =
      current && current.run === job.run && !current.controller.signal.aborted
        ? current
        : { run: job.run, controller: new AbortController() };
    this.controllers.set(job.documentId, entry);
    return { documentId: job.documentId, jobId: job.jobId, run: job.run, signal: entry.controller.signal };
  }

  private release(handle: RunHandle): void {
    const current = this.controllers.get(handle.documentId);
    if (current && current.run === handle.run) this.controllers.delete(handle.documentId);
  }

  private async mutate(handle: RunHandle, change: (job: ProcessingJob) => void): Promise<ProcessingJob> {
    return this.mutex.runExclusive(handle.documentId, async () => {
      const job = await this.store.get(handle.documentId);
      if (!job || job.run !== handle.run || isTerminal(job.state) || handle.signal.aborted) {
        throw new JobCancelledError(handle.documentId);
      }
      change(job);
      this.record(job);
      await this.store.save(job);
      if (job.state !== 'failed') console.log(`[JobTracker] ${job.documentId} → ${job.state} (run ${job.run})`);
      return job;
    });
  }

  private record(job: ProcessingJob): void {
    const at = this.now();
    job.history.push({ state: job.state, run: job.run, at });
    job.updatedAt = at;
  }
}

export function toStatusView(job: ProcessingJob): JobStatusView {
  return {
    jobId: job.jobId,
    documentId: job.documentId,
    status: toDocumentStatus(job.state),
    state: job.state,
    run: job.run,
    documentRef: job.state === 'complete' ? job.documentId : null,
    failure: job.failure,
  };
}
