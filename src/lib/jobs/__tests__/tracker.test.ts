import { describe, it, expect, beforeEach } from 'vitest';
import type { JobState } from '@/types/pipeline';
import { CorruptFileError, JobCancelledError, JobConflictError, TimeoutError } from '@/lib/errors';
import { MemoryJobStore } from '../job-store';
import { canAdvance, toDocumentStatus } from '../state-machine';
import { JobTracker } from '../tracker';

describe('job state machine', () => {
  it('only moves forward', () => {
    expect(canAdvance('queued', 'extracting')).toBe(true);
    expect(canAdvance('extracting', 'harvesting_metadata')).toBe(true);
    expect(canAdvance('segmenting', 'extracting')).toBe(false);
    expect(canAdvance('complete', 'queued')).toBe(false);
    expect(canAdvance('embedding', 'failed')).toBe(false);
  });

  it('maps states to document statuses', () => {
    const states: JobState[] = ['queued', 'ocr', 'complete', 'failed'];
    expect(states.map(toDocumentStatus)).toEqual([
      'pending',
      'processing',
      'complete',
      'failed',
    ]);
  });
});

describe('JobTracker', () => {
  let tracker: JobTracker;

  beforeEach(() => {
    tracker = new JobTracker(new MemoryJobStore());
  });

  it('walks a run through its stages to completion', async () => {
    const handle = await tracker.begin('doc-1');
    expect(await tracker.getStatus('doc-1')).toMatchObject({ status: 'pending', state: 'queued', run: 1 });

    await tracker.advance(handle, 'extracting');
    await tracker.advance(handle, 'ocr');
    await tracker.advance(handle, 'harvesting_metadata');
    expect(await tracker.getStatus('doc-1')).toMatchObject({ status: 'processing', documentRef: null });

    await tracker.advance(handle, 'reconciling');
    await tracker.advance(handle, 'segmenting');
    await tracker.advance(handle, 'embedding');
    const job = await tracker.complete(handle);

    expect(job.ocrUsed).toBe(true);
    expect(job.history.map((h) => h.state)).toEqual([
      'queued',
      'extracting',
      'ocr',
      'harvesting_metadata',
      'reconciling',
      'segmenting',
      'embedding',
      'complete',
    ]);
    expect(await tracker.getStatus('doc-1')).toMatchObject({
      status: 'complete',
      documentRef: 'doc-1',
      failure: null,
    });
  });

  it('rejects backward transitions', async () => {
    const handle = await tracker.begin('doc-1');
    await tracker.advance(handle, 'segmenting');
    await expect(tracker.advance(handle, 'extracting')).rejects.toThrow('Illegal job transition segmenting → extracting');
  });

  it('rejects a second run while one is active', async () => {
    const results = await Promise.allSettled([tracker.begin('doc-1'), tracker.begin('doc-1')]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.find((r) => r.status === 'rejected');
    expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(JobConflictError);
  });

  it('records the failing stage and error code', async () => {
    const handle = await tracker.begin('doc-1');
    await tracker.advance(handle, 'extracting');
    await tracker.fail(handle, new CorruptFileError('paper.pdf', new Error('bad xref table')));

    expect(await tracker.getStatus('doc-1')).toMatchObject({
      status: 'failed',
      failure: { stage: 'extracting', code: 'corrupt_file', message: 'Could not read paper.pdf: bad xref table' },
    });
  });

  it('resets a finished job for reprocessing with a new run number', async () => {
    const first = await tracker.begin('doc-1');
    await tracker.fail(first, new Error('boom'));

    const second = await tracker.begin('doc-1');
    expect(second.run).toBe(2);
    expect(second.jobId).toBe(first.jobId);
    expect(await tracker.getStatus('doc-1')).toMatchObject({ state: 'queued', run: 2, failure: null });
  });

  it('cancels a run cooperatively', async () => {
    const handle = await tracker.begin('doc-1');
    await tracker.advance(handle, 'extracting');

    expect(await tracker.cancel('doc-1')).toBe(true);
    expect(handle.signal.aborted).toBe(true);
    await expect(tracker.advance(handle, 'harvesting_metadata')).rejects.toBeInstanceOf(JobCancelledError);
    expect(await tracker.fail(handle, new Error('late failure'))).toBeNull();

    expect(await tracker.getStatus('doc-1')).toMatchObject({
      status: 'failed',
      failure: { stage: 'extracting', code: 'cancelled' },
    });
  });

  it('ignores transitions from a superseded run', async () => {
    const first = await tracker.begin('doc-1');
    await tracker.fail(first, new Error('boom'));
    await tracker.begin('doc-1');

    await expect(tracker.advance(first, 'extracting')).rejects.toBeInstanceOf(JobCancelledError);
    expect(await tracker.getStatus('doc-1')).toMatchObject({ state: 'queued', run: 2 });
  });

  it('waits for a job to finish', async () => {
    const handle = await tracker.begin('doc-1');
    setTimeout(() => {
      void tracker.complete(handle);
    }, 30);

    const status = await tracker.waitFor('doc-1', { intervalMs: 10, timeoutMs: 2000 });
    expect(status.status).toBe('complete');
  });

  it('gives up waiting after the timeout', async () => {
    await tracker.begin('doc-1');
    await expect(tracker.waitFor('doc-1', { intervalMs: 10, timeoutMs: 40 })).rejects.toBeInstanceOf(TimeoutError);
  });

  it('reports unknown documents as null', async () => {
    expect(await tracker.getStatus('missing')).toBeNull();
  });
});
