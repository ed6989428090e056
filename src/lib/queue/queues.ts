/**
 * BullMQ ingest queue. Jobs only carry the document id and run number; the
 * worker re-attaches to the run through the job store. Each run gets its own
 * job id; the tracker already refuses a second active run per document.
 */

import { Queue } from 'bullmq';
import type { JobRunner } from '@/lib/pipeline/runner';
import type { RedisConnection } from './connection';

export const INGEST_QUEUE = 'ingest';

export interface IngestJobData {
  documentId: string;
  run: number;
}

/** BullMQ ignores an `add` whose job id it still holds, so ids are per run. */
export function ingestJobId(documentId: string, run: number): string {
  return `${documentId}-run-${run}`;
}

export class BullMqJobRunner implements JobRunner {
  readonly name = 'bullmq';
  private readonly queue: Queue<IngestJobData>;

  constructor(connection: RedisConnection) {
    this.queue = new Queue<IngestJobData>(INGEST_QUEUE, { connection });
  }

  async enqueue(documentId: string, run: number): Promise<void> {
    await this.queue.add(
      'process',
      { documentId, run },
      {
        jobId: ingestJobId(documentId, run),
        removeOnComplete: true,
        removeOnFail: true,
      }
    );
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
