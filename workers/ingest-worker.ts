import { Worker, type Job } from 'bullmq';
import type { RunOutcome, Services } from '../src/lib/pipeline';
import { INGEST_QUEUE, type IngestJobData } from '../src/lib/queue/queues';
import type { RedisConnection } from '../src/lib/queue/connection';

/**
 * Consumes the ingest queue. The job store decides whether the run is still
 * current; a superseded or cancelled run ends as `cancelled` without work.
 */
export function createIngestWorker(
  services: Services,
  connection: RedisConnection
): Worker<IngestJobData, RunOutcome> {
  const worker = new Worker<IngestJobData, RunOutcome>(
    INGEST_QUEUE,
    async (job: Job<IngestJobData>) => {
      const { documentId, run } = job.data;
      console.log(`[IngestWorker] Picked up ${documentId} (run ${run})`);
      return services.pipeline.run(documentId);
    },
    {
      connection,
      concurrency: services.config.ingestConcurrency,
    }
  );

  worker.on('completed', (job, outcome) => {
    console.log(`[IngestWorker] Job ${job.id} finished: ${outcome.status}`);
  });

  worker.on('failed', (job, err) => {
    console.error(`[IngestWorker] Job ${job?.id} crashed:`, err.message);
  });

  return worker;
}
