import { loadConfig, loadEnvFile } from '../src/lib/config';
import { createServices } from '../src/lib/pipeline';
import { redisConnection } from '../src/lib/queue/connection';
import { createIngestWorker } from './ingest-worker';

async function main() {
  loadEnvFile();
  const config = loadConfig();
  if (!config.mongodbUri) {
    console.error('[Workers] MONGODB_URI not set; queue workers need the shared document store');
    process.exit(1);
  }

  // Runs picked up here execute in this process.
  const services = await createServices(config, { runner: 'inline' });
  const worker = createIngestWorker(services, redisConnection(config.redisUrl));

  console.log('[Workers] Starting ingest worker...');
  console.log('[Workers] Ingest worker:', worker.name);

  async function shutdown() {
    console.log('[Workers] Shutting down...');
    await worker.close();
    await services.close();
    process.exit(0);
  }

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
  console.error('[Workers] Error:', err);
  process.exit(1);
});
