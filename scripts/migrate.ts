/**
 * Database migration script: brings MongoDB indexes in line with the models.
 * Usage: npm run db:migrate
 */

import { loadEnvFile } from '../src/lib/config';
import {
  Audit,
  ChunkModel,
  DocumentModel,
  IndexEntryModel,
  ProcessingJobModel,
  ResponseCacheModel,
  connectToDatabase,
  disconnectFromDatabase,
} from '../src/lib/db';

async function migrate() {
  loadEnvFile();
  if (!process.env.MONGODB_URI) {
    console.error('MONGODB_URI not set');
    process.exit(1);
  }

  await connectToDatabase();

  const models = [DocumentModel, ChunkModel, IndexEntryModel, ProcessingJobModel, Audit, ResponseCacheModel];
  for (const model of models) {
    const dropped = await model.syncIndexes();
    console.log(
      `[Migrate] ${model.collection.collectionName}: indexes synced` +
        (dropped.length > 0 ? `, dropped ${dropped.join(', ')}` : '')
    );
  }

  console.log('[Migrate] Migrations completed');
  await disconnectFromDatabase();
}

migrate().catch((err) => {
  console.error('[Migrate] Error:', err);
  process.exit(1);
});
