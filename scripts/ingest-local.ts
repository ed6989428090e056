/**
 * Ingest local files and wait for their runs to finish.
 * Usage: npm run ingest -- paper.pdf book.epub [--preview] [--no-ocr] [--sources=crossref,openalex] [--lang=de]
 */

import { loadConfig, loadEnvFile } from '../src/lib/config';
import { createServices } from '../src/lib/pipeline';
import { parseSourceList } from '../src/lib/utils/validation';

function parseArgs(argv: string[]) {
  const files: string[] = [];
  const options: Record<string, unknown> = {};
  for (const arg of argv) {
    if (arg === '--preview') options.mode = 'preview';
    else if (arg === '--no-ocr') options.allowOcr = false;
    else if (arg.startsWith('--sources=')) options.sources = parseSourceList(arg.slice('--sources='.length));
    else if (arg.startsWith('--lang=')) options.languageHint = arg.slice('--lang='.length);
    else files.push(arg);
  }
  return { files, options };
}

async function main() {
  loadEnvFile();
  const { files, options } = parseArgs(process.argv.slice(2));
  if (files.length === 0) {
    console.error('Usage: npm run ingest -- <file...> [--preview] [--no-ocr] [--sources=a,b] [--lang=xx]');
    process.exit(1);
  }

  const services = await createServices(loadConfig());
  try {
    const items = await services.ingestion.ingest(
      files.map((path) => ({ path })),
      options
    );

    for (const item of items) {
      switch (item.outcome) {
        case 'error':
          console.log(`✗ ${item.filename}: ${item.message} (${item.code})`);
          break;
        case 'preview': {
          const { metadata, ocrPages, warnings } = item.preview;
          console.log(`◦ ${item.filename} → ${item.documentId}`);
          console.log(`  ${metadata.title ?? '(no title)'} by ${(metadata.authors ?? []).join('; ') || '(no authors)'}`);
          console.log(`  year ${metadata.year ?? '?'}, doi ${metadata.doi ?? '-'}, ${ocrPages.length} OCR pages`);
          for (const warning of warnings) console.log(`  ! ${warning}`);
          break;
        }
        case 'queued': {
          const status = await services.tracker.waitFor(item.documentId, { intervalMs: 500 });
          if (status.status === 'complete') {
            const record = await services.ingestion.getDocument(item.documentId);
            console.log(`✓ ${item.filename} → ${item.documentId} (${record?.chunkCount ?? 0} chunks)`);
          } else {
            console.log(`✗ ${item.filename} → ${item.documentId}: ${status.failure?.message ?? 'failed'}`);
          }
          break;
        }
      }
    }
  } finally {
    await services.close();
  }
}

main().catch((err) => {
  console.error('[Ingest] Error:', err);
  process.exit(1);
});
