/**
 * Query the indexed collection from the command line.
 * Usage: npm run ask -- "what do neural networks learn?" [--mode=semantic] [--style=ieee] [--max=5]
 *        [--author=smith] [--from=2015] [--to=2020] [--source=journal] [--rerank=recency]
 */

import { loadConfig, loadEnvFile } from '../src/lib/config';
import { createServices } from '../src/lib/pipeline';

function parseArgs(argv: string[]) {
  const text: string[] = [];
  const flags = new Map<string, string>();
  for (const arg of argv) {
    const match = arg.match(/^--([a-z]+)=(.*)$/);
    if (match?.[1] !== undefined && match[2] !== undefined) flags.set(match[1], match[2]);
    else text.push(arg);
  }

  const number = (key: string) => {
    const value = flags.get(key);
    return value === undefined ? undefined : Number(value);
  };

  return {
    text: text.join(' '),
    mode: flags.get('mode'),
    citationStyle: flags.get('style'),
    maxResults: number('max'),
    rerank: flags.get('rerank'),
    filters: {
      author: flags.get('author'),
      yearFrom: number('from'),
      yearTo: number('to'),
      source: flags.get('source'),
    },
  };
}

async function main() {
  loadEnvFile();
  const query = parseArgs(process.argv.slice(2));
  if (!query.text) {
    console.error('Usage: npm run ask -- "<question>" [--mode=question|semantic|keyword] [--style=apa]');
    process.exit(1);
  }

  const services = await createServices(loadConfig(), { runner: 'inline' });
  try {
    const result = await services.retrieval.query(query);

    if (result.answer !== null) {
      console.log(`\n${result.answer}\n`);
    }
    result.results.forEach((r, i) => {
      console.log(`[${i + 1}] ${r.score.toFixed(3)} ${r.citation} ${r.title ?? ''}`);
      console.log(`    ${r.chunk.text.slice(0, 160).replace(/\s+/g, ' ')}...`);
    });

    console.log('\nSources:');
    for (const source of result.sources) console.log(`  ${source.citation}`);
    for (const warning of result.warnings) console.log(`! ${warning}`);
  } finally {
    await services.close();
  }
}

main().catch((err) => {
  console.error('[Ask] Error:', err);
  process.exit(1);
});
