import type { AppConfig } from '@/lib/config';
import { GeminiEmbedder } from './gemini';
import { HashingEmbedder } from './hashing';
import type { EmbeddingProvider } from './types';

export type { EmbeddingProvider, EmbedOptions, EmbeddingPurpose } from './types';
export { GeminiEmbedder, GEMINI_EMBEDDING_MODEL } from './gemini';
export { HashingEmbedder } from './hashing';

export function createEmbeddingProvider(config: AppConfig): EmbeddingProvider {
  if (config.embeddingProvider === 'gemini') {
    if (!config.googleAiApiKey) throw new Error('GOOGLE_AI_API_KEY is not set');
    return new GeminiEmbedder({ apiKey: config.googleAiApiKey, dimensions: config.embeddingDims });
  }
  console.log(`[Embedding] Using local hashing embedder (${config.embeddingDims} dims)`);
  return new HashingEmbedder(config.embeddingDims);
}
