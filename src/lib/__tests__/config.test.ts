import { describe, it, expect } from 'vitest';
import { resolve } from 'path';
import { loadConfig } from '../config';
import { ValidationError } from '../errors';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.mongodbUri).toBeNull();
    expect(config.redisUrl).toBe('redis://localhost:6379');
    expect(config.storageDir).toBe(resolve('./.data/originals'));
    expect(config.llmProvider).toBe('gemini');
    expect(config.embeddingProvider).toBe('hashing');
    expect(config.embeddingDims).toBe(768);
    expect(config.chunkMaxTokens).toBe(256);
    expect(config.metadataSources).toEqual(['crossref', 'openalex', 'openlibrary', 'googlebooks', 'k10plus']);
    expect(config.metadataSourceTrust).toEqual(['crossref', 'openalex', 'k10plus', 'googlebooks', 'openlibrary']);
    expect(config.ingestConcurrency).toBe(3);
  });

  it('picks gemini embeddings when a Google key is present', () => {
    const config = loadConfig({ GOOGLE_AI_API_KEY: 'test-secret' });
    expect(config.googleAiApiKey).toBe('test-secret');
    expect(config.embeddingProvider).toBe('gemini');
  });

  it('treats blank strings as unset and coerces numbers', () => {
    const config = loadConfig({
      MONGODB_URI: '   ',
      INGEST_CONCURRENCY: '5',
      METADATA_SIMILARITY_FLOOR: '0.75',
      METADATA_SOURCES: ' CrossRef, k10plus ',
    });
    expect(config.mongodbUri).toBeNull();
    expect(config.ingestConcurrency).toBe(5);
    expect(config.metadataSimilarityFloor).toBe(0.75);
    expect(config.metadataSources).toEqual(['crossref', 'k10plus']);
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ INGEST_CONCURRENCY: '0' })).toThrow(/^Invalid configuration: INGEST_CONCURRENCY:/);
    expect(() => loadConfig({ LLM_PROVIDER: 'other' })).toThrow(/LLM_PROVIDER/);
  });

  it('rejects unknown metadata sources', () => {
    expect(() => loadConfig({ METADATA_SOURCES: 'crossref,worldcat' })).toThrow(ValidationError);
  });
});
