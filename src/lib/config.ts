/**
 * Runtime configuration, parsed once from the environment.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { ALL_SOURCES } from '@/types/metadata';
import type { SourceId } from '@/types/metadata';
import { parseSourceList } from '@/lib/utils/validation';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : null));

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
  MONGODB_URI: optionalString,
  REDIS_URL: z.string().default('redis://localhost:6379'),
  STORAGE_DIR: z.string().default('./.data/originals'),
  GOOGLE_AI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  LLM_PROVIDER: z.enum(['gemini', 'anthropic']).default('gemini'),
  EMBEDDING_PROVIDER: z.enum(['gemini', 'hashing']).optional(),
  EMBEDDING_DIMS: int(768, 8),
  CHUNK_MAX_TOKENS: int(256, 16),
  OCR_MIN_CHARS_PER_PAGE: int(50),
  OCR_LANGUAGES: z.string().default('eng+deu'),
  METADATA_SOURCES: z.string().default(ALL_SOURCES.join(',')),
  METADATA_SOURCE_TRUST: z.string().default('crossref,openalex,k10plus,googlebooks,openlibrary'),
  METADATA_SIMILARITY_FLOOR: z.coerce.number().min(0).max(1).default(0.6),
  SOURCE_TIMEOUT_MS: int(10_000, 1),
  METADATA_CACHE_TTL_MS: int(24 * 60 * 60 * 1000),
  EXTRACTION_TIMEOUT_MS: int(120_000, 1),
  OCR_PAGE_TIMEOUT_MS: int(60_000, 1),
  EMBEDDING_TIMEOUT_MS: int(30_000, 1),
  EMBEDDING_MAX_RETRIES: int(3),
  LLM_TIMEOUT_MS: int(60_000, 1),
  INGEST_CONCURRENCY: int(3, 1),
  GOOGLE_BOOKS_API_KEY: optionalString,
  CROSSREF_MAILTO: optionalString,
});

export interface AppConfig {
  mongodbUri: string | null;
  redisUrl: string;
  storageDir: string;
  googleAiApiKey: string | null;
  anthropicApiKey: string | null;
  llmProvider: 'gemini' | 'anthropic';
  embeddingProvider: 'gemini' | 'hashing';
  embeddingDims: number;
  chunkMaxTokens: number;
  ocrMinCharsPerPage: number;
  ocrLanguages: string;
  metadataSources: SourceId[];
  /** Most trusted first. */
  metadataSourceTrust: SourceId[];
  metadataSimilarityFloor: number;
  /** 0 disables the response cache. */
  metadataCacheTtlMs: number;
  sourceTimeoutMs: number;
  extractionTimeoutMs: number;
  ocrPageTimeoutMs: number;
  embeddingTimeoutMs: number;
  embeddingMaxRetries: number;
  llmTimeoutMs: number;
  ingestConcurrency: number;
  googleBooksApiKey: string | null;
  crossrefMailto: string | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;

  return {
    mongodbUri: e.MONGODB_URI,
    redisUrl: e.REDIS_URL,
    storageDir: resolve(e.STORAGE_DIR),
    googleAiApiKey: e.GOOGLE_AI_API_KEY,
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    llmProvider: e.LLM_PROVIDER,
    embeddingProvider: e.EMBEDDING_PROVIDER ?? (e.GOOGLE_AI_API_KEY ? 'gemini' : 'hashing'),
    embeddingDims: e.EMBEDDING_DIMS,
    chunkMaxTokens: e.CHUNK_MAX_TOKENS,
    ocrMinCharsPerPage: e.OCR_MIN_CHARS_PER_PAGE,
    ocrLanguages: e.OCR_LANGUAGES,
    metadataSources: parseSourceList(e.METADATA_SOURCES),
    metadataSourceTrust: parseSourceList(e.METADATA_SOURCE_TRUST),
    metadataSimilarityFloor: e.METADATA_SIMILARITY_FLOOR,
    metadataCacheTtlMs: e.METADATA_CACHE_TTL_MS,
    sourceTimeoutMs: e.SOURCE_TIMEOUT_MS,
    extractionTimeoutMs: e.EXTRACTION_TIMEOUT_MS,
    ocrPageTimeoutMs: e.OCR_PAGE_TIMEOUT_MS,
    embeddingTimeoutMs: e.EMBEDDING_TIMEOUT_MS,
    embeddingMaxRetries: e.EMBEDDING_MAX_RETRIES,
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
    ingestConcurrency: e.INGEST_CONCURRENCY,
    googleBooksApiKey: e.GOOGLE_BOOKS_API_KEY,
    crossrefMailto: e.CROSSREF_MAILTO,
  };
}

/**
 * Load KEY=value lines from `.env.local` into process.env, since tsx
 * doesn't auto-load it. Existing variables win.
 */
export function loadEnvFile(filename = '.env.local'): void {
  const envPath = resolve(process.cwd(), filename);
  let content: string;
  try {
    content = readFileSync(envPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
    throw error;
  }

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed
      .slice(eqIdx + 1)
      .trim()
      .replace(/^(['"])(.*)\1$/, '$2');
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
