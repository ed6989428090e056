import { z } from 'zod';
import { ValidationError } from '@/lib/errors';
import { ALL_SOURCES } from '@/types/metadata';
import type { MetadataPatch, SourceId } from '@/types/metadata';
import type { IngestOptions } from '@/types/pipeline';
import type { QueryInput } from '@/types/query';

export const MAX_FILE_SIZE_BYTES = 100 * 1024 * 1024; // 100MB
export const MAX_BATCH_FILES = 50;
export const MAX_QUERY_RESULTS = 50;

const sourceIdSchema = z.enum(['crossref', 'openalex', 'openlibrary', 'googlebooks', 'k10plus']);

export const ingestOptionsSchema = z.object({
  sources: z.array(sourceIdSchema).default([...ALL_SOURCES]),
  allowOcr: z.boolean().default(true),
  languageHint: z
    .string()
    .regex(/^[a-z]{2,3}$/, 'Language hint must be an ISO 639 code')
    .nullable()
    .default(null),
  mode: z.enum(['preview', 'process']).default('process'),
});

const currentYear = new Date().getFullYear();

export const metadataPatchSchema = z
  .object({
    title: z.string().trim().min(1).max(1000).nullable(),
    authors: z.array(z.string().trim().min(1).max(300)).max(500).nullable(),
    year: z.number().int().min(1000).max(currentYear + 1).nullable(),
    journal: z.string().trim().min(1).max(500).nullable(),
    publisher: z.string().trim().min(1).max(500).nullable(),
    doi: z
      .string()
      .trim()
      .regex(/^10\.\d{4,9}\/\S+$/, 'DOI must look like 10.xxxx/suffix')
      .nullable(),
    isbn: z
      .string()
      .trim()
      .regex(/^(?:\d{9}[\dX]|\d{13})$/, 'ISBN must be 10 or 13 characters without separators')
      .nullable(),
    language: z.string().regex(/^[a-z]{2,3}$/).nullable(),
    pageCount: z.number().int().positive().nullable(),
  })
  .partial()
  .strict();

export const queryInputSchema = z.object({
  text: z.string().trim().min(1, 'Query text is required').max(4000),
  mode: z.enum(['question', 'semantic', 'keyword']).default('question'),
  filters: z
    .object({
      author: z.string().trim().min(1).optional(),
      yearFrom: z.number().int().optional(),
      yearTo: z.number().int().optional(),
      documentIds: z.array(z.string().min(1)).optional(),
      source: z.string().trim().min(1).optional(),
    })
    .default({}),
  maxResults: z.number().int().min(1).max(MAX_QUERY_RESULTS).default(5),
  rerank: z.enum(['none', 'recency', 'filter-match']).default('none'),
  citationStyle: z.enum(['apa', 'mla', 'chicago', 'harvard', 'ieee']).default('apa'),
});

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, label: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
    const summary = issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid ${label}: ${summary}`, issues);
  }
  return result.data;
}

export function parseIngestOptions(input: unknown): IngestOptions {
  return parseWith(ingestOptionsSchema, input ?? {}, 'ingest options');
}

export function parseMetadataPatch(input: unknown): MetadataPatch {
  return parseWith(metadataPatchSchema, input, 'metadata patch');
}

export function parseQueryInput(input: unknown): QueryInput {
  const parsed = parseWith(queryInputSchema, input, 'query');
  const { yearFrom, yearTo } = parsed.filters;
  if (yearFrom !== undefined && yearTo !== undefined && yearFrom > yearTo) {
    throw new ValidationError('Invalid query: yearFrom is after yearTo', [
      { path: ['filters', 'yearFrom'], message: 'must not be after yearTo' },
    ]);
  }
  return parsed;
}

export function parseSourceList(value: string): SourceId[] {
  const ids = value
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
  return parseWith(z.array(sourceIdSchema), ids, 'source list');
}

export function validateFileSize(sizeBytes: number): boolean {
  return sizeBytes > 0 && sizeBytes <= MAX_FILE_SIZE_BYTES;
}
