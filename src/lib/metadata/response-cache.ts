/**
 * Cache for bibliographic API responses, keyed by source and request URL.
 * Only successful bodies are stored; entries expire after their TTL.
 */

import { ResponseCacheModel } from '@/lib/db/models/response-cache';
import { hashString } from '@/lib/utils/hash';
import type { SourceId } from '@/types/metadata';

export interface ResponseCache {
  get(key: string): Promise<string | null>;
  set(key: string, body: string, ttlMs: number): Promise<void>;
}

/** URLs can carry API keys, so only their hash is stored. */
export function responseCacheKey(source: SourceId, url: string): string {
  return `${source}:${hashString(url)}`;
}

interface CacheEntry {
  body: string;
  expiresAt: number;
}

/** In-process cache with TTL and least-recently-used eviction. */
export class MemoryResponseCache implements ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly maxEntries = 1000,
    private readonly now: () => number = () => Date.now()
  ) {}

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    // Re-insert to mark as most recently used.
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.body;
  }

  async set(key: string, body: string, ttlMs: number): Promise<void> {
    this.entries.delete(key);
    this.entries.set(key, { body, expiresAt: this.now() + ttlMs });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}

export class MongoResponseCache implements ResponseCache {
  async get(key: string): Promise<string | null> {
    const entry = await ResponseCacheModel.findOne({ key, expiresAt: { $gt: new Date() } })
      .select('body')
      .lean();
    return entry?.body ?? null;
  }

  async set(key: string, body: string, ttlMs: number): Promise<void> {
    const source = key.split(':')[0] ?? '';
    await ResponseCacheModel.updateOne(
      { key },
      { $set: { source, body, expiresAt: new Date(Date.now() + ttlMs) } },
      { upsert: true }
    );
  }
}
