/**
 * Keeps the original bytes of every ingested file so a document can be
 * reprocessed (or a failed run retried) without a new upload.
 */

import { promises as fs } from 'fs';
import path from 'path';

export interface FileStorage {
  save(key: string, buffer: Buffer): Promise<void>;
  read(key: string): Promise<Buffer>;
  /** Missing files are not an error. */
  delete(key: string): Promise<void>;
}

/**
 * Storage key for a document's original: `{documentId}/{sanitized filename}`.
 */
export function generateStorageKey(documentId: string, filename: string): string {
  const sanitized = path.basename(filename).replace(/[^a-zA-Z0-9._-]/g, '_') || 'original';
  return `${documentId}/${sanitized}`;
}

export class LocalFileStorage implements FileStorage {
  constructor(private readonly rootDir: string) {}

  async save(key: string, buffer: Buffer): Promise<void> {
    const dest = this.filePath(key);
    await fs.mkdir(path.dirname(dest), { recursive: true });
    await fs.writeFile(dest, buffer);
  }

  async read(key: string): Promise<Buffer> {
    return fs.readFile(this.filePath(key));
  }

  async delete(key: string): Promise<void> {
    const file = this.filePath(key);
    await fs.rm(file, { force: true });
    // Drop the per-document directory once it is empty.
    const dir = path.dirname(file);
    const remaining = await fs.readdir(dir).catch(() => null);
    if (remaining && remaining.length === 0) {
      await fs.rmdir(dir);
      console.log(`[Storage] Removed ${dir}`);
    }
  }

  private filePath(key: string): string {
    const resolved = path.resolve(this.rootDir, key);
    if (!resolved.startsWith(path.resolve(this.rootDir) + path.sep)) {
      throw new Error(`Storage key escapes the storage root: ${key}`);
    }
    return resolved;
  }
}

export class MemoryFileStorage implements FileStorage {
  private readonly files = new Map<string, Buffer>();

  async save(key: string, buffer: Buffer): Promise<void> {
    this.files.set(key, Buffer.from(buffer));
  }

  async read(key: string): Promise<Buffer> {
    const file = this.files.get(key);
    if (!file) throw new Error(`File not found: ${key}`);
    return Buffer.from(file);
  }

  async delete(key: string): Promise<void> {
    this.files.delete(key);
  }

  has(key: string): boolean {
    return this.files.has(key);
  }
}
