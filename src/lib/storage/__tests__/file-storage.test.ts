import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { LocalFileStorage, generateStorageKey } from '../file-storage';

describe('generateStorageKey', () => {
  it('keeps keys inside the document directory', () => {
    expect(generateStorageKey('doc-1', '../My Paper (final).pdf')).toBe('doc-1/My_Paper__final_.pdf');
  });
});

describe('LocalFileStorage', () => {
  let root: string;
  let storage: LocalFileStorage;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'storage-test-'));
    storage = new LocalFileStorage(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('round-trips a file and removes its directory on delete', async () => {
    await storage.save('doc-1/paper.pdf', Buffer.from('%PDF-1.7'));
    expect((await storage.read('doc-1/paper.pdf')).toString()).toBe('%PDF-1.7');

    await storage.delete('doc-1/paper.pdf');
    await expect(storage.read('doc-1/paper.pdf')).rejects.toThrow();
    await expect(fs.stat(path.join(root, 'doc-1'))).rejects.toThrow();
  });

  it('ignores deletes of missing files', async () => {
    await expect(storage.delete('doc-2/none.txt')).resolves.toBeUndefined();
  });

  it('refuses keys outside the root', async () => {
    await expect(storage.save('../escape.txt', Buffer.from('x'))).rejects.toThrow('escapes the storage root');
  });
});
