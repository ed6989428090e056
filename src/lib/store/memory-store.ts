import { DocumentNotFoundError } from '@/lib/errors';
import type { Chunk, DocumentRecord } from '@/types/document';
import type { AuditEntry, ChunkQuery, DocumentStore, DocumentUpdate } from './types';

export class MemoryDocumentStore implements DocumentStore {
  private readonly documents = new Map<string, DocumentRecord>();
  private readonly chunks = new Map<string, Chunk[]>();
  private readonly auditLog: AuditEntry[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(record: DocumentRecord): Promise<void> {
    this.documents.set(record.id, structuredClone(record));
  }

  async get(id: string): Promise<DocumentRecord | null> {
    const record = this.documents.get(id);
    return record ? structuredClone(record) : null;
  }

  async getMany(ids: string[]): Promise<DocumentRecord[]> {
    return ids.flatMap((id) => {
      const record = this.documents.get(id);
      return record ? [structuredClone(record)] : [];
    });
  }

  async update(id: string, changes: DocumentUpdate): Promise<DocumentRecord> {
    const record = this.documents.get(id);
    if (!record) throw new DocumentNotFoundError(id);
    const updated: DocumentRecord = { ...record, ...structuredClone(changes), updatedAt: this.now() };
    this.documents.set(id, updated);
    return structuredClone(updated);
  }

  async delete(id: string): Promise<boolean> {
    this.chunks.delete(id);
    return this.documents.delete(id);
  }

  async replaceChunks(documentId: string, chunks: Chunk[]): Promise<void> {
    if (!this.documents.has(documentId)) throw new DocumentNotFoundError(documentId);
    const sorted = [...chunks].sort((a, b) => a.sequence - b.sequence);
    this.chunks.set(documentId, structuredClone(sorted));
  }

  async getChunks(documentId: string): Promise<Chunk[]> {
    return structuredClone(this.chunks.get(documentId) ?? []);
  }

  async getChunksById(ids: string[]): Promise<Chunk[]> {
    const wanted = new Set(ids);
    const found: Chunk[] = [];
    for (const list of this.chunks.values()) {
      for (const chunk of list) if (wanted.has(chunk.id)) found.push(structuredClone(chunk));
    }
    return found;
  }

  async listChunks(query?: ChunkQuery): Promise<Chunk[]> {
    const ids = query?.documentIds ?? [...this.chunks.keys()];
    return ids.flatMap((id) => structuredClone(this.chunks.get(id) ?? []));
  }

  async audit(entry: Omit<AuditEntry, 'at'>): Promise<void> {
    this.auditLog.push({ ...entry, at: this.now() });
  }

  auditTrail(documentId?: string): AuditEntry[] {
    return this.auditLog.filter((e) => documentId === undefined || e.documentId === documentId);
  }
}
