import type { AuditAction, Chunk, DocumentRecord } from '@/types/document';

export interface AuditEntry {
  documentId: string;
  action: AuditAction;
  details: Record<string, unknown>;
  fileHash?: string;
  at: Date;
}

export type DocumentUpdate = Partial<Omit<DocumentRecord, 'id' | 'createdAt' | 'updatedAt'>>;

export interface ChunkQuery {
  documentIds?: string[];
}

/**
 * Documents, their chunk lists and the audit trail. A chunk never outlives
 * its document: `delete` removes both.
 */
export interface DocumentStore {
  create(record: DocumentRecord): Promise<void>;
  get(id: string): Promise<DocumentRecord | null>;
  getMany(ids: string[]): Promise<DocumentRecord[]>;
  /** Throws DocumentNotFoundError for an unknown id. */
  update(id: string, changes: DocumentUpdate): Promise<DocumentRecord>;
  delete(id: string): Promise<boolean>;
  replaceChunks(documentId: string, chunks: Chunk[]): Promise<void>;
  /** Ordered by sequence. */
  getChunks(documentId: string): Promise<Chunk[]>;
  getChunksById(ids: string[]): Promise<Chunk[]>;
  listChunks(query?: ChunkQuery): Promise<Chunk[]>;
  audit(entry: Omit<AuditEntry, 'at'>): Promise<void>;
}
