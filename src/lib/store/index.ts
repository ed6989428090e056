export type { AuditEntry, ChunkQuery, DocumentStore, DocumentUpdate } from './types';
export { MemoryDocumentStore } from './memory-store';
export { MongoDocumentStore } from './mongo-store';
