import { DocumentNotFoundError } from '@/lib/errors';
import { Audit } from '@/lib/db/models/audit';
import { ChunkModel, type IChunk } from '@/lib/db/models/chunk';
import { DocumentModel, type IDocument } from '@/lib/db/models/document';
import type { Chunk, DocumentRecord } from '@/types/document';
import type { AuditEntry, ChunkQuery, DocumentStore, DocumentUpdate } from './types';

type DocumentRow = Pick<IDocument, Exclude<keyof DocumentRecord, 'id' | 'options' | 'error'> | 'ingestOptions' | 'failureMessage'> & {
  _id: string;
};

type ChunkRow = Pick<IChunk, Exclude<keyof Chunk, 'id'>> & { _id: string };

function toRecord(row: DocumentRow): DocumentRecord {
  return {
    id: row._id,
    filename: row.filename,
    storageKey: row.storageKey,
    sha256: row.sha256,
    sizeBytes: row.sizeBytes,
    format: row.format,
    status: row.status,
    rawText: row.rawText,
    pages: row.pages.map((p) => ({ page: p.page, method: p.method, chars: p.chars })),
    ocrPages: [...row.ocrPages],
    metadata: row.metadata,
    manualFields: [...row.manualFields],
    chunkCount: row.chunkCount,
    options: row.ingestOptions,
    warnings: [...row.warnings],
    error: row.failureMessage,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toRow(changes: DocumentUpdate): Record<string, unknown> {
  const { options, error, ...rest } = changes;
  const row: Record<string, unknown> = { ...rest };
  if (options !== undefined) row.ingestOptions = options;
  if (error !== undefined) row.failureMessage = error;
  return row;
}

function toChunk(row: ChunkRow): Chunk {
  return {
    id: row._id,
    documentId: row.documentId,
    sequence: row.sequence,
    text: row.text,
    start: row.start,
    end: row.end,
    page: row.page,
    tokenCount: row.tokenCount,
    language: row.language,
    entities: row.entities,
  };
}

export class MongoDocumentStore implements DocumentStore {
  async create(record: DocumentRecord): Promise<void> {
    const { id, createdAt: _createdAt, updatedAt: _updatedAt, ...changes } = record;
    await DocumentModel.create({ _id: id, ...toRow(changes) });
  }

  async get(id: string): Promise<DocumentRecord | null> {
    const row = await DocumentModel.findById(id).lean<DocumentRow>();
    return row ? toRecord(row) : null;
  }

  async getMany(ids: string[]): Promise<DocumentRecord[]> {
    const rows = await DocumentModel.find({ _id: { $in: ids } }).lean<DocumentRow[]>();
    const byId = new Map(rows.map((row) => [row._id, toRecord(row)]));
    return ids.flatMap((id) => {
      const record = byId.get(id);
      return record ? [record] : [];
    });
  }

  async update(id: string, changes: DocumentUpdate): Promise<DocumentRecord> {
    const row = await DocumentModel.findByIdAndUpdate(id, { $set: toRow(changes) }, { new: true }).lean<DocumentRow>();
    if (!row) throw new DocumentNotFoundError(id);
    return toRecord(row);
  }

  async delete(id: string): Promise<boolean> {
    await ChunkModel.deleteMany({ documentId: id });
    const result = await DocumentModel.deleteOne({ _id: id });
    return result.deletedCount > 0;
  }

  /** Upserts the new list, then drops chunks that are no longer part of it. */
  async replaceChunks(documentId: string, chunks: Chunk[]): Promise<void> {
    if (chunks.length > 0) {
      await ChunkModel.bulkWrite(
        chunks.map(({ id, ...chunk }) => ({
          replaceOne: { filter: { _id: id }, replacement: { _id: id, ...chunk }, upsert: true },
        }))
      );
    }
    await ChunkModel.deleteMany({ documentId, _id: { $nin: chunks.map((c) => c.id) } });
  }

  async getChunks(documentId: string): Promise<Chunk[]> {
    const rows = await ChunkModel.find({ documentId }).sort({ sequence: 1 }).lean<ChunkRow[]>();
    return rows.map(toChunk);
  }

  async getChunksById(ids: string[]): Promise<Chunk[]> {
    const rows = await ChunkModel.find({ _id: { $in: ids } }).lean<ChunkRow[]>();
    return rows.map(toChunk);
  }

  async listChunks(query?: ChunkQuery): Promise<Chunk[]> {
    const filter = query?.documentIds ? { documentId: { $in: query.documentIds } } : {};
    const rows = await ChunkModel.find(filter).sort({ documentId: 1, sequence: 1 }).lean<ChunkRow[]>();
    return rows.map(toChunk);
  }

  async audit(entry: Omit<AuditEntry, 'at'>): Promise<void> {
    await Audit.create(entry);
  }
}
