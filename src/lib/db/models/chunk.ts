import { Schema, model, models, type Document, type Model } from 'mongoose';
import type { EntityMap } from '@/types/document';

export interface IChunk extends Document<string> {
  _id: string;
  documentId: string;
  sequence: number;
  text: string;
  start: number;
  end: number;
  page: number | null;
  tokenCount: number;
  language: string;
  entities: EntityMap;
}

const ChunkSchema = new Schema<IChunk>(
  {
    _id: { type: String, required: true },
    documentId: { type: String, required: true, index: true },
    sequence: { type: Number, required: true },
    text: { type: String, required: true },
    start: { type: Number, required: true },
    end: { type: Number, required: true },
    page: { type: Number, default: null },
    tokenCount: { type: Number, required: true },
    language: { type: String, required: true },
    entities: { type: Schema.Types.Mixed, default: {} },
  },
  { minimize: false }
);

ChunkSchema.index({ documentId: 1, sequence: 1 });
ChunkSchema.index({ text: 'text' });

export const ChunkModel = (models.Chunk || model<IChunk>('Chunk', ChunkSchema)) as Model<IChunk>;
