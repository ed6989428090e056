import { Schema, model, models, type Document, type Model } from 'mongoose';

export interface IIndexEntry extends Document {
  documentId: string;
  chunkId: string;
  vector: number[];
  /** Entries written by one replaceDocument call share a generation. */
  generation: string;
  createdAt: Date;
}

const IndexEntrySchema = new Schema<IIndexEntry>(
  {
    documentId: { type: String, required: true, index: true },
    chunkId: { type: String, required: true },
    vector: { type: [Number], required: true },
    generation: { type: String, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

IndexEntrySchema.index({ documentId: 1, chunkId: 1, generation: 1 }, { unique: true });

export const IndexEntryModel = (models.IndexEntry ||
  model<IIndexEntry>('IndexEntry', IndexEntrySchema)) as Model<IIndexEntry>;
