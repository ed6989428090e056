import { Schema, model, models, type Document, type Model } from 'mongoose';
import type { DocumentFormat, DocumentStatus, PageProvenance } from '@/types/document';
import type { Metadata, MetadataField } from '@/types/metadata';
import type { IngestOptions } from '@/types/pipeline';

export interface IDocument extends Document<string> {
  _id: string;
  filename: string;
  storageKey: string;
  sha256: string;
  sizeBytes: number;
  format: DocumentFormat | null;
  status: DocumentStatus;
  rawText: string;
  pages: PageProvenance[];
  ocrPages: number[];
  metadata: Metadata | null;
  manualFields: MetadataField[];
  chunkCount: number;
  ingestOptions: IngestOptions;
  warnings: string[];
  failureMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const PageSchema = new Schema<PageProvenance>(
  {
    page: { type: Number, required: true },
    method: { type: String, enum: ['native', 'ocr', 'empty'], required: true },
    chars: { type: Number, required: true },
  },
  { _id: false }
);

const DocumentSchema = new Schema<IDocument>(
  {
    _id: { type: String, required: true },
    filename: { type: String, required: true },
    storageKey: { type: String, required: true },
    sha256: { type: String, required: true, index: true },
    sizeBytes: { type: Number, required: true },
    format: { type: String, default: null },
    status: {
      type: String,
      enum: ['pending', 'processing', 'complete', 'failed'],
      default: 'pending',
      index: true,
    },
    rawText: { type: String, default: '' },
    pages: { type: [PageSchema], default: [] },
    ocrPages: { type: [Number], default: [] },
    metadata: { type: Schema.Types.Mixed, default: null },
    manualFields: { type: [String], default: [] },
    chunkCount: { type: Number, default: 0 },
    ingestOptions: { type: Schema.Types.Mixed, required: true },
    warnings: { type: [String], default: [] },
    failureMessage: { type: String, default: null },
  },
  { timestamps: true, minimize: false }
);

export const DocumentModel = (models.Document || model<IDocument>('Document', DocumentSchema)) as Model<IDocument>;
