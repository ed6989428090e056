import { Schema, model, models, type Document, type Model } from 'mongoose';
import { AUDIT_ACTIONS, type AuditAction } from '@/types/document';

export interface IAudit extends Document {
  documentId: string;
  action: AuditAction;
  details: Record<string, unknown>;
  fileHash?: string;
  createdAt: Date;
}

const AuditSchema = new Schema<IAudit>(
  {
    documentId: { type: String, required: true, index: true },
    action: { type: String, enum: AUDIT_ACTIONS, required: true },
    details: { type: Schema.Types.Mixed, default: {} },
    fileHash: { type: String },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

AuditSchema.index({ createdAt: -1 });

export const Audit = (models.Audit || model<IAudit>('Audit', AuditSchema)) as Model<IAudit>;
