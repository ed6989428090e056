import { Schema, model, models, type Document, type Model } from 'mongoose';

export interface IResponseCache extends Document {
  key: string;
  source: string;
  body: string;
  expiresAt: Date;
}

const ResponseCacheSchema = new Schema<IResponseCache>({
  key: { type: String, required: true, unique: true },
  source: { type: String, required: true },
  body: { type: String, required: true },
  expiresAt: { type: Date, required: true },
});

// MongoDB removes entries once expiresAt has passed.
ResponseCacheSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export const ResponseCacheModel = (models.ResponseCache ||
  model<IResponseCache>('ResponseCache', ResponseCacheSchema)) as Model<IResponseCache>;
