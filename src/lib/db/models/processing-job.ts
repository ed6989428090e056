import { Schema, model, models, type Document, type Model } from 'mongoose';
import { JOB_STATES } from '@/types/pipeline';
import type { JobFailure, JobState, JobTransition } from '@/types/pipeline';

export interface IProcessingJob extends Document {
  jobId: string;
  documentId: string;
  state: JobState;
  run: number;
  ocrUsed: boolean;
  failure: JobFailure | null;
  history: JobTransition[];
  createdAt: Date;
  updatedAt: Date;
}

const TransitionSchema = new Schema<JobTransition>(
  {
    state: { type: String, enum: JOB_STATES, required: true },
    run: { type: Number, required: true },
    at: { type: Date, required: true },
  },
  { _id: false }
);

const ProcessingJobSchema = new Schema<IProcessingJob>(
  {
    jobId: { type: String, required: true },
    documentId: { type: String, required: true, unique: true },
    state: { type: String, enum: JOB_STATES, required: true },
    run: { type: Number, default: 1 },
    ocrUsed: { type: Boolean, default: false },
    failure: { type: Schema.Types.Mixed, default: null },
    history: { type: [TransitionSchema], default: [] },
  },
  { timestamps: true }
);

export const ProcessingJobModel = (models.ProcessingJob ||
  model<IProcessingJob>('ProcessingJob', ProcessingJobSchema)) as Model<IProcessingJob>;
