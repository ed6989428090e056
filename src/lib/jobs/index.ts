export { JobTracker, toStatusView, type RunHandle, type WaitOptions } from './tracker';
export { MemoryJobStore, MongoJobStore, type JobStore } from './job-store';
export { canAdvance, canFail, isTerminal, toDocumentStatus } from './state-machine';
