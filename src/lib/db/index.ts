export { connectToDatabase, disconnectFromDatabase } from './connection';
export { DocumentModel } from './models/document';
export { ChunkModel } from './models/chunk';
export { IndexEntryModel } from './models/index-entry';
export { ProcessingJobModel } from './models/processing-job';
export { Audit } from './models/audit';
export { ResponseCacheModel } from './models/response-cache';
