export { openMongoConnection } from './connection.js';
export type { MongoConnectionOptions } from './connection.js';
export { readingDocumentModel, readingDocumentSchema, READING_DOCUMENT_MODEL_NAME } from './reading-document.js';
export type { ReadingDocument } from './reading-document.js';
export { DocumentSink, classifyMongoError, readingMergePipeline } from './document-sink.js';
