export { runWithConcurrency, processBatch, createDocumentError } from './batch-processor.js';
export type { DocumentError, BatchProcessResult, DocumentProcessor, BatchProcessOptions } from './batch-processor.js';
