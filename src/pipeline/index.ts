export { readDocumentFile, serializeDocument, writeDocumentFile, DocumentStore } from './document-store.js';
export { pipelineOptionsFromConfig, DocumentPipeline } from './document-pipeline.js';
export type { PipelineOptions, ProcessOptions, PipelineResult } from './document-pipeline.js';
