export * from './constants.js';
export * from './errors.js';
export { toText, isBlank, detectLanguage, countOccurrences } from './text.js';
export type { DocumentLanguage } from './text.js';
export { generateElementId, renumberElements, assertDenseSequence } from './element-id.js';
export { isProcessStage, stageIndex, isStageCompleted, shouldSkipStage } from './stage.js';
export { scanDocumentDirectories, scanJsonStore, validateDirectory } from './directory-scanner.js';
export type {
  DocumentDirInfo,
  StoredDocumentInfo,
  SkippedEntry,
  DocumentDirScanResult,
  JsonStoreScanResult,
} from './directory-scanner.js';
