// ─── Schemas ────────────────────────────────────────────────────────────────
export {
  DocumentElementSchema,
  DocumentMetadataSchema,
  ParsedDocumentSchema,
  RegionDivisionSchema,
  PrimarySourceSchema,
  SecondarySourceSchema,
  ModelSourceSchema,
  LayoutSourceSchema,
} from './schemas/index.js';
export type {
  ElementType,
  BBox,
  ElementSource,
  ElementMetadata,
  DocumentElement,
  ElementContent,
  SeqRange,
  BodyRegionMethod,
  RegionDivision,
  Abstract,
  DocumentMetadata,
  ParsedDocument,
  RawSources,
} from './schemas/index.js';

// ─── Layout ─────────────────────────────────────────────────────────────────
export { parseBBox, centroid, centroidDistance, bboxesMatch, resolvePageSize } from './layout/index.js';
export type { PageSize, Point } from './layout/index.js';

// ─── Extraction ─────────────────────────────────────────────────────────────
export {
  normalizeElementType,
  isPageFurniture,
  buildElementBody,
  buildElementMetadata,
  isUsableElement,
  fuseElements,
  extractAbstract,
  loadRawSources,
  buildDocument,
  extractDocument,
} from './extractors/index.js';
export type { FusionOptions, FusionStats, FusionResult, ExtractOptions, ExtractionResult } from './extractors/index.js';

// ─── Fragment merging ───────────────────────────────────────────────────────
export { joinFragments, mergeFragments, remapRegionDivision, mergeDocument } from './merger/index.js';
export type { MergeResult } from './merger/index.js';

// ─── Segmentation ───────────────────────────────────────────────────────────
export {
  DEFAULT_SEGMENTATION_OPTIONS,
  classifyLeadingLabel,
  collectTitles,
  collectSectionMarkers,
  buildMarkerIndex,
  pairBodyBrackets,
  detectBodyRegion,
  divideRegions,
  analyzeStructure,
  segmentDocument,
} from './segmentation/index.js';
export type {
  SectionRole,
  SegmentationOptions,
  TitleItem,
  SectionMarker,
  MarkerIndex,
  BodyRegion,
  StructureAnalysis,
} from './segmentation/index.js';

// ─── Pipeline & batch ───────────────────────────────────────────────────────
export {
  DocumentStore,
  DocumentPipeline,
  pipelineOptionsFromConfig,
  readDocumentFile,
  writeDocumentFile,
} from './pipeline/index.js';
export type { PipelineOptions, ProcessOptions, PipelineResult } from './pipeline/index.js';
export { processBatch, createDocumentError } from './batch/index.js';
export type { DocumentError, BatchProcessResult, DocumentProcessor, BatchProcessOptions } from './batch/index.js';

// ─── Validation ─────────────────────────────────────────────────────────────
export { validateDocument, validateAndThrow, formatValidationErrors, SchemaValidationError } from './validation/index.js';
export type { ValidationResult, ValidationError } from './validation/index.js';

// ─── Utils ──────────────────────────────────────────────────────────────────
export {
  PIPELINE_VERSION,
  PROCESS_STAGES,
  DocstructError,
  SourceMissingError,
  SourceParseError,
  DocumentParseError,
  SequenceInvariantError,
  PartitionInvariantError,
  StageFailedError,
  ConfigError,
  generateElementId,
  assertDenseSequence,
  isStageCompleted,
  shouldSkipStage,
  detectLanguage,
  scanDocumentDirectories,
  scanJsonStore,
} from './utils/index.js';
export type { ProcessStage, DocumentLanguage } from './utils/index.js';

// ─── Config ─────────────────────────────────────────────────────────────────
export { loadConfig } from './config/index.js';
export type { Config } from './config/index.js';
