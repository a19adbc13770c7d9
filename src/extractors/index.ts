export { ELEMENT_TYPE_MAP, normalizeElementType, isPageFurniture } from './element-types.js';
export {
  paragraphText,
  titleText,
  normalizeLevel,
  tableHtml,
  buildElementBody,
  estimateTableShape,
  buildElementMetadata,
  isUsableElement,
} from './content-builders.js';
export type { ElementBody } from './content-builders.js';
export {
  indexSecondaryByPage,
  findSecondaryMatch,
  toAbsoluteAssetPath,
  fuseElements,
} from './element-fusion.js';
export type { FusionOptions, FusionStats, FusionResult } from './element-fusion.js';
export { abstractSectionLanguage, extractAbstract } from './abstract.js';
export { readJsonFile, discoverSourceUuid, loadRawSources } from './source-loader.js';
export { detectDocumentLanguage, buildDocument, extractDocument } from './document-extractor.js';
export type { ExtractOptions, ExtractionResult } from './document-extractor.js';
