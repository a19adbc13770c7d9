export {
  DEFAULT_SEGMENTATION_OPTIONS,
  normalizeZh,
  normalizeEn,
  looksLikeTocRow,
  isReferencesHeading,
  isTocHeading,
  isTocSectionHeader,
  isTailStartHeading,
  isFrontMatterHeading,
  isMajorBodyStart,
  isMinorBodyStart,
  leadingSectionLabel,
  LEADING_LABEL_CLASSIFIERS,
  classifyLeadingLabel,
} from './markers.js';
export type { SectionRole, SegmentationOptions, LeadingLabelClassifier } from './markers.js';

export { elementText, collectTitles, collectSectionMarkers, buildMarkerIndex } from './marker-index.js';
export type { TitleItem, SectionMarker, MarkerIndex } from './marker-index.js';

export { collectBracketPairs, pairBodyBrackets, widestTitleSpan, detectBodyRegion } from './body-region.js';
export type { BodyRegion, BracketPair } from './body-region.js';

export { divideRegions, assertPartition } from './region-division.js';
export { analyzeStructure, segmentDocument } from './region-segmenter.js';
export type { StructureAnalysis } from './region-segmenter.js';
