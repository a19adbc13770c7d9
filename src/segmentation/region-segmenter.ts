import type { DocumentElement, ParsedDocument, RegionDivision } from '../schemas/document.js';
import { STAGE_REGION_DIVIDED } from '../utils/constants.js';
import { detectBodyRegion, type BodyRegion } from './body-region.js';
import {
  buildMarkerIndex,
  collectSectionMarkers,
  collectTitles,
  type MarkerIndex,
  type SectionMarker,
  type TitleItem,
} from './marker-index.js';
import { DEFAULT_SEGMENTATION_OPTIONS, type SegmentationOptions } from './markers.js';
import { divideRegions } from './region-division.js';

export interface StructureAnalysis {
  titles: TitleItem[];
  markers: SectionMarker[];
  index: MarkerIndex;
  body: BodyRegion;
  division: RegionDivision;
}

/**
 * Run every segmentation step over an element list without touching it.
 */
export function analyzeStructure(
  elements: readonly DocumentElement[],
  options: SegmentationOptions = DEFAULT_SEGMENTATION_OPTIONS
): StructureAnalysis {
  const titles = collectTitles(elements);
  const markers = collectSectionMarkers(elements, options);
  const index = buildMarkerIndex(titles, markers, options);
  const body = detectBodyRegion(index, elements.length);
  const division = divideRegions(body, elements);
  return { titles, markers, index, body, division };
}

/**
 * Write the head/body/tail division into a document's metadata.
 * Elements are returned unchanged.
 */
export function segmentDocument(
  document: ParsedDocument,
  options: SegmentationOptions = DEFAULT_SEGMENTATION_OPTIONS
): { document: ParsedDocument; analysis: StructureAnalysis } {
  const analysis = analyzeStructure(document.elements, options);
  return {
    document: {
      ...document,
      metadata: {
        ...document.metadata,
        parse_stage: STAGE_REGION_DIVIDED,
        total_elements: document.elements.length,
        region_division: analysis.division,
      },
    },
    analysis,
  };
}
