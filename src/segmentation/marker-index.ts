import type { DocumentElement } from '../schemas/document.js';
import {
  DEFAULT_SEGMENTATION_OPTIONS,
  classifyLeadingLabel,
  isFrontMatterHeading,
  isMajorBodyStart,
  isMinorBodyStart,
  isReferencesHeading,
  isTailStartHeading,
  isTocHeading,
  leadingSectionLabel,
  type SectionRole,
  type SegmentationOptions,
} from './markers.js';

/** A title element as seen by the segmenter. */
export interface TitleItem {
  element_id: string;
  text: string;
  level: number;
  seq: number;
  page: number;
}

export interface SectionMarker {
  seq: number;
  role: SectionRole;
}

/**
 * Sequence numbers of every kind of structural evidence, each list sorted and
 * free of duplicates. Title text and leading labels feed the same lists.
 */
export interface MarkerIndex {
  titles: TitleItem[];
  references: number[];
  tableOfContents: number[];
  tailStart: number[];
  frontMatter: number[];
  /** First-chapter titles; open brackets in the pairing algorithm. */
  majorBodyStart: number[];
  /** Any chapter-like heading; fallback body-start candidates. */
  minorBodyStart: number[];
  /** False when the document has neither titles nor markers. */
  hasEvidence: boolean;
}

/**
 * Readable text of an element, or '' for elements without a text payload.
 */
export function elementText(element: DocumentElement): string {
  switch (element.type) {
    case 'table':
    case 'image':
      return '';
    default:
      return element.content.text.trim();
  }
}

export function collectTitles(elements: readonly DocumentElement[]): TitleItem[] {
  const titles: TitleItem[] = [];
  elements.forEach((element, index) => {
    if (element.type !== 'title') {
      return;
    }
    titles.push({
      element_id: element.id,
      text: element.content.text.trim(),
      level: element.content.level,
      seq: index + 1,
      page: element.source.page,
    });
  });
  return titles;
}

/**
 * Classify the leading label of every element, titles included.
 */
export function collectSectionMarkers(
  elements: readonly DocumentElement[],
  options: SegmentationOptions = DEFAULT_SEGMENTATION_OPTIONS
): SectionMarker[] {
  const markers: SectionMarker[] = [];
  elements.forEach((element, index) => {
    const label = leadingSectionLabel(elementText(element), options);
    const role = classifyLeadingLabel(label, options);
    if (role !== null) {
      markers.push({ seq: index + 1, role });
    }
  });
  return markers;
}

function uniqueSorted(seqs: Iterable<number>): number[] {
  return [...new Set(seqs)].sort((a, b) => a - b);
}

function seqsWhere(titles: readonly TitleItem[], test: (text: string) => boolean): number[] {
  return titles.filter(title => test(title.text)).map(title => title.seq);
}

function markerSeqs(markers: readonly SectionMarker[], role: SectionRole): number[] {
  return markers.filter(marker => marker.role === role).map(marker => marker.seq);
}

export function buildMarkerIndex(
  titles: readonly TitleItem[],
  markers: readonly SectionMarker[],
  options: SegmentationOptions = DEFAULT_SEGMENTATION_OPTIONS
): MarkerIndex {
  return {
    titles: [...titles].sort((a, b) => a.seq - b.seq),
    references: uniqueSorted([
      ...seqsWhere(titles, text => isReferencesHeading(text, options)),
      ...markerSeqs(markers, 'references'),
    ]),
    tableOfContents: uniqueSorted([...seqsWhere(titles, isTocHeading), ...markerSeqs(markers, 'table_of_contents')]),
    tailStart: uniqueSorted([
      ...seqsWhere(titles, text => isTailStartHeading(text, options)),
      ...markerSeqs(markers, 'tail_start'),
    ]),
    frontMatter: uniqueSorted([...seqsWhere(titles, isFrontMatterHeading), ...markerSeqs(markers, 'front_matter')]),
    majorBodyStart: uniqueSorted(seqsWhere(titles, text => isMajorBodyStart(text, options))),
    minorBodyStart: uniqueSorted([
      ...seqsWhere(titles, text => isMinorBodyStart(text, options)),
      ...markerSeqs(markers, 'body_start'),
    ]),
    hasEvidence: titles.length > 0 || markers.length > 0,
  };
}
