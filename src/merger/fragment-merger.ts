/**
 * Fragment merger for paragraphs the converter split mid-sentence.
 * Joins hyphenated line wraps and unterminated sentences, then renumbers
 * and reports how old sequence numbers map onto new ones.
 */

import type { DocumentElement, ParsedDocument, RegionDivision, SeqRange } from '../schemas/document.js';
import { STAGE_FRAGMENT_MERGED } from '../utils/constants.js';
import { assertDenseSequence, renumberElements } from '../utils/element-id.js';
import { isBlank } from '../utils/text.js';

const SENTENCE_TERMINALS = ['.', '!', '?', '。', '！', '？'];
const TRAILING_HYPHENS = /-+$/;

export interface MergeResult {
  elements: DocumentElement[];
  /** Old 1-based sequence number → new 1-based sequence number. */
  remap: Map<number, number>;
  mergedCount: number;
}

function isMergeable(element: DocumentElement): boolean {
  return element.type === 'paragraph' && !isBlank(element.content.text);
}

export function endsWithHyphen(text: string): boolean {
  return text.trimEnd().endsWith('-');
}

export function endsWithSentenceTerminal(text: string): boolean {
  const trimmed = text.trimEnd();
  return SENTENCE_TERMINALS.some(terminal => trimmed.endsWith(terminal));
}

/**
 * Join `next` onto `current`, or return null when `current` is a complete sentence.
 * A trailing hyphen is removed and the parts are glued without a space;
 * an unterminated sentence is continued after a single space.
 */
export function joinFragments(current: string, next: string): string | null {
  if (endsWithHyphen(current)) {
    return current.trimEnd().replace(TRAILING_HYPHENS, '').trimEnd() + next.trimStart();
  }
  if (!endsWithSentenceTerminal(current)) {
    return `${current.trimEnd()} ${next.trimStart()}`;
  }
  return null;
}

function withText(element: DocumentElement, text: string): DocumentElement {
  if (element.type !== 'paragraph') {
    return element;
  }
  return {
    ...element,
    content: { ...element.content, text },
    metadata: { ...element.metadata, char_count: [...text].length },
  };
}

/**
 * Merge split paragraphs left to right. Merging is transitive: a merged
 * paragraph keeps pulling in followers until a rule stops applying or a
 * non-paragraph or empty element is reached. The first fragment's
 * provenance is kept.
 *
 * @param elements - Densely numbered elements
 * @param docId - Owning document id, used for renumbering
 */
export function mergeFragments(elements: readonly DocumentElement[], docId: string): MergeResult {
  const merged: DocumentElement[] = [];
  const remap = new Map<number, number>();
  let mergedCount = 0;

  let i = 0;
  while (i < elements.length) {
    const element = elements[i];
    if (element === undefined) {
      i++;
      continue;
    }

    const newSeq = merged.length + 1;
    remap.set(i + 1, newSeq);

    if (!isMergeable(element) || element.type !== 'paragraph') {
      merged.push(element);
      i++;
      continue;
    }

    let text = element.content.text;
    let j = i + 1;
    while (j < elements.length) {
      const next = elements[j];
      if (next === undefined || !isMergeable(next) || next.type !== 'paragraph') {
        break;
      }
      const joined = joinFragments(text, next.content.text);
      if (joined === null) {
        break;
      }
      text = joined;
      remap.set(j + 1, newSeq);
      mergedCount++;
      j++;
    }

    merged.push(j > i + 1 ? withText(element, text) : element);
    i = j;
  }

  const renumbered = renumberElements(merged, docId);
  assertDenseSequence(renumbered, docId);

  return { elements: renumbered, remap, mergedCount };
}

function remapSeq(seq: number, remap: ReadonlyMap<number, number>): number {
  return remap.get(seq) ?? seq;
}

function remapRange(range: SeqRange, remap: ReadonlyMap<number, number>): SeqRange {
  return {
    start_seq: remapSeq(range.start_seq, remap),
    end_seq: remapSeq(range.end_seq, remap),
  };
}

/**
 * Carry recorded region boundaries across a merge. Values absent from the table pass through.
 */
export function remapRegionDivision(division: RegionDivision, remap: ReadonlyMap<number, number>): RegionDivision {
  return {
    ...division,
    head: remapRange(division.head, remap),
    body: remapRange(division.body, remap),
    tail: remapRange(division.tail, remap),
  };
}

/**
 * Merge a stored document's fragments and advance its stage marker.
 */
export function mergeDocument(document: ParsedDocument): { document: ParsedDocument; mergedCount: number } {
  const docId = document.metadata.doc_id;
  const result = mergeFragments(document.elements, docId);

  const metadata = {
    ...document.metadata,
    parse_stage: STAGE_FRAGMENT_MERGED,
    total_elements: result.elements.length,
  };
  if (metadata.region_division !== undefined) {
    metadata.region_division = remapRegionDivision(metadata.region_division, result.remap);
  }

  return {
    document: { ...document, metadata, elements: result.elements },
    mergedCount: result.mergedCount,
  };
}
