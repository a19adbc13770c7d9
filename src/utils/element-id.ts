/**
 * Element Identifier Utilities
 *
 * Element ids have the form `{doc_id}_elem_{seq}` with a zero-padded,
 * 1-based sequence number. Sequence numbers are dense after every stage.
 */

import { ELEMENT_ID_SEQUENCE_WIDTH } from './constants.js';
import { SequenceInvariantError } from './errors.js';

/**
 * Compute the id of the element at a given sequence position.
 *
 * @param docId - Owning document id
 * @param seq - 1-based sequence number
 * @returns Element id, e.g. `paper_elem_000012`
 */
export function generateElementId(docId: string, seq: number): string {
  if (!Number.isInteger(seq) || seq < 1) {
    throw new SequenceInvariantError(`Element sequence must be a positive integer, got ${seq}`);
  }
  return `${docId}_elem_${String(seq).padStart(ELEMENT_ID_SEQUENCE_WIDTH, '0')}`;
}

/**
 * Assign dense ids `1..N` in array order. Returns new element objects.
 */
export function renumberElements<T extends { id: string }>(elements: readonly T[], docId: string): T[] {
  return elements.map((element, index) => ({
    ...element,
    id: generateElementId(docId, index + 1),
  }));
}

/**
 * Fail loudly when ids are not exactly `{docId}_elem_1..N` in array order.
 */
export function assertDenseSequence(elements: ReadonlyArray<{ id: string }>, docId: string): void {
  for (let i = 0; i < elements.length; i++) {
    const element = elements[i];
    if (element === undefined) {
      continue;
    }
    const expected = generateElementId(docId, i + 1);
    if (element.id !== expected) {
      throw new SequenceInvariantError(
        `Element at position ${i + 1} has id ${element.id}, expected ${expected}`,
        { docId, position: i + 1, id: element.id }
      );
    }
  }
}
