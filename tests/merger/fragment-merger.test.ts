import { describe, it, expect } from 'vitest';
import {
  endsWithHyphen,
  endsWithSentenceTerminal,
  joinFragments,
  mergeDocument,
  mergeFragments,
  remapRegionDivision,
} from '../../src/merger/fragment-merger.js';
import type { DocumentElement } from '../../src/schemas/document.js';
import { DOC_ID, makeDocument, textElement, titleElement } from '../helpers/fixtures.js';

function texts(elements: readonly DocumentElement[]): string[] {
  return elements.map(element => ('text' in element.content ? element.content.text : `<${element.type}>`));
}

function splitDocumentElements(): DocumentElement[] {
  return [
    textElement(1, 'The exam-', { page: 0 }),
    textElement(2, 'ple text.', { page: 1 }),
    titleElement(3, 'Methods'),
    textElement(4, 'We measured'),
    textElement(5, 'the values'),
    textElement(6, 'twice.'),
    textElement(7, 'Done.'),
  ];
}

describe('fragment-merger', () => {
  describe('joinFragments', () => {
    it('should glue hyphenated wraps without a space', () => {
      expect(joinFragments('exam-', 'ple text.')).toBe('example text.');
      expect(joinFragments('well --  ', '  known')).toBe('wellknown');
    });

    it('should continue unterminated sentences after one space', () => {
      expect(joinFragments('We measured  ', '  the values')).toBe('We measured the values');
    });

    it('should refuse to join complete sentences', () => {
      expect(joinFragments('Finished.', 'Next')).toBeNull();
      expect(joinFragments('完成了。', '下一句')).toBeNull();
      expect(joinFragments('Really?  ', 'Yes')).toBeNull();
    });
  });

  it('should detect endings after trailing whitespace', () => {
    expect(endsWithHyphen('co- ')).toBe(true);
    expect(endsWithSentenceTerminal('Wow! ')).toBe(true);
    expect(endsWithSentenceTerminal('halfway,')).toBe(false);
  });

  describe('mergeFragments', () => {
    it('should merge split paragraphs transitively', () => {
      const result = mergeFragments(splitDocumentElements(), DOC_ID);

      expect(texts(result.elements)).toEqual([
        'The example text.',
        'Methods',
        'We measured the values twice.',
        'Done.',
      ]);
      expect(result.mergedCount).toBe(3);
      expect(result.elements.map(element => element.id)).toEqual([
        'doc1_elem_000001',
        'doc1_elem_000002',
        'doc1_elem_000003',
        'doc1_elem_000004',
      ]);
    });

    it('should map every old sequence onto its new position', () => {
      const { remap } = mergeFragments(splitDocumentElements(), DOC_ID);

      expect([...remap.entries()]).toEqual([
        [1, 1],
        [2, 1],
        [3, 2],
        [4, 3],
        [5, 3],
        [6, 3],
        [7, 4],
      ]);
    });

    it('should keep the first fragment provenance and recount characters', () => {
      const [first] = mergeFragments(splitDocumentElements(), DOC_ID).elements;

      expect(first?.source.page).toBe(0);
      expect(first?.metadata?.char_count).toBe(17);
    });

    it('should be idempotent', () => {
      const once = mergeFragments(splitDocumentElements(), DOC_ID);
      const twice = mergeFragments(once.elements, DOC_ID);

      expect(twice.mergedCount).toBe(0);
      expect(twice.elements).toEqual(once.elements);
    });

    it('should not merge across non-paragraph or blank elements', () => {
      const elements = [
        textElement(1, 'A list item', { type: 'list' }),
        textElement(2, 'start'),
        textElement(3, '   '),
        textElement(4, 'end.'),
      ];

      const result = mergeFragments(elements, DOC_ID);

      expect(texts(result.elements)).toEqual(['A list item', 'start', '   ', 'end.']);
      expect(result.mergedCount).toBe(0);
    });

    it('should handle an empty list', () => {
      const result = mergeFragments([], DOC_ID);
      expect(result.elements).toEqual([]);
      expect(result.remap.size).toBe(0);
    });
  });

  describe('remapRegionDivision', () => {
    it('should map boundaries and pass unknown values through', () => {
      const remap = new Map([[1, 1], [2, 1], [5, 3], [7, 4]]);
      const division = {
        head: { start_seq: 1, end_seq: 2 },
        body: { start_seq: 3, end_seq: 5 },
        tail: { start_seq: 99, end_seq: 7 },
        method: 'paired' as const,
      };

      expect(remapRegionDivision(division, remap)).toEqual({
        head: { start_seq: 1, end_seq: 1 },
        body: { start_seq: 3, end_seq: 3 },
        tail: { start_seq: 99, end_seq: 4 },
        method: 'paired',
      });
    });
  });

  describe('mergeDocument', () => {
    it('should advance the stage and remap an existing division', () => {
      const document = makeDocument(splitDocumentElements());
      document.metadata.region_division = {
        head: { start_seq: 1, end_seq: 3 },
        body: { start_seq: 4, end_seq: 6 },
        tail: { start_seq: 7, end_seq: 7 },
        method: 'fallback',
      };

      const result = mergeDocument(document);

      expect(result.mergedCount).toBe(3);
      expect(result.document.metadata.parse_stage).toBe('fragment_merged');
      expect(result.document.metadata.total_elements).toBe(4);
      expect(result.document.metadata.region_division).toEqual({
        head: { start_seq: 1, end_seq: 2 },
        body: { start_seq: 3, end_seq: 3 },
        tail: { start_seq: 4, end_seq: 4 },
        method: 'fallback',
      });
      expect(document.elements).toHaveLength(7);
    });
  });
});
