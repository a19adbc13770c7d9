import { describe, it, expect } from 'vitest';
import { analyzeStructure, segmentDocument } from '../../src/segmentation/region-segmenter.js';
import { elementsWithTitles, makeDocument } from '../helpers/fixtures.js';

const THESIS_TITLES = {
  3: 'Contents',
  5: '1 Introduction',
  7: 'References',
  10: '1 Introduction',
  35: 'References',
};

describe('region-segmenter', () => {
  describe('segmentDocument', () => {
    it('should pair the real body past a table of contents', () => {
      const document = makeDocument(elementsWithTitles(40, THESIS_TITLES), 'fragment_merged');

      const { document: segmented } = segmentDocument(document);

      expect(segmented.metadata.region_division).toEqual({
        head: { start_seq: 1, end_seq: 9 },
        body: { start_seq: 10, end_seq: 34 },
        tail: { start_seq: 35, end_seq: 40 },
        method: 'paired',
      });
      expect(segmented.metadata.parse_stage).toBe('region_divided');
      expect(segmented.metadata.total_elements).toBe(40);
      expect(segmented.elements).toBe(document.elements);
      expect(document.metadata.region_division).toBeUndefined();
    });

    it('should fall back to page boundaries without any evidence', () => {
      const document = makeDocument(elementsWithTitles(10, {}, [0, 0, 1, 1, 2, 2, 3, 3, 4, 4]));

      const { document: segmented } = segmentDocument(document);

      expect(segmented.metadata.region_division).toEqual({
        head: { start_seq: 1, end_seq: 2 },
        body: { start_seq: 3, end_seq: 8 },
        tail: { start_seq: 9, end_seq: 10 },
        method: 'default',
      });
    });

    it('should divide an empty document without throwing', () => {
      const { document: segmented } = segmentDocument(makeDocument([]));
      expect(segmented.metadata.region_division?.body).toEqual({ start_seq: 1, end_seq: 0 });
    });
  });

  describe('analyzeStructure', () => {
    it('should expose titles, markers and the body region', () => {
      const analysis = analyzeStructure(elementsWithTitles(40, THESIS_TITLES));

      expect(analysis.titles.map(title => title.seq)).toEqual([3, 5, 7, 10, 35]);
      expect(analysis.markers).toEqual([
        { seq: 3, role: 'table_of_contents' },
        { seq: 5, role: 'body_start' },
        { seq: 7, role: 'references' },
        { seq: 10, role: 'body_start' },
        { seq: 35, role: 'references' },
      ]);
      expect(analysis.index.majorBodyStart).toEqual([5, 10]);
      expect(analysis.body).toEqual({ start_seq: 10, end_seq: 34, method: 'paired' });
    });
  });
});
