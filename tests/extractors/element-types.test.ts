import { describe, it, expect } from 'vitest';
import { isPageFurniture, normalizeElementType } from '../../src/extractors/element-types.js';

describe('normalizeElementType', () => {
  it('should map known tags', () => {
    expect(normalizeElementType('text')).toBe('paragraph');
    expect(normalizeElementType('figure')).toBe('image');
    expect(normalizeElementType('equation_interline')).toBe('equation');
    expect(normalizeElementType('header')).toBe('page_header');
    expect(normalizeElementType('reference')).toBe('reference');
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(normalizeElementType('  Title ')).toBe('title');
    expect(normalizeElementType('TABLE')).toBe('table');
  });

  it('should turn unknown tags with text into paragraphs', () => {
    expect(normalizeElementType('aside', true)).toBe('paragraph');
  });

  it('should return null for unknown tags without text', () => {
    expect(normalizeElementType('aside')).toBeNull();
    expect(normalizeElementType('constructor')).toBeNull();
  });
});

describe('isPageFurniture', () => {
  it('should flag headers, footers and page numbers only', () => {
    expect(isPageFurniture('page_header')).toBe(true);
    expect(isPageFurniture('page_footer')).toBe(true);
    expect(isPageFurniture('page_number')).toBe(true);
    expect(isPageFurniture('paragraph')).toBe(false);
    expect(isPageFurniture('reference')).toBe(false);
  });
});
