import type { ElementType } from '../schemas/document.js';

/**
 * Source type tags mapped to canonical element types.
 * Tags missing from this table fall back to `paragraph` when they carry text.
 */
export const ELEMENT_TYPE_MAP: ReadonlyMap<string, ElementType> = new Map<string, ElementType>([
  ['text', 'paragraph'],
  ['paragraph', 'paragraph'],
  ['title', 'title'],
  ['table', 'table'],
  ['image', 'image'],
  ['figure', 'image'],
  ['code', 'code'],
  ['equation', 'equation'],
  ['equation_interline', 'equation'],
  ['list', 'list'],
  ['header', 'page_header'],
  ['page_header', 'page_header'],
  ['page_footer', 'page_footer'],
  ['page_number', 'page_number'],
  ['reference', 'reference'],
]);

const PAGE_FURNITURE: ReadonlySet<ElementType> = new Set<ElementType>([
  'page_header',
  'page_footer',
  'page_number',
]);

/**
 * Normalize a source type tag.
 *
 * @param tag - Type tag as written by the conversion service
 * @param hasText - Whether the block carries any text; decides unknown tags
 * @returns Canonical type, or null for an unknown tag without text
 */
export function normalizeElementType(tag: string, hasText: boolean = false): ElementType | null {
  const mapped = ELEMENT_TYPE_MAP.get(tag.trim().toLowerCase());
  if (mapped !== undefined) {
    return mapped;
  }
  return hasText ? 'paragraph' : null;
}

export function isPageFurniture(type: ElementType): boolean {
  return PAGE_FURNITURE.has(type);
}
