/**
 * Bounding-box geometry for cross-source matching.
 * Boxes are integer pixel rectangles with the origin at the top-left of the page.
 */
import type { BBox } from '../schemas/document.js';
import type { LayoutSource } from '../schemas/raw-sources.js';
import { DEFAULT_BBOX_TOLERANCE } from '../utils/constants.js';

/** Page dimensions in pixels: [width, height]. */
export type PageSize = readonly [number, number];

export interface Point {
  x: number;
  y: number;
}

const ZERO_BBOX: BBox = { x1: 0, y1: 0, x2: 0, y2: 0 };

/**
 * Convert a raw `[x1, y1, x2, y2]` list into a pixel box.
 * Coordinates that all lie in [0, 1] are treated as page ratios and scaled
 * by the page size when one is known. Values are truncated to integers.
 *
 * @param raw - Coordinate list from a source file
 * @param pageSize - Page dimensions used to scale ratio coordinates
 * @returns Pixel box, or the zero box when fewer than four coordinates are given
 */
export function parseBBox(raw: readonly number[], pageSize?: PageSize): BBox {
  const [x1, y1, x2, y2] = raw;
  if (x1 === undefined || y1 === undefined || x2 === undefined || y2 === undefined) {
    return { ...ZERO_BBOX };
  }

  const isNormalized = [x1, y1, x2, y2].every(v => v >= 0 && v <= 1);
  if (isNormalized && pageSize !== undefined) {
    const [width, height] = pageSize;
    return {
      x1: Math.trunc(x1 * width),
      y1: Math.trunc(y1 * height),
      x2: Math.trunc(x2 * width),
      y2: Math.trunc(y2 * height),
    };
  }

  return {
    x1: Math.trunc(x1),
    y1: Math.trunc(y1),
    x2: Math.trunc(x2),
    y2: Math.trunc(y2),
  };
}

export function centroid(box: BBox): Point {
  return {
    x: (box.x1 + box.x2) / 2,
    y: (box.y1 + box.y2) / 2,
  };
}

export function centroidDistance(a: BBox, b: BBox): number {
  const ca = centroid(a);
  const cb = centroid(b);
  return Math.hypot(ca.x - cb.x, ca.y - cb.y);
}

/**
 * Two boxes describe the same block when their centroids are strictly closer than `tolerance`.
 */
export function bboxesMatch(a: BBox, b: BBox, tolerance: number = DEFAULT_BBOX_TOLERANCE): boolean {
  return centroidDistance(a, b) < tolerance;
}

/**
 * Page size for a page index: that page's own entry in the layout source,
 * else the first page's size, else `fallback`. Entries are looked up by
 * position only when none of them carries a `page_idx`.
 */
export function resolvePageSize(layout: LayoutSource, pageIndex: number, fallback: PageSize): PageSize {
  const pages = layout.pdf_info;
  const indexed = pages.some(page => page.page_idx !== undefined);
  const own = indexed ? pages.find(page => page.page_idx === pageIndex) : pages[pageIndex];
  if (own?.page_size !== undefined) {
    return [own.page_size[0], own.page_size[1]];
  }

  const first = pages.find(page => page.page_size !== undefined);
  if (first?.page_size !== undefined) {
    return [first.page_size[0], first.page_size[1]];
  }

  return fallback;
}
