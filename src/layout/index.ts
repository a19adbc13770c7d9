/**
 * Geometry utilities for fusing sources by position.
 */

export {
  parseBBox,
  centroid,
  centroidDistance,
  bboxesMatch,
  resolvePageSize,
} from './bbox.js';

export type { PageSize, Point } from './bbox.js';
