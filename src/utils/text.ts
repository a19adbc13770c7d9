/**
 * Text helpers shared by every stage.
 */

import { DEFAULT_CJK_RATIO_THRESHOLD } from './constants.js';

/**
 * Collapse a loosely typed text field into one string.
 *
 * Upstream sources sometimes give `text` as a string, sometimes as a list of
 * fragments, sometimes as a number or null. Lists are joined with a single
 * space after dropping empty fragments.
 */
export function toText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === null || value === undefined) {
    return '';
  }
  if (Array.isArray(value)) {
    return value
      .map(item => toText(item).trim())
      .filter(item => item !== '')
      .join(' ');
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

export function isBlank(text: string | null | undefined): boolean {
  return text === null || text === undefined || text.trim() === '';
}

const CJK_PATTERN = /[\u4e00-\u9fff]/g;

export type DocumentLanguage = 'zh' | 'en';

/**
 * Classify text as Chinese when more than `threshold` of its characters are
 * CJK unified ideographs; everything else is treated as English.
 */
export function detectLanguage(text: string, threshold: number = DEFAULT_CJK_RATIO_THRESHOLD): DocumentLanguage {
  if (text.length === 0) {
    return 'en';
  }
  const cjkCount = text.match(CJK_PATTERN)?.length ?? 0;
  return cjkCount / text.length > threshold ? 'zh' : 'en';
}

export function countOccurrences(haystack: string, needle: string): number {
  if (needle === '') return 0;
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}
