/**
 * Section-marker predicates.
 *
 * Each predicate answers one question about a heading or the leading label of
 * a block. They share thresholds through `SegmentationOptions` so corpora with
 * different table-of-contents conventions can be tuned without code changes.
 */

export type SectionRole = 'references' | 'table_of_contents' | 'tail_start' | 'front_matter' | 'body_start';

export interface SegmentationOptions {
  /** A line shorter than this with an ellipsis and a trailing page number is a TOC row. */
  tocRowMaxLength: number;
  /** Leading labels are cut to this many characters. */
  leadingLabelMaxLength: number;
  /** "1 绪论：" style lines shorter than this are TOC rows. */
  chineseTocRowMaxLength: number;
  majorBodyStartMaxLength: number;
  /** "1 引言" / "1 概述" count as a first chapter only below this length. */
  introOverviewMaxLength: number;
  chineseChapterMaxLength: number;
  numberedLineMaxLength: number;
}

export const DEFAULT_SEGMENTATION_OPTIONS: Readonly<SegmentationOptions> = {
  tocRowMaxLength: 50,
  leadingLabelMaxLength: 100,
  chineseTocRowMaxLength: 20,
  majorBodyStartMaxLength: 40,
  introOverviewMaxLength: 15,
  chineseChapterMaxLength: 30,
  numberedLineMaxLength: 80,
};

const REFERENCES_ZH = ['参考文献', '參考文獻', '引用文献', '参考资料'];
const REFERENCES_EN = ['references', 'bibliography', 'works cited', 'references and notes'];

const TOC_ZH = ['目录', '目次'];
const TOC_EN = ['contents', 'table of contents'];

const TAIL_START_ZH = ['附录', '致谢', '鸣谢'];
const TAIL_START_EN = ['appendix', 'appendices', 'acknowledgement', 'acknowledgements', 'acknowledgments', 'acknowledgement(s)'];

const FRONT_MATTER_ZH = ['摘要', 'abstract', '关键词', '摘要与关键词'];
const FRONT_MATTER_EN = ['abstract', 'keywords', 'key words'];

const INTRODUCTION_EN = /^\s*1\s*[.．]?\s*introduction\s*$/i;
const INTRODUCTION_STANDALONE = /^\s*introduction\s*$/i;
const CHAPTER_ONE = /^\s*(chapter|part)\s+[i1]\s*$/i;
const INTRODUCTION_ZH = /^1\s*[.．]?\s*绪论\s*[：:]?\s*$/;
const CHINESE_ENUMERATOR = /^[一二三1Ⅰ]\s*[、．.]?\s*/;
const CHINESE_FIRST_CHAPTER = /^第\s*[一1]\s*[章部篇]/;
const NUMBERED_LINE = /^\s*1\s*[.．]\s*\S+/;

const ELLIPSES = ['…', '...'];
const TRAILING_DIGIT = /\d\s*$/;
const TRAILING_COLON = /[：:]\s*$/;

/** Chinese normalization: drop ASCII and ideographic spaces. */
export function normalizeZh(text: string): string {
  return text.replace(/[ \u3000]/g, '').trim();
}

export function normalizeEn(text: string): string {
  return text.toLowerCase().trim();
}

function hasEllipsis(text: string): boolean {
  return ELLIPSES.some(ellipsis => text.includes(ellipsis));
}

/**
 * A table-of-contents row such as "References ……… 22": an ellipsis, a trailing
 * page number and a short overall length.
 */
export function looksLikeTocRow(text: string, options: SegmentationOptions = DEFAULT_SEGMENTATION_OPTIONS): boolean {
  const t = text.trim();
  return hasEllipsis(t) && t.length < options.tocRowMaxLength && TRAILING_DIGIT.test(t);
}

export function isReferencesHeading(text: string, options: SegmentationOptions = DEFAULT_SEGMENTATION_OPTIONS): boolean {
  if (text.trim() === '' || looksLikeTocRow(text, options)) {
    return false;
  }
  const zh = normalizeZh(text);
  if (REFERENCES_ZH.some(keyword => zh.includes(keyword))) {
    return true;
  }
  const en = normalizeEn(text);
  return REFERENCES_EN.some(
    keyword => en === keyword || (en.length <= keyword.length + 2 && en.includes(keyword)) || en.startsWith(keyword)
  );
}

/** Loose test used on title elements. */
export function isTocHeading(text: string): boolean {
  if (text.trim() === '') {
    return false;
  }
  const zh = normalizeZh(text);
  if (TOC_ZH.some(keyword => zh.includes(keyword))) {
    return true;
  }
  const en = normalizeEn(text);
  return TOC_EN.some(keyword => en.includes(keyword));
}

/**
 * Strict test used on leading labels. Chinese labels must be short and
 * English ones must spell out "contents", so a paragraph opening with
 * "Content analysis…" is not taken for a TOC.
 */
export function isTocSectionHeader(text: string): boolean {
  if (text.trim() === '') {
    return false;
  }
  const zh = normalizeZh(text);
  if (TOC_ZH.some(keyword => zh === keyword || (zh.startsWith(keyword) && zh.length <= 10))) {
    return true;
  }
  const en = normalizeEn(text);
  return TOC_EN.some(keyword => en === keyword || en.startsWith(keyword) || (en.length <= 20 && en.includes(keyword)));
}

export function isTailStartHeading(text: string, options: SegmentationOptions = DEFAULT_SEGMENTATION_OPTIONS): boolean {
  if (text.trim() === '' || looksLikeTocRow(text, options)) {
    return false;
  }
  const zh = normalizeZh(text);
  if (TAIL_START_ZH.some(keyword => zh.includes(keyword))) {
    return true;
  }
  const en = normalizeEn(text);
  return TAIL_START_EN.some(keyword => en === keyword || (en.length <= keyword.length + 3 && en.includes(keyword)));
}

export function isFrontMatterHeading(text: string): boolean {
  if (text.trim() === '') {
    return false;
  }
  const zh = normalizeZh(text);
  if (FRONT_MATTER_ZH.includes(zh) || zh.startsWith('摘要')) {
    return true;
  }
  const en = normalizeEn(text);
  return FRONT_MATTER_EN.includes(en) || en.startsWith('abstract');
}

/**
 * Shared exclusions for body-start candidates: TOC-row punctuation, trailing
 * page numbers or colons, and headings that belong to another role.
 */
function isExcludedBodyStart(t: string, options: SegmentationOptions): boolean {
  if (hasEllipsis(t) || TRAILING_COLON.test(t) || TRAILING_DIGIT.test(t)) {
    return true;
  }
  if (t.includes('绪论') && (t.includes('：') || t.includes(':')) && t.length < options.chineseTocRowMaxLength) {
    return true;
  }
  return isFrontMatterHeading(t) || isTocHeading(t) || isReferencesHeading(t, options);
}

function isChineseIntroduction(t: string): boolean {
  if (INTRODUCTION_ZH.test(t)) {
    return true;
  }
  const zh = normalizeZh(t);
  return zh.length >= 2 && zh.startsWith('1') && zh.includes('绪论');
}

function mentionsIntroOrOverview(zh: string): boolean {
  return zh.startsWith('1') && (zh.includes('引言') || zh.includes('概述'));
}

/**
 * First-chapter headings only ("1 Introduction", "Chapter 1", "1 绪论").
 * These open a bracket in the pairing algorithm.
 */
export function isMajorBodyStart(text: string, options: SegmentationOptions = DEFAULT_SEGMENTATION_OPTIONS): boolean {
  const t = text.trim();
  if (t === '') {
    return false;
  }
  // checked before the trailing-digit exclusion, which would otherwise reject it
  if (CHAPTER_ONE.test(t)) {
    return true;
  }
  if (t.length > options.majorBodyStartMaxLength || isExcludedBodyStart(t, options)) {
    return false;
  }
  if (INTRODUCTION_EN.test(t) || INTRODUCTION_STANDALONE.test(t)) {
    return true;
  }
  if (isChineseIntroduction(t)) {
    return true;
  }
  const zh = normalizeZh(t);
  return mentionsIntroOrOverview(zh) && zh.length < options.introOverviewMaxLength;
}

/**
 * Any chapter-like heading. Only used to pick a fallback body start.
 */
export function isMinorBodyStart(text: string, options: SegmentationOptions = DEFAULT_SEGMENTATION_OPTIONS): boolean {
  const t = text.trim();
  if (t === '') {
    return false;
  }
  if (CHAPTER_ONE.test(t)) {
    return true;
  }
  if (isExcludedBodyStart(t, options)) {
    return false;
  }
  if (INTRODUCTION_EN.test(t) || INTRODUCTION_STANDALONE.test(t) || isChineseIntroduction(t)) {
    return true;
  }
  if (mentionsIntroOrOverview(normalizeZh(t))) {
    return true;
  }
  if ((CHINESE_FIRST_CHAPTER.test(t) || CHINESE_ENUMERATOR.test(t)) && t.length <= options.chineseChapterMaxLength) {
    return true;
  }
  return NUMBERED_LINE.test(t) && t.length <= options.numberedLineMaxLength;
}

/**
 * The label a block opens with: its first line, cut to `leadingLabelMaxLength`
 * characters, without trailing colons.
 */
export function leadingSectionLabel(text: string, options: SegmentationOptions = DEFAULT_SEGMENTATION_OPTIONS): string {
  const trimmed = text.trim();
  if (trimmed === '') {
    return '';
  }
  const firstLine = (trimmed.split('\n')[0] ?? '').trim();
  const label = firstLine.length > options.leadingLabelMaxLength
    ? firstLine.slice(0, options.leadingLabelMaxLength).trim()
    : firstLine;
  return label.replace(/[：:]+$/, '').trim();
}

export interface LeadingLabelClassifier {
  role: SectionRole;
  test: (label: string, options: SegmentationOptions) => boolean;
}

/** Tried in order; the first classifier that accepts a label assigns its role. */
export const LEADING_LABEL_CLASSIFIERS: readonly LeadingLabelClassifier[] = [
  { role: 'references', test: isReferencesHeading },
  { role: 'table_of_contents', test: label => isTocSectionHeader(label) },
  { role: 'tail_start', test: isTailStartHeading },
  { role: 'front_matter', test: label => isFrontMatterHeading(label) },
  { role: 'body_start', test: isMinorBodyStart },
];

export function classifyLeadingLabel(
  label: string,
  options: SegmentationOptions = DEFAULT_SEGMENTATION_OPTIONS
): SectionRole | null {
  if (label === '') {
    return null;
  }
  const classifier = LEADING_LABEL_CLASSIFIERS.find(candidate => candidate.test(label, options));
  return classifier?.role ?? null;
}
