/**
 * Element fusion: the fused content stream decides identity, order and type;
 * the raw content list contributes asset paths and fallback text; the layout
 * source supplies page sizes for ratio coordinates.
 */

import { isAbsolute, resolve } from 'path';
import type { BBox, DocumentElement, ElementSource, ElementType } from '../schemas/document.js';
import type { RawPrimaryElement, RawSecondaryEntry, RawSources } from '../schemas/raw-sources.js';
import { bboxesMatch, parseBBox, resolvePageSize, type PageSize } from '../layout/bbox.js';
import { DEFAULT_BBOX_TOLERANCE, DEFAULT_PAGE_SIZE } from '../utils/constants.js';
import { assertDenseSequence, generateElementId } from '../utils/element-id.js';
import { isBlank } from '../utils/text.js';
import { buildElementBody, buildElementMetadata, isUsableElement, titleText } from './content-builders.js';
import { isPageFurniture, normalizeElementType } from './element-types.js';

export interface FusionOptions {
  docId: string;
  /** Directory holding the sources; relative asset paths resolve against it. */
  docDir: string;
  /** Centroid distance in pixels below which two boxes match. */
  tolerance?: number;
  defaultPageSize?: PageSize;
}

export interface FusionStats {
  blocks: number;
  furniture: number;
  unknownType: number;
  empty: number;
  assetsMatched: number;
}

export interface FusionResult {
  elements: DocumentElement[];
  stats: FusionStats;
  warnings: string[];
}

interface PositionedBlock {
  raw: RawPrimaryElement;
  page: number;
}

interface FusionAccumulator {
  elements: DocumentElement[];
  /** Text of the nearest preceding title, attached to following non-title elements. */
  sectionTitle: string | undefined;
  stats: FusionStats;
  unknownTags: Set<string>;
}

interface FusionContext {
  docId: string;
  docDir: string;
  tolerance: number;
  defaultPageSize: PageSize;
  sources: RawSources;
  secondaryByPage: Map<number, RawSecondaryEntry[]>;
}

export function indexSecondaryByPage(entries: readonly RawSecondaryEntry[]): Map<number, RawSecondaryEntry[]> {
  const byPage = new Map<number, RawSecondaryEntry[]>();
  for (const entry of entries) {
    if (entry.page_idx === undefined) {
      continue;
    }
    const pageEntries = byPage.get(entry.page_idx) ?? [];
    pageEntries.push(entry);
    byPage.set(entry.page_idx, pageEntries);
  }
  return byPage;
}

/**
 * First same-page candidate whose box matches `box`, optionally restricted to one canonical type.
 */
export function findSecondaryMatch(
  candidates: readonly RawSecondaryEntry[],
  box: BBox,
  pageSize: PageSize,
  tolerance: number,
  type?: ElementType
): RawSecondaryEntry | undefined {
  return candidates.find(candidate => {
    if (type !== undefined && normalizeElementType(candidate.type) !== type) {
      return false;
    }
    if (candidate.bbox.length < 4) {
      return false;
    }
    return bboxesMatch(box, parseBBox(candidate.bbox, pageSize), tolerance);
  });
}

export function toAbsoluteAssetPath(docDir: string, assetPath: string): string {
  if (assetPath === '') {
    return '';
  }
  const absolute = isAbsolute(assetPath) ? assetPath : resolve(docDir, assetPath);
  return absolute.replace(/\\/g, '/');
}

function hasAnyText(raw: RawPrimaryElement): boolean {
  return !isBlank(raw.text) || (raw.content?.paragraph_content.length ?? 0) > 0;
}

function fuseBlock(acc: FusionAccumulator, block: PositionedBlock, ctx: FusionContext): FusionAccumulator {
  const { raw, page } = block;
  acc.stats.blocks++;

  const type = normalizeElementType(raw.type, hasAnyText(raw));
  if (type === null) {
    acc.stats.unknownType++;
    acc.unknownTags.add(raw.type);
    return acc;
  }

  if (isPageFurniture(type)) {
    acc.stats.furniture++;
    return acc;
  }

  if (type === 'title') {
    const text = titleText(raw);
    acc.sectionTitle = isBlank(text) ? undefined : text;
  }

  const pageSize = resolvePageSize(ctx.sources.layout, page, ctx.defaultPageSize);
  const bbox = parseBBox(raw.bbox, pageSize);
  const candidates = ctx.secondaryByPage.get(page) ?? [];

  let imagePath: string | undefined;
  if (type === 'table' || type === 'image') {
    const match = findSecondaryMatch(candidates, bbox, pageSize, ctx.tolerance, type);
    if (match?.img_path !== undefined && match.img_path !== '') {
      imagePath = toAbsoluteAssetPath(ctx.docDir, match.img_path);
      acc.stats.assetsMatched++;
    }
  }

  let fallbackText = raw.text;
  if (isBlank(fallbackText) && type !== 'table' && type !== 'image') {
    const textCandidates = candidates.filter(candidate => !isBlank(candidate.text));
    fallbackText = findSecondaryMatch(textCandidates, bbox, pageSize, ctx.tolerance)?.text ?? '';
  }

  const body = buildElementBody(raw, type, fallbackText);
  if (!isUsableElement(body, imagePath)) {
    acc.stats.empty++;
    return acc;
  }

  const source: ElementSource = {
    file: `${ctx.docId}.pdf`,
    page,
    bbox,
  };
  if (type !== 'title' && acc.sectionTitle !== undefined) {
    source.section_title = acc.sectionTitle;
  }
  if (imagePath !== undefined) {
    source.image_path = imagePath;
  }

  const metadata = buildElementMetadata(raw, body);
  const element: DocumentElement = {
    ...body,
    id: generateElementId(ctx.docId, acc.elements.length + 1),
    source,
    ...(metadata !== undefined ? { metadata } : {}),
  };
  acc.elements.push(element);
  return acc;
}

/**
 * Fuse the raw sources of one document into an ordered, densely numbered element list.
 *
 * @param sources - Parsed raw sources
 * @param options - Document id, asset base directory and matching parameters
 * @returns Elements plus counters for what was dropped and why
 */
export function fuseElements(sources: RawSources, options: FusionOptions): FusionResult {
  const ctx: FusionContext = {
    docId: options.docId,
    docDir: options.docDir,
    tolerance: options.tolerance ?? DEFAULT_BBOX_TOLERANCE,
    defaultPageSize: options.defaultPageSize ?? DEFAULT_PAGE_SIZE,
    sources,
    secondaryByPage: indexSecondaryByPage(sources.secondary),
  };

  const blocks: PositionedBlock[] = sources.primary.flatMap((pageBlocks, page) =>
    pageBlocks === null ? [] : pageBlocks.map(raw => ({ raw, page }))
  );

  const initial: FusionAccumulator = {
    elements: [],
    sectionTitle: undefined,
    stats: { blocks: 0, furniture: 0, unknownType: 0, empty: 0, assetsMatched: 0 },
    unknownTags: new Set<string>(),
  };

  const result = blocks.reduce((acc, block) => fuseBlock(acc, block, ctx), initial);
  assertDenseSequence(result.elements, options.docId);

  const warnings: string[] = [];
  if (result.unknownTags.size > 0) {
    warnings.push(
      `Skipped ${result.stats.unknownType} block(s) with unknown type: ${[...result.unknownTags].sort().join(', ')}`
    );
  }

  return { elements: result.elements, stats: result.stats, warnings };
}
