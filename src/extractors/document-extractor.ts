import { basename, resolve } from 'path';
import type { DocumentMetadata, ParsedDocument } from '../schemas/document.js';
import type { RawSources } from '../schemas/raw-sources.js';
import type { PageSize } from '../layout/bbox.js';
import { STAGE_LAYOUT_JSON_PARSED } from '../utils/constants.js';
import { logger } from '../utils/logger.js';
import { detectLanguage, isBlank, type DocumentLanguage } from '../utils/text.js';
import { extractAbstract } from './abstract.js';
import { fuseElements, type FusionStats } from './element-fusion.js';
import { loadRawSources } from './source-loader.js';

export interface ExtractOptions {
  /** Defaults to the document directory's name. */
  docId?: string;
  tolerance?: number;
  defaultPageSize?: PageSize;
  cjkRatioThreshold?: number;
}

export interface ExtractionResult {
  document: ParsedDocument;
  stats: FusionStats;
}

/**
 * Language of the first paragraph that has text; English when there is none.
 */
export function detectDocumentLanguage(document: Pick<ParsedDocument, 'elements'>, threshold?: number): DocumentLanguage {
  for (const element of document.elements) {
    if (element.type === 'paragraph' && !isBlank(element.content.text)) {
      return detectLanguage(element.content.text, threshold);
    }
  }
  return 'en';
}

/**
 * Assemble the canonical document from already loaded sources.
 */
export function buildDocument(sources: RawSources, docId: string, docDir: string, options: ExtractOptions = {}): ExtractionResult {
  const fusion = fuseElements(sources, {
    docId,
    docDir,
    tolerance: options.tolerance,
    defaultPageSize: options.defaultPageSize,
  });

  const language = detectDocumentLanguage(fusion, options.cjkRatioThreshold);
  const warnings = [...sources.warnings, ...fusion.warnings];

  const metadata: DocumentMetadata = {
    doc_id: docId,
    doc_title: docId,
    parse_stage: STAGE_LAYOUT_JSON_PARSED,
    language,
    source_file: `${docId}.pdf`,
    total_pages: sources.primary.length,
    total_elements: fusion.elements.length,
  };

  const abstract = extractAbstract(fusion.elements);
  if (abstract !== undefined) {
    metadata.abstract = abstract;
  }
  if (warnings.length > 0) {
    metadata.warnings = warnings;
  }

  return {
    document: { metadata, elements: fusion.elements },
    stats: fusion.stats,
  };
}

/**
 * Load, fuse and describe one document directory.
 *
 * @param docDir - Directory holding the four raw sources
 * @param options - Matching parameters and an optional explicit document id
 */
export async function extractDocument(docDir: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
  const absoluteDir = resolve(docDir);
  const docId = options.docId ?? basename(absoluteDir);

  const sources = await loadRawSources(absoluteDir);
  const result = buildDocument(sources, docId, absoluteDir, options);

  logger.info(
    {
      docId,
      pages: result.document.metadata.total_pages,
      elements: result.document.metadata.total_elements,
      language: result.document.metadata.language,
    },
    'Element extraction complete'
  );

  return result;
}
