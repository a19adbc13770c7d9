import type { DocumentElement, ElementSource, ParsedDocument, TextElementType } from '../../src/schemas/document.js';
import {
  LayoutSourceSchema,
  ModelSourceSchema,
  PrimarySourceSchema,
  SecondarySourceSchema,
  type RawSources,
} from '../../src/schemas/raw-sources.js';
import { STAGE_LAYOUT_JSON_PARSED } from '../../src/utils/constants.js';
import { generateElementId } from '../../src/utils/element-id.js';

export const DOC_ID = 'doc1';

function sourceFor(page: number, extra: Partial<ElementSource> = {}): ElementSource {
  return {
    file: `${DOC_ID}.pdf`,
    page,
    bbox: { x1: 10, y1: 10, x2: 100, y2: 40 },
    ...extra,
  };
}

export function textElement(
  seq: number,
  text: string,
  options: { page?: number; type?: TextElementType; sectionTitle?: string } = {}
): DocumentElement {
  const source = sourceFor(
    options.page ?? 0,
    options.sectionTitle !== undefined ? { section_title: options.sectionTitle } : {}
  );
  return {
    id: generateElementId(DOC_ID, seq),
    type: options.type ?? 'paragraph',
    content: { text },
    source,
    metadata: { char_count: [...text].length },
  };
}

export function titleElement(seq: number, text: string, options: { page?: number; level?: number } = {}): DocumentElement {
  return {
    id: generateElementId(DOC_ID, seq),
    type: 'title',
    content: { text, level: options.level ?? 1 },
    source: sourceFor(options.page ?? 0),
  };
}

export function tableElement(seq: number, html: string, page = 0): DocumentElement {
  return {
    id: generateElementId(DOC_ID, seq),
    type: 'table',
    content: { html, captions: [], description: '' },
    source: sourceFor(page),
  };
}

/**
 * Paragraphs `filler 1..n`, with titles placed at the given 1-based positions.
 */
export function elementsWithTitles(total: number, titles: Record<number, string>, pages?: readonly number[]): DocumentElement[] {
  const elements: DocumentElement[] = [];
  for (let seq = 1; seq <= total; seq++) {
    const page = pages?.[seq - 1] ?? 0;
    const title = titles[seq];
    elements.push(title !== undefined ? titleElement(seq, title, { page }) : textElement(seq, `filler ${seq}.`, { page }));
  }
  return elements;
}

export function makeDocument(elements: DocumentElement[], stage: string = STAGE_LAYOUT_JSON_PARSED): ParsedDocument {
  return {
    metadata: {
      doc_id: DOC_ID,
      doc_title: 'Test Document',
      parse_stage: stage,
      language: 'en',
      source_file: `${DOC_ID}.pdf`,
      total_pages: 1,
      total_elements: elements.length,
    },
    elements,
  };
}

/**
 * Raw sources as the loader would produce them from JSON values.
 */
export function rawSources(
  primary: unknown[],
  options: { secondary?: unknown[]; layout?: unknown; model?: unknown[]; uuid?: string | null } = {}
): RawSources {
  return {
    primary: PrimarySourceSchema.parse(primary),
    secondary: SecondarySourceSchema.parse(options.secondary ?? []),
    model: ModelSourceSchema.parse(options.model ?? []),
    layout: LayoutSourceSchema.parse(options.layout ?? { pdf_info: [] }),
    uuid: options.uuid ?? null,
    warnings: [],
  };
}

export function paragraphBlock(text: string, bbox: number[] = [10, 10, 100, 40]): Record<string, unknown> {
  return {
    type: 'paragraph',
    bbox,
    content: { paragraph_content: [{ type: 'text', content: text }] },
  };
}

export function titleBlock(text: string, level = 1, bbox: number[] = [10, 10, 100, 40]): Record<string, unknown> {
  return {
    type: 'title',
    bbox,
    content: { title_content: [{ type: 'text', content: text }], level },
  };
}
