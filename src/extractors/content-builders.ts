/**
 * Per-type content payloads and derived metadata for fused elements.
 */

import type { DocumentElement, ElementMetadata, ElementType } from '../schemas/document.js';
import type { InlineSpan, RawContent, RawPrimaryElement } from '../schemas/raw-sources.js';
import { countOccurrences, isBlank } from '../utils/text.js';

type DistributivePick<T, K extends keyof T> = T extends unknown ? Pick<T, K> : never;

/** The typed part of an element: its `type` tag and matching `content`. */
export type ElementBody = DistributivePick<DocumentElement, 'type' | 'content'>;

const DEFAULT_TABLE_TYPE = 'simple_table';
const DEFAULT_EQUATION_FORMAT = 'latex';

function joinSpans(spans: readonly InlineSpan[]): string {
  return spans.map(span => span.content).join('');
}

/**
 * Paragraph spans: plain text kept as-is, inline equations wrapped in `$…$`.
 * Other span kinds carry no readable text and are dropped.
 */
export function paragraphText(content: RawContent): string {
  const parts: string[] = [];
  for (const span of content.paragraph_content) {
    if (span.type === 'text') {
      parts.push(span.content);
    } else if (span.type === 'equation_inline') {
      parts.push(`$${span.content}$`);
    }
  }
  return parts.join('');
}

export function titleText(raw: RawPrimaryElement): string {
  const fromSpans = raw.content !== undefined ? joinSpans(raw.content.title_content) : '';
  return fromSpans !== '' ? fromSpans : raw.text;
}

function listText(content: RawContent): string {
  return content.list_items
    .map(item => joinSpans(item.item_content))
    .filter(item => !isBlank(item))
    .join('\n');
}

function furnitureText(content: RawContent, type: ElementType): string {
  switch (type) {
    case 'page_header':
      return joinSpans(content.page_header_content);
    case 'page_footer':
      return joinSpans(content.page_footer_content);
    case 'page_number':
      return joinSpans(content.page_number_content);
    default:
      return '';
  }
}

function nonEmptyCaptions(captions: readonly string[]): string[] {
  return captions.filter(caption => !isBlank(caption));
}

/**
 * Heading level as a positive integer; anything unusable becomes 1.
 */
export function normalizeLevel(level: unknown): number {
  const numeric = typeof level === 'number' ? level : typeof level === 'string' ? Number.parseFloat(level) : NaN;
  if (!Number.isFinite(numeric)) {
    return 1;
  }
  const truncated = Math.trunc(numeric);
  return truncated >= 1 ? truncated : 1;
}

export function tableHtml(raw: RawPrimaryElement): string {
  const content = raw.content;
  if (content !== undefined && content.html !== '') {
    return content.html;
  }
  if (content !== undefined && content.table_body !== '') {
    return content.table_body;
  }
  return raw.table_body;
}

function codeBody(raw: RawPrimaryElement): { text: string; language: string } {
  const content = raw.content;
  if (content !== undefined && content.code_content !== '') {
    return { text: content.code_content, language: content.code_language ?? '' };
  }
  return { text: raw.code, language: raw.code_language ?? '' };
}

function equationBody(raw: RawPrimaryElement, fallbackText: string): { text: string; format: string } {
  const content = raw.content;
  const text = content !== undefined && content.math_content !== '' ? `$$ ${content.math_content} $$` : fallbackText;
  const format = raw.text_format ?? content?.math_type ?? DEFAULT_EQUATION_FORMAT;
  return { text, format };
}

function orFallback(text: string, fallbackText: string): string {
  return text !== '' ? text : fallbackText;
}

/**
 * Build the typed content payload of one fused element.
 *
 * @param raw - Block from the fused content stream
 * @param type - Canonical element type
 * @param fallbackText - Raw text used when the structured fields are empty
 */
export function buildElementBody(raw: RawPrimaryElement, type: ElementType, fallbackText: string = raw.text): ElementBody {
  const content = raw.content;

  switch (type) {
    case 'paragraph':
      return {
        type,
        content: { text: orFallback(content !== undefined ? paragraphText(content) : '', fallbackText) },
      };

    case 'list':
      return {
        type,
        content: { text: orFallback(content !== undefined ? listText(content) : '', fallbackText) },
      };

    case 'title':
      return {
        type,
        content: {
          text: orFallback(titleText(raw), fallbackText),
          level: normalizeLevel(content?.level),
        },
      };

    case 'table':
      return {
        type,
        content: {
          html: tableHtml(raw),
          captions: nonEmptyCaptions(content?.table_caption ?? []),
          description: '',
        },
      };

    case 'image':
      return {
        type,
        content: {
          captions: nonEmptyCaptions(content?.image_caption ?? []),
          description: '',
        },
      };

    case 'code': {
      const code = codeBody(raw);
      return {
        type,
        content: { text: code.text, language: code.language, description: '' },
      };
    }

    case 'equation': {
      const equation = equationBody(raw, fallbackText);
      return {
        type,
        content: { text: equation.text, format: equation.format, description: '' },
      };
    }

    default:
      return {
        type,
        content: { text: orFallback(content !== undefined ? furnitureText(content, type) : '', fallbackText) },
      };
  }
}

/**
 * Estimate table dimensions from the HTML body.
 * The first `<tr>` is taken as the header row; cells are counted by `</td>`.
 */
export function estimateTableShape(html: string): { rowCount: number; colCount: number } {
  const rowCount = countOccurrences(html, '<tr>') - 1;
  let colCount = countOccurrences(html, '</td>');
  if (rowCount > 0) {
    colCount = Math.floor(colCount / (rowCount + 1));
  }
  return { rowCount: Math.max(1, rowCount), colCount: Math.max(1, colCount) };
}

function charCount(text: string): number {
  return [...text].length;
}

/**
 * Derived metadata for a built element. Returns undefined when nothing applies.
 */
export function buildElementMetadata(raw: RawPrimaryElement, body: ElementBody): ElementMetadata | undefined {
  const metadata: ElementMetadata = {};

  switch (body.type) {
    case 'table': {
      if (raw.content !== undefined) {
        metadata.table_type = raw.content.table_type ?? DEFAULT_TABLE_TYPE;
      }
      if (body.content.html !== '') {
        const shape = estimateTableShape(body.content.html);
        metadata.row_count = shape.rowCount;
        metadata.col_count = shape.colCount;
      }
      break;
    }

    case 'code':
      if (body.content.text !== '') {
        metadata.line_count = countOccurrences(body.content.text, '\n') + 1;
      }
      if (body.content.language !== '') {
        metadata.language = body.content.language;
      }
      break;

    case 'equation':
      metadata.format = body.content.format;
      break;

    case 'paragraph':
    case 'title':
    case 'list':
      if (body.content.text !== '') {
        metadata.char_count = charCount(body.content.text);
      }
      break;

    default:
      break;
  }

  return Object.keys(metadata).length > 0 ? metadata : undefined;
}

/**
 * Whether an element carries anything worth keeping.
 * Tables and images may stand on an asset path or caption alone.
 */
export function isUsableElement(body: ElementBody, imagePath?: string): boolean {
  const hasAsset = imagePath !== undefined && imagePath !== '';

  switch (body.type) {
    case 'table':
      return !isBlank(body.content.html) || body.content.captions.length > 0 || hasAsset;
    case 'image':
      return body.content.captions.length > 0 || hasAsset;
    default:
      return !isBlank(body.content.text);
  }
}
