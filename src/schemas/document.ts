import { z } from 'zod';
import { toText } from '../utils/text.js';

/** Text fields written by other tools may be lists or null; they are read back as one string. */
const TextFieldSchema = z.unknown().transform(toText);

export const ElementTypeSchema = z.enum([
  'paragraph',
  'title',
  'table',
  'image',
  'code',
  'equation',
  'list',
  'page_header',
  'page_footer',
  'page_number',
  'reference',
]);
export type ElementType = z.infer<typeof ElementTypeSchema>;

export const TextElementTypeSchema = z.enum([
  'paragraph',
  'list',
  'reference',
  'page_header',
  'page_footer',
  'page_number',
]);
export type TextElementType = z.infer<typeof TextElementTypeSchema>;

export const BBoxSchema = z.object({
  x1: z.number().int(),
  y1: z.number().int(),
  x2: z.number().int(),
  y2: z.number().int(),
});
export type BBox = z.infer<typeof BBoxSchema>;

export const ElementSourceSchema = z.object({
  file: z.string(),
  page: z.number().int().nonnegative(),
  bbox: BBoxSchema,
  section_title: z.string().optional(),
  image_path: z.string().optional(),
});
export type ElementSource = z.infer<typeof ElementSourceSchema>;

export const ElementMetadataSchema = z.object({
  char_count: z.number().int().nonnegative().optional(),
  table_type: z.string().optional(),
  row_count: z.number().int().positive().optional(),
  col_count: z.number().int().positive().optional(),
  line_count: z.number().int().positive().optional(),
  language: z.string().optional(),
  format: z.string().optional(),
});
export type ElementMetadata = z.infer<typeof ElementMetadataSchema>;

export const TextContentSchema = z.object({
  text: TextFieldSchema,
});
export type TextContent = z.infer<typeof TextContentSchema>;

export const TitleContentSchema = z.object({
  text: TextFieldSchema,
  level: z.coerce.number().int().min(1).catch(1),
});
export type TitleContent = z.infer<typeof TitleContentSchema>;

export const TableContentSchema = z.object({
  html: TextFieldSchema,
  captions: z.array(z.string()).default([]),
  description: z.string().default(''),
});
export type TableContent = z.infer<typeof TableContentSchema>;

export const ImageContentSchema = z.object({
  captions: z.array(z.string()).default([]),
  description: z.string().default(''),
});
export type ImageContent = z.infer<typeof ImageContentSchema>;

export const CodeContentSchema = z.object({
  text: TextFieldSchema,
  language: z.string().default(''),
  description: z.string().default(''),
});
export type CodeContent = z.infer<typeof CodeContentSchema>;

export const EquationContentSchema = z.object({
  text: TextFieldSchema,
  format: z.string().default('latex'),
  description: z.string().default(''),
});
export type EquationContent = z.infer<typeof EquationContentSchema>;

const elementBase = {
  id: z.string().min(1),
  source: ElementSourceSchema,
  metadata: ElementMetadataSchema.optional(),
};

export const TextElementSchema = z.object({
  ...elementBase,
  type: TextElementTypeSchema,
  content: TextContentSchema,
});

export const TitleElementSchema = z.object({
  ...elementBase,
  type: z.literal('title'),
  content: TitleContentSchema,
});

export const TableElementSchema = z.object({
  ...elementBase,
  type: z.literal('table'),
  content: TableContentSchema,
});

export const ImageElementSchema = z.object({
  ...elementBase,
  type: z.literal('image'),
  content: ImageContentSchema,
});

export const CodeElementSchema = z.object({
  ...elementBase,
  type: z.literal('code'),
  content: CodeContentSchema,
});

export const EquationElementSchema = z.object({
  ...elementBase,
  type: z.literal('equation'),
  content: EquationContentSchema,
});

export const DocumentElementSchema = z.discriminatedUnion('type', [
  TextElementSchema,
  TitleElementSchema,
  TableElementSchema,
  ImageElementSchema,
  CodeElementSchema,
  EquationElementSchema,
]);
export type DocumentElement = z.infer<typeof DocumentElementSchema>;
export type ElementContent = DocumentElement['content'];

export const SeqRangeSchema = z.object({
  start_seq: z.number().int(),
  end_seq: z.number().int(),
});
export type SeqRange = z.infer<typeof SeqRangeSchema>;

export const BodyRegionMethodSchema = z.enum(['paired', 'fallback', 'title_span', 'default']);
export type BodyRegionMethod = z.infer<typeof BodyRegionMethodSchema>;

export const RegionDivisionSchema = z.object({
  head: SeqRangeSchema,
  body: SeqRangeSchema,
  tail: SeqRangeSchema,
  method: BodyRegionMethodSchema.optional(),
});
export type RegionDivision = z.infer<typeof RegionDivisionSchema>;

export const LanguageSchema = z.enum(['zh', 'en']);

export const LocalizedAbstractSchema = z.object({
  language: z.string(),
  text: z.string(),
});
export type LocalizedAbstract = z.infer<typeof LocalizedAbstractSchema>;

export const AbstractSchema = z.union([z.string(), z.array(LocalizedAbstractSchema)]);
export type Abstract = z.infer<typeof AbstractSchema>;

export const DocumentMetadataSchema = z
  .object({
    doc_id: z.string().min(1),
    doc_title: z.string(),
    parse_stage: z.string(),
    language: LanguageSchema.catch('en'),
    source_file: z.string(),
    total_pages: z.number().int().nonnegative(),
    total_elements: z.number().int().nonnegative(),
    abstract: AbstractSchema.optional(),
    region_division: RegionDivisionSchema.optional(),
    warnings: z.array(z.string()).optional(),
  })
  .passthrough();
export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>;

export const ParsedDocumentSchema = z
  .object({
    metadata: DocumentMetadataSchema,
    elements: z.array(DocumentElementSchema),
  })
  .passthrough();
export type ParsedDocument = z.infer<typeof ParsedDocumentSchema>;
