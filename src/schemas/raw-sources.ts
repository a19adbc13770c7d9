import { z } from 'zod';
import { toText } from '../utils/text.js';

/**
 * Schemas for the four JSON files the conversion service writes per document.
 * Every field is lenient: unexpected shapes collapse to empty values so that
 * one odd block never rejects a whole page.
 */

const TextFieldSchema = z.unknown().transform(toText);
const OptionalStringSchema = z.string().optional().catch(undefined);
const NumberListSchema = z.array(z.number()).catch([]);

/**
 * Keep the items of an array that satisfy `item`, dropping the rest.
 * A non-array value yields an empty list.
 */
export function collectValid<T extends z.ZodTypeAny>(item: T, values: unknown): z.output<T>[] {
  if (!Array.isArray(values)) {
    return [];
  }
  const valid: z.output<T>[] = [];
  for (const value of values) {
    const parsed = item.safeParse(value);
    if (parsed.success) {
      valid.push(parsed.data);
    }
  }
  return valid;
}

function lenientArray<T extends z.ZodTypeAny>(item: T) {
  return z.unknown().transform(values => collectValid(item, values));
}

export const InlineSpanSchema = z.object({
  type: z.string().catch(''),
  content: TextFieldSchema,
});
export type InlineSpan = z.infer<typeof InlineSpanSchema>;

/** Captions arrive either as plain strings or as `{ content }` objects. */
export const CaptionSchema = z.union([
  z.string(),
  z.object({ content: TextFieldSchema }).transform(caption => caption.content),
]);

export const ListItemSchema = z.object({
  item_content: lenientArray(InlineSpanSchema),
});
export type ListItem = z.infer<typeof ListItemSchema>;

export const RawContentSchema = z.object({
  paragraph_content: lenientArray(InlineSpanSchema),
  title_content: lenientArray(InlineSpanSchema),
  level: z.unknown(),
  list_items: lenientArray(ListItemSchema),
  html: TextFieldSchema,
  table_body: TextFieldSchema,
  table_caption: lenientArray(CaptionSchema),
  table_type: OptionalStringSchema,
  image_caption: lenientArray(CaptionSchema),
  code_content: TextFieldSchema,
  code_language: OptionalStringSchema,
  math_content: TextFieldSchema,
  math_type: OptionalStringSchema,
  page_header_content: lenientArray(InlineSpanSchema),
  page_footer_content: lenientArray(InlineSpanSchema),
  page_number_content: lenientArray(InlineSpanSchema),
});
export type RawContent = z.infer<typeof RawContentSchema>;

export const RawPrimaryElementSchema = z.object({
  type: z.string().catch('unknown'),
  bbox: NumberListSchema,
  content: RawContentSchema.optional().catch(undefined),
  text: TextFieldSchema,
  code: TextFieldSchema,
  code_language: OptionalStringSchema,
  text_format: OptionalStringSchema,
  table_body: TextFieldSchema,
  sub_type: OptionalStringSchema,
});
export type RawPrimaryElement = z.infer<typeof RawPrimaryElementSchema>;

/**
 * Fused content stream: one entry per page. Pages that are not arrays still
 * count toward the page total but contribute no elements.
 */
export const PrimarySourceSchema = z.array(
  z.unknown().transform(page => (Array.isArray(page) ? collectValid(RawPrimaryElementSchema, page) : null))
);
export type PrimarySource = z.infer<typeof PrimarySourceSchema>;

export const RawSecondaryEntrySchema = z.object({
  type: z.string().catch(''),
  page_idx: z.number().int().nonnegative().optional().catch(undefined),
  bbox: NumberListSchema,
  img_path: OptionalStringSchema,
  text: TextFieldSchema,
});
export type RawSecondaryEntry = z.infer<typeof RawSecondaryEntrySchema>;

export const SecondarySourceSchema = lenientArray(RawSecondaryEntrySchema);
export type SecondarySource = z.infer<typeof SecondarySourceSchema>;

/** Model detections are only counted for now. */
export const ModelSourceSchema = z.array(z.unknown()).catch([]);
export type ModelSource = z.infer<typeof ModelSourceSchema>;

export const PageSizeSchema = z.tuple([z.number().positive(), z.number().positive()]).rest(z.number());

export const LayoutPageSchema = z.object({
  page_idx: z.number().int().nonnegative().optional().catch(undefined),
  page_size: PageSizeSchema.optional().catch(undefined),
});
export type LayoutPage = z.infer<typeof LayoutPageSchema>;

export const LayoutSourceSchema = z
  .object({
    pdf_info: lenientArray(LayoutPageSchema),
  })
  .catch({ pdf_info: [] });
export type LayoutSource = z.infer<typeof LayoutSourceSchema>;

export interface RawSources {
  primary: PrimarySource;
  secondary: SecondarySource;
  model: ModelSource;
  layout: LayoutSource;
  /** Conversion-service id discovered from the `{uuid}_content_list.json` file name. */
  uuid: string | null;
  warnings: string[];
}
