export {
  ElementTypeSchema,
  TextElementTypeSchema,
  BBoxSchema,
  ElementSourceSchema,
  ElementMetadataSchema,
  TextContentSchema,
  TitleContentSchema,
  TableContentSchema,
  ImageContentSchema,
  CodeContentSchema,
  EquationContentSchema,
  TextElementSchema,
  TitleElementSchema,
  TableElementSchema,
  ImageElementSchema,
  CodeElementSchema,
  EquationElementSchema,
  DocumentElementSchema,
  SeqRangeSchema,
  BodyRegionMethodSchema,
  RegionDivisionSchema,
  LanguageSchema,
  LocalizedAbstractSchema,
  AbstractSchema,
  DocumentMetadataSchema,
  ParsedDocumentSchema,
} from './document.js';

export type {
  ElementType,
  TextElementType,
  BBox,
  ElementSource,
  ElementMetadata,
  TextContent,
  TitleContent,
  TableContent,
  ImageContent,
  CodeContent,
  EquationContent,
  DocumentElement,
  ElementContent,
  SeqRange,
  BodyRegionMethod,
  RegionDivision,
  LocalizedAbstract,
  Abstract,
  DocumentMetadata,
  ParsedDocument,
} from './document.js';

export {
  collectValid,
  InlineSpanSchema,
  CaptionSchema,
  ListItemSchema,
  RawContentSchema,
  RawPrimaryElementSchema,
  PrimarySourceSchema,
  RawSecondaryEntrySchema,
  SecondarySourceSchema,
  ModelSourceSchema,
  PageSizeSchema,
  LayoutPageSchema,
  LayoutSourceSchema,
} from './raw-sources.js';

export type {
  InlineSpan,
  ListItem,
  RawContent,
  RawPrimaryElement,
  PrimarySource,
  RawSecondaryEntry,
  SecondarySource,
  ModelSource,
  LayoutPage,
  LayoutSource,
  RawSources,
} from './raw-sources.js';
