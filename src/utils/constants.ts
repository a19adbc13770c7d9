export const PIPELINE_VERSION = '0.1.0';

export const STAGE_LAYOUT_JSON_PARSED = 'layout_json_parsed';
export const STAGE_FRAGMENT_MERGED = 'fragment_merged';
export const STAGE_REGION_DIVIDED = 'region_divided';
export const STAGE_METADATA_EXTRACTED = 'metadata_extracted';
export const STAGE_IMAGE_DESCRIPTION = 'image_description';
export const STAGE_RAG_EMBEDDING = 'rag_embedding';

/** Processing stages in pipeline order. Later stages belong to downstream consumers. */
export const PROCESS_STAGES = [
  STAGE_LAYOUT_JSON_PARSED,
  STAGE_FRAGMENT_MERGED,
  STAGE_REGION_DIVIDED,
  STAGE_METADATA_EXTRACTED,
  STAGE_IMAGE_DESCRIPTION,
  STAGE_RAG_EMBEDDING,
] as const;

export type ProcessStage = typeof PROCESS_STAGES[number];

export const SOURCE_FILE_NAMES = {
  PRIMARY: 'content_list_v2.json',
  SECONDARY_SUFFIX: '_content_list.json',
  MODEL_SUFFIX: '_model.json',
  LAYOUT: 'layout.json',
} as const;

export const DEFAULT_BBOX_TOLERANCE = 50;

/** A4 at 72 dpi, used when the layout source gives no page size. */
export const DEFAULT_PAGE_SIZE: readonly [number, number] = [595, 841];

export const DEFAULT_CJK_RATIO_THRESHOLD = 0.3;

export const ELEMENT_ID_SEQUENCE_WIDTH = 6;
