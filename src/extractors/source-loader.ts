import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import {
  LayoutSourceSchema,
  ModelSourceSchema,
  PrimarySourceSchema,
  SecondarySourceSchema,
  type LayoutSource,
  type ModelSource,
  type PrimarySource,
  type RawSources,
  type SecondarySource,
} from '../schemas/raw-sources.js';
import { SOURCE_FILE_NAMES } from '../utils/constants.js';
import { SourceMissingError, SourceParseError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

type JsonReadResult = { found: false; path: string } | { found: true; path: string; data: unknown };

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and parse one JSON file. A missing file is reported, not thrown;
 * unparseable content is fatal for the document.
 */
export async function readJsonFile(path: string): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return { found: false, path };
    }
    throw error;
  }

  try {
    return { found: true, path, data: JSON.parse(raw) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceParseError(`Malformed JSON in ${path}: ${message}`, { path });
  }
}

/**
 * Find the conversion-service id from a `{uuid}_content_list.json` file name.
 */
export async function discoverSourceUuid(docDir: string): Promise<string | null> {
  let names: string[];
  try {
    names = (await readdir(docDir)).sort();
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
  const match = names.find(name => name.endsWith(SOURCE_FILE_NAMES.SECONDARY_SUFFIX));
  if (match === undefined) {
    return null;
  }
  return match.slice(0, -SOURCE_FILE_NAMES.SECONDARY_SUFFIX.length);
}

async function readOptional(path: string | null): Promise<JsonReadResult | null> {
  return path === null ? null : readJsonFile(path);
}

/**
 * Load the four raw sources of one document concurrently.
 *
 * @param docDir - Directory written by the conversion service for one document
 * @returns Parsed sources plus warnings for every enrichment source that was lost
 * @throws SourceMissingError when the fused content stream is absent or empty
 * @throws SourceParseError when any present source is not valid JSON
 */
export async function loadRawSources(docDir: string): Promise<RawSources> {
  const uuid = await discoverSourceUuid(docDir);
  const warnings: string[] = [];

  const secondaryPath = uuid !== null ? join(docDir, `${uuid}${SOURCE_FILE_NAMES.SECONDARY_SUFFIX}`) : null;
  const modelPath = uuid !== null ? join(docDir, `${uuid}${SOURCE_FILE_NAMES.MODEL_SUFFIX}`) : null;

  const [primaryRead, secondaryRead, modelRead, layoutRead] = await Promise.all([
    readJsonFile(join(docDir, SOURCE_FILE_NAMES.PRIMARY)),
    readOptional(secondaryPath),
    readOptional(modelPath),
    readJsonFile(join(docDir, SOURCE_FILE_NAMES.LAYOUT)),
  ]);

  if (!primaryRead.found) {
    throw new SourceMissingError(`${SOURCE_FILE_NAMES.PRIMARY} not found in ${docDir}`, { docDir });
  }
  const primaryParsed = PrimarySourceSchema.safeParse(primaryRead.data);
  const primary: PrimarySource = primaryParsed.success ? primaryParsed.data : [];
  if (primary.length === 0) {
    throw new SourceMissingError(`${SOURCE_FILE_NAMES.PRIMARY} is empty or not a list: ${docDir}`, { docDir });
  }

  if (uuid === null) {
    warnings.push(`No *${SOURCE_FILE_NAMES.SECONDARY_SUFFIX} found; asset paths and model detections unavailable`);
  }

  let secondary: SecondarySource = [];
  if (secondaryRead !== null && !secondaryRead.found) {
    warnings.push(`Secondary content list not found: ${secondaryRead.path}`);
  } else if (secondaryRead !== null) {
    if (!Array.isArray(secondaryRead.data)) {
      warnings.push(`Secondary content list is not a list: ${secondaryRead.path}`);
    }
    secondary = SecondarySourceSchema.parse(secondaryRead.data);
  }

  let model: ModelSource = [];
  if (modelRead !== null && !modelRead.found) {
    warnings.push(`Model detections not found: ${modelRead.path}`);
  } else if (modelRead !== null) {
    model = ModelSourceSchema.parse(modelRead.data);
  }

  let layout: LayoutSource = { pdf_info: [] };
  if (!layoutRead.found) {
    warnings.push(`Layout not found: ${layoutRead.path}; default page size applies`);
  } else {
    layout = LayoutSourceSchema.parse(layoutRead.data);
  }

  for (const warning of warnings) {
    logger.warn({ docDir }, warning);
  }

  return { primary, secondary, model, layout, uuid, warnings };
}
