import { join } from 'path';
import type { Config } from '../config/index.js';
import { extractDocument, type ExtractOptions } from '../extractors/document-extractor.js';
import { mergeDocument } from '../merger/fragment-merger.js';
import type { BodyRegionMethod, ParsedDocument } from '../schemas/document.js';
import { segmentDocument } from '../segmentation/region-segmenter.js';
import { DEFAULT_SEGMENTATION_OPTIONS, type SegmentationOptions } from '../segmentation/markers.js';
import {
  STAGE_FRAGMENT_MERGED,
  STAGE_LAYOUT_JSON_PARSED,
  STAGE_REGION_DIVIDED,
  type ProcessStage,
} from '../utils/constants.js';
import { StageFailedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { shouldSkipStage } from '../utils/stage.js';
import { DocumentStore } from './document-store.js';

export interface PipelineOptions {
  /** Directory holding one subdirectory of raw sources per document. */
  workDir: string;
  store: DocumentStore;
  extract?: Omit<ExtractOptions, 'docId'>;
  segmentation?: SegmentationOptions;
}

export interface ProcessOptions {
  /** Re-run every stage from the raw sources even when the stored document is further along. */
  force?: boolean;
}

export interface PipelineResult {
  docId: string;
  stagesRun: ProcessStage[];
  stagesSkipped: ProcessStage[];
  finalStage: string;
  totalElements: number;
  mergedCount: number;
  bodyMethod: BodyRegionMethod | undefined;
}

/**
 * Pipeline options from the runtime configuration.
 */
export function pipelineOptionsFromConfig(cfg: Config): PipelineOptions {
  return {
    workDir: cfg.paths.workDir,
    store: new DocumentStore(cfg.paths.storeDir),
    extract: {
      tolerance: cfg.fusion.bboxTolerance,
      defaultPageSize: [cfg.fusion.pageWidth, cfg.fusion.pageHeight],
      cjkRatioThreshold: cfg.fusion.cjkRatioThreshold,
    },
    segmentation: {
      ...DEFAULT_SEGMENTATION_OPTIONS,
      tocRowMaxLength: cfg.segmentation.tocRowMaxLength,
      leadingLabelMaxLength: cfg.segmentation.leadingLabelMaxLength,
    },
  };
}

async function runStage<T>(stage: ProcessStage, work: () => Promise<T> | T): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw new StageFailedError(stage, error);
  }
}

/**
 * Drives one document through extraction, fragment merging and region
 * division, persisting after every stage. Stages the stored document has
 * already passed are skipped unless forced.
 */
export class DocumentPipeline {
  readonly workDir: string;
  readonly store: DocumentStore;
  private readonly extractOptions: Omit<ExtractOptions, 'docId'>;
  private readonly segmentationOptions: SegmentationOptions;

  constructor(options: PipelineOptions) {
    this.workDir = options.workDir;
    this.store = options.store;
    this.extractOptions = options.extract ?? {};
    this.segmentationOptions = options.segmentation ?? DEFAULT_SEGMENTATION_OPTIONS;
  }

  async process(docId: string, options: ProcessOptions = {}): Promise<PipelineResult> {
    const force = options.force ?? false;
    const stagesRun: ProcessStage[] = [];
    const stagesSkipped: ProcessStage[] = [];
    let mergedCount = 0;
    let bodyMethod: BodyRegionMethod | undefined;

    const stored = force ? null : await this.loadStored(docId);
    let document: ParsedDocument;

    if (stored !== null && shouldSkipStage(stored.metadata.parse_stage, STAGE_LAYOUT_JSON_PARSED)) {
      document = stored;
      stagesSkipped.push(STAGE_LAYOUT_JSON_PARSED);
      logger.debug({ docId, stage: STAGE_LAYOUT_JSON_PARSED }, 'Stage already completed, skipping');
    } else {
      document = await runStage(STAGE_LAYOUT_JSON_PARSED, async () => {
        const result = await extractDocument(join(this.workDir, docId), { ...this.extractOptions, docId });
        await this.store.write(result.document);
        return result.document;
      });
      stagesRun.push(STAGE_LAYOUT_JSON_PARSED);
    }

    if (shouldSkipStage(document.metadata.parse_stage, STAGE_FRAGMENT_MERGED)) {
      stagesSkipped.push(STAGE_FRAGMENT_MERGED);
      logger.debug({ docId, stage: STAGE_FRAGMENT_MERGED }, 'Stage already completed, skipping');
    } else {
      const current = document;
      document = await runStage(STAGE_FRAGMENT_MERGED, async () => {
        const result = mergeDocument(current);
        mergedCount = result.mergedCount;
        await this.store.write(result.document);
        return result.document;
      });
      stagesRun.push(STAGE_FRAGMENT_MERGED);
    }

    if (shouldSkipStage(document.metadata.parse_stage, STAGE_REGION_DIVIDED)) {
      stagesSkipped.push(STAGE_REGION_DIVIDED);
      bodyMethod = document.metadata.region_division?.method;
      logger.debug({ docId, stage: STAGE_REGION_DIVIDED }, 'Stage already completed, skipping');
    } else {
      const current = document;
      document = await runStage(STAGE_REGION_DIVIDED, async () => {
        const result = segmentDocument(current, this.segmentationOptions);
        bodyMethod = result.analysis.body.method;
        await this.store.write(result.document);
        return result.document;
      });
      stagesRun.push(STAGE_REGION_DIVIDED);
    }

    logger.info(
      { docId, stagesRun, totalElements: document.metadata.total_elements, mergedCount, bodyMethod },
      'Document processed'
    );

    return {
      docId,
      stagesRun,
      stagesSkipped,
      finalStage: document.metadata.parse_stage,
      totalElements: document.metadata.total_elements,
      mergedCount,
      bodyMethod,
    };
  }

  private async loadStored(docId: string): Promise<ParsedDocument | null> {
    if (!(await this.store.exists(docId))) {
      return null;
    }
    return this.store.read(docId);
  }
}
