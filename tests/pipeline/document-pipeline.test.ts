import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { DocumentPipeline, pipelineOptionsFromConfig } from '../../src/pipeline/document-pipeline.js';
import { DocumentStore } from '../../src/pipeline/document-store.js';
import { loadConfig } from '../../src/config/index.js';
import { StageFailedError } from '../../src/utils/errors.js';
import { elementsWithTitles, makeDocument, paragraphBlock, titleBlock } from '../helpers/fixtures.js';

describe('DocumentPipeline', () => {
  let rootDir: string;
  let workDir: string;
  let pipeline: DocumentPipeline;

  beforeEach(async () => {
    rootDir = join(tmpdir(), `docstruct-pipeline-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    workDir = join(rootDir, 'work');
    await mkdir(join(workDir, 'paper'), { recursive: true });
    await writeFile(
      join(workDir, 'paper', 'content_list_v2.json'),
      JSON.stringify([
        [
          titleBlock('1 Introduction'),
          paragraphBlock('The exam-'),
          paragraphBlock('ple text.'),
          titleBlock('References'),
          paragraphBlock('Smith, J. Title. 2020.'),
        ],
      ])
    );
    pipeline = new DocumentPipeline({ workDir, store: new DocumentStore(join(rootDir, 'store')) });
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it('should run every stage and persist the result', async () => {
    const result = await pipeline.process('paper');

    expect(result).toEqual({
      docId: 'paper',
      stagesRun: ['layout_json_parsed', 'fragment_merged', 'region_divided'],
      stagesSkipped: [],
      finalStage: 'region_divided',
      totalElements: 4,
      mergedCount: 1,
      bodyMethod: 'paired',
    });

    const stored = await pipeline.store.read('paper');
    expect(stored.metadata.region_division).toEqual({
      head: { start_seq: 1, end_seq: 0 },
      body: { start_seq: 1, end_seq: 2 },
      tail: { start_seq: 3, end_seq: 4 },
      method: 'paired',
    });
    expect(stored.elements[1]?.content).toEqual({ text: 'The example text.' });
  });

  it('should skip stages that are already complete', async () => {
    await pipeline.process('paper');
    const second = await pipeline.process('paper');

    expect(second.stagesRun).toEqual([]);
    expect(second.stagesSkipped).toEqual(['layout_json_parsed', 'fragment_merged', 'region_divided']);
    expect(second.mergedCount).toBe(0);
    expect(second.bodyMethod).toBe('paired');
  });

  it('should rerun everything when forced', async () => {
    await pipeline.process('paper');
    const forced = await pipeline.process('paper', { force: true });

    expect(forced.stagesRun).toEqual(['layout_json_parsed', 'fragment_merged', 'region_divided']);
    expect(forced.mergedCount).toBe(1);
  });

  it('should resume from a stored intermediate document', async () => {
    const partial = makeDocument(elementsWithTitles(6, { 2: '1 Introduction', 5: 'References' }));
    await pipeline.store.write({ ...partial, metadata: { ...partial.metadata, doc_id: 'resumed' } });

    const result = await pipeline.process('resumed');

    expect(result.stagesSkipped).toEqual(['layout_json_parsed']);
    expect(result.stagesRun).toEqual(['fragment_merged', 'region_divided']);
    expect(result.bodyMethod).toBe('paired');
  });

  it('should report the failing stage', async () => {
    const failure = pipeline.process('missing');

    await expect(failure).rejects.toBeInstanceOf(StageFailedError);
    await expect(failure).rejects.toMatchObject({ stage: 'layout_json_parsed', code: 'SOURCE_MISSING' });
  });

  it('should build options from the configuration', () => {
    const cfg = loadConfig({ DOCSTRUCT_STORE_DIR: '/data/store', DOCSTRUCT_TOC_ROW_MAX_LENGTH: '30' });
    const options = pipelineOptionsFromConfig(cfg);

    expect(options.store.storeDir).toBe('/data/store');
    expect(options.extract).toEqual({ tolerance: 50, defaultPageSize: [595, 841], cjkRatioThreshold: 0.3 });
    expect(options.segmentation?.tocRowMaxLength).toBe(30);
    expect(options.segmentation?.majorBodyStartMaxLength).toBe(40);
  });
});
