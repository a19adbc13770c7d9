#!/usr/bin/env node

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { stat, writeFile } from 'fs/promises';
import { resolve } from 'path';
import { config } from '../config/index.js';
import { processBatch, type DocumentError } from '../batch/index.js';
import { extractDocument } from '../extractors/index.js';
import { mergeDocument } from '../merger/index.js';
import { DocumentPipeline, pipelineOptionsFromConfig, readDocumentFile, serializeDocument } from '../pipeline/index.js';
import type { ParsedDocument, RegionDivision } from '../schemas/index.js';
import {
  analyzeStructure,
  segmentDocument,
  type BodyRegion,
  type SectionMarker,
  type TitleItem,
} from '../segmentation/index.js';
import { PIPELINE_VERSION } from '../utils/constants.js';
import { scanDocumentDirectories, scanJsonStore, validateDirectory } from '../utils/directory-scanner.js';
import { formatValidationErrors, validateDocument } from '../validation/index.js';

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

interface OutputOptions {
  out?: string;
  verbose: boolean;
  strict: boolean;
  pretty: boolean;
}

interface TitlesReport {
  doc_id: string;
  file: string;
  total_elements: number;
  titles: TitleItem[];
  section_markers: SectionMarker[];
  body_region: BodyRegion;
  region_division: RegionDivision;
}

interface RunOptions {
  workDir: string;
  storeDir: string;
  concurrency: string;
  force: boolean;
  verbose: boolean;
  strict: boolean;
}

const program = new Command();

program
  .name('docstruct')
  .description('Fuse converter output into canonical documents with head/body/tail regions')
  .version(PIPELINE_VERSION);

function withOutputOptions(command: Command): Command {
  return command
    .option('-o, --out <file>', 'Output file path (default: stdout)')
    .option('-v, --verbose', 'Enable verbose output', envBool('DOCSTRUCT_VERBOSE', false))
    .option('-s, --strict', 'Validate output against the JSON schema', envBool('DOCSTRUCT_STRICT', false))
    .option('--pretty', 'Pretty-print JSON output', envBool('DOCSTRUCT_PRETTY', true))
    .option('--no-pretty', 'Disable pretty-printing');
}

function reportError(error: unknown, verbose: boolean): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] ${message}`);
  if (verbose && error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}

/**
 * Validate (in strict mode) and write a document to --out or stdout.
 */
async function emitDocument(document: ParsedDocument, options: OutputOptions): Promise<void> {
  if (options.strict) {
    const validation = validateDocument(document);
    if (!validation.valid) {
      console.error('[ERROR] Schema validation failed:');
      for (const line of formatValidationErrors(validation.errors)) {
        console.error(`  - ${line}`);
      }
      process.exit(1);
    }
  }

  const outputContent = options.pretty ? serializeDocument(document) : JSON.stringify(document);

  if (options.out !== undefined) {
    const outPath = resolve(options.out);
    await writeFile(outPath, outputContent, 'utf-8');
    console.error(`[INFO] Output written to: ${outPath}`);
  } else {
    console.log(outputContent);
  }
}

function printWarnings(document: ParsedDocument): void {
  const warnings = document.metadata.warnings ?? [];
  if (warnings.length === 0) return;
  console.error('[WARN] Warnings:');
  for (const warning of warnings) {
    console.error(`  - ${warning}`);
  }
}

// ─── run ─────────────────────────────────────────────────────────────────────

program
  .command('run')
  .description('Run extraction, fragment merging and region division for documents in the work directory')
  .argument('[docIds...]', 'Document ids (subdirectory names); all documents when omitted')
  .option('-w, --work-dir <directory>', 'Converter work directory', config.paths.workDir)
  .option('-d, --store-dir <directory>', 'Document store directory', config.paths.storeDir)
  .option('-c, --concurrency <number>', 'Documents processed in parallel', String(config.batch.concurrency))
  .option('-f, --force', 'Re-run stages that are already complete', envBool('DOCSTRUCT_FORCE', false))
  .option('-v, --verbose', 'Enable verbose output', envBool('DOCSTRUCT_VERBOSE', false))
  .option('-s, --strict', 'Validate stored documents against the JSON schema', envBool('DOCSTRUCT_STRICT', false))
  .action(async (docIds: string[], options: RunOptions) => {
    try {
      await runPipeline(docIds, options);
    } catch (error) {
      reportError(error, options.verbose);
    }
  });

async function runPipeline(requestedIds: string[], options: RunOptions): Promise<void> {
  const workDir = resolve(options.workDir);
  const concurrency = Number.parseInt(options.concurrency, 10);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    console.error(`[ERROR] Invalid concurrency: ${options.concurrency}`);
    process.exit(1);
  }

  const validation = await validateDirectory(workDir);
  if (!validation.valid) {
    console.error(`[ERROR] ${validation.error ?? `Invalid directory: ${workDir}`}`);
    process.exit(1);
  }

  let docIds = requestedIds;
  if (docIds.length === 0) {
    const scanResult = await scanDocumentDirectories(workDir);
    docIds = scanResult.documents.map(doc => doc.docId);
    if (options.verbose && scanResult.skipped.length > 0) {
      console.error(`[INFO] Skipped ${scanResult.skipped.length} director(ies):`);
      for (const skip of scanResult.skipped) {
        console.error(`  - ${skip.name}: ${skip.reason}`);
      }
    }
  }

  if (docIds.length === 0) {
    console.error('[ERROR] No documents found in work directory');
    process.exit(1);
  }

  if (options.verbose) {
    console.error(`[INFO] Work directory: ${workDir}`);
    console.error(`[INFO] Store directory: ${resolve(options.storeDir)}`);
    console.error(`[INFO] Pipeline version: ${PIPELINE_VERSION}`);
    console.error(`[INFO] Documents: ${docIds.length}, concurrency: ${concurrency}`);
  }

  const pipelineOptions = pipelineOptionsFromConfig({
    ...config,
    paths: { workDir, storeDir: options.storeDir },
  });
  const pipeline = new DocumentPipeline(pipelineOptions);

  const result = await processBatch(docIds, pipeline, {
    concurrency,
    force: options.force,
    onProgress: (current, total, docId) => {
      console.error(`[INFO] Processing ${current}/${total}: ${docId}`);
    },
    onError: (error: DocumentError) => {
      const stage = error.stage !== undefined ? ` at ${error.stage}` : '';
      console.error(`[ERROR] Failed to process ${error.docId}${stage}: ${error.error}`);
    },
  });

  let invalidDocuments = 0;
  if (options.strict) {
    for (const processed of result.results) {
      const document = await pipeline.store.read(processed.docId);
      const check = validateDocument(document);
      if (!check.valid) {
        invalidDocuments++;
        console.error(`[ERROR] ${processed.docId} failed schema validation:`);
        for (const line of formatValidationErrors(check.errors)) {
          console.error(`  - ${line}`);
        }
      }
    }
  }

  console.error('');
  console.error('=== Pipeline Summary ===');
  console.error(`Documents:   ${result.summary.total}`);
  console.error(`Succeeded:   ${result.summary.succeeded}`);
  console.error(`Skipped:     ${result.summary.skipped}`);
  console.error(`Failed:      ${result.summary.failed}`);
  if (options.strict) {
    console.error(`Invalid:     ${invalidDocuments}`);
  }
  console.error('========================');

  if (result.summary.failed === result.summary.total || invalidDocuments > 0) {
    process.exit(1);
  }
  process.exit(0);
}

// ─── extract ─────────────────────────────────────────────────────────────────

withOutputOptions(
  program
    .command('extract')
    .description('Fuse the raw sources of one document directory into a canonical document')
    .argument('<docDir>', 'Directory holding content_list_v2.json and its companions')
    .option('--doc-id <id>', 'Document id (default: directory name)')
).action(async (docDir: string, options: OutputOptions & { docId?: string }) => {
  try {
    const dirPath = resolve(docDir);
    if (options.verbose) {
      console.error(`[INFO] Extracting: ${dirPath}`);
    }

    const result = await extractDocument(dirPath, {
      docId: options.docId,
      tolerance: config.fusion.bboxTolerance,
      defaultPageSize: [config.fusion.pageWidth, config.fusion.pageHeight],
      cjkRatioThreshold: config.fusion.cjkRatioThreshold,
    });

    if (options.verbose) {
      const { stats } = result;
      console.error(`[INFO] Blocks read: ${stats.blocks}`);
      console.error(`[INFO] Elements kept: ${result.document.elements.length}`);
      console.error(`[INFO] Dropped: ${stats.furniture} furniture, ${stats.empty} empty, ${stats.unknownType} unknown`);
      console.error(`[INFO] Asset paths matched: ${stats.assetsMatched}`);
      printWarnings(result.document);
    }

    await emitDocument(result.document, options);
  } catch (error) {
    reportError(error, options.verbose);
  }
});

// ─── merge ───────────────────────────────────────────────────────────────────

withOutputOptions(
  program
    .command('merge')
    .description('Merge split paragraph fragments of a stored document')
    .argument('<json>', 'Path to a canonical document JSON file')
).action(async (jsonPath: string, options: OutputOptions) => {
  try {
    const document = await readDocumentFile(resolve(jsonPath));
    const result = mergeDocument(document);

    if (options.verbose) {
      console.error(`[INFO] Merged ${result.mergedCount} fragment(s)`);
      console.error(`[INFO] Elements: ${document.elements.length} -> ${result.document.elements.length}`);
    }

    await emitDocument(result.document, options);
  } catch (error) {
    reportError(error, options.verbose);
  }
});

// ─── segment ─────────────────────────────────────────────────────────────────

withOutputOptions(
  program
    .command('segment')
    .description('Divide a stored document into head, body and tail regions')
    .argument('<json>', 'Path to a canonical document JSON file')
).action(async (jsonPath: string, options: OutputOptions) => {
  try {
    const document = await readDocumentFile(resolve(jsonPath));
    const segmentation = pipelineOptionsFromConfig(config).segmentation;
    const result = segmentDocument(document, segmentation);

    if (options.verbose) {
      const { division } = result.analysis;
      console.error(`[INFO] Body method: ${result.analysis.body.method}`);
      console.error(`[INFO] Head: ${division.head.start_seq}-${division.head.end_seq}`);
      console.error(`[INFO] Body: ${division.body.start_seq}-${division.body.end_seq}`);
      console.error(`[INFO] Tail: ${division.tail.start_seq}-${division.tail.end_seq}`);
    }

    await emitDocument(result.document, options);
  } catch (error) {
    reportError(error, options.verbose);
  }
});

// ─── titles ──────────────────────────────────────────────────────────────────

program
  .command('titles')
  .description('Print titles, section markers and the region division of stored documents')
  .argument('<path>', 'A canonical document JSON file or a directory of them')
  .option('--pretty', 'Pretty-print JSON output', envBool('DOCSTRUCT_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .option('-v, --verbose', 'Enable verbose output', envBool('DOCSTRUCT_VERBOSE', false))
  .action(async (target: string, options: { pretty: boolean; verbose: boolean }) => {
    try {
      const targetPath = resolve(target);
      const targetStat = await stat(targetPath);
      const files = targetStat.isDirectory()
        ? (await scanJsonStore(targetPath)).documents.map(doc => doc.filePath)
        : [targetPath];

      const segmentation = pipelineOptionsFromConfig(config).segmentation;
      const reports: TitlesReport[] = [];
      for (const file of files) {
        const document = await readDocumentFile(file);
        const analysis = analyzeStructure(document.elements, segmentation);
        reports.push({
          doc_id: document.metadata.doc_id,
          file,
          total_elements: document.elements.length,
          titles: analysis.titles,
          section_markers: analysis.markers,
          body_region: analysis.body,
          region_division: analysis.division,
        });
      }

      if (options.verbose) {
        const totalTitles = reports.reduce((sum, report) => sum + report.titles.length, 0);
        console.error(`[INFO] Files: ${reports.length}, titles: ${totalTitles}`);
      }

      console.log(options.pretty ? JSON.stringify(reports, null, 2) : JSON.stringify(reports));
    } catch (error) {
      reportError(error, options.verbose);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  reportError(error, true);
});
