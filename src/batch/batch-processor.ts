import type { PipelineResult, ProcessOptions } from '../pipeline/document-pipeline.js';
import { isDocstructError, StageFailedError } from '../utils/errors.js';

export interface DocumentError {
  docId: string;
  stage: string | undefined;
  error: string;
  code: string;
  stack: string | undefined;
  timestamp: string;
}

export interface BatchProcessResult {
  results: PipelineResult[];
  errors: DocumentError[];
  summary: {
    total: number;
    succeeded: number;
    /** Documents whose every stage was already complete. */
    skipped: number;
    failed: number;
  };
}

/** Anything that can take a document id through the pipeline. */
export interface DocumentProcessor {
  process(docId: string, options?: ProcessOptions): Promise<PipelineResult>;
}

export interface BatchProcessOptions {
  concurrency?: number;
  force?: boolean;
  onProgress?: (current: number, total: number, docId: string) => void;
  onError?: (error: DocumentError) => void;
}

/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 * Results keep the order of `items`.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await worker(item, index);
    }
  });

  await Promise.all(lanes);
  return results;
}

/**
 * Processes many documents with a bounded worker pool.
 *
 * Documents are independent, so completion order is irrelevant; results are
 * reported in input order. A failing document is recorded and never stops
 * the batch.
 */
export async function processBatch(
  docIds: readonly string[],
  processor: DocumentProcessor,
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult> {
  const concurrency = options.concurrency ?? 1;
  let started = 0;

  const outcomes = await runWithConcurrency(docIds, concurrency, async docId => {
    started++;
    if (options.onProgress !== undefined) {
      options.onProgress(started, docIds.length, docId);
    }

    try {
      const result = await processor.process(docId, { force: options.force ?? false });
      return { ok: true as const, result };
    } catch (error) {
      const documentError = createDocumentError(docId, error);
      if (options.onError !== undefined) {
        options.onError(documentError);
      }
      return { ok: false as const, error: documentError };
    }
  });

  const results: PipelineResult[] = [];
  const errors: DocumentError[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      results.push(outcome.result);
    } else {
      errors.push(outcome.error);
    }
  }

  const skipped = results.filter(result => result.stagesRun.length === 0).length;

  return {
    results,
    errors,
    summary: {
      total: docIds.length,
      succeeded: results.length - skipped,
      skipped,
      failed: errors.length,
    },
  };
}

/**
 * Creates a structured per-document error from an exception.
 */
export function createDocumentError(docId: string, error: unknown): DocumentError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    docId,
    stage: error instanceof StageFailedError ? error.stage : undefined,
    error: message,
    code: isDocstructError(error) ? error.code : 'UNKNOWN_ERROR',
    stack,
    timestamp: new Date().toISOString(),
  };
}
