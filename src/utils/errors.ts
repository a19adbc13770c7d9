export class DocstructError extends Error {
  code: string = 'DOCSTRUCT_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'DocstructError';
  }
}

/** Primary content source absent or empty: nothing to fuse. */
export class SourceMissingError extends DocstructError {
  override code = 'SOURCE_MISSING';
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'SourceMissingError';
  }
}

export class SourceParseError extends DocstructError {
  override code = 'SOURCE_PARSE_ERROR';
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'SourceParseError';
  }
}

export class DocumentParseError extends DocstructError {
  override code = 'DOCUMENT_PARSE_ERROR';
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'DocumentParseError';
  }
}

export class SequenceInvariantError extends DocstructError {
  override code = 'SEQUENCE_INVARIANT';
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'SequenceInvariantError';
  }
}

export class PartitionInvariantError extends DocstructError {
  override code = 'PARTITION_INVARIANT';
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'PartitionInvariantError';
  }
}

export class ConfigError extends DocstructError {
  override code = 'CONFIG_ERROR';
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Wraps a failure with the pipeline stage it happened in. Keeps the code of
 * the underlying error when it has one.
 */
export class StageFailedError extends DocstructError {
  override code = 'STAGE_FAILED';
  constructor(public stage: string, public failure: unknown) {
    super(
      `Stage ${stage} failed: ${failure instanceof Error ? failure.message : String(failure)}`,
      failure instanceof DocstructError ? failure.details : undefined
    );
    this.name = 'StageFailedError';
    if (failure instanceof DocstructError) {
      this.code = failure.code;
    }
    if (failure instanceof Error && failure.stack !== undefined) {
      this.stack = failure.stack;
    }
  }
}

export function isDocstructError(error: unknown): error is DocstructError {
  return error instanceof DocstructError;
}
