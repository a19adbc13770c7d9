/**
 * AJV-based JSON Schema validation for written documents.
 * The schema lives in schemas/document.schema.json at the package root.
 */

import { readFileSync } from 'fs';
import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';
import type { ParsedDocument } from '../schemas/document.js';
import { DocstructError } from '../utils/errors.js';

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export const DOCUMENT_SCHEMA_URL = new URL('../../schemas/document.schema.json', import.meta.url);

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

export class SchemaValidationError extends DocstructError {
  override code = 'SCHEMA_VALIDATION';
  constructor(message: string, public errors: ValidationError[]) {
    super(message, errors);
    this.name = 'SchemaValidationError';
  }
}

let compiledValidator: ValidateFunction | null = null;

function loadSchema(): SchemaObject {
  const schema: SchemaObject = JSON.parse(readFileSync(DOCUMENT_SCHEMA_URL, 'utf-8'));
  return schema;
}

function getValidator(): ValidateFunction {
  if (compiledValidator === null) {
    const ajv = new Ajv({ allErrors: true, verbose: true });
    addFormats(ajv);
    compiledValidator = ajv.compile(loadSchema());
  }
  return compiledValidator;
}

function toValidationError(err: ErrorObject): ValidationError {
  return {
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  };
}

export function validateDocument(document: unknown): ValidationResult {
  const validate = getValidator();
  const valid = validate(document);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const errors = (validate.errors ?? []).map(toValidationError);
  return { valid: false, errors };
}

export function validateAndThrow(document: unknown): asserts document is ParsedDocument {
  const result = validateDocument(document);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map(e => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new SchemaValidationError(`Schema validation failed:\n${errorMessages}`, result.errors);
  }
}

export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map(e => `[${e.keyword}] ${e.path}: ${e.message}`);
}
