export {
  DOCUMENT_SCHEMA_URL,
  SchemaValidationError,
  validateDocument,
  validateAndThrow,
  formatValidationErrors,
} from './ajv-validator.js';

export type { ValidationResult, ValidationError } from './ajv-validator.js';
