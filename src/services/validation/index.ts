/**
 * Validation Services
 */

export { ArgumentValidator, DEFAULT_VALIDATOR_THRESHOLDS, REJECTION_REASONS } from './argument-validator.js';
export { SchemaValidator, schemaValidator } from './schema-validator.js';
export type { SchemaValidationError, SchemaValidationResult } from './schema-validator.js';
