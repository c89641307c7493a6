/**
 * Schema Validation Service
 *
 * Validates debate snapshots against the transcript JSON schema using Ajv
 * before anything outside the core persists them.
 *
 * @see src/schemas/debate-transcript.schema.ts for schema definitions
 */

import AjvDefault, { type ValidateFunction, type ErrorObject } from 'ajv';
import addFormatsDefault from 'ajv-formats';
import pino from 'pino';

// Handle default exports for CJS/ESM interop
const Ajv = AjvDefault.default ?? AjvDefault;
const addFormats = addFormatsDefault.default ?? addFormatsDefault;

import { turnSchema, SCHEMA_REGISTRY, type SchemaVersion } from '../../schemas/debate-transcript.schema.js';

const logger = pino({
  name: 'schema-validator',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Validation result with detailed error information
 */
export interface SchemaValidationResult {
  valid: boolean;
  errors?: SchemaValidationError[];
}

/**
 * Detailed validation error
 */
export interface SchemaValidationError {
  path: string;
  message: string;
  keyword?: string;
  params?: Record<string, unknown>;
}

/**
 * Schema Validator Service
 *
 * Uses Ajv with strict validation and detailed error reporting.
 */
export class SchemaValidator {
  private ajv: InstanceType<typeof Ajv>;
  private snapshotValidators: Map<string, ValidateFunction>;
  private turnValidator: ValidateFunction;

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      strict: true,
      strictSchema: true,
      strictNumbers: true,
      strictTypes: true,
      strictTuples: true,
      strictRequired: true,
      validateFormats: true,
      removeAdditional: false,
    });

    // date-time and friends
    addFormats(this.ajv);

    this.snapshotValidators = new Map();
    for (const [version, schema] of Object.entries(SCHEMA_REGISTRY)) {
      this.snapshotValidators.set(version, this.ajv.compile(schema));
    }

    this.turnValidator = this.ajv.compile(turnSchema);
  }

  /**
   * Validate a complete debate snapshot
   *
   * @param data - Snapshot to validate (usually DebateSnapshot serialized as-is)
   * @param version - Schema version to validate against
   */
  validateSnapshot(data: unknown, version: string = '1.0.0'): SchemaValidationResult {
    const validator = this.snapshotValidators.get(version);

    if (!validator) {
      return {
        valid: false,
        errors: [
          {
            path: '/',
            message: `Unknown schema version: ${version}`,
            keyword: 'version',
            params: { version },
          },
        ],
      };
    }

    if (validator(data)) {
      return { valid: true };
    }

    const errors = this.formatErrors(validator.errors || []);
    this.logValidationErrors('Snapshot', errors);

    return { valid: false, errors };
  }

  /**
   * Validate a single accepted turn
   */
  validateTurn(turn: unknown): SchemaValidationResult {
    if (this.turnValidator(turn)) {
      return { valid: true };
    }

    const errors = this.formatErrors(this.turnValidator.errors || []);
    this.logValidationErrors('Turn', errors);

    return { valid: false, errors };
  }

  /**
   * Format Ajv errors into SchemaValidationError entries
   */
  private formatErrors(ajvErrors: ErrorObject[]): SchemaValidationError[] {
    return ajvErrors.map((error) => ({
      path: error.instancePath || '/',
      message: error.message || 'Validation failed',
      keyword: error.keyword,
      params: error.params,
    }));
  }

  private logValidationErrors(type: string, errors: SchemaValidationError[]): void {
    logger.warn({ errorCount: errors.length, errors }, `${type} validation failed`);
  }

  getSupportedVersions(): SchemaVersion[] {
    return Object.keys(SCHEMA_REGISTRY).filter((version): version is SchemaVersion => this.isSupportedVersion(version));
  }

  isSupportedVersion(version: string): version is SchemaVersion {
    return this.snapshotValidators.has(version);
  }
}

/**
 * Shared instance
 */
export const schemaValidator = new SchemaValidator();
