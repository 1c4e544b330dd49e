/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for extraction requests and assembled report records.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { SchemaObject, ValidateFunction } from 'ajv';
import type { ExtractRequest, ReportRecord } from './types';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadSchema(schemaName: string): SchemaObject {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(moduleDir, '../../../docs/contracts', schemaName),
    // Relative to the working directory (containers, scripts)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      if (!isSchemaObject(parsed)) {
        throw new Error(`Schema file is not a JSON object: ${schemaPath}`);
      }
      return parsed;
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

/**
 * Compile a schema on first use
 */
function lazyValidator<T>(schemaName: string): () => ValidateFunction<T> {
  let validate: ValidateFunction<T> | null = null;
  return () => {
    if (!validate) {
      validate = ajv.compile<T>(loadSchema(schemaName));
    }
    return validate;
  };
}

const reportRecordValidator = lazyValidator<ReportRecord>('report_record.schema.json');
const extractRequestValidator = lazyValidator<ExtractRequest>('extract_request.schema.json');

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export type ParseResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function describeErrors<T>(validate: ValidateFunction<T>): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate an assembled ReportRecord against report_record.schema.json
 */
export function validateReportRecord(data: unknown): ValidationResult {
  const validate = reportRecordValidator();

  if (!validate(data)) {
    const errors = describeErrors(validate);
    logger.warn('ReportRecord validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a POST /extract-drone-data body against extract_request.schema.json
 */
export function parseExtractRequest(data: unknown): ParseResult<ExtractRequest> {
  const validate = extractRequestValidator();

  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = describeErrors(validate);
  logger.warn('ExtractRequest validation failed', { errors });
  return { valid: false, errors };
}
