/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for API requests and tabular quote files.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { config } from './config';
import { ValidationError } from './errors';
import { logger } from './logger';
import type { CompareRequest, ExtractRequest, ParseRequest } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Explicit override
    ...(config.contractsPath ? [path.join(config.contractsPath, schemaName)] : []),
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output (dist/packages/shared/src)
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found (for container environments)
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return {};
}

/**
 * Lazily compiled validator for one contract file
 */
function contract<T>(schemaName: string): () => ValidateFunction<T> {
  let validate: ValidateFunction<T> | null = null;
  return () => {
    if (!validate) {
      validate = ajv.compile<T>(loadSchema(schemaName));
    }
    return validate;
  };
}

const compareRequestContract = contract<CompareRequest>('compare_request.schema.json');
const extractRequestContract = contract<ExtractRequest>('extract_request.schema.json');
const parseRequestContract = contract<ParseRequest>('parse_request.schema.json');
const tabularRowsContract = contract<Array<Record<string, unknown>>>('tabular_rows.schema.json');

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

function check<T>(
  validate: ValidateFunction<T>,
  data: unknown,
  label: string
): T {
  if (validate(data)) {
    return data;
  }
  const errors = formatErrors(validate.errors);
  logger.warn(`${label} validation failed`, { errors });
  throw new ValidationError(`Invalid ${label}`, errors);
}

export function parseCompareRequest(data: unknown): CompareRequest {
  return check(compareRequestContract(), data, 'compare request');
}

export function parseExtractRequest(data: unknown): ExtractRequest {
  return check(extractRequestContract(), data, 'extract request');
}

export function parseParseRequest(data: unknown): ParseRequest {
  return check(parseRequestContract(), data, 'parse request');
}

/**
 * Validate decoded JSON quote rows: an array of objects.
 */
export function validateTabularRows(data: unknown): ValidationResult {
  const validate = tabularRowsContract();
  if (validate(data)) {
    return { valid: true };
  }
  return { valid: false, errors: formatErrors(validate.errors) };
}
