/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for signature documents and API requests.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { ClassifyRequest, TemplateSignatureDocument } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
});

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  throw new Error(`Schema file not found: ${schemaName} (searched ${possiblePaths.join(', ')})`);
}

// Validators - compiled lazily on first use
let signatureValidator: ValidateFunction<TemplateSignatureDocument> | null = null;
let classifyRequestValidator: ValidateFunction<ClassifyRequest> | null = null;

function getSignatureValidator(): ValidateFunction<TemplateSignatureDocument> {
  if (!signatureValidator) {
    signatureValidator = ajv.compile<TemplateSignatureDocument>(
      loadSchema('template_signature.schema.json')
    );
  }
  return signatureValidator;
}

function getClassifyRequestValidator(): ValidateFunction<ClassifyRequest> {
  if (!classifyRequestValidator) {
    classifyRequestValidator = ajv.compile<ClassifyRequest>(
      loadSchema('classify_request.schema.json')
    );
  }
  return classifyRequestValidator;
}

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function describeErrors(validate: ValidateFunction<unknown>): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate a template signature document against template_signature.schema.json
 */
export function validateSignatureDocument(data: unknown): ValidationResult<TemplateSignatureDocument> {
  const validate = getSignatureValidator();

  if (validate(data)) {
    return { valid: true, value: data };
  }

  return { valid: false, errors: describeErrors(validate) };
}

/**
 * Validate a POST /classify body against classify_request.schema.json
 */
export function validateClassifyRequest(data: unknown): ValidationResult<ClassifyRequest> {
  const validate = getClassifyRequestValidator();

  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = describeErrors(validate);
  logger.warn('ClassifyRequest validation failed', { errors });
  return { valid: false, errors };
}
