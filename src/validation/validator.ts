/**
 * @fileoverview Input validation using Ajv
 *
 * Strict JSON Schema validation for job creation input, stored snapshots,
 * and job-type payloads. Everything is treated as untrusted and validated
 * before it reaches a job record.
 *
 * @module validation/validator
 */

import Ajv, { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { diagnosticEntrySchema, jobInitSchema, jobSnapshotSchema } from './schemas';
import type { JobRecordInit, JobSnapshot } from '../types/job';
import type { DiagnosticEntry } from '../types/diagnostic';
import { JobValidationError } from '../job/errors';

// ============================================================================
// VALIDATOR SINGLETON
// ============================================================================

/**
 * Singleton Ajv instance configured for strict validation.
 *
 * - allErrors: report every problem, not just the first
 * - allowUnionTypes: `type: ['string', 'null']`
 * - useDefaults / coerceTypes off: input is never modified
 */
const ajv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
  removeAdditional: false,
  useDefaults: false,
  coerceTypes: false,
  verbose: true,
});

const validateInitFn = ajv.compile<JobRecordInit>(jobInitSchema);
const validateSnapshotFn = ajv.compile<JobSnapshot>(jobSnapshotSchema);
const validateDiagnosticFn = ajv.compile<DiagnosticEntry>(diagnosticEntrySchema);

// ============================================================================
// VALIDATION RESULT
// ============================================================================

export interface ValidationResult {
  valid: boolean;
  /** Formatted error message if invalid */
  error?: string;
  /** Raw Ajv errors for debugging */
  errors?: ErrorObject[];
}

// ============================================================================
// ERROR FORMATTING
// ============================================================================

/**
 * Format Ajv errors into a readable, de-duplicated message.
 */
export function formatErrors(errors: ErrorObject[] | null | undefined, subject: string): string {
  if (!errors || errors.length === 0) {
    return `Validation failed for ${subject} (no details available)`;
  }

  const messages: string[] = [];
  const seen = new Set<string>();

  for (const err of errors) {
    const path = err.instancePath || '/';

    const key = `${path}:${err.keyword}`;
    if (seen.has(key)) {continue;}
    seen.add(key);

    switch (err.keyword) {
      case 'required':
        messages.push(`Missing required field '${err.params.missingProperty}' at ${path}`);
        break;
      case 'additionalProperties':
        messages.push(`Unknown property '${err.params.additionalProperty}' at ${path}`);
        break;
      case 'type':
        messages.push(`Expected ${err.params.type} at ${path}, got ${err.data === null ? 'null' : typeof err.data}`);
        break;
      case 'pattern':
        messages.push(`Invalid format at ${path}: '${String(err.data)}'. Must match pattern: ${err.params.pattern}`);
        break;
      case 'enum':
        messages.push(`Invalid value at ${path}: '${String(err.data)}'`);
        break;
      case 'minLength':
        messages.push(`Value at ${path} is too short (min ${err.params.limit} chars)`);
        break;
      case 'maxLength':
        messages.push(`Value at ${path} is too long (max ${err.params.limit} chars)`);
        break;
      case 'minimum':
        messages.push(`Value at ${path} is too small (min ${err.params.limit})`);
        break;
      case 'maximum':
        messages.push(`Value at ${path} is too large (max ${err.params.limit})`);
        break;
      default:
        messages.push(`${err.keyword} error at ${path}: ${err.message ?? 'invalid'}`);
    }
  }

  const displayed = messages.slice(0, 5);
  const remaining = messages.length - displayed.length;

  let result = `Invalid ${subject}:\n- ${displayed.join('\n- ')}`;
  if (remaining > 0) {
    result += `\n... and ${remaining} more error(s)`;
  }
  return result;
}

function toResult<T>(validate: ValidateFunction<T>, input: unknown, subject: string): ValidationResult {
  if (validate(input)) {
    return { valid: true };
  }
  const errors = validate.errors ? [...validate.errors] : [];
  return { valid: false, error: formatErrors(errors, subject), errors };
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Validate job creation input.
 *
 * @example
 * ```ts
 * const result = validateJobInit(body);
 * if (!result.valid) {
 *   throw new JobValidationError(result.error);
 * }
 * ```
 */
export function validateJobInit(input: unknown): ValidationResult {
  return toResult(validateInitFn, input, 'job input');
}

/**
 * @throws JobValidationError when the input does not match the schema
 */
export function parseJobInit(input: unknown): JobRecordInit {
  if (validateInitFn(input)) {
    return input;
  }
  throw new JobValidationError(formatErrors(validateInitFn.errors, 'job input'));
}

/**
 * @throws JobValidationError when the snapshot does not match the schema
 */
export function parseJobSnapshot(input: unknown): JobSnapshot {
  if (validateSnapshotFn(input)) {
    return input;
  }
  throw new JobValidationError(formatErrors(validateSnapshotFn.errors, 'job snapshot'));
}

/**
 * @throws JobValidationError when the entry does not match the schema
 */
export function parseDiagnosticEntry(input: unknown): DiagnosticEntry {
  if (validateDiagnosticFn(input)) {
    return input;
  }
  throw new JobValidationError(formatErrors(validateDiagnosticFn.errors, 'diagnostic entry'));
}

/**
 * Compile a schema for a job type's payload.
 *
 * @returns a parser that returns the typed payload or throws JobValidationError
 */
export function compilePayloadParser<T>(schema: SchemaObject, subject: string): (input: unknown) => T {
  const validate = ajv.compile<T>(schema);
  return (input: unknown): T => {
    if (validate(input)) {
      return input;
    }
    throw new JobValidationError(formatErrors(validate.errors, subject));
  };
}
