/**
 * @fileoverview JSON Schema definitions for job input and stored snapshots.
 *
 * Used by Ajv to validate everything that enters the engine from outside:
 * creation input from callers and snapshots read back from disk.
 *
 * ⚠️ MAINTENANCE: When adding fields to `JobRecordInit` or `JobSnapshot`
 * (src/types/job.ts), add them here as well; both schemas reject unknown
 * properties.
 *
 * @module validation/schemas
 */

import type { SchemaObject } from 'ajv';
import { ALL_STATUSES } from '../types/job';

// ============================================================================
// SHARED DEFINITIONS
// ============================================================================

/**
 * Job ids: letters, digits, dot, underscore and hyphen, 1-128 characters,
 * not starting with a dot. Ids become directory names in the file store.
 */
export const JOB_ID_PATTERN = '^[A-Za-z0-9_-][A-Za-z0-9._-]{0,127}$';

/** Job types: dotted lowercase words such as `groupset.update`. */
export const JOB_TYPE_PATTERN = '^[a-z][a-z0-9_-]*(\\.[a-z][a-z0-9_-]*)*$';

const progressSchema: SchemaObject = {
  type: 'object',
  properties: {
    totalUnits: { type: 'integer', minimum: 0 },
    doneUnits: { type: 'integer', minimum: 0 },
    percentOverride: { type: ['number', 'null'], minimum: 0, maximum: 100 },
  },
  required: ['totalUnits', 'doneUnits', 'percentOverride'],
  additionalProperties: false,
};

// ============================================================================
// SCHEMAS
// ============================================================================

/**
 * Input accepted when creating a job.
 */
export const jobInitSchema: SchemaObject = {
  type: 'object',
  properties: {
    id: { type: 'string', pattern: JOB_ID_PATTERN },
    type: { type: 'string', pattern: JOB_TYPE_PATTERN, maxLength: 100 },
    data: { type: 'object' },
    createdBy: { type: 'string', minLength: 1, maxLength: 255 },
    description: { type: ['string', 'null'], maxLength: 10000 },
    ttl: { type: 'integer', minimum: 0 },
    createdAt: { type: 'integer', minimum: 0 },
  },
  required: ['createdBy'],
  additionalProperties: false,
};

/**
 * A persisted job snapshot.
 */
export const jobSnapshotSchema: SchemaObject = {
  type: 'object',
  properties: {
    id: { type: 'string', pattern: JOB_ID_PATTERN },
    type: { type: 'string', pattern: JOB_TYPE_PATTERN },
    status: { type: 'string', enum: [...ALL_STATUSES] },
    uiStatus: { type: 'string' },
    data: { type: 'object' },
    createdBy: { type: 'string' },
    description: { type: ['string', 'null'] },
    createdAt: { type: 'integer', minimum: 0 },
    updatedAt: { type: 'integer', minimum: 0 },
    ttl: { type: 'integer', minimum: 0 },
    progress: progressSchema,
    cancelRequested: { type: 'boolean' },
    statusReason: { type: ['string', 'null'] },
  },
  required: [
    'id', 'type', 'status', 'uiStatus', 'data', 'createdBy', 'description',
    'createdAt', 'updatedAt', 'ttl', 'progress', 'cancelRequested', 'statusReason',
  ],
  additionalProperties: false,
};

/**
 * A persisted diagnostic entry (one line of a diagnostics file).
 */
export const diagnosticEntrySchema: SchemaObject = {
  type: 'object',
  properties: {
    id: { type: 'string' },
    jobId: { type: 'string' },
    severity: { type: 'string', enum: ['INFO', 'WARNING', 'CRITICAL'] },
    createdAt: { type: 'integer', minimum: 0 },
    message: { type: 'string' },
    details: { type: ['object', 'null'] },
    stage: { type: ['string', 'null'] },
    step: { type: ['string', 'null'] },
  },
  required: ['id', 'jobId', 'severity', 'createdAt', 'message', 'details', 'stage', 'step'],
  additionalProperties: false,
};
