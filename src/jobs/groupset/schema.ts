/**
 * @fileoverview Payload schemas for the groupset jobs.
 *
 * @module jobs/groupset/schema
 */

import type { SchemaObject } from 'ajv';
import { compilePayloadParser } from '../../validation/validator';

/** `'*'` selects every candidate. */
export const ALL = '*';

export type IdSelection = Array<number | typeof ALL>;

export interface GroupsetUpdateData {
  groupsetId: number;
  addUserIds?: IdSelection;
  removeUserIds?: IdSelection;
  addGroupIds?: IdSelection;
  removeGroupIds?: IdSelection;
}

export interface GroupsetDeleteData {
  groupsetId: number;
}

const idSelectionSchema: SchemaObject = {
  type: 'array',
  items: {
    anyOf: [
      { type: 'integer', minimum: 1 },
      { type: 'string', const: ALL },
    ],
  },
  maxItems: 10000,
};

export const groupsetUpdateSchema: SchemaObject = {
  type: 'object',
  properties: {
    groupsetId: { type: 'integer', minimum: 1 },
    addUserIds: idSelectionSchema,
    removeUserIds: idSelectionSchema,
    addGroupIds: idSelectionSchema,
    removeGroupIds: idSelectionSchema,
  },
  required: ['groupsetId'],
  additionalProperties: false,
};

export const groupsetDeleteSchema: SchemaObject = {
  type: 'object',
  properties: {
    groupsetId: { type: 'integer', minimum: 1 },
  },
  required: ['groupsetId'],
  additionalProperties: false,
};

export const parseGroupsetUpdateData = compilePayloadParser<GroupsetUpdateData>(groupsetUpdateSchema, 'groupset update data');

export const parseGroupsetDeleteData = compilePayloadParser<GroupsetDeleteData>(groupsetDeleteSchema, 'groupset delete data');
