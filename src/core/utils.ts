/**
 * @fileoverview JSON payload helpers.
 *
 * @module core/utils
 */

import type { JsonValue } from '../types/job';

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

/** Freeze a JSON value and everything inside it. */
export function deepFreeze<T extends JsonValue>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
