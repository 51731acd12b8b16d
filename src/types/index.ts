/**
 * @fileoverview Central export for shared types.
 *
 * @module types
 */

export * from './job';
export * from './diagnostic';
export * from './webhook';
