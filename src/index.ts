/**
 * @fileoverview Package entry point.
 *
 * @module job-engine
 */

export * from './types';
export * from './interfaces';
export * from './core';
export * from './job';
export * from './validation';
export * from './notifications/webhookNotifier';
export * from './jobs/groupset';
export { createContainer, createJobEngine } from './composition';
export type { JobEngine, JobEngineOptions } from './composition';
