/**
 * @fileoverview Job engine exports.
 *
 * @module job
 */

export * from './errors';
export { ProgressAccumulator } from './progress';
export { DiagnosticRecorder } from './diagnostics';
export { JobStatusEngine } from './statusEngine';
export type { StatusEngineEvents, StatusState, StatusUpdateOptions } from './statusEngine';
export { StageStepTracker } from './stageTracker';
export type { ExecutionFrame, FrameKind, StageStepHooks, StepCompletedCallback } from './stageTracker';
export { NotifierDispatcher, StoreUpdateNotifier } from './notifiers';
export { EventNotifier, JobEventEmitter } from './jobEvents';
export type { JobEvents } from './jobEvents';
export { JobRecord } from './jobRecord';
export type { JobClass, JobRecordDeps, TerminateOptions } from './jobRecord';
export { JobRunner, CANCELED_BEFORE_START } from './jobRunner';
export type { JobRunOptions, JobRunResult } from './jobRunner';
export { JobTypeRegistry } from './registry';
export type { JobFactory } from './registry';
export { JobRepository } from './repository';
export type { JobRepositoryOptions } from './repository';
export { StaleJobReaper } from './reaper';
export type { StaleJobReaperOptions } from './reaper';
export * from './store';
