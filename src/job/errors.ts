/**
 * @fileoverview Job error taxonomy.
 *
 * State errors ({@link JobStateError} and subclasses) are how a running job
 * tells the run loop how it ended. The run loop classifies them:
 *
 * - {@link JobFailedError}, {@link JobStageFailedError}, {@link JobStepFailedError} → FAILED
 * - {@link JobCanceledError} → CANCELED
 * - any other {@link JobStateError} → logged, status unchanged
 * - anything else → ERRORED
 *
 * The remaining errors are raised by the repository, store and validator.
 *
 * @module job/errors
 */

import type { JobStatus } from '../types/job';

/**
 * Base class for job state errors.
 */
export class JobStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class JobFailedError extends JobStateError {}

export class JobStageFailedError extends JobStateError {}

export class JobStepFailedError extends JobStateError {}

export class JobCanceledError extends JobStateError {}

/**
 * Raised by the status engine when the transition table rejects a change.
 */
export class InvalidTransitionError extends JobStateError {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`Invalid transition for job ${jobId}: ${from} -> ${to}`);
  }
}

/**
 * Raised when job input or a stored snapshot fails schema validation.
 */
export class JobValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JobValidationError';
  }
}

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

export class DuplicateJobError extends Error {
  constructor(readonly jobId: string) {
    super(`Job already exists: ${jobId}`);
    this.name = 'DuplicateJobError';
  }
}

export class UnknownJobTypeError extends Error {
  constructor(readonly jobType: string) {
    super(`No job class registered for type '${jobType}'`);
    this.name = 'UnknownJobTypeError';
  }
}

export class JobNotResumableError extends Error {
  constructor(readonly jobType: string) {
    super(`Job type '${jobType}' does not implement actResume()`);
    this.name = 'JobNotResumableError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for the errors that mark a job FAILED.
 */
export function isFailureError(error: unknown): error is JobFailedError | JobStageFailedError | JobStepFailedError {
  return (
    error instanceof JobFailedError ||
    error instanceof JobStageFailedError ||
    error instanceof JobStepFailedError
  );
}
