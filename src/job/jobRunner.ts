/**
 * @fileoverview Job run loop.
 *
 * Sequences a single run of a job:
 *
 * 1. acknowledge (REQUEST_ACK)
 * 2. cancellation check against the store; a requested cancel ends the run
 *    as CANCELED without calling `act()`
 * 3. RUNNING, then `act()` (or `actResume()`)
 * 4. classification of whatever `act()` threw; a clean return ends in
 *    SUCCESS, or CANCELED when a cancel was requested during the run
 * 5. post-hooks, with `finalize()` called exactly once even when
 *    classification fails
 *
 * The outcome is decided only by what `act()` throws. Diagnostics are an
 * audit trail and are never scanned to decide it.
 *
 * @module job/jobRunner
 */

import type { ILogger } from '../interfaces/ILogger';
import type { JobStatus } from '../types/job';
import { isBad, isGood, isTerminal } from '../types/job';
import { Logger } from '../core/logger';
import type { JobRecord } from './jobRecord';
import {
  InvalidTransitionError,
  JobCanceledError,
  JobStateError,
  errorMessage,
  isFailureError,
} from './errors';

export const CANCELED_BEFORE_START = 'Cancel requested before start';
export const CANCELED_DURING_RUN = 'Cancel requested during run';

export interface JobRunOptions {
  /** Call `actResume()` instead of `act()` */
  resume?: boolean;
}

export interface JobRunResult {
  jobId: string;
  status: JobStatus;
  uiStatus: string;
  /** False when the run was canceled before `act()` */
  actInvoked: boolean;
  /** What `act()` threw, if anything */
  error?: unknown;
}

export class JobRunner {
  constructor(private readonly log: ILogger = Logger.for('job-runner')) {}

  /**
   * Run `job` once.
   *
   * Errors from `act()`, from classification and from the post-hooks are
   * absorbed into the job's status; only a failure to acknowledge rejects.
   *
   * @throws InvalidTransitionError when the job is already terminal
   */
  async run(job: JobRecord, options: JobRunOptions = {}): Promise<JobRunResult> {
    await job.acknowledge();
    this.log.info(`Job ${job.id} (${job.type}) acknowledged`);

    let actInvoked = false;
    let failure: unknown;
    let threw = false;
    try {
      if (await job.isCancelRequested()) {
        this.log.info(`Job ${job.id} canceled before start`);
        await job.cancel({ raise: false, reason: CANCELED_BEFORE_START });
      } else {
        await job.markRunning();
        actInvoked = true;
        if (options.resume) {
          await job.actResume();
        } else {
          await job.act();
        }
      }
    } catch (error) {
      threw = true;
      failure = error;
    }

    try {
      await this.classify(job, threw, failure);
    } finally {
      await this.processPostHooks(job);
    }

    const result: JobRunResult = {
      jobId: job.id,
      status: job.status,
      uiStatus: job.uiStatus,
      actInvoked,
    };
    if (threw) {
      result.error = failure;
    }
    this.log.info(`Job ${job.id} finished: ${job.status}`);
    return result;
  }

  private async classify(job: JobRecord, threw: boolean, error: unknown): Promise<void> {
    try {
      if (!threw) {
        if (job.status === 'CANCEL_REQUESTED') {
          this.log.info(`Job ${job.id} returned with a cancel pending`);
          await job.cancel({ raise: false, reason: CANCELED_DURING_RUN });
        } else if (!isTerminal(job.status)) {
          await job.succeed();
        }
        return;
      }

      const reason = errorMessage(error);
      if (isFailureError(error)) {
        this.log.warn(`Job ${job.id} failed: ${reason}`);
        if (job.status !== 'FAILED') {
          await job.fail({ raise: false, reason });
        }
      } else if (error instanceof JobCanceledError) {
        this.log.info(`Job ${job.id} canceled: ${reason}`);
        if (job.status !== 'CANCELED') {
          await job.cancel({ raise: false, reason });
        }
      } else if (error instanceof JobStateError) {
        this.log.warn(`Job ${job.id} raised ${error.name}: ${reason}`);
      } else {
        this.log.error(`Job ${job.id} errored`, error);
        await job.markErrored(reason);
      }
    } catch (classifyError) {
      if (classifyError instanceof InvalidTransitionError) {
        this.log.warn(`Job ${job.id} keeps status ${job.status}: ${classifyError.message}`);
        return;
      }
      this.log.error(`Classifying the outcome of job ${job.id} failed`, classifyError);
    }
  }

  private async processPostHooks(job: JobRecord): Promise<void> {
    try {
      try {
        if (isGood(job.status)) {
          await job.onSuccess();
        }
        if (isBad(job.status)) {
          await job.onFailure();
        }
      } finally {
        await job.finalize();
      }
    } catch (error) {
      this.log.error(`Post-run hooks failed for job ${job.id}`, error);
      await job.succeedWithWarning(true);
      try {
        await job.diagnostics.warning(`Post-run hooks failed: ${errorMessage(error)}`);
      } catch (recordError) {
        this.log.error(`Recording the post-run hook failure for job ${job.id} failed`, recordError);
      }
    }
  }
}
