/**
 * @fileoverview Job repository.
 *
 * Entry point for callers outside a running job: creates jobs from
 * untrusted input, loads stored jobs as their registered class, and
 * forwards cancel requests.
 *
 * @module job/repository
 */

import type { IDiagnosticStore } from '../interfaces/IDiagnosticStore';
import type { IJobNotifier } from '../interfaces/IJobNotifier';
import type { IJobStore } from '../interfaces/IJobStore';
import type { ILogger } from '../interfaces/ILogger';
import type { Clock, JobFilter, JobSnapshot } from '../types/job';
import { Logger } from '../core/logger';
import { parseJobInit } from '../validation/validator';
import { JobNotFoundError } from './errors';
import type { JobEventEmitter } from './jobEvents';
import type { JobRecord, JobRecordDeps } from './jobRecord';
import type { JobRunner, JobRunOptions, JobRunResult } from './jobRunner';
import { StoreUpdateNotifier } from './notifiers';
import type { JobTypeRegistry } from './registry';

export interface JobRepositoryOptions {
  store: IJobStore;
  registry: JobTypeRegistry;
  diagnosticStore?: IDiagnosticStore;
  /** Run after the store notifier on every job this repository builds */
  notifiers?: readonly IJobNotifier[];
  /** Receives transition and deletion events */
  events?: JobEventEmitter;
  runner?: JobRunner;
  clock?: Clock;
  defaultTtlSeconds?: number;
  logger?: ILogger;
}

export class JobRepository {
  private readonly log: ILogger;

  constructor(private readonly options: JobRepositoryOptions) {
    this.log = options.logger ?? Logger.for('jobs');
  }

  /**
   * Validate `input`, build a job of `type` and store it as PENDING.
   *
   * @throws JobValidationError for malformed input
   * @throws UnknownJobTypeError when `type` is not registered
   * @throws DuplicateJobError when the input carries an id already stored
   */
  async create(type: string, input: unknown): Promise<JobRecord> {
    const init = parseJobInit(input);
    const job = this.options.registry.create(type, { ...init, type }, this.deps());
    await this.options.store.create(job.toSnapshot());
    this.attach(job);
    this.log.info(`Created job ${job.id} (${type})`, { createdBy: job.createdBy });
    return job;
  }

  /**
   * Load a stored job as its registered class.
   *
   * @throws JobNotFoundError when no job has this id
   */
  async get(id: string): Promise<JobRecord> {
    const job = await this.find(id);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    return job;
  }

  async find(id: string): Promise<JobRecord | undefined> {
    const snapshot = await this.options.store.get(id);
    if (!snapshot) {
      return undefined;
    }
    const job = this.options.registry.create(snapshot.type, snapshot, this.deps());
    this.attach(job);
    return job;
  }

  /** Stored snapshots, oldest first. */
  list(filter?: JobFilter): Promise<JobSnapshot[]> {
    return this.options.store.list(filter);
  }

  /**
   * Mark a stored job CANCEL_REQUESTED. A run picks this up between
   * acknowledge and act.
   */
  async requestCancel(id: string): Promise<JobRecord> {
    const job = await this.get(id);
    await job.requestCancel();
    this.log.info(`Cancel requested for job ${id}`);
    return job;
  }

  /** Load and run a stored job. */
  async run(id: string, options?: JobRunOptions): Promise<JobRunResult> {
    const job = await this.get(id);
    return job.run(options);
  }

  /**
   * Remove a job and its diagnostics.
   *
   * @returns whether the job existed
   */
  async delete(id: string): Promise<boolean> {
    const deleted = await this.options.store.delete(id);
    if (deleted) {
      this.options.events?.emitJobDeleted(id);
      this.log.debug(`Deleted job ${id}`);
    }
    return deleted;
  }

  private deps(): JobRecordDeps {
    return {
      store: this.options.store,
      diagnosticStore: this.options.diagnosticStore,
      notifiers: [new StoreUpdateNotifier(this.options.store), ...(this.options.notifiers ?? [])],
      runner: this.options.runner,
      clock: this.options.clock,
      defaultTtlSeconds: this.options.defaultTtlSeconds,
    };
  }

  private attach(job: JobRecord): void {
    const events = this.options.events;
    if (events) {
      job.onTransition(event => events.emitJobTransition(event));
    }
  }
}
