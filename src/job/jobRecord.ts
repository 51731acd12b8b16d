/**
 * @fileoverview Job record.
 *
 * A job is a persisted unit of long-running work. The record owns one of
 * each engine part and exposes their operations by delegation:
 *
 * - {@link JobStatusEngine} - status and UI status
 * - {@link ProgressAccumulator} - done / total units
 * - {@link DiagnosticRecorder} - audit trail
 * - {@link StageStepTracker} - stage and step scopes
 * - {@link NotifierDispatcher} - persistence and observers
 *
 * Concrete job types extend {@link JobRecord}, set a static `jobType` and
 * implement {@link JobRecord.act}. Every other hook defaults to a no-op.
 *
 * @module job/jobRecord
 */

import { v4 as uuidv4 } from 'uuid';
import type { IDiagnosticStore } from '../interfaces/IDiagnosticStore';
import type { IJobNotifier, NotifiableJob } from '../interfaces/IJobNotifier';
import type { IJobStore } from '../interfaces/IJobStore';
import type { ILogger } from '../interfaces/ILogger';
import type {
  Clock,
  JobRecordInit,
  JobSnapshot,
  JobStatus,
  JobTransitionEvent,
  JsonObject,
} from '../types/job';
import { isBad, isExpired, isGood, isTerminal } from '../types/job';
import { DEFAULT_TTL_SECONDS } from '../core/engineConfig';
import { Logger } from '../core/logger';
import { cloneJson, deepFreeze } from '../core/utils';
import { parseJobInit } from '../validation/validator';
import { DiagnosticRecorder } from './diagnostics';
import { JobCanceledError, JobFailedError, JobNotFoundError, JobNotResumableError } from './errors';
import { NotifierDispatcher, StoreUpdateNotifier } from './notifiers';
import { ProgressAccumulator } from './progress';
import type { ExecutionFrame, StageStepHooks } from './stageTracker';
import { StageStepTracker } from './stageTracker';
import type { StatusUpdateOptions } from './statusEngine';
import { JobStatusEngine } from './statusEngine';
import type { JobRunOptions, JobRunResult } from './jobRunner';
import { JobRunner } from './jobRunner';

/**
 * Collaborators a job needs. Only the store is required.
 */
export interface JobRecordDeps {
  store: IJobStore;
  /** Where diagnostics are written; kept in memory only when omitted */
  diagnosticStore?: IDiagnosticStore;
  /** Defaults to a single {@link StoreUpdateNotifier} */
  notifiers?: readonly IJobNotifier[];
  clock?: Clock;
  logger?: ILogger;
  /** TTL for jobs created without one */
  defaultTtlSeconds?: number;
  /** Runner used by {@link JobRecord.run} */
  runner?: JobRunner;
}

/**
 * Options for the terminal operations {@link JobRecord.fail} and
 * {@link JobRecord.cancel}.
 */
export interface TerminateOptions {
  reason?: string;
  /** Throw the matching state error after the transition (default true) */
  raise?: boolean;
}

/**
 * Constructor shape of a concrete job type, used by the registry.
 */
export interface JobClass<J extends JobRecord = JobRecord> {
  readonly jobType: string;
  new (source: JobRecordInit | JobSnapshot, deps: JobRecordDeps): J;
}

function isSnapshot(source: JobRecordInit | JobSnapshot): source is JobSnapshot {
  return 'status' in source;
}

export abstract class JobRecord implements NotifiableJob, StageStepHooks {
  /** Type discriminator written to the store; subclasses override */
  static jobType = 'job';

  readonly id: string;
  readonly type: string;
  /** Creation payload, deep-frozen */
  readonly data: Readonly<JsonObject>;
  readonly createdBy: string;
  readonly description: string | null;
  readonly createdAt: number;
  /** Seconds */
  readonly ttl: number;

  readonly diagnostics: DiagnosticRecorder;
  readonly notifiers: NotifierDispatcher;

  protected readonly log: ILogger;
  protected readonly clock: Clock;

  private readonly store: IJobStore;
  private readonly statusEngine: JobStatusEngine;
  private readonly progress: ProgressAccumulator;
  private readonly tracker: StageStepTracker;
  private readonly runner: JobRunner;
  private cancelFlag: boolean;
  private reason: string | null;

  constructor(source: JobRecordInit | JobSnapshot, deps: JobRecordDeps) {
    this.clock = deps.clock ?? Date.now;
    this.log = deps.logger ?? Logger.for('jobs');
    this.store = deps.store;
    this.runner = deps.runner ?? new JobRunner();

    if (isSnapshot(source)) {
      this.id = source.id;
      this.type = source.type;
      this.data = deepFreeze(cloneJson(source.data));
      this.createdBy = source.createdBy;
      this.description = source.description;
      this.createdAt = source.createdAt;
      this.ttl = source.ttl;
      this.cancelFlag = source.cancelRequested;
      this.reason = source.statusReason;
      this.statusEngine = new JobStatusEngine(source.id, {
        status: source.status,
        uiStatus: source.uiStatus,
        updatedAt: source.updatedAt,
      }, this.clock);
      this.progress = new ProgressAccumulator(source.progress);
    } else {
      const init = parseJobInit(source);
      this.id = init.id ?? uuidv4();
      this.type = init.type ?? new.target.jobType;
      this.data = deepFreeze(cloneJson(init.data ?? {}));
      this.createdBy = init.createdBy;
      this.description = init.description ?? null;
      this.createdAt = init.createdAt ?? this.clock();
      this.ttl = init.ttl ?? deps.defaultTtlSeconds ?? DEFAULT_TTL_SECONDS;
      this.cancelFlag = false;
      this.reason = null;
      this.statusEngine = new JobStatusEngine(this.id, { updatedAt: this.createdAt }, this.clock);
      this.progress = new ProgressAccumulator();
    }

    this.diagnostics = new DiagnosticRecorder(this.id, deps.diagnosticStore, this.clock);
    this.notifiers = new NotifierDispatcher(deps.notifiers ?? [new StoreUpdateNotifier(deps.store)]);
    this.tracker = new StageStepTracker(this.diagnostics, this, () => this.addDoneUnits(1), this.clock);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Contract for concrete job types
  // ─────────────────────────────────────────────────────────────────────────

  /** The job's work. Use {@link stage} and {@link step} inside. */
  abstract act(): Promise<void>;

  /** Re-entry point for a previously interrupted job. */
  async actResume(): Promise<void> {
    throw new JobNotResumableError(this.type);
  }

  /** Called after the job ends in SUCCESS or SUCCESS_WITH_WARNING. */
  async onSuccess(): Promise<void> {}

  /** Called after the job ends in FAILED or ERRORED. */
  async onFailure(): Promise<void> {}

  /** Called exactly once at the end of every run. */
  async finalize(): Promise<void> {}

  onStageStart(_frame: ExecutionFrame): void | Promise<void> {}
  onStageSuccess(_frame: ExecutionFrame): void | Promise<void> {}
  onStageFail(_frame: ExecutionFrame): void | Promise<void> {}
  onStageEnd(_frame: ExecutionFrame): void | Promise<void> {}
  onStepStart(_frame: ExecutionFrame): void | Promise<void> {}
  onStepSuccess(_frame: ExecutionFrame): void | Promise<void> {}
  onStepFail(_frame: ExecutionFrame): void | Promise<void> {}
  onStepEnd(_frame: ExecutionFrame): void | Promise<void> {}

  // ─────────────────────────────────────────────────────────────────────────
  // Status
  // ─────────────────────────────────────────────────────────────────────────

  get status(): JobStatus {
    return this.statusEngine.status;
  }

  get uiStatus(): string {
    return this.statusEngine.uiStatus;
  }

  get updatedAt(): number {
    return this.statusEngine.updatedAt;
  }

  get cancelRequested(): boolean {
    return this.cancelFlag;
  }

  /** Reason attached by the last fail, cancel or error transition. */
  get statusReason(): string | null {
    return this.reason;
  }

  get isTerminal(): boolean {
    return isTerminal(this.status);
  }

  get isRunning(): boolean {
    return this.status === 'RUNNING';
  }

  get isFailed(): boolean {
    return isBad(this.status);
  }

  get isSuccessful(): boolean {
    return isGood(this.status);
  }

  /**
   * Change status without notifying. The named operations below notify.
   *
   * @throws InvalidTransitionError when the transition table rejects the change
   */
  updateStatus(status: JobStatus, uiStatus?: string): void {
    this.statusEngine.updateStatus(status, { uiStatus });
  }

  /** Refresh `updatedAt` without notifying. */
  touch(): void {
    this.statusEngine.touch();
  }

  /**
   * Subscribe to status transitions.
   *
   * @returns a function that removes the listener
   */
  onTransition(listener: (event: JobTransitionEvent) => void): () => void {
    this.statusEngine.on('transition', listener);
    return () => {
      this.statusEngine.off('transition', listener);
    };
  }

  /**
   * Claim the job for a run. Picks up a cancel request another process
   * stored since this record was loaded, so it is not overwritten.
   */
  async acknowledge(): Promise<void> {
    const stored = await this.store.get(this.id);
    if (stored?.cancelRequested) {
      this.cancelFlag = true;
    }
    await this.transition('REQUEST_ACK');
  }

  async markRunning(): Promise<void> {
    await this.transition('RUNNING');
  }

  async succeed(): Promise<void> {
    await this.transition('SUCCESS');
  }

  async succeedWithWarning(force = false): Promise<void> {
    await this.transition('SUCCESS_WITH_WARNING', { force });
  }

  async pause(): Promise<void> {
    await this.transition('PAUSED');
  }

  async markErrored(reason = ''): Promise<void> {
    await this.transition('ERRORED', { reason });
    await this.diagnostics.critical(`Job errored: ${reason}`);
  }

  /**
   * Move to FAILED.
   *
   * @throws JobFailedError after the transition unless `raise` is false
   */
  async fail({ reason = '', raise = true }: TerminateOptions = {}): Promise<void> {
    await this.transition('FAILED', { reason });
    await this.diagnostics.critical(`Job failed: ${reason}`);
    if (raise) {
      throw new JobFailedError(`Job failed, reason=${reason}`);
    }
  }

  /**
   * Move to CANCELED.
   *
   * @throws JobCanceledError after the transition unless `raise` is false
   */
  async cancel({ reason = '', raise = true }: TerminateOptions = {}): Promise<void> {
    await this.transition('CANCELED', { reason });
    await this.diagnostics.warning(`Job canceled: ${reason}`);
    if (raise) {
      throw new JobCanceledError(`Job canceled, reason=${reason}`);
    }
  }

  /**
   * Ask a pending or running job to stop. The run loop honours the request
   * between acknowledge and act, and again when act returns.
   */
  async requestCancel(): Promise<void> {
    await this.notifiers.applyAndNotify(this, () => {
      this.statusEngine.updateStatus('CANCEL_REQUESTED');
      this.cancelFlag = true;
    });
  }

  /**
   * @param refresh - reload lifecycle fields from the store first
   */
  async isCancelRequested(refresh = true): Promise<boolean> {
    if (refresh) {
      await this.refresh();
    }
    return this.status === 'CANCEL_REQUESTED' || this.cancelFlag;
  }

  /**
   * Cooperative cancellation point for long `act()` implementations.
   *
   * @throws JobCanceledError when a cancel was requested
   */
  async throwIfCancelRequested(): Promise<void> {
    if (await this.isCancelRequested()) {
      throw new JobCanceledError(`Job ${this.id} canceled by request`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Progress
  // ─────────────────────────────────────────────────────────────────────────

  get totalUnits(): number {
    return this.progress.totalUnits;
  }

  get doneUnits(): number {
    return this.progress.doneUnits;
  }

  get remainingUnits(): number {
    return this.progress.remainingUnits;
  }

  get percentProgress(): number {
    return this.progress.percentProgress;
  }

  /** Grow the expected work. Not notified; the next notifying change carries it. */
  addTotalUnits(units: number): void {
    this.progress.addTotalUnits(units);
  }

  async addDoneUnits(units: number, notify = true): Promise<void> {
    if (!notify) {
      this.progress.addDoneUnits(units);
      return;
    }
    await this.notifiers.applyAndNotify(this, () => this.progress.addDoneUnits(units));
  }

  async setPercentProgress(value: number): Promise<void> {
    await this.notifiers.applyAndNotify(this, () => this.progress.setPercentProgress(value));
  }

  async clearPercentOverride(): Promise<void> {
    await this.notifiers.applyAndNotify(this, () => this.progress.clearPercentOverride());
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Stages and steps
  // ─────────────────────────────────────────────────────────────────────────

  get currentStage(): string | null {
    return this.tracker.currentStage?.name ?? null;
  }

  get currentStep(): string | null {
    return this.tracker.currentStep?.name ?? null;
  }

  get currentStageData(): JsonObject | undefined {
    return this.tracker.currentStageData;
  }

  get currentStepData(): JsonObject | undefined {
    return this.tracker.currentStepData;
  }

  stage<T>(name: string, data: JsonObject, fn: () => Promise<T>): Promise<T> {
    return this.tracker.runStage(name, data, fn);
  }

  /** Run `fn` as a step; a step that returns normally counts one done unit. */
  step<T>(name: string, data: JsonObject, fn: () => Promise<T>): Promise<T> {
    return this.tracker.runStep(name, data, fn);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Persistence
  // ─────────────────────────────────────────────────────────────────────────

  /** Dispatch to every notifier (the store included, by default). */
  async notify(): Promise<void> {
    await this.notifiers.dispatch(this);
  }

  /** Create or update the stored snapshot directly. */
  async save(): Promise<void> {
    const existing = await this.store.get(this.id);
    if (existing) {
      await this.store.update(this.toSnapshot());
    } else {
      await this.store.create(this.toSnapshot());
    }
  }

  /**
   * Reload lifecycle fields from the store. Progress and data stay as they
   * are in memory.
   *
   * @throws JobNotFoundError when the job was never saved or has been deleted
   */
  async refresh(): Promise<void> {
    const latest = await this.store.get(this.id);
    if (!latest) {
      throw new JobNotFoundError(this.id);
    }
    this.statusEngine.restore({
      status: latest.status,
      uiStatus: latest.uiStatus,
      updatedAt: latest.updatedAt,
    });
    this.cancelFlag = latest.cancelRequested;
    this.reason = latest.statusReason;
  }

  get hasExpired(): boolean {
    return isExpired(this.createdAt, this.ttl, this.clock());
  }

  /** Alias of {@link hasExpired} for reapers. */
  get isStale(): boolean {
    return this.hasExpired;
  }

  toSnapshot(): JobSnapshot {
    return {
      id: this.id,
      type: this.type,
      status: this.status,
      uiStatus: this.uiStatus,
      data: cloneJson({ ...this.data }),
      createdBy: this.createdBy,
      description: this.description,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      ttl: this.ttl,
      progress: this.progress.toState(),
      cancelRequested: this.cancelFlag,
      statusReason: this.reason,
    };
  }

  toJSON(): JobSnapshot {
    return this.toSnapshot();
  }

  /**
   * Acknowledge, execute and finish this job.
   */
  run(options: JobRunOptions = {}): Promise<JobRunResult> {
    return this.runner.run(this, options);
  }

  private async transition(status: JobStatus, options: StatusUpdateOptions = {}): Promise<void> {
    await this.notifiers.applyAndNotify(this, () => {
      this.statusEngine.updateStatus(status, options);
      if (options.reason !== undefined) {
        this.reason = options.reason;
      }
    });
  }
}
