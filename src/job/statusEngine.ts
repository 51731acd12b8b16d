/**
 * @fileoverview Job Status Engine
 *
 * The single source of truth for a job's status.
 *
 * Key Principles:
 * - Every status change goes through {@link JobStatusEngine.updateStatus}
 * - Invalid transitions are rejected (not silently ignored)
 * - The UI status follows the fixed mapping unless set explicitly
 * - `updatedAt` is refreshed on every change, including same-status updates
 * - Notification is the caller's job; the engine only emits `transition`
 *
 * @module job/statusEngine
 */

import { EventEmitter } from 'events';
import type { Clock, JobStatus, JobTransitionEvent } from '../types/job';
import { isTerminal, isValidTransition, uiStatusFor } from '../types/job';
import { InvalidTransitionError } from './errors';
import { Logger } from '../core/logger';

const log = Logger.for('job-state');

export interface StatusUpdateOptions {
  /** Explicit UI text; overrides the mapping */
  uiStatus?: string;
  /** Skip the transition table. Reserved for the run loop's post-hook demotion. */
  force?: boolean;
  /** Carried on the transition event */
  reason?: string;
}

export interface StatusState {
  status: JobStatus;
  uiStatus: string;
  updatedAt: number;
}

/**
 * Events emitted by the status engine
 */
export interface StatusEngineEvents {
  'transition': (event: JobTransitionEvent) => void;
}

/**
 * Status state machine for a single job.
 *
 * @example
 * ```typescript
 * const engine = new JobStatusEngine('job-1');
 * engine.on('transition', (evt) => console.log(`${evt.from} → ${evt.to}`));
 * engine.updateStatus('REQUEST_ACK');
 * engine.uiStatus; // 'Acknowledged'
 * ```
 */
export class JobStatusEngine extends EventEmitter {
  private state: StatusState;

  constructor(
    private readonly jobId: string,
    initial?: Partial<StatusState>,
    private readonly clock: Clock = Date.now,
  ) {
    super();
    const status = initial?.status ?? 'PENDING';
    this.state = {
      status,
      uiStatus: initial?.uiStatus ?? uiStatusFor(status) ?? '',
      updatedAt: initial?.updatedAt ?? this.clock(),
    };
  }

  get status(): JobStatus {
    return this.state.status;
  }

  get uiStatus(): string {
    return this.state.uiStatus;
  }

  get updatedAt(): number {
    return this.state.updatedAt;
  }

  get isTerminal(): boolean {
    return isTerminal(this.state.status);
  }

  on<E extends keyof StatusEngineEvents>(event: E, listener: StatusEngineEvents[E]): this {
    return super.on(event, listener);
  }

  /**
   * Move the job to `status`.
   *
   * @throws InvalidTransitionError when the transition table rejects the change
   */
  updateStatus(status: JobStatus, options: StatusUpdateOptions = {}): void {
    const from = this.state.status;
    if (!options.force && !isValidTransition(from, status)) {
      log.warn(`Invalid transition rejected: ${this.jobId} ${from} -> ${status}`);
      throw new InvalidTransitionError(this.jobId, from, status);
    }

    this.state.status = status;
    const uiStatus = options.uiStatus ?? uiStatusFor(status);
    if (uiStatus !== undefined) {
      this.state.uiStatus = uiStatus;
    }
    this.touch();

    log.debug(`Job transition: ${this.jobId} ${from} -> ${status}`, {
      forced: options.force ?? false,
      reason: options.reason,
    });

    const event: JobTransitionEvent = {
      jobId: this.jobId,
      from,
      to: status,
      uiStatus: this.state.uiStatus,
      timestamp: this.state.updatedAt,
    };
    if (options.reason !== undefined) {
      event.reason = options.reason;
    }
    this.emit('transition', event);
  }

  updateUiStatus(uiStatus: string): void {
    this.state.uiStatus = uiStatus;
    this.touch();
  }

  touch(): void {
    this.state.updatedAt = this.clock();
  }

  /**
   * Load persisted values as-is: no validation, no event.
   */
  restore(state: StatusState): void {
    this.state = { ...state };
  }

  toState(): StatusState {
    return { ...this.state };
  }
}
