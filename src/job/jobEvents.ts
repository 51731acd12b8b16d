/**
 * @fileoverview Job Event Emitter
 *
 * Typed event emitter for job state changes, plus the notifier that feeds
 * it. Used by in-process observers (dashboards, tests, the webhook bridge).
 *
 * @module job/jobEvents
 */

import { EventEmitter } from 'events';
import type { IJobNotifier, NotifiableJob } from '../interfaces/IJobNotifier';
import type { JobSnapshot, JobStatus, JobTransitionEvent } from '../types/job';
import { isTerminal } from '../types/job';

/**
 * Events emitted by the {@link JobEventEmitter}.
 *
 * Subscribe with `emitter.on('jobCompleted', handler)`.
 */
export interface JobEvents {
  'jobUpdated': (snapshot: JobSnapshot) => void;
  'jobCompleted': (snapshot: JobSnapshot, status: JobStatus) => void;
  'jobTransition': (event: JobTransitionEvent) => void;
  'jobDeleted': (jobId: string) => void;
}

/**
 * Typed event emitter for job state changes.
 */
export class JobEventEmitter extends EventEmitter {
  on<E extends keyof JobEvents>(event: E, listener: JobEvents[E]): this {
    return super.on(event, listener);
  }

  once<E extends keyof JobEvents>(event: E, listener: JobEvents[E]): this {
    return super.once(event, listener);
  }

  off<E extends keyof JobEvents>(event: E, listener: JobEvents[E]): this {
    return super.off(event, listener);
  }

  emitJobUpdated(snapshot: JobSnapshot): void {
    this.emit('jobUpdated', snapshot);
  }

  emitJobCompleted(snapshot: JobSnapshot, status: JobStatus): void {
    this.emit('jobCompleted', snapshot, status);
  }

  emitJobTransition(event: JobTransitionEvent): void {
    this.emit('jobTransition', event);
  }

  emitJobDeleted(jobId: string): void {
    this.emit('jobDeleted', jobId);
  }
}

/**
 * Notifier that republishes every job change on a {@link JobEventEmitter}.
 *
 * `jobCompleted` fires on the first notification that sees a terminal
 * status, and again if the job is later demoted to a different one.
 */
export class EventNotifier implements IJobNotifier {
  private readonly completed = new Map<string, JobStatus>();

  constructor(private readonly events: JobEventEmitter) {}

  notify(job: NotifiableJob): void {
    const snapshot = job.toSnapshot();
    this.events.emitJobUpdated(snapshot);
    if (isTerminal(snapshot.status) && this.completed.get(snapshot.id) !== snapshot.status) {
      this.completed.set(snapshot.id, snapshot.status);
      this.events.emitJobCompleted(snapshot, snapshot.status);
    }
  }
}
