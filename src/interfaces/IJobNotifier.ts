/**
 * @fileoverview Interface for job state-change observers.
 *
 * @module interfaces/IJobNotifier
 */

import type { JobSnapshot } from '../types/job';

/**
 * The part of a job a notifier gets to see.
 */
export interface NotifiableJob {
  readonly id: string;
  toSnapshot(): JobSnapshot;
}

/**
 * Observer invoked after every state-changing job operation.
 *
 * Notifiers are called in registration order. A notifier that throws is
 * logged by the dispatcher and does not stop the others.
 *
 * @example
 * ```typescript
 * const auditNotifier: IJobNotifier = {
 *   notify(job) { audit.push(job.toSnapshot().status); },
 * };
 * ```
 */
export interface IJobNotifier {
  notify(job: NotifiableJob): void | Promise<void>;
}
