/**
 * @fileoverview Notifier dispatch.
 *
 * Changing a job's state and propagating that change are kept apart: job
 * operations mutate fields, then {@link NotifierDispatcher.applyAndNotify}
 * fans the change out to every registered {@link IJobNotifier}. Persistence
 * is just the default notifier, so a job can drop it and keep observers, or
 * the reverse.
 *
 * @module job/notifiers
 */

import type { IJobNotifier, NotifiableJob } from '../interfaces/IJobNotifier';
import type { IJobStore } from '../interfaces/IJobStore';
import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';

/**
 * Ordered fan-out of state-change notifications.
 */
export class NotifierDispatcher {
  private readonly notifiers: IJobNotifier[];

  constructor(
    notifiers: readonly IJobNotifier[] = [],
    private readonly log: ILogger = Logger.for('notifier'),
  ) {
    this.notifiers = [...notifiers];
  }

  register(notifier: IJobNotifier): void {
    this.notifiers.push(notifier);
  }

  /**
   * @returns whether the notifier was registered
   */
  unregister(notifier: IJobNotifier): boolean {
    const index = this.notifiers.indexOf(notifier);
    if (index === -1) {
      return false;
    }
    this.notifiers.splice(index, 1);
    return true;
  }

  list(): readonly IJobNotifier[] {
    return [...this.notifiers];
  }

  /**
   * Call every notifier in registration order. A failing notifier is
   * logged and skipped.
   */
  async dispatch(job: NotifiableJob): Promise<void> {
    for (const notifier of this.notifiers) {
      try {
        await notifier.notify(job);
      } catch (error) {
        this.log.error(`Notifier ${notifier.constructor.name} failed for job ${job.id}`, error);
      }
    }
  }

  /**
   * Run a mutation, then dispatch, whether the mutation returned or threw.
   */
  async applyAndNotify<T>(job: NotifiableJob, mutation: () => T | Promise<T>): Promise<T> {
    try {
      return await mutation();
    } finally {
      await this.dispatch(job);
    }
  }
}

/**
 * Default notifier: writes the job's snapshot to the store.
 */
export class StoreUpdateNotifier implements IJobNotifier {
  constructor(private readonly store: IJobStore) {}

  async notify(job: NotifiableJob): Promise<void> {
    await this.store.update(job.toSnapshot());
  }
}
