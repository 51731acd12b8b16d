/**
 * @fileoverview Job type registry.
 *
 * Maps the `type` stored with every snapshot to the class that knows how
 * to run it, so stored jobs can be rehydrated as the right subclass.
 *
 * @module job/registry
 */

import type { JobRecordInit, JobSnapshot } from '../types/job';
import { UnknownJobTypeError } from './errors';
import type { JobClass, JobRecord, JobRecordDeps } from './jobRecord';

export type JobFactory = (source: JobRecordInit | JobSnapshot, deps: JobRecordDeps) => JobRecord;

export class JobTypeRegistry {
  private readonly factories = new Map<string, JobFactory>();

  /**
   * Register a factory for `type`, replacing any earlier one.
   */
  register(type: string, factory: JobFactory): this {
    this.factories.set(type, factory);
    return this;
  }

  /**
   * Register a job class under its static `jobType`.
   */
  registerClass(jobClass: JobClass): this {
    return this.register(jobClass.jobType, (source, deps) => new jobClass(source, deps));
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  types(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * Build a record of `type` from creation input or a stored snapshot.
   *
   * @throws UnknownJobTypeError when nothing is registered for `type`
   */
  create(type: string, source: JobRecordInit | JobSnapshot, deps: JobRecordDeps): JobRecord {
    const factory = this.factories.get(type);
    if (!factory) {
      throw new UnknownJobTypeError(type);
    }
    return factory(source, deps);
  }
}
