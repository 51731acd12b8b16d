/**
 * @fileoverview Interface for job persistence operations.
 *
 * The engine never talks to a storage technology directly. It needs:
 * - create / update-in-place / read-by-id for job snapshots
 * - listing and deletion for the repository and the reaper
 * - an all-or-nothing scope for compound writes
 *
 * @module interfaces/IJobStore
 */

import type { JobFilter, JobSnapshot } from '../types/job';

/**
 * Interface for persisting and retrieving job snapshots.
 *
 * Implementations must return copies: mutating a snapshot obtained from
 * the store must not change what the store holds.
 *
 * @example
 * ```typescript
 * const store: IJobStore = new InMemoryJobStore();
 * await store.create(job.toSnapshot());
 * const latest = await store.get(job.id);
 * ```
 */
export interface IJobStore {
  /**
   * Insert a new snapshot.
   * @throws DuplicateJobError when the id already exists
   */
  create(snapshot: JobSnapshot): Promise<void>;

  /**
   * Replace an existing snapshot.
   * @throws JobNotFoundError when the id does not exist
   */
  update(snapshot: JobSnapshot): Promise<void>;

  /** Latest snapshot, or `undefined` when the job does not exist. */
  get(id: string): Promise<JobSnapshot | undefined>;

  list(filter?: JobFilter): Promise<JobSnapshot[]>;

  /**
   * Remove a job and its diagnostics.
   * @returns whether anything was deleted
   */
  delete(id: string): Promise<boolean>;

  /**
   * Run `fn` so that every write it makes through this store either
   * commits together or is rolled back when `fn` throws.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;
}
