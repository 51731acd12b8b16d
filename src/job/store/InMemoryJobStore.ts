/**
 * @fileoverview In-memory job and diagnostic store.
 *
 * Used by tests and by engines that do not need jobs to outlive the
 * process. Snapshots are copied on the way in and out.
 *
 * @module job/store/InMemoryJobStore
 */

import type { IDiagnosticStore } from '../../interfaces/IDiagnosticStore';
import type { IJobStore } from '../../interfaces/IJobStore';
import type { DiagnosticEntry } from '../../types/diagnostic';
import type { JobFilter, JobSnapshot } from '../../types/job';
import { DuplicateJobError, JobNotFoundError } from '../errors';
import { byCreation, matchesFilter } from './filter';

export class InMemoryJobStore implements IJobStore, IDiagnosticStore {
  private jobs = new Map<string, JobSnapshot>();
  private diagnostics = new Map<string, DiagnosticEntry[]>();

  async create(snapshot: JobSnapshot): Promise<void> {
    if (this.jobs.has(snapshot.id)) {
      throw new DuplicateJobError(snapshot.id);
    }
    this.jobs.set(snapshot.id, structuredClone(snapshot));
  }

  async update(snapshot: JobSnapshot): Promise<void> {
    if (!this.jobs.has(snapshot.id)) {
      throw new JobNotFoundError(snapshot.id);
    }
    this.jobs.set(snapshot.id, structuredClone(snapshot));
  }

  async get(id: string): Promise<JobSnapshot | undefined> {
    const snapshot = this.jobs.get(id);
    return snapshot ? structuredClone(snapshot) : undefined;
  }

  async list(filter?: JobFilter): Promise<JobSnapshot[]> {
    return [...this.jobs.values()]
      .filter(snapshot => matchesFilter(snapshot, filter))
      .sort(byCreation)
      .map(snapshot => structuredClone(snapshot));
  }

  async delete(id: string): Promise<boolean> {
    this.diagnostics.delete(id);
    return this.jobs.delete(id);
  }

  /**
   * Snapshot both maps and put them back if `fn` throws. Nested scopes
   * roll back to their own starting point.
   */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const jobs = new Map(this.jobs);
    const diagnostics = new Map([...this.diagnostics].map(([id, entries]) => [id, [...entries]]));
    try {
      return await fn();
    } catch (error) {
      this.jobs = jobs;
      this.diagnostics = diagnostics;
      throw error;
    }
  }

  async append(entry: DiagnosticEntry): Promise<void> {
    const entries = this.diagnostics.get(entry.jobId) ?? [];
    entries.push(structuredClone(entry));
    this.diagnostics.set(entry.jobId, entries);
  }

  async listForJob(jobId: string): Promise<DiagnosticEntry[]> {
    return (this.diagnostics.get(jobId) ?? []).map(entry => structuredClone(entry));
  }

  /** Number of stored jobs. */
  get size(): number {
    return this.jobs.size;
  }

  clear(): void {
    this.jobs.clear();
    this.diagnostics.clear();
  }
}
