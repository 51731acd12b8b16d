import type { JobFilter, JobSnapshot } from '../../types/job';

/**
 * True when `snapshot` satisfies every field set on `filter`.
 */
export function matchesFilter(snapshot: JobSnapshot, filter: JobFilter = {}): boolean {
  if (filter.type !== undefined && snapshot.type !== filter.type) {
    return false;
  }
  if (filter.createdBy !== undefined && snapshot.createdBy !== filter.createdBy) {
    return false;
  }
  if (filter.status !== undefined) {
    const statuses = typeof filter.status === 'string' ? [filter.status] : filter.status;
    if (!statuses.includes(snapshot.status)) {
      return false;
    }
  }
  return true;
}

/** Oldest first, by creation time then id. */
export function byCreation(a: JobSnapshot, b: JobSnapshot): number {
  return a.createdAt - b.createdAt || a.id.localeCompare(b.id);
}
