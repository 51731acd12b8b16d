/**
 * @fileoverview Interface for diagnostic persistence.
 *
 * Diagnostics are append-only: there is no update or per-entry delete.
 *
 * @module interfaces/IDiagnosticStore
 */

import type { DiagnosticEntry } from '../types/diagnostic';

export interface IDiagnosticStore {
  append(entry: DiagnosticEntry): Promise<void>;

  /** Entries for one job, oldest first. */
  listForJob(jobId: string): Promise<DiagnosticEntry[]>;
}
