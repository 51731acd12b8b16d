/**
 * @fileoverview Diagnostic recorder.
 *
 * Append-only trail of severity-tagged entries for one job. Entries are
 * written through an {@link IDiagnosticStore} and mirrored in memory for
 * the lifetime of the recorder.
 *
 * The trail is an audit record only. The job's outcome is decided by the
 * run loop from the errors `act()` raises, never by scanning diagnostics.
 *
 * @module job/diagnostics
 */

import { v4 as uuidv4 } from 'uuid';
import type { IDiagnosticStore } from '../interfaces/IDiagnosticStore';
import type { DiagnosticEntry, DiagnosticFilter, DiagnosticInput, Severity } from '../types/diagnostic';
import type { Clock } from '../types/job';

export class DiagnosticRecorder {
  private readonly trail: DiagnosticEntry[] = [];

  constructor(
    private readonly jobId: string,
    private readonly store?: IDiagnosticStore,
    private readonly clock: Clock = Date.now,
  ) {}

  /**
   * Append an entry. Severity defaults to INFO.
   */
  async record(input: DiagnosticInput): Promise<DiagnosticEntry> {
    const entry: DiagnosticEntry = Object.freeze({
      id: uuidv4(),
      jobId: this.jobId,
      severity: input.severity ?? 'INFO',
      createdAt: this.clock(),
      message: input.message,
      details: input.details ?? null,
      stage: input.stage ?? null,
      step: input.step ?? null,
    });
    if (this.store) {
      await this.store.append(entry);
    }
    this.trail.push(entry);
    return entry;
  }

  info(message: string, scope: Omit<DiagnosticInput, 'message' | 'severity'> = {}): Promise<DiagnosticEntry> {
    return this.record({ ...scope, message, severity: 'INFO' });
  }

  warning(message: string, scope: Omit<DiagnosticInput, 'message' | 'severity'> = {}): Promise<DiagnosticEntry> {
    return this.record({ ...scope, message, severity: 'WARNING' });
  }

  critical(message: string, scope: Omit<DiagnosticInput, 'message' | 'severity'> = {}): Promise<DiagnosticEntry> {
    return this.record({ ...scope, message, severity: 'CRITICAL' });
  }

  /** Entries recorded through this recorder, oldest first. */
  get entries(): readonly DiagnosticEntry[] {
    return [...this.trail];
  }

  filter(filter: DiagnosticFilter): DiagnosticEntry[] {
    return this.trail.filter(entry =>
      (filter.severity === undefined || entry.severity === filter.severity) &&
      (filter.stage === undefined || entry.stage === filter.stage) &&
      (filter.step === undefined || entry.step === filter.step),
    );
  }

  hasSeverity(severity: Severity): boolean {
    return this.trail.some(entry => entry.severity === severity);
  }

  /**
   * Full trail from the store, including entries written by earlier runs.
   */
  async history(): Promise<DiagnosticEntry[]> {
    return this.store ? this.store.listForJob(this.jobId) : [...this.trail];
  }
}
