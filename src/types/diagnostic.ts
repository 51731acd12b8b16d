/**
 * @fileoverview Diagnostic entry types.
 *
 * A diagnostic is an append-only, severity-tagged audit record owned by one
 * job and optionally scoped to a stage and step.
 *
 * @module types/diagnostic
 */

import type { JsonObject } from './job';

export type Severity = 'INFO' | 'WARNING' | 'CRITICAL';

export const SEVERITIES: readonly Severity[] = ['INFO', 'WARNING', 'CRITICAL'];

export interface DiagnosticEntry {
  id: string;
  jobId: string;
  severity: Severity;
  /** Unix timestamp in milliseconds */
  createdAt: number;
  message: string;
  details: JsonObject | null;
  stage: string | null;
  step: string | null;
}

/**
 * Fields supplied by callers; id, job and timestamp are filled in by the recorder.
 */
export interface DiagnosticInput {
  severity?: Severity;
  message: string;
  details?: JsonObject | null;
  stage?: string | null;
  step?: string | null;
}

export interface DiagnosticFilter {
  severity?: Severity;
  stage?: string;
  step?: string;
}
