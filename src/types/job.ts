/**
 * @fileoverview Job status model and record shapes.
 *
 * This module contains:
 * - The status enumeration and its fixed UI text mapping
 * - Status sets (terminal, intermediate, good, bad)
 * - The transition table enforced by the status engine
 * - The persisted job snapshot and creation input
 *
 * The status members and UI texts are an external contract: anything that
 * surfaces job state relies on them.
 *
 * @module types/job
 */

/**
 * Possible states of a job's lifecycle.
 */
export type JobStatus =
  | 'PENDING'
  | 'REQUEST_ACK'
  | 'RUNNING'
  | 'FAILED'
  | 'ERRORED'
  | 'SUCCESS'
  | 'SUCCESS_WITH_WARNING'
  | 'CANCEL_REQUESTED'
  | 'CANCELED'
  | 'PAUSED';

export const ALL_STATUSES: readonly JobStatus[] = [
  'PENDING',
  'REQUEST_ACK',
  'RUNNING',
  'FAILED',
  'ERRORED',
  'SUCCESS',
  'SUCCESS_WITH_WARNING',
  'CANCEL_REQUESTED',
  'CANCELED',
  'PAUSED',
];

/**
 * Human-readable text for each status. `PAUSED` deliberately has no entry:
 * moving to it without an explicit UI status keeps the previous text.
 */
export const UI_STATUS: Readonly<Partial<Record<JobStatus, string>>> = {
  PENDING: 'Pending',
  REQUEST_ACK: 'Acknowledged',
  RUNNING: 'Running',
  FAILED: 'Failed',
  ERRORED: 'Errored',
  SUCCESS: 'Success',
  SUCCESS_WITH_WARNING: 'Success with warning(s)',
  CANCEL_REQUESTED: 'Cancel requested',
  CANCELED: 'Canceled',
};

export const TERMINAL_STATUSES: readonly JobStatus[] = [
  'FAILED',
  'ERRORED',
  'SUCCESS',
  'SUCCESS_WITH_WARNING',
  'CANCELED',
];

export const INTERMEDIATE_STATUSES: readonly JobStatus[] = [
  'RUNNING',
  'CANCEL_REQUESTED',
  'REQUEST_ACK',
  'PAUSED',
];

export const GOOD_STATUSES: readonly JobStatus[] = ['SUCCESS', 'SUCCESS_WITH_WARNING'];

export const BAD_STATUSES: readonly JobStatus[] = ['FAILED', 'ERRORED'];

/**
 * Valid state transitions. Terminal statuses accept nothing but a
 * same-status update, which {@link isValidTransition} always allows.
 */
export const VALID_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  PENDING:              ['REQUEST_ACK', 'RUNNING', 'CANCEL_REQUESTED', 'CANCELED', 'PAUSED', 'FAILED', 'ERRORED'],
  REQUEST_ACK:          ['RUNNING', 'CANCEL_REQUESTED', 'CANCELED', 'FAILED', 'ERRORED', 'PAUSED'],
  RUNNING:              ['SUCCESS', 'SUCCESS_WITH_WARNING', 'FAILED', 'ERRORED', 'CANCEL_REQUESTED', 'CANCELED', 'PAUSED'],
  CANCEL_REQUESTED:     ['REQUEST_ACK', 'CANCELED', 'RUNNING', 'FAILED', 'ERRORED'],
  PAUSED:               ['REQUEST_ACK', 'RUNNING', 'SUCCESS', 'CANCEL_REQUESTED', 'CANCELED', 'FAILED', 'ERRORED'],
  FAILED:               [],  // Terminal
  ERRORED:              [],  // Terminal
  SUCCESS:              [],  // Terminal
  SUCCESS_WITH_WARNING: [],  // Terminal
  CANCELED:             [],  // Terminal
};

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === 'string' && ALL_STATUSES.some(status => status === value);
}

/**
 * Check if a status is terminal (no further transitions possible).
 */
export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isGood(status: JobStatus): boolean {
  return GOOD_STATUSES.includes(status);
}

export function isBad(status: JobStatus): boolean {
  return BAD_STATUSES.includes(status);
}

/**
 * Check if a state transition is allowed by the transition table.
 */
export function isValidTransition(from: JobStatus, to: JobStatus): boolean {
  return from === to || VALID_TRANSITIONS[from].includes(to);
}

/**
 * Mapped UI text for a status, or `undefined` when the status has none.
 */
export function uiStatusFor(status: JobStatus): string | undefined {
  return UI_STATUS[status];
}

/**
 * True once `now` has reached `createdAt + ttlSeconds`.
 */
export function isExpired(createdAt: number, ttlSeconds: number, now: number): boolean {
  return now >= createdAt + ttlSeconds * 1000;
}

/** Source of the current time in Unix milliseconds. */
export type Clock = () => number;

/** JSON-compatible value stored in job payloads and diagnostic details. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Persisted progress counters.
 */
export interface ProgressState {
  totalUnits: number;
  doneUnits: number;
  /** Pinned percentage (0-100), or null when computed from units */
  percentOverride: number | null;
}

/**
 * Everything the store keeps for one job.
 * Timestamps are Unix milliseconds.
 */
export interface JobSnapshot {
  id: string;
  /** Job kind discriminator, used to rehydrate the right class */
  type: string;
  status: JobStatus;
  uiStatus: string;
  /** Payload supplied at creation; never modified by the engine */
  data: JsonObject;
  createdBy: string;
  description: string | null;
  createdAt: number;
  updatedAt: number;
  /** Time to live in seconds */
  ttl: number;
  progress: ProgressState;
  /** Set by requestCancel(); survives the acknowledge transition */
  cancelRequested: boolean;
  /** Reason attached by the last fail/cancel/error transition */
  statusReason: string | null;
}

/**
 * Input for creating a job.
 */
export interface JobRecordInit {
  /** Generated (uuid v4) when omitted */
  id?: string;
  /** Defaults to the job class's own type */
  type?: string;
  data?: JsonObject;
  createdBy: string;
  description?: string | null;
  /** Seconds; defaults to three days */
  ttl?: number;
  /** Unix ms; defaults to now */
  createdAt?: number;
}

/**
 * Filter accepted by store listing operations.
 */
export interface JobFilter {
  type?: string;
  status?: JobStatus | readonly JobStatus[];
  createdBy?: string;
}

/**
 * Data emitted on every status change.
 */
export interface JobTransitionEvent {
  jobId: string;
  from: JobStatus;
  to: JobStatus;
  uiStatus: string;
  timestamp: number;
  reason?: string;
}
