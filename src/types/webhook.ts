/**
 * @fileoverview Webhook configuration and event types.
 *
 * Webhooks let a local process learn that a job finished. For security,
 * webhooks are restricted to localhost URLs only.
 *
 * @module types/webhook
 */

import type { JobStatus } from './job';

export const DEFAULT_WEBHOOK_TIMEOUT_MS = 10_000;

/**
 * Events that can trigger webhook notifications.
 */
export type WebhookEvent = 'job_updated' | 'job_complete' | 'job_failed';

/**
 * Configuration for webhook notifications.
 *
 * @example
 * ```typescript
 * const webhook: WebhookConfig = {
 *   url: 'http://localhost:8080/callback',
 *   events: ['job_complete', 'job_failed'],
 *   headers: { 'X-Token': 'test-secret' }
 * };
 * ```
 */
export interface WebhookConfig {
  /**
   * Localhost URL to POST notifications to.
   * Must be localhost, 127.0.0.1, ::1, or 127.x.x.x.
   */
  url: string;

  /**
   * Events to subscribe to. Defaults to `job_complete` and `job_failed`.
   */
  events?: WebhookEvent[];

  /** Additional HTTP headers to send with webhook requests. */
  headers?: Record<string, string>;

  /** Milliseconds a delivery may take. Defaults to {@link DEFAULT_WEBHOOK_TIMEOUT_MS}. */
  timeoutMs?: number;
}

/**
 * Payload sent to webhook endpoints.
 */
export interface WebhookPayload {
  event: WebhookEvent;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  job: {
    id: string;
    type: string;
    status: JobStatus;
    uiStatus: string;
    /** Percentage 0-100 */
    progress: number;
    reason: string | null;
    /** Seconds between creation and the last update */
    duration: number;
  };
}
