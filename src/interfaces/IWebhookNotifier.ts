/**
 * @fileoverview Interface for webhook notifications.
 *
 * Abstracts webhook delivery for testability: the HTTP call itself sits
 * behind {@link WebhookTransport}, so tests can record requests instead of
 * opening sockets.
 *
 * @module interfaces/IWebhookNotifier
 */

import type { WebhookEvent, WebhookPayload } from '../types/webhook';
import type { IJobNotifier, NotifiableJob } from './IJobNotifier';

/**
 * Result of a webhook notification attempt.
 */
export interface WebhookResult {
  /** Whether the notification was sent successfully */
  success: boolean;
  /** HTTP status code from the webhook endpoint */
  statusCode?: number;
  /** Error message if the notification failed */
  error?: string;
  /** True when the event was not subscribed and nothing was sent */
  skipped?: boolean;
}

/**
 * One outgoing webhook POST.
 */
export interface WebhookRequest {
  url: string;
  headers: Record<string, string>;
  payload: WebhookPayload;
  timeoutMs: number;
}

/**
 * Delivers a webhook request. Must resolve, never reject.
 */
export type WebhookTransport = (request: WebhookRequest) => Promise<WebhookResult>;

/**
 * Job notifier that POSTs job events to a local endpoint.
 *
 * Implementations must enforce localhost-only URLs for security.
 *
 * @example
 * ```typescript
 * dispatcher.register(new WebhookNotifier({ url: 'http://localhost:8080/jobs' }));
 * // Sends POST to the URL when a job completes or fails
 * ```
 */
export interface IWebhookNotifier extends IJobNotifier {
  /**
   * Send `event` for `job` now, whatever its status.
   *
   * @security Will reject non-localhost URLs
   */
  send(job: NotifiableJob, event: WebhookEvent): Promise<WebhookResult>;

  /**
   * Validate that a webhook URL is allowed.
   * Only localhost URLs are permitted for security.
   */
  isValidUrl(url: string): boolean;
}
