/**
 * @fileoverview Webhook notification service.
 *
 * A job notifier that sends HTTP notifications to a configured endpoint
 * when jobs change. Enforces localhost-only URLs for security.
 *
 * @module notifications/webhookNotifier
 */

import * as http from 'http';
import * as https from 'https';
import type {
  IWebhookNotifier,
  WebhookRequest,
  WebhookResult,
  WebhookTransport,
} from '../interfaces/IWebhookNotifier';
import type { NotifiableJob } from '../interfaces/IJobNotifier';
import type { ILogger } from '../interfaces/ILogger';
import type { Clock, JobSnapshot } from '../types/job';
import { isBad, isGood } from '../types/job';
import type { WebhookConfig, WebhookEvent, WebhookPayload } from '../types/webhook';
import { DEFAULT_WEBHOOK_TIMEOUT_MS } from '../types/webhook';
import { Logger } from '../core/logger';
import { ProgressAccumulator } from '../job/progress';

const DEFAULT_EVENTS: readonly WebhookEvent[] = ['job_complete', 'job_failed'];

export const USER_AGENT = 'job-engine/1.0.0';

function timedOut(timeoutMs: number): WebhookResult {
  return { success: false, error: `Timed out after ${timeoutMs} ms` };
}

/**
 * Event a snapshot maps to: completion for good terminal statuses, failure
 * for bad ones and for cancellation, otherwise an update.
 */
export function eventFor(snapshot: JobSnapshot): WebhookEvent {
  if (isGood(snapshot.status)) {
    return 'job_complete';
  }
  if (isBad(snapshot.status) || snapshot.status === 'CANCELED') {
    return 'job_failed';
  }
  return 'job_updated';
}

/**
 * Validate that a URL is a localhost URL.
 * Allowed hosts: localhost, 127.0.0.1, ::1, 127.x.x.x
 */
export function isLocalhostUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    const hostname = url.hostname.toLowerCase();

    if (hostname === 'localhost' || hostname === '[::1]') {
      return true;
    }

    // Loopback range 127.x.x.x
    if (/^127\.\d{1,3}\.\d{1,3}\.\d{1,3}$/.test(hostname)) {
      return true;
    }

    // Block everything else (including 0.0.0.0 which could bind externally)
    return false;
  } catch {
    return false;
  }
}

/**
 * POST over node's http / https modules.
 */
export const httpTransport: WebhookTransport = request => new Promise(resolve => {
  try {
    const url = new URL(request.url);
    const client = url.protocol === 'https:' ? https : http;
    const body = JSON.stringify(request.payload);

    const options: http.RequestOptions = {
      method: 'POST',
      hostname: url.hostname,
      port: url.port || (url.protocol === 'https:' ? 443 : 80),
      path: url.pathname + url.search,
      headers: {
        ...request.headers,
        'Content-Length': Buffer.byteLength(body),
      },
    };

    const req = client.request(options, res => {
      res.resume();
      resolve({
        success: res.statusCode !== undefined && res.statusCode >= 200 && res.statusCode < 300,
        statusCode: res.statusCode,
      });
    });

    req.setTimeout(request.timeoutMs, () => {
      req.destroy();
      resolve(timedOut(request.timeoutMs));
    });

    req.on('error', err => {
      resolve({ success: false, error: err.message });
    });

    req.write(body);
    req.end();
  } catch (err) {
    resolve({ success: false, error: err instanceof Error ? err.message : String(err) });
  }
});

export interface WebhookNotifierOptions {
  transport?: WebhookTransport;
  clock?: Clock;
  logger?: ILogger;
}

/**
 * Sends subscribed job events to a localhost webhook.
 *
 * @example
 * ```typescript
 * const notifier = new WebhookNotifier({ url: 'http://localhost:8080/jobs' });
 * const result = await notifier.send(job, 'job_complete');
 * if (!result.success) {
 *   console.error('Webhook failed:', result.error);
 * }
 * ```
 */
export class WebhookNotifier implements IWebhookNotifier {
  private readonly transport: WebhookTransport;
  private readonly clock: Clock;
  private readonly log: ILogger;

  constructor(
    private readonly config: WebhookConfig,
    options: WebhookNotifierOptions = {},
  ) {
    this.transport = options.transport ?? httpTransport;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? Logger.for('webhook');
  }

  isValidUrl(urlString: string): boolean {
    return isLocalhostUrl(urlString);
  }

  /**
   * Notifier entry point: derive the event from the job's status and send
   * it if subscribed. Delivery failures are logged, never thrown.
   */
  async notify(job: NotifiableJob): Promise<void> {
    const result = await this.send(job, eventFor(job.toSnapshot()));
    if (!result.success) {
      this.log.warn(`Webhook for job ${job.id} failed: ${result.error ?? `HTTP ${result.statusCode}`}`);
    }
  }

  async send(job: NotifiableJob, event: WebhookEvent): Promise<WebhookResult> {
    // Security: Validate localhost-only URL
    if (!this.isValidUrl(this.config.url)) {
      this.log.warn(`BLOCKED: Non-local URL not allowed (${this.config.url})`);
      return { success: false, error: 'Non-localhost URLs are not allowed for security' };
    }

    const subscribed = this.config.events ?? DEFAULT_EVENTS;
    if (!subscribed.includes(event)) {
      return { success: true, skipped: true };
    }

    const snapshot = job.toSnapshot();
    const request: WebhookRequest = {
      url: this.config.url,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': USER_AGENT,
        'X-Webhook-Event': event,
        'X-Job-Id': snapshot.id,
        ...(this.config.headers ?? {}),
      },
      payload: this.buildPayload(snapshot, event),
      timeoutMs: this.config.timeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS,
    };

    const result = await this.deliver(request);
    this.log.debug(`${event} notification for job ${snapshot.id} sent to ${this.config.url}`, {
      statusCode: result.statusCode,
    });
    return result;
  }

  /**
   * Run the transport, giving up after `request.timeoutMs`.
   */
  private async deliver(request: WebhookRequest): Promise<WebhookResult> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<WebhookResult>(resolve => {
      timer = setTimeout(() => resolve(timedOut(request.timeoutMs)), request.timeoutMs);
      timer.unref();
    });
    try {
      return await Promise.race([this.transport(request), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private buildPayload(snapshot: JobSnapshot, event: WebhookEvent): WebhookPayload {
    return {
      event,
      timestamp: this.clock(),
      job: {
        id: snapshot.id,
        type: snapshot.type,
        status: snapshot.status,
        uiStatus: snapshot.uiStatus,
        progress: new ProgressAccumulator(snapshot.progress).percentProgress,
        reason: snapshot.statusReason,
        duration: Math.round((snapshot.updatedAt - snapshot.createdAt) / 1000),
      },
    };
  }
}
