/**
 * @fileoverview Unit tests for WebhookNotifier
 */

import { suite, test, setup } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import type { NotifiableJob } from '../../../interfaces/IJobNotifier';
import type { WebhookRequest, WebhookResult, WebhookTransport } from '../../../interfaces/IWebhookNotifier';
import { USER_AGENT, WebhookNotifier, eventFor, isLocalhostUrl } from '../../../notifications/webhookNotifier';
import type { JobSnapshot } from '../../../types/job';
import type { WebhookConfig } from '../../../types/webhook';
import { DEFAULT_WEBHOOK_TIMEOUT_MS } from '../../../types/webhook';
import type { FakeLogger } from '../mocks/jobs';
import { T0, createFakeLogger, makeSnapshot } from '../mocks/jobs';

function jobWith(snapshot: JobSnapshot): NotifiableJob {
  return { id: snapshot.id, toSnapshot: () => snapshot };
}

suite('WebhookNotifier', () => {
  let requests: WebhookRequest[];
  let response: WebhookResult;
  let transport: WebhookTransport;
  let log: FakeLogger;

  setup(() => {
    requests = [];
    response = { success: true, statusCode: 200 };
    transport = async request => {
      requests.push(request);
      return response;
    };
    log = createFakeLogger();
  });

  function notifier(config: Partial<WebhookConfig> = {}): WebhookNotifier {
    return new WebhookNotifier(
      { url: 'http://localhost:8080/hooks', ...config },
      { transport, clock: () => T0 + 20_000, logger: log },
    );
  }

  // =========================================================================
  // URL validation
  // =========================================================================

  suite('isLocalhostUrl', () => {
    test('accepts loopback hosts', () => {
      assert.ok(isLocalhostUrl('http://localhost:8080/x'));
      assert.ok(isLocalhostUrl('https://LOCALHOST/x'));
      assert.ok(isLocalhostUrl('http://127.0.0.1/x'));
      assert.ok(isLocalhostUrl('http://127.0.0.5:3000/'));
      assert.ok(isLocalhostUrl('http://[::1]:9000/'));
    });

    test('rejects everything else', () => {
      assert.ok(!isLocalhostUrl('http://example.com/hook'));
      assert.ok(!isLocalhostUrl('http://localhost.example.com/hook'));
      assert.ok(!isLocalhostUrl('http://0.0.0.0:8080/'));
      assert.ok(!isLocalhostUrl('ftp://localhost/'));
      assert.ok(!isLocalhostUrl('not a url'));
    });
  });

  suite('eventFor', () => {
    test('maps statuses to events', () => {
      assert.strictEqual(eventFor(makeSnapshot({ status: 'SUCCESS' })), 'job_complete');
      assert.strictEqual(eventFor(makeSnapshot({ status: 'SUCCESS_WITH_WARNING' })), 'job_complete');
      assert.strictEqual(eventFor(makeSnapshot({ status: 'FAILED' })), 'job_failed');
      assert.strictEqual(eventFor(makeSnapshot({ status: 'ERRORED' })), 'job_failed');
      assert.strictEqual(eventFor(makeSnapshot({ status: 'CANCELED' })), 'job_failed');
      assert.strictEqual(eventFor(makeSnapshot({ status: 'RUNNING' })), 'job_updated');
    });
  });

  // =========================================================================
  // Delivery
  // =========================================================================

  suite('notify', () => {
    test('posts a completed job', async () => {
      const snapshot = makeSnapshot({
        status: 'SUCCESS',
        uiStatus: 'Success',
        updatedAt: T0 + 12_400,
        progress: { totalUnits: 10, doneUnits: 4, percentOverride: null },
      });

      await notifier({ headers: { 'X-Token': 'test-secret' } }).notify(jobWith(snapshot));

      assert.strictEqual(requests.length, 1);
      assert.strictEqual(requests[0].url, 'http://localhost:8080/hooks');
      assert.deepStrictEqual(requests[0].headers, {
        'Content-Type': 'application/json',
        'User-Agent': USER_AGENT,
        'X-Webhook-Event': 'job_complete',
        'X-Job-Id': 'job-1',
        'X-Token': 'test-secret',
      });
      assert.deepStrictEqual(requests[0].payload, {
        event: 'job_complete',
        timestamp: T0 + 20_000,
        job: {
          id: 'job-1',
          type: 'test.scripted',
          status: 'SUCCESS',
          uiStatus: 'Success',
          progress: 40,
          reason: null,
          duration: 12,
        },
      });
    });

    test('skips events that are not subscribed', async () => {
      const subject = notifier();
      const result = await subject.send(jobWith(makeSnapshot({ status: 'RUNNING' })), 'job_updated');

      assert.deepStrictEqual(result, { success: true, skipped: true });
      await subject.notify(jobWith(makeSnapshot({ status: 'RUNNING' })));
      assert.strictEqual(requests.length, 0);
    });

    test('sends updates when subscribed', async () => {
      await notifier({ events: ['job_updated'] }).notify(jobWith(makeSnapshot({ status: 'RUNNING' })));
      assert.strictEqual(requests.length, 1);
      assert.strictEqual(requests[0].headers['X-Webhook-Event'], 'job_updated');
    });

    test('carries the failure reason', async () => {
      await notifier().notify(jobWith(makeSnapshot({ status: 'FAILED', statusReason: 'One or more steps failed.' })));
      assert.strictEqual(requests[0].payload.event, 'job_failed');
      assert.strictEqual(requests[0].payload.job.reason, 'One or more steps failed.');
    });

    test('blocks non-local URLs', async () => {
      const subject = notifier({ url: 'http://example.com/hook' });

      const result = await subject.send(jobWith(makeSnapshot({ status: 'SUCCESS' })), 'job_complete');
      assert.deepStrictEqual(result, { success: false, error: 'Non-localhost URLs are not allowed for security' });
      assert.strictEqual(requests.length, 0);
      assert.strictEqual(log.warn.firstCall.args[0], 'BLOCKED: Non-local URL not allowed (http://example.com/hook)');
    });

    test('logs a failed delivery instead of throwing', async () => {
      response = { success: false, statusCode: 500 };

      await notifier().notify(jobWith(makeSnapshot({ status: 'ERRORED' })));

      assert.ok(log.warn.calledOnceWith('Webhook for job job-1 failed: HTTP 500'));
    });

    test('requests carry the default timeout', async () => {
      await notifier().send(jobWith(makeSnapshot({ status: 'SUCCESS' })), 'job_complete');
      assert.strictEqual(requests[0].timeoutMs, DEFAULT_WEBHOOK_TIMEOUT_MS);
    });

    test('gives up on a transport that never answers', async () => {
      const timers = sinon.useFakeTimers();
      try {
        transport = () => new Promise<WebhookResult>(() => undefined);

        const pending = notifier({ timeoutMs: 5000 }).notify(jobWith(makeSnapshot({ status: 'SUCCESS' })));
        await timers.tickAsync(4999);
        assert.ok(log.warn.notCalled);
        await timers.tickAsync(1);
        await pending;

        assert.ok(log.warn.calledOnceWith('Webhook for job job-1 failed: Timed out after 5000 ms'));
      } finally {
        timers.restore();
      }
    });
  });
});
