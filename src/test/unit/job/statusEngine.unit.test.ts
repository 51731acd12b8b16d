/**
 * @fileoverview Unit tests for JobStatusEngine
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import { JobStatusEngine } from '../../../job/statusEngine';
import { InvalidTransitionError } from '../../../job/errors';
import type { JobTransitionEvent } from '../../../types/job';
import { ALL_STATUSES, UI_STATUS } from '../../../types/job';
import { ManualClock, silenceConsole } from '../mocks/jobs';

suite('JobStatusEngine', () => {
  let clock: ManualClock;
  let engine: JobStatusEngine;
  let quiet: { restore: () => void };

  setup(() => {
    quiet = silenceConsole();
    clock = new ManualClock(1000);
    engine = new JobStatusEngine('job-1', undefined, clock.read);
  });

  teardown(() => {
    quiet.restore();
  });

  test('starts PENDING with mapped UI text', () => {
    assert.strictEqual(engine.status, 'PENDING');
    assert.strictEqual(engine.uiStatus, 'Pending');
    assert.strictEqual(engine.updatedAt, 1000);
  });

  test('sets the mapped UI text on transition', () => {
    engine.updateStatus('REQUEST_ACK');
    assert.strictEqual(engine.uiStatus, 'Acknowledged');
  });

  test('every mapped status gets its UI text', () => {
    for (const status of ALL_STATUSES) {
      const expected = UI_STATUS[status];
      if (expected === undefined) {
        continue;
      }
      const subject = new JobStatusEngine('job-x', undefined, clock.read);
      subject.updateStatus(status, { force: true });
      assert.strictEqual(subject.uiStatus, expected, status);
    }
  });

  test('an explicit UI status overrides the mapping', () => {
    engine.updateStatus('RUNNING', { uiStatus: 'Copying users' });
    assert.strictEqual(engine.status, 'RUNNING');
    assert.strictEqual(engine.uiStatus, 'Copying users');
  });

  test('PAUSED keeps the previous UI text', () => {
    engine.updateStatus('RUNNING');
    engine.updateStatus('PAUSED');
    assert.strictEqual(engine.status, 'PAUSED');
    assert.strictEqual(engine.uiStatus, 'Running');
  });

  test('a same-status update refreshes updatedAt', () => {
    clock.tick(500);
    engine.updateStatus('PENDING');
    assert.strictEqual(engine.status, 'PENDING');
    assert.strictEqual(engine.updatedAt, 1500);
  });

  test('rejects transitions out of a terminal status', () => {
    engine.updateStatus('RUNNING');
    engine.updateStatus('SUCCESS');

    assert.throws(
      () => engine.updateStatus('RUNNING'),
      (error: unknown) =>
        error instanceof InvalidTransitionError &&
        error.message === 'Invalid transition for job job-1: SUCCESS -> RUNNING' &&
        error.from === 'SUCCESS' &&
        error.to === 'RUNNING',
    );
    assert.strictEqual(engine.status, 'SUCCESS');
    assert.strictEqual(engine.uiStatus, 'Success');
  });

  test('force bypasses the table', () => {
    engine.updateStatus('RUNNING');
    engine.updateStatus('SUCCESS');
    engine.updateStatus('SUCCESS_WITH_WARNING', { force: true });
    assert.strictEqual(engine.status, 'SUCCESS_WITH_WARNING');
    assert.strictEqual(engine.uiStatus, 'Success with warning(s)');
  });

  test('emits a transition event per change', () => {
    const events: JobTransitionEvent[] = [];
    engine.on('transition', event => events.push(event));

    clock.tick(10);
    engine.updateStatus('RUNNING');
    clock.tick(10);
    engine.updateStatus('FAILED', { reason: 'boom' });

    assert.deepStrictEqual(events, [
      { jobId: 'job-1', from: 'PENDING', to: 'RUNNING', uiStatus: 'Running', timestamp: 1010 },
      { jobId: 'job-1', from: 'RUNNING', to: 'FAILED', uiStatus: 'Failed', timestamp: 1020, reason: 'boom' },
    ]);
  });

  test('a rejected transition emits nothing', () => {
    let emitted = 0;
    engine.on('transition', () => emitted++);
    assert.throws(() => engine.updateStatus('SUCCESS'), InvalidTransitionError);
    assert.strictEqual(emitted, 0);
  });

  test('restore loads state without validating', () => {
    engine.restore({ status: 'CANCELED', uiStatus: 'Stopped', updatedAt: 42 });
    assert.deepStrictEqual(engine.toState(), { status: 'CANCELED', uiStatus: 'Stopped', updatedAt: 42 });
    assert.ok(engine.isTerminal);
  });

  test('updateUiStatus changes text only', () => {
    clock.tick(1);
    engine.updateUiStatus('Waiting for directory');
    assert.strictEqual(engine.status, 'PENDING');
    assert.strictEqual(engine.uiStatus, 'Waiting for directory');
    assert.strictEqual(engine.updatedAt, 1001);
  });
});
