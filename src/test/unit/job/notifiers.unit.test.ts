/**
 * @fileoverview Unit tests for NotifierDispatcher, StoreUpdateNotifier and EventNotifier
 */

import { suite, test, setup } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import type { IJobNotifier, NotifiableJob } from '../../../interfaces/IJobNotifier';
import { NotifierDispatcher, StoreUpdateNotifier } from '../../../job/notifiers';
import { EventNotifier, JobEventEmitter } from '../../../job/jobEvents';
import { InMemoryJobStore } from '../../../job/store/InMemoryJobStore';
import { JobNotFoundError } from '../../../job/errors';
import type { JobSnapshot, JobStatus } from '../../../types/job';
import type { FakeLogger } from '../mocks/jobs';
import { createFakeLogger, makeSnapshot } from '../mocks/jobs';

class ThrowingNotifier implements IJobNotifier {
  notify(): void {
    throw new Error('observer down');
  }
}

function jobWith(snapshot: JobSnapshot): NotifiableJob {
  return { id: snapshot.id, toSnapshot: () => snapshot };
}

suite('NotifierDispatcher', () => {
  let log: FakeLogger;
  const job = jobWith(makeSnapshot());

  setup(() => {
    log = createFakeLogger();
  });

  test('calls notifiers in registration order', async () => {
    const order: string[] = [];
    const dispatcher = new NotifierDispatcher([
      { notify: () => { order.push('first'); } },
      { notify: async () => { order.push('second'); } },
    ], log);

    await dispatcher.dispatch(job);
    assert.deepStrictEqual(order, ['first', 'second']);
  });

  test('a failing notifier is logged and the rest still run', async () => {
    const after = sinon.stub();
    const dispatcher = new NotifierDispatcher([new ThrowingNotifier(), { notify: after }], log);

    await dispatcher.dispatch(job);

    assert.ok(after.calledOnceWith(job));
    assert.ok(log.error.calledOnce);
    assert.strictEqual(log.error.firstCall.args[0], 'Notifier ThrowingNotifier failed for job job-1');
  });

  test('applyAndNotify returns the mutation result and notifies once', async () => {
    const notify = sinon.stub();
    const dispatcher = new NotifierDispatcher([{ notify }], log);

    const result = await dispatcher.applyAndNotify(job, () => 7);

    assert.strictEqual(result, 7);
    assert.ok(notify.calledOnce);
  });

  test('applyAndNotify notifies even when the mutation throws', async () => {
    const notify = sinon.stub();
    const dispatcher = new NotifierDispatcher([{ notify }], log);

    await assert.rejects(
      dispatcher.applyAndNotify(job, () => {
        throw new Error('rejected');
      }),
      /rejected/,
    );
    assert.ok(notify.calledOnce);
  });

  test('register and unregister', () => {
    const extra: IJobNotifier = { notify: () => {} };
    const dispatcher = new NotifierDispatcher([], log);

    dispatcher.register(extra);
    assert.strictEqual(dispatcher.list().length, 1);
    assert.strictEqual(dispatcher.unregister(extra), true);
    assert.strictEqual(dispatcher.unregister(extra), false);
    assert.strictEqual(dispatcher.list().length, 0);
  });
});

suite('StoreUpdateNotifier', () => {
  test('writes the snapshot to the store', async () => {
    const store = new InMemoryJobStore();
    await store.create(makeSnapshot());

    await new StoreUpdateNotifier(store).notify(jobWith(makeSnapshot({ status: 'RUNNING', uiStatus: 'Running' })));

    assert.strictEqual((await store.get('job-1'))?.status, 'RUNNING');
  });

  test('fails for a job that was never stored', async () => {
    const store = new InMemoryJobStore();
    await assert.rejects(new StoreUpdateNotifier(store).notify(jobWith(makeSnapshot())), JobNotFoundError);
  });
});

suite('EventNotifier', () => {
  let events: JobEventEmitter;
  let notifier: EventNotifier;
  let updated: string[];
  let completed: JobStatus[];

  setup(() => {
    events = new JobEventEmitter();
    notifier = new EventNotifier(events);
    updated = [];
    completed = [];
    events.on('jobUpdated', snapshot => updated.push(snapshot.status));
    events.on('jobCompleted', (_snapshot, status) => completed.push(status));
  });

  test('emits jobUpdated on every notification', () => {
    notifier.notify(jobWith(makeSnapshot()));
    notifier.notify(jobWith(makeSnapshot({ status: 'RUNNING' })));
    assert.deepStrictEqual(updated, ['PENDING', 'RUNNING']);
    assert.deepStrictEqual(completed, []);
  });

  test('emits jobCompleted once per terminal status', () => {
    notifier.notify(jobWith(makeSnapshot({ status: 'SUCCESS' })));
    notifier.notify(jobWith(makeSnapshot({ status: 'SUCCESS' })));
    notifier.notify(jobWith(makeSnapshot({ status: 'SUCCESS_WITH_WARNING' })));
    assert.deepStrictEqual(completed, ['SUCCESS', 'SUCCESS_WITH_WARNING']);
  });
});
