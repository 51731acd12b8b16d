/**
 * @fileoverview Unit tests for InMemoryJobStore
 */

import { suite, test, setup } from 'mocha';
import * as assert from 'assert';
import { InMemoryJobStore } from '../../../../job/store/InMemoryJobStore';
import { DuplicateJobError, JobNotFoundError } from '../../../../job/errors';
import type { DiagnosticEntry } from '../../../../types/diagnostic';
import { T0, makeSnapshot } from '../../mocks/jobs';

function entry(jobId: string, message: string): DiagnosticEntry {
  return {
    id: `${jobId}-${message}`,
    jobId,
    severity: 'INFO',
    createdAt: T0,
    message,
    details: null,
    stage: null,
    step: null,
  };
}

suite('InMemoryJobStore', () => {
  let store: InMemoryJobStore;

  setup(() => {
    store = new InMemoryJobStore();
  });

  test('create then get returns an equal copy', async () => {
    const snapshot = makeSnapshot();
    await store.create(snapshot);

    const loaded = await store.get('job-1');
    assert.deepStrictEqual(loaded, snapshot);
    assert.notStrictEqual(loaded, snapshot);
  });

  test('returned snapshots do not alias stored ones', async () => {
    await store.create(makeSnapshot());
    const loaded = await store.get('job-1');
    assert.ok(loaded);
    loaded.progress.doneUnits = 99;

    assert.strictEqual((await store.get('job-1'))?.progress.doneUnits, 0);
  });

  test('rejects a duplicate id', async () => {
    await store.create(makeSnapshot());
    await assert.rejects(store.create(makeSnapshot()), DuplicateJobError);
  });

  test('rejects an update of a missing job', async () => {
    await assert.rejects(store.update(makeSnapshot({ id: 'ghost' })), JobNotFoundError);
  });

  test('lists oldest first and filters', async () => {
    await store.create(makeSnapshot({ id: 'b', createdAt: T0 + 10, status: 'RUNNING' }));
    await store.create(makeSnapshot({ id: 'a', createdAt: T0 + 10, type: 'groupset.update' }));
    await store.create(makeSnapshot({ id: 'c', createdAt: T0, createdBy: 'admin', status: 'FAILED' }));

    assert.deepStrictEqual((await store.list()).map(s => s.id), ['c', 'a', 'b']);
    assert.deepStrictEqual((await store.list({ type: 'groupset.update' })).map(s => s.id), ['a']);
    assert.deepStrictEqual((await store.list({ status: ['RUNNING', 'FAILED'] })).map(s => s.id), ['c', 'b']);
    assert.deepStrictEqual((await store.list({ status: 'PENDING', createdBy: 'tester' })).map(s => s.id), ['a']);
  });

  test('delete removes the job and its diagnostics', async () => {
    await store.create(makeSnapshot());
    await store.append(entry('job-1', 'hello'));

    assert.strictEqual(await store.delete('job-1'), true);
    assert.strictEqual(await store.get('job-1'), undefined);
    assert.deepStrictEqual(await store.listForJob('job-1'), []);
    assert.strictEqual(await store.delete('job-1'), false);
  });

  test('diagnostics are kept per job in order', async () => {
    await store.append(entry('job-1', 'one'));
    await store.append(entry('job-2', 'other'));
    await store.append(entry('job-1', 'two'));

    assert.deepStrictEqual((await store.listForJob('job-1')).map(e => e.message), ['one', 'two']);
  });

  suite('transaction', () => {
    test('keeps changes when the callback returns', async () => {
      const result = await store.transaction(async () => {
        await store.create(makeSnapshot());
        return 'ok';
      });
      assert.strictEqual(result, 'ok');
      assert.strictEqual(store.size, 1);
    });

    test('rolls back jobs and diagnostics when the callback throws', async () => {
      await store.create(makeSnapshot());

      await assert.rejects(
        store.transaction(async () => {
          await store.update(makeSnapshot({ status: 'RUNNING' }));
          await store.create(makeSnapshot({ id: 'job-2' }));
          await store.append(entry('job-1', 'inside'));
          throw new Error('abort');
        }),
        /abort/,
      );

      assert.strictEqual((await store.get('job-1'))?.status, 'PENDING');
      assert.strictEqual(await store.get('job-2'), undefined);
      assert.deepStrictEqual(await store.listForJob('job-1'), []);
    });
  });
});
