/**
 * @fileoverview Unit tests for StageStepTracker
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import { DiagnosticRecorder } from '../../../job/diagnostics';
import { JobStepFailedError } from '../../../job/errors';
import type { ExecutionFrame, StageStepHooks } from '../../../job/stageTracker';
import { StageStepTracker } from '../../../job/stageTracker';
import { silenceConsole } from '../mocks/jobs';

/** Hooks implemented as methods, the way a job implements them. */
class RecordingHooks implements StageStepHooks {
  readonly calls: string[] = [];

  onStageStart(frame: ExecutionFrame): void { this.calls.push(`stageStart:${frame.name}`); }
  onStageSuccess(frame: ExecutionFrame): void { this.calls.push(`stageSuccess:${frame.name}`); }
  onStageFail(frame: ExecutionFrame): void { this.calls.push(`stageFail:${frame.name}`); }
  onStageEnd(frame: ExecutionFrame): void { this.calls.push(`stageEnd:${frame.name}`); }
  onStepStart(frame: ExecutionFrame): void { this.calls.push(`stepStart:${frame.name}`); }
  onStepSuccess(frame: ExecutionFrame): void { this.calls.push(`stepSuccess:${frame.name}`); }
  onStepFail(frame: ExecutionFrame): void { this.calls.push(`stepFail:${frame.name}:${String(frame.data.error)}`); }
  onStepEnd(frame: ExecutionFrame): void { this.calls.push(`stepEnd:${frame.name}`); }
}

suite('StageStepTracker', () => {
  let diagnostics: DiagnosticRecorder;
  let hooks: RecordingHooks;
  let tracker: StageStepTracker;
  let quiet: { restore: () => void };

  setup(() => {
    quiet = silenceConsole();
    diagnostics = new DiagnosticRecorder('job-1', undefined, () => 0);
    hooks = new RecordingHooks();
    tracker = new StageStepTracker(diagnostics, hooks, () => {
      hooks.calls.push('unitDone');
    }, () => 0);
  });

  teardown(() => {
    quiet.restore();
  });

  // =========================================================================
  // Successful scopes
  // =========================================================================

  suite('success', () => {
    test('runs start, success and end around a step inside a stage', async () => {
      const result = await tracker.runStage('S', {}, () =>
        tracker.runStep('A', { k: 1 }, async () => 'done'),
      );

      assert.strictEqual(result, 'done');
      assert.deepStrictEqual(hooks.calls, [
        'stageStart:S',
        'stepStart:A',
        'stepSuccess:A',
        'unitDone',
        'stepEnd:A',
        'stageSuccess:S',
        'stageEnd:S',
      ]);
    });

    test('records scoped diagnostics', async () => {
      await tracker.runStage('S', {}, () => tracker.runStep('A', { k: 1 }, async () => undefined));

      assert.deepStrictEqual(
        diagnostics.entries.map(e => [e.severity, e.message, e.stage, e.step]),
        [
          ['INFO', 'started', 'S', null],
          ['INFO', 'started', 'S', 'A'],
          ['INFO', 'succeeded', 'S', 'A'],
          ['INFO', 'completed', 'S', 'A'],
          ['INFO', 'succeeded', 'S', null],
          ['INFO', 'completed', 'S', null],
        ],
      );
      assert.deepStrictEqual(diagnostics.entries[2].details, { k: 1 });
    });

    test('does not count a unit for a stage', async () => {
      await tracker.runStage('S', {}, async () => undefined);
      assert.ok(!hooks.calls.includes('unitDone'));
    });
  });

  // =========================================================================
  // Failing scopes
  // =========================================================================

  suite('failure', () => {
    test('records the error, calls fail and end, and rethrows', async () => {
      const error = new JobStepFailedError('no such user');

      await assert.rejects(
        tracker.runStep('A', {}, async () => {
          throw error;
        }),
        (thrown: unknown) => thrown === error,
      );

      assert.deepStrictEqual(hooks.calls, ['stepStart:A', 'stepFail:A:no such user', 'stepEnd:A']);
      const failed = diagnostics.filter({ severity: 'CRITICAL' });
      assert.strictEqual(failed.length, 1);
      assert.strictEqual(failed[0].message, 'failed');
      assert.deepStrictEqual(failed[0].details, { error: 'no such user' });
      assert.strictEqual(diagnostics.entries[diagnostics.entries.length - 1].message, 'completed');
    });

    test('a failed step inside a stage fails the stage too', async () => {
      await assert.rejects(
        tracker.runStage('S', {}, () =>
          tracker.runStep('A', {}, async () => {
            throw new Error('x');
          }),
        ),
        /x/,
      );
      assert.deepStrictEqual(hooks.calls, [
        'stageStart:S',
        'stepStart:A',
        'stepFail:A:x',
        'stepEnd:A',
        'stageFail:S',
        'stageEnd:S',
      ]);
    });

    test('pops the frame when the end hook throws', async () => {
      const throwing = new StageStepTracker(diagnostics, {
        onStepEnd: () => {
          throw new Error('end hook');
        },
      });

      await assert.rejects(throwing.runStep('A', {}, async () => undefined), /end hook/);
      assert.strictEqual(throwing.depth, 0);
    });
  });

  // =========================================================================
  // Nesting
  // =========================================================================

  suite('nesting', () => {
    test('an inner stage restores the outer context when it closes', async () => {
      const seen: Array<[string | undefined, string | undefined]> = [];
      const snap = (): void => {
        seen.push([tracker.currentStage?.name, tracker.currentStep?.name]);
      };

      await tracker.runStage('OUTER', {}, () =>
        tracker.runStep('A', {}, async () => {
          snap();
          await tracker.runStage('INNER', {}, async () => snap());
          snap();
        }),
      );
      snap();

      assert.deepStrictEqual(seen, [
        ['OUTER', 'A'],
        ['INNER', 'A'],
        ['OUTER', 'A'],
        [undefined, undefined],
      ]);
    });

    test('frames carry their parent and enclosing stage', async () => {
      const captured: ExecutionFrame[] = [];
      await tracker.runStage('S', {}, () =>
        tracker.runStep('A', {}, () =>
          tracker.runStep('B', {}, async () => {
            const frame = tracker.currentStep;
            if (frame) {
              captured.push(frame);
            }
          }),
        ),
      );

      assert.strictEqual(captured.length, 1);
      const inner = captured[0];
      assert.strictEqual(inner.name, 'B');
      assert.strictEqual(inner.stage, 'S');
      assert.strictEqual(inner.parent?.name, 'A');
      assert.strictEqual(tracker.depth, 0);
    });

    test('step data is writable while the step runs', async () => {
      await tracker.runStep('A', { userId: 3 }, async () => {
        const data = tracker.currentStepData;
        if (data) {
          data.username = 'alice';
        }
      });
      const succeeded = diagnostics.filter({ step: 'A' }).find(e => e.message === 'succeeded');
      assert.deepStrictEqual(succeeded?.details, { userId: 3, username: 'alice' });
    });
  });
});
