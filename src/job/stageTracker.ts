/**
 * @fileoverview Stage and step execution contexts.
 *
 * A stage is a coarse phase of a job; a step is the smallest tracked unit
 * of work, usually worth one progress unit. Both run inside a scope that
 * guarantees the start / success-or-fail / end sequence on every exit path.
 *
 * Scopes are tracked on a stack of frames, so a stage opened inside a step
 * (or a step inside a step) restores its parent when it closes instead of
 * overwriting it.
 *
 * @module job/stageTracker
 */

import type { JsonObject } from '../types/job';
import type { DiagnosticRecorder } from './diagnostics';
import { errorMessage } from './errors';
import { Logger } from '../core/logger';

const log = Logger.for('stage-tracker');

export type FrameKind = 'stage' | 'step';

/**
 * One open stage or step.
 */
export interface ExecutionFrame {
  readonly kind: FrameKind;
  readonly name: string;
  /** Caller data; the tracker adds `error` on failure */
  readonly data: JsonObject;
  readonly startedAt: number;
  /** Frame that was on top when this one opened */
  readonly parent: ExecutionFrame | undefined;
  /** Name of the innermost enclosing stage (the frame itself for a stage) */
  readonly stage: string | null;
}

type Hook = (frame: ExecutionFrame) => void | Promise<void>;

/**
 * Hooks a job can implement around stages and steps. Every hook is
 * optional; a missing hook is a no-op.
 */
export interface StageStepHooks {
  onStageStart?: Hook;
  onStageSuccess?: Hook;
  onStageFail?: Hook;
  onStageEnd?: Hook;
  onStepStart?: Hook;
  onStepSuccess?: Hook;
  onStepFail?: Hook;
  onStepEnd?: Hook;
}

type HookName = keyof StageStepHooks;

interface KindHooks {
  start: HookName;
  success: HookName;
  fail: HookName;
  end: HookName;
}

const STAGE_HOOKS: KindHooks = {
  start: 'onStageStart',
  success: 'onStageSuccess',
  fail: 'onStageFail',
  end: 'onStageEnd',
};

const STEP_HOOKS: KindHooks = {
  start: 'onStepStart',
  success: 'onStepSuccess',
  fail: 'onStepFail',
  end: 'onStepEnd',
};

/**
 * Receives one progress unit each time a step completes normally.
 */
export type StepCompletedCallback = () => void | Promise<void>;

export class StageStepTracker {
  private readonly stack: ExecutionFrame[] = [];

  constructor(
    private readonly diagnostics: DiagnosticRecorder,
    private readonly hooks: StageStepHooks = {},
    private readonly onStepCompleted?: StepCompletedCallback,
    private readonly clock: () => number = Date.now,
  ) {}

  /** Innermost open stage. */
  get currentStage(): ExecutionFrame | undefined {
    return this.innermost('stage');
  }

  /** Innermost open step. */
  get currentStep(): ExecutionFrame | undefined {
    return this.innermost('step');
  }

  get currentStageData(): JsonObject | undefined {
    return this.currentStage?.data;
  }

  get currentStepData(): JsonObject | undefined {
    return this.currentStep?.data;
  }

  get depth(): number {
    return this.stack.length;
  }

  /** Open frames, outermost first. */
  get frames(): readonly ExecutionFrame[] {
    return [...this.stack];
  }

  /**
   * Run `fn` as a stage.
   *
   * @returns whatever `fn` returns; a thrown error is recorded and rethrown
   */
  runStage<T>(stage: string, data: JsonObject, fn: () => Promise<T>): Promise<T> {
    return this.runFrame('stage', stage, data, fn, STAGE_HOOKS);
  }

  /**
   * Run `fn` as a step. A step that completes normally counts one done unit.
   */
  runStep<T>(step: string, data: JsonObject, fn: () => Promise<T>): Promise<T> {
    return this.runFrame('step', step, data, fn, STEP_HOOKS);
  }

  private async runFrame<T>(
    kind: FrameKind,
    name: string,
    data: JsonObject,
    fn: () => Promise<T>,
    hooks: KindHooks,
  ): Promise<T> {
    const frame = this.push(kind, name, data);
    const scope = this.scopeOf(frame);

    try {
      await this.diagnostics.info('started', scope);
      await this.callHook(hooks.start, frame);

      let result: T;
      try {
        result = await fn();
      } catch (error) {
        frame.data.error = errorMessage(error);
        log.warn(`${kind} ${name} failed: ${frame.data.error}`);
        await this.diagnostics.critical('failed', { ...scope, details: { ...frame.data } });
        await this.callHook(hooks.fail, frame);
        throw error;
      }

      await this.diagnostics.info('succeeded', { ...scope, details: { ...frame.data } });
      await this.callHook(hooks.success, frame);
      if (kind === 'step' && this.onStepCompleted) {
        await this.onStepCompleted();
      }
      return result;
    } finally {
      try {
        await this.diagnostics.info('completed', scope);
        await this.callHook(hooks.end, frame);
      } finally {
        this.pop(frame);
      }
    }
  }

  /** Invoked as a method so hooks implemented on a job keep their `this`. */
  private async callHook(name: HookName, frame: ExecutionFrame): Promise<void> {
    await this.hooks[name]?.(frame);
  }

  private push(kind: FrameKind, name: string, data: JsonObject): ExecutionFrame {
    const parent = this.stack[this.stack.length - 1];
    const stage = kind === 'stage' ? name : this.innermost('stage')?.name ?? null;
    const frame: ExecutionFrame = {
      kind,
      name,
      data: { ...data },
      startedAt: this.clock(),
      parent,
      stage,
    };
    this.stack.push(frame);
    return frame;
  }

  private pop(frame: ExecutionFrame): void {
    const index = this.stack.lastIndexOf(frame);
    if (index !== -1) {
      this.stack.splice(index);
    }
  }

  private innermost(kind: FrameKind): ExecutionFrame | undefined {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      if (this.stack[i].kind === kind) {
        return this.stack[i];
      }
    }
    return undefined;
  }

  private scopeOf(frame: ExecutionFrame): { stage: string | null; step: string | null } {
    return {
      stage: frame.stage,
      step: frame.kind === 'step' ? frame.name : null,
    };
  }
}
