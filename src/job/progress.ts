/**
 * @fileoverview Progress accounting for a job.
 *
 * Work is measured in units: callers announce how many units exist and
 * report units as they finish. The percentage is computed from the units
 * unless a caller pins it explicitly.
 *
 * @module job/progress
 */

import type { ProgressState } from '../types/job';

function assertUnits(units: number): void {
  if (!Number.isInteger(units) || units < 0) {
    throw new RangeError(`Progress units must be a non-negative integer, got ${units}`);
  }
}

/**
 * Total/done unit counters with an optional pinned percentage.
 *
 * `done` may exceed `total`; over-reporting is accepted and only shows up as
 * a negative {@link remainingUnits} and a percentage above 100.
 *
 * @example
 * ```typescript
 * const progress = new ProgressAccumulator();
 * progress.addTotalUnits(10);
 * progress.addDoneUnits(4);
 * progress.percentProgress; // 40
 * ```
 */
export class ProgressAccumulator {
  private total = 0;
  private done = 0;
  private override: number | null = null;

  constructor(state?: ProgressState) {
    if (state) {
      this.restore(state);
    }
  }

  get totalUnits(): number {
    return this.total;
  }

  get doneUnits(): number {
    return this.done;
  }

  get remainingUnits(): number {
    return this.total - this.done;
  }

  get percentOverride(): number | null {
    return this.override;
  }

  /**
   * The pinned percentage when set, else `done * 100 / total` (0 when
   * there is no work).
   */
  get percentProgress(): number {
    if (this.override !== null) {
      return this.override;
    }
    if (this.total === 0) {
      return 0;
    }
    return (this.done * 100) / this.total;
  }

  addTotalUnits(units: number): void {
    assertUnits(units);
    this.total += units;
  }

  addDoneUnits(units: number): void {
    assertUnits(units);
    this.done += units;
  }

  /**
   * Pin the percentage until {@link clearPercentOverride} is called.
   */
  setPercentProgress(value: number): void {
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      throw new RangeError(`Percent progress must be between 0 and 100, got ${value}`);
    }
    this.override = value;
  }

  clearPercentOverride(): void {
    this.override = null;
  }

  toState(): ProgressState {
    return { totalUnits: this.total, doneUnits: this.done, percentOverride: this.override };
  }

  restore(state: ProgressState): void {
    this.total = state.totalUnits;
    this.done = state.doneUnits;
    this.override = state.percentOverride;
  }
}
