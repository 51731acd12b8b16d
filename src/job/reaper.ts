/**
 * @fileoverview Stale job reaper.
 *
 * Jobs never delete themselves. The reaper is the eviction policy: it
 * removes jobs whose TTL has run out, by default only once they are
 * terminal.
 *
 * @module job/reaper
 */

import type { ILogger } from '../interfaces/ILogger';
import type { Clock } from '../types/job';
import { isExpired, isTerminal } from '../types/job';
import { Logger } from '../core/logger';
import type { JobRepository } from './repository';
import { errorMessage } from './errors';

export interface StaleJobReaperOptions {
  /** Also delete expired jobs that have not finished */
  includeActive?: boolean;
  clock?: Clock;
  logger?: ILogger;
}

export class StaleJobReaper {
  private timer: ReturnType<typeof setInterval> | undefined;
  private readonly includeActive: boolean;
  private readonly clock: Clock;
  private readonly log: ILogger;

  constructor(
    private readonly repository: JobRepository,
    options: StaleJobReaperOptions = {},
  ) {
    this.includeActive = options.includeActive ?? false;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? Logger.for('reaper');
  }

  /** Whether periodic sweeps are scheduled. */
  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Delete every expired job the policy allows.
   *
   * @returns ids of the deleted jobs
   */
  async sweep(): Promise<string[]> {
    const now = this.clock();
    const deleted: string[] = [];
    for (const snapshot of await this.repository.list()) {
      if (!isExpired(snapshot.createdAt, snapshot.ttl, now)) {
        continue;
      }
      if (!this.includeActive && !isTerminal(snapshot.status)) {
        this.log.debug(`Keeping expired job ${snapshot.id} in ${snapshot.status}`);
        continue;
      }
      if (await this.repository.delete(snapshot.id)) {
        deleted.push(snapshot.id);
      }
    }
    if (deleted.length > 0) {
      this.log.info(`Reaped ${deleted.length} stale job(s)`);
    }
    return deleted;
  }

  /** Sweep every `intervalMs` until {@link stop} (idempotent). */
  start(intervalMs: number): void {
    if (this.timer !== undefined) {return;}
    this.timer = setInterval(() => {
      this.sweep().catch(error => {
        this.log.error(`Stale job sweep failed: ${errorMessage(error)}`);
      });
    }, intervalMs);
    this.timer.unref();
  }

  /** Stop periodic sweeps (idempotent). */
  stop(): void {
    if (this.timer === undefined) {return;}
    clearInterval(this.timer);
    this.timer = undefined;
  }
}
