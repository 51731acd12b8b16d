/**
 * @fileoverview Groupset membership jobs.
 *
 * Two job types built on {@link JobRecord}:
 *
 * - `groupset.update` adds and removes users and groups of one groupset
 * - `groupset.delete` empties a groupset and then deletes it
 *
 * Groups change in one step; every user is its own step inside a directory
 * transaction, so a user that cannot be changed leaves no partial change
 * and does not stop the others. The job fails at the end when any user
 * step failed.
 *
 * @module jobs/groupset/groupsetJobs
 */

import type { JobRecordDeps } from '../../job/jobRecord';
import { JobRecord } from '../../job/jobRecord';
import { JobFailedError, JobStepFailedError } from '../../job/errors';
import type { ExecutionFrame } from '../../job/stageTracker';
import type { JobRecordInit, JobSnapshot } from '../../types/job';
import type { DirectoryUser, Groupset, GroupsetDirectory } from './directory';
import type { GroupsetUpdateData, IdSelection } from './schema';
import { ALL, parseGroupsetDeleteData, parseGroupsetUpdateData } from './schema';

export const GroupsetStage = {
  GROUPS_UPDATE: 'GROUPS_UPDATE',
  USERS_UPDATE: 'USERS_UPDATE',
  DELETE_GROUPSET: 'DELETE_GROUPSET',
} as const;

export const GroupsetStep = {
  ADD_USER: 'ADD_USER',
  REMOVE_USER: 'REMOVE_USER',
  UPDATE_GROUPS: 'UPDATE_GROUPS',
  DELETE_GROUPSET: 'DELETE_GROUPSET',
} as const;

export const STEPS_FAILED_REASON = 'One or more steps failed.';

type UserStep = typeof GroupsetStep.ADD_USER | typeof GroupsetStep.REMOVE_USER;

function pick(selection: IdSelection | undefined, all: readonly number[]): number[] {
  if (!selection) {
    return [];
  }
  if (selection.includes(ALL)) {
    return [...all];
  }
  const ids: number[] = [];
  for (const id of selection) {
    if (typeof id === 'number' && !ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Shared membership logic for the groupset job types.
 */
export abstract class GroupsetJob extends JobRecord {
  private failedSteps = 0;

  constructor(
    source: JobRecordInit | JobSnapshot,
    deps: JobRecordDeps,
    protected readonly directory: GroupsetDirectory,
  ) {
    super(source, deps);
  }

  abstract get groupsetId(): number;

  /** User steps that failed during the current run. */
  get failedStepCount(): number {
    return this.failedSteps;
  }

  /** Copy the failed step's data onto its stage so the stage diagnostics carry it. */
  onStepFail(frame: ExecutionFrame): void {
    const stageData = this.currentStageData;
    if (stageData) {
      Object.assign(stageData, frame.data);
    }
  }

  protected async requireGroupset(): Promise<Groupset> {
    const groupset = await this.directory.getGroupset(this.groupsetId);
    if (!groupset) {
      throw new JobFailedError(`Groupset ${this.groupsetId} does not exist.`);
    }
    return groupset;
  }

  /**
   * Apply a membership change. Counts one unit per user plus one for the
   * group change, when there is one.
   */
  protected async updateMembership(groupset: Groupset, change: Omit<GroupsetUpdateData, 'groupsetId'>): Promise<void> {
    this.failedSteps = 0;

    const allUserIds = (await this.directory.listUsers()).map(user => user.id);
    const allGroupIds = (await this.directory.listGroups()).map(group => group.id);
    const addUserIds = pick(change.addUserIds, allUserIds);
    const removeUserIds = pick(change.removeUserIds, groupset.userIds);
    const addGroupIds = pick(change.addGroupIds, allGroupIds);
    const removeGroupIds = pick(change.removeGroupIds, groupset.groupIds);

    const userCount = addUserIds.length + removeUserIds.length;
    const groupCount = addGroupIds.length + removeGroupIds.length;
    this.addTotalUnits(userCount + (groupCount > 0 ? 1 : 0));

    if (groupCount > 0) {
      await this.stage(GroupsetStage.GROUPS_UPDATE, {}, () =>
        this.step(GroupsetStep.UPDATE_GROUPS, { addGroupIds, removeGroupIds }, () =>
          this.directory.transaction(() =>
            this.directory.updateGroupsetGroups(groupset.id, addGroupIds, removeGroupIds),
          ),
        ),
      );
    }

    if (userCount > 0) {
      await this.stage(GroupsetStage.USERS_UPDATE, {}, async () => {
        for (const userId of addUserIds) {
          await this.userStep(GroupsetStep.ADD_USER, userId, () =>
            this.directory.addUserToGroupset(groupset.id, userId),
          );
        }
        for (const userId of removeUserIds) {
          await this.userStep(GroupsetStep.REMOVE_USER, userId, () =>
            this.directory.removeUserFromGroupset(groupset.id, userId),
          );
        }
      });
    }
  }

  /**
   * One user change in its own step and transaction. A failed step is
   * counted and swallowed so the remaining users are still processed.
   */
  private async userStep(step: UserStep, userId: number, change: () => Promise<void>): Promise<void> {
    try {
      await this.step(step, { userId }, () =>
        this.directory.transaction(async () => {
          const user = await this.requireUser(userId);
          const data = this.currentStepData;
          if (data) {
            data.username = user.username;
          }
          await change();
          await this.directory.syncUser(userId);
        }),
      );
    } catch (error) {
      if (!(error instanceof JobStepFailedError)) {
        throw error;
      }
      this.failedSteps++;
      this.log.warn(`Job ${this.id}: ${step} failed for user ${userId}: ${error.message}`);
    }
  }

  private async requireUser(userId: number): Promise<DirectoryUser> {
    const user = await this.directory.getUser(userId);
    if (!user) {
      throw new JobStepFailedError(`User ${userId} does not exist.`);
    }
    return user;
  }

  protected async failIfStepsFailed(): Promise<void> {
    if (this.failedSteps > 0) {
      await this.fail({ reason: STEPS_FAILED_REASON });
    }
  }
}

/**
 * Add and remove a groupset's users and groups.
 */
export class GroupsetSyncJob extends GroupsetJob {
  static jobType = 'groupset.update';

  private readonly payload: GroupsetUpdateData;

  constructor(source: JobRecordInit | JobSnapshot, deps: JobRecordDeps, directory: GroupsetDirectory) {
    super(source, deps, directory);
    this.payload = parseGroupsetUpdateData(this.data);
  }

  get groupsetId(): number {
    return this.payload.groupsetId;
  }

  async act(): Promise<void> {
    const groupset = await this.requireGroupset();
    await this.updateMembership(groupset, this.payload);
    await this.failIfStepsFailed();
  }
}

/**
 * Remove every user and group from a groupset, then delete it.
 */
export class GroupsetDeleteJob extends GroupsetJob {
  static jobType = 'groupset.delete';

  private readonly target: number;

  constructor(source: JobRecordInit | JobSnapshot, deps: JobRecordDeps, directory: GroupsetDirectory) {
    super(source, deps, directory);
    this.target = parseGroupsetDeleteData(this.data).groupsetId;
  }

  get groupsetId(): number {
    return this.target;
  }

  async act(): Promise<void> {
    const groupset = await this.requireGroupset();
    // one more unit for the deletion itself
    this.addTotalUnits(1);
    await this.updateMembership(groupset, { removeUserIds: [ALL], removeGroupIds: [ALL] });
    await this.failIfStepsFailed();

    await this.stage(GroupsetStage.DELETE_GROUPSET, {}, () =>
      this.step(GroupsetStep.DELETE_GROUPSET, { groupsetId: groupset.id }, () =>
        this.directory.transaction(async () => {
          await this.directory.deleteGroupset(groupset.id);
        }),
      ),
    );
  }
}
