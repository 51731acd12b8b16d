/**
 * @fileoverview Groupset membership directory.
 *
 * A groupset bundles users with groups: every member of a groupset
 * effectively belongs to each of its groups, on top of the groups the user
 * holds directly.
 *
 * @module jobs/groupset/directory
 */

import { Logger } from '../../core/logger';

const log = Logger.for('jobs');

export interface DirectoryUser {
  id: number;
  username: string;
  /** Groups held directly, not through a groupset */
  groupIds: number[];
}

export interface DirectoryGroup {
  id: number;
  name: string;
}

export interface Groupset {
  id: number;
  name: string;
  userIds: number[];
  groupIds: number[];
}

/**
 * Membership storage used by the groupset jobs.
 */
export interface GroupsetDirectory {
  getUser(id: number): Promise<DirectoryUser | undefined>;
  listUsers(): Promise<DirectoryUser[]>;
  getGroup(id: number): Promise<DirectoryGroup | undefined>;
  listGroups(): Promise<DirectoryGroup[]>;
  getGroupset(id: number): Promise<Groupset | undefined>;

  addUserToGroupset(groupsetId: number, userId: number): Promise<void>;
  removeUserFromGroupset(groupsetId: number, userId: number): Promise<void>;
  updateGroupsetGroups(groupsetId: number, addGroupIds: readonly number[], removeGroupIds: readonly number[]): Promise<void>;
  deleteGroupset(groupsetId: number): Promise<boolean>;

  /** Names of the user's direct groups plus every group of its groupsets. */
  effectiveGroupNames(userId: number): Promise<Set<string>>;

  /** Push a user's effective membership to the identity provider. */
  syncUser(userId: number): Promise<void>;

  /** All-or-nothing scope for compound membership changes. */
  transaction<T>(fn: () => Promise<T>): Promise<T>;
}

/**
 * Directory held in process memory. Sync calls are recorded instead of
 * sent anywhere.
 */
export class InMemoryGroupsetDirectory implements GroupsetDirectory {
  private users = new Map<number, DirectoryUser>();
  private groups = new Map<number, DirectoryGroup>();
  private groupsets = new Map<number, Groupset>();
  private synced: number[] = [];

  // ─── Seeding ───────────────────────────────────────────────────────────

  addUser(user: DirectoryUser): this {
    this.users.set(user.id, structuredClone(user));
    return this;
  }

  addGroup(group: DirectoryGroup): this {
    this.groups.set(group.id, { ...group });
    return this;
  }

  addGroupset(groupset: Groupset): this {
    this.groupsets.set(groupset.id, structuredClone(groupset));
    return this;
  }

  /** User ids passed to {@link syncUser}, in call order. */
  get syncedUserIds(): readonly number[] {
    return [...this.synced];
  }

  // ─── GroupsetDirectory ─────────────────────────────────────────────────

  async getUser(id: number): Promise<DirectoryUser | undefined> {
    const user = this.users.get(id);
    return user ? structuredClone(user) : undefined;
  }

  async listUsers(): Promise<DirectoryUser[]> {
    return [...this.users.values()].map(user => structuredClone(user));
  }

  async getGroup(id: number): Promise<DirectoryGroup | undefined> {
    const group = this.groups.get(id);
    return group ? { ...group } : undefined;
  }

  async listGroups(): Promise<DirectoryGroup[]> {
    return [...this.groups.values()].map(group => ({ ...group }));
  }

  async getGroupset(id: number): Promise<Groupset | undefined> {
    const groupset = this.groupsets.get(id);
    return groupset ? structuredClone(groupset) : undefined;
  }

  async addUserToGroupset(groupsetId: number, userId: number): Promise<void> {
    const groupset = this.requireGroupset(groupsetId);
    if (!this.users.has(userId)) {
      throw new Error(`User ${userId} does not exist`);
    }
    if (!groupset.userIds.includes(userId)) {
      groupset.userIds.push(userId);
    }
  }

  async removeUserFromGroupset(groupsetId: number, userId: number): Promise<void> {
    const groupset = this.requireGroupset(groupsetId);
    groupset.userIds = groupset.userIds.filter(id => id !== userId);
  }

  async updateGroupsetGroups(
    groupsetId: number,
    addGroupIds: readonly number[],
    removeGroupIds: readonly number[],
  ): Promise<void> {
    const groupset = this.requireGroupset(groupsetId);
    const missing = addGroupIds.filter(id => !this.groups.has(id));
    if (missing.length > 0) {
      throw new Error(`Groups do not exist: ${missing.join(', ')}`);
    }
    const groupIds = new Set(groupset.groupIds);
    addGroupIds.forEach(id => groupIds.add(id));
    removeGroupIds.forEach(id => groupIds.delete(id));
    groupset.groupIds = [...groupIds].sort((a, b) => a - b);
  }

  async deleteGroupset(groupsetId: number): Promise<boolean> {
    return this.groupsets.delete(groupsetId);
  }

  async effectiveGroupNames(userId: number): Promise<Set<string>> {
    const user = this.users.get(userId);
    if (!user) {
      return new Set();
    }
    const groupIds = new Set(user.groupIds);
    for (const groupset of this.groupsets.values()) {
      if (groupset.userIds.includes(userId)) {
        groupset.groupIds.forEach(id => groupIds.add(id));
      }
    }
    const names = new Set<string>();
    for (const id of groupIds) {
      const group = this.groups.get(id);
      if (group) {
        names.add(group.name);
      }
    }
    return names;
  }

  async syncUser(userId: number): Promise<void> {
    this.synced.push(userId);
    log.debug(`Synced user ${userId} with identity provider`);
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const users = structuredClone(this.users);
    const groups = structuredClone(this.groups);
    const groupsets = structuredClone(this.groupsets);
    const synced = [...this.synced];
    try {
      return await fn();
    } catch (error) {
      this.users = users;
      this.groups = groups;
      this.groupsets = groupsets;
      this.synced = synced;
      throw error;
    }
  }

  private requireGroupset(id: number): Groupset {
    const groupset = this.groupsets.get(id);
    if (!groupset) {
      throw new Error(`Groupset ${id} does not exist`);
    }
    return groupset;
  }
}
