/**
 * Access policy for projects and merge requests
 */

import type { MergeRequest, User } from '../db/schema';
import type { MemberStore, ProjectRecord } from '../db/store';

export const AccessLevel = {
  NO_ACCESS: 0,
  GUEST: 10,
  REPORTER: 20,
  DEVELOPER: 30,
  MASTER: 40,
  OWNER: 50,
} as const;

export type MergeRequestAbility =
  | 'read_merge_request'
  | 'create_merge_request'
  | 'update_merge_request'
  | 'admin_merge_request'
  | 'destroy_merge_request';

/**
 * Answers permission questions for one (possibly anonymous) user
 */
export class Ability {
  private levels = new Map<string, number>();

  constructor(
    private readonly user: User | undefined,
    private readonly members: MemberStore
  ) {}

  /**
   * Effective access level of the user on a project
   */
  async accessLevel(project: ProjectRecord): Promise<number> {
    if (!this.user) return AccessLevel.NO_ACCESS;
    if (this.user.isAdmin) return AccessLevel.OWNER;
    if (project.namespace.ownerId === this.user.id) return AccessLevel.OWNER;

    const cached = this.levels.get(project.id);
    if (cached !== undefined) return cached;

    const level = await this.members.accessLevel(project.id, this.user.id);
    this.levels.set(project.id, level);
    return level;
  }

  async canReadProject(project: ProjectRecord): Promise<boolean> {
    if (project.visibility === 'public') return true;
    if (!this.user) return false;
    if (project.visibility === 'internal') return true;
    return (await this.accessLevel(project)) >= AccessLevel.GUEST;
  }

  /**
   * Check a merge request ability on a project.
   * `mergeRequest` is needed for author-based rules.
   */
  async can(
    ability: MergeRequestAbility,
    project: ProjectRecord,
    mergeRequest?: MergeRequest
  ): Promise<boolean> {
    switch (ability) {
      case 'read_merge_request':
        return this.canReadProject(project);
      case 'create_merge_request':
        return (await this.accessLevel(project)) >= AccessLevel.DEVELOPER;
      case 'update_merge_request':
        if (mergeRequest && this.user && mergeRequest.authorId === this.user.id) {
          return this.canReadProject(project);
        }
        return (await this.accessLevel(project)) >= AccessLevel.DEVELOPER;
      case 'admin_merge_request':
        return (await this.accessLevel(project)) >= AccessLevel.MASTER;
      case 'destroy_merge_request':
        return (await this.accessLevel(project)) >= AccessLevel.OWNER;
    }
  }

  /**
   * Whether the user may push the merge into the target branch
   */
  async canMerge(targetProject: ProjectRecord): Promise<boolean> {
    return (await this.accessLevel(targetProject)) >= AccessLevel.DEVELOPER;
  }

  /**
   * Whether the user may report pipeline results for the project
   */
  async canUpdatePipeline(project: ProjectRecord): Promise<boolean> {
    return (await this.accessLevel(project)) >= AccessLevel.DEVELOPER;
  }
}
