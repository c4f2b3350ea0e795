/**
 * Persistence interfaces used by the services and routes.
 *
 * The drizzle models in ./models implement these against PostgreSQL.
 */

import type {
  MergeRequest,
  MergeRequestState,
  NewMergeRequest,
  Namespace,
  Pipeline,
  PipelineStatus,
  Project,
  User,
} from './schema';

export type ProjectRecord = Project & { namespace: Namespace };

export type MergeRequestUpdate = Partial<
  Omit<NewMergeRequest, 'id' | 'iid' | 'targetProjectId' | 'authorId' | 'createdAt'>
>;

export interface MergeRequestListOptions {
  states?: MergeRequestState[];
  limit?: number;
  offset?: number;
}

export interface UserStore {
  findById(id: string): Promise<User | undefined>;
  findByUsername(username: string): Promise<User | undefined>;
}

export interface SessionStore {
  /** The user of an unexpired session */
  findUserByToken(token: string): Promise<User | undefined>;
}

export interface ProjectStore {
  findById(id: string): Promise<ProjectRecord | undefined>;
  findByFullPath(namespacePath: string, projectPath: string): Promise<ProjectRecord | undefined>;
}

export interface MemberStore {
  /** Access level of a member, 0 when the user is not a member */
  accessLevel(projectId: string, userId: string): Promise<number>;
}

export interface MergeRequestStore {
  findById(id: string): Promise<MergeRequest | undefined>;
  findByIid(targetProjectId: string, iid: number): Promise<MergeRequest | undefined>;
  listByTargetProject(targetProjectId: string, options?: MergeRequestListOptions): Promise<MergeRequest[]>;
  /** Assigns the next iid of the target project */
  create(data: Omit<NewMergeRequest, 'iid'>): Promise<MergeRequest>;
  update(id: string, data: MergeRequestUpdate): Promise<MergeRequest | undefined>;
  delete(id: string): Promise<boolean>;
  /** Open merge requests waiting for a pipeline on this source branch and sha */
  listAutoMergeCandidates(sourceProjectId: string, sourceBranch: string, sha: string): Promise<MergeRequest[]>;
}

export interface PipelineStore {
  findById(id: string): Promise<Pipeline | undefined>;
  /** Most recent pipeline for a commit on a ref */
  latestFor(projectId: string, sha: string, ref: string): Promise<Pipeline | undefined>;
  updateStatus(id: string, status: PipelineStatus, finishedAt: Date | null): Promise<Pipeline | undefined>;
}

export interface Store {
  users: UserStore;
  sessions: SessionStore;
  projects: ProjectStore;
  members: MemberStore;
  mergeRequests: MergeRequestStore;
  pipelines: PipelineStore;
}
