/**
 * Repository access used by merge requests.
 *
 * The server implementation drives the git binary (see
 * server/storage/git-cli.ts); anything that can list trees and read blobs
 * can stand in for it.
 */

import type { CompareOptions, DiffFile } from './compare';

/**
 * The parts of a project the gateway needs
 */
export interface GitProject {
  id: string;
  fullPath: string;
  diskPath: string;
}

/**
 * Source and target of a merge request
 */
export interface BranchPair {
  targetProject: GitProject;
  targetBranch: string;
  sourceProject: GitProject;
  sourceBranch: string;
}

/**
 * base: merge base, start: target branch head, head: source branch head
 */
export interface DiffRefs {
  baseSha: string;
  startSha: string;
  headSha: string;
}

export interface Comparison {
  diffRefs: DiffRefs;
  diffs: DiffFile[];
}

export interface CommitSummary {
  sha: string;
  shortSha: string;
  title: string;
  message: string;
  authorName: string;
  authorEmail: string;
  authoredAt: Date;
}

export interface MergeCommitOptions {
  message: string;
  authorName: string;
  authorEmail: string;
}

export type DiffOptions = Omit<CompareOptions, 'contextLines'>;

export interface GitGateway {
  /** Head commit of a branch, or null when the branch does not exist */
  branchSha(project: GitProject, branch: string): Promise<string | null>;

  /** Merge base and branch heads; fails when either branch is missing */
  diffRefs(pair: BranchPair): Promise<DiffRefs>;

  /** Diff between the merge base and the source branch head */
  compare(pair: BranchPair, options?: DiffOptions): Promise<Comparison>;

  /** Commits on the source branch that are not on the target branch, newest first */
  commits(pair: BranchPair): Promise<CommitSummary[]>;

  /**
   * Diff between two commits of a project. Commits of a fork's source
   * branch are present in the target project once diff refs were computed.
   */
  diffBetween(project: GitProject, fromSha: string, toSha: string, options?: DiffOptions): Promise<DiffFile[]>;

  /** Commits reachable from `toSha` but not from `fromSha`, newest first */
  commitsBetween(project: GitProject, fromSha: string, toSha: string): Promise<CommitSummary[]>;

  /** Whether the source branch merges into the target branch without conflicts */
  canMerge(pair: BranchPair): Promise<boolean>;

  /** Merge the source branch into the target branch, returning the merge commit sha */
  merge(pair: BranchPair, options: MergeCommitOptions): Promise<string>;

  deleteBranch(project: GitProject, branch: string): Promise<void>;
}
