import type { MergeRequest } from '../db/schema';
import { isWorkInProgress } from '../core/merge-request';

export interface MergeRequestEntity {
  id: string;
  iid: number;
  title: string;
  description: string | null;
  state: MergeRequest['state'];
  merge_status: MergeRequest['mergeStatus'];
  source_project_id: string | null;
  source_branch: string;
  target_project_id: string;
  target_branch: string;
  author_id: string;
  work_in_progress: boolean;
  merge_when_build_succeeds: boolean;
  merge_error: string | null;
  merge_commit_sha: string | null;
  diff_head_sha: string | null;
  web_url: string;
  created_at: string;
  updated_at: string;
  merged_at: string | null;
  closed_at: string | null;
}

export function representMergeRequest(mr: MergeRequest, projectPath: string): MergeRequestEntity {
  return {
    id: mr.id,
    iid: mr.iid,
    title: mr.title,
    description: mr.description,
    state: mr.state,
    merge_status: mr.mergeStatus,
    source_project_id: mr.sourceProjectId,
    source_branch: mr.sourceBranch,
    target_project_id: mr.targetProjectId,
    target_branch: mr.targetBranch,
    author_id: mr.authorId,
    work_in_progress: isWorkInProgress(mr.title),
    merge_when_build_succeeds: mr.mergeWhenBuildSucceeds,
    merge_error: mr.mergeError,
    merge_commit_sha: mr.mergeCommitSha,
    diff_head_sha: mr.diffHeadSha,
    web_url: `/${projectPath}/merge_requests/${mr.iid}`,
    created_at: mr.createdAt.toISOString(),
    updated_at: mr.updatedAt.toISOString(),
    merged_at: mr.mergedAt?.toISOString() ?? null,
    closed_at: mr.closedAt?.toISOString() ?? null,
  };
}
