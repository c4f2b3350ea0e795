/**
 * Merge request state rules
 */

import type { MergeRequest, MergeRequestState, Pipeline, PipelineStatus } from '../db/schema';
import type { ProjectRecord } from '../db/store';
import type { DiffRefs } from './git-gateway';

const WIP_PATTERN = /^\s*(\[WIP\]\s*|WIP:\s*|WIP\s+)+\s*/i;

export type StateEvent = 'close' | 'reopen';

export function isOpen(mr: Pick<MergeRequest, 'state'>): boolean {
  return mr.state === 'opened' || mr.state === 'reopened';
}

export function isClosed(mr: Pick<MergeRequest, 'state'>): boolean {
  return mr.state === 'closed';
}

export function isMerged(mr: Pick<MergeRequest, 'state'>): boolean {
  return mr.state === 'merged';
}

export function isLocked(mr: Pick<MergeRequest, 'state'>): boolean {
  return mr.state === 'locked';
}

/**
 * States a merge request list filter selects
 */
export function statesForFilter(filter: 'opened' | 'closed' | 'merged' | 'all'): MergeRequestState[] {
  switch (filter) {
    case 'opened':
      return ['opened', 'reopened'];
    case 'closed':
      return ['closed'];
    case 'merged':
      return ['merged'];
    case 'all':
      return [];
  }
}

export function isWorkInProgress(title: string): boolean {
  return WIP_PATTERN.test(title);
}

export function wiplessTitle(title: string): string {
  return title.replace(WIP_PATTERN, '');
}

const ACTIVE_PIPELINE_STATUSES: PipelineStatus[] = ['created', 'pending', 'running'];

export function isPipelineActive(pipeline: Pick<Pipeline, 'status'>): boolean {
  return ACTIVE_PIPELINE_STATUSES.includes(pipeline.status);
}

export function isPipelineComplete(pipeline: Pick<Pipeline, 'status'>): boolean {
  return ['success', 'failed', 'canceled', 'skipped'].includes(pipeline.status);
}

/**
 * Everything the mergeability rules look at
 */
export interface MergeRequestSnapshot {
  mergeRequest: MergeRequest;
  targetProject: ProjectRecord;
  sourceProject: ProjectRecord | undefined;
  sourceBranchExists: boolean;
  headPipeline: Pipeline | undefined;
}

/**
 * The source project is gone or the source branch no longer exists
 */
export function isBroken(snapshot: MergeRequestSnapshot): boolean {
  return !snapshot.sourceProject || !snapshot.sourceBranchExists;
}

/**
 * Projects that only allow merging after a green build block merges
 * while the head pipeline is anything but successful
 */
export function isMergeableCiState(snapshot: MergeRequestSnapshot): boolean {
  if (!snapshot.targetProject.onlyAllowMergeIfBuildSucceeds) return true;
  return !snapshot.headPipeline || snapshot.headPipeline.status === 'success';
}

export function isMergeableState(
  snapshot: MergeRequestSnapshot,
  options: { skipCiCheck?: boolean } = {}
): boolean {
  const { mergeRequest } = snapshot;
  if (!isOpen(mergeRequest)) return false;
  if (isWorkInProgress(mergeRequest.title)) return false;
  if (!options.skipCiCheck && !isMergeableCiState(snapshot)) return false;
  return !isBroken(snapshot);
}

/**
 * State change for a state event, or null when the event does not apply
 */
export function transition(
  snapshot: MergeRequestSnapshot,
  event: StateEvent,
  now: Date = new Date()
): Pick<MergeRequest, 'state' | 'closedAt'> | null {
  const { mergeRequest } = snapshot;

  switch (event) {
    case 'close':
      return isOpen(mergeRequest) ? { state: 'closed', closedAt: now } : null;
    case 'reopen':
      return isClosed(mergeRequest) && !isBroken(snapshot)
        ? { state: 'reopened', closedAt: null }
        : null;
  }
}

export function diffRefsOf(mr: MergeRequest): DiffRefs | null {
  if (!mr.diffBaseSha || !mr.diffStartSha || !mr.diffHeadSha) return null;
  return { baseSha: mr.diffBaseSha, startSha: mr.diffStartSha, headSha: mr.diffHeadSha };
}

export function defaultMergeCommitMessage(mr: Pick<MergeRequest, 'iid' | 'title' | 'sourceBranch' | 'targetBranch'>): string {
  return [
    `Merge branch '${mr.sourceBranch}' into '${mr.targetBranch}'`,
    '',
    mr.title,
    '',
    `See merge request !${mr.iid}`,
  ].join('\n');
}

export function projectFullPath(project: ProjectRecord): string {
  return `${project.namespace.path}/${project.path}`;
}
