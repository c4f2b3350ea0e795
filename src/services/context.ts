/**
 * Shared service dependencies and merge request loading
 */

import type { Store, ProjectRecord } from '../db/store';
import type { MergeRequest } from '../db/schema';
import type { BranchPair, GitGateway, GitProject } from '../core/git-gateway';
import type { EventBus } from '../events/bus';
import type { Logger } from '../server/logger';
import { Errors } from '../core/errors';
import { isOpen, projectFullPath, type MergeRequestSnapshot } from '../core/merge-request';

export interface ServiceDeps {
  store: Store;
  git: GitGateway;
  eventBus: EventBus;
  logger: Logger;
}

export function toGitProject(project: ProjectRecord): GitProject {
  return {
    id: project.id,
    fullPath: projectFullPath(project),
    diskPath: project.diskPath,
  };
}

/**
 * Source/target pair of a merge request, or null once the source project is gone
 */
export function branchPair(snapshot: Pick<MergeRequestSnapshot, 'mergeRequest' | 'targetProject' | 'sourceProject'>): BranchPair | null {
  if (!snapshot.sourceProject) return null;
  return {
    targetProject: toGitProject(snapshot.targetProject),
    targetBranch: snapshot.mergeRequest.targetBranch,
    sourceProject: toGitProject(snapshot.sourceProject),
    sourceBranch: snapshot.mergeRequest.sourceBranch,
  };
}

/**
 * Load the projects, branch state and head pipeline of a merge request.
 *
 * When the source branch of an open merge request has moved since the diff
 * refs were stored, the refs are refreshed first.
 */
export async function loadSnapshot(
  deps: ServiceDeps,
  mergeRequest: MergeRequest,
  targetProject?: ProjectRecord
): Promise<MergeRequestSnapshot> {
  const target = targetProject ?? (await deps.store.projects.findById(mergeRequest.targetProjectId));
  if (!target) {
    throw Errors.notFound('Project', { projectId: mergeRequest.targetProjectId });
  }

  let source: ProjectRecord | undefined;
  if (mergeRequest.sourceProjectId === target.id) {
    source = target;
  } else if (mergeRequest.sourceProjectId) {
    source = await deps.store.projects.findById(mergeRequest.sourceProjectId);
  }

  let mr = mergeRequest;
  let sourceBranchExists = false;

  if (source) {
    const headSha = await deps.git.branchSha(toGitProject(source), mr.sourceBranch);
    sourceBranchExists = headSha !== null;

    if (headSha && headSha !== mr.diffHeadSha && isOpen(mr)) {
      const pair = branchPair({ mergeRequest: mr, targetProject: target, sourceProject: source });
      const targetSha = pair ? await deps.git.branchSha(pair.targetProject, pair.targetBranch) : null;

      if (pair && targetSha) {
        const refs = await deps.git.diffRefs(pair);
        mr = (await deps.store.mergeRequests.update(mr.id, {
          diffBaseSha: refs.baseSha,
          diffStartSha: refs.startSha,
          diffHeadSha: refs.headSha,
          mergeStatus: 'unchecked',
        })) ?? mr;
      }
    }
  }

  const headPipeline =
    source && mr.diffHeadSha
      ? await deps.store.pipelines.latestFor(source.id, mr.diffHeadSha, mr.sourceBranch)
      : undefined;

  return {
    mergeRequest: mr,
    targetProject: target,
    sourceProject: source,
    sourceBranchExists,
    headPipeline,
  };
}
