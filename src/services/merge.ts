/**
 * Performs the merge of a merge request.
 *
 * Runs inside the merge worker, never inside a request: the merge request is
 * locked while git works and unlocked again with an error if it fails.
 */

import type { MergeParams, MergeRequest } from '../db/schema';
import { defaultMergeCommitMessage, isOpen, projectFullPath } from '../core/merge-request';
import { metrics } from '../server/logger';
import { branchPair, loadSnapshot, toGitProject, type ServiceDeps } from './context';
import { checkMergeable } from './mergeability';

export type MergeOutcome =
  | { status: 'merged'; mergeCommitSha: string }
  | { status: 'failed'; error: string }
  | { status: 'skipped'; reason: string };

export class MergeService {
  constructor(private readonly deps: ServiceDeps) {}

  async execute(mergeRequestId: string, userId: string, params: MergeParams = {}): Promise<MergeOutcome> {
    const { store, git, eventBus } = this.deps;
    const log = this.deps.logger.child({ mergeRequestId });

    const mergeRequest = await store.mergeRequests.findById(mergeRequestId);
    if (!mergeRequest || !isOpen(mergeRequest)) {
      log.info('Merge skipped, merge request is not open');
      return { status: 'skipped', reason: 'Merge request is not open' };
    }

    const user = await store.users.findById(userId);
    if (!user) {
      return this.fail(mergeRequest, userId, 'Merging user no longer exists');
    }

    const snapshot = await loadSnapshot(this.deps, mergeRequest);
    const mr = snapshot.mergeRequest;
    const pair = branchPair(snapshot);

    if (!pair || !(await checkMergeable(this.deps, snapshot))) {
      return this.fail(mr, userId, 'Merge request is not mergeable');
    }

    if (params.sha && params.sha !== mr.diffHeadSha) {
      return this.fail(mr, userId, 'Branch has been updated since the merge was requested');
    }

    await store.mergeRequests.update(mr.id, { state: 'locked' });
    const timer = log.startTimer('Merge finished');

    let mergeCommitSha: string;
    try {
      mergeCommitSha = await git.merge(pair, {
        message: params.commitMessage || defaultMergeCommitMessage(mr),
        authorName: user.name,
        authorEmail: user.email,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      await store.mergeRequests.update(mr.id, { state: mr.state });
      return this.fail(mr, userId, message);
    }
    timer.end();

    await store.mergeRequests.update(mr.id, {
      state: 'merged',
      mergeCommitSha,
      mergedAt: new Date(),
      mergeError: null,
      mergeWhenBuildSucceeds: false,
    });
    metrics.inc('merge_requests_merged_total');

    if (params.shouldRemoveSourceBranch && snapshot.sourceProject) {
      try {
        await git.deleteBranch(toGitProject(snapshot.sourceProject), mr.sourceBranch);
      } catch (error) {
        log.warn('Could not remove source branch', {
          branch: mr.sourceBranch,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    await eventBus.emit('merge_request.merged', userId, {
      mergeRequestId: mr.id,
      iid: mr.iid,
      title: mr.title,
      targetProjectId: mr.targetProjectId,
      projectFullPath: projectFullPath(snapshot.targetProject),
      mergeCommitSha,
    });

    return { status: 'merged', mergeCommitSha };
  }

  private async fail(mr: MergeRequest, userId: string, error: string): Promise<MergeOutcome> {
    const { store, eventBus } = this.deps;

    this.deps.logger.warn('Merge failed', { mergeRequestId: mr.id, error });
    metrics.inc('merge_requests_merge_failed_total');

    await store.mergeRequests.update(mr.id, { mergeError: error });
    const target = await store.projects.findById(mr.targetProjectId);

    await eventBus.emit('merge_request.merge_failed', userId, {
      mergeRequestId: mr.id,
      iid: mr.iid,
      title: mr.title,
      targetProjectId: mr.targetProjectId,
      projectFullPath: target ? projectFullPath(target) : '',
      error,
    });

    return { status: 'failed', error };
  }
}
