/**
 * Merge when build succeeds
 *
 * Flags a merge request for an automatic merge once the pipeline of its
 * head commit turns green, and performs that merge when it does.
 */

import type { MergeParams, MergeRequest, Pipeline, User } from '../db/schema';
import type { EventBus } from '../events/bus';
import { isOpen, projectFullPath, type MergeRequestSnapshot } from '../core/merge-request';
import { loadSnapshot, type ServiceDeps } from './context';
import { checkMergeable } from './mergeability';
import type { MergeWorker } from './merge-worker';

export class MergeWhenBuildSucceedsService {
  constructor(
    private readonly deps: ServiceDeps,
    private readonly worker: Pick<MergeWorker, 'performAsync'>
  ) {}

  /**
   * Flag the merge request. When it is already flagged only the stored
   * merge parameters are refreshed.
   */
  async execute(snapshot: MergeRequestSnapshot, user: User, params: MergeParams): Promise<MergeRequest> {
    const { mergeRequest } = snapshot;

    if (mergeRequest.mergeWhenBuildSucceeds) {
      return (await this.deps.store.mergeRequests.update(mergeRequest.id, { mergeParams: params })) ?? mergeRequest;
    }

    const updated = await this.deps.store.mergeRequests.update(mergeRequest.id, {
      mergeWhenBuildSucceeds: true,
      mergeUserId: user.id,
      mergeParams: params,
    });

    await this.deps.eventBus.emit('merge_request.merge_when_build_succeeds', user.id, {
      mergeRequestId: mergeRequest.id,
      iid: mergeRequest.iid,
      title: mergeRequest.title,
      targetProjectId: mergeRequest.targetProjectId,
      projectFullPath: projectFullPath(snapshot.targetProject),
    });

    return updated ?? mergeRequest;
  }

  /**
   * Stop waiting for the pipeline
   */
  async cancel(snapshot: MergeRequestSnapshot, user: User): Promise<MergeRequest> {
    const { mergeRequest } = snapshot;
    if (!mergeRequest.mergeWhenBuildSucceeds) {
      return mergeRequest;
    }

    const updated = await this.deps.store.mergeRequests.update(mergeRequest.id, {
      mergeWhenBuildSucceeds: false,
      mergeUserId: null,
      mergeParams: null,
    });

    await this.deps.eventBus.emit('merge_request.auto_merge_canceled', user.id, {
      mergeRequestId: mergeRequest.id,
      iid: mergeRequest.iid,
      title: mergeRequest.title,
      targetProjectId: mergeRequest.targetProjectId,
      projectFullPath: projectFullPath(snapshot.targetProject),
    });

    return updated ?? mergeRequest;
  }

  /**
   * Enqueue merges for flagged merge requests whose head pipeline succeeded.
   * Returns the ids of the enqueued jobs.
   */
  async trigger(pipeline: Pipeline): Promise<string[]> {
    if (pipeline.status !== 'success') return [];

    const candidates = await this.deps.store.mergeRequests.listAutoMergeCandidates(
      pipeline.projectId,
      pipeline.ref,
      pipeline.sha
    );

    const jobIds: string[] = [];
    for (const candidate of candidates) {
      if (!isOpen(candidate) || !candidate.mergeUserId) continue;

      const snapshot = await loadSnapshot(this.deps, candidate);
      if (snapshot.mergeRequest.diffHeadSha !== pipeline.sha) continue;

      if (!(await checkMergeable(this.deps, snapshot))) {
        this.deps.logger.info('Auto merge postponed, merge request is not mergeable', {
          mergeRequestId: candidate.id,
        });
        continue;
      }

      jobIds.push(
        this.worker.performAsync(candidate.id, candidate.mergeUserId, candidate.mergeParams ?? {})
      );
    }

    return jobIds;
  }

  /**
   * Run auto merges when pipelines complete
   */
  register(eventBus: EventBus): () => void {
    return eventBus.on('pipeline.completed', async (event) => {
      const pipeline = await this.deps.store.pipelines.findById(event.payload.pipelineId);
      if (pipeline) {
        await this.trigger(pipeline);
      }
    });
  }
}
