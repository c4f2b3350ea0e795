/**
 * Decides what a merge request's merge button does
 */

import type { MergeParams, User } from '../db/schema';
import { isPipelineActive, type MergeRequestSnapshot } from '../core/merge-request';
import type { ServiceDeps } from './context';
import { checkMergeable } from './mergeability';
import type { MergeWorker } from './merge-worker';
import type { MergeWhenBuildSucceedsService } from './merge-when-build-succeeds';

export type MergeStatus = 'success' | 'failed' | 'sha_mismatch' | 'merge_when_build_succeeds';

export interface MergeRequestParams extends MergeParams {
  mergeWhenBuildSucceeds?: boolean;
}

export class MergeActionService {
  constructor(
    private readonly deps: ServiceDeps,
    private readonly worker: Pick<MergeWorker, 'performAsync'>,
    private readonly mergeWhenBuildSucceeds: Pick<MergeWhenBuildSucceedsService, 'execute'>
  ) {}

  /**
   * The caller has already checked that the user may merge.
   */
  async execute(snapshot: MergeRequestSnapshot, user: User, params: MergeRequestParams): Promise<MergeStatus> {
    const { mergeRequest, headPipeline } = snapshot;
    const { mergeWhenBuildSucceeds = false, ...mergeParams } = params;

    // The CI check waits for the pipeline when an auto merge is requested
    const autoMergeActive = mergeWhenBuildSucceeds && headPipeline !== undefined && isPipelineActive(headPipeline);

    if (!(await checkMergeable(this.deps, snapshot, { skipCiCheck: autoMergeActive }))) {
      return 'failed';
    }

    if (!params.sha || params.sha !== mergeRequest.diffHeadSha) {
      return 'sha_mismatch';
    }

    await this.deps.store.mergeRequests.update(mergeRequest.id, { mergeError: null });

    if (mergeWhenBuildSucceeds) {
      if (autoMergeActive) {
        await this.mergeWhenBuildSucceeds.execute(snapshot, user, mergeParams);
        return 'merge_when_build_succeeds';
      }

      // The pipeline finished while the button was being clicked
      if (!headPipeline || headPipeline.status === 'success') {
        this.worker.performAsync(mergeRequest.id, user.id, mergeParams);
        return 'success';
      }

      return 'failed';
    }

    this.worker.performAsync(mergeRequest.id, user.id, mergeParams);
    return 'success';
  }
}
