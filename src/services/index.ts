/**
 * Merge request services wired together
 */

import { MergeService } from './merge';
import { MergeWorker } from './merge-worker';
import { MergeWhenBuildSucceedsService } from './merge-when-build-succeeds';
import { MergeActionService } from './merge-action';
import { UpdateMergeRequestService } from './update-merge-request';
import { BuildMergeRequestService, CreateMergeRequestService } from './build-merge-request';
import { PipelineStatusService } from './pipeline-status';
import type { ServiceDeps } from './context';

export interface Services extends ServiceDeps {
  merge: MergeService;
  worker: MergeWorker;
  mergeWhenBuildSucceeds: MergeWhenBuildSucceedsService;
  mergeAction: MergeActionService;
  update: UpdateMergeRequestService;
  build: BuildMergeRequestService;
  create: CreateMergeRequestService;
  pipelineStatus: PipelineStatusService;
}

export function createServices(deps: ServiceDeps): Services {
  const merge = new MergeService(deps);
  const worker = new MergeWorker(merge, deps.logger.child({ service: 'merge-worker' }));
  const mergeWhenBuildSucceeds = new MergeWhenBuildSucceedsService(deps, worker);

  mergeWhenBuildSucceeds.register(deps.eventBus);

  return {
    ...deps,
    merge,
    worker,
    mergeWhenBuildSucceeds,
    mergeAction: new MergeActionService(deps, worker, mergeWhenBuildSucceeds),
    update: new UpdateMergeRequestService(deps),
    build: new BuildMergeRequestService(deps),
    create: new CreateMergeRequestService(deps),
    pipelineStatus: new PipelineStatusService(deps),
  };
}

export { loadSnapshot, branchPair, toGitProject, type ServiceDeps } from './context';
export { checkMergeable } from './mergeability';
export type { MergeOutcome } from './merge';
export type { MergeStatus, MergeRequestParams } from './merge-action';
export type { MergeRequestDraft, CreateMergeRequestResult } from './build-merge-request';
