import type { MergeRequest, User } from '../db/schema';
import type { MergeRequestUpdate } from '../db/store';
import { Errors } from '../core/errors';
import { projectFullPath, transition, type MergeRequestSnapshot, type StateEvent } from '../core/merge-request';
import { branchPair, type ServiceDeps } from './context';

export interface UpdateMergeRequestParams {
  stateEvent?: StateEvent;
  title?: string;
  description?: string;
  targetBranch?: string;
}

/**
 * Edits a merge request and applies state events
 */
export class UpdateMergeRequestService {
  constructor(private readonly deps: ServiceDeps) {}

  async execute(snapshot: MergeRequestSnapshot, user: User, params: UpdateMergeRequestParams): Promise<MergeRequest> {
    const { store, git } = this.deps;
    const { mergeRequest } = snapshot;
    const changes: MergeRequestUpdate = {};

    if (params.title !== undefined) {
      if (params.title.trim() === '') {
        throw Errors.validation(["Title can't be blank"]);
      }
      changes.title = params.title;
    }
    if (params.description !== undefined) {
      changes.description = params.description;
    }

    if (params.targetBranch !== undefined && params.targetBranch !== mergeRequest.targetBranch) {
      const pair = branchPair({ ...snapshot, mergeRequest: { ...mergeRequest, targetBranch: params.targetBranch } });
      if (!pair) {
        throw Errors.validation(['Source project no longer exists']);
      }
      if (!(await git.branchSha(pair.targetProject, params.targetBranch))) {
        throw Errors.validation([`Target branch "${params.targetBranch}" does not exist`]);
      }
      const refs = await git.diffRefs(pair);
      Object.assign(changes, {
        targetBranch: params.targetBranch,
        diffBaseSha: refs.baseSha,
        diffStartSha: refs.startSha,
        diffHeadSha: refs.headSha,
        mergeStatus: 'unchecked',
      } satisfies MergeRequestUpdate);
    }

    const stateChange = params.stateEvent ? transition(snapshot, params.stateEvent) : null;
    if (stateChange) {
      Object.assign(changes, stateChange);
    }

    if (Object.keys(changes).length === 0) {
      return mergeRequest;
    }

    const updated = (await store.mergeRequests.update(mergeRequest.id, changes)) ?? mergeRequest;

    if (stateChange && params.stateEvent) {
      const payload = {
        mergeRequestId: updated.id,
        iid: updated.iid,
        title: updated.title,
        targetProjectId: updated.targetProjectId,
        projectFullPath: projectFullPath(snapshot.targetProject),
      };
      if (params.stateEvent === 'close') {
        await this.deps.eventBus.emit('merge_request.closed', user.id, payload);
      } else {
        await this.deps.eventBus.emit('merge_request.reopened', user.id, payload);
      }
    }

    return updated;
  }
}
