/**
 * Tests for building, creating and updating merge requests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  BuildMergeRequestService,
  CreateMergeRequestService,
  humanizeBranchName,
} from '../services/build-merge-request';
import { UpdateMergeRequestService } from '../services/update-merge-request';
import { loadSnapshot, type ServiceDeps } from '../services/context';
import { AppError, ErrorCode } from '../core/errors';
import type { MergeRequest, User } from '../db/schema';
import type { ProjectRecord } from '../db/store';
import { MemoryGit, MemoryStore, RecordingEventBus, openMergeRequest, quietLogger } from './test-utils';

describe('merge request services', () => {
  let store: MemoryStore;
  let git: MemoryGit;
  let eventBus: RecordingEventBus;
  let deps: ServiceDeps;
  let user: User;
  let project: ProjectRecord;

  beforeEach(() => {
    store = new MemoryStore();
    git = new MemoryGit();
    eventBus = new RecordingEventBus();
    deps = { store, git, eventBus, logger: quietLogger() };

    user = store.addUser('alice');
    project = store.addProject({ namespace: 'acme', path: 'app', ownerId: user.id });
    git.commit(project, 'master', { 'README.md': '# App\n' }, 'Initial commit');
  });

  describe('humanizeBranchName', () => {
    it('should turn a branch name into a title', () => {
      expect(humanizeBranchName('fix-login_page')).toBe('Fix login page');
    });
  });

  describe('BuildMergeRequestService', () => {
    it('should compare the source branch with the default branch', async () => {
      const head = git.commit(project, 'feature', { 'app.ts': 'export {};\n' }, 'Add the app', { from: 'master' });

      const draft = await new BuildMergeRequestService(deps).execute({
        sourceProject: project,
        targetProject: project,
        sourceBranch: 'feature',
      });

      expect(draft.errors).toEqual([]);
      expect(draft.targetBranch).toBe('master');
      expect(draft.title).toBe('Add the app');
      expect(draft.commits.map((c) => c.sha)).toEqual([head]);
      expect(draft.comparison?.diffRefs.headSha).toBe(head);
      expect(draft.comparison?.diffs.map((d) => d.newPath)).toEqual(['app.ts']);
    });

    it('should title a multi-commit branch after the branch', async () => {
      git.commit(project, 'add-login_form', { 'a.ts': 'a\n' }, 'First', { from: 'master' });
      git.commit(project, 'add-login_form', { 'b.ts': 'b\n' }, 'Second');

      const draft = await new BuildMergeRequestService(deps).execute({
        sourceProject: project,
        targetProject: project,
        sourceBranch: 'add-login_form',
      });

      expect(draft.title).toBe('Add login form');
      expect(draft.commits.map((c) => c.title)).toEqual(['Second', 'First']);
    });

    it('should report a blank source branch', async () => {
      const draft = await new BuildMergeRequestService(deps).execute({ sourceProject: project, targetProject: project });

      expect(draft.errors).toEqual(["Source branch can't be blank"]);
      expect(draft.comparison).toBeNull();
    });

    it('should require different branches within a project', async () => {
      const draft = await new BuildMergeRequestService(deps).execute({
        sourceProject: project,
        targetProject: project,
        sourceBranch: 'master',
        targetBranch: 'master',
      });

      expect(draft.errors).toEqual(['You must select different branches']);
    });

    it('should report branches that do not exist', async () => {
      const draft = await new BuildMergeRequestService(deps).execute({
        sourceProject: project,
        targetProject: project,
        sourceBranch: 'nope',
        targetBranch: 'develop',
      });

      expect(draft.errors).toEqual(['Source branch "nope" does not exist', 'Target branch "develop" does not exist']);
    });

    it('should compare a fork with its upstream project', async () => {
      const fork = store.addProject({ namespace: 'bob', path: 'app', forkedFromProjectId: project.id });
      git.commit(fork, 'feature', { 'fork.ts': 'fork\n' }, 'Fork change', { from: 'master', fromProject: project });

      const draft = await new BuildMergeRequestService(deps).execute({
        sourceProject: fork,
        targetProject: project,
        sourceBranch: 'feature',
        targetBranch: 'master',
      });

      expect(draft.errors).toEqual([]);
      expect(draft.comparison?.diffs.map((d) => d.newPath)).toEqual(['fork.ts']);
    });
  });

  describe('CreateMergeRequestService', () => {
    it('should store the merge request with its diff refs', async () => {
      const head = git.commit(project, 'feature', { 'app.ts': 'export {};\n' }, 'Add the app', { from: 'master' });

      const result = await new CreateMergeRequestService(deps).execute(user, {
        sourceProject: project,
        targetProject: project,
        sourceBranch: 'feature',
        description: 'Adds the app',
      });

      if (!result.created) throw new Error(result.errors.join(', '));
      expect(result.mergeRequest).toMatchObject({
        iid: 1,
        title: 'Add the app',
        description: 'Adds the app',
        state: 'opened',
        authorId: user.id,
        diffHeadSha: head,
      });
      expect(eventBus.types()).toEqual(['merge_request.created']);
    });

    it('should refuse a second open merge request for the same branches', async () => {
      git.commit(project, 'feature', { 'app.ts': 'export {};\n' }, 'Add the app', { from: 'master' });
      const service = new CreateMergeRequestService(deps);
      const params = { sourceProject: project, targetProject: project, sourceBranch: 'feature' };
      await service.execute(user, params);

      const result = await service.execute(user, params);

      expect(result.created).toBe(false);
      if (!result.created) {
        expect(result.errors).toEqual(['Another open merge request already exists for this source branch: !1']);
      }
    });

    it('should refuse a blank title', async () => {
      git.commit(project, 'feature', { 'app.ts': 'export {};\n' }, 'Add the app', { from: 'master' });

      const result = await new CreateMergeRequestService(deps).execute(user, {
        sourceProject: project,
        targetProject: project,
        sourceBranch: 'feature',
        title: '  ',
      });

      expect(result.created).toBe(false);
      if (!result.created) {
        expect(result.errors).toEqual(["Title can't be blank"]);
        expect(result.draft.comparison).not.toBeNull();
      }
    });
  });

  describe('UpdateMergeRequestService', () => {
    let mr: MergeRequest;

    beforeEach(async () => {
      git.commit(project, 'feature', { 'app.ts': 'export {};\n' }, 'Add the app', { from: 'master' });
      mr = await openMergeRequest(store, git, { author: user, targetProject: project, sourceBranch: 'feature' });
    });

    it('should close and reopen', async () => {
      const service = new UpdateMergeRequestService(deps);

      const closed = await service.execute(await loadSnapshot(deps, mr), user, { stateEvent: 'close' });
      expect(closed.state).toBe('closed');
      expect(closed.closedAt).toBeInstanceOf(Date);

      const reopened = await service.execute(await loadSnapshot(deps, closed), user, { stateEvent: 'reopen' });
      expect(reopened.state).toBe('reopened');
      expect(reopened.closedAt).toBeNull();

      expect(eventBus.types()).toEqual([
        'merge_request.closed',
        'merge_request.reopened',
      ]);
    });

    it('should close a merge request whose source project is gone', async () => {
      const orphan = (await store.mergeRequests.update(mr.id, { sourceProjectId: null })) ?? mr;

      const closed = await new UpdateMergeRequestService(deps).execute(await loadSnapshot(deps, orphan), user, {
        stateEvent: 'close',
      });

      expect(closed.state).toBe('closed');
    });

    it('should edit the title and description', async () => {
      const updated = await new UpdateMergeRequestService(deps).execute(await loadSnapshot(deps, mr), user, {
        title: 'Better title',
        description: 'More words',
      });

      expect(updated).toMatchObject({ title: 'Better title', description: 'More words' });
    });

    it('should reject a blank title', async () => {
      const service = new UpdateMergeRequestService(deps);
      const snapshot = await loadSnapshot(deps, mr);

      await expect(service.execute(snapshot, user, { title: '' })).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_FAILED,
        message: "Title can't be blank",
      });
    });

    it('should retarget the merge request and recompute its diff refs', async () => {
      const develop = git.commit(project, 'develop', { 'dev.ts': 'dev\n' }, 'Develop', { from: 'master' });

      const updated = await new UpdateMergeRequestService(deps).execute(await loadSnapshot(deps, mr), user, {
        targetBranch: 'develop',
      });

      expect(updated.targetBranch).toBe('develop');
      expect(updated.diffStartSha).toBe(develop);
      expect(updated.mergeStatus).toBe('unchecked');
    });

    it('should refuse a target branch that does not exist', async () => {
      const service = new UpdateMergeRequestService(deps);

      const error = await service
        .execute(await loadSnapshot(deps, mr), user, { targetBranch: 'develop' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ message: 'Target branch "develop" does not exist' });
    });

    it('should return the merge request untouched without changes', async () => {
      const snapshot = await loadSnapshot(deps, mr);
      expect(await new UpdateMergeRequestService(deps).execute(snapshot, user, { stateEvent: 'reopen' })).toBe(
        snapshot.mergeRequest
      );
    });
  });
});
