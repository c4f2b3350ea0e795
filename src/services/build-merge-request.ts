/**
 * Builds unsaved merge requests from form params and creates them.
 */

import type { MergeRequest, User } from '../db/schema';
import type { ProjectRecord } from '../db/store';
import type { CommitSummary, Comparison, DiffOptions } from '../core/git-gateway';
import { projectFullPath, statesForFilter } from '../core/merge-request';
import { toGitProject, type ServiceDeps } from './context';

export interface BuildMergeRequestParams {
  sourceProject: ProjectRecord;
  targetProject: ProjectRecord;
  sourceBranch?: string;
  targetBranch?: string;
  title?: string;
  description?: string;
  diffOptions?: DiffOptions;
}

/**
 * A merge request that has not been stored yet, with the compare shown on
 * the new merge request page
 */
export interface MergeRequestDraft {
  sourceProject: ProjectRecord;
  targetProject: ProjectRecord;
  sourceBranch: string;
  targetBranch: string;
  title: string;
  description: string | null;
  commits: CommitSummary[];
  comparison: Comparison | null;
  errors: string[];
}

/**
 * "fix-login_page" -> "Fix login page"
 */
export function humanizeBranchName(branch: string): string {
  const words = branch.replace(/[-_]+/g, ' ').trim();
  return words.charAt(0).toUpperCase() + words.slice(1);
}

export class BuildMergeRequestService {
  constructor(private readonly deps: ServiceDeps) {}

  async execute(params: BuildMergeRequestParams): Promise<MergeRequestDraft> {
    const { sourceProject, targetProject } = params;
    const sourceBranch = params.sourceBranch?.trim() ?? '';
    const targetBranch = params.targetBranch?.trim() || targetProject.defaultBranch;

    const draft: MergeRequestDraft = {
      sourceProject,
      targetProject,
      sourceBranch,
      targetBranch,
      title: params.title?.trim() ?? '',
      description: params.description ?? null,
      commits: [],
      comparison: null,
      errors: [],
    };

    if (!sourceBranch) draft.errors.push("Source branch can't be blank");
    if (!targetBranch) draft.errors.push("Target branch can't be blank");
    if (draft.errors.length > 0) return draft;

    if (sourceProject.id === targetProject.id && sourceBranch === targetBranch) {
      draft.errors.push('You must select different branches');
      return draft;
    }

    const source = toGitProject(sourceProject);
    const target = toGitProject(targetProject);

    if (!(await this.deps.git.branchSha(source, sourceBranch))) {
      draft.errors.push(`Source branch "${sourceBranch}" does not exist`);
    }
    if (!(await this.deps.git.branchSha(target, targetBranch))) {
      draft.errors.push(`Target branch "${targetBranch}" does not exist`);
    }
    if (draft.errors.length > 0) return draft;

    const pair = { sourceProject: source, sourceBranch, targetProject: target, targetBranch };
    draft.comparison = await this.deps.git.compare(pair, params.diffOptions);
    draft.commits = await this.deps.git.commits(pair);

    if (!draft.title) {
      const [only, ...rest] = draft.commits;
      draft.title = only && rest.length === 0 ? only.title : humanizeBranchName(sourceBranch);
    }

    return draft;
  }
}

export type CreateMergeRequestResult =
  | { created: true; mergeRequest: MergeRequest }
  | { created: false; draft: MergeRequestDraft; errors: string[] };

export class CreateMergeRequestService {
  private readonly build: BuildMergeRequestService;

  constructor(private readonly deps: ServiceDeps) {
    this.build = new BuildMergeRequestService(deps);
  }

  /**
   * Store a merge request, or return the draft with every problem found
   */
  async execute(user: User, params: BuildMergeRequestParams): Promise<CreateMergeRequestResult> {
    const draft = await this.build.execute(params);
    const errors = [...draft.errors];

    if (params.title !== undefined && params.title.trim() === '') {
      errors.push("Title can't be blank");
    }

    if (errors.length === 0) {
      const open = await this.deps.store.mergeRequests.listByTargetProject(draft.targetProject.id, {
        states: statesForFilter('opened'),
      });
      const duplicate = open.find(
        (mr) =>
          mr.sourceProjectId === draft.sourceProject.id &&
          mr.sourceBranch === draft.sourceBranch &&
          mr.targetBranch === draft.targetBranch
      );
      if (duplicate) {
        errors.push(
          `Another open merge request already exists for this source branch: !${duplicate.iid}`
        );
      }
    }

    if (errors.length > 0 || !draft.comparison) {
      return { created: false, draft, errors };
    }

    const { diffRefs } = draft.comparison;
    const mergeRequest = await this.deps.store.mergeRequests.create({
      targetProjectId: draft.targetProject.id,
      sourceProjectId: draft.sourceProject.id,
      sourceBranch: draft.sourceBranch,
      targetBranch: draft.targetBranch,
      title: draft.title,
      description: draft.description,
      authorId: user.id,
      diffBaseSha: diffRefs.baseSha,
      diffStartSha: diffRefs.startSha,
      diffHeadSha: diffRefs.headSha,
    });

    this.deps.logger.info('Merge request created', {
      mergeRequestId: mergeRequest.id,
      iid: mergeRequest.iid,
    });

    await this.deps.eventBus.emit('merge_request.created', user.id, {
      mergeRequestId: mergeRequest.id,
      iid: mergeRequest.iid,
      title: mergeRequest.title,
      targetProjectId: mergeRequest.targetProjectId,
      projectFullPath: projectFullPath(draft.targetProject),
      sourceBranch: mergeRequest.sourceBranch,
      targetBranch: mergeRequest.targetBranch,
    });

    return { created: true, mergeRequest };
  }
}
