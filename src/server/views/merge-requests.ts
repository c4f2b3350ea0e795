/**
 * Merge request pages
 */

import { html } from 'hono/html';
import type { MergeRequest, Pipeline } from '../../db/schema';
import type { CommitSummary } from '../../core/git-gateway';
import type { DiffFile } from '../../core/compare';
import { isWorkInProgress } from '../../core/merge-request';
import type { MergeRequestDraft } from '../../services/build-merge-request';
import { diffsPartial, type DiffView } from './diffs';
import { layout, type Html } from './layout';

export type MergeRequestTab = 'show' | 'commits' | 'diffs';
export type StateFilter = 'opened' | 'closed' | 'merged' | 'all';

interface PageContext {
  projectPath: string;
  flash?: string;
}

function mergeRequestsPath(projectPath: string): string {
  return `/${projectPath}/merge_requests`;
}

export function commitsPartial(commits: CommitSummary[]): Html {
  if (commits.length === 0) {
    return html`<div class="merge-request-commits"><p class="nothing-here-block">No commits</p></div>`;
  }

  return html`<div class="merge-request-commits">
<ul class="content-list commit-list">
${commits.map(
  (commit) => html`<li class="commit" data-sha="${commit.sha}">
  <span class="commit-short-id">${commit.shortSha}</span>
  <span class="commit-row-message">${commit.title}</span>
  <span class="commit-author">${commit.authorName}</span>
  <time datetime="${commit.authoredAt.toISOString()}">${commit.authoredAt.toISOString().slice(0, 10)}</time>
</li>`
)}
</ul>
</div>`;
}

export function indexPage(
  context: PageContext,
  mergeRequests: MergeRequest[],
  state: StateFilter
): Html {
  const base = mergeRequestsPath(context.projectPath);
  const filters: StateFilter[] = ['opened', 'merged', 'closed', 'all'];

  return layout(
    { title: 'Merge Requests', page: 'projects:merge_requests:index', ...context },
    html`<ul class="nav-links">
${filters.map(
  (filter) => html`<li class="${filter === state ? 'active' : ''}"><a href="${base}?state=${filter}">${filter}</a></li>`
)}
</ul>
<a class="btn btn-new" href="${base}/new">New merge request</a>
${
  mergeRequests.length === 0
    ? html`<p class="nothing-here-block">No merge requests to show</p>`
    : html`<ul class="content-list mr-list">
${mergeRequests.map(
  (mr) => html`<li class="merge-request" data-iid="${mr.iid}" data-state="${mr.state}">
  <a class="merge-request-title" href="${base}/${mr.iid}">${mr.title}</a>
  <span class="merge-request-ref">!${mr.iid}</span>
  <span class="merge-request-branches">${mr.sourceBranch} → ${mr.targetBranch}</span>
</li>`
)}
</ul>`
}`
  );
}

export interface ShowPageData {
  mergeRequest: MergeRequest;
  sourceProjectPath: string | null;
  headPipeline: Pipeline | undefined;
  canMerge: boolean;
  tab: MergeRequestTab;
  /** Rendered content of the active tab */
  tabContent: Html | null;
}

function mergeWidget(data: ShowPageData): Html {
  const { mergeRequest: mr } = data;

  if (mr.state === 'merged') {
    return html`<div class="mr-widget mr-state-merged">Merged${mr.mergeCommitSha ? html` in <code>${mr.mergeCommitSha.slice(0, 8)}</code>` : ''}</div>`;
  }
  if (mr.state === 'closed') {
    return html`<div class="mr-widget mr-state-closed">Closed</div>`;
  }
  if (mr.state === 'locked') {
    return html`<div class="mr-widget mr-state-locked">Merge in progress</div>`;
  }

  return html`<div class="mr-widget" data-merge-status="${mr.mergeStatus}">
  ${data.headPipeline ? html`<div class="mr-widget-pipeline ci-status-${data.headPipeline.status}">Pipeline ${data.headPipeline.status}</div>` : ''}
  ${mr.mergeError ? html`<div class="mr-widget-error">${mr.mergeError}</div>` : ''}
  ${mr.mergeWhenBuildSucceeds ? html`<div class="mr-widget-auto-merge">Set to be merged automatically when the pipeline succeeds</div>` : ''}
  ${isWorkInProgress(mr.title) ? html`<div class="mr-widget-wip">This merge request is marked as Work In Progress</div>` : ''}
  ${data.canMerge ? html`<button class="btn btn-merge" data-sha="${mr.diffHeadSha ?? ''}">Accept merge request</button>` : ''}
</div>`;
}

export function showPage(context: PageContext, data: ShowPageData): Html {
  const { mergeRequest: mr } = data;
  const base = `${mergeRequestsPath(context.projectPath)}/${mr.iid}`;
  const tabs: Array<[MergeRequestTab, string, string]> = [
    ['show', 'Discussion', base],
    ['commits', 'Commits', `${base}/commits`],
    ['diffs', 'Changes', `${base}/diffs`],
  ];

  return layout(
    { title: `${mr.title} (!${mr.iid})`, page: `projects:merge_requests:${data.tab}`, ...context },
    html`<div class="merge-request" data-iid="${mr.iid}" data-id="${mr.id}">
<div class="detail-page-header">
  <span class="issuable-status-box status-${mr.state}">${mr.state}</span>
  <h2 class="title">${mr.title}</h2>
  <span class="merge-request-ref">!${mr.iid}</span>
</div>
<div class="merge-request-branches">
  Request to merge <code>${data.sourceProjectPath ? `${data.sourceProjectPath}:` : '(removed):'}${mr.sourceBranch}</code>
  into <code>${mr.targetBranch}</code>
</div>
${mr.description ? html`<div class="description">${mr.description}</div>` : ''}
${mergeWidget(data)}
<ul class="merge-request-tabs nav-links">
${tabs.map(([tab, label, href]) => html`<li class="${tab === data.tab ? 'active' : ''}"><a href="${href}">${label}</a></li>`)}
</ul>
<div class="tab-content">${data.tabContent ?? ''}</div>
</div>`
  );
}

export interface NewPageData {
  draft: MergeRequestDraft;
  errors: string[];
  view: DiffView;
}

export function newPage(context: PageContext, data: NewPageData): Html {
  const { draft, errors } = data;
  const base = mergeRequestsPath(context.projectPath);
  const diffs: DiffFile[] = draft.comparison?.diffs ?? [];

  return layout(
    { title: 'New Merge Request', page: 'projects:merge_requests:new', ...context },
    html`<h2 class="page-title">New Merge Request</h2>
${
  errors.length > 0
    ? html`<div class="form-errors"><ul>${errors.map((error) => html`<li>${error}</li>`)}</ul></div>`
    : ''
}
<form class="merge-request-form" method="post" action="${base}">
  <input type="hidden" name="merge_request[source_project_id]" value="${draft.sourceProject.id}">
  <input type="hidden" name="merge_request[target_project_id]" value="${draft.targetProject.id}">
  <label>Source branch <input name="merge_request[source_branch]" value="${draft.sourceBranch}"></label>
  <label>Target branch <input name="merge_request[target_branch]" value="${draft.targetBranch}"></label>
  <label>Title <input name="merge_request[title]" value="${draft.title}"></label>
  <label>Description <textarea name="merge_request[description]">${draft.description ?? ''}</textarea></label>
  <button type="submit" class="btn btn-create">Submit merge request</button>
</form>
${
  draft.comparison
    ? html`<div class="merge-request-compare">
${commitsPartial(draft.commits)}
${diffsPartial(diffs, { view: data.view, notes: { disabled: true } })}
</div>`
    : ''
}`
  );
}
