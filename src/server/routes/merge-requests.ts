/**
 * Merge request routes
 *
 * Mounted under /:namespace/:project/merge_requests. A `.json` suffix
 * selects the JSON variant of a page; `.diff` and `.patch` hand the raw
 * diff to the front proxy.
 */

import { Hono, type Context } from 'hono';
import { getCookie, setCookie } from 'hono/cookie';
import { z } from 'zod';
import type { ProjectRecord } from '../../db/store';
import type { DiffFile } from '../../core/compare';
import { Errors } from '../../core/errors';
import { diffRefsOf, isOpen, projectFullPath, statesForFilter, type MergeRequestSnapshot } from '../../core/merge-request';
import { loadSnapshot, toGitProject, type Services } from '../../services';
import { pipelineStatus, representStatus } from '../../serializers/status-entity';
import { representMergeRequest } from '../../serializers/merge-request-entity';
import { currentUser, requireAuth } from '../middleware/auth';
import { sendGitDiff, sendGitPatch } from '../workhorse';
import { setFlash, takeFlash } from '../flash';
import { diffFilePartial, diffsPartial, type DiffView } from '../views/diffs';
import { renderToString, type Html } from '../views/layout';
import { commitsPartial, indexPage, newPage, showPage, type MergeRequestTab } from '../views/merge-requests';
import {
  diffForPathQuerySchema,
  diffsQuerySchema,
  indexQuerySchema,
  isPresent,
  isTruthy,
  mergeActionSchema,
  mergeRequestForm,
  readParams,
  type MergeRequestForm,
} from './params';

const BASE = '/:namespace/:project/merge_requests';
const PAGE_SIZE = 20;
const DIFF_VIEW_COOKIE = 'diff_view';
// One year; browsers cap cookie lifetimes at 400 days
const DIFF_VIEW_MAX_AGE = 60 * 60 * 24 * 365;

const IID_PATTERN = /^(\d+)(?:\.(json|diff|patch))?$/;

type ShowFormat = 'html' | 'json' | 'diff' | 'patch';

function parseIid(raw: string): { iid: number; format: ShowFormat } {
  const match = IID_PATTERN.exec(raw);
  if (!match?.[1]) {
    throw Errors.notFound('Merge request', { iid: raw });
  }
  const format = match[2];
  return {
    iid: Number(match[1]),
    format: format === 'json' || format === 'diff' || format === 'patch' ? format : 'html',
  };
}

function wantsJson(c: Context): boolean {
  return c.req.path.endsWith('.json');
}

const uuid = z.string().uuid();

export function createMergeRequestRoutes(services: Services): Hono {
  const app = new Hono();
  const { store, git } = services;

  /**
   * Project from the route; anonymous users are asked to sign in for
   * projects they cannot see, everyone else gets a 404
   */
  async function findProject(c: Context): Promise<ProjectRecord> {
    const namespace = c.req.param('namespace') ?? '';
    const path = c.req.param('project') ?? '';
    const project = await store.projects.findByFullPath(namespace, path);

    if (!project || !(await c.get('ability').canReadProject(project))) {
      if (!c.get('user')) throw Errors.unauthenticated();
      throw Errors.notFound('Project', { namespace, path });
    }
    return project;
  }

  async function findSnapshot(c: Context, project: ProjectRecord, rawIid: string) {
    const { iid, format } = parseIid(rawIid);
    const mergeRequest = await store.mergeRequests.findByIid(project.id, iid);

    if (!mergeRequest || !(await c.get('ability').can('read_merge_request', project, mergeRequest))) {
      throw Errors.notFound('Merge request', { iid });
    }

    return { snapshot: await loadSnapshot(services, mergeRequest, project), format };
  }

  /**
   * A project named by id or by full path in the form params
   */
  async function projectFromParam(c: Context, value: string | undefined): Promise<ProjectRecord | undefined> {
    if (!isPresent(value)) return undefined;

    let project: ProjectRecord | undefined;
    const slash = value.lastIndexOf('/');
    if (slash > 0) {
      project = await store.projects.findByFullPath(value.slice(0, slash), value.slice(slash + 1));
    } else if (uuid.safeParse(value).success) {
      project = await store.projects.findById(value);
    }

    if (!project || !(await c.get('ability').canReadProject(project))) {
      throw Errors.notFound('Project', { project: value });
    }
    return project;
  }

  /**
   * Source defaults to the route project. Without an explicit target, a
   * fork proposes its changes to the project it was forked from.
   */
  async function resolveProjects(c: Context, project: ProjectRecord, form: MergeRequestForm) {
    const source = await projectFromParam(c, form.source_project_id ?? form.source_project);
    const target = await projectFromParam(c, form.target_project_id ?? form.target_project);

    if (target) {
      return { sourceProject: source ?? project, targetProject: target };
    }
    if (source) {
      return { sourceProject: source, targetProject: project };
    }

    if (project.forkedFromProjectId) {
      const upstream = await store.projects.findById(project.forkedFromProjectId);
      if (upstream && (await c.get('ability').canReadProject(upstream))) {
        return { sourceProject: project, targetProject: upstream };
      }
    }
    return { sourceProject: project, targetProject: project };
  }

  /**
   * Layout from the `view` param, remembered in a cookie
   */
  function diffView(c: Context, view: DiffView | undefined): DiffView {
    if (view) {
      setCookie(c, DIFF_VIEW_COOKIE, view, { path: '/', maxAge: DIFF_VIEW_MAX_AGE });
      return view;
    }
    return getCookie(c, DIFF_VIEW_COOKIE) === 'parallel' ? 'parallel' : 'inline';
  }

  async function mergeRequestDiffs(snapshot: MergeRequestSnapshot, options: { ignoreWhitespaceChange?: boolean; paths?: string[] }): Promise<DiffFile[]> {
    const refs = diffRefsOf(snapshot.mergeRequest);
    if (!refs) return [];
    return git.diffBetween(toGitProject(snapshot.targetProject), refs.baseSha, refs.headSha, options);
  }

  async function renderShow(c: Context, snapshot: MergeRequestSnapshot, tab: MergeRequestTab, tabContent: Html | null) {
    const user = c.get('user');
    const canMerge = user !== undefined && isOpen(snapshot.mergeRequest) && (await c.get('ability').canMerge(snapshot.targetProject));

    return c.html(
      showPage(
        { projectPath: projectFullPath(snapshot.targetProject), flash: takeFlash(c) },
        {
          mergeRequest: snapshot.mergeRequest,
          sourceProjectPath: snapshot.sourceProject ? projectFullPath(snapshot.sourceProject) : null,
          headPipeline: snapshot.headPipeline,
          canMerge,
          tab,
          tabContent,
        }
      )
    );
  }

  // ===========================================================================
  // Index
  // ===========================================================================

  const index = async (c: Context) => {
    const project = await findProject(c);
    const query = indexQuerySchema.parse(c.req.query());

    const mergeRequests = await store.mergeRequests.listByTargetProject(project.id, {
      states: statesForFilter(query.state),
      limit: PAGE_SIZE,
      offset: (query.page - 1) * PAGE_SIZE,
    });

    if (wantsJson(c)) {
      const fullPath = projectFullPath(project);
      return c.json(mergeRequests.map((mr) => representMergeRequest(mr, fullPath)));
    }

    return c.html(
      indexPage({ projectPath: projectFullPath(project), flash: takeFlash(c) }, mergeRequests, query.state)
    );
  };

  app.get(BASE, index);
  app.get(`${BASE}.json`, index);

  // ===========================================================================
  // New merge request
  // ===========================================================================

  app.get(`${BASE}/new`, requireAuth, async (c) => {
    const project = await findProject(c);
    if (!(await c.get('ability').can('create_merge_request', project))) {
      throw Errors.accessDenied('create merge requests');
    }

    const params = await readParams(c);
    const form = mergeRequestForm(params);
    const draft = await services.build.execute({
      ...(await resolveProjects(c, project, form)),
      sourceBranch: form.source_branch,
      targetBranch: form.target_branch,
      title: form.title,
      description: form.description,
    });

    // An empty form is not an error yet
    const errors = isPresent(form.source_branch) ? draft.errors : [];

    return c.html(
      newPage(
        { projectPath: projectFullPath(project), flash: takeFlash(c) },
        { draft, errors, view: diffView(c, undefined) }
      )
    );
  });

  app.post(BASE, requireAuth, async (c) => {
    const project = await findProject(c);
    if (!(await c.get('ability').can('create_merge_request', project))) {
      throw Errors.accessDenied('create merge requests');
    }

    const user = currentUser(c);
    const form = mergeRequestForm(await readParams(c));
    const projects = await resolveProjects(c, project, form);
    const result = await services.create.execute(user, {
      ...projects,
      sourceBranch: form.source_branch,
      targetBranch: form.target_branch,
      title: form.title,
      description: form.description,
    });

    if (result.created) {
      return c.redirect(`/${projectFullPath(projects.targetProject)}/merge_requests/${result.mergeRequest.iid}`, 302);
    }

    if (wantsJson(c) || c.req.header('Content-Type')?.includes('application/json')) {
      return c.json({ error: result.errors.join(', '), messages: result.errors }, 422);
    }

    return c.html(
      newPage(
        { projectPath: projectFullPath(project) },
        { draft: result.draft, errors: result.errors, view: diffView(c, undefined) }
      ),
      422
    );
  });

  const newDiffForPath = async (c: Context) => {
    const project = await findProject(c);
    const params = await readParams(c);
    const query = diffForPathQuerySchema.parse(params);
    const form = mergeRequestForm(params);

    if (!isPresent(query.old_path) || !isPresent(query.new_path)) {
      throw Errors.notFound('Diff file');
    }

    const draft = await services.build.execute({
      ...(await resolveProjects(c, project, form)),
      sourceBranch: form.source_branch,
      targetBranch: form.target_branch,
      diffOptions: {
        paths: [query.old_path, query.new_path],
        ignoreWhitespaceChange: isTruthy(query.w),
      },
    });

    const file = draft.comparison?.diffs.find(
      (d) => d.oldPath === query.old_path && d.newPath === query.new_path
    );
    if (!file) {
      throw Errors.notFound('Diff file', { oldPath: query.old_path, newPath: query.new_path });
    }

    const partial = diffFilePartial(file, { view: diffView(c, query.view), notes: { disabled: true } });
    return wantsJson(c) ? c.json({ html: await renderToString(partial) }) : c.html(partial);
  };

  app.get(`${BASE}/diff_for_path`, newDiffForPath);
  app.get(`${BASE}/diff_for_path.json`, newDiffForPath);

  // ===========================================================================
  // Show / update / destroy
  // ===========================================================================

  app.get(`${BASE}/:id`, async (c) => {
    const project = await findProject(c);
    const { snapshot, format } = await findSnapshot(c, project, c.req.param('id'));
    const mr = snapshot.mergeRequest;

    if (format === 'diff' || format === 'patch') {
      const refs = diffRefsOf(mr);
      if (!refs) {
        throw Errors.notFound('Diff', { iid: mr.iid });
      }
      const send = format === 'diff' ? sendGitDiff : sendGitPatch;
      c.header(...send({ RepoPath: project.diskPath, ShaFrom: refs.baseSha, ShaTo: refs.headSha }));
      return c.body(null);
    }

    if (format === 'json') {
      return c.json(representMergeRequest(mr, projectFullPath(project)));
    }

    return renderShow(c, snapshot, 'show', null);
  });

  const update = async (c: Context) => {
    const project = await findProject(c);
    const { snapshot } = await findSnapshot(c, project, c.req.param('id') ?? '');
    const user = currentUser(c);

    if (!(await c.get('ability').can('update_merge_request', project, snapshot.mergeRequest))) {
      throw Errors.accessDenied('update this merge request');
    }

    const form = mergeRequestForm(await readParams(c));
    const updated = await services.update.execute(snapshot, user, {
      stateEvent: form.state_event,
      title: form.title,
      description: form.description,
      targetBranch: isPresent(form.target_branch) ? form.target_branch : undefined,
    });

    if (wantsJson(c)) {
      return c.json(representMergeRequest(updated, projectFullPath(project)));
    }
    return c.redirect(`/${projectFullPath(project)}/merge_requests/${updated.iid}`, 302);
  };

  app.put(`${BASE}/:id`, requireAuth, update);
  app.post(`${BASE}/:id`, requireAuth, update);

  app.delete(`${BASE}/:id`, requireAuth, async (c) => {
    const project = await findProject(c);
    const { snapshot } = await findSnapshot(c, project, c.req.param('id'));
    const user = currentUser(c);
    const mr = snapshot.mergeRequest;

    if (!(await c.get('ability').can('destroy_merge_request', project, mr))) {
      throw Errors.accessDenied('delete this merge request');
    }

    await store.mergeRequests.delete(mr.id);
    c.get('logger').info('Merge request deleted', { mergeRequestId: mr.id, iid: mr.iid });

    await services.eventBus.emit('merge_request.deleted', user.id, {
      mergeRequestId: mr.id,
      iid: mr.iid,
      title: mr.title,
      targetProjectId: mr.targetProjectId,
      projectFullPath: projectFullPath(project),
    });

    setFlash(c, 'The merge request was successfully deleted.');
    return c.redirect(`/${projectFullPath(project)}/merge_requests`, 302);
  });

  // ===========================================================================
  // Merge
  // ===========================================================================

  app.post(`${BASE}/:id/merge`, requireAuth, async (c) => {
    const project = await findProject(c);
    const { snapshot } = await findSnapshot(c, project, c.req.param('id'));
    const user = currentUser(c);

    if (!(await c.get('ability').canMerge(snapshot.targetProject))) {
      throw Errors.accessDenied('merge this merge request');
    }

    const params = mergeActionSchema.parse(await readParams(c));
    const status = await services.mergeAction.execute(snapshot, user, {
      sha: isPresent(params.sha) ? params.sha : undefined,
      commitMessage: isPresent(params.commit_message) ? params.commit_message : undefined,
      shouldRemoveSourceBranch: isTruthy(params.should_remove_source_branch),
      mergeWhenBuildSucceeds: isPresent(params.merge_when_build_succeeds),
    });

    return c.json({ status });
  });

  app.post(`${BASE}/:id/cancel_merge_when_build_succeeds`, requireAuth, async (c) => {
    const project = await findProject(c);
    const { snapshot } = await findSnapshot(c, project, c.req.param('id'));
    const user = currentUser(c);
    const ability = c.get('ability');

    const allowed =
      snapshot.mergeRequest.authorId === user.id || (await ability.canMerge(snapshot.targetProject));
    if (!allowed) {
      throw Errors.accessDenied('cancel the automatic merge');
    }

    await services.mergeWhenBuildSucceeds.cancel(snapshot, user);
    return c.json({ status: 'canceled' });
  });

  // ===========================================================================
  // Tabs
  // ===========================================================================

  const diffs = async (c: Context) => {
    const project = await findProject(c);
    const { snapshot } = await findSnapshot(c, project, c.req.param('id') ?? '');
    const query = diffsQuerySchema.parse(c.req.query());
    const view = diffView(c, query.view);

    const files = await mergeRequestDiffs(snapshot, { ignoreWhitespaceChange: isTruthy(query.w) });
    const partial = diffsPartial(files, {
      view,
      notes: { disabled: false, noteableType: 'MergeRequest', noteableId: snapshot.mergeRequest.id },
    });

    if (wantsJson(c)) {
      return c.json({ html: await renderToString(partial) });
    }
    return renderShow(c, snapshot, 'diffs', partial);
  };

  app.get(`${BASE}/:id/diffs`, diffs);
  app.get(`${BASE}/:id/diffs.json`, diffs);

  const diffForPath = async (c: Context) => {
    const project = await findProject(c);
    const { snapshot } = await findSnapshot(c, project, c.req.param('id') ?? '');
    const query = diffForPathQuerySchema.parse(c.req.query());

    if (!isPresent(query.old_path) || !isPresent(query.new_path)) {
      throw Errors.notFound('Diff file');
    }

    const files = await mergeRequestDiffs(snapshot, {
      ignoreWhitespaceChange: isTruthy(query.w),
      paths: [query.old_path, query.new_path],
    });
    const file = files.find((d) => d.oldPath === query.old_path && d.newPath === query.new_path);
    if (!file) {
      throw Errors.notFound('Diff file', { oldPath: query.old_path, newPath: query.new_path });
    }

    const partial = diffFilePartial(file, {
      view: diffView(c, query.view),
      notes: { disabled: false, noteableType: 'MergeRequest', noteableId: snapshot.mergeRequest.id },
    });
    return wantsJson(c) ? c.json({ html: await renderToString(partial) }) : c.html(partial);
  };

  app.get(`${BASE}/:id/diff_for_path`, diffForPath);
  app.get(`${BASE}/:id/diff_for_path.json`, diffForPath);

  const commits = async (c: Context) => {
    const project = await findProject(c);
    const { snapshot } = await findSnapshot(c, project, c.req.param('id') ?? '');
    const refs = diffRefsOf(snapshot.mergeRequest);

    const list = refs
      ? await git.commitsBetween(toGitProject(snapshot.targetProject), refs.baseSha, refs.headSha)
      : [];
    const partial = commitsPartial(list);

    if (wantsJson(c)) {
      return c.json({ html: await renderToString(partial) });
    }
    return renderShow(c, snapshot, 'commits', partial);
  };

  app.get(`${BASE}/:id/commits`, commits);
  app.get(`${BASE}/:id/commits.json`, commits);

  app.get(`${BASE}/:id/pipeline_status.json`, async (c) => {
    const project = await findProject(c);
    const { snapshot } = await findSnapshot(c, project, c.req.param('id'));
    const pipeline = snapshot.headPipeline;

    const details =
      pipeline && snapshot.sourceProject
        ? await representStatus(pipelineStatus(pipeline, snapshot.sourceProject), {
            user: c.get('user'),
            ability: c.get('ability'),
          })
        : null;

    return c.json({
      sha: snapshot.mergeRequest.diffHeadSha,
      status: pipeline?.status ?? null,
      details,
    });
  });

  return app;
}
