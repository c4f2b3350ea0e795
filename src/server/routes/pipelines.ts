/**
 * Pipeline routes
 *
 * The CI system reports pipeline results here. A pipeline reaching a
 * completed status starts the auto merges waiting on it.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { Errors } from '../../core/errors';
import type { Services } from '../../services';
import { currentUser, requireAuth } from '../middleware/auth';
import { pipelineStatusSchema, readParams } from './params';

const BASE = '/:namespace/:project/pipelines';

const uuid = z.string().uuid();

export function createPipelineRoutes(services: Services): Hono {
  const app = new Hono();
  const { store } = services;

  app.put(`${BASE}/:id`, requireAuth, async (c) => {
    const user = currentUser(c);
    const namespace = c.req.param('namespace');
    const path = c.req.param('project');
    const project = await store.projects.findByFullPath(namespace, path);

    if (!project || !(await c.get('ability').canReadProject(project))) {
      throw Errors.notFound('Project', { namespace, path });
    }
    if (!(await c.get('ability').canUpdatePipeline(project))) {
      throw Errors.accessDenied('update pipelines');
    }

    const id = c.req.param('id');
    const pipeline = uuid.safeParse(id).success ? await store.pipelines.findById(id) : undefined;
    if (!pipeline || pipeline.projectId !== project.id) {
      throw Errors.notFound('Pipeline', { id });
    }

    const { status } = pipelineStatusSchema.parse(await readParams(c));
    const updated = await services.pipelineStatus.execute(pipeline, user, status);

    return c.json({
      id: updated.id,
      sha: updated.sha,
      ref: updated.ref,
      status: updated.status,
      finished_at: updated.finishedAt?.toISOString() ?? null,
    });
  });

  return app;
}
