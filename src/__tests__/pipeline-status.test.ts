/**
 * Tests for pipeline status updates
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus } from '../events/bus';
import { PipelineStatusService, isCompleted } from '../services/pipeline-status';
import type { Pipeline, PipelineStatus, User } from '../db/schema';
import { MemoryGit, MemoryStore, quietLogger } from './test-utils';

describe('PipelineStatusService', () => {
  let store: MemoryStore;
  let eventBus: EventBus;
  let service: PipelineStatusService;
  let completed: ReturnType<typeof vi.fn>;
  let user: User;
  let pipeline: Pipeline;

  beforeEach(() => {
    store = new MemoryStore();
    eventBus = new EventBus();
    service = new PipelineStatusService({ store, git: new MemoryGit(), eventBus, logger: quietLogger() });
    completed = vi.fn().mockResolvedValue(undefined);
    eventBus.on('pipeline.completed', completed);

    user = store.addUser('ci');
    const project = store.addProject({ namespace: 'acme', path: 'app', ownerId: user.id });
    pipeline = store.addPipeline(project, 'a'.repeat(40), 'feature', 'running');
  });

  it('should know the completed statuses', () => {
    const done: PipelineStatus[] = ['success', 'failed', 'canceled', 'skipped'];

    expect(done.every(isCompleted)).toBe(true);
    expect(isCompleted('running')).toBe(false);
    expect(isCompleted('manual')).toBe(false);
  });

  it('should store the status and announce a completed pipeline', async () => {
    const updated = await service.execute(pipeline, user, 'success');

    expect(updated.status).toBe('success');
    expect(updated.finishedAt).toBeInstanceOf(Date);
    expect((await store.pipelines.findById(pipeline.id))?.status).toBe('success');
    expect(completed).toHaveBeenCalledTimes(1);
    expect(completed.mock.calls[0]?.[0]).toMatchObject({
      type: 'pipeline.completed',
      actorId: user.id,
      payload: { pipelineId: pipeline.id, projectId: pipeline.projectId, sha: pipeline.sha, ref: 'feature', status: 'success' },
    });
  });

  it('should not announce a pipeline that is still going', async () => {
    const updated = await service.execute(pipeline, user, 'pending');

    expect(updated.status).toBe('pending');
    expect(updated.finishedAt).toBeNull();
    expect(completed).not.toHaveBeenCalled();
  });

  it('should announce a pipeline only when it completes', async () => {
    const failed = await service.execute(pipeline, user, 'failed');
    await service.execute(failed, user, 'canceled');
    await service.execute(failed, user, 'failed');

    expect(completed).toHaveBeenCalledTimes(1);
  });
});
