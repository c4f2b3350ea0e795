import type { Pipeline, PipelineStatus, User } from '../db/schema';
import type { ServiceDeps } from './context';

const COMPLETED: ReadonlySet<PipelineStatus> = new Set<PipelineStatus>(['success', 'failed', 'canceled', 'skipped']);

export function isCompleted(status: PipelineStatus): boolean {
  return COMPLETED.has(status);
}

/**
 * Records pipeline results reported by the CI system.
 * Reaching a completed status emits `pipeline.completed`, which runs
 * pending auto merges.
 */
export class PipelineStatusService {
  constructor(private readonly deps: ServiceDeps) {}

  async execute(pipeline: Pipeline, user: User, status: PipelineStatus): Promise<Pipeline> {
    if (pipeline.status === status) {
      return pipeline;
    }

    const finishedAt = isCompleted(status) ? new Date() : null;
    const updated = (await this.deps.store.pipelines.updateStatus(pipeline.id, status, finishedAt)) ?? pipeline;

    this.deps.logger.info('Pipeline status changed', {
      pipelineId: pipeline.id,
      from: pipeline.status,
      to: status,
    });

    if (isCompleted(status) && !isCompleted(pipeline.status)) {
      await this.deps.eventBus.emit('pipeline.completed', user.id, {
        pipelineId: updated.id,
        projectId: updated.projectId,
        sha: updated.sha,
        ref: updated.ref,
        status: updated.status,
      });
    }

    return updated;
  }
}
