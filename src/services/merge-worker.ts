/**
 * Background merge worker
 *
 * Requests only enqueue merges; jobs run one after another in the
 * background so two merges never race on the same target branch.
 */

import { randomUUID } from 'crypto';
import type { MergeParams } from '../db/schema';
import type { Logger } from '../server/logger';
import { metrics } from '../server/logger';
import type { MergeOutcome } from './merge';

export interface MergeJob {
  id: string;
  mergeRequestId: string;
  userId: string;
  params: MergeParams;
  enqueuedAt: Date;
}

export interface MergeExecutor {
  execute(mergeRequestId: string, userId: string, params: MergeParams): Promise<MergeOutcome>;
}

export class MergeWorker {
  private queue: MergeJob[] = [];
  private running: Promise<void> | null = null;

  constructor(
    private readonly executor: MergeExecutor,
    private readonly logger: Logger
  ) {}

  /**
   * Enqueue a merge and return the job id.
   * A merge request already waiting in the queue keeps its existing job.
   */
  performAsync(mergeRequestId: string, userId: string, params: MergeParams = {}): string {
    const queued = this.queue.find((job) => job.mergeRequestId === mergeRequestId);
    if (queued) {
      return queued.id;
    }

    const job: MergeJob = {
      id: randomUUID(),
      mergeRequestId,
      userId,
      params,
      enqueuedAt: new Date(),
    };
    this.queue.push(job);
    metrics.set('merge_worker_queue_size', this.queue.length);
    this.logger.debug('Merge job enqueued', { jobId: job.id, mergeRequestId });

    this.kick();
    return job.id;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Wait until the queue is empty
   */
  async drain(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  private kick(): void {
    if (this.running) return;
    this.running = this.run().finally(() => {
      this.running = null;
      if (this.queue.length > 0) this.kick();
    });
  }

  private async run(): Promise<void> {
    // Let the enqueuing request finish first
    await new Promise<void>((resolve) => setImmediate(resolve));

    let job = this.queue.shift();
    while (job) {
      metrics.set('merge_worker_queue_size', this.queue.length);
      const log = this.logger.child({ jobId: job.id, mergeRequestId: job.mergeRequestId });

      try {
        const outcome = await this.executor.execute(job.mergeRequestId, job.userId, job.params);
        log.info('Merge job finished', { outcome: outcome.status });
      } catch (error) {
        log.error('Merge job crashed', {
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
      }

      job = this.queue.shift();
    }
  }
}
