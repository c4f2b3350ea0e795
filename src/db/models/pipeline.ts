import { eq, and, desc } from 'drizzle-orm';
import { getDb } from '../index';
import { pipelines, type Pipeline, type PipelineStatus } from '../schema';
import type { PipelineStore } from '../store';

export const pipelineModel: PipelineStore = {
  async findById(id: string): Promise<Pipeline | undefined> {
    const db = getDb();
    const [pipeline] = await db.select().from(pipelines).where(eq(pipelines.id, id));
    return pipeline;
  },

  async latestFor(projectId: string, sha: string, ref: string): Promise<Pipeline | undefined> {
    const db = getDb();
    const [pipeline] = await db
      .select()
      .from(pipelines)
      .where(and(eq(pipelines.projectId, projectId), eq(pipelines.sha, sha), eq(pipelines.ref, ref)))
      .orderBy(desc(pipelines.createdAt))
      .limit(1);
    return pipeline;
  },

  async updateStatus(id: string, status: PipelineStatus, finishedAt: Date | null): Promise<Pipeline | undefined> {
    const db = getDb();
    const [pipeline] = await db
      .update(pipelines)
      .set({ status, finishedAt })
      .where(eq(pipelines.id, id))
      .returning();
    return pipeline;
  },
};
