import { eq, and, desc, inArray } from 'drizzle-orm';
import { getDb } from '../index';
import { mergeRequests, projects, type MergeRequest, type NewMergeRequest } from '../schema';
import type { MergeRequestListOptions, MergeRequestStore, MergeRequestUpdate } from '../store';

export const mergeRequestModel: MergeRequestStore = {
  /**
   * Find a merge request by ID
   */
  async findById(id: string): Promise<MergeRequest | undefined> {
    const db = getDb();
    const [mr] = await db.select().from(mergeRequests).where(eq(mergeRequests.id, id));
    return mr;
  },

  /**
   * Find a merge request by target project and iid
   */
  async findByIid(targetProjectId: string, iid: number): Promise<MergeRequest | undefined> {
    const db = getDb();
    const [mr] = await db
      .select()
      .from(mergeRequests)
      .where(and(eq(mergeRequests.targetProjectId, targetProjectId), eq(mergeRequests.iid, iid)));
    return mr;
  },

  /**
   * List merge requests of a target project, newest first
   */
  async listByTargetProject(
    targetProjectId: string,
    options: MergeRequestListOptions = {}
  ): Promise<MergeRequest[]> {
    const db = getDb();
    const conditions = [eq(mergeRequests.targetProjectId, targetProjectId)];

    if (options.states && options.states.length > 0) {
      conditions.push(inArray(mergeRequests.state, options.states));
    }

    let query = db
      .select()
      .from(mergeRequests)
      .where(and(...conditions))
      .orderBy(desc(mergeRequests.createdAt));

    if (options.limit) {
      query = query.limit(options.limit) as typeof query;
    }

    if (options.offset) {
      query = query.offset(options.offset) as typeof query;
    }

    return query;
  },

  /**
   * Create a merge request with the next iid of its target project.
   * Holds a lock on the target project row until commit while the iid is chosen.
   */
  async create(data: Omit<NewMergeRequest, 'iid'>): Promise<MergeRequest> {
    const db = getDb();

    return db.transaction(async (tx) => {
      await tx
        .select({ id: projects.id })
        .from(projects)
        .where(eq(projects.id, data.targetProjectId))
        .for('update');

      const [last] = await tx
        .select({ iid: mergeRequests.iid })
        .from(mergeRequests)
        .where(eq(mergeRequests.targetProjectId, data.targetProjectId))
        .orderBy(desc(mergeRequests.iid))
        .limit(1);

      const [mr] = await tx
        .insert(mergeRequests)
        .values({ ...data, iid: (last?.iid ?? 0) + 1 })
        .returning();
      return mr;
    });
  },

  /**
   * Update a merge request
   */
  async update(id: string, data: MergeRequestUpdate): Promise<MergeRequest | undefined> {
    const db = getDb();
    const [mr] = await db
      .update(mergeRequests)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(mergeRequests.id, id))
      .returning();
    return mr;
  },

  /**
   * Delete a merge request
   */
  async delete(id: string): Promise<boolean> {
    const db = getDb();
    const deleted = await db
      .delete(mergeRequests)
      .where(eq(mergeRequests.id, id))
      .returning({ id: mergeRequests.id });
    return deleted.length > 0;
  },

  async listAutoMergeCandidates(
    sourceProjectId: string,
    sourceBranch: string,
    sha: string
  ): Promise<MergeRequest[]> {
    const db = getDb();
    return db
      .select()
      .from(mergeRequests)
      .where(
        and(
          eq(mergeRequests.sourceProjectId, sourceProjectId),
          eq(mergeRequests.sourceBranch, sourceBranch),
          eq(mergeRequests.diffHeadSha, sha),
          eq(mergeRequests.mergeWhenBuildSucceeds, true),
          inArray(mergeRequests.state, ['opened', 'reopened'])
        )
      );
  },
};
