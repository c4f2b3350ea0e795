import { eq, and } from 'drizzle-orm';
import { getDb } from '../index';
import { namespaces, projects, projectMembers } from '../schema';
import type { MemberStore, ProjectRecord, ProjectStore } from '../store';

export const projectModel: ProjectStore = {
  /**
   * Find a project (with its namespace) by ID
   */
  async findById(id: string): Promise<ProjectRecord | undefined> {
    const db = getDb();
    const [row] = await db
      .select()
      .from(projects)
      .innerJoin(namespaces, eq(projects.namespaceId, namespaces.id))
      .where(eq(projects.id, id))
      .limit(1);

    return row ? { ...row.projects, namespace: row.namespaces } : undefined;
  },

  /**
   * Find a project by namespace path and project path
   */
  async findByFullPath(namespacePath: string, projectPath: string): Promise<ProjectRecord | undefined> {
    const db = getDb();
    const [row] = await db
      .select()
      .from(projects)
      .innerJoin(namespaces, eq(projects.namespaceId, namespaces.id))
      .where(and(eq(namespaces.path, namespacePath), eq(projects.path, projectPath)))
      .limit(1);

    return row ? { ...row.projects, namespace: row.namespaces } : undefined;
  },
};

export const memberModel: MemberStore = {
  async accessLevel(projectId: string, userId: string): Promise<number> {
    const db = getDb();
    const [member] = await db
      .select({ accessLevel: projectMembers.accessLevel })
      .from(projectMembers)
      .where(and(eq(projectMembers.projectId, projectId), eq(projectMembers.userId, userId)));
    return member?.accessLevel ?? 0;
  },
};
