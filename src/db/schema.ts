import {
  pgTable,
  text,
  timestamp,
  boolean,
  integer,
  pgEnum,
  uuid,
  primaryKey,
  unique,
  jsonb,
  index,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';

// ============ ENUMS ============

export const visibilityEnum = pgEnum('visibility', ['private', 'internal', 'public']);

export const mergeRequestStateEnum = pgEnum('merge_request_state', [
  'opened',
  'reopened',
  'closed',
  'merged',
  'locked',
]);

export const mergeStatusEnum = pgEnum('merge_status', [
  'unchecked',
  'can_be_merged',
  'cannot_be_merged',
]);

export const pipelineStatusEnum = pgEnum('pipeline_status', [
  'created',
  'pending',
  'running',
  'success',
  'failed',
  'canceled',
  'skipped',
  'manual',
]);

// ============ USERS ============

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  username: text('username').notNull().unique(),
  name: text('name').notNull(),
  email: text('email').notNull().unique(),
  isAdmin: boolean('is_admin').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const sessions = pgTable('sessions', {
  id: uuid('id').primaryKey().defaultRandom(),
  token: text('token').notNull().unique(),
  userId: uuid('user_id')
    .notNull()
    .references(() => users.id, { onDelete: 'cascade' }),
  expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

// ============ NAMESPACES & PROJECTS ============

export const namespaces = pgTable('namespaces', {
  id: uuid('id').primaryKey().defaultRandom(),
  path: text('path').notNull().unique(),
  name: text('name').notNull(),
  // User namespaces have an owner; group namespaces rely on memberships
  ownerId: uuid('owner_id').references(() => users.id, { onDelete: 'set null' }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const projects = pgTable('projects', {
  id: uuid('id').primaryKey().defaultRandom(),
  namespaceId: uuid('namespace_id')
    .notNull()
    .references(() => namespaces.id, { onDelete: 'cascade' }),
  path: text('path').notNull(),
  name: text('name').notNull(),
  visibility: visibilityEnum('visibility').notNull().default('private'),
  defaultBranch: text('default_branch').notNull().default('master'),

  // Filesystem path to bare repo
  diskPath: text('disk_path').notNull(),

  forkedFromProjectId: uuid('forked_from_project_id').references((): AnyPgColumn => projects.id, {
    onDelete: 'set null',
  }),

  onlyAllowMergeIfBuildSucceeds: boolean('only_allow_merge_if_build_succeeds')
    .notNull()
    .default(false),

  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  namespacePathUnique: unique('uq_projects_namespace_path').on(table.namespaceId, table.path),
  forkedFromIdx: index('idx_projects_forked_from').on(table.forkedFromProjectId),
}));

export const projectMembers = pgTable(
  'project_members',
  {
    projectId: uuid('project_id')
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    accessLevel: integer('access_level').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.projectId, table.userId] }),
    userIdIdx: index('idx_project_members_user_id').on(table.userId),
  })
);

// ============ MERGE REQUESTS ============

/**
 * Parameters stored with a merge request for a deferred merge
 */
export interface MergeParams {
  commitMessage?: string;
  shouldRemoveSourceBranch?: boolean;
  sha?: string;
}

export const mergeRequests = pgTable('merge_requests', {
  id: uuid('id').primaryKey().defaultRandom(),

  // !1, !2, etc. per target project
  iid: integer('iid').notNull(),

  targetProjectId: uuid('target_project_id')
    .notNull()
    .references(() => projects.id, { onDelete: 'cascade' }),
  // Null once the source project (a fork) has been deleted
  sourceProjectId: uuid('source_project_id').references(() => projects.id, {
    onDelete: 'set null',
  }),

  sourceBranch: text('source_branch').notNull(),
  targetBranch: text('target_branch').notNull(),

  title: text('title').notNull(),
  description: text('description'),

  state: mergeRequestStateEnum('state').notNull().default('opened'),
  mergeStatus: mergeStatusEnum('merge_status').notNull().default('unchecked'),

  authorId: uuid('author_id')
    .notNull()
    .references(() => users.id),

  // Merge when build succeeds
  mergeWhenBuildSucceeds: boolean('merge_when_build_succeeds').notNull().default(false),
  mergeUserId: uuid('merge_user_id').references(() => users.id, { onDelete: 'set null' }),
  mergeParams: jsonb('merge_params').$type<MergeParams>(),

  mergeCommitSha: text('merge_commit_sha'),
  mergeError: text('merge_error'),

  // Diff refs at the time of the last refresh
  diffBaseSha: text('diff_base_sha'),
  diffStartSha: text('diff_start_sha'),
  diffHeadSha: text('diff_head_sha'),

  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  mergedAt: timestamp('merged_at', { withTimezone: true }),
  closedAt: timestamp('closed_at', { withTimezone: true }),
}, (table) => ({
  targetIidUnique: unique('uq_merge_requests_target_iid').on(table.targetProjectId, table.iid),
  targetStateIdx: index('idx_merge_requests_target_state').on(table.targetProjectId, table.state),
  // Auto merge lookups when a pipeline finishes
  sourceBranchIdx: index('idx_merge_requests_source_branch').on(
    table.sourceProjectId,
    table.sourceBranch
  ),
}));

// ============ PIPELINES ============

export const pipelines = pgTable('pipelines', {
  id: uuid('id').primaryKey().defaultRandom(),
  projectId: uuid('project_id')
    .notNull()
    .references(() => projects.id, { onDelete: 'cascade' }),
  sha: text('sha').notNull(),
  ref: text('ref').notNull(),
  status: pipelineStatusEnum('status').notNull().default('created'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  finishedAt: timestamp('finished_at', { withTimezone: true }),
}, (table) => ({
  projectShaRefIdx: index('idx_pipelines_project_sha_ref').on(table.projectId, table.sha, table.ref),
}));

// ============ TYPES ============

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type Session = typeof sessions.$inferSelect;
export type Namespace = typeof namespaces.$inferSelect;
export type NewNamespace = typeof namespaces.$inferInsert;
export type Project = typeof projects.$inferSelect;
export type NewProject = typeof projects.$inferInsert;
export type ProjectMember = typeof projectMembers.$inferSelect;
export type MergeRequest = typeof mergeRequests.$inferSelect;
export type NewMergeRequest = typeof mergeRequests.$inferInsert;
export type MergeRequestState = MergeRequest['state'];
export type Pipeline = typeof pipelines.$inferSelect;
export type PipelineStatus = Pipeline['status'];
