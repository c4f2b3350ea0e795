/**
 * Database models
 */

import type { Store } from '../store';
import { userModel, sessionModel } from './user';
import { projectModel, memberModel } from './project';
import { mergeRequestModel } from './merge-request';
import { pipelineModel } from './pipeline';

export { userModel, sessionModel, projectModel, memberModel, mergeRequestModel, pipelineModel };

/**
 * The PostgreSQL-backed store
 */
export const models: Store = {
  users: userModel,
  sessions: sessionModel,
  projects: projectModel,
  members: memberModel,
  mergeRequests: mergeRequestModel,
  pipelines: pipelineModel,
};
