/**
 * Status entity
 *
 * Presents a detailed status (currently only pipelines have one) the way
 * the pipeline widget reads it: icon, text, label and, for users allowed to
 * follow it, a link to the details page.
 */

import type { Pipeline, PipelineStatus, User } from '../db/schema';
import type { ProjectRecord } from '../db/store';
import type { Ability } from '../core/ability';
import { projectFullPath } from '../core/merge-request';

/**
 * The request a status is rendered for
 */
export interface StatusRequest {
  user: User | undefined;
  ability: Ability;
}

export interface DetailedStatus {
  group: string;
  icon: string;
  text: string;
  label: string;
  hasDetails(request: StatusRequest): Promise<boolean>;
  detailsPath(request: StatusRequest): string | null;
}

export interface StatusEntity {
  icon: string;
  text: string;
  label: string;
  has_details: boolean;
  details_path: string | null;
}

export async function representStatus(
  status: DetailedStatus,
  request: StatusRequest
): Promise<StatusEntity> {
  return {
    icon: status.icon,
    text: status.text,
    label: status.label,
    has_details: await status.hasDetails(request),
    details_path: status.detailsPath(request),
  };
}

const PIPELINE_TEXT: Record<PipelineStatus, string> = {
  created: 'created',
  pending: 'pending',
  running: 'running',
  success: 'passed',
  failed: 'failed',
  canceled: 'canceled',
  skipped: 'skipped',
  manual: 'manual',
};

export function pipelineStatus(pipeline: Pipeline, project: ProjectRecord): DetailedStatus {
  const text = PIPELINE_TEXT[pipeline.status];

  return {
    group: pipeline.status,
    icon: `icon_status_${pipeline.status}`,
    text,
    label: text,
    hasDetails: ({ ability }) => ability.canReadProject(project),
    detailsPath: () => `/${projectFullPath(project)}/pipelines/${pipeline.id}`,
  };
}
