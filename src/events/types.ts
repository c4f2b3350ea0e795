/**
 * Event Types for the Event Bus
 *
 * These events are emitted by the merge request services and can trigger:
 * - Auto merges
 * - Notifications
 * - Webhooks
 */

import type { PipelineStatus } from '../db/schema';

// ============ BASE EVENT ============

export interface BaseEvent {
  id: string;
  timestamp: Date;
  actorId: string; // User who triggered the event
}

interface MergeRequestPayload {
  mergeRequestId: string;
  iid: number;
  title: string;
  targetProjectId: string;
  projectFullPath: string;
}

// ============ MERGE REQUEST EVENTS ============

export interface MergeRequestCreatedEvent extends BaseEvent {
  type: 'merge_request.created';
  payload: MergeRequestPayload & {
    sourceBranch: string;
    targetBranch: string;
  };
}

export interface MergeRequestClosedEvent extends BaseEvent {
  type: 'merge_request.closed';
  payload: MergeRequestPayload;
}

export interface MergeRequestReopenedEvent extends BaseEvent {
  type: 'merge_request.reopened';
  payload: MergeRequestPayload;
}

export interface MergeRequestMergedEvent extends BaseEvent {
  type: 'merge_request.merged';
  payload: MergeRequestPayload & {
    mergeCommitSha: string;
  };
}

export interface MergeRequestMergeFailedEvent extends BaseEvent {
  type: 'merge_request.merge_failed';
  payload: MergeRequestPayload & {
    error: string;
  };
}

export interface MergeWhenBuildSucceedsEvent extends BaseEvent {
  type: 'merge_request.merge_when_build_succeeds';
  payload: MergeRequestPayload;
}

export interface AutoMergeCanceledEvent extends BaseEvent {
  type: 'merge_request.auto_merge_canceled';
  payload: MergeRequestPayload;
}

export interface MergeRequestDeletedEvent extends BaseEvent {
  type: 'merge_request.deleted';
  payload: MergeRequestPayload;
}

// ============ PIPELINE EVENTS ============

export interface PipelineCompletedEvent extends BaseEvent {
  type: 'pipeline.completed';
  payload: {
    pipelineId: string;
    projectId: string;
    sha: string;
    ref: string;
    status: PipelineStatus;
  };
}

// ============ UNION TYPE ============

export type AppEvent =
  | MergeRequestCreatedEvent
  | MergeRequestClosedEvent
  | MergeRequestReopenedEvent
  | MergeRequestMergedEvent
  | MergeRequestMergeFailedEvent
  | MergeWhenBuildSucceedsEvent
  | AutoMergeCanceledEvent
  | MergeRequestDeletedEvent
  | PipelineCompletedEvent;

export type EventType = AppEvent['type'];
