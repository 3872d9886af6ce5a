import type { Artifact } from './artifact.js';
import type { TaskMetadata, TaskStatus } from './task.js';

/** Status transition of a task. `final` marks the terminal event. */
export interface TaskStatusUpdateEvent {
  kind: 'status-update';
  taskId: string;
  contextId: string;
  status: TaskStatus;
  final: boolean;
  /** Carries `error` on the terminal event of a failed task. */
  metadata?: TaskMetadata;
}

/** An artifact produced by a task. */
export interface TaskArtifactUpdateEvent {
  kind: 'artifact-update';
  taskId: string;
  contextId: string;
  artifact: Artifact;
  lastChunk: boolean;
}

export type TaskEvent = TaskStatusUpdateEvent | TaskArtifactUpdateEvent;
