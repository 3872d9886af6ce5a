import type { Artifact } from './artifact.js';
import type { Message, TaskState } from './message.js';
import type { AgentErrorData } from './errors.js';

/** Current status of a task. */
export interface TaskStatus {
  state: TaskState;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

export interface TaskMetadata extends Record<string, unknown> {
  /** Present once the task has failed. */
  error?: AgentErrorData;
}

/** One tracked invocation, from submission to a terminal state. */
export interface Task {
  kind: 'task';
  id: string;
  contextId: string;
  status: TaskStatus;
  statusHistory: TaskStatus[];
  artifacts: Artifact[];
  history: Message[];
  metadata?: TaskMetadata;
}
