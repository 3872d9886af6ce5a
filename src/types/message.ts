import type { Part } from './part.js';

export type TaskState = 'submitted' | 'working' | 'completed' | 'failed';

/** States after which a task accepts no further events. */
export type TerminalTaskState = Extract<TaskState, 'completed' | 'failed'>;

/** Role of a message within a task conversation. */
export type MessageRole = 'user' | 'agent';

/** A single communication turn sent to or from the agent. */
export interface Message {
  kind: 'message';
  messageId: string;
  role: MessageRole;
  parts: Part[];
  contextId?: string;
  taskId?: string;
  metadata?: Record<string, unknown>;
}
