import type { Task } from './task.js';
import type { TaskEvent } from './events.js';
import type { Message } from './message.js';

export interface TaskStore {
  /** Create a task in the `submitted` state. Rejects ids that already exist. */
  create(taskId: string, contextId: string, message?: Message): Promise<Task>;
  get(taskId: string): Promise<Task | undefined>;
  /** Apply one event to the stored task and return the updated snapshot. */
  appendEvent(taskId: string, event: TaskEvent): Promise<Task>;
}
