import type { Task, TaskStatus } from '../types/task.js';
import type { TaskStore } from '../types/store.js';
import type { TaskEvent } from '../types/events.js';
import type { Message } from '../types/message.js';
import { AgentError } from '../errors/AgentError.js';
import { isTerminalState } from '../execution/taskState.js';

/**
 * In-memory task store backed by a Map.
 *
 * Every mutation runs synchronously inside one call, so events applied to
 * the same task never interleave. Contents are lost on restart.
 */
export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, Task>();

  async create(taskId: string, contextId: string, message?: Message): Promise<Task> {
    if (this.tasks.has(taskId)) {
      throw AgentError.taskConflict(taskId);
    }

    const status: TaskStatus = { state: 'submitted', timestamp: new Date().toISOString() };
    const task: Task = {
      kind: 'task',
      id: taskId,
      contextId,
      status,
      statusHistory: [status],
      artifacts: [],
      history: message ? [message] : [],
    };
    this.tasks.set(taskId, task);
    return structuredClone(task);
  }

  async get(taskId: string): Promise<Task | undefined> {
    const task = this.tasks.get(taskId);
    return task ? structuredClone(task) : undefined;
  }

  async appendEvent(taskId: string, event: TaskEvent): Promise<Task> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw AgentError.taskNotFound(taskId);
    }
    if (event.taskId !== taskId) {
      throw AgentError.internal(`Event for task ${event.taskId} applied to task ${taskId}`);
    }
    if (isTerminalState(task.status.state)) {
      throw AgentError.alreadyTerminal(taskId, task.status.state);
    }

    if (event.kind === 'status-update') {
      task.status = structuredClone(event.status);
      task.statusHistory.push(task.status);
      if (event.metadata?.error) {
        task.metadata = { ...task.metadata, error: event.metadata.error };
      }
    } else {
      task.artifacts.push(structuredClone(event.artifact));
    }

    return structuredClone(task);
  }

  async delete(taskId: string): Promise<void> {
    this.tasks.delete(taskId);
  }

  /** Returns the number of tasks currently stored. */
  get size(): number {
    return this.tasks.size;
  }

  /** Remove all tasks. */
  clear(): void {
    this.tasks.clear();
  }
}
