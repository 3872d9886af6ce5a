import { randomUUID } from 'node:crypto';
import type { Task, TaskStatus } from '../types/task.js';
import type { Message, TaskState } from '../types/message.js';
import type { Artifact } from '../types/artifact.js';
import type { TaskEvent, TaskStatusUpdateEvent } from '../types/events.js';
import type { CapabilityParameters } from '../types/capability.js';
import type { Logger } from '../types/logger.js';
import type { TaskStore } from '../types/store.js';
import type { CapabilityRegistry } from '../capabilities/CapabilityRegistry.js';
import type { EventChannel } from '../events/EventChannel.js';
import { AgentError } from '../errors/AgentError.js';
import { isTerminalState } from './taskState.js';

export interface TaskExecutorConfig {
  registry: CapabilityRegistry;
  taskStore: TaskStore;
  logger?: Logger;
}

export interface ExecutionRequest {
  task: Task;
  message: Message;
  capability: string;
  parameters?: CapabilityParameters;
}

/**
 * Result of a cancel request. Work is never interrupted: `accepted` only
 * means the task had not reached a terminal state yet.
 */
export type CancelOutcome = 'accepted' | 'nothing-to-cancel' | 'not-found';

type CapabilityOutcome =
  | { ok: true; text: string }
  | { ok: false; error: AgentError };

/** Concatenated text of the message's text parts, in order. */
export function extractText(message: Message): string {
  let text = '';
  for (const part of message.parts) {
    if (part.kind === 'text') text += part.text;
  }
  return text;
}

/**
 * Drives one task from `submitted` to `completed` or `failed`.
 *
 * Emits `working`, then either an artifact followed by `completed`, or
 * `failed` alone. Each event is applied to the task store before it is
 * published, and the channel is closed when execution ends.
 */
export class TaskExecutor {
  private readonly registry: CapabilityRegistry;
  private readonly taskStore: TaskStore;
  private readonly logger?: Logger;
  private readonly inFlight = new Set<string>();

  constructor(config: TaskExecutorConfig) {
    this.registry = config.registry;
    this.taskStore = config.taskStore;
    this.logger = config.logger;
  }

  /**
   * Run the task to a terminal state.
   * @throws AgentError ALREADY_TERMINAL if the task has finished, TASK_CONFLICT
   *   if it is being executed, TASK_NOT_FOUND if the store does not know it.
   */
  async execute(request: ExecutionRequest, channel: EventChannel<TaskEvent>): Promise<void> {
    const taskId = request.task.id;
    try {
      const task = await this.taskStore.get(taskId);
      if (!task) {
        throw AgentError.taskNotFound(taskId);
      }
      if (isTerminalState(task.status.state)) {
        throw AgentError.alreadyTerminal(taskId, task.status.state);
      }
      if (task.status.state !== 'submitted' || this.inFlight.has(taskId)) {
        throw AgentError.taskConflict(taskId);
      }

      this.inFlight.add(taskId);
      try {
        await this.run(task, request, channel);
      } finally {
        this.inFlight.delete(taskId);
      }
    } finally {
      channel.close();
    }
  }

  async cancel(taskId: string): Promise<CancelOutcome> {
    const task = await this.taskStore.get(taskId);
    if (!task) return 'not-found';
    if (isTerminalState(task.status.state)) return 'nothing-to-cancel';
    return 'accepted';
  }

  private async run(
    task: Task,
    request: ExecutionRequest,
    channel: EventChannel<TaskEvent>,
  ): Promise<void> {
    await this.emit(channel, statusEvent(task, 'working'));

    const outcome = await this.invoke(request.capability, extractText(request.message), request.parameters ?? {});

    if (outcome.ok) {
      const artifact: Artifact = {
        artifactId: randomUUID(),
        name: `${request.capability}_response`,
        description: `Response from the ${request.capability} capability`,
        parts: [{ kind: 'text', text: outcome.text }],
        lastChunk: true,
      };
      await this.emit(channel, {
        kind: 'artifact-update',
        taskId: task.id,
        contextId: task.contextId,
        artifact,
        lastChunk: true,
      });
      await this.emit(channel, statusEvent(task, 'completed'));
    } else {
      this.logger?.('warn', `Task ${task.id} failed`, outcome.error.toJSON());
      await this.emit(channel, statusEvent(task, 'failed', outcome.error));
    }
  }

  private async invoke(
    name: string,
    text: string,
    parameters: CapabilityParameters,
  ): Promise<CapabilityOutcome> {
    const fn = this.registry.resolve(name);
    if (!fn) {
      return { ok: false, error: AgentError.unknownCapability(name) };
    }

    try {
      const result = await fn(text, parameters);
      if (typeof result !== 'string') {
        return { ok: false, error: AgentError.capabilityError(name, `returned ${typeof result}, expected string`) };
      }
      return { ok: true, text: result };
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      return { ok: false, error: AgentError.capabilityError(name, detail) };
    }
  }

  private async emit(channel: EventChannel<TaskEvent>, event: TaskEvent): Promise<void> {
    await this.taskStore.appendEvent(event.taskId, event);
    this.logger?.('debug', `Task ${event.taskId}: ${describe(event)}`);
    await channel.publish(event);
  }
}

function statusEvent(task: Task, state: TaskState, error?: AgentError): TaskStatusUpdateEvent {
  const status: TaskStatus = { state, timestamp: new Date().toISOString() };
  const event: TaskStatusUpdateEvent = {
    kind: 'status-update',
    taskId: task.id,
    contextId: task.contextId,
    status,
    final: isTerminalState(state),
  };
  if (error) {
    event.metadata = { error: error.toJSON() };
  }
  return event;
}

function describe(event: TaskEvent): string {
  return event.kind === 'status-update'
    ? `${event.status.state}${event.final ? ' (final)' : ''}`
    : `artifact ${event.artifact.artifactId}`;
}
