import type { Message } from '../../src/types/message.js';
import type { TaskEvent } from '../../src/types/events.js';
import type { Task } from '../../src/types/task.js';
import { CapabilityRegistry } from '../../src/capabilities/CapabilityRegistry.js';
import { InMemoryTaskStore } from '../../src/stores/InMemoryTaskStore.js';
import { TaskExecutor } from '../../src/execution/TaskExecutor.js';
import { RequestHandler } from '../../src/server/RequestHandler.js';

export function makeMessage(text: string, overrides: Partial<Message> = {}): Message {
  return {
    kind: 'message',
    messageId: 'msg-1',
    role: 'user',
    parts: [{ kind: 'text', text }],
    ...overrides,
  };
}

export function isTask(value: unknown): value is Task {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'task';
}

export function isTaskEvent(value: unknown): value is TaskEvent {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    (value.kind === 'status-update' || value.kind === 'artifact-update')
  );
}

/** Compact view of an event sequence: status states and "artifact". */
export function eventKinds(events: TaskEvent[]): string[] {
  return events.map((e) => (e.kind === 'status-update' ? e.status.state : 'artifact'));
}

export function createStack(registry = CapabilityRegistry.withBuiltins()) {
  const taskStore = new InMemoryTaskStore();
  const executor = new TaskExecutor({ registry, taskStore });
  const handler = new RequestHandler({ executor, taskStore });
  return { registry, taskStore, executor, handler };
}
