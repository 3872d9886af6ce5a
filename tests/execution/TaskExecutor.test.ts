import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TaskExecutor, extractText, type ExecutionRequest } from '../../src/execution/TaskExecutor.js';
import { CapabilityRegistry } from '../../src/capabilities/CapabilityRegistry.js';
import { InMemoryTaskStore } from '../../src/stores/InMemoryTaskStore.js';
import { EventChannel } from '../../src/events/EventChannel.js';
import { AgentError } from '../../src/errors/AgentError.js';
import { ErrorCodes } from '../../src/types/errors.js';
import type { TaskEvent } from '../../src/types/events.js';
import type { CapabilityParameters } from '../../src/types/capability.js';
import { eventKinds, makeMessage } from '../helpers/fixtures.js';

describe('extractText', () => {
  it('concatenates text parts and skips data parts', () => {
    const message = makeMessage('', {
      parts: [
        { kind: 'text', text: 'Hello ' },
        { kind: 'data', data: { ignored: true } },
        { kind: 'text', text: 'World!' },
      ],
    });
    expect(extractText(message)).toBe('Hello World!');
  });

  it('returns the empty string when there are no parts', () => {
    expect(extractText(makeMessage('', { parts: [] }))).toBe('');
  });
});

describe('TaskExecutor', () => {
  let registry: CapabilityRegistry;
  let store: InMemoryTaskStore;
  let executor: TaskExecutor;

  beforeEach(() => {
    registry = CapabilityRegistry.withBuiltins();
    store = new InMemoryTaskStore();
    executor = new TaskExecutor({ registry, taskStore: store });
  });

  async function submit(
    taskId: string,
    text: string,
    capability = 'echo',
    parameters?: CapabilityParameters,
  ): Promise<ExecutionRequest> {
    const message = makeMessage(text, { taskId });
    const task = await store.create(taskId, `ctx-${taskId}`, message);
    return { task, message, capability, parameters };
  }

  async function run(request: ExecutionRequest): Promise<TaskEvent[]> {
    const channel = new EventChannel<TaskEvent>();
    const events: TaskEvent[] = [];
    await Promise.all([
      executor.execute(request, channel),
      (async () => {
        for await (const event of channel) events.push(event);
      })(),
    ]);
    return events;
  }

  function artifactText(events: TaskEvent[]): string | undefined {
    const event = events.find((e) => e.kind === 'artifact-update');
    if (event?.kind !== 'artifact-update') return undefined;
    const [part] = event.artifact.parts;
    return part.kind === 'text' ? part.text : undefined;
  }

  it('emits working, artifact, completed for echo', async () => {
    const events = await run(await submit('t1', 'Hello World!'));

    expect(eventKinds(events)).toEqual(['working', 'artifact', 'completed']);
    expect(artifactText(events)).toBe('Hello World!');
  });

  it('marks only the terminal status event as final', async () => {
    const events = await run(await submit('t1', 'hi'));
    const finals = events.map((e) => (e.kind === 'status-update' ? e.final : null));
    expect(finals).toEqual([false, null, true]);
  });

  it('carries task and context ids on every event', async () => {
    const events = await run(await submit('t1', 'hi'));
    for (const event of events) {
      expect(event.taskId).toBe('t1');
      expect(event.contextId).toBe('ctx-t1');
    }
  });

  it('names the artifact after the capability', async () => {
    const events = await run(await submit('t1', 'hi', 'echo_with_prefix'));
    const event = events[1];
    expect(event.kind).toBe('artifact-update');
    if (event.kind !== 'artifact-update') return;
    expect(event.artifact.name).toBe('echo_with_prefix_response');
    expect(event.artifact.description).toBe('Response from the echo_with_prefix capability');
    expect(event.artifact.lastChunk).toBe(true);
    expect(event.lastChunk).toBe(true);
  });

  it('applies the default prefix for echo_with_prefix', async () => {
    const events = await run(await submit('t1', 'hi', 'echo_with_prefix'));
    expect(artifactText(events)).toBe('Echo: hi');
  });

  it('applies a custom prefix for echo_with_prefix', async () => {
    const events = await run(await submit('t1', 'hi', 'echo_with_prefix', { prefix: 'X' }));
    expect(artifactText(events)).toBe('Xhi');
  });

  it('echoes an empty message as an empty artifact', async () => {
    const events = await run(await submit('t1', ''));
    expect(eventKinds(events)).toEqual(['working', 'artifact', 'completed']);
    expect(artifactText(events)).toBe('');
  });

  it('leaves the stored task completed with the artifact', async () => {
    await run(await submit('t1', 'hi'));
    const task = await store.get('t1');

    expect(task?.status.state).toBe('completed');
    expect(task?.statusHistory.map((s) => s.state)).toEqual(['submitted', 'working', 'completed']);
    expect(task?.artifacts).toHaveLength(1);
    expect(task?.metadata).toBeUndefined();
  });

  it('fails the task for an unknown capability', async () => {
    const events = await run(await submit('t1', 'hi', 'nope'));

    expect(eventKinds(events)).toEqual(['working', 'failed']);
    const failed = events[1];
    expect(failed.kind === 'status-update' && failed.metadata?.error?.code).toBe(
      ErrorCodes.UNKNOWN_CAPABILITY,
    );

    const task = await store.get('t1');
    expect(task?.status.state).toBe('failed');
    expect(task?.artifacts).toEqual([]);
    expect(task?.metadata?.error).toEqual({
      code: ErrorCodes.UNKNOWN_CAPABILITY,
      message: 'Unknown capability: nope',
      data: { capability: 'nope' },
    });
  });

  it('fails the task when the capability throws', async () => {
    registry.register('boom', () => {
      throw new Error('exploded');
    });
    const events = await run(await submit('t1', 'hi', 'boom'));

    expect(eventKinds(events)).toEqual(['working', 'failed']);
    expect((await store.get('t1'))?.metadata?.error).toEqual({
      code: ErrorCodes.CAPABILITY_ERROR,
      message: 'Capability boom failed: exploded',
      data: { capability: 'boom', detail: 'exploded' },
    });
  });

  it('fails the task when echo_with_prefix gets a non-string prefix', async () => {
    const events = await run(await submit('t1', 'hi', 'echo_with_prefix', { prefix: 7 }));

    expect(eventKinds(events)).toEqual(['working', 'failed']);
    expect((await store.get('t1'))?.metadata?.error?.message).toBe(
      'Capability echo_with_prefix failed: prefix must be a string, got number',
    );
  });

  it('logs a warning when a task fails', async () => {
    const logger = vi.fn();
    executor = new TaskExecutor({ registry, taskStore: store, logger });
    await run(await submit('t1', 'hi', 'nope'));

    expect(logger).toHaveBeenCalledWith('warn', 'Task t1 failed', {
      code: ErrorCodes.UNKNOWN_CAPABILITY,
      message: 'Unknown capability: nope',
      data: { capability: 'nope' },
    });
  });

  it('keeps event order for an async capability', async () => {
    registry.register('slow', async (text) => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      return text.toUpperCase();
    });
    const events = await run(await submit('t1', 'hi', 'slow'));

    expect(eventKinds(events)).toEqual(['working', 'artifact', 'completed']);
    expect(artifactText(events)).toBe('HI');
  });

  it('rejects re-executing a terminal task and emits nothing', async () => {
    const request = await submit('t1', 'hi');
    await run(request);

    const channel = new EventChannel<TaskEvent>();
    const err = await executor.execute(request, channel).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AgentError);
    expect(err instanceof AgentError && err.code).toBe(ErrorCodes.ALREADY_TERMINAL);
    expect(channel.isClosed).toBe(true);
    expect(channel.pending).toBe(0);
  });

  it('rejects a second concurrent execution of the same task', async () => {
    const gate: { release?: () => void } = {};
    registry.register('gate', (text) => new Promise<string>((resolve) => {
      gate.release = () => resolve(text);
    }));
    const request = await submit('t1', 'hi', 'gate');

    const first = run(request);
    await vi.waitFor(() => {
      expect(gate.release).toBeDefined();
    });

    const second = await executor
      .execute(request, new EventChannel<TaskEvent>())
      .catch((e: unknown) => e);
    expect(second instanceof AgentError && second.code).toBe(ErrorCodes.TASK_CONFLICT);

    gate.release?.();
    expect(eventKinds(await first)).toEqual(['working', 'artifact', 'completed']);
  });

  it('rejects a task the store does not know', async () => {
    const request = await submit('t1', 'hi');
    await store.delete('t1');

    const err = await executor.execute(request, new EventChannel<TaskEvent>()).catch((e: unknown) => e);
    expect(err instanceof AgentError && err.code).toBe(ErrorCodes.TASK_NOT_FOUND);
  });

  it('runs concurrent tasks independently', async () => {
    registry.register('delayed', async (text) => {
      await new Promise((resolve) => setTimeout(resolve, text.length * 5));
      return text;
    });
    const [a, b, c] = await Promise.all([
      run(await submit('a', 'long message', 'delayed')),
      run(await submit('b', 'hi', 'delayed')),
      run(await submit('c', 'mid', 'nope')),
    ]);

    expect(eventKinds(a)).toEqual(['working', 'artifact', 'completed']);
    expect(eventKinds(b)).toEqual(['working', 'artifact', 'completed']);
    expect(eventKinds(c)).toEqual(['working', 'failed']);
    expect(artifactText(a)).toBe('long message');
    expect(artifactText(b)).toBe('hi');
    expect(a.every((e) => e.taskId === 'a')).toBe(true);
    expect(b.every((e) => e.taskId === 'b')).toBe(true);
  });

  describe('cancel', () => {
    it('reports not-found for an unknown task', async () => {
      expect(await executor.cancel('missing')).toBe('not-found');
    });

    it('reports nothing-to-cancel for a finished task', async () => {
      await run(await submit('t1', 'hi'));
      expect(await executor.cancel('t1')).toBe('nothing-to-cancel');
    });

    it('accepts a task that has not finished', async () => {
      await submit('t1', 'hi');
      expect(await executor.cancel('t1')).toBe('accepted');
      expect((await store.get('t1'))?.status.state).toBe('submitted');
    });
  });
});
