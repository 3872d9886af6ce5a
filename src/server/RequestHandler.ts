import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import type { Task } from '../types/task.js';
import type { Message } from '../types/message.js';
import type { TaskEvent } from '../types/events.js';
import type { Logger } from '../types/logger.js';
import type { TaskStore } from '../types/store.js';
import type { CapabilityParameters } from '../types/capability.js';
import type {
  JsonRpcId,
  JsonRpcErrorResponse,
  JsonRpcRequest,
  JsonRpcResponse,
} from '../types/handler.js';
import type { TaskExecutor } from '../execution/TaskExecutor.js';
import { EventChannel, DEFAULT_CHANNEL_CAPACITY } from '../events/EventChannel.js';
import { AgentError } from '../errors/AgentError.js';
import { DEFAULT_CAPABILITY } from '../capabilities/builtins.js';
import {
  describeIssues,
  jsonRpcRequestSchema,
  messageSendParamsSchema,
  taskIdParamsSchema,
  type ParsedMessageSendParams,
} from './schemas.js';

export interface RequestHandlerConfig {
  executor: TaskExecutor;
  taskStore: TaskStore;
  /** Capability used when a request names none (default: "echo"). */
  defaultCapability?: string;
  channelCapacity?: number;
  logger?: Logger;
}

interface PreparedSend {
  task: Task;
  message: Message;
  capability: string;
  parameters: CapabilityParameters;
}

/**
 * JSON-RPC 2.0 front of the agent.
 *
 * Capability failures come back as a result: a task in the `failed` state
 * with `metadata.error`. Protocol failures (bad JSON, unknown method, bad
 * params, unknown or finished task) come back as JSON-RPC error objects.
 */
export class RequestHandler {
  private readonly executor: TaskExecutor;
  private readonly taskStore: TaskStore;
  private readonly defaultCapability: string;
  private readonly channelCapacity: number;
  private readonly logger?: Logger;

  constructor(config: RequestHandlerConfig) {
    this.executor = config.executor;
    this.taskStore = config.taskStore;
    this.defaultCapability = config.defaultCapability ?? DEFAULT_CAPABILITY;
    this.channelCapacity = config.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY;
    this.logger = config.logger;
  }

  /** Handle a decoded JSON-RPC request body and return a single response. */
  async handle(body: unknown): Promise<JsonRpcResponse> {
    let request: JsonRpcRequest;
    try {
      request = parseRequest(body);
    } catch (err) {
      return this.errorResponse(requestId(body), err);
    }

    try {
      return { jsonrpc: '2.0', id: request.id, result: await this.dispatch(request) };
    } catch (err) {
      return this.errorResponse(request.id, err);
    }
  }

  /**
   * Handle a request whose responses are streamed. `message/stream` yields
   * one response per task event; any other method yields a single response.
   */
  async *handleStream(body: unknown): AsyncIterable<JsonRpcResponse> {
    let request: JsonRpcRequest;
    try {
      request = parseRequest(body);
    } catch (err) {
      yield this.errorResponse(requestId(body), err);
      return;
    }

    if (request.method !== 'message/stream') {
      yield await this.handle(body);
      return;
    }

    try {
      const params = parseParams(messageSendParamsSchema, request.params);
      for await (const event of this.streamMessage(params)) {
        yield { jsonrpc: '2.0', id: request.id, result: event };
      }
    } catch (err) {
      yield this.errorResponse(request.id, err);
    }
  }

  /** Run a message to completion and return the finished task. */
  async sendMessage(params: ParsedMessageSendParams): Promise<Task> {
    const prepared = await this.prepare(params);
    const channel = new EventChannel<TaskEvent>(this.channelCapacity);
    const run = this.executor.execute(prepared, channel);

    await Promise.all([run, this.drain(channel)]);

    const task = await this.taskStore.get(prepared.task.id);
    if (!task) {
      throw AgentError.taskNotFound(prepared.task.id);
    }
    return task;
  }

  /** Run a message and yield its events as they are emitted. */
  async *streamMessage(params: ParsedMessageSendParams): AsyncIterable<TaskEvent> {
    const prepared = await this.prepare(params);
    const channel = new EventChannel<TaskEvent>(this.channelCapacity);
    // Keep the rejection observed while events are being yielded; it is rethrown below.
    const failure = this.executor.execute(prepared, channel).then(
      () => undefined,
      (err: unknown) => err ?? new Error('Task execution failed'),
    );

    try {
      yield* channel;
    } finally {
      const err = await failure;
      if (err !== undefined) {
        throw err;
      }
    }
  }

  async getTask(taskId: string): Promise<Task> {
    const task = await this.taskStore.get(taskId);
    if (!task) {
      throw AgentError.taskNotFound(taskId);
    }
    return task;
  }

  async cancelTask(taskId: string): Promise<Task> {
    const outcome = await this.executor.cancel(taskId);
    const task = await this.taskStore.get(taskId);
    if (outcome === 'not-found' || !task) {
      throw AgentError.taskNotFound(taskId);
    }
    if (outcome === 'nothing-to-cancel') {
      throw AgentError.taskNotCancelable(taskId, task.status.state);
    }
    return task;
  }

  private async dispatch(request: JsonRpcRequest): Promise<unknown> {
    switch (request.method) {
      case 'message/send':
        return this.sendMessage(parseParams(messageSendParamsSchema, request.params));
      case 'message/stream':
        throw AgentError.invalidRequest('message/stream responses must be consumed as a stream');
      case 'tasks/get':
        return this.getTask(parseParams(taskIdParamsSchema, request.params).id);
      case 'tasks/cancel':
        return this.cancelTask(parseParams(taskIdParamsSchema, request.params).id);
      default:
        throw AgentError.methodNotFound(request.method);
    }
  }

  /** Derive the task for a send: the message's `taskId` if given, else a fresh id. */
  private async prepare(params: ParsedMessageSendParams): Promise<PreparedSend> {
    const message: Message = { ...params.message, messageId: params.message.messageId ?? randomUUID() };
    const taskId = message.taskId ?? randomUUID();

    const task =
      (await this.taskStore.get(taskId)) ??
      (await this.taskStore.create(taskId, message.contextId ?? taskId, message));

    return {
      task,
      message,
      capability: params.metadata?.capability ?? this.defaultCapability,
      parameters: params.metadata?.parameters ?? {},
    };
  }

  private async drain(channel: EventChannel<TaskEvent>): Promise<void> {
    for await (const event of channel) {
      this.logger?.('debug', `Event ${event.kind} for task ${event.taskId}`);
    }
  }

  private errorResponse(id: JsonRpcId, err: unknown): JsonRpcErrorResponse {
    if (err instanceof AgentError) {
      return { jsonrpc: '2.0', id, error: err.toJSON() };
    }
    const detail = err instanceof Error ? err.message : String(err);
    this.logger?.('error', 'Unhandled error while handling request', err);
    return { jsonrpc: '2.0', id, error: AgentError.internal(detail).toJSON() };
  }
}

function parseRequest(body: unknown): JsonRpcRequest {
  const parsed = jsonRpcRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw AgentError.invalidRequest(describeIssues(parsed.error));
  }
  return parsed.data;
}

function parseParams<S extends z.ZodTypeAny>(schema: S, params: unknown): z.infer<S> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw AgentError.invalidParams(describeIssues(parsed.error));
  }
  return parsed.data;
}

/** Best-effort id of a request that failed validation. */
function requestId(body: unknown): JsonRpcId {
  if (typeof body === 'object' && body !== null && 'id' in body) {
    const { id } = body;
    if (typeof id === 'string' || typeof id === 'number') return id;
  }
  return null;
}
