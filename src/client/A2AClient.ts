import { randomUUID } from 'node:crypto';
import type { AgentCard } from '../types/agent-card.js';
import type { Task } from '../types/task.js';
import type { TaskEvent } from '../types/events.js';
import type { Message } from '../types/message.js';
import type { Logger } from '../types/logger.js';
import type { CapabilityParameters } from '../types/capability.js';
import type { MessageSendParams } from '../types/payloads.js';
import type { JsonRpcRequest, JsonRpcResponse, MethodName, MethodPayloadMap } from '../types/handler.js';
import { AgentError } from '../errors/AgentError.js';
import { HEALTH_PATH, WELL_KNOWN_PATH } from '../transport/HttpTransport.js';

export interface A2AClientConfig {
  /** Base URL of the agent, e.g. "http://localhost:8000". */
  baseUrl: string;
  /** URL path of the JSON-RPC endpoint (default: '/'). */
  rpcPath?: string;
  /** Request timeout in milliseconds (default: 30000). */
  timeout?: number;
  logger?: Logger;
}

export interface SendMessageOptions {
  /** Capability to invoke (server default: "echo"). */
  capability?: string;
  parameters?: CapabilityParameters;
  contextId?: string;
}

/** Concatenated text of every text part of every artifact of the task. */
export function responseText(task: Task): string {
  let text = '';
  for (const artifact of task.artifacts) {
    for (const part of artifact.parts) {
      if (part.kind === 'text') text += part.text;
    }
  }
  return text;
}

/**
 * Client for an A2A agent over HTTP. Transport failures throw an
 * AgentError with code TRANSPORT_ERROR; JSON-RPC errors are rethrown as
 * AgentError with the server's code. Nothing is retried.
 */
export class A2AClient {
  private readonly baseUrl: string;
  private readonly rpcPath: string;
  private readonly timeout: number;
  private readonly logger?: Logger;
  private nextId = 1;

  constructor(config: A2AClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.rpcPath = config.rpcPath ?? '/';
    this.timeout = config.timeout ?? 30_000;
    this.logger = config.logger;
  }

  /** Fetch the agent card from the well-known path. */
  async getAgentCard(): Promise<AgentCard> {
    return (await this.fetchJson(WELL_KNOWN_PATH, { method: 'GET' })) as AgentCard;
  }

  /** Send a text message and wait for the finished task. */
  async sendMessage(text: string, options: SendMessageOptions = {}): Promise<Task> {
    return this.call('message/send', buildParams(text, options));
  }

  /**
   * Send a text message and receive its task events as they happen.
   * The timeout bounds the wait for the response and for each later event.
   */
  async *streamMessage(text: string, options: SendMessageOptions = {}): AsyncIterable<TaskEvent> {
    const request = this.buildRequest('message/stream', buildParams(text, options));
    const url = this.baseUrl + this.rpcPath;
    const controller = new AbortController();

    let timeoutId = setTimeout(() => controller.abort(), this.timeout);
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'text/event-stream' },
        body: JSON.stringify(request),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw AgentError.transport(url, `HTTP ${response.status}: ${response.statusText}`);
      }
      if (!response.body) {
        throw AgentError.transport(url, 'Response body is null');
      }

      // Reset timeout on each event
      const frames = parseSSE(response.body, () => {
        clearTimeout(timeoutId);
        timeoutId = setTimeout(() => controller.abort(), this.timeout);
      });
      for await (const frame of frames) {
        const rpc = frame as JsonRpcResponse<TaskEvent>;
        if ('error' in rpc) {
          throw AgentError.fromJSON(rpc.error);
        }
        yield rpc.result;
      }
    } catch (err) {
      throw err instanceof AgentError ? err : this.transportError(url, err);
    } finally {
      clearTimeout(timeoutId);
      // Releases the connection when the consumer stops early.
      controller.abort();
    }
  }

  async getTask(taskId: string): Promise<Task> {
    return this.call('tasks/get', { id: taskId });
  }

  async cancelTask(taskId: string): Promise<Task> {
    return this.call('tasks/cancel', { id: taskId });
  }

  /** True when the agent answers the health check with status "healthy". */
  async checkHealth(): Promise<boolean> {
    try {
      const body = await this.fetchJson(HEALTH_PATH, { method: 'GET' });
      return typeof body === 'object' && body !== null && 'status' in body && body.status === 'healthy';
    } catch (err) {
      this.logger?.('warn', 'Health check failed', err instanceof Error ? err.message : err);
      return false;
    }
  }

  private async call<M extends MethodName>(
    method: M,
    params: MethodPayloadMap[M]['params'],
  ): Promise<MethodPayloadMap[M]['result']> {
    const request = this.buildRequest(method, params);
    const rpc = (await this.fetchJson(this.rpcPath, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
    })) as JsonRpcResponse<MethodPayloadMap[M]['result']>;

    if ('error' in rpc) {
      throw AgentError.fromJSON(rpc.error);
    }
    return rpc.result;
  }

  private buildRequest<P>(method: MethodName, params: P): JsonRpcRequest<P> {
    return { jsonrpc: '2.0', id: this.nextId++, method, params };
  }

  /** Fetch and decode a JSON body. The timeout covers reading the body too. */
  private async fetchJson(path: string, init: RequestInit): Promise<unknown> {
    const url = this.baseUrl + path;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        throw AgentError.transport(url, `HTTP ${response.status}: ${response.statusText}`);
      }
      const body: unknown = await response.json();
      return body;
    } catch (err) {
      throw err instanceof AgentError ? err : this.transportError(url, err);
    } finally {
      clearTimeout(timeoutId);
      controller.abort();
    }
  }

  private transportError(url: string, err: unknown): AgentError {
    if (err instanceof Error && err.name === 'AbortError') {
      return AgentError.transport(url, `Request timeout after ${this.timeout}ms`);
    }
    return AgentError.transport(url, err instanceof Error ? err.message : String(err));
  }
}

function buildParams(text: string, options: SendMessageOptions): MessageSendParams {
  const message: Message = {
    kind: 'message',
    messageId: randomUUID(),
    role: 'user',
    parts: [{ kind: 'text', text }],
    ...(options.contextId !== undefined ? { contextId: options.contextId } : {}),
  };

  const metadata = {
    ...(options.capability !== undefined ? { capability: options.capability } : {}),
    ...(options.parameters !== undefined ? { parameters: options.parameters } : {}),
  };

  return Object.keys(metadata).length > 0 ? { message, metadata } : { message };
}

async function* parseSSE(
  body: ReadableStream<Uint8Array>,
  onEvent: () => void,
): AsyncIterable<unknown> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const parts = buffer.split('\n\n');
      buffer = parts.pop() ?? '';

      for (const part of parts) {
        const data = dataLine(part);
        if (data !== undefined) {
          onEvent();
          yield JSON.parse(data);
        }
      }
    }

    const data = dataLine(buffer);
    if (data !== undefined) {
      onEvent();
      yield JSON.parse(data);
    }
  } finally {
    reader.releaseLock();
  }
}

function dataLine(frame: string): string | undefined {
  const line = frame.split('\n').find((l) => l.startsWith('data: '));
  return line?.slice(6);
}
