import type { MessageSendParams, TaskIdParams } from './payloads.js';
import type { Task } from './task.js';
import type { TaskEvent } from './events.js';
import type { AgentErrorData } from './errors.js';

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest<P = unknown> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: P;
}

export interface JsonRpcSuccessResponse<R = unknown> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: R;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: AgentErrorData;
}

export type JsonRpcResponse<R = unknown> = JsonRpcSuccessResponse<R> | JsonRpcErrorResponse;

/** Maps method names to their params/result types. */
export interface MethodPayloadMap {
  'message/send': { params: MessageSendParams; result: Task };
  'message/stream': { params: MessageSendParams; result: TaskEvent };
  'tasks/get': { params: TaskIdParams; result: Task };
  'tasks/cancel': { params: TaskIdParams; result: Task };
}

export type MethodName = keyof MethodPayloadMap;
