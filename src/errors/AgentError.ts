import { ErrorCodes, type AgentErrorData } from '../types/errors.js';
import type { TaskState } from '../types/message.js';

export class AgentError extends Error {
  readonly code: number;
  readonly data?: Record<string, unknown>;

  constructor(code: number, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'AgentError';
    this.code = code;
    this.data = data;
  }

  toJSON(): AgentErrorData {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }

  /** Rebuild an error received in a JSON-RPC error object. */
  static fromJSON(json: AgentErrorData): AgentError {
    return new AgentError(json.code, json.message, json.data);
  }

  // --- JSON-RPC ---

  static parseError(reason: string): AgentError {
    return new AgentError(ErrorCodes.PARSE_ERROR, 'Parse error', { reason });
  }

  static invalidRequest(reason: string): AgentError {
    return new AgentError(ErrorCodes.INVALID_REQUEST, `Invalid request: ${reason}`);
  }

  static methodNotFound(method: string): AgentError {
    return new AgentError(ErrorCodes.METHOD_NOT_FOUND, `Method not found: ${method}`, { method });
  }

  static invalidParams(reason: string): AgentError {
    return new AgentError(ErrorCodes.INVALID_PARAMS, `Invalid params: ${reason}`);
  }

  static internal(detail: string): AgentError {
    return new AgentError(ErrorCodes.INTERNAL_ERROR, 'Internal error', { detail });
  }

  // --- Tasks ---

  static taskNotFound(taskId: string): AgentError {
    return new AgentError(ErrorCodes.TASK_NOT_FOUND, `Task not found: ${taskId}`, { taskId });
  }

  static taskNotCancelable(taskId: string, state: TaskState): AgentError {
    return new AgentError(ErrorCodes.TASK_NOT_CANCELABLE, `Task cannot be canceled: ${taskId}`, {
      taskId,
      state,
    });
  }

  static taskConflict(taskId: string): AgentError {
    return new AgentError(ErrorCodes.TASK_CONFLICT, `Task already exists: ${taskId}`, { taskId });
  }

  static alreadyTerminal(taskId: string, state: TaskState): AgentError {
    return new AgentError(ErrorCodes.ALREADY_TERMINAL, `Task is already ${state}: ${taskId}`, {
      taskId,
      state,
    });
  }

  // --- Capabilities ---

  static unknownCapability(name: string): AgentError {
    return new AgentError(ErrorCodes.UNKNOWN_CAPABILITY, `Unknown capability: ${name}`, {
      capability: name,
    });
  }

  static capabilityError(name: string, detail: string): AgentError {
    return new AgentError(ErrorCodes.CAPABILITY_ERROR, `Capability ${name} failed: ${detail}`, {
      capability: name,
      detail,
    });
  }

  // --- Local ---

  static config(reason: string, data?: Record<string, unknown>): AgentError {
    return new AgentError(ErrorCodes.CONFIG_ERROR, `Configuration error: ${reason}`, data);
  }

  static transport(url: string, reason: string): AgentError {
    return new AgentError(ErrorCodes.TRANSPORT_ERROR, `Transport error: ${reason}`, { url });
  }
}
