/** Serialized form of an AgentError, as carried in JSON-RPC error objects. */
export interface AgentErrorData {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}

export const ErrorCodes = {
  // JSON-RPC 2.0
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,

  // A2A task errors
  TASK_NOT_FOUND: -32001,
  TASK_NOT_CANCELABLE: -32002,

  // Agent errors
  TASK_CONFLICT: -32010,
  ALREADY_TERMINAL: -32011,
  UNKNOWN_CAPABILITY: -32020,
  CAPABILITY_ERROR: -32021,

  // Local (never sent over the wire)
  CONFIG_ERROR: -32090,
  TRANSPORT_ERROR: -32091,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
