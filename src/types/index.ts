export type { TextPart, DataPart, Part, PartKind } from './part.js';

export type { TaskState, TerminalTaskState, MessageRole, Message } from './message.js';

export type { Artifact } from './artifact.js';

export type { TaskStatus, TaskMetadata, Task } from './task.js';

export type {
  TaskStatusUpdateEvent,
  TaskArtifactUpdateEvent,
  TaskEvent,
} from './events.js';

export type { AgentErrorData, ErrorCode } from './errors.js';
export { ErrorCodes } from './errors.js';

export type { CapabilityParameters, CapabilityFn } from './capability.js';

export type { MessageSendMetadata, MessageSendParams, TaskIdParams } from './payloads.js';

export type { LogLevel, Logger } from './logger.js';

export type { TaskStore } from './store.js';

export type {
  MediaType,
  Skill,
  Capabilities,
  Provider,
  AgentCard,
} from './agent-card.js';

export type {
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcSuccessResponse,
  JsonRpcErrorResponse,
  JsonRpcResponse,
  MethodPayloadMap,
  MethodName,
} from './handler.js';
