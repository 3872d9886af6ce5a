// Capabilities
export { CapabilityRegistry } from './capabilities/CapabilityRegistry.js';
export {
  BUILTIN_CAPABILITIES,
  DEFAULT_CAPABILITY,
  DEFAULT_PREFIX,
  echo,
  echoWithPrefix,
} from './capabilities/builtins.js';
export type { BuiltinCapabilityName } from './capabilities/builtins.js';

// Task lifecycle
export { TaskExecutor, extractText } from './execution/TaskExecutor.js';
export type { TaskExecutorConfig, ExecutionRequest, CancelOutcome } from './execution/TaskExecutor.js';
export { isTerminalState } from './execution/taskState.js';
export { EventChannel, DEFAULT_CHANNEL_CAPACITY } from './events/EventChannel.js';

// Stores
export { InMemoryTaskStore } from './stores/InMemoryTaskStore.js';

// Errors
export { AgentError } from './errors/AgentError.js';

// Canonical JSON
export { Canonicalizer } from './crypto/Canonicalizer.js';

// Agent
export { AgentCardBuilder, DEFAULT_PROTOCOL_VERSION } from './agent/AgentCardBuilder.js';
export { createEchoAgentCard } from './agent/echoAgentCard.js';
export type { EchoAgentCardOptions } from './agent/echoAgentCard.js';
export { EchoAgent } from './agent/EchoAgent.js';
export type { EchoAgentConfig } from './agent/EchoAgent.js';

// Server
export { RequestHandler } from './server/RequestHandler.js';
export type { RequestHandlerConfig } from './server/RequestHandler.js';

// Transport
export { HttpTransport, WELL_KNOWN_PATH, HEALTH_PATH } from './transport/HttpTransport.js';
export type { HttpTransportConfig } from './transport/HttpTransport.js';

// Client
export { A2AClient, responseText } from './client/A2AClient.js';
export type { A2AClientConfig, SendMessageOptions } from './client/A2AClient.js';

// Configuration
export { loadConfig, parseConfig, resolvePort } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';
export { substituteEnvVars } from './config/env.js';
export type { Environment } from './config/env.js';
export type { AgentConfig } from './config/schema.js';

// Logging
export { createConsoleLogger } from './logging/consoleLogger.js';

// Types
export * from './types/index.js';
