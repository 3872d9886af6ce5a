/** Media type string (e.g. "text/plain", "application/json"). */
export type MediaType = string;

/** A capability that the agent advertises. */
export interface Skill {
  id: string;
  name: string;
  description: string;
  tags: string[];
  examples?: string[];
  inputModes?: MediaType[];
  outputModes?: MediaType[];
}

/** Optional protocol features supported by the agent. */
export interface Capabilities {
  streaming?: boolean;
  pushNotifications?: boolean;
  stateTransitionHistory?: boolean;
}

/** Organization operating the agent. */
export interface Provider {
  organization: string;
  url?: string;
}

/** Describes an agent's identity, capabilities, and how to reach it. */
export interface AgentCard {
  agentId?: string;
  name: string;
  description: string;
  version: string;
  url: string;
  protocolVersion: string;
  capabilities: Capabilities;
  skills: Skill[];
  defaultInputModes: MediaType[];
  defaultOutputModes: MediaType[];
  provider?: Provider;
  documentationUrl?: string;
}
