import type { AgentCard } from '../types/agent-card.js';
import { DEFAULT_AGENT_DESCRIPTION } from '../config/schema.js';
import { AgentCardBuilder } from './AgentCardBuilder.js';

export interface EchoAgentCardOptions {
  url: string;
  name?: string;
  description?: string;
  version?: string;
}

export function createEchoAgentCard(options: EchoAgentCardOptions): AgentCard {
  return new AgentCardBuilder()
    .agentId('echo-agent-v1')
    .name(options.name ?? 'EchoAgent')
    .description(options.description ?? DEFAULT_AGENT_DESCRIPTION)
    .version(options.version ?? '1.0.0')
    .url(options.url)
    .capabilities({ streaming: true, pushNotifications: false, stateTransitionHistory: true })
    .skill({
      id: 'echo',
      name: 'echo',
      description: 'Echoes back the input message',
      inputModes: ['text/plain'],
      outputModes: ['text/plain'],
      examples: ['Hello World!'],
      tags: ['echo', 'simple'],
    })
    .skill({
      id: 'echo_with_prefix',
      name: 'echo_with_prefix',
      description: 'Echoes back the input message with a prefix (parameter "prefix", default "Echo: ")',
      inputModes: ['text/plain'],
      outputModes: ['text/plain'],
      examples: ['Hello World! with prefix'],
      tags: ['echo', 'prefix'],
    })
    .defaultInputModes(['text/plain'])
    .defaultOutputModes(['text/plain'])
    .build();
}
