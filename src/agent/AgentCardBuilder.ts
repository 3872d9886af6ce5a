import type { AgentCard, Skill, Capabilities, Provider, MediaType } from '../types/agent-card.js';

export const DEFAULT_PROTOCOL_VERSION = '0.3.0';

const REQUIRED_FIELDS = [
  'name',
  'description',
  'version',
  'url',
  'skills',
  'defaultInputModes',
  'defaultOutputModes',
] as const satisfies readonly (keyof AgentCard)[];

type RequiredField = (typeof REQUIRED_FIELDS)[number];

/** Fluent builder for constructing an immutable AgentCard. */
export class AgentCardBuilder {
  private readonly card: Partial<AgentCard> = {};

  agentId(id: string): this {
    this.card.agentId = id;
    return this;
  }

  name(name: string): this {
    this.card.name = name;
    return this;
  }

  description(description: string): this {
    this.card.description = description;
    return this;
  }

  version(version: string): this {
    this.card.version = version;
    return this;
  }

  url(url: string): this {
    this.card.url = url;
    return this;
  }

  protocolVersion(version: string): this {
    this.card.protocolVersion = version;
    return this;
  }

  capabilities(caps: Capabilities): this {
    this.card.capabilities = caps;
    return this;
  }

  skill(skill: Skill): this {
    if (!this.card.skills) this.card.skills = [];
    this.card.skills.push(skill);
    return this;
  }

  defaultInputModes(modes: MediaType[]): this {
    this.card.defaultInputModes = modes;
    return this;
  }

  defaultOutputModes(modes: MediaType[]): this {
    this.card.defaultOutputModes = modes;
    return this;
  }

  provider(provider: Provider): this {
    this.card.provider = provider;
    return this;
  }

  documentationUrl(url: string): this {
    this.card.documentationUrl = url;
    return this;
  }

  /**
   * Build the AgentCard, validating that all required fields are set.
   * The result is deeply frozen, including a copy of every skill.
   */
  build(): AgentCard {
    const draft = this.card;
    if (!hasRequiredFields(draft)) {
      throw new Error(`AgentCard missing required fields: ${missingFields(draft).join(', ')}`);
    }

    const card: AgentCard = {
      ...(draft.agentId !== undefined ? { agentId: draft.agentId } : {}),
      name: draft.name,
      description: draft.description,
      version: draft.version,
      url: draft.url,
      protocolVersion: draft.protocolVersion ?? DEFAULT_PROTOCOL_VERSION,
      capabilities: draft.capabilities ?? {},
      skills: draft.skills,
      defaultInputModes: draft.defaultInputModes,
      defaultOutputModes: draft.defaultOutputModes,
      ...(draft.provider !== undefined ? { provider: draft.provider } : {}),
      ...(draft.documentationUrl !== undefined
        ? { documentationUrl: draft.documentationUrl }
        : {}),
    };

    return deepFreeze(structuredClone(card));
  }
}

/** Required fields that are unset, or set to an empty list. */
function missingFields(card: Partial<AgentCard>): RequiredField[] {
  return REQUIRED_FIELDS.filter((field) => {
    const value = card[field];
    return Array.isArray(value) ? value.length === 0 : !value;
  });
}

function hasRequiredFields(
  card: Partial<AgentCard>,
): card is Partial<AgentCard> & Pick<AgentCard, RequiredField> {
  return missingFields(card).length === 0;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
