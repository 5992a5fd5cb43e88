import type { AgentCard, Skill, Capabilities, Provider } from '../types/agent-card.js';
import type { MediaType } from '../types/part.js';

/** Fluent builder for constructing an AgentCard. */
export class AgentCardBuilder {
  private readonly card: Partial<AgentCard> = {};

  name(name: string): this {
    this.card.name = name;
    return this;
  }

  description(description: string): this {
    this.card.description = description;
    return this;
  }

  /** Where the agent's JSON-RPC endpoint is reached. */
  url(url: string): this {
    this.card.url = url;
    return this;
  }

  version(version: string): this {
    this.card.version = version;
    return this;
  }

  protocolVersion(version: string): this {
    this.card.protocolVersion = version;
    return this;
  }

  capabilities(caps: Capabilities): this {
    this.card.capabilities = { ...this.card.capabilities, ...caps };
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

  iconUrl(url: string): this {
    this.card.iconUrl = url;
    return this;
  }

  documentationUrl(url: string): this {
    this.card.documentationUrl = url;
    return this;
  }

  /** Build the AgentCard, validating that all required fields are set. */
  build(): AgentCard {
    const { name, description, url, version, skills, defaultInputModes, defaultOutputModes } = this.card;
    const missing: string[] = [];
    if (!name) missing.push('name');
    if (description === undefined) missing.push('description');
    if (!url) missing.push('url');
    if (!version) missing.push('version');
    if (!skills || skills.length === 0) missing.push('skills');
    if (!defaultInputModes || defaultInputModes.length === 0) missing.push('defaultInputModes');
    if (!defaultOutputModes || defaultOutputModes.length === 0) missing.push('defaultOutputModes');

    if (
      missing.length > 0 ||
      !name ||
      description === undefined ||
      !url ||
      !version ||
      !skills ||
      !defaultInputModes ||
      !defaultOutputModes
    ) {
      throw new Error(`AgentCard missing required fields: ${missing.join(', ')}`);
    }

    return {
      ...this.card,
      name,
      description,
      url,
      version,
      capabilities: { ...this.card.capabilities },
      skills: [...skills],
      defaultInputModes: [...defaultInputModes],
      defaultOutputModes: [...defaultOutputModes],
    };
  }
}
