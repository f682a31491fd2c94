import type { CompletionGateway } from '../ai/gateway.js';

export interface AgentInfo {
  type: string;
  description: string;
  provider: string;
  model: string;
}

/** Shared base for pipeline agents; the gateway is always injected. */
export abstract class DialogueAgent {
  abstract readonly type: string;
  abstract readonly description: string;

  constructor(protected readonly gateway: CompletionGateway) {}

  describe(): AgentInfo {
    return {
      type: this.type,
      description: this.description,
      provider: this.gateway.provider,
      model: this.gateway.model,
    };
  }
}
