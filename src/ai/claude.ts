/**
 * Anthropic Claude gateway (messages API).
 * Text blocks are joined; the first tool_use block wins over text.
 */
import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../utils/logger.js';
import {
  callWithPolicy,
  failureFromStatus,
  GatewayFailure,
  parseToolArguments,
  type CallPolicy,
  type CompletionGateway,
  type CompletionRequest,
  type CompletionResult,
  type ToolSpec,
} from './gateway.js';

export interface AnthropicGatewayOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  policy: CallPolicy;
}

export class AnthropicGateway implements CompletionGateway {
  readonly provider = 'anthropic';
  readonly model: string;
  private readonly client: Anthropic;

  constructor(private readonly opts: AnthropicGatewayOptions) {
    this.model = opts.model;
    this.client = new Anthropic({ apiKey: opts.apiKey, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    logger.debug('claude.complete', { model: this.model, tools: request.tools?.length ?? 0 });

    const body: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: request.maxTokens ?? this.opts.maxTokens,
      ...(request.system ? { system: request.system } : {}),
      ...(request.tools?.length ? { tools: request.tools.map(toAnthropicTool) } : {}),
      messages: [{ role: 'user', content: request.prompt }],
    };

    const res = await callWithPolicy(
      'claude.complete',
      this.opts.policy,
      (signal) => this.client.messages.create(body, { signal }),
      toGatewayFailure,
    );

    logger.debug('claude.complete done', {
      inputTokens: res.usage.input_tokens,
      outputTokens: res.usage.output_tokens,
    });

    for (const block of res.content) {
      if (block.type === 'tool_use') {
        return {
          kind: 'tool_call',
          toolName: block.name,
          toolArguments: parseToolArguments(block.name, block.input),
        };
      }
    }

    const text = res.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');
    if (!text.trim()) {
      throw new GatewayFailure('empty_response', 'anthropic returned no text content', false);
    }
    return { kind: 'text', text };
  }
}

function toAnthropicTool(tool: ToolSpec): Anthropic.Tool {
  return { name: tool.name, description: tool.description, input_schema: tool.parameters };
}

function toGatewayFailure(err: unknown): GatewayFailure {
  if (err instanceof Anthropic.APIError) return failureFromStatus(err.status, err.message);
  return new GatewayFailure('network', err instanceof Error ? err.message : String(err), true);
}
