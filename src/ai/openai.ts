/**
 * OpenAI chat-completions gateway.
 * Also serves OpenRouter, which speaks the same wire protocol at a different base URL.
 */
import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming, ChatCompletionTool } from 'openai/resources/chat/completions';
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

export interface OpenAIGatewayOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  policy: CallPolicy;
  /** Set for OpenRouter or any other compatible endpoint */
  baseURL?: string;
  provider?: 'openai' | 'openrouter';
}

export class OpenAIGateway implements CompletionGateway {
  readonly provider: 'openai' | 'openrouter';
  readonly model: string;
  private readonly client: OpenAI;

  constructor(private readonly opts: OpenAIGatewayOptions) {
    this.provider = opts.provider ?? 'openai';
    this.model = opts.model;
    // Retries are owned by callWithPolicy
    this.client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    logger.debug('openai.complete', { provider: this.provider, model: this.model, tools: request.tools?.length ?? 0 });

    const maxTokens = request.maxTokens ?? this.opts.maxTokens;
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      // OpenAI's o-series rejects max_tokens; OpenRouter still expects it
      ...(this.provider === 'openai' ? { max_completion_tokens: maxTokens } : { max_tokens: maxTokens }),
      messages: [
        ...(request.system ? [{ role: 'system' as const, content: request.system }] : []),
        { role: 'user' as const, content: request.prompt },
      ],
      ...(request.tools?.length ? { tools: request.tools.map(toOpenAITool) } : {}),
    };

    const res = await callWithPolicy(
      `${this.provider}.complete`,
      this.opts.policy,
      (signal) => this.client.chat.completions.create(body, { signal }),
      toGatewayFailure,
    );

    const message = res.choices[0]?.message;
    const toolCall = message?.tool_calls?.[0];
    if (toolCall) {
      return {
        kind: 'tool_call',
        toolName: toolCall.function.name,
        toolArguments: parseToolArguments(toolCall.function.name, toolCall.function.arguments),
      };
    }

    const text = message?.content ?? '';
    if (!text.trim()) {
      throw new GatewayFailure('empty_response', `${this.provider} returned no content`, false);
    }

    logger.debug('openai.complete done', {
      inputTokens: res.usage?.prompt_tokens,
      outputTokens: res.usage?.completion_tokens,
    });
    return { kind: 'text', text };
  }
}

function toOpenAITool(tool: ToolSpec): ChatCompletionTool {
  return {
    type: 'function',
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

function toGatewayFailure(err: unknown): GatewayFailure {
  if (err instanceof OpenAI.APIError) return failureFromStatus(err.status, err.message);
  return new GatewayFailure('network', err instanceof Error ? err.message : String(err), true);
}
