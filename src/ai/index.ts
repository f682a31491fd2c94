import { DEFAULT_MODELS, type Env } from '../config.js';
import { logger } from '../utils/logger.js';
import { AnthropicGateway } from './claude.js';
import { OpenAIGateway } from './openai.js';
import type { CallPolicy, CompletionGateway } from './gateway.js';

export * from './gateway.js';
export { AnthropicGateway } from './claude.js';
export { OpenAIGateway } from './openai.js';

type GatewayEnv = Pick<Env,
  | 'LLM_PROVIDER' | 'LLM_MODEL' | 'LLM_TIMEOUT_MS' | 'LLM_MAX_ATTEMPTS' | 'LLM_MAX_TOKENS'
  | 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY' | 'OPENROUTER_API_KEY' | 'OPENROUTER_BASE_URL'>;

/**
 * Builds the gateway for the configured provider.
 * Throws when the provider's API key is missing; this is a startup error, not a pipeline one.
 */
export function createGateway(cfg: GatewayEnv): CompletionGateway {
  const model = cfg.LLM_MODEL ?? DEFAULT_MODELS[cfg.LLM_PROVIDER];
  const policy: CallPolicy = { timeoutMs: cfg.LLM_TIMEOUT_MS, maxAttempts: cfg.LLM_MAX_ATTEMPTS };
  const maxTokens = cfg.LLM_MAX_TOKENS;

  logger.info('Gateway: configuring provider', { provider: cfg.LLM_PROVIDER, model });

  switch (cfg.LLM_PROVIDER) {
    case 'openai':
      return new OpenAIGateway({ apiKey: requireKey('OPENAI_API_KEY', cfg.OPENAI_API_KEY), model, maxTokens, policy });
    case 'openrouter':
      return new OpenAIGateway({
        apiKey: requireKey('OPENROUTER_API_KEY', cfg.OPENROUTER_API_KEY),
        baseURL: cfg.OPENROUTER_BASE_URL,
        provider: 'openrouter',
        model, maxTokens, policy,
      });
    case 'anthropic':
      return new AnthropicGateway({ apiKey: requireKey('ANTHROPIC_API_KEY', cfg.ANTHROPIC_API_KEY), model, maxTokens, policy });
  }
}

function requireKey(name: string, value: string | undefined): string {
  if (!value) throw new Error(`${name} must be set for the selected LLM_PROVIDER`);
  return value;
}
