/**
 * Completion gateway contract shared by every model client.
 * Agents receive a gateway through their constructor and never import an SDK directly.
 */
import { TimeoutError, withRetry, withTimeout } from '../utils/retry.js';
import { logger } from '../utils/logger.js';
import { tryParseJson } from '../utils/json.js';

// ── Public interfaces ─────────────────────────────────────────────────────────

export type ToolParameters = {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
};

export interface ToolSpec {
  name: string;
  description: string;
  /** JSON schema of the arguments object */
  parameters: ToolParameters;
}

export interface CompletionRequest {
  prompt: string;
  system?: string;
  tools?: ToolSpec[];
  maxTokens?: number;
}

export type CompletionResult =
  | { kind: 'text'; text: string }
  | { kind: 'tool_call'; toolName: string; toolArguments: Record<string, unknown> };

export interface CompletionGateway {
  readonly provider: string;
  readonly model: string;
  /** Rejects with GatewayFailure; never resolves with an empty or malformed result. */
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

// ── Failures ──────────────────────────────────────────────────────────────────

export type GatewayFailureReason =
  | 'timeout'
  | 'network'
  | 'auth'
  | 'rate_limit'
  | 'model'
  | 'empty_response'
  | 'malformed_tool_call';

export class GatewayFailure extends Error {
  constructor(
    public readonly reason: GatewayFailureReason,
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'GatewayFailure';
  }
}

/** Gateways reject with GatewayFailure; anything else a client throws is treated as a model error. */
export function asGatewayFailure(err: unknown): GatewayFailure {
  if (err instanceof GatewayFailure) return err;
  return new GatewayFailure('model', err instanceof Error ? err.message : String(err), false);
}

/** Maps an HTTP status (or its absence) onto the failure taxonomy. */
export function failureFromStatus(status: number | undefined, message: string): GatewayFailure {
  if (status === undefined) return new GatewayFailure('network', message, true);
  if (status === 401 || status === 403) return new GatewayFailure('auth', message, false, status);
  if (status === 429) return new GatewayFailure('rate_limit', message, true, status);
  if (status >= 500) return new GatewayFailure('model', message, true, status);
  return new GatewayFailure('model', message, false, status);
}

// ── Call policy ───────────────────────────────────────────────────────────────

export interface CallPolicy {
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs?: number;
}

/**
 * Runs one provider call under timeout + retry and normalises every error
 * into a GatewayFailure via `toFailure`.
 */
export async function callWithPolicy<T>(
  label: string,
  policy: CallPolicy,
  call: (signal: AbortSignal) => Promise<T>,
  toFailure: (err: unknown) => GatewayFailure,
): Promise<T> {
  const attempt = async (): Promise<T> => {
    try {
      return await withTimeout(call, policy.timeoutMs, label);
    } catch (err) {
      if (err instanceof GatewayFailure) throw err;
      if (err instanceof TimeoutError) throw new GatewayFailure('timeout', err.message, true);
      throw toFailure(err);
    }
  };

  try {
    return await withRetry(attempt, {
      maxAttempts: policy.maxAttempts,
      baseDelayMs: policy.baseDelayMs,
      isRetryable: (err) => err instanceof GatewayFailure && err.retryable,
    });
  } catch (err) {
    const failure = err instanceof GatewayFailure ? err : toFailure(err);
    logger.warn(`${label}: call failed`, { reason: failure.reason, status: failure.status, message: failure.message });
    throw failure;
  }
}

/** Parses a tool-call argument string; anything but a JSON object is a malformed call. */
export function parseToolArguments(toolName: string, raw: unknown): Record<string, unknown> {
  const value: unknown = typeof raw === 'string' ? tryParseJson(raw) : raw;
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new GatewayFailure('malformed_tool_call', `Tool call ${toolName} carried non-object arguments`, false);
  }
  return Object.fromEntries(Object.entries(value));
}
