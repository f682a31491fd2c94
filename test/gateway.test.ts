import {
  asGatewayFailure,
  callWithPolicy,
  failureFromStatus,
  GatewayFailure,
  parseToolArguments,
  type GatewayFailureReason,
} from '../src/ai/gateway.js';

describe('failureFromStatus', () => {
  const cases: Array<[number | undefined, GatewayFailureReason, boolean]> = [
    [undefined, 'network', true],
    [401, 'auth', false],
    [403, 'auth', false],
    [429, 'rate_limit', true],
    [503, 'model', true],
    [400, 'model', false],
  ];

  it.each(cases)('status %s → %s (retryable: %s)', (status, reason, retryable) => {
    const failure = failureFromStatus(status, 'boom');
    expect(failure.reason).toBe(reason);
    expect(failure.retryable).toBe(retryable);
    expect(failure.status).toBe(status);
  });
});

describe('asGatewayFailure', () => {
  it('passes a GatewayFailure through unchanged', () => {
    const failure = new GatewayFailure('rate_limit', 'slow down', true, 429);
    expect(asGatewayFailure(failure)).toBe(failure);
  });

  it('wraps anything else as a non-retryable model failure', () => {
    const failure = asGatewayFailure(new Error('weird'));
    expect(failure.reason).toBe('model');
    expect(failure.retryable).toBe(false);
    expect(failure.message).toBe('weird');
  });
});

describe('parseToolArguments', () => {
  it('parses a JSON argument string', () => {
    expect(parseToolArguments('submit', '{"text": "hi"}')).toEqual({ text: 'hi' });
  });

  it('accepts an already-parsed object', () => {
    expect(parseToolArguments('submit', { text: 'hi' })).toEqual({ text: 'hi' });
  });

  it.each(['not json', '[1, 2]', 'null', 42])('rejects %s as a malformed tool call', (raw) => {
    expect(() => parseToolArguments('submit', raw)).toThrow('Tool call submit carried non-object arguments');
  });
});

describe('callWithPolicy', () => {
  const toFailure = (err: unknown) => failureFromStatus(503, err instanceof Error ? err.message : String(err));

  it('retries retryable failures and returns the eventual result', async () => {
    const call = vi.fn()
      .mockRejectedValueOnce(new Error('upstream hiccup'))
      .mockResolvedValueOnce('reply');

    await expect(callWithPolicy('test', { timeoutMs: 1_000, maxAttempts: 2, baseDelayMs: 0 }, call, toFailure))
      .resolves.toBe('reply');
    expect(call).toHaveBeenCalledTimes(2);
  });

  it('gives up immediately on a non-retryable failure', async () => {
    const call = vi.fn().mockRejectedValue(new GatewayFailure('auth', 'bad key', false, 401));

    await expect(callWithPolicy('test', { timeoutMs: 1_000, maxAttempts: 3, baseDelayMs: 0 }, call, toFailure))
      .rejects.toMatchObject({ reason: 'auth', retryable: false });
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('turns an expired call into a timeout failure after the last attempt', async () => {
    const call = vi.fn(() => new Promise<string>(() => undefined));

    await expect(callWithPolicy('test', { timeoutMs: 10, maxAttempts: 2, baseDelayMs: 0 }, call, toFailure))
      .rejects.toMatchObject({ reason: 'timeout', retryable: true });
    expect(call).toHaveBeenCalledTimes(2);
  });
});
