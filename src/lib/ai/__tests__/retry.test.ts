import { describe, it, expect } from 'vitest';
import { GenerationFailureError } from '@/lib/errors';
import { calculateCost, callWithRetry, isRetryable } from '../retry';

class HttpError extends Error {
  constructor(readonly status: number) {
    super(`HTTP ${status}`);
  }
}

describe('isRetryable', () => {
  it('retries rate limits and server errors only', () => {
    expect(isRetryable(new HttpError(429))).toBe(true);
    expect(isRetryable(new HttpError(529))).toBe(true);
    expect(isRetryable(new HttpError(400))).toBe(false);
    expect(isRetryable(new Error('Resource has been exhausted (e.g. check quota).'))).toBe(true);
  });
});

describe('callWithRetry', () => {
  it('retries until the backend answers', async () => {
    let calls = 0;
    const result = await callWithRetry(
      'Test',
      async () => {
        calls++;
        if (calls < 3) throw new HttpError(503);
        return 'ok';
      },
      { timeoutMs: 1000, retryDelays: [0] }
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
  });

  it('wraps the final error as a generation failure', async () => {
    const failure = callWithRetry('Test', async () => Promise.reject(new HttpError(401)), {
      timeoutMs: 1000,
      retryDelays: [0],
    });

    await expect(failure).rejects.toBeInstanceOf(GenerationFailureError);
    await expect(failure).rejects.toThrow('Test failed: HTTP 401');
  });

  it('reports a backend that never answers', async () => {
    const failure = callWithRetry('Test', () => new Promise<string>(() => undefined), {
      timeoutMs: 10,
      maxRetries: 1,
      retryDelays: [0],
    });

    await expect(failure).rejects.toThrow('Test failed: no answer within 10ms');
  });
});

describe('calculateCost', () => {
  it('prices known models and ignores unknown ones', () => {
    expect(calculateCost('gemini-2.5-flash', 1_000_000, 1_000_000)).toBeCloseTo(0.75, 10);
    expect(calculateCost('some-other-model', 1000, 1000)).toBe(0);
  });
});
