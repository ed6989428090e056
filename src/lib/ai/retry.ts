/**
 * Retry, timeout and cost logging shared by the generative backends.
 */

import { GenerationFailureError, PipelineError, TimeoutError, errorMessage } from '@/lib/errors';
import { withRetry, withTimeout } from '@/lib/utils/async';
import type { GeneratorCallOptions } from './types';

export const MAX_RETRIES = 3;
export const RETRY_DELAYS = [5000, 15000, 45000];

/** Per-token pricing (USD) */
const PRICES: Record<string, { input: number; output: number }> = {
  'gemini-2.5-flash': { input: 0.15 / 1_000_000, output: 0.6 / 1_000_000 },
  'gemini-2.5-pro': { input: 1.25 / 1_000_000, output: 10 / 1_000_000 },
  'gemini-2.0-flash': { input: 0.1 / 1_000_000, output: 0.4 / 1_000_000 },
  'claude-sonnet-4-5-20250929': { input: 3 / 1_000_000, output: 15 / 1_000_000 },
};

export function calculateCost(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = PRICES[model.replace(/-preview.*$/, '')];
  if (!pricing) return 0;
  return inputTokens * pricing.input + outputTokens * pricing.output;
}

export function logUsage(label: string, model: string, inputTokens: number, outputTokens: number): void {
  const cost = calculateCost(model, inputTokens, outputTokens);
  console.log(
    `[${label}] input: ${inputTokens} tokens, output: ${outputTokens} tokens, cost: $${cost.toFixed(4)} (${model})`
  );
}

function statusOf(error: unknown): number | null {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') return error.status;
  return null;
}

/** Timeouts, rate limits, overload (529) and server errors are retried. */
export function isRetryable(error: unknown): boolean {
  if (error instanceof PipelineError) return error.retryable;
  const status = statusOf(error);
  if (status !== null) return status === 429 || status >= 500;
  const message = errorMessage(error).toLowerCase();
  return message.includes('rate') || message.includes('quota') || message.includes('fetch failed');
}

/**
 * Run one backend call with a per-attempt deadline and the retry schedule.
 * Whatever finally escapes is a GenerationFailureError.
 */
export async function callWithRetry<T>(
  label: string,
  call: (signal: AbortSignal) => Promise<T>,
  options: GeneratorCallOptions,
  signal?: AbortSignal
): Promise<T> {
  const retries = options.maxRetries ?? MAX_RETRIES;
  try {
    return await withRetry(() => withTimeout(call, options.timeoutMs, `${label} request`, signal), {
      retries,
      delays: options.retryDelays ?? RETRY_DELAYS,
      shouldRetry: (error) => isRetryable(error),
      onRetry: (error, attempt, delayMs) =>
        console.warn(`[${label}] ${errorMessage(error)}, retry ${attempt}/${retries} in ${delayMs}ms...`),
      signal,
    });
  } catch (error) {
    if (error instanceof GenerationFailureError) throw error;
    const reason = error instanceof TimeoutError ? `no answer within ${options.timeoutMs}ms` : errorMessage(error);
    throw new GenerationFailureError(`${label} failed: ${reason}`, error, false);
  }
}
