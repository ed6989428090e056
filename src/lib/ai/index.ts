import type { AppConfig } from '@/lib/config';
import { AnthropicAnswerGenerator } from './client';
import { GeminiAnswerGenerator } from './gemini-client';
import type { AnswerGenerator } from './types';

export type { AnswerGenerator, GenerateRequest, GeneratedAnswer } from './types';
export { GeminiAnswerGenerator } from './gemini-client';
export { AnthropicAnswerGenerator } from './client';

/** Null when the configured provider has no API key; question mode then degrades. */
export function createAnswerGenerator(config: AppConfig): AnswerGenerator | null {
  if (config.llmProvider === 'anthropic') {
    return config.anthropicApiKey
      ? new AnthropicAnswerGenerator({ apiKey: config.anthropicApiKey, timeoutMs: config.llmTimeoutMs })
      : null;
  }
  return config.googleAiApiKey
    ? new GeminiAnswerGenerator({ apiKey: config.googleAiApiKey, timeoutMs: config.llmTimeoutMs })
    : null;
}
