/**
 * Anthropic answer generation.
 */

import Anthropic from '@anthropic-ai/sdk';
import { GenerationFailureError } from '@/lib/errors';
import { callWithRetry, logUsage } from './retry';
import type { AnswerGenerator, GenerateRequest, GeneratedAnswer, GeneratorCallOptions } from './types';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-5-20250929';

export interface AnthropicGeneratorOptions extends GeneratorCallOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
}

export class AnthropicAnswerGenerator implements AnswerGenerator {
  readonly name = 'anthropic';
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(private readonly options: AnthropicGeneratorOptions) {
    // The SDK's own retries are disabled; callWithRetry owns the schedule.
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
  }

  async generate(request: GenerateRequest): Promise<GeneratedAnswer> {
    const response = await callWithRetry(
      'Anthropic',
      (signal) =>
        this.client.messages.create(
          {
            model: this.model,
            max_tokens: this.options.maxTokens ?? 2048,
            system: request.system,
            messages: [{ role: 'user', content: request.prompt }],
          },
          { signal }
        ),
      this.options,
      request.signal
    );

    const text = response.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('')
      .trim();
    if (!text) throw new GenerationFailureError('Anthropic returned an empty answer', undefined, false);

    logUsage('Anthropic', this.model, response.usage.input_tokens, response.usage.output_tokens);
    return {
      text,
      model: this.model,
      tokenUsage: { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens },
    };
  }
}
