/**
 * Gemini answer generation.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { GenerationFailureError } from '@/lib/errors';
import { callWithRetry, logUsage } from './retry';
import type { AnswerGenerator, GenerateRequest, GeneratedAnswer, GeneratorCallOptions } from './types';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

export interface GeminiGeneratorOptions extends GeneratorCallOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export class GeminiAnswerGenerator implements AnswerGenerator {
  readonly name = 'gemini';
  private readonly client: GoogleGenerativeAI;
  private readonly model: string;

  constructor(private readonly options: GeminiGeneratorOptions) {
    this.client = new GoogleGenerativeAI(options.apiKey);
    this.model = options.model ?? DEFAULT_GEMINI_MODEL;
  }

  async generate(request: GenerateRequest): Promise<GeneratedAnswer> {
    const model = this.client.getGenerativeModel({
      model: this.model,
      systemInstruction: request.system,
      generationConfig: {
        temperature: this.options.temperature ?? 0.2,
        maxOutputTokens: this.options.maxOutputTokens ?? 2048,
      },
    });

    const response = await callWithRetry(
      'Gemini',
      (signal) => model.generateContent([{ text: request.prompt }], { signal }),
      this.options,
      request.signal
    );

    const result = response.response;
    const inputTokens = result.usageMetadata?.promptTokenCount ?? 0;
    const outputTokens = result.usageMetadata?.candidatesTokenCount ?? 0;

    let text: string;
    try {
      text = result.text();
    } catch (error) {
      // text() throws when the candidate was blocked
      throw new GenerationFailureError(`Gemini returned no usable answer`, error, false);
    }
    if (!text.trim()) throw new GenerationFailureError('Gemini returned an empty answer', undefined, false);

    logUsage('Gemini', this.model, inputTokens, outputTokens);
    return { text, model: this.model, tokenUsage: { inputTokens, outputTokens } };
  }
}
