export interface GenerateRequest {
  system: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface GeneratedAnswer {
  text: string;
  model: string;
  tokenUsage: {
    inputTokens: number;
    outputTokens: number;
  };
}

/** A language-model backend that turns a grounded prompt into answer text. */
export interface AnswerGenerator {
  readonly name: string;
  generate(request: GenerateRequest): Promise<GeneratedAnswer>;
}

export interface GeneratorCallOptions {
  timeoutMs: number;
  maxRetries?: number;
  retryDelays?: number[];
}
